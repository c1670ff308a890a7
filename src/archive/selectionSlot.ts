import { BackupMissingError } from '../core/errors';
import { SelectionArtifact, selectionArtifactSchema } from '../core/schema';
import { readJsonDocument, writeJsonDocument } from '../storage/jsonDocuments';
import { StoreLayout } from '../storage/layout';
import { ObjectStore } from '../storage/objectStore.types';
import { BackupClearance, assertBackupClearance } from './backupVerifier';

/**
 * The one object that is overwritten in place: the current cycle's selection.
 * Replacing it is a state transition that requires a clearance for the exact
 * artifact being replaced.
 */
export class SelectionSlot {
  private store: ObjectStore;
  private layout: StoreLayout;

  constructor(store: ObjectStore, layout: StoreLayout) {
    this.store = store;
    this.layout = layout;
  }

  read(): Promise<SelectionArtifact | undefined> {
    return readJsonDocument(this.store, this.layout.selectionKey, selectionArtifactSchema);
  }

  async supersede(clearance: BackupClearance, next: SelectionArtifact): Promise<void> {
    assertBackupClearance(clearance);
    const current = await this.read();
    const currentDate = current?.selectionDate ?? null;
    if (currentDate !== clearance.supersededDate) {
      throw new BackupMissingError(
        currentDate,
        `selection changed since verification (cleared ${clearance.supersededDate ?? 'an empty slot'})`
      );
    }
    await writeJsonDocument(this.store, this.layout.selectionKey, next);
    console.log(`[selection] ${currentDate ?? 'empty slot'} superseded by ${next.selectionDate} (${next.picks.length} picks)`);
  }
}
