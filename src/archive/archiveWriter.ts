import { ArchiveEntry, MetricsSnapshot, SelectionArtifact, archiveEntrySchema } from '../core/schema';
import { readJsonDocument, writeJsonDocument } from '../storage/jsonDocuments';
import { StoreLayout } from '../storage/layout';
import { ObjectStore, PutOutcome } from '../storage/objectStore.types';

export interface ArchiveRowInput {
  selectionDate: string;
  instrumentId: string;
  metrics: MetricsSnapshot;
}

export type ArchiveSkipReason = 'EXISTS' | 'DUPLICATE_IN_BATCH';

export interface ArchiveWriteResult {
  written: ArchiveEntry[];
  skipped: Array<{ selectionDate: string; instrumentId: string; reason: ArchiveSkipReason }>;
}

/**
 * Append-only writer for the rolling archive. Each row is its own create-only
 * object, so a retried or overlapping batch can only add keys, never rewrite one.
 */
export class ArchiveWriter {
  private store: ObjectStore;
  private layout: StoreLayout;
  private clock: () => Date;

  constructor(store: ObjectStore, layout: StoreLayout, clock: () => Date = () => new Date()) {
    this.store = store;
    this.layout = layout;
    this.clock = clock;
  }

  async appendBatch(batch: ArchiveRowInput[]): Promise<ArchiveWriteResult> {
    const result: ArchiveWriteResult = { written: [], skipped: [] };
    const seen = new Set<string>();

    for (const row of batch) {
      const key = this.layout.archiveRowKey(row.selectionDate, row.instrumentId);
      const ref = { selectionDate: row.selectionDate, instrumentId: row.instrumentId };
      if (seen.has(key)) {
        result.skipped.push({ ...ref, reason: 'DUPLICATE_IN_BATCH' });
        continue;
      }
      seen.add(key);

      if (await this.store.head(key)) {
        result.skipped.push({ ...ref, reason: 'EXISTS' });
        continue;
      }
      const entry: ArchiveEntry = { ...ref, metricsSnapshot: row.metrics, createdAt: this.clock().toISOString() };
      // A concurrent run may have created the key between head and put.
      const outcome = await writeJsonDocument(this.store, key, entry, 'create-only');
      if (outcome === 'exists') {
        result.skipped.push({ ...ref, reason: 'EXISTS' });
      } else {
        result.written.push(entry);
      }
    }

    if (result.skipped.length) {
      console.log(
        `[archive] skipped ${result.skipped.length} existing row(s): ${result.skipped
          .map((s) => `${s.selectionDate}/${s.instrumentId}`)
          .join(', ')}`
      );
    }
    console.log(`[archive] appended ${result.written.length} row(s)`);
    return result;
  }

  writeSnapshot(artifact: SelectionArtifact): Promise<PutOutcome> {
    return writeJsonDocument(this.store, this.layout.snapshotKey(artifact.selectionDate), artifact, 'create-only');
  }

  async readArchive(selectionDate: string): Promise<ArchiveEntry[]> {
    const heads = await this.store.list(this.layout.archiveDatePrefix(selectionDate));
    const entries: ArchiveEntry[] = [];
    for (const head of heads) {
      const entry = await readJsonDocument(this.store, head.key, archiveEntrySchema);
      if (entry) entries.push(entry);
    }
    return entries;
  }
}
