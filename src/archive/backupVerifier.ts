import { BackupMissingError, errorMessage } from '../core/errors';
import { ObjectStore } from '../storage/objectStore.types';
import { StoreLayout } from '../storage/layout';

export interface BackupChecks {
  snapshotKey: string;
  snapshotExists: boolean;
  archivePrefix: string;
  archiveRows: number;
  archiveContains: boolean;
}

/**
 * Proof that the selection artifact for `supersededDate` is durably archived.
 * Only clearances issued by `verifyBackup` are honoured by the selection slot.
 */
export interface BackupClearance {
  readonly granted: boolean;
  readonly supersededDate: string | null;
  readonly verifiedAt: string;
  readonly checks?: BackupChecks;
  readonly reason?: string;
}

const issued = new WeakSet<BackupClearance>();

const issue = (clearance: BackupClearance): BackupClearance => {
  const frozen = Object.freeze(clearance);
  issued.add(frozen);
  return frozen;
};

export const checkBackupMarkers = async (
  store: ObjectStore,
  layout: StoreLayout,
  selectionDate: string
): Promise<BackupChecks> => {
  const snapshotKey = layout.snapshotKey(selectionDate);
  const archivePrefix = layout.archiveDatePrefix(selectionDate);
  const [snapshot, rows] = await Promise.all([store.head(snapshotKey), store.list(archivePrefix)]);
  return {
    snapshotKey,
    snapshotExists: snapshot !== undefined,
    archivePrefix,
    archiveRows: rows.length,
    archiveContains: rows.length > 0
  };
};

const missingMarkers = (checks: BackupChecks): string => {
  const missing: string[] = [];
  if (!checks.snapshotExists) missing.push(`snapshot ${checks.snapshotKey}`);
  if (!checks.archiveContains) missing.push(`archive rows under ${checks.archivePrefix}`);
  return `missing ${missing.join(' and ')}`;
};

/**
 * Grants supersession of `selectionDate` only when both the per-date snapshot and at
 * least one rolling-archive row exist. A store error is a deny, never a pass.
 * `null` means there is no current artifact, so nothing can be lost.
 */
export const verifyBackup = async (
  store: ObjectStore,
  layout: StoreLayout,
  selectionDate: string | null,
  clock: () => Date = () => new Date()
): Promise<BackupClearance> => {
  const verifiedAt = clock().toISOString();
  if (selectionDate === null) {
    return issue({ granted: true, supersededDate: null, verifiedAt, reason: 'no current selection artifact' });
  }
  try {
    const checks = await checkBackupMarkers(store, layout, selectionDate);
    const granted = checks.snapshotExists && checks.archiveContains;
    return issue({
      granted,
      supersededDate: selectionDate,
      verifiedAt,
      checks,
      reason: granted ? undefined : missingMarkers(checks)
    });
  } catch (err) {
    return issue({
      granted: false,
      supersededDate: selectionDate,
      verifiedAt,
      reason: `verification failed: ${errorMessage(err)}`
    });
  }
};

export const assertBackupClearance = (clearance: BackupClearance): void => {
  if (!issued.has(clearance)) {
    throw new BackupMissingError(clearance.supersededDate, 'clearance was not issued by the backup verifier');
  }
  if (!clearance.granted) {
    throw new BackupMissingError(clearance.supersededDate, clearance.reason ?? 'backup verification denied');
  }
};
