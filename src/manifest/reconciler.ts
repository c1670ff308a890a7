import { ManifestDriftError, errorMessage } from '../core/errors';
import { sha256Hex } from '../core/utils';
import { StoreLayout } from '../storage/layout';
import { ObjectStore } from '../storage/objectStore.types';
import { loadManifest } from './manifest';

export interface ReconcileOptions {
  apply?: boolean;
  verifyChecksums?: boolean;
}

export interface ReconcileReport {
  manifestKey: string;
  manifestGeneratedAt: string;
  dryRun: boolean;
  scanned: number;
  desired: number;
  protectedKeys: number;
  toDelete: string[];
  retained: string[];
  deleted: string[];
  failures: Array<{ key: string; error: string }>;
  missing: string[];
  checksumMismatch: string[];
  drift?: ManifestDriftError;
}

/**
 * Aligns the mutable prefix with the latest manifest. Dry-run unless `apply` is set.
 * The manifest object and everything under the archival prefix are never candidates,
 * nor are the objects every run maintains: a tail that aborts after writing the
 * selection leaves a manifest that predates it.
 * Missing or mismatched declared objects are reported as drift and left alone.
 */
export const reconcileManifest = async (
  store: ObjectStore,
  layout: StoreLayout,
  options: ReconcileOptions = {}
): Promise<ReconcileReport> => {
  const manifest = await loadManifest(store, layout);
  if (!manifest) {
    throw new Error(`No manifest at ${layout.manifestKey}; refusing to reconcile without a declared state.`);
  }
  const desired = new Map(manifest.items.map((item) => [item.key, item]));
  const actual = await store.list(layout.rootPrefix);

  const protectedKeys = actual.filter((head) => layout.isProtected(head.key));
  const undeclared = actual
    .filter((head) => !layout.isProtected(head.key) && !desired.has(head.key))
    .map((head) => head.key);
  const retained = undeclared.filter((key) => layout.isMaintained(key));
  const toDelete = undeclared.filter((key) => !layout.isMaintained(key));

  const present = new Set(actual.map((head) => head.key));
  const missing = manifest.items.filter((item) => !present.has(item.key)).map((item) => item.key);

  const checksumMismatch: string[] = [];
  for (const head of actual) {
    const item = desired.get(head.key);
    if (!item) continue;
    if (head.bytes !== item.bytes) {
      checksumMismatch.push(head.key);
      continue;
    }
    if (options.verifyChecksums) {
      const body = await store.get(head.key);
      if (body && sha256Hex(body) !== item.checksum) checksumMismatch.push(head.key);
    }
  }

  const report: ReconcileReport = {
    manifestKey: layout.manifestKey,
    manifestGeneratedAt: manifest.generatedAt,
    dryRun: !options.apply,
    scanned: actual.length,
    desired: desired.size,
    protectedKeys: protectedKeys.length,
    toDelete,
    retained,
    deleted: [],
    failures: [],
    missing,
    checksumMismatch
  };
  if (toDelete.length || missing.length || checksumMismatch.length) {
    report.drift = new ManifestDriftError(toDelete, missing, checksumMismatch);
    console.warn(`[reconcile] ${report.drift.message}`);
  }

  retained.forEach((key) => console.warn(`[reconcile] ${key} is not in the manifest; keeping it`));

  if (!options.apply) {
    toDelete.forEach((key) => console.log(`[reconcile] would delete ${key}`));
    return report;
  }
  for (const key of toDelete) {
    try {
      await store.delete(key);
      report.deleted.push(key);
      console.log(`[reconcile] deleted ${key}`);
    } catch (err) {
      report.failures.push({ key, error: errorMessage(err) });
      console.error(`[reconcile] failed to delete ${key}: ${errorMessage(err)}`);
    }
  }
  return report;
};
