import { PipelineConfig } from '../core/schema';
import { compactDate } from '../core/time';

/**
 * Key layout of the shared store. Everything lives under `rootPrefix`; the archival
 * prefix and the manifest object are protected from reconciliation.
 */
export class StoreLayout {
  readonly rootPrefix: string;
  readonly archivePrefix: string;
  readonly manifestKey: string;

  constructor(storage: PipelineConfig['storage']) {
    this.rootPrefix = storage.rootPrefix;
    this.archivePrefix = storage.archivePrefix.endsWith('/') ? storage.archivePrefix : `${storage.archivePrefix}/`;
    this.manifestKey = storage.manifestKey;
  }

  get metadataKey() {
    return `${this.rootPrefix}market/metadata.json`;
  }

  get pricesKey() {
    return `${this.rootPrefix}market/prices.json`;
  }

  get selectionKey() {
    return `${this.rootPrefix}current/selection.json`;
  }

  get recommendationsKey() {
    return `${this.rootPrefix}current/recommendations.json`;
  }

  snapshotKey(selectionDate: string) {
    return `${this.archivePrefix}snapshots/${compactDate(selectionDate)}.json`;
  }

  archiveDatePrefix(selectionDate: string) {
    return `${this.archivePrefix}selections/${selectionDate}/`;
  }

  archiveRowKey(selectionDate: string, instrumentId: string) {
    return `${this.archiveDatePrefix(selectionDate)}${encodeURIComponent(instrumentId)}.json`;
  }

  isArchival(key: string) {
    return key.startsWith(this.archivePrefix);
  }

  isProtected(key: string) {
    return key === this.manifestKey || this.isArchival(key);
  }

  /** Objects each successful run maintains; the manifest declares whichever of these exist. */
  get maintainedKeys(): string[] {
    return [this.metadataKey, this.pricesKey, this.selectionKey, this.recommendationsKey];
  }

  isMaintained(key: string) {
    return this.maintainedKeys.includes(key);
  }
}
