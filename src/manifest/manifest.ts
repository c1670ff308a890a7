import { Manifest, ManifestItem, manifestSchema } from '../core/schema';
import { sha256Hex } from '../core/utils';
import { readJsonDocument, writeJsonDocument } from '../storage/jsonDocuments';
import { StoreLayout } from '../storage/layout';
import { ObjectStore } from '../storage/objectStore.types';

/**
 * Describes the objects that currently exist among `keys`. Keys outside the
 * mutable prefix or under protection are never declared.
 */
export const buildManifest = async (
  store: ObjectStore,
  layout: StoreLayout,
  keys: string[],
  clock: () => Date = () => new Date()
): Promise<Manifest> => {
  const declared = Array.from(new Set(keys))
    .filter((key) => key.startsWith(layout.rootPrefix) && !layout.isProtected(key))
    .sort();
  const items: ManifestItem[] = [];
  for (const key of declared) {
    const body = await store.get(key);
    if (!body) continue;
    const head = await store.head(key);
    items.push({
      key,
      bytes: body.length,
      checksum: sha256Hex(body),
      mtime: head?.lastModified ?? clock().toISOString()
    });
  }
  return { generatedAt: clock().toISOString(), items };
};

export const publishManifest = async (store: ObjectStore, layout: StoreLayout, manifest: Manifest): Promise<void> => {
  await writeJsonDocument(store, layout.manifestKey, manifest);
  console.log(`[manifest] published ${manifest.items.length} item(s) to ${layout.manifestKey}`);
};

export const loadManifest = (store: ObjectStore, layout: StoreLayout): Promise<Manifest | undefined> =>
  readJsonDocument(store, layout.manifestKey, manifestSchema);
