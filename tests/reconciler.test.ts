import { ManifestDriftError } from '../src/core/errors';
import { buildManifest, loadManifest, publishManifest } from '../src/manifest/manifest';
import { reconcileManifest } from '../src/manifest/reconciler';
import { MemoryObjectStore } from '../src/storage/objectStore.memory';
import { testLayout } from './helpers/fixtures';

const layout = testLayout();

const seed = async () => {
  const store = new MemoryObjectStore(() => new Date('2026-10-15T08:00:00Z'));
  await store.put('data/market/prices.json', '{"prices":1}');
  await store.put('data/current/selection.json', '{"selection":1}');
  await store.put('data/stale/old-report.json', '{}');
  await store.put('data/current/tmp-export.csv', 'a,b');
  await store.put('data/archive/selections/2026-10-14/A.json', '{}');
  await store.put('data/archive/snapshots/20261014.json', '{}');
  await store.put('other/untracked.json', '{}');
  const manifest = await buildManifest(store, layout, ['data/market/prices.json', 'data/current/selection.json']);
  await publishManifest(store, layout, manifest);
  return store;
};

const deletes = (store: MemoryObjectStore) => store.mutations().filter((m) => m.op === 'delete');

describe('Manifest', () => {
  it('declares existing mutable objects with size and sha256, sorted by key', async () => {
    const store = new MemoryObjectStore(() => new Date('2026-10-15T08:00:00Z'));
    await store.put('data/market/prices.json', 'abc');
    const manifest = await buildManifest(
      store,
      layout,
      ['data/market/prices.json', 'data/current/missing.json', 'data/archive/snapshots/20261014.json', 'data/manifest.json'],
      () => new Date('2026-10-15T09:00:00Z')
    );
    expect(manifest).toEqual({
      generatedAt: '2026-10-15T09:00:00.000Z',
      items: [
        {
          key: 'data/market/prices.json',
          bytes: 3,
          checksum: 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
          mtime: '2026-10-15T08:00:00.000Z'
        }
      ]
    });
  });

  it('round-trips through the store', async () => {
    const store = await seed();
    const loaded = await loadManifest(store, layout);
    expect(loaded?.items.map((i) => i.key)).toEqual(['data/current/selection.json', 'data/market/prices.json']);
  });
});

describe('Manifest reconciler', () => {
  it('reports orphans in dry-run mode without deleting anything', async () => {
    const store = await seed();
    const report = await reconcileManifest(store, layout);
    expect(report.dryRun).toBe(true);
    expect(report.toDelete).toEqual(['data/current/tmp-export.csv', 'data/stale/old-report.json']);
    expect(report.deleted).toEqual([]);
    expect(deletes(store)).toEqual([]);
    expect(report.drift).toBeInstanceOf(ManifestDriftError);
  });

  it('deletes exactly the orphans in apply mode and spares the archive and manifest', async () => {
    const store = await seed();
    const report = await reconcileManifest(store, layout, { apply: true });
    expect(report.deleted).toEqual(['data/current/tmp-export.csv', 'data/stale/old-report.json']);
    expect(report.protectedKeys).toBe(3);
    expect(store.keys()).toEqual([
      'data/archive/selections/2026-10-14/A.json',
      'data/archive/snapshots/20261014.json',
      'data/current/selection.json',
      'data/manifest.json',
      'data/market/prices.json',
      'other/untracked.json'
    ]);
  });

  it('is idempotent once the store matches the manifest', async () => {
    const store = await seed();
    await reconcileManifest(store, layout, { apply: true });
    const again = await reconcileManifest(store, layout, { apply: true });
    expect(again.toDelete).toEqual([]);
    expect(again.deleted).toEqual([]);
    expect(again.drift).toBeUndefined();
  });

  it('reports declared objects that are missing or changed without acting on them', async () => {
    const store = await seed();
    await store.delete('data/market/prices.json');
    await store.put('data/current/selection.json', '{"selection":2}');
    const sameSize = await reconcileManifest(store, layout, { apply: true });
    expect(sameSize.missing).toEqual(['data/market/prices.json']);
    expect(sameSize.checksumMismatch).toEqual([]);

    const verified = await reconcileManifest(store, layout, { verifyChecksums: true });
    expect(verified.checksumMismatch).toEqual(['data/current/selection.json']);
    expect(await store.get('data/market/prices.json')).toBeUndefined();

    await store.put('data/current/selection.json', '{"selection":20}');
    const resized = await reconcileManifest(store, layout);
    expect(resized.checksumMismatch).toEqual(['data/current/selection.json']);
  });

  it('records a failed delete and carries on with the rest', async () => {
    const store = await seed();
    store.failWhen = (op, key) => op === 'delete' && key === 'data/current/tmp-export.csv';
    const report = await reconcileManifest(store, layout, { apply: true });
    expect(report.failures).toEqual([
      { key: 'data/current/tmp-export.csv', error: 'memory store: delete data/current/tmp-export.csv failed' }
    ]);
    expect(report.deleted).toEqual(['data/stale/old-report.json']);
  });

  it('keeps maintained objects that the manifest does not declare yet', async () => {
    const store = new MemoryObjectStore(() => new Date('2026-10-15T08:00:00Z'));
    await store.put('data/market/prices.json', '{"prices":1}');
    await publishManifest(store, layout, await buildManifest(store, layout, layout.maintainedKeys));
    await store.put('data/current/selection.json', '{"selection":1}');
    await store.put('data/current/recommendations.json', '{}');
    await store.put('data/current/tmp-export.csv', 'a,b');

    const report = await reconcileManifest(store, layout, { apply: true });
    expect(report.retained).toEqual(['data/current/recommendations.json', 'data/current/selection.json']);
    expect(report.deleted).toEqual(['data/current/tmp-export.csv']);
    expect((await store.get('data/current/selection.json'))?.toString()).toBe('{"selection":1}');
  });

  it('refuses to run without a manifest', async () => {
    const store = new MemoryObjectStore();
    await store.put('data/stale/old-report.json', '{}');
    await expect(reconcileManifest(store, layout, { apply: true })).rejects.toThrow(
      'No manifest at data/manifest.json; refusing to reconcile without a declared state.'
    );
    expect(deletes(store)).toEqual([]);
  });
});
