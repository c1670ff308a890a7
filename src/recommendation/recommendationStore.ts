import { PermanentProviderError } from '../core/errors';
import {
  ActionBandsConfig,
  RecommendationSet,
  RefinementLayer,
  recommendationSetSchema
} from '../core/schema';
import { readJsonDocument, writeJsonDocument } from '../storage/jsonDocuments';
import { StoreLayout } from '../storage/layout';
import { ObjectStore } from '../storage/objectStore.types';
import { buildRecommendationSet, upsertLayer } from './mergeEngine';

export const readRecommendations = (store: ObjectStore, layout: StoreLayout): Promise<RecommendationSet | undefined> =>
  readJsonDocument(store, layout.recommendationsKey, recommendationSetSchema);

export const writeRecommendations = async (
  store: ObjectStore,
  layout: StoreLayout,
  set: RecommendationSet
): Promise<void> => {
  await writeJsonDocument(store, layout.recommendationsKey, set);
};

/**
 * Folds a refinement layer into the current recommendation set. Every merge recomputes
 * from the base pass, so re-applying the same layer leaves the records unchanged.
 * The set is re-read before writing; a set replaced in the meantime is left alone.
 */
export const applyRefinementLayer = async (
  store: ObjectStore,
  layout: StoreLayout,
  layer: RefinementLayer,
  bands: ActionBandsConfig,
  clock: () => Date = () => new Date()
): Promise<RecommendationSet> => {
  const current = await readRecommendations(store, layout);
  if (!current) {
    throw new PermanentProviderError(`No recommendation set at ${layout.recommendationsKey} to refine.`);
  }
  if (current.selectionDate !== layer.selectionDate) {
    throw new PermanentProviderError(
      `Refinement ${layer.name} targets ${layer.selectionDate} but the current set is ${current.selectionDate}.`
    );
  }
  const known = new Set(current.records.map((r) => r.instrumentId));
  const unknown = layer.entries.filter((e) => !known.has(e.instrumentId)).map((e) => e.instrumentId);
  if (unknown.length) {
    console.warn(`[merge] ${layer.name}: ignoring ${unknown.length} instrument(s) without a base record: ${unknown.join(', ')}`);
  }
  const next = buildRecommendationSet(
    current.selectionDate,
    current.records,
    upsertLayer(current.layers, layer),
    bands,
    clock
  );
  const latest = await readRecommendations(store, layout);
  if (latest?.selectionDate !== current.selectionDate || latest.generatedAt !== current.generatedAt) {
    throw new PermanentProviderError(
      `Recommendation set ${current.selectionDate} changed while applying ${layer.name}; refinement not written.`
    );
  }
  await writeRecommendations(store, layout, next);
  console.log(
    `[merge] ${layer.name} applied to ${next.selectionDate}: buy ${next.summary.buy} / sell ${next.summary.sell} / hold ${next.summary.hold}, ${next.summary.overridden} overridden`
  );
  return next;
};
