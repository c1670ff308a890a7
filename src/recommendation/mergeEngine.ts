import {
  ActionBandsConfig,
  ConfidenceLevel,
  RecommendationRecord,
  RecommendationSet,
  RefinementEntry,
  RefinementLayer
} from '../core/schema';
import { confidenceForScore, isHighConfidence, isReversal, resolveAction } from './actionBands';
import { stopLossPct } from './stopLoss';

export interface BaseScoreInput {
  instrumentId: string;
  score: number;
  confidence?: ConfidenceLevel;
  atrPct?: number | null;
}

export const buildBaseRecord = (input: BaseScoreInput, bands: ActionBandsConfig): RecommendationRecord => {
  const action = resolveAction(input.score, bands);
  const confidence = input.confidence ?? confidenceForScore(input.score, bands);
  const atrPct = input.atrPct ?? null;
  return {
    instrumentId: input.instrumentId,
    baseScore: input.score,
    baseAction: action,
    finalScore: input.score,
    finalAction: action,
    baseConfidence: confidence,
    confidence,
    hasRefinement: false,
    overrideFlag: false,
    atrPct,
    stopLossPct: stopLossPct(action, atrPct)
  };
};

// Drops any refinement state so a record can be rebuilt from its base pass.
export const baseOnly = (record: RecommendationRecord): RecommendationRecord => ({
  instrumentId: record.instrumentId,
  baseScore: record.baseScore,
  baseAction: record.baseAction,
  finalScore: record.baseScore,
  finalAction: record.baseAction,
  baseConfidence: record.baseConfidence,
  confidence: record.baseConfidence,
  hasRefinement: false,
  overrideFlag: false,
  atrPct: record.atrPct,
  stopLossPct: stopLossPct(record.baseAction, record.atrPct)
});

/**
 * One refinement replaces the final decision outright. The override flag is an audit
 * marker: a strict reversal against a high-confidence base pass. It never blocks.
 */
export const applyRefinement = (
  record: RecommendationRecord,
  entry: RefinementEntry,
  bands: ActionBandsConfig
): RecommendationRecord => {
  const refinedAction = entry.action ?? resolveAction(entry.score, bands);
  const overrideFlag = isReversal(record.baseAction, refinedAction) && isHighConfidence(record.baseConfidence, bands);
  return {
    ...record,
    refinedScore: entry.score,
    refinedAction,
    finalScore: entry.score,
    finalAction: refinedAction,
    confidence: entry.confidence ?? confidenceForScore(entry.score, bands),
    hasRefinement: true,
    overrideFlag,
    stopLossPct: stopLossPct(refinedAction, record.atrPct)
  };
};

/**
 * Pure reducer over ordered layers: each record starts from its base pass and every
 * layer that mentions the instrument replaces the previous decision, so the last
 * layer carrying an instrument wins.
 */
export const mergeRecords = (
  records: RecommendationRecord[],
  layers: RefinementLayer[],
  bands: ActionBandsConfig
): RecommendationRecord[] => {
  const indexed = layers.map((layer) => new Map(layer.entries.map((e) => [e.instrumentId, e])));
  return records.map((record) =>
    indexed.reduce((acc, entries) => {
      const entry = entries.get(record.instrumentId);
      return entry ? applyRefinement(acc, entry, bands) : acc;
    }, baseOnly(record))
  );
};

export const summarize = (records: RecommendationRecord[]): RecommendationSet['summary'] => ({
  total: records.length,
  buy: records.filter((r) => r.finalAction === 'buy').length,
  sell: records.filter((r) => r.finalAction === 'sell').length,
  hold: records.filter((r) => r.finalAction === 'hold').length,
  overridden: records.filter((r) => r.overrideFlag).length
});

export const buildRecommendationSet = (
  selectionDate: string,
  records: RecommendationRecord[],
  layers: RefinementLayer[],
  bands: ActionBandsConfig,
  clock: () => Date = () => new Date()
): RecommendationSet => {
  const merged = mergeRecords(records, layers, bands);
  return {
    selectionDate,
    generatedAt: clock().toISOString(),
    layers,
    records: merged,
    summary: summarize(merged)
  };
};

/** Inserts `layer`, or replaces a previously applied layer of the same name in place. */
export const upsertLayer = (layers: RefinementLayer[], layer: RefinementLayer): RefinementLayer[] => {
  const index = layers.findIndex((l) => l.name === layer.name);
  if (index === -1) return [...layers, layer];
  return layers.map((l, i) => (i === index ? layer : l));
};
