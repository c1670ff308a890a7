import { ActionBandsConfig, ConfidenceLevel, RecommendationAction } from '../core/schema';

export const actionSign = (action: RecommendationAction): -1 | 0 | 1 => {
  if (action === 'buy') return 1;
  if (action === 'sell') return -1;
  return 0;
};

// A reversal flips direction outright; moving into or out of hold is not one.
export const isReversal = (from: RecommendationAction, to: RecommendationAction): boolean =>
  actionSign(from) * actionSign(to) === -1;

/**
 * Maps a continuous score onto the configured bands. Bands are open intervals; a score
 * sitting exactly on any band edge, or outside every band, takes the neutral action.
 */
export const resolveAction = (score: number, config: ActionBandsConfig): RecommendationAction => {
  const onEdge = config.bands.some((band) => band.min === score || band.max === score);
  if (onEdge) return config.neutralAction;
  const band = config.bands.find(
    (b) => (b.min === undefined || score > b.min) && (b.max === undefined || score < b.max)
  );
  return band ? band.action : config.neutralAction;
};

export const confidenceForScore = (score: number, config: ActionBandsConfig): ConfidenceLevel => {
  const magnitude = Math.abs(score);
  if (magnitude >= config.confidenceThresholds.high) return 'high';
  if (magnitude >= config.confidenceThresholds.medium) return 'medium';
  return 'low';
};

export const isHighConfidence = (level: ConfidenceLevel, config: ActionBandsConfig): boolean =>
  config.highConfidenceLevels.includes(level);
