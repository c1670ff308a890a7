import { RecommendationAction } from '../core/schema';
import { round } from '../core/utils';

export const DEFAULT_ATR_PCT = 3.0;
const HOLD_STOP_PCT = -2.0;

const clamp = (value: number, lo: number, hi: number) => Math.min(hi, Math.max(lo, value));

/** Stop distance in percent: half the ATR, bounded to 1.5..3 in the trade's adverse direction. */
export const stopLossPct = (action: RecommendationAction, atrPct: number | null | undefined): number => {
  const atr = atrPct ?? DEFAULT_ATR_PCT;
  if (action === 'buy') return round(clamp(-atr * 0.5, -3, -1.5));
  if (action === 'sell') return round(clamp(atr * 0.5, 1.5, 3));
  return HOLD_STOP_PCT;
};
