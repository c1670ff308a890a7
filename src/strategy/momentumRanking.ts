import { round } from '../core/utils';
import { RankedCandidate } from '../core/types';
import { RankingProvider, RankingRequest } from './ranking.types';

const lookbackBars = 20;
// Score units per percent of lookback return, bounded to +/-100.
const scorePerPct = 5;

/**
 * Offline ranking: trailing return over the last `lookbackBars` closes, scaled into the
 * score range the action bands expect. Instruments without enough history are left out.
 */
export class MomentumRankingProvider implements RankingProvider {
  readonly name = 'momentum';

  async rank(request: RankingRequest): Promise<RankedCandidate[]> {
    const candidates: RankedCandidate[] = [];
    for (const meta of request.instruments) {
      const stored = request.prices[meta.instrumentId];
      if (!stored || stored.bars.length < 2) continue;
      const window = stored.bars.slice(-lookbackBars);
      const first = window[0].close;
      const last = window[window.length - 1].close;
      if (first <= 0) continue;
      const momentumPct = ((last - first) / first) * 100;
      const score = round(Math.max(-100, Math.min(100, momentumPct * scorePerPct)));
      candidates.push({
        instrumentId: meta.instrumentId,
        score,
        category: meta.category ?? 'uncategorized',
        rationale: `${window.length}-bar return ${momentumPct.toFixed(2)}%`
      });
    }
    return candidates.sort((a, b) => b.score - a.score || a.instrumentId.localeCompare(b.instrumentId));
  }
}
