import { HttpRankingProvider } from './httpRanking';
import { MomentumRankingProvider } from './momentumRanking';
import { RankingProvider } from './ranking.types';

export const getRankingProvider = (env: NodeJS.ProcessEnv = process.env): RankingProvider => {
  const provider = (env.RANKING_PROVIDER || 'stub').toLowerCase();
  if (provider === 'http') {
    if (!env.RANKING_API_URL || !env.RANKING_API_KEY) {
      throw new Error('RANKING_PROVIDER=http requires RANKING_API_URL and RANKING_API_KEY.');
    }
    return new HttpRankingProvider(env.RANKING_API_URL, env.RANKING_API_KEY);
  }
  return new MomentumRankingProvider();
};

export { HttpRankingProvider, MomentumRankingProvider };
export type { RankingProvider };
