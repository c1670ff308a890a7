import { z } from 'zod';
import { PermanentProviderError } from '../core/errors';
import { confidenceLevelSchema } from '../core/schema';
import { RankedCandidate } from '../core/types';
import { fetchJson } from '../integrations/httpClient';
import { RankingProvider, RankingRequest } from './ranking.types';

const rankingResponseSchema = z.object({
  candidates: z.array(
    z.object({
      instrumentId: z.string(),
      score: z.number(),
      category: z.string(),
      rationale: z.string(),
      confidence: confidenceLevelSchema.optional()
    })
  )
});

export class HttpRankingProvider implements RankingProvider {
  readonly name = 'http';
  private url: string;
  private apiKey: string;

  constructor(url: string, apiKey: string) {
    this.url = url;
    this.apiKey = apiKey;
  }

  async rank(request: RankingRequest, signal?: AbortSignal): Promise<RankedCandidate[]> {
    const json = await fetchJson(this.url, 'Ranking service', {
      method: 'POST',
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body: {
        selectionDate: request.selectionDate,
        instruments: request.instruments.map((meta) => ({
          ...meta,
          lastClose: request.prices[meta.instrumentId]?.lastClose ?? null,
          atrPct: request.prices[meta.instrumentId]?.atrPct ?? null
        }))
      },
      signal
    });
    const parsed = rankingResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new PermanentProviderError('Ranking service response did not match schema');
    }
    return [...parsed.data.candidates].sort((a, b) => b.score - a.score);
  }
}
