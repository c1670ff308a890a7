import { InstrumentMeta, StoredPrice } from '../core/schema';
import { RankedCandidate } from '../core/types';

export interface RankingRequest {
  selectionDate: string;
  instruments: InstrumentMeta[];
  prices: Record<string, StoredPrice>;
}

/** Opaque scorer: the pipeline only consumes the ranked list it returns. */
export interface RankingProvider {
  readonly name: string;
  rank(request: RankingRequest, signal?: AbortSignal): Promise<RankedCandidate[]>;
}
