import { z } from 'zod';
import { PermanentProviderError } from '../core/errors';
import { InstrumentMeta, PriceBar, instrumentMetaSchema, priceBarSchema } from '../core/schema';
import { fetchJson } from '../integrations/httpClient';
import { InstrumentMetadataProvider, MarketDataProvider } from './marketData.types';

const seriesResponseSchema = z.object({ bars: z.array(priceBarSchema) });
const instrumentsResponseSchema = z.object({ instruments: z.array(instrumentMetaSchema) });

export class HttpMarketDataProvider implements MarketDataProvider {
  readonly name = 'http';
  private baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
  }

  async fetchSeries(instrumentId: string, period: string, interval: string, signal?: AbortSignal): Promise<PriceBar[]> {
    const url = new URL(`${this.baseUrl}/series/${encodeURIComponent(instrumentId)}`);
    url.searchParams.set('period', period);
    url.searchParams.set('interval', interval);
    const json = await fetchJson(url.toString(), `Prices ${instrumentId}`, { signal });
    const parsed = seriesResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new PermanentProviderError(`Prices ${instrumentId} response did not match schema`);
    }
    return parsed.data.bars;
  }
}

export class HttpInstrumentMetadataProvider implements InstrumentMetadataProvider {
  readonly name = 'http';
  private url: string;

  constructor(url: string) {
    this.url = url;
  }

  async fetchInstruments(signal?: AbortSignal): Promise<InstrumentMeta[]> {
    const json = await fetchJson(this.url, 'Instrument metadata', { signal });
    const parsed = instrumentsResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new PermanentProviderError('Instrument metadata response did not match schema');
    }
    return parsed.data.instruments;
  }
}
