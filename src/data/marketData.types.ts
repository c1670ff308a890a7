import { InstrumentMeta, PriceBar } from '../core/schema';

export interface MarketDataProvider {
  readonly name: string;
  fetchSeries(instrumentId: string, period: string, interval: string, signal?: AbortSignal): Promise<PriceBar[]>;
}

export interface InstrumentMetadataProvider {
  readonly name: string;
  fetchInstruments(signal?: AbortSignal): Promise<InstrumentMeta[]>;
}
