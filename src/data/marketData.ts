import path from 'path';
import { PipelineConfig } from '../core/schema';
import { StaticInstrumentMetadataProvider } from './instruments.static';
import { HttpInstrumentMetadataProvider, HttpMarketDataProvider } from './marketData.http';
import { StubMarketDataProvider } from './marketData.stub';
import { InstrumentMetadataProvider, MarketDataProvider } from './marketData.types';

export const getMarketDataProvider = (env: NodeJS.ProcessEnv = process.env): MarketDataProvider => {
  const provider = (env.MARKET_DATA_PROVIDER || 'stub').toLowerCase();
  if (provider === 'http') {
    if (!env.MARKET_DATA_API_URL) {
      throw new Error('MARKET_DATA_PROVIDER=http but MARKET_DATA_API_URL is not set.');
    }
    return new HttpMarketDataProvider(env.MARKET_DATA_API_URL);
  }
  return new StubMarketDataProvider();
};

export const getInstrumentMetadataProvider = (
  config: PipelineConfig,
  env: NodeJS.ProcessEnv = process.env
): InstrumentMetadataProvider => {
  if (env.METADATA_API_URL) {
    return new HttpInstrumentMetadataProvider(env.METADATA_API_URL);
  }
  return new StaticInstrumentMetadataProvider(path.resolve(process.cwd(), config.universeFile));
};

export { HttpInstrumentMetadataProvider, HttpMarketDataProvider, StaticInstrumentMetadataProvider, StubMarketDataProvider };
export type { InstrumentMetadataProvider, MarketDataProvider };
