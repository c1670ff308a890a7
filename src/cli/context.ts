import { getTradingCalendar } from '../calendar';
import { PipelineConfig } from '../core/schema';
import { defaultConfigPath, loadConfig } from '../core/utils';
import { getInstrumentMetadataProvider, getMarketDataProvider } from '../data/marketData';
import { ledgerRecorder } from '../ledger/ledger';
import { PipelineDeps } from '../pipeline/pipeline.types';
import { StoreLayout, getObjectStore } from '../storage';
import { getRankingProvider } from '../strategy/ranking';

export const loadPipelineConfig = (configPath?: string): PipelineConfig => loadConfig(configPath ?? defaultConfigPath());

/** Wires every collaborator from config and environment, the same way for each command. */
export const buildPipelineDeps = (config: PipelineConfig, env: NodeJS.ProcessEnv = process.env): PipelineDeps => ({
  config,
  store: getObjectStore(env),
  layout: new StoreLayout(config.storage),
  calendar: getTradingCalendar(config, env),
  metadata: getInstrumentMetadataProvider(config, env),
  marketData: getMarketDataProvider(env),
  ranking: getRankingProvider(env),
  recorder: ledgerRecorder
});
