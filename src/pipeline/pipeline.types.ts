import { PipelineConfig } from '../core/schema';
import { StepIssue, StepStatus } from '../core/types';
import { TradingCalendar } from '../calendar/tradingCalendar.types';
import { InstrumentMetadataProvider, MarketDataProvider } from '../data/marketData.types';
import { RunRecorder } from '../ledger/ledger';
import { StoreLayout } from '../storage/layout';
import { ObjectStore } from '../storage/objectStore.types';
import { RankingProvider } from '../strategy/ranking.types';

export interface PipelineDeps {
  config: PipelineConfig;
  store: ObjectStore;
  layout: StoreLayout;
  calendar: TradingCalendar;
  metadata: InstrumentMetadataProvider;
  marketData: MarketDataProvider;
  ranking: RankingProvider;
  clock?: () => Date;
  recorder?: RunRecorder;
}

export interface StepBody {
  status: StepStatus;
  detail?: Record<string, unknown>;
  issues?: StepIssue[];
}

export interface StepOutcome<T> {
  body: StepBody;
  value: T;
}
