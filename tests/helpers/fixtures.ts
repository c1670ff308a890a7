import { TransientProviderError } from '../../src/core/errors';
import { InstrumentMeta, PipelineConfig, PriceBar, SelectionArtifact } from '../../src/core/schema';
import { LedgerEventType } from '../../src/core/types';
import { InstrumentMetadataProvider, MarketDataProvider } from '../../src/data/marketData.types';
import { StoreLayout } from '../../src/storage/layout';

export const testConfig = (): PipelineConfig => ({
  timezone: 'Asia/Tokyo',
  sessions: {
    refresh: { start: '16:00', end: '22:00' },
    select: { start: '22:00', end: '26:00' }
  },
  calendar: { blackoutDates: [], holidaysFile: 'unused.json' },
  storage: { rootPrefix: 'data/', archivePrefix: 'data/archive/', manifestKey: 'data/manifest.json' },
  fetch: { concurrency: 4, timeoutMs: 1000, maxRetries: 1, baseDelayMs: 0, period: '1mo', interval: '1d' },
  selection: { maxPicks: 3 },
  actionBands: {
    neutralAction: 'hold',
    bands: [
      { action: 'sell', max: -20 },
      { action: 'hold', min: -20, max: 20 },
      { action: 'buy', min: 20 }
    ],
    highConfidenceLevels: ['high'],
    confidenceThresholds: { high: 60, medium: 30 }
  },
  universeFile: 'unused.json'
});

export const testLayout = () => new StoreLayout(testConfig().storage);

export const instrumentIds = (n: number): string[] => Array.from({ length: n }, (_, i) => `I${String(i + 1).padStart(3, '0')}`);

export const instrumentsFor = (ids: string[]): InstrumentMeta[] =>
  ids.map((instrumentId) => ({ instrumentId, name: `Instrument ${instrumentId}`, category: 'test' }));

export const selectionFor = (selectionDate: string, ids: string[]): SelectionArtifact => ({
  selectionDate,
  generatedAt: `${selectionDate}T13:05:00.000Z`,
  picks: ids.map((instrumentId, index) => ({
    instrumentId,
    name: `Instrument ${instrumentId}`,
    rank: index + 1,
    score: 50 - index,
    category: 'test',
    rationale: 'fixture'
  }))
});

/** Steps a fixed start time forward by one second per call. */
export const tickingClock = (startIso: string) => {
  let t = new Date(startIso).getTime();
  return () => {
    const now = new Date(t);
    t += 1000;
    return now;
  };
};

export class FakeMetadataProvider implements InstrumentMetadataProvider {
  readonly name = 'fake';
  calls = 0;
  private instruments: InstrumentMeta[];
  private error?: Error;

  constructor(instruments: InstrumentMeta[], error?: Error) {
    this.instruments = instruments;
    this.error = error;
  }

  async fetchInstruments(): Promise<InstrumentMeta[]> {
    this.calls += 1;
    if (this.error) throw this.error;
    return this.instruments;
  }
}

/**
 * Two bars per instrument; the last close is 100 plus the instrument's position in
 * `order`, so every instrument gets a distinct momentum. Ids in `failing` always fail.
 */
export class ScriptedMarketData implements MarketDataProvider {
  readonly name = 'scripted';
  calls: string[] = [];
  private order: string[];
  private failing: Set<string>;

  constructor(order: string[], failing: string[] = []) {
    this.order = order;
    this.failing = new Set(failing);
  }

  static closeFor(order: string[], instrumentId: string): number {
    return 100 + order.indexOf(instrumentId) + 1;
  }

  async fetchSeries(instrumentId: string): Promise<PriceBar[]> {
    this.calls.push(instrumentId);
    if (this.failing.has(instrumentId)) {
      throw new TransientProviderError(`upstream 503 for ${instrumentId}`);
    }
    const close = ScriptedMarketData.closeFor(this.order, instrumentId);
    return [
      { date: '2026-10-14', open: 100, high: 101, low: 99, close: 100, volume: 1000 },
      { date: '2026-10-15', open: 100, high: close + 1, low: 99, close, volume: 1200 }
    ];
  }
}

export const collectingRecorder = () => {
  const events: Array<{ runId: string; type: LedgerEventType; details?: Record<string, unknown> }> = [];
  const recorder = (runId: string, type: LedgerEventType, details?: Record<string, unknown>) => {
    events.push({ runId, type, details });
  };
  return { events, recorder };
};
