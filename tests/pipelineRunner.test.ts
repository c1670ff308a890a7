import { CalendarUnavailableError, PermanentProviderError } from '../src/core/errors';
import { PipelineConfig, SelectionArtifact, priceStoreDocumentSchema, selectionArtifactSchema } from '../src/core/schema';
import { RankedCandidate, RunReport, StepName } from '../src/core/types';
import { StaticTradingCalendar } from '../src/calendar/tradingCalendar.static';
import { TradingCalendar } from '../src/calendar/tradingCalendar.types';
import { InstrumentMetadataProvider } from '../src/data/marketData.types';
import { PipelineDeps } from '../src/pipeline/pipeline.types';
import { reconcileManifest } from '../src/manifest/reconciler';
import { runPipeline } from '../src/pipeline/pipelineRunner';
import { readRecommendations } from '../src/recommendation/recommendationStore';
import { readJsonDocument, writeJsonDocument } from '../src/storage/jsonDocuments';
import { MemoryObjectStore } from '../src/storage/objectStore.memory';
import { MomentumRankingProvider } from '../src/strategy/momentumRanking';
import { RankingProvider } from '../src/strategy/ranking.types';
import {
  FakeMetadataProvider,
  ScriptedMarketData,
  collectingRecorder,
  instrumentIds,
  instrumentsFor,
  selectionFor,
  testConfig,
  testLayout,
  tickingClock
} from './helpers/fixtures';

// 17:00 and 23:00 Tokyo on Thursday 2026-10-15; 23:00 on Friday 2026-10-16.
const THURSDAY_AFTERNOON = new Date('2026-10-15T08:00:00Z');
const THURSDAY_EVENING = new Date('2026-10-15T14:00:00Z');
const FRIDAY_EVENING = new Date('2026-10-16T14:00:00Z');
const THURSDAY_NOON = new Date('2026-10-15T03:00:00Z');

const layout = testLayout();

interface Harness {
  deps: PipelineDeps;
  store: MemoryObjectStore;
  marketData: ScriptedMarketData;
  events: ReturnType<typeof collectingRecorder>['events'];
}

const harness = (
  options: {
    store?: MemoryObjectStore;
    ids?: string[];
    failing?: string[];
    metadata?: InstrumentMetadataProvider;
    calendar?: TradingCalendar;
    ranking?: RankingProvider;
    config?: PipelineConfig;
  } = {}
): Harness => {
  const ids = options.ids ?? instrumentIds(5);
  const store = options.store ?? new MemoryObjectStore();
  const marketData = new ScriptedMarketData(ids, options.failing);
  const { events, recorder } = collectingRecorder();
  return {
    store,
    marketData,
    events,
    deps: {
      config: options.config ?? testConfig(),
      store,
      layout,
      calendar: options.calendar ?? new StaticTradingCalendar({ from: '2026-01-01', to: '2026-12-31' }),
      metadata: options.metadata ?? new FakeMetadataProvider(instrumentsFor(ids)),
      marketData,
      ranking: options.ranking ?? new MomentumRankingProvider(),
      clock: tickingClock('2026-10-15T20:00:00Z'),
      recorder
    }
  };
};

const statusOf = (report: RunReport, step: StepName) => report.steps.find((s) => s.step === step)?.status;
const stepOf = (report: RunReport, step: StepName) => report.steps.find((s) => s.step === step);
const statuses = (report: RunReport) => Object.fromEntries(report.steps.map((s) => [s.step, s.status]));

const seedSelection = (store: MemoryObjectStore, artifact: SelectionArtifact) =>
  writeJsonDocument(store, layout.selectionKey, artifact);

const seedArchived = async (store: MemoryObjectStore, artifact: SelectionArtifact) => {
  await seedSelection(store, artifact);
  for (const pick of artifact.picks) {
    await writeJsonDocument(
      store,
      layout.archiveRowKey(artifact.selectionDate, pick.instrumentId),
      { selectionDate: artifact.selectionDate, instrumentId: pick.instrumentId, metricsSnapshot: {}, createdAt: '2026-10-15T08:00:00.000Z' },
      'create-only'
    );
  }
  await writeJsonDocument(store, layout.snapshotKey(artifact.selectionDate), artifact, 'create-only');
};

const readSelection = (store: MemoryObjectStore) => readJsonDocument(store, layout.selectionKey, selectionArtifactSchema);

class UnreachableCalendar implements TradingCalendar {
  async query(date: string): Promise<never> {
    throw new CalendarUnavailableError(date, 'calendar service timed out');
  }
}

class FixedRanking implements RankingProvider {
  readonly name = 'fixed';
  private ids: string[];

  constructor(ids: string[]) {
    this.ids = ids;
  }

  async rank(): Promise<RankedCandidate[]> {
    return this.ids.map((instrumentId, index) => ({
      instrumentId,
      score: 30 - index,
      category: 'momentum',
      rationale: `fixed position ${index + 1}`
    }));
  }
}

class EmptyRanking implements RankingProvider {
  readonly name = 'empty';
  async rank(): Promise<RankedCandidate[]> {
    return [];
  }
}

describe('Pipeline runner', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('evening select', () => {
    it('supersedes an archived selection and publishes the manifest', async () => {
      const h = harness();
      await seedArchived(h.store, selectionFor('2026-10-15', ['I001']));

      const report = await runPipeline(h.deps, { now: THURSDAY_EVENING });

      expect(report.mode).toBe('EVENING_SELECT');
      expect(report.referenceDate).toBe('2026-10-15');
      expect(report.status).toBe('SUCCESS');
      expect(statuses(report)).toEqual({
        'verify-window': 'OK',
        'fetch-metadata': 'OK',
        'fetch-prices': 'OK',
        'backup-verify': 'OK',
        'score-select': 'OK',
        'archive-write': 'SKIPPED',
        'publish-manifest': 'OK'
      });
      expect(stepOf(report, 'verify-window')?.detail).toEqual({ checkedDate: '2026-10-16', reason: 'TRADING_DAY' });
      expect(stepOf(report, 'publish-manifest')?.detail).toEqual({ items: 4 });

      const selection = await readSelection(h.store);
      expect(selection?.selectionDate).toBe('2026-10-16');
      expect(selection?.picks.map((p) => [p.instrumentId, p.rank, p.score])).toEqual([
        ['I005', 1, 25],
        ['I004', 2, 20],
        ['I003', 3, 15]
      ]);
      const recommendations = await readRecommendations(h.store, layout);
      expect(recommendations?.summary).toEqual({ total: 3, buy: 1, sell: 0, hold: 2, overridden: 0 });
      expect(h.events.map((e) => e.type)).toEqual([
        'RUN_STARTED',
        'STEP_COMPLETED',
        'STEP_COMPLETED',
        'STEP_COMPLETED',
        'STEP_COMPLETED',
        'STEP_COMPLETED',
        'RUN_COMPLETED'
      ]);
    });

    it('aborts without touching the selection when the current artifact is not archived', async () => {
      const h = harness();
      const original = selectionFor('2026-10-15', ['I001', 'I002']);
      await seedSelection(h.store, original);

      const report = await runPipeline(h.deps, { now: THURSDAY_EVENING });

      expect(report.status).toBe('ABORTED');
      expect(statuses(report)).toMatchObject({
        'fetch-prices': 'OK',
        'backup-verify': 'DENIED',
        'score-select': 'NOT_RUN',
        'archive-write': 'NOT_RUN',
        'publish-manifest': 'NOT_RUN'
      });
      expect(stepOf(report, 'backup-verify')?.issues).toEqual([
        {
          code: 'BACKUP_MISSING',
          message:
            'Backup verification failed for 2026-10-15: missing snapshot data/archive/snapshots/20261015.json and archive rows under data/archive/selections/2026-10-15/'
        }
      ]);
      expect(await readSelection(h.store)).toEqual(original);
      expect(h.store.mutations().map((m) => m.key)).toEqual([
        layout.selectionKey,
        'data/market/metadata.json',
        'data/market/prices.json'
      ]);
      expect(h.events.map((e) => e.type).slice(-2)).toEqual(['STEP_FAILED', 'RUN_ABORTED']);
    });

    it('blocks a second run in the same window until the new selection is archived', async () => {
      const store = new MemoryObjectStore();
      await seedArchived(store, selectionFor('2026-10-15', ['I001']));
      const first = await runPipeline(harness({ store }).deps, { now: THURSDAY_EVENING });
      const afterFirst = await readSelection(store);

      const second = await runPipeline(harness({ store }).deps, { now: THURSDAY_EVENING });

      expect(first.status).toBe('SUCCESS');
      expect(second.status).toBe('ABORTED');
      expect(statusOf(second, 'backup-verify')).toBe('DENIED');
      expect(await readSelection(store)).toEqual(afterFirst);
    });

    it('selects into an empty slot on the first ever run', async () => {
      const h = harness();
      const report = await runPipeline(h.deps, { now: THURSDAY_EVENING });
      expect(report.status).toBe('SUCCESS');
      expect(stepOf(report, 'backup-verify')?.detail).toEqual({ supersededDate: null, checks: null });
      expect((await readSelection(h.store))?.selectionDate).toBe('2026-10-16');
    });

    it('never replaces the selection with an empty pick list', async () => {
      const h = harness({ ranking: new EmptyRanking() });
      const report = await runPipeline(h.deps, { now: THURSDAY_EVENING });
      expect(report.status).toBe('ABORTED');
      expect(statusOf(report, 'score-select')).toBe('FAILED');
      expect(stepOf(report, 'score-select')?.issues.map((i) => i.code)).toEqual(['NO_CANDIDATES']);
      expect(statusOf(report, 'publish-manifest')).toBe('NOT_RUN');
      expect(await readSelection(h.store)).toBeUndefined();
    });

    it('picks each instrument once when the ranking repeats it', async () => {
      const h = harness({ ranking: new FixedRanking(['I003', 'I003', 'I001', 'I003', 'I002', 'I004']) });
      const report = await runPipeline(h.deps, { now: THURSDAY_EVENING });
      expect(report.status).toBe('SUCCESS');
      expect((await readSelection(h.store))?.picks.map((p) => [p.instrumentId, p.rank])).toEqual([
        ['I003', 1],
        ['I001', 2],
        ['I002', 3]
      ]);
      const recommendations = await readRecommendations(h.store, layout);
      expect(recommendations?.records.map((r) => r.instrumentId)).toEqual(['I003', 'I001', 'I002']);
    });

    it('keeps a selection written by an aborted tail when the manifest is reconciled', async () => {
      const store = new MemoryObjectStore();
      await runPipeline(harness({ store }).deps, { now: THURSDAY_AFTERNOON });
      store.failWhen = (op, key) => op === 'put' && key === layout.recommendationsKey;

      const report = await runPipeline(harness({ store }).deps, { now: THURSDAY_EVENING });
      expect(report.status).toBe('ABORTED');
      expect(statusOf(report, 'score-select')).toBe('FAILED');
      expect(statusOf(report, 'publish-manifest')).toBe('NOT_RUN');

      store.failWhen = undefined;
      const reconciled = await reconcileManifest(store, layout, { apply: true });
      expect(reconciled.deleted).toEqual([]);
      expect(reconciled.retained).toEqual([layout.selectionKey]);
      expect((await readSelection(store))?.selectionDate).toBe('2026-10-16');
    });

    it('runs a non-trading next day when the calendar check is skipped', async () => {
      const h = harness();
      const report = await runPipeline(h.deps, { now: FRIDAY_EVENING, skipCalendarCheck: true });
      expect(stepOf(report, 'verify-window')?.detail).toEqual({ checkedDate: '2026-10-17', reason: 'CHECK_SKIPPED' });
      expect(report.status).toBe('SUCCESS');
      expect((await readSelection(h.store))?.selectionDate).toBe('2026-10-17');
    });
  });

  describe('afternoon refresh', () => {
    it('archives the current selection with fresh metrics and is idempotent on rerun', async () => {
      const store = new MemoryObjectStore();
      await seedSelection(store, selectionFor('2026-10-15', ['I001', 'I002', 'I003']));

      const first = await runPipeline(harness({ store }).deps, { now: THURSDAY_AFTERNOON });
      expect(first.mode).toBe('AFTERNOON_REFRESH');
      expect(first.status).toBe('SUCCESS');
      expect(statuses(first)).toEqual({
        'verify-window': 'OK',
        'fetch-metadata': 'OK',
        'fetch-prices': 'OK',
        'backup-verify': 'SKIPPED',
        'score-select': 'SKIPPED',
        'archive-write': 'OK',
        'publish-manifest': 'OK'
      });
      expect(stepOf(first, 'archive-write')?.detail).toEqual({
        selectionDate: '2026-10-15',
        written: 3,
        skipped: 0,
        snapshot: 'written'
      });
      const row = await store.get(layout.archiveRowKey('2026-10-15', 'I002'));
      expect(JSON.parse(String(row)).metricsSnapshot).toMatchObject({ rank: 2, lastClose: 102 });

      const second = await runPipeline(harness({ store }).deps, { now: THURSDAY_AFTERNOON });
      expect(second.status).toBe('SUCCESS');
      expect(stepOf(second, 'archive-write')?.detail).toEqual({
        selectionDate: '2026-10-15',
        written: 0,
        skipped: 3,
        snapshot: 'exists'
      });
      expect(store.mutations().filter((m) => m.key === layout.selectionKey)).toHaveLength(1);
    });

    it('skips archiving when there is no selection yet', async () => {
      const h = harness();
      const report = await runPipeline(h.deps, { now: THURSDAY_AFTERNOON });
      expect(report.status).toBe('SUCCESS');
      expect(statusOf(report, 'archive-write')).toBe('SKIPPED');
      expect(stepOf(report, 'publish-manifest')?.detail).toEqual({ items: 2 });
    });

    it('keeps prior prices for instruments that fail and reports a partial run', async () => {
      const ids = instrumentIds(50);
      const store = new MemoryObjectStore();
      await runPipeline(harness({ store, ids }).deps, { now: THURSDAY_AFTERNOON });
      const before = await readJsonDocument(store, layout.pricesKey, priceStoreDocumentSchema);

      const failing = ['I007', 'I019', 'I033'];
      const h = harness({ store, ids, failing });
      const report = await runPipeline(h.deps, { now: THURSDAY_AFTERNOON });

      expect(report.status).toBe('PARTIAL');
      const prices = stepOf(report, 'fetch-prices');
      expect(prices?.status).toBe('DEGRADED');
      expect(prices?.detail).toEqual({ requested: 50, updated: 47, failed: 3, preserved: 3 });
      expect(prices?.issues.map((i) => [i.instrumentId, i.code])).toEqual([
        ['I007', 'TRANSIENT_PROVIDER'],
        ['I019', 'TRANSIENT_PROVIDER'],
        ['I033', 'TRANSIENT_PROVIDER']
      ]);
      expect(h.marketData.calls.filter((id) => id === 'I019')).toHaveLength(2);
      expect(statusOf(report, 'publish-manifest')).toBe('OK');

      const after = await readJsonDocument(store, layout.pricesKey, priceStoreDocumentSchema);
      expect(after?.instruments.I019).toEqual(before?.instruments.I019);
      expect(h.events.map((e) => e.type)).toContain('STEP_DEGRADED');
      expect(h.events[h.events.length - 1].type).toBe('RUN_PARTIAL');
    });

    it('falls back to cached metadata when the provider fails', async () => {
      const store = new MemoryObjectStore();
      const cached = { fetchedAt: '2026-10-14T08:00:00.000Z', instruments: instrumentsFor(instrumentIds(5)) };
      await writeJsonDocument(store, layout.metadataKey, cached);
      const metadata = new FakeMetadataProvider([], new PermanentProviderError('metadata service rejected the key'));

      const report = await runPipeline(harness({ store, metadata }).deps, { now: THURSDAY_AFTERNOON });

      expect(report.status).toBe('PARTIAL');
      expect(stepOf(report, 'fetch-metadata')).toMatchObject({
        status: 'DEGRADED',
        detail: { source: 'cache', cachedAt: '2026-10-14T08:00:00.000Z', instruments: 5 }
      });
      expect(stepOf(report, 'fetch-prices')?.detail).toEqual({ requested: 5, updated: 5, failed: 0, preserved: 0 });
      expect(metadata.calls).toBe(1);
    });

    it('continues with an empty universe when there is no cache either', async () => {
      const metadata = new FakeMetadataProvider([], new PermanentProviderError('metadata service rejected the key'));
      const h = harness({ metadata });
      const report = await runPipeline(h.deps, { now: THURSDAY_AFTERNOON });
      expect(stepOf(report, 'fetch-metadata')?.detail).toEqual({ source: 'empty', cachedAt: null, instruments: 0 });
      expect(statusOf(report, 'fetch-prices')).toBe('OK');
      expect(h.marketData.calls).toEqual([]);
      expect(report.status).toBe('PARTIAL');
    });
  });

  describe('window guard', () => {
    const expectUntouched = (report: RunReport, store: MemoryObjectStore) => {
      expect(store.operations).toEqual([]);
      expect(report.status).toBe('ABORTED');
      expect(report.steps.filter((s) => s.step !== 'verify-window').every((s) => s.status === 'NOT_RUN')).toBe(true);
    };

    it('denies an evening run before a non-trading day without touching the store', async () => {
      const h = harness();
      const report = await runPipeline(h.deps, { now: FRIDAY_EVENING });
      expectUntouched(report, h.store);
      expect(stepOf(report, 'verify-window')).toMatchObject({
        status: 'DENIED',
        detail: { checkedDate: '2026-10-17', reason: 'NOT_TRADING_DAY' }
      });
      expect(h.events.map((e) => e.type)).toEqual(['RUN_STARTED', 'RUN_DENIED', 'RUN_ABORTED']);
    });

    it('does nothing outside every session', async () => {
      const h = harness();
      const report = await runPipeline(h.deps, { now: THURSDAY_NOON });
      expect(report.mode).toBe('IDLE');
      expectUntouched(report, h.store);
      expect(stepOf(report, 'verify-window')?.issues.map((i) => i.code)).toEqual(['IDLE']);
    });

    it('fails closed when the calendar cannot answer', async () => {
      const h = harness({ calendar: new UnreachableCalendar() });
      const report = await runPipeline(h.deps, { now: THURSDAY_EVENING });
      expectUntouched(report, h.store);
      expect(stepOf(report, 'verify-window')?.issues).toEqual([
        { code: 'CALENDAR_UNAVAILABLE', message: 'Trading calendar unavailable for 2026-10-16: calendar service timed out' }
      ]);
    });

    it('honours configured blackout dates for selection', async () => {
      const config = testConfig();
      config.calendar.blackoutDates = ['2026-10-16'];
      const h = harness({ config });
      const report = await runPipeline(h.deps, { now: THURSDAY_EVENING });
      expectUntouched(report, h.store);
      expect(stepOf(report, 'verify-window')?.detail).toEqual({ checkedDate: '2026-10-16', reason: 'BLACKOUT_DATE' });
    });

    it('uses the supplied run id', async () => {
      const h = harness();
      const report = await runPipeline(h.deps, { now: THURSDAY_NOON, runId: 'manual-1' });
      expect(report.runId).toBe('manual-1');
      expect(new Set(h.events.map((e) => e.runId))).toEqual(new Set(['manual-1']));
    });
  });
});
