import { ArchiveWriter } from '../archive/archiveWriter';
import { BackupClearance, verifyBackup } from '../archive/backupVerifier';
import { SelectionSlot } from '../archive/selectionSlot';
import { BackupMissingError, PermanentProviderError, errorCode, errorMessage } from '../core/errors';
import { RetryPolicy, mapWithConcurrency, withRetry } from '../core/retry';
import {
  InstrumentMeta,
  MetadataDocument,
  SelectionArtifact,
  SelectionPick,
  StoredPrice,
  metadataDocumentSchema,
  priceStoreDocumentSchema
} from '../core/schema';
import { RankedCandidate, StepIssue } from '../core/types';
import { buildManifest, publishManifest } from '../manifest/manifest';
import { buildBaseRecord, buildRecommendationSet } from '../recommendation/mergeEngine';
import { writeRecommendations } from '../recommendation/recommendationStore';
import { readJsonDocument, writeJsonDocument } from '../storage/jsonDocuments';
import { PipelineDeps, StepOutcome } from './pipeline.types';
import { computeAtrPct } from './priceMetrics';

export type PriceMap = Record<string, StoredPrice>;

const issueOf = (err: unknown, code = errorCode(err), instrumentId?: string): StepIssue => ({
  code,
  message: errorMessage(err),
  ...(instrumentId ? { instrumentId } : {})
});

const nowIso = (deps: PipelineDeps) => (deps.clock ?? (() => new Date()))().toISOString();

export const retryPolicyFor = (deps: PipelineDeps): RetryPolicy => ({
  maxRetries: deps.config.fetch.maxRetries,
  baseDelayMs: deps.config.fetch.baseDelayMs,
  timeoutMs: deps.config.fetch.timeoutMs
});

/** Provider first; on failure the last cached document, else an empty universe. */
export const fetchMetadataStep = async (deps: PipelineDeps): Promise<StepOutcome<InstrumentMeta[]>> => {
  const { store, layout } = deps;
  let instruments: InstrumentMeta[];
  try {
    instruments = await withRetry((signal) => deps.metadata.fetchInstruments(signal), retryPolicyFor(deps), 'metadata');
  } catch (err) {
    console.warn(`[pipeline] metadata provider failed (${errorMessage(err)}); falling back to cached metadata`);
    const issues = [issueOf(err)];
    let cached: MetadataDocument | undefined;
    try {
      cached = await readJsonDocument(store, layout.metadataKey, metadataDocumentSchema);
    } catch (cacheErr) {
      issues.push(issueOf(cacheErr, 'CACHE_READ_FAILED'));
    }
    const fallback = cached?.instruments ?? [];
    return {
      value: fallback,
      body: {
        status: 'DEGRADED',
        detail: { source: cached ? 'cache' : 'empty', cachedAt: cached?.fetchedAt ?? null, instruments: fallback.length },
        issues
      }
    };
  }

  const document: MetadataDocument = { fetchedAt: nowIso(deps), instruments };
  try {
    await writeJsonDocument(store, layout.metadataKey, document);
  } catch (err) {
    return {
      value: instruments,
      body: {
        status: 'DEGRADED',
        detail: { source: 'provider', instruments: instruments.length },
        issues: [issueOf(err, 'CACHE_WRITE_FAILED')]
      }
    };
  }
  return { value: instruments, body: { status: 'OK', detail: { source: 'provider', instruments: instruments.length } } };
};

/**
 * Per-instrument refresh with bounded parallelism. A failed instrument keeps whatever
 * was stored for it before; nothing is written when the prior store cannot be read.
 */
export const fetchPricesStep = async (deps: PipelineDeps, instruments: InstrumentMeta[]): Promise<StepOutcome<PriceMap>> => {
  const { store, layout, config } = deps;
  let prior: PriceMap;
  try {
    prior = (await readJsonDocument(store, layout.pricesKey, priceStoreDocumentSchema))?.instruments ?? {};
  } catch (err) {
    return { value: {}, body: { status: 'FAILED', issues: [issueOf(err, 'PRICE_STORE_UNREADABLE')] } };
  }

  const policy = retryPolicyFor(deps);
  const settled = await mapWithConcurrency(instruments, config.fetch.concurrency, (meta) =>
    withRetry(
      async (signal) => {
        const bars = await deps.marketData.fetchSeries(meta.instrumentId, config.fetch.period, config.fetch.interval, signal);
        if (!bars.length) throw new PermanentProviderError(`empty series for ${meta.instrumentId}`);
        return bars;
      },
      policy,
      `prices ${meta.instrumentId}`
    )
  );

  const updatedAt = nowIso(deps);
  const next: PriceMap = { ...prior };
  const issues: StepIssue[] = [];
  let updated = 0;
  let preserved = 0;
  settled.forEach((outcome, index) => {
    const instrumentId = instruments[index].instrumentId;
    if (outcome.ok) {
      const bars = outcome.value;
      next[instrumentId] = {
        instrumentId,
        bars,
        lastClose: bars[bars.length - 1].close,
        atrPct: computeAtrPct(bars),
        updatedAt
      };
      updated += 1;
      return;
    }
    issues.push(issueOf(outcome.error, errorCode(outcome.error), instrumentId));
    if (prior[instrumentId]) preserved += 1;
  });

  const detail = { requested: instruments.length, updated, failed: issues.length, preserved };
  if (issues.length) {
    console.warn(
      `[pipeline] price fetch failed for ${issues.length}/${instruments.length}: ${issues.map((i) => i.instrumentId).join(', ')}`
    );
  }
  if (instruments.length > 0 && updated === 0) {
    return { value: prior, body: { status: 'FAILED', detail, issues } };
  }
  try {
    await writeJsonDocument(store, layout.pricesKey, { updatedAt, instruments: next });
  } catch (err) {
    return { value: next, body: { status: 'FAILED', detail, issues: [...issues, issueOf(err, 'PRICE_STORE_WRITE_FAILED')] } };
  }
  return { value: next, body: { status: issues.length ? 'DEGRADED' : 'OK', detail, issues } };
};

export const backupVerifyStep = async (deps: PipelineDeps): Promise<StepOutcome<BackupClearance | undefined>> => {
  const slot = new SelectionSlot(deps.store, deps.layout);
  let current: SelectionArtifact | undefined;
  try {
    current = await slot.read();
  } catch (err) {
    return { value: undefined, body: { status: 'DENIED', issues: [issueOf(err, 'BACKUP_MISSING')] } };
  }
  const clearance = await verifyBackup(deps.store, deps.layout, current?.selectionDate ?? null, deps.clock);
  const detail = { supersededDate: clearance.supersededDate, checks: clearance.checks ?? null };
  if (!clearance.granted) {
    const error = new BackupMissingError(clearance.supersededDate, clearance.reason ?? 'denied');
    console.error(`[pipeline] ${error.message}`);
    return { value: undefined, body: { status: 'DENIED', detail, issues: [issueOf(error)] } };
  }
  return { value: clearance, body: { status: 'OK', detail } };
};

export const scoreSelectStep = async (
  deps: PipelineDeps,
  clearance: BackupClearance,
  selectionDate: string,
  instruments: InstrumentMeta[],
  prices: PriceMap
): Promise<StepOutcome<SelectionArtifact | undefined>> => {
  const { config } = deps;
  let candidates: RankedCandidate[];
  try {
    candidates = await withRetry(
      (signal) => deps.ranking.rank({ selectionDate, instruments, prices }, signal),
      retryPolicyFor(deps),
      'ranking'
    );
  } catch (err) {
    return { value: undefined, body: { status: 'FAILED', issues: [issueOf(err)] } };
  }

  const known = new Map(instruments.map((meta) => [meta.instrumentId, meta]));
  const chosen: RankedCandidate[] = [];
  for (const candidate of candidates) {
    if (chosen.length >= config.selection.maxPicks) break;
    if (!known.has(candidate.instrumentId)) continue;
    // First occurrence wins when the ranking repeats an instrument.
    if (chosen.some((c) => c.instrumentId === candidate.instrumentId)) continue;
    chosen.push(candidate);
  }
  if (!chosen.length) {
    // An empty artifact could never be archived, which would block every later supersede.
    return {
      value: undefined,
      body: {
        status: 'FAILED',
        detail: { candidates: candidates.length },
        issues: [{ code: 'NO_CANDIDATES', message: 'ranking produced no usable candidates; selection left unchanged' }]
      }
    };
  }
  const picks: SelectionPick[] = chosen.map((c, index) => ({
    instrumentId: c.instrumentId,
    name: known.get(c.instrumentId)?.name ?? c.instrumentId,
    rank: index + 1,
    score: c.score,
    category: c.category,
    rationale: c.rationale
  }));
  const artifact: SelectionArtifact = { selectionDate, generatedAt: nowIso(deps), picks };

  try {
    await new SelectionSlot(deps.store, deps.layout).supersede(clearance, artifact);
  } catch (err) {
    return {
      value: undefined,
      body: { status: err instanceof BackupMissingError ? 'DENIED' : 'FAILED', issues: [issueOf(err)] }
    };
  }

  const records = chosen.map((c) =>
    buildBaseRecord(
      { instrumentId: c.instrumentId, score: c.score, confidence: c.confidence, atrPct: prices[c.instrumentId]?.atrPct ?? null },
      config.actionBands
    )
  );
  const set = buildRecommendationSet(selectionDate, records, [], config.actionBands, deps.clock);
  const detail = { selectionDate, candidates: candidates.length, picks: picks.length, summary: set.summary };
  try {
    await writeRecommendations(deps.store, deps.layout, set);
  } catch (err) {
    return { value: artifact, body: { status: 'FAILED', detail, issues: [issueOf(err, 'RECOMMENDATIONS_WRITE_FAILED')] } };
  }
  return { value: artifact, body: { status: 'OK', detail } };
};

/**
 * Archives the current selection with the refreshed metrics. Rows go first and the
 * snapshot last, so a snapshot implies the rows before it were written.
 */
export const archiveWriteStep = async (deps: PipelineDeps, prices: PriceMap): Promise<StepOutcome<null>> => {
  const current = await new SelectionSlot(deps.store, deps.layout).read();
  if (!current) {
    return { value: null, body: { status: 'SKIPPED', detail: { reason: 'no current selection to archive' } } };
  }
  const writer = new ArchiveWriter(deps.store, deps.layout, deps.clock);
  const rows = current.picks.map((pick) => {
    const price = prices[pick.instrumentId];
    return {
      selectionDate: current.selectionDate,
      instrumentId: pick.instrumentId,
      metrics: {
        name: pick.name,
        rank: pick.rank,
        score: pick.score,
        category: pick.category,
        lastClose: price?.lastClose ?? null,
        atrPct: price?.atrPct ?? null,
        pricedAt: price?.updatedAt ?? null
      }
    };
  });
  const result = await writer.appendBatch(rows);
  const snapshot = await writer.writeSnapshot(current);
  return {
    value: null,
    body: {
      status: 'OK',
      detail: {
        selectionDate: current.selectionDate,
        written: result.written.length,
        skipped: result.skipped.length,
        snapshot
      }
    }
  };
};

export const publishManifestStep = async (deps: PipelineDeps): Promise<StepOutcome<null>> => {
  const manifest = await buildManifest(deps.store, deps.layout, deps.layout.maintainedKeys, deps.clock);
  await publishManifest(deps.store, deps.layout, manifest);
  return { value: null, body: { status: 'OK', detail: { items: manifest.items.length } } };
};
