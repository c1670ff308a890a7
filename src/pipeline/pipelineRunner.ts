import crypto from 'crypto';
import { errorCode, errorMessage } from '../core/errors';
import { InstrumentMeta } from '../core/schema';
import { makeRunId } from '../core/time';
import { DESTRUCTIVE_TAIL, ExecutionMode, LedgerEventType, RunReport, RunStatus, StepName } from '../core/types';
import { noopRecorder } from '../ledger/ledger';
import { selectExecutionMode } from '../schedule/executionMode';
import { evaluateWindowGuard } from '../schedule/windowGuard';
import { PipelineDeps, StepBody, StepOutcome } from './pipeline.types';
import { RunReportBuilder } from './runReport';
import {
  PriceMap,
  archiveWriteStep,
  backupVerifyStep,
  fetchMetadataStep,
  fetchPricesStep,
  publishManifestStep,
  scoreSelectStep
} from './steps';

export interface RunOptions {
  now?: Date;
  forcedMode?: ExecutionMode;
  skipCalendarCheck?: boolean;
  runId?: string;
}

const stepEvents: Partial<Record<StepBody['status'], LedgerEventType>> = {
  OK: 'STEP_COMPLETED',
  DEGRADED: 'STEP_DEGRADED',
  FAILED: 'STEP_FAILED',
  DENIED: 'STEP_FAILED'
};

const runEvents: Record<RunStatus, LedgerEventType> = {
  SUCCESS: 'RUN_COMPLETED',
  PARTIAL: 'RUN_PARTIAL',
  ABORTED: 'RUN_ABORTED'
};

/**
 * One invocation: select the mode, ask the window guard, then walk the steps in order.
 * Read-only steps always run to completion; a denial or failure inside the destructive
 * tail stops the tail and leaves its remaining steps NOT_RUN.
 */
export const runPipeline = async (deps: PipelineDeps, options: RunOptions = {}): Promise<RunReport> => {
  const clock = deps.clock ?? (() => new Date());
  const recorder = deps.recorder ?? noopRecorder;
  const { config } = deps;
  const now = options.now ?? clock();
  const window = selectExecutionMode({
    now,
    timezone: config.timezone,
    sessions: config.sessions,
    forcedMode: options.forcedMode
  });
  const runId = options.runId ?? makeRunId(now, `${window.mode.toLowerCase()}-${crypto.randomBytes(3).toString('hex')}`);
  const builder = new RunReportBuilder(runId, window, clock().toISOString());

  const finish = (): RunReport => {
    const report = builder.build(clock().toISOString());
    recorder(runId, runEvents[report.status], {
      mode: report.mode,
      referenceDate: report.referenceDate,
      steps: report.steps.map((s) => `${s.step}:${s.status}`)
    });
    const log = report.status === 'SUCCESS' ? console.log : report.status === 'PARTIAL' ? console.warn : console.error;
    log(`[pipeline] ${runId} finished ${report.status}`);
    return report;
  };

  const execute = async <T>(step: StepName, body: () => Promise<StepOutcome<T>>, fallback: T): Promise<T> => {
    const startedAt = clock().toISOString();
    let outcome: StepOutcome<T>;
    try {
      outcome = await body();
    } catch (err) {
      outcome = { value: fallback, body: { status: 'FAILED', issues: [{ code: errorCode(err), message: errorMessage(err) }] } };
    }
    const { status, detail, issues = [] } = outcome.body;
    builder.record({ step, status, startedAt, finishedAt: clock().toISOString(), detail, issues });
    const event = stepEvents[status];
    if (event) recorder(runId, event, { step, status, issues: issues.length, ...(detail ? { detail } : {}) });
    console.log(`[pipeline] ${step} ${status}${issues.length ? ` (${issues.length} issue(s))` : ''}`);
    return outcome.value;
  };

  const skip = (step: StepName, reason: string) => {
    builder.record({ step, status: 'SKIPPED', detail: { reason }, issues: [] });
  };

  recorder(runId, 'RUN_STARTED', {
    mode: window.mode,
    referenceDate: window.referenceDate,
    windowStart: window.windowStart,
    windowEnd: window.windowEnd
  });
  console.log(`[pipeline] ${runId} mode=${window.mode} referenceDate=${window.referenceDate}`);

  const decision = await evaluateWindowGuard(window, deps.calendar, {
    blackoutDates: config.calendar.blackoutDates,
    skipCalendarCheck: options.skipCalendarCheck
  });
  const decidedAt = clock().toISOString();
  builder.record({
    step: 'verify-window',
    status: decision.allowed ? 'OK' : 'DENIED',
    startedAt: decidedAt,
    finishedAt: decidedAt,
    detail: { checkedDate: decision.checkedDate, reason: decision.reason },
    issues: decision.allowed ? [] : [{ code: decision.reason, message: decision.message }]
  });
  if (!decision.allowed) {
    console.warn(`[window] denied ${window.mode} ${window.referenceDate}: ${decision.message}`);
    recorder(runId, 'RUN_DENIED', { reason: decision.reason, checkedDate: decision.checkedDate, message: decision.message });
    return finish();
  }

  const instruments = await execute<InstrumentMeta[]>('fetch-metadata', () => fetchMetadataStep(deps), []);
  const prices = await execute<PriceMap>('fetch-prices', () => fetchPricesStep(deps, instruments), {});

  if (window.mode === 'EVENING_SELECT') {
    const clearance = await execute('backup-verify', () => backupVerifyStep(deps), undefined);
    if (clearance) {
      await execute(
        'score-select',
        () => scoreSelectStep(deps, clearance, decision.checkedDate, instruments, prices),
        undefined
      );
      skip('archive-write', 'selection mode archives nothing; the superseded artifact was verified as archived');
    }
  } else {
    skip('backup-verify', 'refresh mode overwrites no selection');
    skip('score-select', 'refresh mode does not select');
    await execute('archive-write', () => archiveWriteStep(deps, prices), null);
  }

  const tailAborted = DESTRUCTIVE_TAIL.some((step) => {
    const status = builder.get(step)?.status;
    return status === 'DENIED' || status === 'FAILED';
  });
  if (tailAborted) {
    console.error('[pipeline] destructive tail aborted; manifest left unchanged');
    return finish();
  }
  await execute('publish-manifest', () => publishManifestStep(deps), null);
  return finish();
};
