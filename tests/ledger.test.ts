import fs from 'fs';
import os from 'os';
import path from 'path';

const tmpLedger = path.join(os.tmpdir(), 'picks-ledger-test-events.jsonl');
const tmpRuns = path.join(os.tmpdir(), 'picks-ledger-test-runs');

const loadLedger = () => {
  jest.resetModules();
  process.env.LEDGER_FILE = tmpLedger;
  process.env.RUNS_DIR = tmpRuns;
  // eslint-disable-next-line @typescript-eslint/no-var-requires
  return require('../src/ledger/ledger') as typeof import('../src/ledger/ledger');
};

const loadStorage = () => {
  jest.resetModules();
  process.env.LEDGER_FILE = tmpLedger;
  process.env.RUNS_DIR = tmpRuns;
  // eslint-disable-next-line @typescript-eslint/no-var-requires
  return require('../src/ledger/storage') as typeof import('../src/ledger/storage');
};

describe('Run ledger', () => {
  beforeEach(() => {
    if (fs.existsSync(tmpLedger)) fs.unlinkSync(tmpLedger);
    fs.rmSync(tmpRuns, { recursive: true, force: true });
  });

  it('tracks a run from start to its terminal event', () => {
    const { appendEvent, makeEvent, getRunStatus } = loadLedger();
    const runId = '2026-10-15T14-00-evening_select-abc123';
    appendEvent(makeEvent(runId, 'RUN_STARTED'));
    expect(getRunStatus(runId)).toBe('IN_PROGRESS');
    appendEvent(makeEvent(runId, 'STEP_COMPLETED', { step: 'fetch-metadata' }));
    expect(getRunStatus(runId)).toBe('IN_PROGRESS');
    appendEvent(makeEvent(runId, 'RUN_PARTIAL'));
    expect(getRunStatus(runId)).toBe('PARTIAL');
  });

  it('reports a guard denial as denied rather than aborted', () => {
    const { ledgerRecorder, getRunStatus } = loadLedger();
    ledgerRecorder('denied-run', 'RUN_STARTED');
    ledgerRecorder('denied-run', 'RUN_DENIED', { reason: 'NOT_TRADING_DAY' });
    ledgerRecorder('denied-run', 'RUN_ABORTED');
    expect(getRunStatus('denied-run')).toBe('DENIED');
  });

  it('returns UNKNOWN for a run it never saw', () => {
    const { getRunStatus } = loadLedger();
    expect(getRunStatus('missing')).toBe('UNKNOWN');
  });

  it('skips unreadable lines', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { ledgerRecorder, getEvents } = loadLedger();
    ledgerRecorder('r1', 'RUN_STARTED');
    fs.appendFileSync(tmpLedger, 'not json\n{"id":"x","runId":"r1","timestamp":"t","type":"SOMETHING_ELSE"}\n');
    ledgerRecorder('r1', 'RUN_COMPLETED');
    expect(getEvents().map((e) => e.type)).toEqual(['RUN_STARTED', 'RUN_COMPLETED']);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('lists recent runs newest first', () => {
    const { appendEvent, getRecentRuns } = loadLedger();
    appendEvent({ id: '1', runId: 'older', timestamp: '2026-10-14T13:05:00.000Z', type: 'RUN_COMPLETED' });
    appendEvent({ id: '2', runId: 'newer', timestamp: '2026-10-15T13:05:00.000Z', type: 'RUN_STARTED' });
    appendEvent({ id: '3', runId: 'sweep', timestamp: '2026-10-15T01:00:00.000Z', type: 'RECONCILE_REPORTED' });
    expect(getRecentRuns(2)).toEqual([
      { runId: 'newer', status: 'IN_PROGRESS', lastEventAt: '2026-10-15T13:05:00.000Z' },
      { runId: 'sweep', status: 'RECORDED', lastEventAt: '2026-10-15T01:00:00.000Z' }
    ]);
  });

  it('stores run artifacts under the run directory', () => {
    const { writeRunArtifact, readRunArtifact } = loadStorage();
    writeRunArtifact('run-1', 'report.json', { status: 'SUCCESS' });
    expect(readRunArtifact('run-1', 'report.json')).toEqual({ status: 'SUCCESS' });
    expect(readRunArtifact('run-1', 'absent.json')).toBeUndefined();
    expect(() => writeRunArtifact('../escape', 'report.json', {})).toThrow('Invalid run id: ../escape');
  });
});
