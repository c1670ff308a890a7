import crypto from 'crypto';
import { LedgerEvent, LedgerEventType } from '../core/types';
import { appendLedgerEvent, readEventsForRun, readLedgerEvents } from './storage';

export const makeEvent = (runId: string, type: LedgerEventType, details?: Record<string, unknown>): LedgerEvent => ({
  id: crypto.randomUUID(),
  runId,
  timestamp: new Date().toISOString(),
  type,
  details
});

export const appendEvent = (event: LedgerEvent) => {
  appendLedgerEvent(event);
};

/** Sink the pipeline, reconciler and merge commands report to. */
export type RunRecorder = (runId: string, type: LedgerEventType, details?: Record<string, unknown>) => void;

export const ledgerRecorder: RunRecorder = (runId, type, details) => appendEvent(makeEvent(runId, type, details));

export const noopRecorder: RunRecorder = () => undefined;

export type LedgerRunState = 'IN_PROGRESS' | 'SUCCESS' | 'PARTIAL' | 'ABORTED' | 'DENIED' | 'RECORDED' | 'UNKNOWN';

const terminalStates: Partial<Record<LedgerEventType, LedgerRunState>> = {
  RUN_COMPLETED: 'SUCCESS',
  RUN_PARTIAL: 'PARTIAL',
  RUN_ABORTED: 'ABORTED',
  RUN_DENIED: 'DENIED',
  RECONCILE_REPORTED: 'RECORDED',
  RECONCILE_APPLIED: 'RECORDED',
  REFINEMENT_MERGED: 'RECORDED'
};

const stateOf = (events: LedgerEvent[]): LedgerRunState => {
  if (!events.length) return 'UNKNOWN';
  const ordered = events.slice().sort((a, b) => new Date(a.timestamp).getTime() - new Date(b.timestamp).getTime());
  for (let i = ordered.length - 1; i >= 0; i--) {
    const state = terminalStates[ordered[i].type];
    // A guard denial is followed by RUN_ABORTED; keep the more specific state.
    if (state === 'ABORTED' && ordered.some((e) => e.type === 'RUN_DENIED')) return 'DENIED';
    if (state) return state;
  }
  return 'IN_PROGRESS';
};

export const getRunStatus = (runId: string): LedgerRunState => stateOf(readEventsForRun(runId));

export const groupEventsByRun = (): Record<string, LedgerEvent[]> => {
  const events = readLedgerEvents();
  return events.reduce<Record<string, LedgerEvent[]>>((acc, evt) => {
    acc[evt.runId] = acc[evt.runId] || [];
    acc[evt.runId].push(evt);
    return acc;
  }, {});
};

export const getRecentRuns = (limit = 10): { runId: string; status: LedgerRunState; lastEventAt: string }[] => {
  return Object.entries(groupEventsByRun())
    .map(([runId, events]) => {
      const lastEventAt = events.reduce((max, e) => (e.timestamp > max ? e.timestamp : max), events[0].timestamp);
      return { runId, status: stateOf(events), lastEventAt };
    })
    .sort((a, b) => (a.lastEventAt < b.lastEventAt ? 1 : -1))
    .slice(0, limit);
};

export const getEvents = () => readLedgerEvents();
export const getEventsForRun = readEventsForRun;
