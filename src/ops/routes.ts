import express from 'express';
import { LedgerEvent, RunReport } from '../core/types';
import { getEventsForRun, getRecentRuns } from '../ledger/ledger';
import { readRunArtifact } from '../ledger/storage';

const runIdPattern = /^[\w.-]+$/;

export const healthPayload = (startedAt: string) => ({
  status: 'ok',
  startedAt,
  recentRuns: getRecentRuns(1)
});

export const runsPayload = (limit: number) => ({ runs: getRecentRuns(limit) });

const isRunReport = (value: unknown): value is RunReport =>
  typeof value === 'object' && value !== null && 'runId' in value && 'steps' in value && 'status' in value;

export interface RunDetail {
  report: RunReport | null;
  events: LedgerEvent[];
}

export const runDetailPayload = (runId: string): RunDetail | undefined => {
  const events = getEventsForRun(runId);
  const report = readRunArtifact(runId, 'report.json');
  if (!events.length && report === undefined) return undefined;
  return { report: isRunReport(report) ? report : null, events };
};

export const parseLimit = (raw: unknown): number => {
  const n = typeof raw === 'string' ? Number(raw) : NaN;
  return Number.isInteger(n) && n > 0 ? Math.min(n, 200) : 20;
};

/** Read-only views over the run ledger and report artifacts. */
export const registerRoutes = (app: express.Express, startedAt: string) => {
  app.get('/health', (_req, res) => {
    res.json(healthPayload(startedAt));
  });

  app.get('/runs', (req, res) => {
    res.json(runsPayload(parseLimit(req.query.limit)));
  });

  app.get('/runs/:runId', (req, res) => {
    const { runId } = req.params;
    if (!runIdPattern.test(runId)) {
      res.status(400).json({ error: 'invalid run id' });
      return;
    }
    const payload = runDetailPayload(runId);
    if (!payload) {
      res.status(404).json({ error: `run ${runId} not found` });
      return;
    }
    res.json(payload);
  });
};
