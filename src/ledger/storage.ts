import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ensureDir, writeJSONFile } from '../core/utils';
import { LedgerEvent } from '../core/types';

const configuredPath = process.env.LEDGER_FILE ? path.resolve(process.env.LEDGER_FILE) : undefined;
const ledgerFile = configuredPath ?? path.join(path.resolve(process.cwd(), 'ledger'), 'events.jsonl');
const ledgerDir = path.dirname(ledgerFile);
const runsDir = process.env.RUNS_DIR ? path.resolve(process.env.RUNS_DIR) : path.resolve(process.cwd(), 'runs');

const ledgerEventSchema = z.object({
  id: z.string(),
  runId: z.string(),
  timestamp: z.string(),
  type: z.enum([
    'RUN_STARTED',
    'RUN_DENIED',
    'STEP_COMPLETED',
    'STEP_DEGRADED',
    'STEP_FAILED',
    'RUN_COMPLETED',
    'RUN_PARTIAL',
    'RUN_ABORTED',
    'RECONCILE_REPORTED',
    'RECONCILE_APPLIED',
    'REFINEMENT_MERGED'
  ]),
  details: z.record(z.unknown()).optional()
});

export const appendLedgerEvent = (event: LedgerEvent) => {
  ensureDir(ledgerDir);
  const line = JSON.stringify(event);
  fs.appendFileSync(ledgerFile, `${line}\n`);
};

const parseLine = (line: string): LedgerEvent | undefined => {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    console.warn(`[ledger] skipping unreadable line in ${ledgerFile}`);
    return undefined;
  }
  const parsed = ledgerEventSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
};

export const readLedgerEvents = (): LedgerEvent[] => {
  if (!fs.existsSync(ledgerFile)) return [];
  const content = fs.readFileSync(ledgerFile, 'utf-8');
  const lines = content.trim().length ? content.trim().split('\n') : [];
  return lines.map(parseLine).filter((v): v is LedgerEvent => Boolean(v));
};

export const readEventsForRun = (runId: string): LedgerEvent[] => {
  return readLedgerEvents().filter((e) => e.runId === runId);
};

const safeRunDir = (runId: string) => {
  if (!/^[\w.-]+$/.test(runId)) {
    throw new Error(`Invalid run id: ${runId}`);
  }
  return path.join(runsDir, runId);
};

export const writeRunArtifact = (runId: string, fileName: string, data: unknown) => {
  const runDir = safeRunDir(runId);
  ensureDir(runDir);
  writeJSONFile(path.join(runDir, fileName), data);
};

export const readRunArtifact = (runId: string, fileName: string): unknown => {
  const filePath = path.join(safeRunDir(runId), fileName);
  if (!fs.existsSync(filePath)) return undefined;
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
};
