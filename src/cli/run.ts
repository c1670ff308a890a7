import 'dotenv/config';
import { Command } from 'commander';
import { z } from 'zod';
import { parseNow } from '../core/time';
import { ExecutionMode, RunReport, RunStatus } from '../core/types';
import { writeRunArtifact } from '../ledger/storage';
import { runPipeline } from '../pipeline/pipelineRunner';
import { buildPipelineDeps, loadPipelineConfig } from './context';

const program = new Command();

program
  .option('--now <timestamp>', 'evaluate the schedule at this instant instead of the wall clock (ISO-8601)')
  .option('--force-mode <mode>', 'AFTERNOON_REFRESH | EVENING_SELECT | IDLE')
  .option('--skip-calendar-check', 'bypass the trading calendar (operator override)', false)
  .option('--strict', 'exit non-zero on PARTIAL runs as well', false)
  .option('--config <path>', 'pipeline config file');

export interface RunCliOptions {
  now?: string;
  forceMode?: string;
  skipCalendarCheck?: boolean;
  strict?: boolean;
  config?: string;
}

const executionModeSchema = z.enum(['AFTERNOON_REFRESH', 'EVENING_SELECT', 'IDLE']);

export const parseForcedMode = (value?: string): ExecutionMode | undefined => {
  if (!value) return undefined;
  const parsed = executionModeSchema.safeParse(value.toUpperCase().replace(/-/g, '_'));
  if (!parsed.success) {
    throw new Error(`Unknown mode ${value}; expected AFTERNOON_REFRESH, EVENING_SELECT or IDLE.`);
  }
  return parsed.data;
};

export const exitCodeFor = (status: RunStatus, strict = false): number => {
  if (status === 'ABORTED') return 1;
  if (status === 'PARTIAL' && strict) return 1;
  return 0;
};

export const formatReport = (report: RunReport): string => {
  const lines = [`Run ${report.runId} ${report.mode} ${report.referenceDate}: ${report.status}`];
  for (const step of report.steps) {
    lines.push(`  ${step.step.padEnd(17)} ${step.status}`);
    step.issues.forEach((issue) =>
      lines.push(`    - [${issue.code}]${issue.instrumentId ? ` ${issue.instrumentId}:` : ''} ${issue.message}`)
    );
  }
  return lines.join('\n');
};

export const runCommand = async (opts: RunCliOptions): Promise<RunReport> => {
  const config = loadPipelineConfig(opts.config);
  const deps = buildPipelineDeps(config);
  const report = await runPipeline(deps, {
    now: opts.now ? parseNow(opts.now) : undefined,
    forcedMode: parseForcedMode(opts.forceMode),
    skipCalendarCheck: Boolean(opts.skipCalendarCheck)
  });
  writeRunArtifact(report.runId, 'report.json', report);
  console.log(formatReport(report));
  if (report.status === 'PARTIAL') {
    console.warn(`Run ${report.runId} completed with degraded steps.`);
  }
  process.exitCode = exitCodeFor(report.status, opts.strict);
  return report;
};

if (require.main === module) {
  const opts = program.parse(process.argv).opts<RunCliOptions>();
  runCommand(opts).catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
