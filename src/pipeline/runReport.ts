import { DESTRUCTIVE_TAIL, ExecutionWindow, RunReport, RunStatus, STEP_ORDER, StepName, StepResult } from '../core/types';

/**
 * Collapses per-step outcomes into one run status. A denial anywhere, or any failure in
 * the destructive tail, aborts the run; any other degradation or failure makes it
 * PARTIAL. Only a run with every executed step OK is a SUCCESS.
 */
export const deriveRunStatus = (steps: StepResult[]): RunStatus => {
  if (steps.some((s) => s.status === 'DENIED')) return 'ABORTED';
  if (steps.some((s) => s.status === 'FAILED' && DESTRUCTIVE_TAIL.includes(s.step))) return 'ABORTED';
  if (steps.some((s) => s.status === 'FAILED' || s.status === 'DEGRADED')) return 'PARTIAL';
  return 'SUCCESS';
};

export class RunReportBuilder {
  private runId: string;
  private window: ExecutionWindow;
  private startedAt: string;
  private steps = new Map<StepName, StepResult>();

  constructor(runId: string, window: ExecutionWindow, startedAt: string) {
    this.runId = runId;
    this.window = window;
    this.startedAt = startedAt;
    STEP_ORDER.forEach((step) => this.steps.set(step, { step, status: 'NOT_RUN', issues: [] }));
  }

  record(result: StepResult) {
    this.steps.set(result.step, result);
  }

  get(step: StepName): StepResult | undefined {
    return this.steps.get(step);
  }

  build(finishedAt: string): RunReport {
    const steps = STEP_ORDER.map((step) => this.steps.get(step) ?? { step, status: 'NOT_RUN' as const, issues: [] });
    return {
      runId: this.runId,
      mode: this.window.mode,
      referenceDate: this.window.referenceDate,
      status: deriveRunStatus(steps),
      startedAt: this.startedAt,
      finishedAt,
      steps
    };
  }
}
