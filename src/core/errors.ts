export type PipelineErrorCode =
  | 'TRANSIENT_PROVIDER'
  | 'PERMANENT_PROVIDER'
  | 'CALENDAR_UNAVAILABLE'
  | 'BACKUP_MISSING'
  | 'MANIFEST_DRIFT'
  | 'STEP_TIMEOUT';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(code: PipelineErrorCode, message: string, retryable: boolean, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.retryable = retryable;
    this.details = details;
  }
}

// Retried in place by withRetry; never escapes the owning step.
export class TransientProviderError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('TRANSIENT_PROVIDER', message, true, details);
    this.name = 'TransientProviderError';
  }
}

export class StepTimeoutError extends TransientProviderError {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, { timeoutMs });
    this.name = 'StepTimeoutError';
  }
}

export class PermanentProviderError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PERMANENT_PROVIDER', message, false, details);
    this.name = 'PermanentProviderError';
  }
}

export class CalendarUnavailableError extends PipelineError {
  constructor(date: string, reason: string) {
    super('CALENDAR_UNAVAILABLE', `Trading calendar unavailable for ${date}: ${reason}`, false, { date });
    this.name = 'CalendarUnavailableError';
  }
}

export class BackupMissingError extends PipelineError {
  constructor(date: string | null, reason: string) {
    super('BACKUP_MISSING', `Backup verification failed for ${date ?? 'unknown date'}: ${reason}`, false, { date });
    this.name = 'BackupMissingError';
  }
}

export class ManifestDriftError extends PipelineError {
  readonly orphaned: string[];
  readonly missing: string[];
  readonly mismatched: string[];

  constructor(orphaned: string[], missing: string[], mismatched: string[]) {
    super(
      'MANIFEST_DRIFT',
      `Store drifted from manifest: ${orphaned.length} orphaned, ${missing.length} missing, ${mismatched.length} mismatched`,
      false,
      { orphaned: orphaned.length, missing: missing.length, mismatched: mismatched.length }
    );
    this.name = 'ManifestDriftError';
    this.orphaned = orphaned;
    this.missing = missing;
    this.mismatched = mismatched;
  }
}

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

export const errorCode = (err: unknown): string => (err instanceof PipelineError ? err.code : 'UNEXPECTED');

export const isRetryable = (err: unknown): boolean => err instanceof PipelineError && err.retryable;
