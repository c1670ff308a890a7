import { StepTimeoutError, errorMessage, isRetryable } from './errors';
import { sleep } from './utils';

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  timeoutMs: number;
}

export const withTimeout = async <T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> => {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject before aborting: abort listeners run synchronously and could settle the race first.
      reject(new StepTimeoutError(label, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });
  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
};

/**
 * Runs `fn` under a per-attempt timeout, retrying only retryable (transient) failures
 * with exponential backoff. Permanent failures are rethrown on first sight.
 */
export const withRetry = async <T>(
  fn: (signal: AbortSignal, attempt: number) => Promise<T>,
  policy: RetryPolicy,
  label: string
): Promise<T> => {
  let attempt = 0;
  for (;;) {
    try {
      return await withTimeout((signal) => fn(signal, attempt), policy.timeoutMs, label);
    } catch (err) {
      if (!isRetryable(err) || attempt >= policy.maxRetries) {
        throw err;
      }
      const delay = policy.baseDelayMs * 2 ** attempt;
      console.warn(`[retry] ${label} attempt ${attempt + 1} failed (${errorMessage(err)}); retrying in ${delay}ms`);
      await sleep(delay);
      attempt += 1;
    }
  }
};

export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Maps `items` through `worker` with at most `limit` calls in flight.
 * Results keep input order; a failing unit is reported, never rethrown.
 */
export const mapWithConcurrency = async <T, R>(
  items: T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<Settled<R>[]> => {
  const results: Settled<R>[] = new Array(items.length);
  let next = 0;
  const lanes = Math.max(1, Math.min(limit, items.length));
  const runLane = async () => {
    while (next < items.length) {
      const index = next;
      next += 1;
      try {
        results[index] = { ok: true, value: await worker(items[index], index) };
      } catch (error) {
        results[index] = { ok: false, error };
      }
    }
  };
  await Promise.all(Array.from({ length: lanes }, () => runLane()));
  return results;
};
