// Retry policy shared by the search collaborator and the phase orchestrator.
// Cancellation is never retried and never replaced by the fallback.

import { errorMessage, isCancellation, PipelineCancelledError, throwIfCancelled } from './errors';
import { sleep } from './http';

export interface RetryPolicy<T> {
  maxAttempts: number;
  /** Delay before attempt n+1, given the 1-based attempt that just failed */
  backoff: (attempt: number) => number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Value to return once attempts are exhausted; without it the last error is thrown */
  fallback?: (lastError: unknown) => T | Promise<T>;
}

export function exponentialBackoff(baseMs: number, capMs = 8_000): (attempt: number) => number {
  return (attempt: number) => Math.min(capMs, baseMs * 2 ** (attempt - 1));
}

export async function withRetry<T>(
  label: string,
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy<T>,
  signal?: AbortSignal,
): Promise<T> {
  let lastError: unknown = new Error(`${label}: no attempts made`);

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    throwIfCancelled(signal);
    try {
      return await fn(attempt);
    } catch (err) {
      if (isCancellation(err) || signal?.aborted) {
        throw err instanceof PipelineCancelledError ? err : new PipelineCancelledError();
      }
      lastError = err;
      const retry = attempt < policy.maxAttempts && (policy.shouldRetry?.(err, attempt) ?? true);
      console.warn(`[Retry] ${label} attempt ${attempt}/${policy.maxAttempts} failed: ${errorMessage(err)}`);
      if (!retry) break;
      const delay = policy.backoff(attempt);
      if (delay > 0) await sleep(delay, signal);
    }
  }

  if (policy.fallback) {
    console.warn(`[Retry] ${label} exhausted, using fallback`);
    return policy.fallback(lastError);
  }
  throw lastError;
}
