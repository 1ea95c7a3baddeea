// Error types shared across the pipeline.
//
// Only PipelineCancelledError ends a run early. Provider and parse failures are
// recovered locally (fallback provider, retry, template fallback) and surface as
// degraded results rather than exceptions.

export type ProviderFailureReason =
  | 'rate_limited'
  | 'timeout'
  | 'http_error'
  | 'network'
  | 'not_configured';

export class ProviderUnavailableError extends Error {
  provider: string;
  reason: ProviderFailureReason;
  status?: number;

  constructor(opts: { provider: string; reason: ProviderFailureReason; message: string; status?: number }) {
    super(opts.message);
    this.name = 'ProviderUnavailableError';
    this.provider = opts.provider;
    this.reason = opts.reason;
    this.status = opts.status;
  }

  /** Rate limits and timeouts are worth another attempt; config and 4xx errors are not. */
  get retryable(): boolean {
    if (this.reason === 'rate_limited' || this.reason === 'timeout' || this.reason === 'network') return true;
    return this.reason === 'http_error' && (this.status === undefined || this.status >= 500);
  }
}

export class MalformedResponseError extends Error {
  phase: string;
  issues: string[];

  constructor(phase: string, issues: string[]) {
    super(`Malformed ${phase} response: ${issues.slice(0, 3).join('; ')}`);
    this.name = 'MalformedResponseError';
    this.phase = phase;
    this.issues = issues;
  }
}

export class PipelineCancelledError extends Error {
  constructor(message = 'Pipeline aborted by client') {
    super(message);
    this.name = 'PipelineCancelledError';
  }
}

export class ConfigurationError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid pipeline configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new PipelineCancelledError();
  }
}

/** True for our own cancellation error and for platform AbortErrors. */
export function isCancellation(error: unknown): boolean {
  if (error instanceof PipelineCancelledError) return true;
  return error instanceof Error && error.name === 'AbortError';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
