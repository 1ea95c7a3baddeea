import { describe, it, expect } from 'vitest';
import {
  errorMessage,
  isCancellation,
  PipelineCancelledError,
  ProviderUnavailableError,
  throwIfCancelled,
} from './errors';

function failure(reason: ProviderUnavailableError['reason'], status?: number) {
  return new ProviderUnavailableError({ provider: 'tavily', reason, status, message: 'failed' });
}

describe('ProviderUnavailableError.retryable', () => {
  it('retries rate limits, timeouts and network errors', () => {
    expect(failure('rate_limited').retryable).toBe(true);
    expect(failure('timeout').retryable).toBe(true);
    expect(failure('network').retryable).toBe(true);
  });

  it('retries server errors but not client errors', () => {
    expect(failure('http_error', 503).retryable).toBe(true);
    expect(failure('http_error', 404).retryable).toBe(false);
  });

  it('never retries a missing configuration', () => {
    expect(failure('not_configured').retryable).toBe(false);
  });
});

describe('cancellation helpers', () => {
  it('recognizes our own error and platform AbortErrors', () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';
    expect(isCancellation(new PipelineCancelledError())).toBe(true);
    expect(isCancellation(abort)).toBe(true);
    expect(isCancellation(new Error('boom'))).toBe(false);
    expect(isCancellation('AbortError')).toBe(false);
  });

  it('throws only once the signal has aborted', () => {
    const controller = new AbortController();
    expect(() => throwIfCancelled(controller.signal)).not.toThrow();
    controller.abort();
    expect(() => throwIfCancelled(controller.signal)).toThrow(PipelineCancelledError);
  });

  it('formats unknown values as messages', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
