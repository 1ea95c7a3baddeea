import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PipelineCancelledError } from './errors';
import { exponentialBackoff, withRetry } from './retry';

const noDelay = () => 0;

describe('withRetry', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('returns the first successful result', async () => {
    const fn = vi.fn(async () => 'ok');
    await expect(withRetry('test', fn, { maxAttempts: 3, backoff: noDelay })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries until an attempt succeeds', async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`attempt ${attempt} failed`);
      return `ok on ${attempt}`;
    });
    await expect(withRetry('test', fn, { maxAttempts: 3, backoff: noDelay })).resolves.toBe('ok on 3');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('stops early when shouldRetry declines', async () => {
    const fn = vi.fn(async () => {
      throw new Error('not retryable');
    });
    await expect(
      withRetry('test', fn, { maxAttempts: 3, backoff: noDelay, shouldRetry: () => false }),
    ).rejects.toThrow('not retryable');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('hands the last error to the fallback once attempts are exhausted', async () => {
    const fallback = vi.fn((err: unknown) => (err instanceof Error ? `fallback after ${err.message}` : 'fallback'));
    const result = await withRetry(
      'test',
      async (attempt: number): Promise<string> => {
        throw new Error(`failure ${attempt}`);
      },
      { maxAttempts: 2, backoff: noDelay, fallback },
    );
    expect(result).toBe('fallback after failure 2');
    expect(fallback).toHaveBeenCalledTimes(1);
  });

  it('does not retry or fall back on cancellation', async () => {
    const fn = vi.fn(async (): Promise<string> => {
      throw new PipelineCancelledError();
    });
    const fallback = vi.fn(() => 'fallback');
    await expect(
      withRetry('test', fn, { maxAttempts: 3, backoff: noDelay, fallback }),
    ).rejects.toBeInstanceOf(PipelineCancelledError);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(fallback).not.toHaveBeenCalled();
  });

  it('makes no attempt when the signal has already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => 'ok');
    await expect(
      withRetry('test', fn, { maxAttempts: 3, backoff: noDelay }, controller.signal),
    ).rejects.toBeInstanceOf(PipelineCancelledError);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('exponentialBackoff', () => {
  it('doubles from the base delay up to the cap', () => {
    const backoff = exponentialBackoff(500);
    expect([1, 2, 3, 4, 5, 6].map(backoff)).toEqual([500, 1000, 2000, 4000, 8000, 8000]);
  });
});
