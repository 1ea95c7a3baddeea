// Timeout-aware fetch and signal plumbing.
// Each remote call gets its own deadline, linked to the run's cancellation signal.

import { PipelineCancelledError } from './errors';

export class FetchTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FetchTimeoutError';
  }
}

export interface TimeoutSignal {
  signal: AbortSignal;
  timedOut: () => boolean;
  dispose: () => void;
}

/**
 * Child signal that aborts when the parent aborts or after timeoutMs.
 * Call dispose() once the guarded call settles.
 */
export function withTimeoutSignal(timeoutMs: number, parent?: AbortSignal): TimeoutSignal {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort();
  }, timeoutMs);

  const onAbort = () => controller.abort();
  if (parent?.aborted) controller.abort();
  parent?.addEventListener('abort', onAbort, { once: true });

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    },
  };
}

function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error('Aborted'));
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
    if (signal.aborted) onAbort();
  });
}

/**
 * Run one remote call under its own deadline.
 *
 * The call settles the result unless the deadline or the parent signal fires
 * first; a call that ignores its signal is abandoned rather than awaited.
 * Parent cancellation rejects with PipelineCancelledError, expiry defers to
 * `onTimeout`, which returns a substitute result or throws.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  parent: AbortSignal | undefined,
  call: (signal: AbortSignal) => Promise<T>,
  onTimeout: () => T,
): Promise<T> {
  const deadline = withTimeoutSignal(timeoutMs, parent);
  try {
    return await raceAbort(call(deadline.signal), deadline.signal);
  } catch (err) {
    if (parent?.aborted) throw new PipelineCancelledError();
    if (deadline.timedOut()) return onTimeout();
    throw err;
  } finally {
    deadline.dispose();
  }
}

/** Fetch and read the response under one deadline; `read` consumes the body. */
export function fetchWithTimeout<T>(
  input: string | URL,
  init: RequestInit | undefined,
  opts: { timeoutMs: number; signal?: AbortSignal },
  read: (response: Response) => Promise<T>,
): Promise<T> {
  return withDeadline(
    opts.timeoutMs,
    opts.signal,
    async signal => read(await fetch(input, { ...init, signal })),
    () => {
      throw new FetchTimeoutError(`Fetch timed out after ${opts.timeoutMs}ms`);
    },
  );
}

/** Abortable delay. Rejects with PipelineCancelledError if the signal fires first. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new PipelineCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new PipelineCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
