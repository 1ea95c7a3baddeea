// Bounded task group for retrieval fan-out.
//
// Tasks may spawn further tasks while running (a search spawns its scrapes).
// At most `concurrency` tasks are in flight; join() resolves once the queue is
// drained and nothing is executing. Task errors are recorded, never rethrown.
// If the signal aborts, queued tasks are dropped and join() rejects with
// PipelineCancelledError at once; in-flight tasks are abandoned, not awaited.

import { errorMessage, PipelineCancelledError } from '../errors';

export type GroupTask = (signal?: AbortSignal) => Promise<void>;

export interface TaskFailure {
  label: string;
  error: string;
}

export interface TaskGroupSummary {
  completed: number;
  failures: TaskFailure[];
}

export class TaskGroup {
  private readonly executing = new Set<Promise<void>>();
  private readonly pending: Array<{ label: string; task: GroupTask }> = [];
  private readonly failures: TaskFailure[] = [];
  private completed = 0;
  private joined = false;

  constructor(
    private readonly concurrency: number,
    private readonly signal?: AbortSignal,
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`TaskGroup concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  get inFlight(): number {
    return this.executing.size;
  }

  spawn(label: string, task: GroupTask): void {
    if (this.signal?.aborted) return;
    if (this.joined) {
      throw new Error(`TaskGroup already joined, cannot spawn ${label}`);
    }
    this.pending.push({ label, task });
    this.pump();
  }

  async join(): Promise<TaskGroupSummary> {
    const abort = abortWaiter(this.signal);
    try {
      for (;;) {
        if (this.signal?.aborted) break;
        if (this.executing.size === 0) {
          if (this.pending.length === 0) break;
          this.pump();
          continue;
        }
        await Promise.race([...this.executing, abort.aborted]);
      }
    } finally {
      abort.dispose();
    }

    this.joined = true;
    if (this.signal?.aborted) {
      this.pending.length = 0;
      throw new PipelineCancelledError();
    }
    return { completed: this.completed, failures: [...this.failures] };
  }

  private pump(): void {
    while (this.executing.size < this.concurrency && this.pending.length > 0) {
      if (this.signal?.aborted) {
        this.pending.length = 0;
        return;
      }
      const next = this.pending.shift();
      if (!next) return;
      const p: Promise<void> = this.run(next.label, next.task).then(() => {
        this.executing.delete(p);
        this.pump();
      });
      this.executing.add(p);
    }
  }

  private async run(label: string, task: GroupTask): Promise<void> {
    try {
      await task(this.signal);
      this.completed++;
    } catch (err) {
      this.failures.push({ label, error: errorMessage(err) });
      if (!this.signal?.aborted) {
        console.warn(`[TaskGroup] ${label} failed: ${errorMessage(err)}`);
      }
    }
  }
}

/** Resolves when the signal aborts; never, without one. */
function abortWaiter(signal?: AbortSignal): { aborted: Promise<void>; dispose: () => void } {
  let onAbort = (): void => undefined;
  const aborted = new Promise<void>(resolve => {
    onAbort = () => resolve();
  });
  signal?.addEventListener('abort', onAbort, { once: true });
  return { aborted, dispose: () => signal?.removeEventListener('abort', onAbort) };
}
