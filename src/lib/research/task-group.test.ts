import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PipelineCancelledError } from '../errors';
import { TaskGroup } from './task-group';

const tick = (ms = 2) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe('TaskGroup', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('never runs more than `concurrency` tasks at once', async () => {
    const group = new TaskGroup(3);
    let active = 0;
    let peak = 0;

    for (let i = 0; i < 10; i++) {
      group.spawn(`task-${i}`, async () => {
        active++;
        peak = Math.max(peak, active);
        await tick();
        active--;
      });
    }

    const summary = await group.join();
    expect(summary).toEqual({ completed: 10, failures: [] });
    expect(peak).toBe(3);
  });

  it('waits for tasks spawned by running tasks', async () => {
    const group = new TaskGroup(2);
    const finished: string[] = [];

    group.spawn('parent', async () => {
      await tick();
      group.spawn('child-a', async () => {
        await tick();
        finished.push('child-a');
      });
      group.spawn('child-b', async () => {
        finished.push('child-b');
      });
      finished.push('parent');
    });

    const summary = await group.join();
    expect(summary.completed).toBe(3);
    expect([...finished].sort()).toEqual(['child-a', 'child-b', 'parent']);
  });

  it('records task failures without rejecting', async () => {
    const group = new TaskGroup(2);
    group.spawn('good', async () => {});
    group.spawn('bad', async () => {
      throw new Error('boom');
    });

    const summary = await group.join();
    expect(summary.completed).toBe(1);
    expect(summary.failures).toEqual([{ label: 'bad', error: 'boom' }]);
  });

  it('drops queued tasks and rejects when the signal aborts', async () => {
    const controller = new AbortController();
    const group = new TaskGroup(2, controller.signal);
    let started = 0;

    for (let i = 0; i < 5; i++) {
      group.spawn(`wait-${i}`, signal => {
        started++;
        return new Promise<void>(resolve => signal?.addEventListener('abort', () => resolve(), { once: true }));
      });
    }

    const joined = group.join();
    controller.abort();

    await expect(joined).rejects.toBeInstanceOf(PipelineCancelledError);
    expect(started).toBe(2);
  });

  it('rejects on abort without waiting for a task that ignores the signal', async () => {
    const controller = new AbortController();
    const group = new TaskGroup(2, controller.signal);
    group.spawn('stuck', () => new Promise<void>(() => {}));

    const joined = group.join();
    setTimeout(() => controller.abort(), 5);

    await expect(joined).rejects.toBeInstanceOf(PipelineCancelledError);
    expect(group.inFlight).toBe(1);
  });

  it('refuses new tasks after join', async () => {
    const group = new TaskGroup(1);
    await group.join();
    expect(() => group.spawn('late', async () => {})).toThrow('already joined');
  });

  it('rejects a non-positive concurrency', () => {
    expect(() => new TaskGroup(0)).toThrow(RangeError);
  });
});
