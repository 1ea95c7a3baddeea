// In-memory registry of background research runs.
//
// Each job owns the AbortController of its run. A job leaves the running state
// exactly once; whichever of complete / fail / cancel arrives first wins.
// Nothing is persisted, so a restart forgets every job.

import { randomUUID } from 'crypto';
import type { ProgressEvent, ProgressStage } from './progress';
import type { PipelineResult } from './types';

export type JobState =
  | { status: 'running' }
  | { status: 'complete'; result: PipelineResult }
  | { status: 'failed' | 'cancelled'; error: string };

export type JobStatus = JobState['status'];

export interface JobProgress {
  stage?: ProgressStage;
  phase?: string;
  step: number;
  totalSteps: number;
  /** Status and error events, oldest first */
  messages: ProgressEvent[];
}

export interface Job {
  id: string;
  subject: string;
  state: JobState;
  progress: JobProgress;
  createdAt: number;
  lastPolledAt: number;
}

interface JobEntry {
  job: Job;
  controller: AbortController;
}

const entries = new Map<string, JobEntry>();

// Finished jobs expire this long after their last poll; running jobs never do
export const JOB_TTL_MS = 2 * 60 * 60 * 1000;
const SWEEP_INTERVAL_MS = 10 * 60 * 1000;

export function sweepExpiredJobs(now = Date.now()): number {
  let removed = 0;
  for (const [id, { job }] of entries) {
    if (job.state.status !== 'running' && now - job.lastPolledAt > JOB_TTL_MS) {
      entries.delete(id);
      removed++;
    }
  }
  return removed;
}

setInterval(() => sweepExpiredJobs(), SWEEP_INTERVAL_MS).unref();

// ── Lifecycle ───────────────────────────────────────────────────────

export function createJob(subject: string): Job {
  const now = Date.now();
  const job: Job = {
    id: randomUUID(),
    subject,
    state: { status: 'running' },
    progress: { step: 0, totalSteps: 5, messages: [] },
    createdAt: now,
    lastPolledAt: now,
  };
  entries.set(job.id, { job, controller: new AbortController() });
  return job;
}

/** Looks a job up and counts it as polled. */
export function getJob(id: string): Job | undefined {
  const entry = entries.get(id);
  if (entry) entry.job.lastPolledAt = Date.now();
  return entry?.job;
}

export function getAbortSignal(id: string): AbortSignal | undefined {
  return entries.get(id)?.controller.signal;
}

export function addProgress(id: string, event: ProgressEvent): void {
  const progress = entries.get(id)?.job.progress;
  if (!progress) return;

  if (event.stage) progress.stage = event.stage;
  if (event.type === 'phase') {
    progress.phase = event.detail;
    progress.step = event.step ?? progress.step;
    progress.totalSteps = event.totalSteps ?? progress.totalSteps;
  } else if (event.type !== 'complete') {
    progress.messages.push(event);
  }
}

function settle(id: string, state: Exclude<JobState, { status: 'running' }>): boolean {
  const entry = entries.get(id);
  if (!entry || entry.job.state.status !== 'running') return false;
  entry.job.state = state;
  return true;
}

export function completeJob(id: string, result: PipelineResult): void {
  settle(id, { status: 'complete', result });
}

export function failJob(id: string, error: string): void {
  settle(id, { status: 'failed', error });
}

/** Stops a running job's pipeline. False for unknown or already finished jobs. */
export function cancelJob(id: string): boolean {
  if (!settle(id, { status: 'cancelled', error: 'Cancelled by user' })) return false;
  entries.get(id)?.controller.abort();
  return true;
}

// ── Polling ─────────────────────────────────────────────────────────

export type JobSnapshot =
  | Exclude<JobState, { status: 'running' }>
  | {
      status: 'running';
      stage?: ProgressStage;
      phase?: string;
      step: number;
      totalSteps: number;
      message: string;
      milestones: string[];
    };

export function pollJob(id: string): JobSnapshot | undefined {
  const job = getJob(id);
  if (!job) return undefined;
  if (job.state.status !== 'running') return job.state;

  const { stage, phase, step, totalSteps, messages } = job.progress;
  return {
    status: 'running',
    stage,
    phase,
    step,
    totalSteps,
    message: messages[messages.length - 1]?.message ?? 'Starting...',
    milestones: messages.filter(m => m.message.startsWith('✓')).map(m => m.message),
  };
}
