// Run progress reporting.
//
// A caller registers one listener for the duration of a run; every stage reports
// through emitProgress() without threading the listener through its arguments.
// Runs started concurrently each see only their own listener.

import { AsyncLocalStorage } from 'async_hooks';
import type { PhaseName, SourceTier } from './types';

export type ProgressStage = 'research' | 'analysis';

export interface ProgressEvent {
  type: 'status' | 'complete' | 'error' | 'phase';
  message: string;
  stage?: ProgressStage;
  /** 1-based phase position, on 'phase' events */
  step?: number;
  totalSteps?: number;
  /** Phase name, on 'phase' events */
  detail?: string;
}

export type ProgressListener = (event: ProgressEvent) => void;

const listeners = new AsyncLocalStorage<ProgressListener>();

/** Run `fn` with `listener` receiving every event emitted inside it, across awaits. */
export function withProgressCallback<T>(listener: ProgressListener, fn: () => T): T {
  return listeners.run(listener, fn);
}

export function emitProgress(event: ProgressEvent): void {
  listeners.getStore()?.(event);
  console.log(`[${event.stage ? event.stage.toUpperCase() : 'Progress'}] ${event.message}`);
}

function research(message: string): void {
  emitProgress({ type: 'status', stage: 'research', message });
}

function analysis(message: string): void {
  emitProgress({ type: 'status', stage: 'analysis', message });
}

// Messages prefixed with ✓ are milestones; the status endpoint lists them.
export const STATUS = {
  queriesPlanned: (count: number, degraded: boolean) =>
    research(degraded
      ? `Searching ${count} general research angles (limited business detail)...`
      : `Searching ${count} research angles...`),
  sourcesCollected: (unique: number, failedQueries: number) =>
    research(failedQueries > 0
      ? `Found ${unique} unique sources (${failedQueries} searches failed)`
      : `Found ${unique} unique sources`),
  sourcesScored: (tiers: Record<SourceTier, number>) =>
    research(`Scored sources: ${tiers[1]} authoritative, ${tiers[2]} reports/press, ${tiers[3]} general, ${tiers[4]} unverified`),
  contextReady: (blocks: number, chars: number) =>
    research(`✓ Research complete: ${blocks} sources in context (${chars.toLocaleString('en-US')} chars)`),
  insufficientData: () =>
    research('⚠ No sources met the quality bar, analysis will be low confidence'),

  phaseStarted: (phase: PhaseName, label: string, step: number, totalSteps: number) =>
    emitProgress({ type: 'phase', stage: 'analysis', step, totalSteps, detail: phase, message: `${label}...` }),
  phaseRetrying: (label: string, attempt: number, max: number) =>
    analysis(`Reformatting ${label.toLowerCase()} (attempt ${attempt}/${max})...`),
  phaseComplete: (label: string) => analysis(`✓ ${label}`),
  phaseFallback: (label: string) => analysis(`⚠ ${label} used a template fallback`),

  pipelineStarted: (subject: string) =>
    emitProgress({ type: 'status', message: `Starting segment research for ${subject}...` }),
  pipelineComplete: () =>
    emitProgress({ type: 'complete', message: '✓ Segment research complete' }),
  pipelineError: (error: string) =>
    emitProgress({ type: 'error', message: `Error: ${error}` }),
};
