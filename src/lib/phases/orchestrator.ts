// Phase Orchestrator
//
// market_landscape → competitive_intel → segment_identification →
// persona_development → strategy_development → done
//
// Each phase: prompt with its context slice and its predecessors' outputs,
// validate, retry with the validation errors quoted back, and substitute the
// template fallback once attempts run out. Only cancellation stops the chain.

import type { LlmCollaborator } from '../anthropic';
import { MalformedResponseError, ProviderUnavailableError, throwIfCancelled } from '../errors';
import { withDeadline } from '../http';
import { STATUS } from '../progress';
import { buildReformatInstruction } from '../prompts/reformat-prompt';
import { renderContextSubset } from '../research/aggregator';
import { withRetry } from '../retry';
import type {
  AggregatedContext,
  BusinessInput,
  NumericAdjustment,
  PhaseConfidence,
  PhaseFlag,
  PhaseName,
  PhaseResult,
  PhaseResultFor,
} from '../types';
import { PHASE_NAMES } from '../types';
import { checkCitations, extractInlineCitations, type PlausibilityBounds } from '../validators';
import { PHASE_DEFINITIONS, type PhaseDefinition } from './definitions';
import type { PriorOutputs } from './fallbacks';
import { parsePhaseOutput } from './parse';
import type { PhaseOutputs } from './schemas';

export interface PhaseRunOptions {
  maxRetries: number;
  llmTimeoutMs: number;
  bounds: PlausibilityBounds;
  signal?: AbortSignal;
}

// Per-run state; one instance per runPhases call
interface PhaseChain {
  input: BusinessInput;
  context: AggregatedContext;
  llm: LlmCollaborator;
  prior: PriorOutputs;
  fallbacks: Set<PhaseName>;
}

// ── Prompt assembly ─────────────────────────────────────────────────

export function renderPriorOutputs(dependsOn: readonly PhaseName[], prior: PriorOutputs): string {
  return dependsOn
    .map(phase => {
      const output = prior[phase];
      if (output === undefined) return null;
      return `### ${PHASE_DEFINITIONS[phase].label}\n\n\`\`\`json\n${JSON.stringify(output, null, 2)}\n\`\`\``;
    })
    .filter((section): section is string => section !== null)
    .join('\n\n');
}

// ── Confidence ──────────────────────────────────────────────────────

export function phaseConfidence(flags: readonly PhaseFlag[]): PhaseConfidence {
  if (flags.includes('fallback_used') || flags.includes('insufficient_context') || flags.includes('data_implausible')) {
    return 'low';
  }
  if (flags.includes('degraded_predecessor') || flags.includes('no_citations')) {
    return 'medium';
  }
  return 'high';
}

// ── Single phase ────────────────────────────────────────────────────

interface ValidAttempt<P extends PhaseName> {
  raw: string;
  data: PhaseOutputs[P];
}

async function runPhase<P extends PhaseName>(
  def: PhaseDefinition<P>,
  step: number,
  chain: PhaseChain,
  options: PhaseRunOptions,
): Promise<PhaseResultFor<P>> {
  const started = Date.now();
  const tag = `[Phase ${def.phase}]`;
  const maxAttempts = options.maxRetries + 1;

  const missing = def.dependsOn.filter(dep => chain.prior[dep] === undefined);
  if (missing.length > 0) {
    throw new Error(`${def.phase} started before ${missing.join(', ')} finished`);
  }

  STATUS.phaseStarted(def.phase, def.label, step, PHASE_NAMES.length);

  const subset = renderContextSubset(chain.context, def.contextCategories);
  const priorOutputs = renderPriorOutputs(def.dependsOn, chain.prior);
  const instructions = def.buildInstructions(chain.input);

  let attempts = 0;
  let lastRaw = '';
  let lastIssues: string[] = [];

  const attempt = async (n: number): Promise<ValidAttempt<P>> => {
    attempts = n;
    if (n > 1) STATUS.phaseRetrying(def.label, n, maxAttempts);

    const request = {
      system: def.systemPrompt,
      instructions: lastIssues.length > 0
        ? `${instructions}\n\n${buildReformatInstruction(lastIssues, n, maxAttempts)}`
        : instructions,
      context: subset.text,
      priorOutputs,
      responseSchema: def.responseShape,
    };
    const raw = await withDeadline(
      options.llmTimeoutMs,
      options.signal,
      signal => chain.llm.complete(request, signal),
      () => {
        throw new ProviderUnavailableError({
          provider: 'llm',
          reason: 'timeout',
          message: `LLM call timed out after ${options.llmTimeoutMs}ms`,
        });
      },
    );

    lastRaw = raw;
    const parsed = parsePhaseOutput(raw, def.schema);
    if (!parsed.ok) {
      lastIssues = parsed.issues;
      throw new MalformedResponseError(def.phase, parsed.issues);
    }
    return { raw, data: parsed.data };
  };

  const valid = await withRetry<ValidAttempt<P> | null>(
    tag,
    attempt,
    { maxAttempts, backoff: () => 0, fallback: () => null },
    options.signal,
  );

  const flags: PhaseFlag[] = [];
  let data: PhaseOutputs[P];
  let adjustments: NumericAdjustment[] = [];

  if (valid) {
    data = valid.data;
    if (def.applyNumericPolicy) {
      const bounded = def.applyNumericPolicy(data, options.bounds, chain.input.industry);
      data = bounded.data;
      adjustments = bounded.adjustments;
    }
  } else {
    data = def.fallback(chain.input, chain.prior);
    flags.push('fallback_used');
  }

  const cited = valid ? [...data.citations, ...extractInlineCitations(valid.raw)] : [];
  const citations = checkCitations(cited, chain.context.bibliography);

  if (chain.context.insufficientData) flags.push('insufficient_context');
  if (adjustments.length > 0) flags.push('data_implausible');
  if (citations.unknown.length > 0) flags.push('unknown_citations');
  if (citations.valid.length === 0) flags.push('no_citations');
  if (def.dependsOn.some(dep => chain.fallbacks.has(dep))) flags.push('degraded_predecessor');

  for (const adjustment of adjustments) {
    console.warn(`${tag} ${adjustment.field}: ${adjustment.reason} (${adjustment.original} → ${adjustment.adjusted})`);
  }
  if (citations.unknown.length > 0) {
    console.warn(`${tag} Dropped unknown citations: ${citations.unknown.join(', ')}`);
  }

  const result: PhaseResultFor<P> = {
    phase: def.phase,
    status: valid ? 'success' : 'fallback',
    rawOutput: valid?.raw ?? lastRaw,
    parsedFields: { ...data, citations: citations.valid },
    citationsUsed: citations.valid,
    elapsedMs: Date.now() - started,
    retryCount: Math.max(0, attempts - 1),
    confidence: phaseConfidence(flags),
    flags,
    adjustments,
  };

  chain.prior[def.phase] = result.parsedFields;
  if (result.status === 'fallback') {
    chain.fallbacks.add(def.phase);
    STATUS.phaseFallback(def.label);
  } else {
    STATUS.phaseComplete(def.label);
  }

  console.log(
    `${tag} ${result.status} in ${result.elapsedMs}ms ` +
    `(retries: ${result.retryCount}, confidence: ${result.confidence}, citations: ${result.citationsUsed.length})`,
  );

  return result;
}

// ── Chain ───────────────────────────────────────────────────────────

function runNamedPhase(phase: PhaseName, step: number, chain: PhaseChain, options: PhaseRunOptions): Promise<PhaseResult> {
  switch (phase) {
    case 'market_landscape':
      return runPhase(PHASE_DEFINITIONS.market_landscape, step, chain, options);
    case 'competitive_intel':
      return runPhase(PHASE_DEFINITIONS.competitive_intel, step, chain, options);
    case 'segment_identification':
      return runPhase(PHASE_DEFINITIONS.segment_identification, step, chain, options);
    case 'persona_development':
      return runPhase(PHASE_DEFINITIONS.persona_development, step, chain, options);
    case 'strategy_development':
      return runPhase(PHASE_DEFINITIONS.strategy_development, step, chain, options);
  }
}

/**
 * Run all five phases in dependency order. Always returns one terminal result
 * per phase; rejects only with PipelineCancelledError.
 */
export async function runPhases(
  input: BusinessInput,
  context: AggregatedContext,
  llm: LlmCollaborator,
  options: PhaseRunOptions,
): Promise<PhaseResult[]> {
  const chain: PhaseChain = { input, context, llm, prior: {}, fallbacks: new Set() };
  const results: PhaseResult[] = [];

  for (const [index, phase] of PHASE_NAMES.entries()) {
    throwIfCancelled(options.signal);
    results.push(await runNamedPhase(phase, index + 1, chain, options));
  }

  const fallbackCount = chain.fallbacks.size;
  console.log(`[Orchestrator] ${results.length} phases complete${fallbackCount > 0 ? `, ${fallbackCount} via fallback` : ''}`);
  return results;
}
