// Segment research pipeline: coded orchestration, single LLM call per phase
//
// Architecture:
//   Query planning (coded) → Search + scrape fan-out (coded, concurrent)
//   → Dedup → Quality scoring (coded) → Budgeted context (coded)
//   → Market landscape → Competitive intel → Segments → Personas → Strategy
//     (one LLM call each, validated, retried, template fallback)
//
// Everything a run touches lives in its RunState. Nothing is shared between runs.

import { createAnthropicCollaborator, type LlmCollaborator } from './anthropic';
import { resolvePipelineConfig, type PipelineConfig, type PipelineConfigOverrides } from './config';
import { isCancellation, PipelineCancelledError, throwIfCancelled } from './errors';
import { withTimeoutSignal } from './http';
import { runPhases } from './phases/orchestrator';
import { STATUS } from './progress';
import { aggregateContext } from './research/aggregator';
import { documentTerms, documentToDraft } from './research/document-context';
import { planQueries } from './research/query-planner';
import { retrieveSources } from './research/retriever';
import { scoreSources } from './research/scoring';
import {
  createDuckDuckGoSearch,
  createPageScraper,
  createTavilySearch,
  type ScrapeProvider,
  type SearchProvider,
} from './research/tools';
import type {
  AggregatedContext,
  BusinessInput,
  DocumentContext,
  PhaseResult,
  PipelineResult,
  QueryPlan,
  RetrievalStats,
  SourceDraft,
  SourceRecord,
  SourceTier,
} from './types';

export interface PipelineCollaborators {
  search: SearchProvider;
  fallbackSearch?: SearchProvider;
  scraper: ScrapeProvider;
  llm: LlmCollaborator;
}

export interface PipelineOptions {
  config?: PipelineConfigOverrides;
  /** Replaces the Tavily / DuckDuckGo / Anthropic defaults, one collaborator at a time */
  collaborators?: Partial<PipelineCollaborators>;
  signal?: AbortSignal;
  /** Overrides config.runTimeoutMs */
  timeoutMs?: number;
  /** Date used for query years and recency scoring; defaults to now */
  referenceDate?: Date;
}

interface RunState {
  config: PipelineConfig;
  referenceDate: Date;
  plan?: QueryPlan;
  drafts: SourceDraft[];
  records: SourceRecord[];
  retrieval?: RetrievalStats;
  context?: AggregatedContext;
  phaseResults: PhaseResult[];
}

interface ResearchOutcome {
  plan: QueryPlan;
  retrieval: RetrievalStats;
  context: AggregatedContext;
}

function defaultCollaborators(config: PipelineConfig): PipelineCollaborators {
  return {
    search: createTavilySearch(),
    fallbackSearch: createDuckDuckGoSearch(),
    scraper: createPageScraper(),
    llm: createAnthropicCollaborator({
      model: config.model,
      maxTokens: config.maxTokens,
      temperature: config.temperature,
    }),
  };
}

function tierCounts(records: readonly SourceRecord[]): Record<SourceTier, number> {
  const counts: Record<SourceTier, number> = { 1: 0, 2: 0, 3: 0, 4: 0 };
  for (const record of records) counts[record.tier]++;
  return counts;
}

function runSubject(input: BusinessInput): string {
  return input.companyName?.trim() || input.industry.trim() || 'your business';
}

// ── Stages ──────────────────────────────────────────────────────────

async function research(
  state: RunState,
  input: BusinessInput,
  documentContext: DocumentContext | undefined,
  collaborators: PipelineCollaborators,
  signal: AbortSignal,
): Promise<ResearchOutcome> {
  const { config } = state;

  const plan = planQueries(input, { maxQueries: config.maxQueries, referenceDate: state.referenceDate });
  state.plan = plan;
  console.log(`[Pipeline] Planned ${plan.queries.length} queries${plan.degraded ? ' (degraded plan)' : ''}`);
  STATUS.queriesPlanned(plan.queries.length, plan.degraded);

  const retrieval = await retrieveSources(
    plan,
    { primary: collaborators.search, secondary: collaborators.fallbackSearch, scraper: collaborators.scraper },
    {
      concurrency: config.concurrency,
      resultsPerQuery: config.resultsPerQuery,
      secondaryResultsPerQuery: config.secondaryResultsPerQuery,
      searchTimeoutMs: config.searchTimeoutMs,
      scrapeTimeoutMs: config.scrapeTimeoutMs,
      searchMaxAttempts: config.searchMaxAttempts,
      backoffBaseMs: config.backoffBaseMs,
      signal,
    },
  );
  state.retrieval = retrieval.stats;
  state.drafts = [...retrieval.drafts];
  STATUS.sourcesCollected(retrieval.stats.uniqueSources, retrieval.stats.queriesFailed);

  let relevanceTerms = plan.relevanceTerms;
  if (documentContext) {
    const documentDraft = documentToDraft(documentContext);
    if (documentDraft) {
      state.drafts.push(documentDraft);
      relevanceTerms = Array.from(new Set([...relevanceTerms, ...documentTerms(documentContext)]));
      console.log(`[Pipeline] Added uploaded documents (${documentContext.stats.fileCount} files, ${documentDraft.rawText.length} chars)`);
    }
  }

  throwIfCancelled(signal);

  state.records = scoreSources(state.drafts, { relevanceTerms, referenceDate: state.referenceDate });
  STATUS.sourcesScored(tierCounts(state.records));

  const context = aggregateContext(state.records, {
    budget: config.contextBudget,
    minConfidence: config.minConfidence,
    perSourceCharLimit: config.perSourceCharLimit,
  });
  state.context = context;

  if (context.insufficientData) {
    STATUS.insufficientData();
  } else {
    STATUS.contextReady(context.blocks.length, context.totalChars);
  }
  return { plan, retrieval: retrieval.stats, context };
}

// ── Entry point ─────────────────────────────────────────────────────

/**
 * Research a market and produce the five analysis phases.
 *
 * Provider, parse and plausibility failures degrade individual results; the
 * only rejection is PipelineCancelledError (caller abort or run timeout).
 */
export async function runPipeline(
  businessInput: BusinessInput,
  documentContext?: DocumentContext,
  options: PipelineOptions = {},
): Promise<PipelineResult> {
  const started = Date.now();
  const config = resolvePipelineConfig(options.config);
  const collaborators: PipelineCollaborators = { ...defaultCollaborators(config), ...options.collaborators };
  const timeoutMs = options.timeoutMs ?? config.runTimeoutMs;

  const state: RunState = {
    config,
    referenceDate: options.referenceDate ?? new Date(),
    drafts: [],
    records: [],
    phaseResults: [],
  };

  throwIfCancelled(options.signal);
  const run = withTimeoutSignal(timeoutMs, options.signal);

  STATUS.pipelineStarted(runSubject(businessInput));

  try {
    const { plan, retrieval, context } = await research(state, businessInput, documentContext, collaborators, run.signal);

    throwIfCancelled(run.signal);

    state.phaseResults = await runPhases(businessInput, context, collaborators.llm, {
      maxRetries: config.maxPhaseRetries,
      llmTimeoutMs: config.llmTimeoutMs,
      bounds: config,
      signal: run.signal,
    });

    throwIfCancelled(run.signal);

    const elapsedMs = Date.now() - started;
    console.log(`[Pipeline] Complete in ${(elapsedMs / 1000).toFixed(1)}s`);
    STATUS.pipelineComplete();

    return {
      phaseResults: state.phaseResults,
      context,
      plan,
      retrieval,
      elapsedMs,
    };
  } catch (err) {
    if (run.timedOut()) {
      console.warn(`[Pipeline] Run exceeded ${timeoutMs}ms, aborting`);
      throw new PipelineCancelledError(`Pipeline timed out after ${timeoutMs}ms`);
    }
    if (isCancellation(err) || run.signal.aborted) {
      console.log('[Pipeline] Cancelled');
      throw err instanceof PipelineCancelledError ? err : new PipelineCancelledError();
    }
    throw err;
  } finally {
    run.dispose();
  }
}
