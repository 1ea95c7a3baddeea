// Pipeline configuration: defaults, environment overrides, per-call overrides.
// Every knob the pipeline reads lives here so a run's behavior is reproducible
// from the resolved config alone.

import { z } from 'zod';
import { ConfigurationError } from './errors';
import { MIN_EXCERPT_CHARS } from './research/aggregator';

export const PIPELINE_DEFAULTS = {
  // Retrieval
  concurrency: 8,
  maxQueries: 30,
  resultsPerQuery: 5,
  secondaryResultsPerQuery: 3,
  searchTimeoutMs: 15_000,
  scrapeTimeoutMs: 20_000,
  searchMaxAttempts: 3,
  backoffBaseMs: 500,

  // Context
  contextBudget: 60_000,
  perSourceCharLimit: 4_000,
  minConfidence: 0.35,

  // Phases
  maxPhaseRetries: 2,
  llmTimeoutMs: 180_000,
  model: 'claude-sonnet-4-20250514',
  maxTokens: 8192,
  temperature: 0.4,

  // Numeric plausibility
  minGrowthRatePercent: -50,
  maxGrowthRatePercent: 100,
  minMarketSizeUsdMillions: 10,
  maxMarketSizeUsdMillions: 5_000_000,

  // Whole run
  runTimeoutMs: 15 * 60_000,
} as const;

// Hard ceiling on planner output regardless of overrides
export const MAX_QUERIES_CEILING = 30;

const MarketRangeSchema = z.object({
  min: z.number().positive(),
  max: z.number().positive(),
});

export const PipelineConfigSchema = z
  .object({
    concurrency: z.number().int().min(1).max(64),
    maxQueries: z.number().int().min(1).max(MAX_QUERIES_CEILING),
    resultsPerQuery: z.number().int().min(1).max(20),
    secondaryResultsPerQuery: z.number().int().min(1).max(20),
    searchTimeoutMs: z.number().int().positive(),
    scrapeTimeoutMs: z.number().int().positive(),
    searchMaxAttempts: z.number().int().min(1).max(10),
    backoffBaseMs: z.number().int().min(0),
    contextBudget: z.number().int().min(500),
    perSourceCharLimit: z.number().int().min(MIN_EXCERPT_CHARS),
    minConfidence: z.number().min(0).max(1),
    maxPhaseRetries: z.number().int().min(0).max(5),
    llmTimeoutMs: z.number().int().positive(),
    model: z.string().min(1),
    maxTokens: z.number().int().positive(),
    temperature: z.number().min(0).max(1),
    minGrowthRatePercent: z.number(),
    maxGrowthRatePercent: z.number(),
    minMarketSizeUsdMillions: z.number().positive(),
    maxMarketSizeUsdMillions: z.number().positive(),
    /** Per-industry market size plausibility ranges (USD millions), keyed lowercase */
    industryMarketRanges: z.record(MarketRangeSchema).default({}),
    runTimeoutMs: z.number().int().positive(),
  })
  .refine(c => c.minGrowthRatePercent < c.maxGrowthRatePercent, {
    message: 'minGrowthRatePercent must be below maxGrowthRatePercent',
  })
  .refine(c => c.minMarketSizeUsdMillions < c.maxMarketSizeUsdMillions, {
    message: 'minMarketSizeUsdMillions must be below maxMarketSizeUsdMillions',
  });

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigOverrides = Partial<PipelineConfig>;

// Environment variable → config key. Values are coerced by the schema.
const ENV_KEYS: Record<string, keyof PipelineConfig> = {
  PIPELINE_CONCURRENCY: 'concurrency',
  PIPELINE_MAX_QUERIES: 'maxQueries',
  PIPELINE_RESULTS_PER_QUERY: 'resultsPerQuery',
  PIPELINE_SEARCH_TIMEOUT_MS: 'searchTimeoutMs',
  PIPELINE_SCRAPE_TIMEOUT_MS: 'scrapeTimeoutMs',
  PIPELINE_CONTEXT_BUDGET: 'contextBudget',
  PIPELINE_MIN_CONFIDENCE: 'minConfidence',
  PIPELINE_MAX_PHASE_RETRIES: 'maxPhaseRetries',
  PIPELINE_LLM_TIMEOUT_MS: 'llmTimeoutMs',
  PIPELINE_RUN_TIMEOUT_MS: 'runTimeoutMs',
  ANTHROPIC_MODEL: 'model',
};

function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, string | number> {
  const overrides: Record<string, string | number> = {};
  for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
    const raw = env[envKey];
    if (raw === undefined || raw.trim() === '') continue;
    const value = raw.trim();
    overrides[configKey] = configKey === 'model' ? value : Number(value);
  }
  return overrides;
}

/**
 * Resolve the effective config: defaults < environment < explicit overrides.
 * Throws ConfigurationError listing every invalid key.
 */
export function resolvePipelineConfig(
  overrides: PipelineConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): PipelineConfig {
  const merged = { ...PIPELINE_DEFAULTS, ...readEnvOverrides(env), ...overrides };
  const parsed = PipelineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'config'}: ${i.message}`);
    throw new ConfigurationError(issues);
  }
  return parsed.data;
}
