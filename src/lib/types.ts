// Core types for the segmentation research pipeline

import type { PhaseOutputs } from './phases/schemas';

// ── Business input (questionnaire answers) ──────────────────────────

export type BusinessModel = 'B2B' | 'B2C' | 'Both';

export interface B2BProfile {
  targetCompanySizes: string[];
  targetIndustries: string[];
  dealSizeRange?: string;
  salesCycleLength?: string;
  decisionMakerRoles: string[];
  painPoints: string[];
}

export interface B2CProfile {
  targetAgeGroups: string[];
  incomeBrackets: string[];
  productCategory?: string;
  purchaseFrequency?: string;
  customerMotivations: string[];
}

export interface BusinessInput {
  companyName?: string;
  industry: string;
  businessModel: BusinessModel;
  description?: string;
  targetDescription?: string;
  geography: string[];
  knownCompetitors: string[];
  b2b?: B2BProfile;
  b2c?: B2CProfile;
}

// Pre-extracted text from uploaded documents
export interface DocumentContext {
  text: string;
  fileNames: string[];
  stats: {
    fileCount: number;
    totalChars: number;
    dataPoints: number;
  };
}

// ── Query plan ──────────────────────────────────────────────────────

export const QUERY_CATEGORIES = ['market_size', 'segments', 'competitors', 'trends', 'research'] as const;
export type QueryCategory = typeof QUERY_CATEGORIES[number];

export interface PlannedQuery {
  query: string;
  category: QueryCategory;
}

export interface QueryPlan {
  queries: PlannedQuery[];
  /** True when the input was too thin for tailored templates */
  degraded: boolean;
  /** Terms the scorer matches against source text */
  relevanceTerms: string[];
}

// ── Sources ─────────────────────────────────────────────────────────

export type ContentType =
  | 'academic_paper'
  | 'industry_report'
  | 'news'
  | 'blog'
  | 'social'
  | 'government'
  | 'other';

export type SourceTier = 1 | 2 | 3 | 4;

export type ContentOrigin = 'scraped' | 'snippet' | 'document';

/** Unscored source as produced by the retriever. */
export interface SourceDraft {
  url: string;
  normalizedUrl: string;
  title: string;
  rawText: string;
  snippet: string;
  publishedDate?: string; // ISO date, when known
  domain: string;
  organization?: string;
  categories: QueryCategory[];
  contentOrigin: ContentOrigin;
}

/** Scored, frozen source. Identity is normalizedUrl. */
export interface SourceRecord extends Readonly<Omit<SourceDraft, 'categories'>> {
  readonly categories: readonly QueryCategory[];
  readonly contentType: ContentType;
  readonly tier: SourceTier;
  readonly domainAuthorityScore: number;
  readonly relevanceScore: number;
  readonly recencyScore: number;
  readonly confidenceScore: number;
}

export interface RetrievalStats {
  queriesIssued: number;
  queriesFailed: number;
  fallbackQueries: number;
  scrapesAttempted: number;
  scrapesSucceeded: number;
  scrapesFailed: number;
  /** Hits with no usable URL, or a failed scrape and a blank snippet */
  itemsDropped: number;
  uniqueSources: number;
}

export interface RetrievalResult {
  drafts: SourceDraft[];
  stats: RetrievalStats;
}

// ── Aggregated context ──────────────────────────────────────────────

export interface ContextBlock {
  citationId: number;
  record: SourceRecord;
  excerpt: string;
  text: string;
}

export interface DataQualitySummary {
  qualifyingSources: number;
  authoritativeRatio: number; // tier 1-2 share of selected blocks
  recentRatio: number;        // recency >= 0.85 share of selected blocks
  scrapedRatio: number;       // full-page share of selected blocks
}

export interface AggregatedContext {
  blocks: ContextBlock[];
  text: string;
  totalChars: number;
  budget: number;
  bibliography: Record<number, string>;
  insufficientData: boolean;
  quality: DataQualitySummary;
}

// ── Phases ──────────────────────────────────────────────────────────

export const PHASE_NAMES = [
  'market_landscape',
  'competitive_intel',
  'segment_identification',
  'persona_development',
  'strategy_development',
] as const;
export type PhaseName = typeof PHASE_NAMES[number];

export type PhaseConfidence = 'high' | 'medium' | 'low';

export type PhaseFlag =
  | 'fallback_used'
  | 'insufficient_context'
  | 'data_implausible'
  | 'unknown_citations'
  | 'no_citations'
  | 'degraded_predecessor';

export interface NumericAdjustment {
  field: string;
  original: number;
  adjusted: number;
  reason: string;
}

export interface PhaseResultFor<P extends PhaseName> {
  phase: P;
  status: 'success' | 'fallback';
  rawOutput: string;
  parsedFields: PhaseOutputs[P];
  citationsUsed: number[];
  elapsedMs: number;
  retryCount: number;
  confidence: PhaseConfidence;
  flags: PhaseFlag[];
  adjustments: NumericAdjustment[];
}

export type PhaseResult = { [P in PhaseName]: PhaseResultFor<P> }[PhaseName];

export function isPhaseResult<P extends PhaseName>(
  result: PhaseResult,
  phase: P,
): result is Extract<PhaseResult, { phase: P }> {
  return result.phase === phase;
}

// ── Pipeline output ─────────────────────────────────────────────────

export interface PipelineResult {
  phaseResults: PhaseResult[];
  context: AggregatedContext;
  plan: QueryPlan;
  retrieval: RetrievalStats;
  elapsedMs: number;
}
