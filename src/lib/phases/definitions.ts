// Phase registry
//
// One definition per phase: what it depends on, which slice of the research
// context it reads, how it is prompted and validated, what replaces it when
// the model cannot produce a valid answer, and which numbers get bounded.

import type { z } from 'zod';
import {
  COMPETITIVE_INTEL_RESPONSE_SHAPE,
  COMPETITIVE_INTEL_SYSTEM_PROMPT,
  buildCompetitiveIntelInstructions,
} from '../prompts/competitive-intel-prompt';
import {
  MARKET_LANDSCAPE_RESPONSE_SHAPE,
  MARKET_LANDSCAPE_SYSTEM_PROMPT,
  buildMarketLandscapeInstructions,
} from '../prompts/market-landscape-prompt';
import {
  PERSONA_DEVELOPMENT_RESPONSE_SHAPE,
  PERSONA_DEVELOPMENT_SYSTEM_PROMPT,
  buildPersonaDevelopmentInstructions,
} from '../prompts/persona-development-prompt';
import {
  SEGMENT_IDENTIFICATION_RESPONSE_SHAPE,
  SEGMENT_IDENTIFICATION_SYSTEM_PROMPT,
  buildSegmentIdentificationInstructions,
} from '../prompts/segment-identification-prompt';
import {
  STRATEGY_DEVELOPMENT_RESPONSE_SHAPE,
  STRATEGY_DEVELOPMENT_SYSTEM_PROMPT,
  buildStrategyDevelopmentInstructions,
} from '../prompts/strategy-development-prompt';
import type { BusinessInput, NumericAdjustment, PhaseName, QueryCategory } from '../types';
import { QUERY_CATEGORIES } from '../types';
import {
  boundGrowthRate,
  boundMarketSize,
  boundPercentage,
  type PlausibilityBounds,
} from '../validators';
import {
  fallbackCompetitiveIntel,
  fallbackMarketLandscape,
  fallbackPersonaDevelopment,
  fallbackSegmentIdentification,
  fallbackStrategyDevelopment,
  type PriorOutputs,
} from './fallbacks';
import { PHASE_SCHEMAS, type PhaseOutputs } from './schemas';

export interface NumericPolicyResult<T> {
  data: T;
  adjustments: NumericAdjustment[];
}

export interface PhaseDefinition<P extends PhaseName> {
  phase: P;
  label: string;
  dependsOn: readonly PhaseName[];
  contextCategories: readonly QueryCategory[];
  systemPrompt: string;
  responseShape: string;
  buildInstructions: (input: BusinessInput) => string;
  schema: z.ZodType<PhaseOutputs[P], z.ZodTypeDef, unknown>;
  fallback: (input: BusinessInput, prior: PriorOutputs) => PhaseOutputs[P];
  applyNumericPolicy?: (
    data: PhaseOutputs[P],
    bounds: PlausibilityBounds,
    industry: string,
  ) => NumericPolicyResult<PhaseOutputs[P]>;
}

export type PhaseDefinitions = { [P in PhaseName]: PhaseDefinition<P> };

// ── Numeric policies ────────────────────────────────────────────────

function boundMarketLandscape(
  data: PhaseOutputs['market_landscape'],
  bounds: PlausibilityBounds,
  industry: string,
): NumericPolicyResult<PhaseOutputs['market_landscape']> {
  const adjustments: NumericAdjustment[] = [];
  let { growthRatePercent, marketSizeUsdMillions } = data;

  if (growthRatePercent !== null) {
    const bounded = boundGrowthRate(growthRatePercent, bounds);
    growthRatePercent = bounded.value;
    if (bounded.adjustment) adjustments.push(bounded.adjustment);
  }
  if (marketSizeUsdMillions !== null) {
    const bounded = boundMarketSize(marketSizeUsdMillions, bounds, industry);
    marketSizeUsdMillions = bounded.value;
    if (bounded.adjustment) adjustments.push(bounded.adjustment);
  }

  return { data: { ...data, growthRatePercent, marketSizeUsdMillions }, adjustments };
}

function boundCompetitorOverlap(
  data: PhaseOutputs['competitive_intel'],
): NumericPolicyResult<PhaseOutputs['competitive_intel']> {
  const adjustments: NumericAdjustment[] = [];
  const competitors = data.competitors.map((competitor, i) => {
    if (competitor.overlapPercent === null || competitor.overlapPercent === undefined) return competitor;
    const bounded = boundPercentage(competitor.overlapPercent, `competitors[${i}].overlapPercent`);
    if (bounded.adjustment) adjustments.push(bounded.adjustment);
    return { ...competitor, overlapPercent: bounded.value };
  });
  return { data: { ...data, competitors }, adjustments };
}

function boundSegmentShares(
  data: PhaseOutputs['segment_identification'],
): NumericPolicyResult<PhaseOutputs['segment_identification']> {
  const adjustments: NumericAdjustment[] = [];
  const segments = data.segments.map((segment, i) => {
    const bounded = boundPercentage(segment.sizePercent, `segments[${i}].sizePercent`);
    if (bounded.adjustment) adjustments.push(bounded.adjustment);
    return { ...segment, sizePercent: bounded.value };
  });
  return { data: { ...data, segments }, adjustments };
}

// ── Registry ────────────────────────────────────────────────────────

export const PHASE_DEFINITIONS: PhaseDefinitions = {
  market_landscape: {
    phase: 'market_landscape',
    label: 'Market landscape',
    dependsOn: [],
    contextCategories: ['market_size', 'trends', 'research'],
    systemPrompt: MARKET_LANDSCAPE_SYSTEM_PROMPT,
    responseShape: MARKET_LANDSCAPE_RESPONSE_SHAPE,
    buildInstructions: buildMarketLandscapeInstructions,
    schema: PHASE_SCHEMAS.market_landscape,
    fallback: input => fallbackMarketLandscape(input),
    applyNumericPolicy: boundMarketLandscape,
  },
  competitive_intel: {
    phase: 'competitive_intel',
    label: 'Competitive intelligence',
    dependsOn: ['market_landscape'],
    contextCategories: ['competitors', 'market_size'],
    systemPrompt: COMPETITIVE_INTEL_SYSTEM_PROMPT,
    responseShape: COMPETITIVE_INTEL_RESPONSE_SHAPE,
    buildInstructions: buildCompetitiveIntelInstructions,
    schema: PHASE_SCHEMAS.competitive_intel,
    fallback: input => fallbackCompetitiveIntel(input),
    applyNumericPolicy: data => boundCompetitorOverlap(data),
  },
  segment_identification: {
    phase: 'segment_identification',
    label: 'Segment identification',
    dependsOn: ['market_landscape', 'competitive_intel'],
    contextCategories: ['segments', 'market_size', 'research'],
    systemPrompt: SEGMENT_IDENTIFICATION_SYSTEM_PROMPT,
    responseShape: SEGMENT_IDENTIFICATION_RESPONSE_SHAPE,
    buildInstructions: buildSegmentIdentificationInstructions,
    schema: PHASE_SCHEMAS.segment_identification,
    fallback: input => fallbackSegmentIdentification(input),
    applyNumericPolicy: data => boundSegmentShares(data),
  },
  persona_development: {
    phase: 'persona_development',
    label: 'Persona development',
    dependsOn: ['segment_identification'],
    contextCategories: ['segments', 'research'],
    systemPrompt: PERSONA_DEVELOPMENT_SYSTEM_PROMPT,
    responseShape: PERSONA_DEVELOPMENT_RESPONSE_SHAPE,
    buildInstructions: buildPersonaDevelopmentInstructions,
    schema: PHASE_SCHEMAS.persona_development,
    fallback: fallbackPersonaDevelopment,
  },
  strategy_development: {
    phase: 'strategy_development',
    label: 'Strategy development',
    dependsOn: ['market_landscape', 'competitive_intel', 'segment_identification', 'persona_development'],
    contextCategories: QUERY_CATEGORIES,
    systemPrompt: STRATEGY_DEVELOPMENT_SYSTEM_PROMPT,
    responseShape: STRATEGY_DEVELOPMENT_RESPONSE_SHAPE,
    buildInstructions: buildStrategyDevelopmentInstructions,
    schema: PHASE_SCHEMAS.strategy_development,
    fallback: fallbackStrategyDevelopment,
  },
};
