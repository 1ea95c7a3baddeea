// Response schemas for the five analysis phases.
//
// Model output is untrusted: it is parsed against these schemas and anything
// that fails becomes a tagged parse error that drives a retry. Ranges are not
// enforced here: out-of-range numbers are clamped and recorded by the numeric
// policy, not rejected.

import { z } from 'zod';
import { parseMarketValue, parsePercent } from '../validators';

// ── Shared field types ──────────────────────────────────────────────

const MarketFigure = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const parsed = parseMarketValue(value);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unparseable market value: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

const Percent = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const parsed = parsePercent(value);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unparseable percentage: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

const StringList = z.array(z.string());

// "[3]", "3" and 3 are all accepted; anything else is dropped
const Citations = z
  .array(z.union([z.number(), z.string()]))
  .default([])
  .transform(ids =>
    ids
      .map(id => (typeof id === 'number' ? id : Number(id.replace(/[^\d]/g, '') || NaN)))
      .filter(id => Number.isInteger(id) && id > 0),
  );

// ── Phase 1: Market landscape ───────────────────────────────────────

export const MarketLandscapeSchema = z.object({
  summary: z.string().min(1),
  marketSizeUsdMillions: MarketFigure.nullable().default(null),
  marketSizeYear: z.number().int().nullish(),
  growthRatePercent: Percent.nullable().default(null),
  keyInsights: StringList.min(1),
  trends: StringList.default([]),
  growthFactors: StringList.default([]),
  urgencies: StringList.default([]),
  citations: Citations,
});

// ── Phase 2: Competitive intelligence ───────────────────────────────

export const CompetitorSchema = z.object({
  name: z.string().min(1),
  positioning: z.string().default(''),
  specialty: z.string().nullish(),
  funding: z.string().nullish(),
  strengths: StringList.default([]),
  weaknesses: StringList.default([]),
  overlapPercent: Percent.nullish(),
});

export const CompetitiveIntelSchema = z.object({
  summary: z.string().min(1),
  competitors: z.array(CompetitorSchema).min(1),
  whiteSpace: StringList.default([]),
  positioningRecommendations: StringList.default([]),
  citations: Citations,
});

// ── Phase 3: Segment identification ─────────────────────────────────

export const SegmentSchema = z.object({
  name: z.string().min(1),
  characteristics: StringList.min(1),
  sizePercent: Percent,
  sizeEstimate: z.string().default(''),
  painPoints: StringList.default([]),
  buyingTriggers: StringList.default([]),
  preferredChannels: StringList.default([]),
  messagingHooks: StringList.default([]),
  useCases: StringList.default([]),
});

export const SegmentIdentificationSchema = z.object({
  segments: z.array(SegmentSchema).min(1),
  citations: Citations,
});

// ── Phase 4: Persona development ────────────────────────────────────

export const PersonaSchema = z.object({
  segment: z.string().min(1),
  name: z.string().min(1),
  description: z.string().min(1),
  demographics: z.record(z.string()).default({}),
  psychographics: StringList.default([]),
  goals: StringList.default([]),
  objections: StringList.default([]),
  roleSpecificPainPoints: z.record(StringList).default({}),
});

export const PersonaDevelopmentSchema = z.object({
  personas: z.array(PersonaSchema).min(1),
  citations: Citations,
});

// ── Phase 5: Strategy development ───────────────────────────────────

export const StrategyDevelopmentSchema = z.object({
  prioritizedSegments: StringList.min(1),
  roadmap: z.object({
    days0to30: StringList.min(1),
    days30to60: StringList.min(1),
    days60to90: StringList.min(1),
  }),
  quickWins: StringList.default([]),
  successMetrics: StringList.default([]),
  messagingPillars: StringList.default([]),
  citations: Citations,
});

// ── Registry ────────────────────────────────────────────────────────

export const PHASE_SCHEMAS = {
  market_landscape: MarketLandscapeSchema,
  competitive_intel: CompetitiveIntelSchema,
  segment_identification: SegmentIdentificationSchema,
  persona_development: PersonaDevelopmentSchema,
  strategy_development: StrategyDevelopmentSchema,
} as const;

export type PhaseOutputs = { [P in keyof typeof PHASE_SCHEMAS]: z.infer<typeof PHASE_SCHEMAS[P]> };

export type MarketLandscape = PhaseOutputs['market_landscape'];
export type CompetitiveIntel = PhaseOutputs['competitive_intel'];
export type SegmentIdentification = PhaseOutputs['segment_identification'];
export type PersonaDevelopment = PhaseOutputs['persona_development'];
export type StrategyDevelopment = PhaseOutputs['strategy_development'];
export type Segment = z.infer<typeof SegmentSchema>;
export type Competitor = z.infer<typeof CompetitorSchema>;
export type Persona = z.infer<typeof PersonaSchema>;
