// Template fallbacks, substituted once a phase has exhausted its retries.
//
// They carry no figures and cite nothing: everything here is derived from the
// questionnaire answers and from whatever earlier phases produced, so later
// phases still have something coherent to build on.

import type { BusinessInput } from '../types';
import type {
  CompetitiveIntel,
  MarketLandscape,
  PersonaDevelopment,
  PhaseOutputs,
  Segment,
  SegmentIdentification,
  StrategyDevelopment,
} from './schemas';

export type PriorOutputs = Partial<PhaseOutputs>;

const PENDING = 'Analysis pending';

function subjectOf(input: BusinessInput): string {
  return input.industry.trim() || input.targetDescription?.trim() || 'this market';
}

function knownPainPoints(input: BusinessInput): string[] {
  const points = [...(input.b2b?.painPoints ?? []), ...(input.b2c?.customerMotivations ?? [])];
  return points.map(p => p.trim()).filter(Boolean);
}

// ── Phase 1 ─────────────────────────────────────────────────────────

export function fallbackMarketLandscape(input: BusinessInput): MarketLandscape {
  const subject = subjectOf(input);
  return {
    summary: `Market analysis for ${subject} could not be completed from the available research. Figures are omitted rather than estimated.`,
    marketSizeUsdMillions: null,
    marketSizeYear: null,
    growthRatePercent: null,
    keyInsights: [`Validate the size and growth of the ${subject} market with primary research before committing budget.`],
    trends: [],
    growthFactors: [],
    urgencies: [],
    citations: [],
  };
}

// ── Phase 2 ─────────────────────────────────────────────────────────

export function fallbackCompetitiveIntel(input: BusinessInput): CompetitiveIntel {
  const named = input.knownCompetitors.map(c => c.trim()).filter(Boolean);
  const competitors = named.length > 0
    ? named.map(name => ({
        name,
        positioning: PENDING,
        specialty: null,
        funding: null,
        strengths: [],
        weaknesses: [],
        overlapPercent: null,
      }))
    : [{
        name: 'Unidentified competitors',
        positioning: PENDING,
        specialty: null,
        funding: null,
        strengths: [],
        weaknesses: [],
        overlapPercent: null,
      }];

  return {
    summary: `Competitive analysis for ${subjectOf(input)} could not be completed. Listed competitors come from the questionnaire and have not been profiled.`,
    competitors,
    whiteSpace: [],
    positioningRecommendations: [],
    citations: [],
  };
}

// ── Phase 3 ─────────────────────────────────────────────────────────

const FALLBACK_SEGMENTS: Array<Pick<Segment, 'name' | 'sizePercent' | 'preferredChannels' | 'messagingHooks'>> = [
  { name: 'Primary Market Segment', sizePercent: 40, preferredChannels: ['Digital channels'], messagingHooks: ['Value-focused messaging'] },
  { name: 'Secondary Market Segment', sizePercent: 30, preferredChannels: ['Traditional channels'], messagingHooks: ['Feature-focused messaging'] },
  { name: 'Tertiary Market Segment', sizePercent: 30, preferredChannels: ['Social media'], messagingHooks: ['Benefit-focused messaging'] },
];

export function fallbackSegmentIdentification(input: BusinessInput): SegmentIdentification {
  const painPoints = knownPainPoints(input);
  const target = input.targetDescription?.trim();

  return {
    segments: FALLBACK_SEGMENTS.map(base => ({
      ...base,
      characteristics: [target ? `Drawn from: ${target}` : 'Analysis in progress'],
      sizeEstimate: 'Segment analysis pending',
      painPoints: painPoints.length > 0 ? painPoints : [PENDING],
      buyingTriggers: [PENDING],
      useCases: [PENDING],
    })),
    citations: [],
  };
}

// ── Phase 4 ─────────────────────────────────────────────────────────

export function fallbackPersonaDevelopment(input: BusinessInput, prior: PriorOutputs): PersonaDevelopment {
  const segments = (prior.segment_identification ?? fallbackSegmentIdentification(input)).segments;
  const roles = input.b2b?.decisionMakerRoles.filter(r => r.trim()) ?? [];

  return {
    personas: segments.map((segment): PersonaDevelopment['personas'][number] => ({
      segment: segment.name,
      name: `${segment.name} buyer`,
      description: `Representative buyer in the ${segment.name} segment. Persona research is pending.`,
      demographics: roles.length > 0 ? { role: roles[0] } : {},
      psychographics: [],
      goals: [],
      objections: [],
      roleSpecificPainPoints: Object.fromEntries(roles.map(role => [role, segment.painPoints])),
    })),
    citations: [],
  };
}

// ── Phase 5 ─────────────────────────────────────────────────────────

const BASE_METRICS = [
  'Segment identification accuracy',
  'Message-to-market fit scores',
  'Customer acquisition cost by segment',
  'Conversion rate optimization',
];

const B2B_METRICS = [
  'Sales qualified leads by segment',
  'Sales cycle length reduction',
  'Deal size improvement',
  'Pipeline velocity increase',
];

const B2C_METRICS = [
  'Customer lifetime value by segment',
  'Repeat purchase rate',
  'Average order value',
  'Brand awareness metrics',
];

export function successMetricsFor(model: BusinessInput['businessModel']): string[] {
  if (model === 'B2B') return [...BASE_METRICS, ...B2B_METRICS];
  if (model === 'B2C') return [...BASE_METRICS, ...B2C_METRICS];
  return [...BASE_METRICS, ...B2B_METRICS.slice(0, 2), ...B2C_METRICS.slice(0, 2)];
}

export function fallbackStrategyDevelopment(input: BusinessInput, prior: PriorOutputs): StrategyDevelopment {
  const segments = [...(prior.segment_identification ?? fallbackSegmentIdentification(input)).segments]
    .sort((a, b) => b.sizePercent - a.sizePercent);
  const [first, second] = segments;

  const channel = first.preferredChannels[0] ?? 'digital channels';
  const painPoint = first.painPoints.find(p => p !== PENDING) ?? 'the primary pain point';

  return {
    prioritizedSegments: segments.map(s => s.name),
    roadmap: {
      days0to30: [
        `Focus on the ${first.name} segment, the largest identified opportunity`,
        'Develop a messaging framework for the primary segment',
        'Set up tracking and analytics',
        'Create initial marketing materials',
      ],
      days30to60: [
        `Expand to the ${second?.name ?? 'secondary'} segment`,
        'Test and optimize messaging across channels',
        'Gather customer feedback and iterate',
        'Scale successful campaigns',
      ],
      days60to90: [
        'Roll out to remaining segments',
        'Implement cross-segment strategies',
        'Optimize conversion funnels',
        'Plan for scale and growth',
      ],
    },
    quickWins: [
      `Target ${first.name} through ${channel}`,
      `Address ${painPoint} in messaging`,
      'Implement basic analytics tracking',
      'Create segment-specific landing pages',
      'Set up email nurture sequences',
    ],
    successMetrics: successMetricsFor(input.businessModel),
    messagingPillars: [],
    citations: [],
  };
}
