// Shared builders and in-process collaborator fakes for tests.

import type { LlmCollaborator, LlmRequest } from '../anthropic';
import { ProviderUnavailableError } from '../errors';
import { PHASE_DEFINITIONS } from '../phases/definitions';
import { extractDomain, normalizeUrl } from '../research/dedup';
import type { ScrapeProvider, ScrapeResult, SearchHit, SearchProvider, SearchRequest } from '../research/tools';
import type { BusinessInput, PhaseName, SourceDraft } from '../types';
import { PHASE_NAMES } from '../types';

export const REFERENCE_DATE = new Date('2026-03-01T00:00:00Z');

export function makeInput(overrides: Partial<BusinessInput> = {}): BusinessInput {
  return {
    companyName: 'HireCo',
    industry: 'Recruitment software',
    businessModel: 'B2B',
    description: 'Applicant tracking for growing teams',
    targetDescription: 'mid-market HR teams',
    geography: ['United States'],
    knownCompetitors: ['Greenhouse', 'Lever'],
    ...overrides,
  };
}

export function makeDraft(url: string, overrides: Partial<SourceDraft> = {}): SourceDraft {
  return {
    url,
    normalizedUrl: normalizeUrl(url),
    title: `Page at ${url}`,
    rawText: 'Placeholder text.',
    snippet: 'Placeholder text.',
    domain: extractDomain(url),
    categories: ['research'],
    contentOrigin: 'scraped',
    ...overrides,
  };
}

/** Prose of roughly `chars` characters built from numbered sentences. */
export function filler(label: string, chars: number): string {
  const sentences: string[] = [];
  let length = 0;
  for (let i = 1; length < chars; i++) {
    const sentence = `${label} sentence number ${i} adds evidence about recruitment hiring demand.`;
    sentences.push(sentence);
    length += sentence.length + 1;
  }
  return sentences.join(' ');
}

// ── Search / scrape fakes ───────────────────────────────────────────

export type SearchBehavior = SearchHit[] | Error | ((request: SearchRequest) => SearchHit[] | Promise<SearchHit[]>);

export class FakeSearchProvider implements SearchProvider {
  readonly calls: SearchRequest[] = [];

  constructor(
    readonly name: string,
    private readonly behavior: (request: SearchRequest) => SearchBehavior,
  ) {}

  async search(request: SearchRequest): Promise<SearchHit[]> {
    this.calls.push(request);
    const outcome = this.behavior(request);
    if (outcome instanceof Error) throw outcome;
    if (typeof outcome === 'function') return outcome(request);
    return outcome;
  }
}

export function timeoutError(provider = 'fake-search'): ProviderUnavailableError {
  return new ProviderUnavailableError({ provider, reason: 'timeout', message: `${provider} timed out` });
}

export class FakeScraper implements ScrapeProvider {
  readonly urls: string[] = [];

  constructor(private readonly pages: Record<string, string> = {}) {}

  async scrape({ url }: { url: string }): Promise<ScrapeResult> {
    this.urls.push(url);
    const text = this.pages[url];
    return text ? { success: true, text } : { success: false, text: '', error: 'HTTP 404' };
  }
}

// ── LLM fake ────────────────────────────────────────────────────────

/** Replies per system prompt: each call takes the next scripted reply for that phase. */
export class ScriptedLlm implements LlmCollaborator {
  readonly requests: LlmRequest[] = [];
  private readonly queues = new Map<string, Array<string | Error>>();

  constructor(private readonly fallbackReply: (request: LlmRequest) => string = () => 'not json') {}

  script(systemPrompt: string, replies: Array<string | Error>): this {
    this.queues.set(systemPrompt, [...replies]);
    return this;
  }

  async complete(request: LlmRequest): Promise<string> {
    this.requests.push(request);
    const next = this.queues.get(request.system)?.shift();
    if (next instanceof Error) throw next;
    return next ?? this.fallbackReply(request);
  }
}

// ── Phase replies ───────────────────────────────────────────────────

const PHASE_REPLIES: Record<PhaseName, Record<string, unknown>> = {
  market_landscape: {
    summary: 'Recruitment software spend keeps growing [1].',
    marketSizeUsdMillions: 3200,
    marketSizeYear: 2025,
    growthRatePercent: 9.5,
    keyInsights: ['Mid-market adoption leads growth [1]'],
    trends: ['Automated screening [2]'],
    growthFactors: ['Tight labor markets'],
    urgencies: ['Hiring freezes are ending'],
    citations: [1, 2],
  },
  competitive_intel: {
    summary: 'Two incumbents dominate mid-market hiring [1].',
    competitors: [
      {
        name: 'Greenhouse',
        positioning: 'Structured hiring for scaling teams',
        strengths: ['Integrations'],
        weaknesses: ['Price'],
        overlapPercent: 70,
      },
    ],
    whiteSpace: ['Hourly hiring'],
    positioningRecommendations: ['Lead on time-to-hire'],
    citations: [1],
  },
  segment_identification: {
    segments: [
      {
        name: 'Scaling tech firms',
        characteristics: ['50-500 employees'],
        sizePercent: 45,
        sizeEstimate: 'about 8,000 firms',
        painPoints: ['Slow hiring'],
        buyingTriggers: ['New funding round'],
        preferredChannels: ['LinkedIn'],
        messagingHooks: ['Hire faster'],
        useCases: ['Engineering hiring'],
      },
      {
        name: 'Regional healthcare groups',
        characteristics: ['Multi-site operators'],
        sizePercent: 35,
        sizeEstimate: 'about 2,000 groups',
        painPoints: ['Nurse shortages'],
        buyingTriggers: ['New site openings'],
        preferredChannels: ['Trade events'],
        messagingHooks: ['Fill shifts sooner'],
        useCases: ['Clinical hiring'],
      },
    ],
    citations: [1],
  },
  persona_development: {
    personas: [
      {
        segment: 'Scaling tech firms',
        name: 'Talent lead Tara',
        description: 'Owns the hiring plan for a growing engineering team [1].',
        demographics: { role: 'Head of Talent' },
        psychographics: ['Data-driven'],
        goals: ['Fill roles within 30 days'],
        objections: ['Migration effort'],
        roleSpecificPainPoints: {},
      },
    ],
    citations: [1],
  },
  strategy_development: {
    prioritizedSegments: ['Scaling tech firms', 'Regional healthcare groups'],
    roadmap: {
      days0to30: ['Launch a LinkedIn campaign for scaling tech firms'],
      days30to60: ['Run a healthcare pilot'],
      days60to90: ['Scale partner referrals'],
    },
    quickWins: ['Publish a time-to-hire benchmark'],
    successMetrics: ['Demo requests by segment'],
    messagingPillars: ['Speed'],
    citations: [1],
  },
};

/** A valid JSON reply for a phase, with selected fields replaced. */
export function phaseReply(phase: PhaseName, overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({ ...PHASE_REPLIES[phase], ...overrides });
}

export function phaseForSystemPrompt(system: string): PhaseName | undefined {
  return PHASE_NAMES.find(phase => PHASE_DEFINITIONS[phase].systemPrompt === system);
}

/** LLM that answers every phase correctly unless scripted otherwise. */
export function validLlm(): ScriptedLlm {
  return new ScriptedLlm(request => {
    const phase = phaseForSystemPrompt(request.system);
    return phase ? phaseReply(phase) : 'not json';
  });
}
