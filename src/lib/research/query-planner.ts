// Query Planner: deterministic search plan from business input
//
// Five categories, each a handful of templates. Categories are merged
// round-robin so the cap trims evenly, duplicates are dropped case-insensitively,
// and a thin input (no industry) falls back to a reduced generic plan instead
// of failing.

import industryKeywordsJson from './data/industry-keywords.json';
import stopwordsJson from './data/stopwords.json';
import { z } from 'zod';
import { MAX_QUERIES_CEILING } from '../config';
import type { BusinessInput, PlannedQuery, QueryCategory, QueryPlan } from '../types';
import { QUERY_CATEGORIES } from '../types';

const INDUSTRY_KEYWORDS = z.record(z.array(z.string())).parse(industryKeywordsJson);
const STOPWORDS = new Set(z.array(z.string()).parse(stopwordsJson));

// ── Templates ───────────────────────────────────────────────────────

const CATEGORY_TEMPLATES: Record<QueryCategory, string[]> = {
  market_size: [
    '{industry} market size {year} {nextYear} forecast',
    '{industry} TAM total addressable market {model}',
    '{industry} market growth rate CAGR projections',
    '{industry} market size {geography}',
    '{industry} industry analysis report {year}',
  ],
  segments: [
    '{industry} customer segments {model} buyers',
    '{model} {industry} target audience demographics',
    '{industry} buyer personas decision makers',
    '{industry} customer pain points challenges',
    '{target} {industry} needs buying behavior',
  ],
  competitors: [
    '{company} competitors alternatives {industry}',
    'top {industry} companies {model} leaders',
    '{industry} startup funding rounds investments {year}',
    '{industry} market share competitive landscape',
    '{competitor} pricing positioning {industry}',
  ],
  trends: [
    '{industry} industry trends {year} {nextYear} predictions',
    '{industry} regulatory changes compliance {geography}',
    '{industry} technology adoption digital transformation',
    '{industry} market opportunities unmet needs',
    '{industry} industry challenges barriers to entry',
  ],
  research: [
    '{industry} market research study analysis',
    '{model} {industry} ROI case studies',
    '{industry} consumer behavior research',
    '{target} survey {industry} {year}',
  ],
};

// Used when there is no industry to anchor tailored templates
const GENERIC_TEMPLATES: Record<QueryCategory, string[]> = {
  market_size: ['{subject} market size {year}'],
  segments: ['{subject} customer segments'],
  competitors: ['{subject} competitors'],
  trends: ['{subject} trends {year}'],
  research: ['{subject} market research'],
};

const MAX_COMPETITOR_EXPANSIONS = 2;
const DEFAULT_SUBJECT = 'small business';

type TokenValues = Record<string, string>;

// ── Helpers ─────────────────────────────────────────────────────────

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function modelToken(model: BusinessInput['businessModel']): string {
  return model === 'Both' ? 'B2B B2C' : model;
}

/** Fill a template; null when any token it uses has no value. */
function fillTemplate(template: string, values: TokenValues): string | null {
  let missing = false;
  const filled = template.replace(/\{(\w+)\}/g, (_, token: string) => {
    const value = values[token];
    if (!value) {
      missing = true;
      return '';
    }
    return value;
  });
  return missing ? null : collapse(filled);
}

function expandCategory(templates: string[], values: TokenValues, competitors: string[]): string[] {
  const out: string[] = [];
  for (const template of templates) {
    if (template.includes('{competitor}')) {
      for (const competitor of competitors.slice(0, MAX_COMPETITOR_EXPANSIONS)) {
        const q = fillTemplate(template, { ...values, competitor });
        if (q) out.push(q);
      }
      continue;
    }
    const q = fillTemplate(template, values);
    if (q) out.push(q);
  }
  return out;
}

/** Round-robin across categories, dedupe case-insensitively, cap. */
function mergeRoundRobin(perCategory: Array<[QueryCategory, string[]]>, cap: number): PlannedQuery[] {
  const seen = new Set<string>();
  const merged: PlannedQuery[] = [];
  const longest = Math.max(0, ...perCategory.map(([, qs]) => qs.length));

  for (let i = 0; i < longest && merged.length < cap; i++) {
    for (const [category, queries] of perCategory) {
      if (merged.length >= cap) break;
      const query = queries[i];
      if (query === undefined) continue;
      const key = query.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      merged.push({ query, category });
    }
  }
  return merged;
}

function containsPhrase(text: string, phrase: string): boolean {
  const escaped = phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`\\b${escaped}\\b`, 'i').test(text);
}

function significantWords(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9+-]+/)
    .filter(w => w.length > 2 && !STOPWORDS.has(w));
}

// ── Relevance terms ─────────────────────────────────────────────────

export function deriveRelevanceTerms(input: BusinessInput): string[] {
  const terms: string[] = [];
  const add = (t: string | undefined) => {
    const term = t ? collapse(t.toLowerCase()) : '';
    if (term && !STOPWORDS.has(term) && !terms.includes(term)) terms.push(term);
  };

  const industry = collapse(input.industry).toLowerCase();
  if (industry) {
    add(industry);
    significantWords(industry).forEach(add);

    for (const [key, keywords] of Object.entries(INDUSTRY_KEYWORDS)) {
      const matches = containsPhrase(industry, key) || keywords.slice(0, 3).some(k => containsPhrase(industry, k));
      if (matches) keywords.forEach(add);
    }
  }

  significantWords(input.targetDescription ?? '').forEach(add);
  input.geography.forEach(add);
  input.knownCompetitors.forEach(add);
  input.b2b?.targetIndustries.forEach(add);

  return terms;
}

// ── Plan ────────────────────────────────────────────────────────────

export interface PlannerOptions {
  maxQueries: number;
  referenceDate: Date;
}

export function planQueries(input: BusinessInput, options: PlannerOptions): QueryPlan {
  const cap = Math.max(1, Math.min(options.maxQueries, MAX_QUERIES_CEILING));
  const year = options.referenceDate.getUTCFullYear();
  const industry = collapse(input.industry);
  const target = collapse(input.targetDescription ?? '');
  const competitors = input.knownCompetitors.map(collapse).filter(Boolean);

  const values: TokenValues = {
    industry,
    model: modelToken(input.businessModel),
    geography: input.geography.map(collapse).filter(Boolean).join(' '),
    target,
    company: collapse(input.companyName ?? ''),
    year: String(year),
    nextYear: String(year + 1),
  };

  const degraded = industry === '';
  let perCategory: Array<[QueryCategory, string[]]>;

  if (degraded) {
    const fromDescription = significantWords(input.description ?? '').slice(0, 4).join(' ');
    const subject = target || fromDescription || collapse(input.companyName ?? '') || DEFAULT_SUBJECT;
    perCategory = QUERY_CATEGORIES.map((c): [QueryCategory, string[]] => [
      c,
      expandCategory(GENERIC_TEMPLATES[c], { ...values, subject }, []),
    ]);
    console.warn(`[Planner] No industry given, using generic plan for "${subject}"`);
  } else {
    perCategory = QUERY_CATEGORIES.map((c): [QueryCategory, string[]] => [
      c,
      expandCategory(CATEGORY_TEMPLATES[c], values, competitors),
    ]);
  }

  const queries = mergeRoundRobin(perCategory, cap);
  const relevanceTerms = deriveRelevanceTerms(input);

  console.log(`[Planner] ${queries.length} queries across ${QUERY_CATEGORIES.length} categories${degraded ? ' (degraded)' : ''}`);

  return { queries, degraded, relevanceTerms };
}
