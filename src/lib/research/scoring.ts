// Quality Scorer
//
// Deterministic per-source scoring: identical (draft, context) always produces
// an identical record. The reference date is part of the context so recency does
// not depend on the wall clock.
//
//   confidence = 0.30 × authority/100
//              + 0.20 × tierScore
//              + 0.30 × relevance
//              + 0.20 × recency
//   × 0.8 when only the search snippet was available

import type { SourceDraft, SourceRecord } from '../types';
import {
  classifyContentType,
  classifyTier,
  domainAuthority,
  domainOrganization,
  TIER_SCORES,
} from './tiering';

export const CONFIDENCE_WEIGHTS = {
  authority: 0.3,
  tier: 0.2,
  relevance: 0.3,
  recency: 0.2,
} as const;

export const SNIPPET_PENALTY = 0.8;

export interface ScoringContext {
  relevanceTerms: string[];
  referenceDate: Date;
}

const YEAR_MS = 365.25 * 24 * 60 * 60 * 1000;

// ── Recency ─────────────────────────────────────────────────────────

/** Latest plausible four-digit year in a title, as a mid-year date. */
function yearFromTitle(title: string, referenceDate: Date): Date | undefined {
  const years = (title.match(/\b(19|20)\d{2}\b/g) || [])
    .map(Number)
    .filter(y => y <= referenceDate.getUTCFullYear() + 1);
  if (years.length === 0) return undefined;
  return new Date(Date.UTC(Math.max(...years), 6, 1));
}

export function publicationDate(draft: Pick<SourceDraft, 'publishedDate' | 'title'>, referenceDate: Date): Date | undefined {
  if (draft.publishedDate) {
    const parsed = new Date(draft.publishedDate);
    if (!Number.isNaN(parsed.getTime())) return parsed;
  }
  return yearFromTitle(draft.title, referenceDate);
}

export function recencyScore(published: Date | undefined, referenceDate: Date): number {
  if (!published) return 0.5;
  const ageYears = Math.max(0, referenceDate.getTime() - published.getTime()) / YEAR_MS;
  if (ageYears <= 1) return 1.0;
  if (ageYears <= 2) return 0.85;
  if (ageYears <= 3) return 0.6;
  if (ageYears <= 5) return 0.4;
  return 0.2;
}

// ── Relevance ───────────────────────────────────────────────────────

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Fraction of distinct terms present (whole word, case-insensitive). */
export function relevanceScore(text: string, terms: string[]): number {
  const distinct = Array.from(new Set(terms.map(t => t.trim().toLowerCase()).filter(Boolean)));
  if (distinct.length === 0) return 0.5;

  const haystack = text.toLowerCase();
  let hits = 0;
  for (const term of distinct) {
    if (new RegExp(`\\b${escapeRegex(term)}\\b`).test(haystack)) hits++;
  }
  return hits / distinct.length;
}

// ── Record ──────────────────────────────────────────────────────────

function round4(n: number): number {
  return Math.round(n * 10_000) / 10_000;
}

export function scoreSource(draft: SourceDraft, ctx: ScoringContext): SourceRecord {
  const contentType = classifyContentType(draft.url, draft.domain, draft.title);
  const tier = classifyTier(draft.domain, contentType);
  const authority = domainAuthority(draft.domain);
  const relevance = round4(relevanceScore(`${draft.title}\n${draft.rawText}`, ctx.relevanceTerms));
  const recency = recencyScore(publicationDate(draft, ctx.referenceDate), ctx.referenceDate);

  const weighted =
    CONFIDENCE_WEIGHTS.authority * (authority / 100) +
    CONFIDENCE_WEIGHTS.tier * TIER_SCORES[tier] +
    CONFIDENCE_WEIGHTS.relevance * relevance +
    CONFIDENCE_WEIGHTS.recency * recency;
  const confidence = round4(draft.contentOrigin === 'snippet' ? weighted * SNIPPET_PENALTY : weighted);

  return Object.freeze({
    ...draft,
    categories: Object.freeze([...draft.categories]),
    organization: draft.organization ?? domainOrganization(draft.domain),
    contentType,
    tier,
    domainAuthorityScore: authority,
    relevanceScore: relevance,
    recencyScore: recency,
    confidenceScore: confidence,
  });
}

export function scoreSources(drafts: SourceDraft[], ctx: ScoringContext): SourceRecord[] {
  const records = drafts.map(d => scoreSource(d, ctx));

  const byTier = [1, 2, 3, 4].map(t => records.filter(r => r.tier === t).length);
  console.log(`[Scorer] Scored ${records.length} sources (tiers: ${byTier.join('/')})`);

  return records;
}
