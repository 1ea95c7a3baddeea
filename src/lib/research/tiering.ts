// Source Tiering: content type and tier classification
// Tier 1: academic, government, major research firms
// Tier 2: industry reports and major business press (and uploaded documents)
// Tier 3: general news, blogs, everything else
// Tier 4: social and unverified
//
// Tier is a pure function of (domain, content type). The domain table lives in
// data/source-domains.json so it can be tuned without touching code.

import { z } from 'zod';
import sourceDomainsJson from './data/source-domains.json';
import type { ContentType, SourceTier } from '../types';

const DomainInfoSchema = z.object({
  organization: z.string(),
  authority: z.number().min(1).max(100),
  kind: z.enum([
    'research_firm',
    'report_vendor',
    'academic',
    'government',
    'major_press',
    'news',
    'blog_platform',
    'social',
  ]),
});

export type DomainInfo = z.infer<typeof DomainInfoSchema>;

const SOURCE_DOMAINS: Record<string, DomainInfo> = z.record(DomainInfoSchema).parse(sourceDomainsJson);

/** Pseudo-domain carried by the uploaded-document source. */
export const DOCUMENT_DOMAIN = 'uploaded-documents';

export const DEFAULT_AUTHORITY = 50;

// ── Domain lookup ───────────────────────────────────────────────────

/** Exact match first, then each parent domain (news.bbc.com → bbc.com). */
export function lookupDomain(domain: string): DomainInfo | undefined {
  const labels = domain.toLowerCase().split('.');
  for (let i = 0; i < labels.length - 1; i++) {
    const candidate = labels.slice(i).join('.');
    const info = SOURCE_DOMAINS[candidate];
    if (info) return info;
  }
  return undefined;
}

const GOV_SUFFIX = /(^|\.)(gov|mil)(\.[a-z]{2})?$/i;
const ACADEMIC_SUFFIX = /(^|\.)edu(\.[a-z]{2})?$|(^|\.)ac\.[a-z]{2}$/i;

export function domainAuthority(domain: string): number {
  const info = lookupDomain(domain);
  let score: number = DEFAULT_AUTHORITY;
  if (info) score = info.authority;
  else if (GOV_SUFFIX.test(domain)) score = 90;
  else if (ACADEMIC_SUFFIX.test(domain)) score = 85;
  return Math.min(100, Math.max(1, score));
}

export function domainOrganization(domain: string): string | undefined {
  if (domain === DOCUMENT_DOMAIN) return 'Uploaded documents';
  const info = lookupDomain(domain);
  if (info) return info.organization;
  const label = domain.split('.')[0];
  if (!label) return undefined;
  return label.charAt(0).toUpperCase() + label.slice(1);
}

// ── Content type ────────────────────────────────────────────────────

const REPORT_PATTERN = /\b(report|whitepaper|white paper|market research|industry analysis|survey results|outlook)\b/i;
const ACADEMIC_PATTERN = /\b(journal|proceedings|doi:)\b/i;
const BLOG_PATH = /\/blogs?(\/|$)|\/posts?\//i;

export function classifyContentType(url: string, domain: string, title: string): ContentType {
  if (domain === DOCUMENT_DOMAIN) return 'industry_report';

  const info = lookupDomain(domain);

  if (info?.kind === 'government' || GOV_SUFFIX.test(domain)) return 'government';
  if (info?.kind === 'academic' || ACADEMIC_SUFFIX.test(domain) || ACADEMIC_PATTERN.test(title)) {
    return 'academic_paper';
  }
  if (info?.kind === 'social') return 'social';
  if (info?.kind === 'research_firm' || info?.kind === 'report_vendor') return 'industry_report';
  if (info?.kind === 'major_press' || info?.kind === 'news') return 'news';
  if (info?.kind === 'blog_platform' || BLOG_PATH.test(url)) return 'blog';
  if (REPORT_PATTERN.test(title)) return 'industry_report';
  return 'other';
}

// ── Tier ────────────────────────────────────────────────────────────

export function classifyTier(domain: string, contentType: ContentType): SourceTier {
  if (domain === DOCUMENT_DOMAIN) return 2;

  const kind = lookupDomain(domain)?.kind;

  switch (contentType) {
    case 'academic_paper':
    case 'government':
      return 1;
    case 'industry_report':
      return kind === 'research_firm' ? 1 : 2;
    case 'news':
      return kind === 'major_press' ? 2 : 3;
    case 'social':
      return 4;
    case 'blog':
    case 'other':
      return 3;
  }
}

/** Tier contribution to the confidence score. */
export const TIER_SCORES: Record<SourceTier, number> = {
  1: 1.0,
  2: 0.75,
  3: 0.5,
  4: 0.25,
};
