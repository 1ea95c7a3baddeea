// Source deduplication
//
// Two passes over the retriever's slot output, both order-preserving:
//   1. URL normalization: strip tracking params, normalize protocol/www/case
//   2. Content fingerprinting: >80% identical scraped text = syndicated copy
// The first-seen draft wins; later duplicates only contribute their category tags.

import type { QueryCategory, SourceDraft } from '../types';

// ── URL normalization ───────────────────────────────────────────────

const TRACKING_PARAMS = new Set([
  'utm_source', 'utm_medium', 'utm_campaign', 'utm_term', 'utm_content',
  'ref', 'fbclid', 'gclid', 'msclkid', 'mc_cid', 'mc_eid',
  'source', 'trk', 'trkInfo',
]);

/** Canonical form used as a source's identity. Unparseable input comes back trimmed. */
export function normalizeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return url.trim();
  }

  const query = new URLSearchParams(
    Array.from(parsed.searchParams).filter(([key]) => !TRACKING_PARAMS.has(key)),
  );
  query.sort();

  const host = parsed.host.toLowerCase().replace(/^www\./, '');
  const path = parsed.pathname.length > 1 ? parsed.pathname.replace(/\/+$/, '') : parsed.pathname;
  const search = query.toString();

  return `https://${host}${path}${search ? `?${search}` : ''}`;
}

export function extractDomain(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return '';
  }
}

// ── Content fingerprinting ──────────────────────────────────────────

const SHINGLE_WORDS = 5;
const FINGERPRINT_MIN_CHARS = 200;
const SIMILARITY_THRESHOLD = 0.8;

/** Set of overlapping 5-word windows over the significant words of a text. */
function fingerprint(text: string): Set<string> {
  const words = text
    .toLowerCase()
    .replace(/[^\w\s]/g, '')
    .split(/\s+/)
    .filter(word => word.length > 2);

  const windows = new Set<string>();
  for (let start = 0; start + SHINGLE_WORDS <= words.length; start++) {
    windows.add(words.slice(start, start + SHINGLE_WORDS).join(' '));
  }
  return windows;
}

function jaccard(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let shared = 0;
  for (const item of a) {
    if (b.has(item)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

/** Jaccard similarity of two texts' shingle sets, 0.0-1.0. */
export function contentSimilarity(text1: string, text2: string): number {
  return jaccard(fingerprint(text1), fingerprint(text2));
}

// ── Merge ───────────────────────────────────────────────────────────

export interface DedupResult {
  deduplicated: SourceDraft[];
  removed: Array<{ url: string; reason: string }>;
}

function mergeCategories(target: SourceDraft, extra: readonly QueryCategory[]): void {
  for (const category of extra) {
    if (!target.categories.includes(category)) target.categories.push(category);
  }
}

function isFingerprintable(draft: SourceDraft): boolean {
  return draft.contentOrigin === 'scraped' && draft.rawText.length >= FINGERPRINT_MIN_CHARS;
}

/**
 * Collapse drafts that share a normalized URL or near-identical scraped text.
 * Input order is authoritative: callers pass drafts in plan order, then rank.
 * Input drafts are not mutated.
 */
export function deduplicateDrafts(drafts: SourceDraft[]): DedupResult {
  const removed: DedupResult['removed'] = [];

  const byUrl = new Map<string, SourceDraft>();
  for (const draft of drafts) {
    const kept = byUrl.get(draft.normalizedUrl);
    if (kept) {
      mergeCategories(kept, draft.categories);
      removed.push({ url: draft.url, reason: `URL duplicate of ${kept.url}` });
    } else {
      byUrl.set(draft.normalizedUrl, { ...draft, categories: [...draft.categories] });
    }
  }

  const deduplicated: SourceDraft[] = [];
  const fingerprints: Array<{ draft: SourceDraft; shingles: Set<string> }> = [];

  for (const draft of byUrl.values()) {
    if (!isFingerprintable(draft)) {
      deduplicated.push(draft);
      continue;
    }

    const shingles = fingerprint(draft.rawText);
    const match = fingerprints.find(f => jaccard(shingles, f.shingles) > SIMILARITY_THRESHOLD);
    if (match) {
      mergeCategories(match.draft, draft.categories);
      removed.push({ url: draft.url, reason: `Content >80% similar to ${match.draft.url}` });
      continue;
    }

    fingerprints.push({ draft, shingles });
    deduplicated.push(draft);
  }

  if (removed.length > 0) {
    console.log(`[Dedup] ${drafts.length} → ${deduplicated.length} (${removed.length} removed)`);
  }

  return { deduplicated, removed };
}
