// Context Aggregator: bounded, citation-indexed evidence block
//
//   1. Drop records below the confidence threshold
//   2. Rank: confidence desc, tier asc, normalized URL asc
//   3. Coverage pass: reserve the best record that fits for each category
//      present, each capped at an equal share of the budget
//   4. Greedy pass: fill the remaining budget in rank order, skipping records
//      whose header leaves no room for an excerpt
//   5. Number the selected records 1..n in rank order
//
// Header cost is estimated with the widest possible citation id, so the rendered
// text never exceeds the budget regardless of final numbering.

import { truncateAtBoundary } from '../sanitize';
import type {
  AggregatedContext,
  ContextBlock,
  DataQualitySummary,
  QueryCategory,
  SourceRecord,
} from '../types';
import { QUERY_CATEGORIES } from '../types';
import { formatCitation, publishedYear } from './bibliography';

export interface AggregatorOptions {
  budget: number;
  minConfidence: number;
  perSourceCharLimit: number;
}

export const INSUFFICIENT_DATA_MARKER =
  'INSUFFICIENT DATA: no sources met the quality threshold. ' +
  'Treat every figure below as an unsupported estimate.';

// Excerpts shorter than this carry too little evidence to be worth a citation
export const MIN_EXCERPT_CHARS = 120;
const BLOCK_SEPARATOR = '\n\n';

// ── Ranking ─────────────────────────────────────────────────────────

export function compareRecords(a: SourceRecord, b: SourceRecord): number {
  if (a.confidenceScore !== b.confidenceScore) return b.confidenceScore - a.confidenceScore;
  if (a.tier !== b.tier) return a.tier - b.tier;
  return a.normalizedUrl < b.normalizedUrl ? -1 : a.normalizedUrl > b.normalizedUrl ? 1 : 0;
}

// ── Rendering ───────────────────────────────────────────────────────

function blockHeader(id: number | string, record: SourceRecord): string {
  const title = record.title.replace(/\s+/g, ' ').trim();
  const year = publishedYear(record) ?? 'n.d.';
  return `[${id}] ${title} — ${record.domain} (Tier ${record.tier}, ${year})\n`;
}

function cleanText(text: string): string {
  return text
    .replace(/[ \t]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function renderBlock(citationId: number, record: SourceRecord, excerpt: string): ContextBlock {
  return {
    citationId,
    record,
    excerpt,
    text: `${blockHeader(citationId, record)}${excerpt}${BLOCK_SEPARATOR}`,
  };
}

function summarizeQuality(blocks: ContextBlock[], qualifying: number): DataQualitySummary {
  const share = (predicate: (b: ContextBlock) => boolean) =>
    blocks.length === 0 ? 0 : Math.round((blocks.filter(predicate).length / blocks.length) * 100) / 100;
  return {
    qualifyingSources: qualifying,
    authoritativeRatio: share(b => b.record.tier <= 2),
    recentRatio: share(b => b.record.recencyScore >= 0.85),
    scrapedRatio: share(b => b.record.contentOrigin !== 'snippet'),
  };
}

function insufficientContext(budget: number, qualifying = 0): AggregatedContext {
  const text = INSUFFICIENT_DATA_MARKER.slice(0, Math.max(0, budget));
  return {
    blocks: [],
    text,
    totalChars: text.length,
    budget,
    bibliography: {},
    insufficientData: true,
    quality: summarizeQuality([], qualifying),
  };
}

// ── Aggregate ───────────────────────────────────────────────────────

export function aggregateContext(records: readonly SourceRecord[], options: AggregatorOptions): AggregatedContext {
  const { budget, minConfidence, perSourceCharLimit } = options;

  const qualifying = records.filter(r => r.confidenceScore >= minConfidence).sort(compareRecords);
  if (qualifying.length === 0) {
    console.warn(`[Aggregator] No sources at or above confidence ${minConfidence}, context marked insufficient`);
    return insufficientContext(budget);
  }

  const widestId = '9'.repeat(String(qualifying.length).length);
  const blockOverhead = (r: SourceRecord) => blockHeader(widestId, r).length + BLOCK_SEPARATOR.length;

  const selected = new Map<string, string>(); // normalizedUrl → excerpt
  let used = 0;

  const select = (record: SourceRecord, cap: number): boolean => {
    if (cap < MIN_EXCERPT_CHARS) return false;
    const excerpt = truncateAtBoundary(cleanText(record.rawText), cap);
    if (!excerpt) return false;
    selected.set(record.normalizedUrl, excerpt);
    used += blockOverhead(record) + excerpt.length;
    return true;
  };

  // Coverage pass
  const presentCategories: QueryCategory[] = QUERY_CATEGORIES.filter(c => qualifying.some(r => r.categories.includes(c)));
  const categoryShare = Math.floor(budget / Math.max(1, presentCategories.length));

  for (const category of presentCategories) {
    const covered = qualifying.some(r => selected.has(r.normalizedUrl) && r.categories.includes(category));
    if (covered) continue;

    for (const candidate of qualifying) {
      if (selected.has(candidate.normalizedUrl) || !candidate.categories.includes(category)) continue;
      const overhead = blockOverhead(candidate);
      const cap = Math.min(perSourceCharLimit, categoryShare - overhead, budget - used - overhead);
      if (select(candidate, cap)) break;
    }
  }

  // Greedy pass
  for (const record of qualifying) {
    if (selected.has(record.normalizedUrl)) continue;
    const overhead = blockOverhead(record);
    select(record, Math.min(perSourceCharLimit, budget - used - overhead));
  }

  // Number in rank order
  const blocks: ContextBlock[] = [];
  for (const record of qualifying) {
    const excerpt = selected.get(record.normalizedUrl);
    if (excerpt === undefined) continue;
    blocks.push(renderBlock(blocks.length + 1, record, excerpt));
  }

  if (blocks.length === 0) {
    console.warn(`[Aggregator] ${qualifying.length} qualifying sources but none fit the ${budget}-char budget, context marked insufficient`);
    return insufficientContext(budget, qualifying.length);
  }

  const text = blocks.map(b => b.text).join('');
  const bibliography: Record<number, string> = {};
  for (const block of blocks) {
    bibliography[block.citationId] = formatCitation(block.record);
  }

  console.log(`[Aggregator] ${blocks.length}/${qualifying.length} qualifying sources in context (${text.length}/${budget} chars)`);

  return {
    blocks,
    text,
    totalChars: text.length,
    budget,
    bibliography,
    insufficientData: false,
    quality: summarizeQuality(blocks, qualifying.length),
  };
}

// ── Phase subsets ───────────────────────────────────────────────────

export interface ContextSubset {
  text: string;
  citationIds: number[];
}

/**
 * Blocks tagged with any of the given categories, keeping their original ids.
 * Falls back to the full context when nothing matches.
 */
export function renderContextSubset(context: AggregatedContext, categories: readonly QueryCategory[]): ContextSubset {
  if (context.insufficientData) {
    return { text: context.text, citationIds: [] };
  }

  const matching = context.blocks.filter(b => b.record.categories.some(c => categories.includes(c)));
  const blocks = matching.length > 0 ? matching : context.blocks;
  return {
    text: blocks.map(b => b.text).join(''),
    citationIds: blocks.map(b => b.citationId),
  };
}
