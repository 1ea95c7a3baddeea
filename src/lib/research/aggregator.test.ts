import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { QueryCategory, SourceRecord } from '../types';
import { QUERY_CATEGORIES } from '../types';
import { filler, makeDraft, REFERENCE_DATE } from '../test-utils/fixtures';
import { aggregateContext, INSUFFICIENT_DATA_MARKER, renderContextSubset } from './aggregator';
import { formatCitation } from './bibliography';
import { scoreSource } from './scoring';

const ctx = { relevanceTerms: ['hiring'], referenceDate: REFERENCE_DATE };

// Six strong market-size sources and one weaker competitor source
function buildRecords(): SourceRecord[] {
  const strong = ['a', 'b', 'c', 'd', 'e', 'f'].map(letter =>
    scoreSource(
      makeDraft(`https://gartner.com/${letter}`, {
        title: `Market report ${letter.toUpperCase()}`,
        rawText: filler(`Report ${letter}`, 3000),
        publishedDate: '2025-10-01',
        categories: ['market_size'],
      }),
      ctx,
    ),
  );
  const competitor = scoreSource(
    makeDraft('https://unknown-site.com/c', {
      title: 'Competitor roundup',
      rawText: filler('Competitor', 3000),
      categories: ['competitors'],
    }),
    ctx,
  );
  return [...strong, competitor];
}

const options = { budget: 4000, minConfidence: 0.35, perSourceCharLimit: 4000 };

describe('aggregateContext', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('never exceeds the character budget', () => {
    const records = buildRecords();
    for (const budget of [500, 1000, 2500, 4000, 8000, 60000]) {
      const context = aggregateContext(records, { ...options, budget });
      expect(context.totalChars).toBeLessThanOrEqual(budget);
      expect(context.text.length).toBe(context.totalChars);
    }
  });

  it('reserves room for every category present, even a weaker one', () => {
    const context = aggregateContext(buildRecords(), options);
    const categories = new Set(context.blocks.flatMap(b => b.record.categories));
    expect(categories).toEqual(new Set(['market_size', 'competitors']));
  });

  it('numbers blocks 1..n in rank order', () => {
    const context = aggregateContext(buildRecords(), options);
    expect(context.blocks.map(b => b.citationId)).toEqual(context.blocks.map((_, i) => i + 1));
    expect(context.blocks[0].record.url).toBe('https://gartner.com/a');
    expect(context.blocks[context.blocks.length - 1].record.url).toBe('https://unknown-site.com/c');
    expect(context.text.startsWith('[1] Market report A — gartner.com (Tier 1, 2025)\n')).toBe(true);
  });

  it('builds a bibliography entry for every block', () => {
    const context = aggregateContext(buildRecords(), options);
    expect(Object.keys(context.bibliography).map(Number)).toEqual(context.blocks.map(b => b.citationId));
    expect(context.bibliography[1]).toBe('Gartner. (2025). Market report A. Retrieved from https://gartner.com/a');
  });

  it('is idempotent and independent of input order', () => {
    const records = buildRecords();
    const first = aggregateContext(records, options);
    expect(aggregateContext(records, options)).toEqual(first);
    expect(aggregateContext([...records].reverse(), options).text).toBe(first.text);
  });

  it('marks the context insufficient when nothing qualifies', () => {
    const context = aggregateContext(buildRecords(), { ...options, minConfidence: 0.99 });
    expect(context.insufficientData).toBe(true);
    expect(context.blocks).toEqual([]);
    expect(context.bibliography).toEqual({});
    expect(context.text).toBe(INSUFFICIENT_DATA_MARKER);
  });

  it('marks the context insufficient when sources qualify but none fit', () => {
    const context = aggregateContext(buildRecords().slice(0, 1), { ...options, perSourceCharLimit: 110 });
    expect(context.insufficientData).toBe(true);
    expect(context.blocks).toEqual([]);
    expect(context.text).toBe(INSUFFICIENT_DATA_MARKER);
    expect(context.quality.qualifyingSources).toBe(1);
  });

  it('covers every category when the best record of one has no room', () => {
    const report = (slug: string, title: string, category: QueryCategory) =>
      scoreSource(
        makeDraft(`https://gartner.com/${slug}`, {
          title,
          rawText: filler(`Report ${slug}`, 3000),
          publishedDate: '2025-10-01',
          categories: [category],
        }),
        ctx,
      );
    const records = [
      report('size', 'Market size', 'market_size'),
      report('segments', 'Segments', 'segments'),
      report('rivals', 'Rivals', 'competitors'),
      report('survey', 'Survey', 'research'),
      report('outlook', 'Hiring trends outlook '.repeat(16), 'trends'),
      scoreSource(
        makeDraft('https://unknown-site.com/trends', {
          title: 'Trends',
          rawText: filler('Trends', 3000),
          categories: ['trends'],
        }),
        ctx,
      ),
    ];

    const context = aggregateContext(records, { ...options, budget: 2500 });

    expect(context.totalChars).toBeLessThanOrEqual(2500);
    expect(new Set(context.blocks.flatMap(b => b.record.categories))).toEqual(new Set(QUERY_CATEGORIES));
    expect(context.blocks.map(b => b.record.url)).toContain('https://unknown-site.com/trends');
    expect(context.blocks.map(b => b.record.url)).not.toContain('https://gartner.com/outlook');
  });

  it('summarizes data quality of the selected blocks', () => {
    const context = aggregateContext(buildRecords(), options);
    expect(context.quality.qualifyingSources).toBe(7);
    expect(context.quality.scrapedRatio).toBe(1);
  });
});

describe('renderContextSubset', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('keeps original citation ids for matching blocks', () => {
    const context = aggregateContext(buildRecords(), options);
    const subset = renderContextSubset(context, ['competitors']);
    const last = context.blocks[context.blocks.length - 1];
    expect(subset.citationIds).toEqual([last.citationId]);
    expect(subset.text).toBe(last.text);
  });

  it('falls back to the whole context when no block matches', () => {
    const context = aggregateContext(buildRecords(), options);
    const subset = renderContextSubset(context, ['segments']);
    expect(subset.text).toBe(context.text);
  });
});

describe('formatCitation', () => {
  it('marks undated sources and uploaded documents', () => {
    const undated = scoreSource(makeDraft('https://unknown-site.com/x', { title: 'Notes...' }), ctx);
    expect(formatCitation(undated)).toBe('Unknown-site. (n.d.). Notes. Retrieved from https://unknown-site.com/x');

    const doc = scoreSource(
      makeDraft('document://uploaded', {
        normalizedUrl: 'document://uploaded',
        domain: 'uploaded-documents',
        title: 'Uploaded documents: plan.pdf',
        organization: 'Uploaded documents',
        contentOrigin: 'document',
      }),
      ctx,
    );
    expect(formatCitation(doc)).toBe('Uploaded documents. (n.d.). Uploaded documents: plan.pdf. User-provided material.');
  });
});
