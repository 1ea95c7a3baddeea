import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PipelineCancelledError } from '../errors';
import { FakeScraper, FakeSearchProvider, timeoutError } from '../test-utils/fixtures';
import type { QueryPlan } from '../types';
import { retrieveSources, type RetrieverOptions } from './retriever';
import type { ScrapeProvider, ScrapeResult, SearchHit, SearchProvider } from './tools';

const plan: QueryPlan = {
  queries: [
    { query: 'hiring market size', category: 'market_size' },
    { query: 'hiring competitors', category: 'competitors' },
  ],
  degraded: false,
  relevanceTerms: ['hiring'],
};

const options: RetrieverOptions = {
  concurrency: 4,
  resultsPerQuery: 5,
  secondaryResultsPerQuery: 3,
  searchTimeoutMs: 1_000,
  scrapeTimeoutMs: 1_000,
  searchMaxAttempts: 2,
  backoffBaseMs: 0,
};

const hit = (url: string, score?: number) => ({ url, title: `Title ${url}`, snippet: `Snippet for ${url}`, score });

describe('retrieveSources', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('assembles drafts in plan order regardless of completion order', async () => {
    const primary = new FakeSearchProvider('primary', request => async () => {
      // The first query finishes last
      await new Promise(resolve => setTimeout(resolve, request.query.includes('size') ? 20 : 0));
      return [hit(`https://example.com/${request.query.includes('size') ? 'size' : 'rivals'}`)];
    });
    const scraper = new FakeScraper({ 'https://example.com/size': 'Full page about hiring market size.' });

    const { drafts, stats } = await retrieveSources(plan, { primary, scraper }, options);

    expect(drafts.map(d => d.url)).toEqual(['https://example.com/size', 'https://example.com/rivals']);
    expect(drafts[0]).toMatchObject({ contentOrigin: 'scraped', rawText: 'Full page about hiring market size.' });
    expect(drafts[1]).toMatchObject({ contentOrigin: 'snippet', rawText: 'Snippet for https://example.com/rivals' });
    expect(stats).toEqual({
      queriesIssued: 2,
      queriesFailed: 0,
      fallbackQueries: 0,
      scrapesAttempted: 2,
      scrapesSucceeded: 1,
      scrapesFailed: 1,
      itemsDropped: 0,
      uniqueSources: 2,
    });
  });

  it('scrapes a URL once even when several queries return it', async () => {
    const primary = new FakeSearchProvider('primary', () => [hit('https://example.com/shared')]);
    const scraper = new FakeScraper();

    const { drafts } = await retrieveSources(plan, { primary, scraper }, options);

    expect(scraper.urls).toEqual(['https://example.com/shared']);
    expect(drafts).toHaveLength(1);
    expect(drafts[0].categories).toEqual(['market_size', 'competitors']);
  });

  it('retries a retryable failure before giving up on the primary provider', async () => {
    let calls = 0;
    const primary = new FakeSearchProvider('primary', () => {
      calls++;
      return calls === 1 ? timeoutError('primary') : [hit('https://example.com/a')];
    });

    const { stats } = await retrieveSources(
      { ...plan, queries: plan.queries.slice(0, 1) },
      { primary, scraper: new FakeScraper() },
      options,
    );

    expect(primary.calls).toHaveLength(2);
    expect(stats.queriesFailed).toBe(0);
  });

  it('uses the secondary provider and drops its scores when the primary fails', async () => {
    const primary = new FakeSearchProvider('primary', () => timeoutError('primary'));
    const secondary = new FakeSearchProvider('secondary', request => [hit(`https://example.org/${request.count}`, 0.9)]);

    const { drafts, stats } = await retrieveSources(
      { ...plan, queries: plan.queries.slice(0, 1) },
      { primary, secondary, scraper: new FakeScraper() },
      options,
    );

    expect(primary.calls).toHaveLength(2);
    expect(secondary.calls[0].count).toBe(3);
    expect(drafts.map(d => d.url)).toEqual(['https://example.org/3']);
    expect(stats.fallbackQueries).toBe(1);
  });

  it('falls back when the primary provider returns nothing', async () => {
    const primary = new FakeSearchProvider('primary', () => []);
    const secondary = new FakeSearchProvider('secondary', () => [hit('https://example.org/only')]);

    const { stats } = await retrieveSources(plan, { primary, secondary, scraper: new FakeScraper() }, options);

    expect(primary.calls).toHaveLength(2);
    expect(stats.fallbackQueries).toBe(2);
  });

  it('counts a query as failed when both providers fail', async () => {
    const primary = new FakeSearchProvider('primary', () => new Error('HTTP 500'));
    const secondary = new FakeSearchProvider('secondary', () => new Error('HTTP 503'));

    const { drafts, stats } = await retrieveSources(plan, { primary, secondary, scraper: new FakeScraper() }, options);

    expect(drafts).toEqual([]);
    expect(stats.queriesFailed).toBe(2);
    expect(stats.uniqueSources).toBe(0);
  });

  it('skips hits with no usable URL or text', async () => {
    const primary = new FakeSearchProvider('primary', () => [
      { url: 'not a url', title: 'Broken', snippet: 'text' },
      { url: 'https://example.com/empty', title: 'Empty', snippet: '  ' },
    ]);

    const { drafts, stats } = await retrieveSources(
      { ...plan, queries: plan.queries.slice(0, 1) },
      { primary, scraper: new FakeScraper() },
      options,
    );

    expect(drafts).toEqual([]);
    expect(stats.itemsDropped).toBe(2);
    expect(console.warn).toHaveBeenCalledWith('[Retriever] Dropped not a url from "hiring market size": no usable URL');
    expect(console.warn).toHaveBeenCalledWith(
      '[Retriever] Dropped https://example.com/empty from "hiring market size": no scraped text (HTTP 404) and blank snippet',
    );
  });

  it('keeps the snippet when a scraper ignores its timeout', async () => {
    const primary = new FakeSearchProvider('primary', () => [hit('https://example.com/slow')]);
    const scraper: ScrapeProvider = { scrape: () => new Promise<ScrapeResult>(() => {}) };

    const { drafts, stats } = await retrieveSources(
      { ...plan, queries: plan.queries.slice(0, 1) },
      { primary, scraper },
      { ...options, scrapeTimeoutMs: 20 },
    );

    expect(drafts.map(d => [d.url, d.contentOrigin])).toEqual([['https://example.com/slow', 'snippet']]);
    expect(stats).toMatchObject({ scrapesAttempted: 1, scrapesSucceeded: 0, scrapesFailed: 1 });
  });

  it('moves to the secondary provider when a search ignores its timeout', async () => {
    const primary: SearchProvider = { name: 'primary', search: () => new Promise<SearchHit[]>(() => {}) };
    const secondary = new FakeSearchProvider('secondary', () => [hit('https://example.org/backup')]);

    const { drafts, stats } = await retrieveSources(
      { ...plan, queries: plan.queries.slice(0, 1) },
      { primary, secondary, scraper: new FakeScraper() },
      { ...options, searchTimeoutMs: 20, searchMaxAttempts: 1 },
    );

    expect(drafts.map(d => d.url)).toEqual(['https://example.org/backup']);
    expect(stats.fallbackQueries).toBe(1);
  });

  it('rejects with PipelineCancelledError once the signal aborts', async () => {
    const controller = new AbortController();
    const primary = new FakeSearchProvider('primary', () => {
      controller.abort();
      return [hit('https://example.com/a')];
    });

    await expect(
      retrieveSources(plan, { primary, scraper: new FakeScraper() }, { ...options, signal: controller.signal }),
    ).rejects.toBeInstanceOf(PipelineCancelledError);
  });
});
