import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PipelineCancelledError } from './errors';
import { runPipeline, type PipelineOptions } from './pipeline';
import { withProgressCallback, type ProgressEvent } from './progress';
import { normalizeUrl } from './research/dedup';
import { DOCUMENT_URL } from './research/document-context';
import { planQueries } from './research/query-planner';
import type { ScrapeProvider, ScrapeResult, SearchHit, SearchProvider } from './research/tools';
import {
  FakeScraper,
  FakeSearchProvider,
  filler,
  makeInput,
  REFERENCE_DATE,
  timeoutError,
  validLlm,
} from './test-utils/fixtures';
import type { DocumentContext } from './types';
import { PHASE_NAMES } from './types';

const CONFIG = { maxQueries: 20, backoffBaseMs: 0, searchMaxAttempts: 1 };
const PLAN = planQueries(makeInput(), { maxQueries: 20, referenceDate: REFERENCE_DATE });
const SHARED_URLS = ['https://www.forbes.com/shared?utm_source=newsletter', 'https://forbes.com/shared'];

// All four trend queries and the first research query time out
const FAILING = new Set([
  ...PLAN.queries.filter(q => q.category === 'trends').map(q => q.query),
  PLAN.queries.filter(q => q.category === 'research')[0].query,
]);

function pageUrl(query: string): string {
  return `https://gartner.com/report-${PLAN.queries.findIndex(q => q.query === query)}`;
}

function hitsFor(query: string): SearchHit[] {
  const hits: SearchHit[] = [
    { url: pageUrl(query), title: `Report on ${query}`, snippet: 'Hiring demand snippet.', publishedDate: '2025-11-01' },
  ];
  const shared = PLAN.queries.slice(0, 2).findIndex(q => q.query === query);
  if (shared >= 0) {
    hits.push({ url: SHARED_URLS[shared], title: 'Recruitment market overview', snippet: 'Shared overview.' });
  }
  return hits;
}

function buildScraper(): FakeScraper {
  const pages: Record<string, string> = {};
  for (const { query } of PLAN.queries) pages[pageUrl(query)] = filler(`Report ${query}`, 1500);
  for (const url of SHARED_URLS) pages[url] = filler('Overview', 1500);
  return new FakeScraper(pages);
}

function buildOptions(overrides: Partial<PipelineOptions> = {}) {
  const search = new FakeSearchProvider('primary', request =>
    FAILING.has(request.query) ? timeoutError('primary') : hitsFor(request.query),
  );
  const fallbackSearch = new FakeSearchProvider('secondary', () => new Error('secondary unavailable'));
  const llm = validLlm();
  const options: PipelineOptions = {
    config: CONFIG,
    referenceDate: REFERENCE_DATE,
    collaborators: { search, fallbackSearch, scraper: buildScraper(), llm },
    ...overrides,
  };
  return { options, search, fallbackSearch, llm };
}

describe('runPipeline', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('plans twenty queries for a fully specified business', () => {
    expect(PLAN.queries).toHaveLength(20);
    expect(FAILING.size).toBe(5);
  });

  it('survives failed queries and returns one terminal result per phase', async () => {
    const { options, search, fallbackSearch } = buildOptions();

    const result = await runPipeline(makeInput(), undefined, options);

    expect(search.calls).toHaveLength(20);
    expect(fallbackSearch.calls.map(c => c.query).sort()).toEqual([...FAILING].sort());
    expect(result.retrieval).toMatchObject({
      queriesIssued: 20,
      queriesFailed: 5,
      fallbackQueries: 0,
      uniqueSources: 16,
    });

    expect(result.phaseResults.map(r => r.phase)).toEqual([...PHASE_NAMES]);
    expect(result.phaseResults.every(r => r.status === 'success')).toBe(true);
    for (const phase of result.phaseResults) {
      for (const id of phase.citationsUsed) {
        expect(result.context.bibliography[id]).toBeDefined();
      }
    }
  });

  it('merges a URL returned by two queries into one source tagged with both categories', async () => {
    const { options } = buildOptions();

    const result = await runPipeline(makeInput(), undefined, options);

    const shared = result.context.blocks.filter(b => b.record.normalizedUrl === normalizeUrl(SHARED_URLS[1]));
    expect(shared).toHaveLength(1);
    expect(shared[0].record.categories).toEqual(['market_size', 'segments']);
  });

  it('keeps the context within its budget', async () => {
    const { options } = buildOptions({ config: { ...CONFIG, contextBudget: 5_000 } });

    const result = await runPipeline(makeInput(), undefined, options);

    expect(result.context.totalChars).toBeLessThanOrEqual(5_000);
    expect(result.context.blocks.length).toBeGreaterThan(0);
  });

  it('adds uploaded documents as a citable source', async () => {
    const { options, llm } = buildOptions();
    const documentContext: DocumentContext = {
      text: 'Internal survey: recruitment teams report hiring delays. Recruitment leaders want faster screening.',
      fileNames: ['survey.pdf'],
      stats: { fileCount: 1, totalChars: 98, dataPoints: 2 },
    };

    const result = await runPipeline(makeInput(), documentContext, options);

    const document = result.context.blocks.find(b => b.record.url === DOCUMENT_URL);
    expect(document?.record.title).toBe('Uploaded documents: survey.pdf');
    expect(document?.record.tier).toBe(2);
    expect(llm.requests.some(r => r.context.includes('Uploaded documents: survey.pdf'))).toBe(true);
  });

  it('marks the context insufficient when every search fails, and still finishes', async () => {
    const search = new FakeSearchProvider('primary', () => timeoutError('primary'));
    const { options } = buildOptions();

    const result = await runPipeline(makeInput(), undefined, {
      ...options,
      collaborators: { ...options.collaborators, search, fallbackSearch: undefined },
    });

    expect(result.retrieval.queriesFailed).toBe(20);
    expect(result.context.insufficientData).toBe(true);
    expect(result.phaseResults).toHaveLength(5);
    expect(result.phaseResults.every(r => r.confidence === 'low')).toBe(true);
  });

  it('reports progress through the callback', async () => {
    const { options } = buildOptions();
    const events: ProgressEvent[] = [];

    await withProgressCallback(event => events.push(event), () => runPipeline(makeInput(), undefined, options));

    expect(events.filter(e => e.type === 'phase').map(e => e.detail)).toEqual([...PHASE_NAMES]);
    expect(events[events.length - 1].type).toBe('complete');
  });

  it('rejects with PipelineCancelledError when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const { options, search } = buildOptions({ signal: controller.signal });

    await expect(runPipeline(makeInput(), undefined, options)).rejects.toBeInstanceOf(PipelineCancelledError);
    expect(search.calls).toHaveLength(0);
  });

  it('rejects with PipelineCancelledError when aborted mid-retrieval', async () => {
    const controller = new AbortController();
    const search = new FakeSearchProvider('primary', request => {
      controller.abort();
      return hitsFor(request.query);
    });
    const { options, llm } = buildOptions({ signal: controller.signal });

    await expect(
      runPipeline(makeInput(), undefined, { ...options, collaborators: { ...options.collaborators, search } }),
    ).rejects.toBeInstanceOf(PipelineCancelledError);
    expect(llm.requests).toHaveLength(0);
  });

  it('turns a run timeout into a cancellation', async () => {
    const stalled: SearchProvider = {
      name: 'stalled',
      search: (_request, signal) =>
        new Promise<SearchHit[]>((_, reject) => {
          signal?.addEventListener('abort', () => reject(new PipelineCancelledError()));
        }),
    };
    const { options } = buildOptions({ timeoutMs: 30 });

    await expect(
      runPipeline(makeInput(), undefined, { ...options, collaborators: { ...options.collaborators, search: stalled } }),
    ).rejects.toThrow('Pipeline timed out after 30ms');
  });

  it('times out a run whose scraper ignores cancellation', async () => {
    const stuck: ScrapeProvider = { scrape: () => new Promise<ScrapeResult>(() => {}) };
    const { options, llm } = buildOptions({ timeoutMs: 30 });

    await expect(
      runPipeline(makeInput(), undefined, {
        ...options,
        config: { ...CONFIG, scrapeTimeoutMs: 60_000 },
        collaborators: { ...options.collaborators, scraper: stuck },
      }),
    ).rejects.toThrow('Pipeline timed out after 30ms');
    expect(llm.requests).toHaveLength(0);
  });
});
