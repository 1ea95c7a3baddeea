// Concurrent Retriever: search + scrape fan-out for a query plan
//
// Every query becomes a search task; every new URL it returns becomes a scrape
// task in the same group. Tasks only write to their own slot (search results by
// query index, scrape results by normalized URL). Drafts are assembled after the
// join, in plan order, so the output never depends on completion order.

import { errorMessage, isCancellation, ProviderUnavailableError } from '../errors';
import { withDeadline } from '../http';
import { exponentialBackoff, withRetry } from '../retry';
import type { QueryPlan, RetrievalResult, RetrievalStats, SourceDraft } from '../types';
import { deduplicateDrafts, extractDomain, normalizeUrl } from './dedup';
import { TaskGroup } from './task-group';
import type { ScrapeProvider, ScrapeResult, SearchHit, SearchProvider, SearchRequest } from './tools';

export interface RetrieverCollaborators {
  primary: SearchProvider;
  secondary?: SearchProvider;
  scraper: ScrapeProvider;
}

export interface RetrieverOptions {
  concurrency: number;
  resultsPerQuery: number;
  secondaryResultsPerQuery: number;
  searchTimeoutMs: number;
  scrapeTimeoutMs: number;
  searchMaxAttempts: number;
  backoffBaseMs: number;
  signal?: AbortSignal;
}

type QueryOutcome = 'primary' | 'fallback' | 'failed';

interface QuerySlot {
  outcome: QueryOutcome;
  hits: SearchHit[];
}

// ── Guarded collaborator calls ──────────────────────────────────────
// The per-call timeout holds even for a provider that ignores its signal.

function guardedSearch(provider: SearchProvider, request: SearchRequest, signal?: AbortSignal): Promise<SearchHit[]> {
  return withDeadline(
    request.timeoutMs,
    signal,
    deadline => provider.search(request, deadline),
    () => {
      throw new ProviderUnavailableError({
        provider: provider.name,
        reason: 'timeout',
        message: `${provider.name} search timed out after ${request.timeoutMs}ms`,
      });
    },
  );
}

function guardedScrape(scraper: ScrapeProvider, url: string, timeoutMs: number, signal?: AbortSignal): Promise<ScrapeResult> {
  return withDeadline(
    timeoutMs,
    signal,
    deadline => scraper.scrape({ url, timeoutMs }, deadline),
    (): ScrapeResult => ({ success: false, text: '', error: `Scrape timed out after ${timeoutMs}ms` }),
  );
}

// ── Search with fallback ────────────────────────────────────────────

async function searchWithFallback(
  query: string,
  collaborators: RetrieverCollaborators,
  options: RetrieverOptions,
  signal?: AbortSignal,
): Promise<QuerySlot> {
  const { primary, secondary } = collaborators;

  try {
    const hits = await withRetry(
      `${primary.name} "${query}"`,
      () => guardedSearch(primary, { query, count: options.resultsPerQuery, timeoutMs: options.searchTimeoutMs }, signal),
      {
        maxAttempts: options.searchMaxAttempts,
        backoff: exponentialBackoff(options.backoffBaseMs),
        shouldRetry: err => err instanceof ProviderUnavailableError && err.retryable,
      },
      signal,
    );
    if (hits.length > 0) return { outcome: 'primary', hits };
    console.log(`[Retriever] ${primary.name} returned nothing for "${query}"`);
  } catch (err) {
    if (isCancellation(err)) throw err;
    console.warn(`[Retriever] ${primary.name} unavailable for "${query}": ${errorMessage(err)}`);
  }

  if (!secondary) return { outcome: 'failed', hits: [] };

  try {
    const hits = await guardedSearch(
      secondary,
      { query, count: options.secondaryResultsPerQuery, timeoutMs: options.searchTimeoutMs },
      signal,
    );
    // Secondary results carry no provider relevance score
    return { outcome: 'fallback', hits: hits.map(h => ({ ...h, score: undefined })) };
  } catch (err) {
    if (isCancellation(err)) throw err;
    console.warn(`[Retriever] ${secondary.name} also failed for "${query}": ${errorMessage(err)}`);
    return { outcome: 'failed', hits: [] };
  }
}

// ── Draft assembly ──────────────────────────────────────────────────

type DraftOutcome = SourceDraft | { skipped: string };

function toDraft(hit: SearchHit, category: SourceDraft['categories'][number], scrape?: ScrapeResult): DraftOutcome {
  const domain = extractDomain(hit.url);
  if (!domain) return { skipped: 'no usable URL' };

  const scraped = scrape?.success === true && scrape.text.trim().length > 0;
  const rawText = scraped && scrape ? scrape.text : hit.snippet;
  if (!rawText.trim()) {
    const why = scrape ? scrape.error ?? 'empty page' : 'not attempted';
    return { skipped: `no scraped text (${why}) and blank snippet` };
  }

  return {
    url: hit.url,
    normalizedUrl: normalizeUrl(hit.url),
    title: hit.title || scrape?.title || domain,
    rawText,
    snippet: hit.snippet,
    publishedDate: hit.publishedDate || scrape?.publishedDate,
    domain,
    categories: [category],
    contentOrigin: scraped ? 'scraped' : 'snippet',
  };
}

// ── Retrieve ────────────────────────────────────────────────────────

export async function retrieveSources(
  plan: QueryPlan,
  collaborators: RetrieverCollaborators,
  options: RetrieverOptions,
): Promise<RetrievalResult> {
  const group = new TaskGroup(options.concurrency, options.signal);
  const slots: Array<QuerySlot | undefined> = plan.queries.map(() => undefined);
  const scrapes = new Map<string, ScrapeResult>();
  const scheduled = new Set<string>();

  console.log(`[Retriever] Searching ${plan.queries.length} queries (${options.concurrency} concurrent)`);

  plan.queries.forEach((planned, index) => {
    group.spawn(`search:${index}`, async signal => {
      const slot = await searchWithFallback(planned.query, collaborators, options, signal);
      slots[index] = slot;

      for (const hit of slot.hits) {
        const key = normalizeUrl(hit.url);
        if (scheduled.has(key)) continue;
        scheduled.add(key);

        group.spawn(`scrape:${key}`, async scrapeSignal => {
          const result = await guardedScrape(collaborators.scraper, hit.url, options.scrapeTimeoutMs, scrapeSignal);
          scrapes.set(key, result);
        });
      }
    });
  });

  const summary = await group.join();

  // Merge in plan order, then result rank
  const drafts: SourceDraft[] = [];
  let itemsDropped = 0;
  plan.queries.forEach((planned, index) => {
    for (const hit of slots[index]?.hits ?? []) {
      const outcome = toDraft(hit, planned.category, scrapes.get(normalizeUrl(hit.url)));
      if ('skipped' in outcome) {
        itemsDropped++;
        console.warn(`[Retriever] Dropped ${hit.url || '(no url)'} from "${planned.query}": ${outcome.skipped}`);
        continue;
      }
      drafts.push(outcome);
    }
  });

  const { deduplicated } = deduplicateDrafts(drafts);

  const outcomes = slots.map(s => s?.outcome ?? 'failed');
  const scrapeResults = Array.from(scrapes.values());
  const stats: RetrievalStats = {
    queriesIssued: plan.queries.length,
    queriesFailed: outcomes.filter(o => o === 'failed').length,
    fallbackQueries: outcomes.filter(o => o === 'fallback').length,
    scrapesAttempted: scheduled.size,
    scrapesSucceeded: scrapeResults.filter(r => r.success).length,
    scrapesFailed: scheduled.size - scrapeResults.filter(r => r.success).length,
    itemsDropped,
    uniqueSources: deduplicated.length,
  };

  console.log(
    `[Retriever] ${stats.uniqueSources} unique sources from ${stats.queriesIssued} queries ` +
    `(${stats.fallbackQueries} via fallback, ${stats.queriesFailed} failed; ` +
    `${stats.scrapesSucceeded}/${stats.scrapesAttempted} pages scraped; ${stats.itemsDropped} dropped; ` +
    `${summary.failures.length} task errors)`,
  );

  return { drafts: deduplicated, stats };
}
