/**
 * Search and scrape collaborators for the retriever.
 *
 *   primary search   : Tavily Search API
 *   secondary search : DuckDuckGo Instant Answer API (no key, fewer and thinner results)
 *   scrape           : Tavily Extract API, falls back to a direct fetch parsed with cheerio
 *
 * Search providers throw ProviderUnavailableError on failure so the retriever
 * can decide between retry and fallback. The scraper only throws on
 * cancellation: a failed scrape is reported as `success: false` and the
 * retriever keeps the snippet.
 */

import * as cheerio from 'cheerio';
import { z } from 'zod';
import { errorMessage, isCancellation, PipelineCancelledError, ProviderUnavailableError } from '../errors';
import { fetchWithTimeout, FetchTimeoutError } from '../http';
import { sanitizeForPrompt } from '../sanitize';
import { extractDomain } from './dedup';
import { lookupDomain } from './tiering';

// ── Collaborator contracts ──────────────────────────────────────────

export interface SearchHit {
  url: string;
  title: string;
  snippet: string;
  publishedDate?: string;
  score?: number;
}

export interface SearchRequest {
  query: string;
  count: number;
  timeoutMs: number;
}

export interface SearchProvider {
  readonly name: string;
  search(request: SearchRequest, signal?: AbortSignal): Promise<SearchHit[]>;
}

export interface ScrapeRequest {
  url: string;
  timeoutMs: number;
}

export interface ScrapeResult {
  success: boolean;
  text: string;
  title?: string;
  publishedDate?: string;
  error?: string;
}

export interface ScrapeProvider {
  scrape(request: ScrapeRequest, signal?: AbortSignal): Promise<ScrapeResult>;
}

// ── Shared response handling ────────────────────────────────────────

function failureFromResponse(provider: string, response: Response): ProviderUnavailableError {
  const reason = response.status === 429 ? 'rate_limited' : 'http_error';
  return new ProviderUnavailableError({
    provider,
    reason,
    status: response.status,
    message: `${provider} responded ${response.status}`,
  });
}

function failureFromError(provider: string, err: unknown): Error {
  if (err instanceof PipelineCancelledError || err instanceof ProviderUnavailableError) return err;
  if (err instanceof FetchTimeoutError) {
    return new ProviderUnavailableError({ provider, reason: 'timeout', message: err.message });
  }
  return new ProviderUnavailableError({ provider, reason: 'network', message: errorMessage(err) });
}

// ── Tavily search ───────────────────────────────────────────────────

const TavilySearchResponseSchema = z.object({
  results: z
    .array(
      z.object({
        url: z.string(),
        title: z.string().nullish(),
        content: z.string().nullish(),
        score: z.number().nullish(),
        published_date: z.string().nullish(),
      }),
    )
    .default([]),
});

export function createTavilySearch(apiKey: string | undefined = process.env.TAVILY_API_KEY): SearchProvider {
  const name = 'tavily';
  return {
    name,
    async search({ query, count, timeoutMs }, signal) {
      if (!apiKey) {
        throw new ProviderUnavailableError({ provider: name, reason: 'not_configured', message: 'TAVILY_API_KEY not set' });
      }

      try {
        const data = await fetchWithTimeout(
          'https://api.tavily.com/search',
          {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({
              api_key: apiKey,
              query,
              search_depth: 'advanced',
              include_answer: false,
              max_results: count,
            }),
          },
          { timeoutMs, signal },
          async response => {
            if (!response.ok) throw failureFromResponse(name, response);
            return TavilySearchResponseSchema.parse(await response.json());
          },
        );

        return data.results.slice(0, count).map(r => ({
          url: r.url,
          title: r.title ?? '',
          snippet: r.content ?? '',
          publishedDate: r.published_date ?? undefined,
          score: r.score ?? undefined,
        }));
      } catch (err) {
        throw failureFromError(name, err);
      }
    },
  };
}

// ── DuckDuckGo instant answers ──────────────────────────────────────

interface DdgTopic {
  FirstURL?: string;
  Text?: string;
  Topics?: DdgTopic[];
}

const DdgTopicSchema: z.ZodType<DdgTopic> = z.lazy(() =>
  z.object({
    FirstURL: z.string().optional(),
    Text: z.string().optional(),
    Topics: z.array(DdgTopicSchema).optional(),
  }),
);

const DdgResponseSchema = z.object({
  Heading: z.string().optional(),
  AbstractText: z.string().optional(),
  AbstractURL: z.string().optional(),
  RelatedTopics: z.array(DdgTopicSchema).default([]),
});

function flattenTopics(topics: DdgTopic[]): DdgTopic[] {
  return topics.flatMap(t => (t.Topics ? flattenTopics(t.Topics) : [t]));
}

export function createDuckDuckGoSearch(): SearchProvider {
  const name = 'duckduckgo';
  return {
    name,
    async search({ query, count, timeoutMs }, signal) {
      const params = new URLSearchParams({ q: query, format: 'json', no_html: '1', skip_disambig: '1' });

      try {
        const data = await fetchWithTimeout(
          `https://api.duckduckgo.com/?${params}`,
          undefined,
          { timeoutMs, signal },
          async response => {
            if (!response.ok) throw failureFromResponse(name, response);
            return DdgResponseSchema.parse(await response.json());
          },
        );
        const hits: SearchHit[] = [];

        if (data.AbstractURL && data.AbstractText) {
          hits.push({ url: data.AbstractURL, title: data.Heading || query, snippet: data.AbstractText });
        }
        for (const topic of flattenTopics(data.RelatedTopics)) {
          if (!topic.FirstURL || !topic.Text) continue;
          const title = topic.Text.split(' - ')[0] || topic.Text;
          hits.push({ url: topic.FirstURL, title, snippet: topic.Text });
        }

        return hits.slice(0, count);
      } catch (err) {
        throw failureFromError(name, err);
      }
    },
  };
}

// ── Scraping ────────────────────────────────────────────────────────

const BLOCKED_EXTENSIONS = /\.(pdf|docx?|xlsx?|pptx?|zip|rar|gz|exe|dmg|mp3|mp4|avi|mov|jpe?g|png|gif|svg)(\?|#|$)/i;

/** Binary files and social networks are not worth a scrape attempt. */
export function isScrapable(url: string): boolean {
  if (BLOCKED_EXTENSIONS.test(url)) return false;
  const domain = extractDomain(url);
  if (!domain) return false;
  return lookupDomain(domain)?.kind !== 'social';
}

const MIN_CONTENT_CHARS = 200;

const TavilyExtractResponseSchema = z.object({
  results: z.array(z.object({ url: z.string(), raw_content: z.string().nullish() })).default([]),
});

const DATE_SELECTORS = [
  'meta[property="article:published_time"]',
  'meta[name="article:published_time"]',
  'meta[name="pubdate"]',
  'meta[name="publish-date"]',
  'meta[name="date"]',
  'meta[itemprop="datePublished"]',
];

/** Title, publish date and readable text from a fetched HTML page. */
export function extractPageText(html: string): { title: string; text: string; publishedDate?: string } {
  const $ = cheerio.load(html);
  const title = ($('meta[property="og:title"]').attr('content') || $('title').first().text()).trim();

  let publishedDate: string | undefined;
  for (const selector of DATE_SELECTORS) {
    const value = $(selector).attr('content');
    if (value) {
      publishedDate = value.trim();
      break;
    }
  }
  if (!publishedDate) {
    publishedDate = $('time[datetime]').first().attr('datetime')?.trim() || undefined;
  }

  $('script, style, noscript, iframe, nav, footer, header, aside, form').remove();
  const root = $('article').first().length > 0 ? $('article').first() : $('body');

  const blocks: string[] = [];
  root.find('h1, h2, h3, p, li, td').each((_, el) => {
    const text = $(el).text().replace(/\s+/g, ' ').trim();
    if (text.length > 2) blocks.push(text);
  });

  return { title, text: blocks.join('\n'), publishedDate };
}

export function createPageScraper(apiKey: string | undefined = process.env.TAVILY_API_KEY): ScrapeProvider {
  async function viaTavily(url: string, timeoutMs: number, signal?: AbortSignal): Promise<string | null> {
    if (!apiKey) return null;
    const data = await fetchWithTimeout(
      'https://api.tavily.com/extract',
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ api_key: apiKey, urls: [url] }),
      },
      { timeoutMs, signal },
      async response => (response.ok ? TavilyExtractResponseSchema.parse(await response.json()) : null),
    );
    const raw = data?.results[0]?.raw_content;
    return raw ? sanitizeForPrompt(raw) : null;
  }

  async function readPage(response: Response): Promise<ScrapeResult> {
    if (!response.ok) {
      return { success: false, text: '', error: `HTTP ${response.status}` };
    }
    const contentType = response.headers.get('content-type') || '';
    if (!/text\/html|application\/xhtml/i.test(contentType)) {
      return { success: false, text: '', error: `Unsupported content type ${contentType || 'unknown'}` };
    }
    const page = extractPageText(await response.text());
    const text = sanitizeForPrompt(page.text);
    if (text.length < MIN_CONTENT_CHARS) {
      return { success: false, text: '', error: `Too little content (${text.length} chars)` };
    }
    return { success: true, text, title: page.title || undefined, publishedDate: page.publishedDate };
  }

  function viaDirectFetch(url: string, timeoutMs: number, signal?: AbortSignal): Promise<ScrapeResult> {
    return fetchWithTimeout(
      url,
      { headers: { 'User-Agent': 'Mozilla/5.0 (compatible; SegmentResearchBot/1.0)' } },
      { timeoutMs, signal },
      readPage,
    );
  }

  return {
    async scrape({ url, timeoutMs }, signal) {
      if (!isScrapable(url)) {
        return { success: false, text: '', error: 'Not scrapable' };
      }

      try {
        const extracted = await viaTavily(url, timeoutMs, signal);
        if (extracted && extracted.length >= MIN_CONTENT_CHARS) {
          return { success: true, text: extracted };
        }
      } catch (err) {
        if (isCancellation(err)) throw err;
        console.warn(`[Scrape] Tavily extract failed for ${url}, falling back to direct fetch`);
      }

      try {
        return await viaDirectFetch(url, timeoutMs, signal);
      } catch (err) {
        if (isCancellation(err)) throw err;
        return { success: false, text: '', error: errorMessage(err) };
      }
    },
  };
}
