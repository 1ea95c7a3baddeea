import { describe, it, expect, vi, afterEach } from 'vitest';
import { ProviderUnavailableError } from '../errors';
import { createDuckDuckGoSearch, createPageScraper, createTavilySearch, extractPageText, isScrapable } from './tools';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

// Headers arrive, the body never does
function stalledBody(contentType: string): Response {
  return new Response(new ReadableStream<Uint8Array>({ start() {} }), {
    status: 200,
    headers: { 'content-type': contentType },
  });
}

function stubFetch(respond: (url: string) => Response) {
  const fetchMock = vi.fn(async (input: string | URL | Request, _init?: RequestInit) => respond(String(input)));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

const request = { query: 'recruitment software market size', count: 3, timeoutMs: 1000 };

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('extractPageText', () => {
  it('reads title, date and article text without page chrome', () => {
    const page = extractPageText(`
      <html><head>
        <title>Fallback title</title>
        <meta property="og:title" content="Hiring Market 2025">
        <meta property="article:published_time" content="2025-05-02T10:00:00Z">
      </head><body>
        <nav><p>Home About</p></nav>
        <article>
          <h1>Hiring Market</h1>
          <p>Demand   for recruiters grew.</p>
          <script>var tracking = 1;</script>
          <ul><li>Item one</li></ul>
        </article>
        <footer><p>Footer text</p></footer>
      </body></html>`);

    expect(page).toEqual({
      title: 'Hiring Market 2025',
      publishedDate: '2025-05-02T10:00:00Z',
      text: 'Hiring Market\nDemand for recruiters grew.\nItem one',
    });
  });

  it('falls back to the title tag and a time element', () => {
    const page = extractPageText('<html><head><title> Plain </title></head><body><time datetime="2024-01-15">Jan</time><p>Body copy</p></body></html>');
    expect(page.title).toBe('Plain');
    expect(page.publishedDate).toBe('2024-01-15');
    expect(page.text).toBe('Body copy');
  });
});

describe('isScrapable', () => {
  it('skips binaries and social networks', () => {
    expect(isScrapable('https://example.com/report.pdf')).toBe(false);
    expect(isScrapable('https://www.reddit.com/r/recruiting')).toBe(false);
    expect(isScrapable('https://gartner.com/en/hiring')).toBe(true);
  });
});

describe('createTavilySearch', () => {
  it('maps results into search hits', async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse({
        results: [{ url: 'https://a.com/x', title: 'A', content: 'snippet', score: 0.9, published_date: '2025-01-01' }],
      }),
    );

    const hits = await createTavilySearch('test-key').search(request);

    expect(hits).toEqual([
      { url: 'https://a.com/x', title: 'A', snippet: 'snippet', publishedDate: '2025-01-01', score: 0.9 },
    ]);
    expect(fetchMock.mock.calls[0][0]).toBe('https://api.tavily.com/search');
  });

  it('reports rate limits as retryable provider failures', async () => {
    stubFetch(() => jsonResponse({ error: 'slow down' }, 429));

    const error = await createTavilySearch('test-key').search(request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderUnavailableError);
    if (error instanceof ProviderUnavailableError) {
      expect(error.reason).toBe('rate_limited');
      expect(error.retryable).toBe(true);
    }
  });

  it('times out a response body that never finishes', async () => {
    stubFetch(() => stalledBody('application/json'));

    const error = await createTavilySearch('test-key')
      .search({ ...request, timeoutMs: 20 })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderUnavailableError);
    if (error instanceof ProviderUnavailableError) {
      expect(error.reason).toBe('timeout');
      expect(error.message).toBe('Fetch timed out after 20ms');
    }
  });

  it('fails without calling out when no key is configured', async () => {
    const fetchMock = stubFetch(() => jsonResponse({}));

    const error = await createTavilySearch('').search(request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderUnavailableError);
    if (error instanceof ProviderUnavailableError) {
      expect(error.reason).toBe('not_configured');
    }
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('createDuckDuckGoSearch', () => {
  it('returns the abstract then flattened related topics', async () => {
    stubFetch(() =>
      jsonResponse({
        Heading: 'Recruitment',
        AbstractText: 'Recruitment is the process of finding candidates.',
        AbstractURL: 'https://en.wikipedia.org/wiki/Recruitment',
        RelatedTopics: [
          { FirstURL: 'https://duckduckgo.com/Talent_management', Text: 'Talent management - anticipating required human capital' },
          { Name: 'Software', Topics: [{ FirstURL: 'https://duckduckgo.com/ATS', Text: 'Applicant tracking system - hiring software' }] },
        ],
      }),
    );

    const hits = await createDuckDuckGoSearch().search(request);

    expect(hits.map(h => [h.url, h.title])).toEqual([
      ['https://en.wikipedia.org/wiki/Recruitment', 'Recruitment'],
      ['https://duckduckgo.com/Talent_management', 'Talent management'],
      ['https://duckduckgo.com/ATS', 'Applicant tracking system'],
    ]);
    expect(hits.every(h => h.score === undefined)).toBe(true);
  });
});

describe('createPageScraper', () => {
  const longParagraph = 'Mid-market employers increased spending on recruitment software last year. '.repeat(5).trim();

  it('extracts readable text from HTML pages', async () => {
    stubFetch(() =>
      new Response(`<html><head><title>Spend</title></head><body><article><p>${longParagraph}</p></article></body></html>`, {
        status: 200,
        headers: { 'content-type': 'text/html; charset=utf-8' },
      }),
    );

    const result = await createPageScraper('').scrape({ url: 'https://example.com/spend', timeoutMs: 1000 });

    expect(result).toEqual({ success: true, text: longParagraph, title: 'Spend', publishedDate: undefined });
  });

  it('reports non-HTML responses as failures', async () => {
    stubFetch(() => new Response('%PDF', { status: 200, headers: { 'content-type': 'application/pdf' } }));

    const result = await createPageScraper('').scrape({ url: 'https://example.com/download', timeoutMs: 1000 });

    expect(result).toEqual({ success: false, text: '', error: 'Unsupported content type application/pdf' });
  });

  it('gives up on a page whose body stalls', async () => {
    stubFetch(() => stalledBody('text/html'));

    const result = await createPageScraper('').scrape({ url: 'https://example.com/slow', timeoutMs: 20 });

    expect(result).toEqual({ success: false, text: '', error: 'Fetch timed out after 20ms' });
  });

  it('reports HTTP errors as failures', async () => {
    stubFetch(() => new Response('gone', { status: 404 }));

    const result = await createPageScraper('').scrape({ url: 'https://example.com/missing', timeoutMs: 1000 });

    expect(result).toEqual({ success: false, text: '', error: 'HTTP 404' });
  });
});
