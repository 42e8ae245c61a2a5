import { describe, it, expect, vi } from 'vitest';
import { http, HttpResponse } from 'msw';

import {
  createTavilySearchClient,
  isTavilyConfigured,
  parseTavilyResponse,
  tavilySearch,
} from '../../../src/ai/tools/tavily';
import { server } from '../../mocks/server';
import { TAVILY_SEARCH_URL } from '../../mocks/handlers';

const silentLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

describe('parseTavilyResponse', () => {
  it('keeps results with a title and url', () => {
    const parsed = parseTavilyResponse('q', {
      answer: '  ',
      results: [
        { title: 'A', url: 'https://a.test', content: 'alpha', score: 0.5 },
        { title: '', url: 'https://b.test' },
        { title: 'C' },
        'junk',
        { title: 'D', url: 'https://d.test', content: '   ' },
      ],
      usage: { credits: 1 },
    });

    expect(parsed).toEqual({
      query: 'q',
      answer: null,
      results: [
        { title: 'A', url: 'https://a.test', content: 'alpha', score: 0.5 },
        { title: 'D', url: 'https://d.test' },
      ],
      credits: 1,
    });
  });

  it('returns an empty response for non-objects', () => {
    expect(parseTavilyResponse('q', null)).toEqual({ query: 'q', answer: null, results: [] });
  });
});

describe('isTavilyConfigured', () => {
  it('prefers an explicit key over the environment', () => {
    expect(isTavilyConfigured('test-secret')).toBe(true);
    expect(isTavilyConfigured('')).toBe(false);
  });
});

describe('tavilySearch', () => {
  it('posts the query with clamped options', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(Response.json({ results: [] }));

    await tavilySearch(
      '  unit testing  ',
      { maxResults: 50, searchDepth: 'advanced', excludeDomains: ['youtube.com'] },
      { apiKey: 'test-secret', fetch: fetchImpl, logger: silentLogger }
    );

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://api.tavily.com/search');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(JSON.parse(String(init?.body))).toEqual({
      query: 'unit testing',
      search_depth: 'advanced',
      max_results: 20,
      include_answer: false,
      include_usage: true,
      exclude_domains: ['youtube.com'],
    });
  });

  it('returns no results without an API key', async () => {
    const fetchImpl = vi.fn<typeof fetch>();

    const response = await tavilySearch('q', {}, { apiKey: '', fetch: fetchImpl });

    expect(response.results).toEqual([]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('returns no results for a blank query', async () => {
    const fetchImpl = vi.fn<typeof fetch>();

    expect((await tavilySearch('   ', {}, { apiKey: 'test-secret', fetch: fetchImpl })).results).toEqual([]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('returns no results on HTTP errors', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('nope', { status: 401 }));

    const response = await tavilySearch('q', {}, { apiKey: 'test-secret', fetch: fetchImpl, logger: silentLogger });

    expect(response.results).toEqual([]);
    expect(silentLogger.warn).toHaveBeenCalledWith('Search "q" failed with HTTP 401');
  });

  it('returns no results when the request throws', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new Error('ECONNRESET'));

    const response = await tavilySearch('q', {}, { apiKey: 'test-secret', fetch: fetchImpl, logger: silentLogger });

    expect(response.results).toEqual([]);
    expect(silentLogger.warn).toHaveBeenCalledWith('Search "q" failed: ECONNRESET');
  });
});

describe('createTavilySearchClient', () => {
  it('maps Tavily results to search results', async () => {
    const client = createTavilySearchClient({ apiKey: 'test-secret', logger: silentLogger });

    const results = await client.search('testing', 5);

    expect(results).toEqual([
      {
        title: 'Testing Handbook',
        url: 'https://example.com/handbook',
        snippet: 'A practical handbook on software testing.',
        sourceDomain: 'example.com',
      },
      {
        title: 'Unit Tests in Practice',
        url: 'https://example.com/unit-tests',
        snippet: 'Patterns for writing maintainable unit tests.',
        sourceDomain: 'example.com',
      },
    ]);
  });

  it('yields an empty list when the service errors', async () => {
    server.use(http.post(TAVILY_SEARCH_URL, () => HttpResponse.json({ error: 'down' }, { status: 503 })));
    const client = createTavilySearchClient({ apiKey: 'test-secret', logger: silentLogger });

    expect(await client.search('testing', 5)).toEqual([]);
  });
});
