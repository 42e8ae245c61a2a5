import { describe, it, expect, vi } from 'vitest';
import { http, HttpResponse } from 'msw';

import { createWebScraper, fetchMany, parseHtml } from '../../../src/ai/tools/scraper';
import type { FetchClient } from '../../../src/ai/tools/types';
import { server } from '../../mocks/server';
import { MOCK_PAGE_HTML } from '../../mocks/handlers';

const silentLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

describe('parseHtml', () => {
  it('extracts title, description, headings and article text', () => {
    expect(parseHtml('https://example.com/handbook', MOCK_PAGE_HTML)).toEqual({
      success: true,
      url: 'https://example.com/handbook',
      title: 'Testing Handbook',
      bodyText: 'Testing Handbook\nWrite the test before the fix.',
      metaDescription: 'A practical handbook on software testing.',
      headings: ['Testing Handbook'],
      wordCount: 8,
    });
  });

  it('prefers Open Graph metadata', () => {
    const html = `<html><head>
      <title>Plain</title>
      <meta property="og:title" content="OG Title">
      <meta property="og:description" content="OG description">
      <meta name="description" content="Plain description">
    </head><body><p>Hi</p></body></html>`;

    const page = parseHtml('https://example.com', html);

    expect(page.title).toBe('OG Title');
    expect(page.metaDescription).toBe('OG description');
  });

  it('drops scripts, navigation and footers', () => {
    const html = `<html><body>
      <nav>Menu</nav>
      <script>var tracking = 1;</script>
      <main><h2>Setup</h2><p>Install the runner.</p></main>
      <footer>Copyright</footer>
    </body></html>`;

    const page = parseHtml('https://example.com', html);

    expect(page.bodyText).toBe('Setup\nInstall the runner.');
    expect(page.title).toBe('');
  });

  it('truncates long bodies', () => {
    const page = parseHtml('https://example.com', '<body><p>abcdefghij</p></body>', 5);

    expect(page.bodyText).toBe('abcde...');
    expect(page.wordCount).toBe(1);
  });
});

describe('createWebScraper', () => {
  it('fetches and parses a page', async () => {
    const scraper = createWebScraper({ logger: silentLogger });

    const page = await scraper.fetch('https://example.com/handbook');

    expect(page.success).toBe(true);
    if (!page.success) return;
    expect(page.title).toBe('Testing Handbook');
  });

  it('reports HTTP errors as failures', async () => {
    server.use(http.get('https://example.com/missing', () => new HttpResponse('gone', { status: 404 })));
    const scraper = createWebScraper({ logger: silentLogger });

    expect(await scraper.fetch('https://example.com/missing')).toEqual({
      success: false,
      url: 'https://example.com/missing',
      errorDetail: 'HTTP 404',
    });
  });

  it('reports network errors as failures', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new Error('ECONNREFUSED'));
    const scraper = createWebScraper({ fetch: fetchImpl, logger: silentLogger });

    expect(await scraper.fetch('https://example.com/x')).toEqual({
      success: false,
      url: 'https://example.com/x',
      errorDetail: 'ECONNREFUSED',
    });
  });

  it('sends the configured user agent', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('<p>x</p>'));
    const scraper = createWebScraper({ fetch: fetchImpl, userAgent: 'test-agent', logger: silentLogger });

    await scraper.fetch('https://example.com/x');

    expect(fetchImpl.mock.calls[0][1]?.headers).toMatchObject({ 'user-agent': 'test-agent' });
  });
});

describe('fetchMany', () => {
  it('keeps input order and turns rejections into failures', async () => {
    const client: FetchClient = {
      fetch: vi.fn(async (url: string) => {
        if (url.endsWith('bad')) throw new Error('boom');
        return parseHtml(url, '<p>ok</p>');
      }),
    };

    const pages = await fetchMany(client, ['https://a.test/ok', 'https://a.test/bad']);

    expect(pages.map((p) => p.success)).toEqual([true, false]);
    expect(pages[1]).toEqual({ success: false, url: 'https://a.test/bad', errorDetail: 'boom' });
  });
});
