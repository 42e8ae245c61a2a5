/**
 * Web Scraper
 *
 * Fetches a page and extracts readable text with cheerio. Never rejects:
 * network errors, HTTP errors and parse failures become `success: false`.
 */

import { load, type CheerioAPI } from 'cheerio';

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import type { FetchClient, ScrapedContent, ScrapeSuccess } from './types';

export interface ScraperOptions {
  readonly fetch?: typeof fetch;
  readonly logger?: Logger;
  readonly timeoutMs?: number;
  /** Body text beyond this is cut and suffixed with "..." */
  readonly maxContentLength?: number;
  readonly userAgent?: string;
}

export const SCRAPER_DEFAULTS = {
  TIMEOUT_MS: 30_000,
  MAX_CONTENT_LENGTH: 50_000,
  USER_AGENT: 'Mozilla/5.0 (compatible; draftsmith/0.1)',
} as const;

/** Elements that never hold article text */
const REMOVE_SELECTORS = [
  'script',
  'style',
  'noscript',
  'nav',
  'header',
  'footer',
  'aside',
  'advertisement',
  '.ad',
  '.ads',
  '.sidebar',
  '.navigation',
  '.menu',
  '.cookie',
  '.popup',
  '.modal',
  '#comments',
  '.comments',
  '.social-share',
  '.related-posts',
].join(', ');

const BLOCK_SELECTORS =
  'p, div, section, article, main, li, ul, ol, h1, h2, h3, h4, h5, h6, blockquote, pre, tr, br';

function cleanInline(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function extractTitle($: CheerioAPI): string {
  const ogTitle = $('meta[property="og:title"]').attr('content');
  if (ogTitle?.trim()) return ogTitle.trim();

  const title = cleanInline($('title').first().text());
  if (title) return title;

  return cleanInline($('h1').first().text());
}

function extractMetaDescription($: CheerioAPI): string {
  const ogDescription = $('meta[property="og:description"]').attr('content');
  if (ogDescription?.trim()) return ogDescription.trim();

  return $('meta[name="description"]').attr('content')?.trim() ?? '';
}

function extractHeadings($: CheerioAPI): string[] {
  const headings: string[] = [];
  for (const tag of ['h1', 'h2', 'h3']) {
    $(tag).each((_, el) => {
      const text = cleanInline($(el).text());
      if (text) headings.push(text);
    });
  }
  return headings;
}

/**
 * Text of the first of article / main / body, one line per block element,
 * blank lines collapsed.
 */
function extractContent($: CheerioAPI): string {
  $(REMOVE_SELECTORS).remove();
  $(BLOCK_SELECTORS).after('\n');

  const container = ['article', 'main', 'body']
    .map((selector) => $(selector).first())
    .find((el) => el.length > 0);
  const raw = container ? container.text() : $.root().text();

  return raw
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Parses an HTML document into scraped content.
 */
export function parseHtml(
  url: string,
  html: string,
  maxContentLength: number = SCRAPER_DEFAULTS.MAX_CONTENT_LENGTH
): ScrapeSuccess {
  const $ = load(html);

  const title = extractTitle($);
  const metaDescription = extractMetaDescription($);
  const headings = extractHeadings($);

  let bodyText = extractContent($);
  if (bodyText.length > maxContentLength) {
    bodyText = `${bodyText.slice(0, maxContentLength)}...`;
  }

  return {
    success: true,
    url,
    title,
    bodyText,
    metaDescription,
    headings,
    wordCount: bodyText.split(/\s+/).filter(Boolean).length,
  };
}

/**
 * FetchClient that downloads pages with the global fetch and parses them
 * with cheerio.
 */
export function createWebScraper(options: ScraperOptions = {}): FetchClient {
  const log = options.logger ?? createPrefixedLogger('[Scraper]');
  const fetchImpl = options.fetch ?? fetch;
  const timeoutMs = options.timeoutMs ?? SCRAPER_DEFAULTS.TIMEOUT_MS;
  const maxContentLength = options.maxContentLength ?? SCRAPER_DEFAULTS.MAX_CONTENT_LENGTH;

  return {
    async fetch(url, signal): Promise<ScrapedContent> {
      const timeoutSignal = AbortSignal.timeout(timeoutMs);

      try {
        const res = await fetchImpl(url, {
          headers: {
            'user-agent': options.userAgent ?? SCRAPER_DEFAULTS.USER_AGENT,
            accept: 'text/html,application/xhtml+xml',
          },
          redirect: 'follow',
          signal: signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal,
        });

        if (!res.ok) {
          log.debug(`Fetch ${url} failed with HTTP ${res.status}`);
          return { success: false, url, errorDetail: `HTTP ${res.status}` };
        }

        const content = parseHtml(url, await res.text(), maxContentLength);
        log.debug(`Scraped ${url}: ${content.wordCount} words`);
        return content;
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        log.debug(`Fetch ${url} failed: ${detail}`);
        return { success: false, url, errorDetail: detail };
      }
    },
  };
}

/**
 * Fetches several pages concurrently; results keep the input order.
 * A client that rejects despite its contract yields a failure entry.
 */
export function fetchMany(
  client: FetchClient,
  urls: readonly string[],
  signal?: AbortSignal
): Promise<ScrapedContent[]> {
  return Promise.all(
    urls.map((url) =>
      client.fetch(url, signal).catch(
        (error: unknown): ScrapedContent => ({
          success: false,
          url,
          errorDetail: error instanceof Error ? error.message : String(error),
        })
      )
    )
  );
}
