/**
 * DuckDuckGo HTML search.
 *
 * Keyless fallback for when no Tavily key is configured. Parses the
 * html.duckduckgo.com results page; result links are wrapped in a
 * `/l/?uddg=<encoded>` redirect that is unwrapped here.
 */

import { load } from 'cheerio';

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { extractDomain, type SearchClient, type SearchResult } from './types';

export interface DuckDuckGoClientDeps {
  readonly fetch?: typeof fetch;
  readonly logger?: Logger;
  readonly timeoutMs?: number;
  /** Region code, e.g. 'wt-wt' for worldwide */
  readonly region?: string;
}

const DUCKDUCKGO_HTML_URL = 'https://html.duckduckgo.com/html/';
const USER_AGENT = 'Mozilla/5.0 (compatible; draftsmith/0.1)';

/**
 * Resolves a DuckDuckGo result href to the target URL.
 * Returns undefined for hrefs that are not http(s) after unwrapping.
 */
export function resolveResultUrl(href: string): string | undefined {
  let candidate = href.trim();
  if (candidate.startsWith('//')) candidate = `https:${candidate}`;

  try {
    const parsed = new URL(candidate, 'https://duckduckgo.com');
    const wrapped = parsed.searchParams.get('uddg');
    const target = wrapped ? new URL(wrapped) : parsed;
    if (target.protocol !== 'http:' && target.protocol !== 'https:') return undefined;
    if (!wrapped && target.hostname.endsWith('duckduckgo.com')) return undefined;
    return target.toString();
  } catch {
    return undefined;
  }
}

/**
 * Extracts results from a DuckDuckGo HTML results page.
 */
export function parseDuckDuckGoHtml(html: string, maxResults: number): SearchResult[] {
  const $ = load(html);
  const results: SearchResult[] = [];
  const seen = new Set<string>();

  $('a.result__a').each((_, el) => {
    if (results.length >= maxResults) return false;

    const link = $(el);
    const href = link.attr('href');
    const url = href ? resolveResultUrl(href) : undefined;
    const title = link.text().replace(/\s+/g, ' ').trim();
    if (!url || !title || seen.has(url)) return undefined;

    seen.add(url);
    const snippet = link.closest('.result').find('.result__snippet').text().replace(/\s+/g, ' ').trim();
    results.push({ title, url, snippet, sourceDomain: extractDomain(url) });
    return undefined;
  });

  return results;
}

/**
 * SearchClient backed by DuckDuckGo's HTML endpoint. Never rejects.
 */
export function createDuckDuckGoSearchClient(deps: DuckDuckGoClientDeps = {}): SearchClient {
  const log = deps.logger ?? createPrefixedLogger('[DuckDuckGo]');
  const fetchImpl = deps.fetch ?? fetch;

  return {
    async search(query, maxResults, signal): Promise<readonly SearchResult[]> {
      const cleanedQuery = query.trim();
      if (!cleanedQuery) return [];

      const timeoutSignal = AbortSignal.timeout(deps.timeoutMs ?? 15_000);
      const params = new URLSearchParams({ q: cleanedQuery, kl: deps.region ?? 'wt-wt' });

      try {
        const res = await fetchImpl(`${DUCKDUCKGO_HTML_URL}?${params.toString()}`, {
          headers: { 'user-agent': USER_AGENT, accept: 'text/html' },
          signal: signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal,
        });
        if (!res.ok) {
          log.warn(`Search "${cleanedQuery}" failed with HTTP ${res.status}`);
          return [];
        }
        return parseDuckDuckGoHtml(await res.text(), maxResults);
      } catch (error) {
        log.warn(`Search "${cleanedQuery}" failed: ${error instanceof Error ? error.message : String(error)}`);
        return [];
      }
    },
  };
}
