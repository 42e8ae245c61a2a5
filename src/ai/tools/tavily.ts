/**
 * Tavily Web Search API wrapper.
 *
 * Docs: https://docs.tavily.com/documentation/api-reference/endpoint/search
 *
 * Cost: 1 credit per basic search, 2 per advanced.
 * Without a `TAVILY_API_KEY` every search returns no results, so research
 * degrades to "no sources found" instead of failing.
 */

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { extractDomain, isRecord, type SearchClient, type SearchResult } from './types';

export type TavilySearchDepth = 'basic' | 'advanced';

export interface TavilySearchOptions {
  readonly searchDepth?: TavilySearchDepth;
  readonly maxResults?: number;
  readonly includeAnswer?: boolean;
  readonly timeoutMs?: number;
  /** Video pages have no useful text; excluding them is usually right. */
  readonly excludeDomains?: readonly string[];
  readonly signal?: AbortSignal;
}

export interface TavilySearchResult {
  readonly title: string;
  readonly url: string;
  readonly content?: string;
  readonly score?: number;
}

export interface TavilySearchResponse {
  readonly query: string;
  readonly answer: string | null;
  readonly results: readonly TavilySearchResult[];
  /** Credits consumed, when the API reports usage */
  readonly credits?: number;
}

export interface TavilyClientDeps {
  /** Falls back to TAVILY_API_KEY at call time */
  readonly apiKey?: string;
  readonly fetch?: typeof fetch;
  readonly logger?: Logger;
  readonly defaults?: Omit<TavilySearchOptions, 'signal' | 'maxResults'>;
}

const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';

export function isTavilyConfigured(apiKey?: string): boolean {
  return Boolean(apiKey ?? process.env.TAVILY_API_KEY);
}

function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.trunc(value)));
}

function safeString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function emptyResponse(query: string): TavilySearchResponse {
  return { query, answer: null, results: [] };
}

export function parseTavilyResponse(query: string, raw: unknown): TavilySearchResponse {
  if (!isRecord(raw)) {
    return emptyResponse(query);
  }

  const answer = safeString(raw.answer) ?? null;
  const resultsRaw: unknown[] = Array.isArray(raw.results) ? raw.results : [];

  const results: TavilySearchResult[] = resultsRaw
    .map((r): TavilySearchResult | null => {
      if (!isRecord(r)) return null;
      const title = safeString(r.title);
      const url = safeString(r.url);
      if (!title || !url) return null;

      const content = safeString(r.content);
      const score = typeof r.score === 'number' ? r.score : undefined;

      return {
        title,
        url,
        ...(content ? { content } : {}),
        ...(score !== undefined ? { score } : {}),
      };
    })
    .filter((r): r is TavilySearchResult => r !== null);

  const usage = raw.usage;
  const credits = isRecord(usage) && typeof usage.credits === 'number' ? usage.credits : undefined;

  return {
    query,
    answer,
    results,
    ...(credits !== undefined ? { credits } : {}),
  };
}

/**
 * Tavily search. Never rejects: a missing key, HTTP error, timeout or
 * malformed body all produce an empty response.
 */
export async function tavilySearch(
  query: string,
  options: TavilySearchOptions = {},
  deps: Omit<TavilyClientDeps, 'defaults'> = {}
): Promise<TavilySearchResponse> {
  const cleanedQuery = query.trim();
  if (cleanedQuery.length === 0) {
    return emptyResponse(cleanedQuery);
  }

  const apiKey = deps.apiKey ?? process.env.TAVILY_API_KEY;
  if (!apiKey) {
    return emptyResponse(cleanedQuery);
  }

  const log = deps.logger ?? createPrefixedLogger('[Tavily]');
  const fetchImpl = deps.fetch ?? fetch;
  const timeoutMs = clampInt(options.timeoutMs ?? 15_000, 1_000, 60_000);
  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  const signal = options.signal ? AbortSignal.any([options.signal, timeoutSignal]) : timeoutSignal;

  try {
    const res = await fetchImpl(TAVILY_SEARCH_URL, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        query: cleanedQuery,
        search_depth: options.searchDepth ?? 'basic',
        max_results: clampInt(options.maxResults ?? 10, 1, 20), // Tavily allows up to 20
        include_answer: options.includeAnswer ?? false,
        include_usage: true,
        ...(options.excludeDomains && options.excludeDomains.length > 0
          ? { exclude_domains: [...options.excludeDomains] }
          : {}),
      }),
      signal,
    });

    if (!res.ok) {
      log.warn(`Search "${cleanedQuery}" failed with HTTP ${res.status}`);
      return emptyResponse(cleanedQuery);
    }

    const json: unknown = await res.json();
    return parseTavilyResponse(cleanedQuery, json);
  } catch (error) {
    log.warn(`Search "${cleanedQuery}" failed: ${error instanceof Error ? error.message : String(error)}`);
    return emptyResponse(cleanedQuery);
  }
}

/**
 * SearchClient backed by Tavily.
 */
export function createTavilySearchClient(deps: TavilyClientDeps = {}): SearchClient {
  return {
    async search(query, maxResults, signal): Promise<readonly SearchResult[]> {
      const response = await tavilySearch(
        query,
        { ...deps.defaults, maxResults, signal },
        deps
      );
      return response.results.map((r) => ({
        title: r.title,
        url: r.url,
        snippet: r.content ?? '',
        sourceDomain: extractDomain(r.url),
      }));
    },
  };
}
