/**
 * Source Collector
 *
 * Turns a topic into raw research material: search queries, deduplicated
 * search hits and the full text of the top few pages.
 *
 * Search and fetch failures degrade the result; they never abort it.
 */

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import type { ModelClient } from '../../model-client';
import { fetchMany } from '../../tools/scraper';
import type { FetchClient, SearchClient, SearchResult } from '../../tools/types';
import { COLLECTOR_CONFIG } from '../config';
import { getQueryGenerationPrompt } from '../prompts';
import { BlogGenerationError, errorMessage, isBlogGenerationError, type ResearchInput } from '../types';

// ============================================================================
// Types
// ============================================================================

export interface CollectorInput {
  readonly topic: string;
  readonly additionalContext?: string;
  /** Skips query generation when given */
  readonly queries?: readonly string[];
  /** Unique results whose pages are fetched (default: 3) */
  readonly scrapeTopN?: number;
  /** Results requested per query */
  readonly maxResults: number;
}

export interface CollectorDeps {
  readonly model: ModelClient;
  readonly search: SearchClient;
  readonly fetch: FetchClient;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
}

// ============================================================================
// Query Generation
// ============================================================================

export function buildFallbackQueries(topic: string): string[] {
  return [topic, ...COLLECTOR_CONFIG.FALLBACK_QUERY_SUFFIXES.map((suffix) => `${topic} ${suffix}`)];
}

/**
 * One query per non-empty line. List markers and surrounding quotes are dropped.
 */
export function parseQueryLines(text: string): string[] {
  return text
    .split('\n')
    .map((line) =>
      line
        .trim()
        .replace(/^(?:[-*•]|\d+[.)])\s*/, '')
        .replace(/^["']+|["']+$/g, '')
        .trim()
    )
    .filter((line) => line.length > 0)
    .slice(0, COLLECTOR_CONFIG.MAX_QUERIES);
}

/**
 * Asks the model for search phrasings. Any failure other than
 * cancellation yields the fixed fallback set.
 */
export async function generateSearchQueries(
  topic: string,
  deps: Pick<CollectorDeps, 'model' | 'logger' | 'signal'>
): Promise<string[]> {
  const log = deps.logger ?? createPrefixedLogger('[Collector]');

  try {
    const reply = await deps.model.generate(getQueryGenerationPrompt(topic), undefined, {
      signal: deps.signal,
      context: 'Collector query generation',
    });
    const queries = parseQueryLines(reply);
    if (queries.length > 0) return queries;
    log.warn('Query generation returned no usable lines, using fallback queries');
  } catch (error) {
    if (isBlogGenerationError(error) && error.code === 'CANCELLED') throw error;
    log.warn(`Query generation failed, using fallback queries: ${errorMessage(error)}`);
  }

  return buildFallbackQueries(topic);
}

// ============================================================================
// Deduplication
// ============================================================================

/**
 * Flattens per-query batches and keeps the first result seen for each url.
 */
export function dedupeByUrl(batches: readonly (readonly SearchResult[])[]): SearchResult[] {
  const seen = new Set<string>();
  const unique: SearchResult[] = [];

  for (const result of batches.flat()) {
    if (seen.has(result.url)) continue;
    seen.add(result.url);
    unique.push(result);
  }

  return unique;
}

// ============================================================================
// Main Collector Function
// ============================================================================

function assertNotCancelled(signal: AbortSignal | undefined, topic: string): void {
  if (signal?.aborted) {
    throw new BlogGenerationError('CANCELLED', `Research for "${topic}" was cancelled`);
  }
}

/**
 * Runs the Source Collector.
 *
 * Queries are issued concurrently; results are aggregated in query order
 * before deduplication so the first-seen tie-break holds.
 */
export async function runCollector(input: CollectorInput, deps: CollectorDeps): Promise<ResearchInput> {
  const log = deps.logger ?? createPrefixedLogger('[Collector]');
  const { topic, maxResults } = input;
  const scrapeTopN = input.scrapeTopN ?? COLLECTOR_CONFIG.DEFAULT_SCRAPE_TOP_N;

  const queries =
    input.queries && input.queries.length > 0
      ? [...input.queries]
      : await generateSearchQueries(topic, deps);
  log.info(`Searching with ${queries.length} queries`);
  assertNotCancelled(deps.signal, topic);

  const batches = await Promise.all(
    queries.map(async (query) => {
      try {
        return await deps.search.search(query, maxResults, deps.signal);
      } catch (error) {
        log.warn(`Search failed for "${query}": ${errorMessage(error)}`);
        return [];
      }
    })
  );
  assertNotCancelled(deps.signal, topic);

  const searchResults = dedupeByUrl(batches);
  log.info(`Found ${searchResults.length} unique results`);

  const urls = searchResults.slice(0, Math.max(0, scrapeTopN)).map((result) => result.url);
  const scrapedContent = urls.length > 0 ? await fetchMany(deps.fetch, urls, deps.signal) : [];
  assertNotCancelled(deps.signal, topic);

  const scraped = scrapedContent.filter((page) => page.success).length;
  log.info(`Scraped ${scraped}/${urls.length} pages`);

  return {
    topic,
    additionalContext: input.additionalContext ?? '',
    queries,
    searchResults,
    scrapedContent,
  };
}
