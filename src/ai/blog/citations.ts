/**
 * Reference list and source bookkeeping.
 */

import { WRITER_CONFIG } from './config';
import type { ScrapedContent, SearchResult, Source } from './types';

/**
 * One numbered line per source:
 * `1. [Title](https://example.com) - first 100 chars of the description...`
 */
export function formatReferenceLine(source: Source, index: number): string {
  const title = source.title.trim() || 'Untitled';
  const description = source.description.trim();
  const suffix = description
    ? ` - ${description.slice(0, WRITER_CONFIG.REFERENCE_DESCRIPTION_CHARS)}...`
    : '';
  return `${index}. [${title}](${source.url})${suffix}`;
}

/**
 * Numbered reference list, or '' when there are no sources.
 */
export function formatReferences(sources: readonly Source[]): string {
  return sources.map((source, i) => formatReferenceLine(source, i + 1)).join('\n');
}

/**
 * Builds the citation list for a run: successfully scraped pages first,
 * then search hits, one entry per url, capped at `maxSources`.
 */
export function buildSources(
  searchResults: readonly SearchResult[],
  scrapedContent: readonly ScrapedContent[],
  maxSources: number
): Source[] {
  const byUrl = new Map<string, Source>();

  for (const page of scrapedContent) {
    if (!page.success || byUrl.has(page.url)) continue;
    const hit = searchResults.find((result) => result.url === page.url);
    byUrl.set(page.url, {
      title: page.title || hit?.title || 'Untitled',
      url: page.url,
      description: page.metaDescription || hit?.snippet || '',
    });
  }

  for (const result of searchResults) {
    if (byUrl.has(result.url)) continue;
    byUrl.set(result.url, {
      title: result.title,
      url: result.url,
      description: result.snippet,
    });
  }

  return [...byUrl.values()].slice(0, Math.max(0, maxSources));
}
