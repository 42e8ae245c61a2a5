/**
 * Search provider selection and prompt formatting.
 */

import type { Logger } from '../../utils/logger';
import { createDuckDuckGoSearchClient } from './duckduckgo';
import { createTavilySearchClient } from './tavily';
import type { SearchClient, SearchResult } from './types';

export const SEARCH_PROVIDERS = ['tavily', 'duckduckgo'] as const;

export type SearchProvider = (typeof SEARCH_PROVIDERS)[number];

export interface SearchClientOptions {
  readonly provider: SearchProvider;
  readonly tavilyApiKey?: string;
  readonly fetch?: typeof fetch;
  readonly logger?: Logger;
}

export function createSearchClient(options: SearchClientOptions): SearchClient {
  switch (options.provider) {
    case 'tavily':
      return createTavilySearchClient({
        apiKey: options.tavilyApiKey,
        fetch: options.fetch,
        logger: options.logger,
      });
    case 'duckduckgo':
      return createDuckDuckGoSearchClient({ fetch: options.fetch, logger: options.logger });
  }
}

/**
 * Numbered result blocks for inclusion in a prompt.
 *
 * @example
 * **[1] Example Title**
 * Source: example.com
 * URL: https://example.com/page
 * Snippet: First lines of the page...
 */
export function formatSearchResultsForPrompt(results: readonly SearchResult[]): string {
  if (results.length === 0) return 'No search results found.';

  return results
    .map(
      (result, i) =>
        `**[${i + 1}] ${result.title}**\nSource: ${result.sourceDomain}\nURL: ${result.url}\nSnippet: ${result.snippet}\n`
    )
    .join('\n');
}
