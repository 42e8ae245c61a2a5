/**
 * Source Collector and Research Synthesizer prompts.
 */

import { formatSearchResultsForPrompt } from '../../tools/search';
import type { ScrapeSuccess, SearchResult } from '../../tools/types';
import { SYNTHESIZER_CONFIG } from '../config';

export interface ResearchPromptContext {
  readonly topic: string;
  readonly additionalContext: string;
  readonly searchResults: readonly SearchResult[];
  /** Successful pages only */
  readonly scrapedPages: readonly ScrapeSuccess[];
}

export const NO_SCRAPED_CONTENT_TEXT = 'No page content could be retrieved.';

/**
 * Asks for one query per line; the collector keeps the first few lines.
 */
export function getQueryGenerationPrompt(topic: string): string {
  return `Generate 3-5 diverse search queries to research the following topic comprehensively:

Topic: ${topic}

Return only the search queries, one per line, without numbering or explanation.`;
}

function formatScrapedPages(pages: readonly ScrapeSuccess[]): string {
  if (pages.length === 0) return NO_SCRAPED_CONTENT_TEXT;

  return pages
    .map(
      (page) =>
        `**Source: ${page.title}** (${page.url})\n${page.bodyText.slice(0, SYNTHESIZER_CONFIG.SCRAPED_EXCERPT_CHARS)}...`
    )
    .join('\n\n');
}

/**
 * Research brief request, followed by the raw material it should draw on.
 */
export function getResearchUserPrompt(ctx: ResearchPromptContext): string {
  const brief = ctx.additionalContext.trim() || SYNTHESIZER_CONFIG.NO_CONTEXT_TEXT;
  const topResults = ctx.searchResults.slice(0, SYNTHESIZER_CONFIG.TOP_SEARCH_RESULTS);

  return `Prepare a research brief on the topic below for the writer of a long-form article.

**Topic:** ${ctx.topic}

**Editorial Brief:**
${brief}

**What the brief should contain:**
1. The key facts, figures and dates, each tied to the source it came from
2. Expert views, including any that disagree with the mainstream position
3. Concrete examples or case studies a writer can use
4. Common misconceptions and what the evidence actually shows
5. Practical takeaways for the reader

Organize the brief under clear headings and put the most compelling findings first.
If the material below is thin or missing, say so and rely on well-established knowledge only.

## Search Results:
${formatSearchResultsForPrompt(topResults)}

## Scraped Content:
${formatScrapedPages(ctx.scrapedPages)}`;
}
