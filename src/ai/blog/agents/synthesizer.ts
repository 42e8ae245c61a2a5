/**
 * Research Synthesizer
 *
 * One model call that turns collected material into a prose research brief.
 * Failures propagate: research is a required phase unless the caller skips it.
 */

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import type { ModelClient } from '../../model-client';
import type { ScrapeSuccess } from '../../tools/types';
import { getResearchUserPrompt } from '../prompts';
import type { ResearchInput } from '../types';

export interface SynthesizerDeps {
  readonly model: ModelClient;
  readonly systemPrompt: string;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
}

export async function runSynthesizer(input: ResearchInput, deps: SynthesizerDeps): Promise<string> {
  const log = deps.logger ?? createPrefixedLogger('[Synthesizer]');

  const scrapedPages = input.scrapedContent.filter((page): page is ScrapeSuccess => page.success);
  if (input.searchResults.length === 0) {
    log.warn(`No search results for "${input.topic}"; synthesizing from general knowledge`);
  }

  const prompt = getResearchUserPrompt({
    topic: input.topic,
    additionalContext: input.additionalContext,
    searchResults: input.searchResults,
    scrapedPages,
  });

  log.info(`Synthesizing research (${input.searchResults.length} results, ${scrapedPages.length} pages)`);
  const summary = await deps.model.generate(prompt, deps.systemPrompt, {
    signal: deps.signal,
    context: 'Research synthesis',
  });
  log.info(`Research summary: ${summary.length} chars`);

  return summary;
}
