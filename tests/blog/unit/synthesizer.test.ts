import { describe, it, expect } from 'vitest';

import { runSynthesizer } from '../../../src/ai/blog/agents/synthesizer';
import type { ResearchInput } from '../../../src/ai/blog/types';
import { createFakeModel, createMockLogger, scrapedPage, searchHit } from '../../mocks/fakes';

const baseInput: ResearchInput = {
  topic: 'unit testing',
  additionalContext: '',
  queries: ['unit testing'],
  searchResults: [searchHit('https://a.test/a', 'Alpha')],
  scrapedContent: [
    scrapedPage('https://a.test/a', 'Alpha page', 'Alpha body.'),
    { success: false, url: 'https://failed.test/x', errorDetail: 'HTTP 500' },
  ],
};

describe('runSynthesizer', () => {
  it('returns the model summary for the research prompt', async () => {
    const { model, generate } = createFakeModel(() => 'The brief.');

    const summary = await runSynthesizer(baseInput, {
      model,
      systemPrompt: 'You are a researcher.',
      logger: createMockLogger(),
    });

    expect(summary).toBe('The brief.');
    const [prompt, systemPrompt, options] = generate.mock.calls[0];
    expect(systemPrompt).toBe('You are a researcher.');
    expect(options).toMatchObject({ context: 'Research synthesis' });
    expect(prompt).toContain('**Topic:** unit testing');
    expect(prompt).toContain('No additional context provided.');
    expect(prompt).toContain('**[1] Alpha**');
    expect(prompt).toContain('**Source: Alpha page** (https://a.test/a)\nAlpha body....');
  });

  it('leaves failed pages out of the prompt', async () => {
    const { model, generate } = createFakeModel(() => 'The brief.');

    await runSynthesizer(baseInput, { model, systemPrompt: 's', logger: createMockLogger() });

    expect(generate.mock.calls[0][0]).not.toContain('https://failed.test/x');
  });

  it('still calls the model when nothing was found', async () => {
    const { model, generate } = createFakeModel(() => 'General brief.');
    const logger = createMockLogger();

    const summary = await runSynthesizer(
      { ...baseInput, additionalContext: 'For beginners', searchResults: [], scrapedContent: [] },
      { model, systemPrompt: 's', logger }
    );

    expect(summary).toBe('General brief.');
    expect(logger.warn).toHaveBeenCalledWith(
      'No search results for "unit testing"; synthesizing from general knowledge'
    );
    const prompt = generate.mock.calls[0][0];
    expect(prompt).toContain('For beginners');
    expect(prompt).toContain('## Search Results:\nNo search results found.');
    expect(prompt).toContain('## Scraped Content:\nNo page content could be retrieved.');
  });

  it('propagates model failures', async () => {
    const { model } = createFakeModel(() => {
      throw new Error('model down');
    });

    await expect(
      runSynthesizer(baseInput, { model, systemPrompt: 's', logger: createMockLogger() })
    ).rejects.toThrow('model down');
  });
});
