import { describe, it, expect, vi } from 'vitest';

import { runWriter } from '../../../src/ai/blog/agents/writer';
import type { BlogOutline } from '../../../src/ai/blog/outline';
import type { Source } from '../../../src/ai/blog/types';
import { createFakeModel, createMockLogger, createScriptedModel } from '../../mocks/fakes';

const outline: BlogOutline = {
  title: 'Testing Without Tears',
  metaDescription: 'Start testing today.',
  sections: [
    { title: 'Why Test', keyPoints: ['confidence', 'speed'], estimatedWords: 900, subsections: [] },
    {
      title: 'First Test',
      keyPoints: ['pure functions'],
      estimatedWords: 0,
      subsections: [{ title: 'Arrange Act Assert', keyPoints: [], estimatedWords: 0 }],
    },
  ],
  tags: ['testing'],
  categories: ['Engineering'],
  targetWordCount: 1000,
  seoKeywords: [],
  layoutType: 'how-to',
  rawOutlineText: '',
};

const sources: Source[] = [{ title: 'Handbook', url: 'https://example.com/handbook', description: 'A guide' }];

const SCRIPT = [
  ['Write the introduction', 'INTRO'],
  ['**Current Section:** Why Test', 'TEXT A'],
  ['**Current Section:** First Test', 'TEXT B'],
  ['Write the conclusion', 'OUTRO'],
] as const;

describe('runWriter', () => {
  it('assembles introduction, headed sections and conclusion', async () => {
    const { model } = createScriptedModel(SCRIPT);

    const post = await runWriter(
      { outline, researchSummary: 'Notes.', sources: [] },
      { model, systemPrompt: 'writer', includeCitations: true, logger: createMockLogger() }
    );

    expect(post.title).toBe('Testing Without Tears');
    expect(post.content).toBe('INTRO\n\n## Why Test\n\nTEXT A\n\n## First Test\n\nTEXT B\n\nOUTRO');
    expect(post.sections).toEqual({
      introduction: 'INTRO',
      'Why Test': 'TEXT A',
      'First Test': 'TEXT B',
      conclusion: 'OUTRO',
    });
    expect(post.wordCount).toBe(12);
    expect(post.sources).toEqual([]);
  });

  it('appends references when citations are enabled', async () => {
    const { model } = createScriptedModel(SCRIPT);

    const post = await runWriter(
      { outline, researchSummary: 'Notes.', sources },
      { model, systemPrompt: 'writer', includeCitations: true, logger: createMockLogger() }
    );

    expect(post.content.endsWith('OUTRO\n\n## References\n\n1. [Handbook](https://example.com/handbook) - A guide...')).toBe(
      true
    );
  });

  it('leaves references out when citations are disabled', async () => {
    const { model } = createScriptedModel(SCRIPT);

    const post = await runWriter(
      { outline, researchSummary: 'Notes.', sources },
      { model, systemPrompt: 'writer', includeCitations: false, logger: createMockLogger() }
    );

    expect(post.content.endsWith('\n\nOUTRO')).toBe(true);
    expect(post.sources).toEqual(sources);
  });

  it('writes each section with the text before it', async () => {
    const { model, generate } = createScriptedModel(SCRIPT);

    await runWriter(
      { outline, researchSummary: 'Notes.', sources: [] },
      { model, systemPrompt: 'writer', includeCitations: false, logger: createMockLogger() }
    );

    const prompts = generate.mock.calls.map(([prompt]) => prompt);
    expect(prompts).toHaveLength(4);
    expect(prompts[1]).toContain('**What came before:**\nINTRO\n\n**Research to incorporate:**');
    expect(prompts[2]).toContain('**What came before:**\nINTRO\n\nTEXT A\n\n**Research to incorporate:**');
    expect(prompts[2]).toContain('  - Subsection: Arrange Act Assert');
  });

  it('gives every unit the same budget', async () => {
    const { model, generate } = createScriptedModel(SCRIPT);

    await runWriter(
      { outline, researchSummary: 'Notes.', sources: [] },
      { model, systemPrompt: 'writer', includeCitations: false, logger: createMockLogger() }
    );

    // 1000 / (2 sections + 2)
    expect(generate.mock.calls[0][0]).toContain('**Length:** about 250 words.');
    expect(generate.mock.calls[1][0]).toContain('**Target length:** 250 words');
    expect(generate.mock.calls[2][0]).toContain('**Target length:** 250 words');
  });

  it('passes research notes and the system prompt', async () => {
    const { model, generate } = createScriptedModel(SCRIPT);

    await runWriter(
      { outline, researchSummary: `${'r'.repeat(2500)}`, sources: [] },
      { model, systemPrompt: 'writer', includeCitations: false, logger: createMockLogger() }
    );

    const [sectionPrompt, systemPrompt, options] = generate.mock.calls[1];
    expect(sectionPrompt).toContain(`**Research to incorporate:**\n${'r'.repeat(2000)}\n\n**Target length:**`);
    expect(systemPrompt).toBe('writer');
    expect(options).toMatchObject({ context: 'Writer section "Why Test"' });
  });

  it('uses placeholder notes without research', async () => {
    const { model, generate } = createScriptedModel(SCRIPT);

    await runWriter(
      { outline, researchSummary: '   ', sources: [] },
      { model, systemPrompt: 'writer', includeCitations: false, logger: createMockLogger() }
    );

    expect(generate.mock.calls[1][0]).toContain('**Research to incorporate:**\nNo research notes available.');
  });

  it('reports progress after each unit', async () => {
    const { model } = createScriptedModel(SCRIPT);
    const onSectionWritten = vi.fn();

    await runWriter(
      { outline, researchSummary: 'Notes.', sources: [] },
      { model, systemPrompt: 'writer', includeCitations: false, logger: createMockLogger(), onSectionWritten }
    );

    expect(onSectionWritten.mock.calls).toEqual([
      [1, 4, 'Introduction'],
      [2, 4, 'Why Test'],
      [3, 4, 'First Test'],
      [4, 4, 'Conclusion'],
    ]);
  });

  it('fails the whole write when a section fails', async () => {
    const { model, generate } = createFakeModel((prompt) => {
      if (prompt.includes('**Current Section:** First Test')) throw new Error('rate limited');
      return 'text';
    });

    await expect(
      runWriter(
        { outline, researchSummary: '', sources: [] },
        { model, systemPrompt: 'writer', includeCitations: false, logger: createMockLogger() }
      )
    ).rejects.toThrow('rate limited');
    expect(generate).toHaveBeenCalledTimes(3);
  });
});
