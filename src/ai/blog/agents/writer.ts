/**
 * Section Writer
 *
 * Expands an outline into prose: introduction, one block per section,
 * conclusion, then an optional reference list built without a model call.
 *
 * Sections are written strictly in order. Each section prompt carries the
 * tail of everything written before it, so they cannot run in parallel.
 * Any failed model call fails the whole write.
 */

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import type { ModelClient } from '../../model-client';
import { formatReferences } from '../citations';
import { WRITER_CONFIG } from '../config';
import { countWords } from '../markdown-utils';
import { wordsPerSection, type BlogOutline } from '../outline';
import { getConclusionPrompt, getIntroductionPrompt, getSectionPrompt } from '../prompts';
import {
  buildMainPoints,
  buildSectionOutline,
  buildSectionPreview,
  createInitialSectionWriteState,
  getPreviousContentWindow,
  updateSectionWriteState,
} from '../section-context';
import type { BlogPost, Source } from '../types';

// ============================================================================
// Types
// ============================================================================

export interface WriterInput {
  readonly outline: BlogOutline;
  readonly researchSummary: string;
  readonly sources: readonly Source[];
  /** Defaults to the outline title */
  readonly topic?: string;
}

/**
 * Called after each written unit (introduction, every section, conclusion).
 */
export type SectionWrittenCallback = (current: number, total: number, label: string) => void;

export interface WriterDeps {
  readonly model: ModelClient;
  readonly systemPrompt: string;
  readonly includeCitations: boolean;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
  readonly onSectionWritten?: SectionWrittenCallback;
}

export const INTRODUCTION_KEY = 'introduction';
export const CONCLUSION_KEY = 'conclusion';
export const NO_RESEARCH_NOTES_TEXT = 'No research notes available.';

// ============================================================================
// Main Writer Function
// ============================================================================

export async function runWriter(input: WriterInput, deps: WriterDeps): Promise<BlogPost> {
  const log = deps.logger ?? createPrefixedLogger('[Writer]');
  const { outline } = input;
  const topic = input.topic ?? outline.title;
  const budget = wordsPerSection(outline.targetWordCount, outline.sections.length);
  const totalUnits = outline.sections.length + WRITER_CONFIG.RESERVED_SECTIONS;
  const researchNotes =
    input.researchSummary.slice(0, WRITER_CONFIG.RESEARCH_NOTES_CHARS).trim() || NO_RESEARCH_NOTES_TEXT;

  const generate = (prompt: string, context: string): Promise<string> =>
    deps.model.generate(prompt, deps.systemPrompt, { signal: deps.signal, context });

  const sections: Record<string, string> = {};
  let written = 0;
  const markWritten = (label: string): void => {
    written++;
    deps.onSectionWritten?.(written, totalUnits, label);
  };

  // ===== Introduction =====
  log.info(`Writing introduction (${budget} words per unit)`);
  const introduction = await generate(
    getIntroductionPrompt({
      title: outline.title,
      topic,
      sectionPreview: buildSectionPreview(outline.sections),
      targetWords: budget,
    }),
    'Writer introduction'
  );
  sections[INTRODUCTION_KEY] = introduction;
  markWritten('Introduction');

  // ===== Sections, in order =====
  let state = createInitialSectionWriteState(introduction);
  const bodyParts: string[] = [];

  for (const section of outline.sections) {
    log.info(`Writing section ${state.sectionsWritten + 1}/${outline.sections.length}: ${section.title}`);
    const text = await generate(
      getSectionPrompt({
        title: outline.title,
        sectionTitle: section.title,
        sectionOutline: buildSectionOutline(section),
        previousContent: getPreviousContentWindow(state),
        researchNotes,
        targetWords: budget,
      }),
      `Writer section "${section.title}"`
    );

    sections[section.title] = text;
    bodyParts.push(`\n## ${section.title}\n\n${text}`);
    state = updateSectionWriteState(state, text);
    markWritten(section.title);
  }

  // ===== Conclusion =====
  log.info('Writing conclusion');
  const conclusion = await generate(
    getConclusionPrompt({ title: outline.title, topic, mainPoints: buildMainPoints(outline.sections) }),
    'Writer conclusion'
  );
  sections[CONCLUSION_KEY] = conclusion;
  markWritten('Conclusion');

  const parts = [introduction, ...bodyParts, `\n${conclusion}`];
  if (deps.includeCitations && input.sources.length > 0) {
    parts.push(`\n## References\n\n${formatReferences(input.sources)}`);
  }

  const content = parts.join('\n');
  const wordCount = countWords(content);
  log.info(`Draft complete: ${wordCount} words`);

  return {
    title: outline.title,
    content,
    sections,
    sources: input.sources,
    wordCount,
  };
}
