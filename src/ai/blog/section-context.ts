/**
 * Section Context Management
 *
 * Carries already-written text forward so each section is written with the
 * tail of everything before it. Sections are therefore written strictly in
 * order; section i sees text produced for section i-1.
 *
 * @example
 * let state = createInitialSectionWriteState(introduction);
 * const prompt = buildSectionPromptContext(state, ...);
 * state = updateSectionWriteState(state, sectionText);
 */

import { WRITER_CONFIG } from './config';
import type { Section, TopSection } from './outline';

// ============================================================================
// Types
// ============================================================================

export interface SectionWriteState {
  /** Everything written so far, in order */
  readonly previousContent: string;
  /** Outline sections written so far (the introduction is not counted) */
  readonly sectionsWritten: number;
}

// ============================================================================
// State Creation and Updates
// ============================================================================

export function createInitialSectionWriteState(introduction: string): SectionWriteState {
  return { previousContent: introduction, sectionsWritten: 0 };
}

/**
 * Appends a freshly written section. Returns a new state.
 */
export function updateSectionWriteState(state: SectionWriteState, sectionText: string): SectionWriteState {
  return {
    previousContent: state.previousContent ? `${state.previousContent}\n\n${sectionText}` : sectionText,
    sectionsWritten: state.sectionsWritten + 1,
  };
}

/**
 * The trailing slice of written text handed to the next section.
 */
export function getPreviousContentWindow(
  state: SectionWriteState,
  windowSize: number = WRITER_CONFIG.PREVIOUS_CONTENT_WINDOW
): string {
  const { previousContent } = state;
  return previousContent.length > windowSize ? previousContent.slice(-windowSize) : previousContent;
}

// ============================================================================
// Outline Summaries
// ============================================================================

/**
 * One line per section with its first few key points, for the introduction.
 *
 * @example
 * "- Why It Matters: cost, speed, risk"
 */
export function buildSectionPreview(
  sections: readonly Section[],
  keyPointsPerSection: number = WRITER_CONFIG.INTRO_KEY_POINTS
): string {
  return sections
    .map((section) => `- ${section.title}: ${section.keyPoints.slice(0, keyPointsPerSection).join(', ')}`)
    .join('\n');
}

/**
 * A section's own brief: its key points, then its subsection titles.
 */
export function buildSectionOutline(section: TopSection): string {
  return [
    `Key points: ${section.keyPoints.join(', ')}`,
    ...section.subsections.map((sub) => `  - Subsection: ${sub.title}`),
  ].join('\n');
}

/**
 * Section titles only, for the conclusion.
 */
export function buildMainPoints(sections: readonly Section[]): string {
  return sections.map((section) => `- ${section.title}`).join('\n');
}
