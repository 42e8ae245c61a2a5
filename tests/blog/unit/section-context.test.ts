import { describe, it, expect } from 'vitest';

import {
  buildMainPoints,
  buildSectionOutline,
  buildSectionPreview,
  createInitialSectionWriteState,
  getPreviousContentWindow,
  updateSectionWriteState,
} from '../../../src/ai/blog/section-context';
import type { TopSection } from '../../../src/ai/blog/outline';

const sections: TopSection[] = [
  {
    title: 'Why It Matters',
    keyPoints: ['cost', 'speed', 'risk', 'morale'],
    estimatedWords: 0,
    subsections: [{ title: 'Hidden Costs', keyPoints: [], estimatedWords: 0 }],
  },
  { title: 'Getting Started', keyPoints: [], estimatedWords: 0, subsections: [] },
];

describe('section write state', () => {
  it('starts from the introduction', () => {
    expect(createInitialSectionWriteState('Intro.')).toEqual({ previousContent: 'Intro.', sectionsWritten: 0 });
  });

  it('appends sections with a blank line', () => {
    const state = updateSectionWriteState(createInitialSectionWriteState('Intro.'), 'Section one.');

    expect(state).toEqual({ previousContent: 'Intro.\n\nSection one.', sectionsWritten: 1 });
  });

  it('does not add a separator to empty content', () => {
    expect(updateSectionWriteState(createInitialSectionWriteState(''), 'First.').previousContent).toBe('First.');
  });

  it('returns a new state each time', () => {
    const initial = createInitialSectionWriteState('Intro.');
    updateSectionWriteState(initial, 'More.');

    expect(initial.previousContent).toBe('Intro.');
  });
});

describe('getPreviousContentWindow', () => {
  it('returns the tail when content exceeds the window', () => {
    expect(getPreviousContentWindow({ previousContent: 'abcdefghij', sectionsWritten: 0 }, 4)).toBe('ghij');
  });

  it('returns everything when content fits', () => {
    expect(getPreviousContentWindow({ previousContent: 'abc', sectionsWritten: 0 }, 4)).toBe('abc');
  });

  it('defaults to a 1500-character window', () => {
    const state = { previousContent: 'y'.repeat(100) + 'x'.repeat(1500), sectionsWritten: 0 };

    expect(getPreviousContentWindow(state)).toBe('x'.repeat(1500));
  });
});

describe('outline summaries', () => {
  it('previews the first three key points per section', () => {
    expect(buildSectionPreview(sections)).toBe('- Why It Matters: cost, speed, risk\n- Getting Started: ');
  });

  it('lists key points and subsection titles for one section', () => {
    expect(buildSectionOutline(sections[0])).toBe(
      'Key points: cost, speed, risk, morale\n  - Subsection: Hidden Costs'
    );
  });

  it('lists section titles for the conclusion', () => {
    expect(buildMainPoints(sections)).toBe('- Why It Matters\n- Getting Started');
  });
});
