import { slugify } from '../../utils/slug';

export interface MarkdownHeading {
  readonly level: number;
  readonly text: string;
  readonly slug: string;
}

export interface MarkdownH2Section {
  readonly heading: string;
  readonly content: string;
}

const FENCE_PATTERN = /^\s*(```|~~~)/;
const HEADING_PATTERN = /^(#{1,6})\s+(.+?)(?:\s+#+)?\s*$/;

/**
 * Word count used everywhere in the pipeline: whitespace-separated tokens.
 */
export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

/**
 * Word count ignoring fenced and inline code.
 */
export function countProseWords(text: string): number {
  const withoutCode = text.replace(/```[\s\S]*?```/g, '').replace(/`[^`]+`/g, '');
  return countWords(withoutCode);
}

/**
 * Finds ATX headings outside fenced code blocks.
 */
export function extractHeadings(markdown: string): MarkdownHeading[] {
  const headings: MarkdownHeading[] = [];
  let inFence = false;

  for (const line of markdown.split('\n')) {
    if (FENCE_PATTERN.test(line)) {
      inFence = !inFence;
      continue;
    }
    if (inFence) continue;

    const match = HEADING_PATTERN.exec(line);
    if (!match) continue;
    const text = match[2].trim();
    headings.push({ level: match[1].length, text, slug: slugify(text) });
  }

  return headings;
}

/**
 * Builds a "Table of Contents" block linking every heading up to `maxLevel`.
 *
 * @example
 * generateToc('## Setup\n### Install')
 * // "## Table of Contents\n\n  - [Setup](#setup)\n    - [Install](#install)"
 */
export function generateToc(markdown: string, maxLevel = 3): string {
  const lines = ['## Table of Contents', ''];

  for (const heading of extractHeadings(markdown)) {
    if (heading.level > maxLevel) continue;
    const indent = '  '.repeat(heading.level - 1);
    lines.push(`${indent}- [${heading.text}](#${heading.slug})`);
  }

  return lines.join('\n');
}

/**
 * Normalizes line endings, collapses runs of 4+ newlines to a blank line
 * and ends the document with exactly one newline.
 */
export function cleanContent(content: string): string {
  const normalized = content
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .replace(/\n{4,}/g, '\n\n');
  return `${normalized.trim()}\n`;
}

/**
 * Parses "## " sections from markdown in a simple, predictable way.
 *
 * - Only looks for H2 headings that start a line: `## `
 * - Keeps section order as it appears
 * - Does not attempt full markdown parsing
 */
export function parseMarkdownH2Sections(markdown: string): MarkdownH2Section[] {
  const lines = markdown.split('\n');

  const sections: MarkdownH2Section[] = [];
  let currentHeading: string | undefined;
  let currentContent: string[] = [];

  const pushIfAny = () => {
    if (!currentHeading) return;
    sections.push({
      heading: currentHeading,
      content: currentContent.join('\n').trim(),
    });
  };

  for (const line of lines) {
    if (line.startsWith('## ')) {
      pushIfAny();
      currentHeading = line.slice(3).trim();
      currentContent = [];
      continue;
    }

    if (currentHeading) {
      currentContent.push(line);
    }
  }

  pushIfAny();
  return sections;
}

/**
 * H2 sections shorter than `minWords`, skipping the TOC and references.
 */
export function findThinSections(markdown: string, minWords: number): string[] {
  return parseMarkdownH2Sections(markdown)
    .filter((s) => !/^(table of contents|references)$/i.test(s.heading))
    .filter((s) => countWords(s.content) < minWords)
    .map((s) => s.heading);
}

/**
 * Text of the first `# ` heading, if any.
 */
export function findFirstH1(markdown: string): string | undefined {
  const match = /^#\s+(.+)$/m.exec(markdown);
  return match ? match[1].trim() : undefined;
}
