/**
 * Blog Outline
 *
 * The structured plan that precedes prose generation, the schema for the
 * planner's structuring reply, and the deterministic fallback outline.
 *
 * Sections nest exactly one level: a TopSection may carry subsections,
 * a Section may not. The schemas below drop anything deeper.
 */

import { z } from 'zod';

import { slugify } from '../../utils/slug';
import { PLANNER_CONFIG } from './config';

// ============================================================================
// Types
// ============================================================================

export const LAYOUT_TYPES = [
  'deep-dive',
  'narrative',
  'analytical',
  'how-to',
  'opinion',
  'listicle',
] as const;

export type LayoutType = (typeof LAYOUT_TYPES)[number];

export const DEFAULT_LAYOUT: LayoutType = 'deep-dive';

export interface Section {
  readonly title: string;
  readonly keyPoints: readonly string[];
  /** Soft word budget passed to the writer; 0 means unspecified */
  readonly estimatedWords: number;
}

export interface TopSection extends Section {
  readonly subsections: readonly Section[];
}

export interface BlogOutline {
  readonly title: string;
  readonly metaDescription: string;
  /** Never empty once planning completes */
  readonly sections: readonly TopSection[];
  /** Deduplicated, order carries no meaning */
  readonly tags: readonly string[];
  readonly categories: readonly string[];
  readonly targetWordCount: number;
  readonly seoKeywords: readonly string[];
  readonly layoutType: LayoutType;
  /** The planner's free-form reply, kept for display and refinement */
  readonly rawOutlineText: string;
}

/**
 * Result of turning the structuring reply into an outline.
 * `unstructured` is an expected branch, not an error.
 */
export type OutlineParseResult =
  | { readonly kind: 'structured'; readonly outline: BlogOutline }
  | { readonly kind: 'unstructured'; readonly reason: string };

export interface OutlineParseContext {
  readonly topic: string;
  readonly targetWordCount: number;
  readonly suggestedTags: readonly string[];
  readonly suggestedCategories: readonly string[];
  readonly rawOutlineText: string;
}

// ============================================================================
// Helpers
// ============================================================================

export function isLayoutType(value: string): value is LayoutType {
  return LAYOUT_TYPES.some((layout) => layout === value);
}

/**
 * Maps a model-supplied layout to a known one, defaulting to deep-dive.
 */
export function normalizeLayoutType(value: string | null | undefined): LayoutType {
  const cleaned = (value ?? '').trim().toLowerCase().replace(/[\s_]+/g, '-');
  return isLayoutType(cleaned) ? cleaned : DEFAULT_LAYOUT;
}

/**
 * Trims, drops empties and removes duplicates keeping the first occurrence.
 */
export function uniqueStrings(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed.length === 0 || seen.has(trimmed)) continue;
    seen.add(trimmed);
    out.push(trimmed);
  }
  return out;
}

/**
 * Removes a surrounding markdown code fence (```json ... ```), if present.
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) return trimmed;

  const lines = trimmed.split('\n');
  const body = lines[lines.length - 1]?.trim() === '```' ? lines.slice(1, -1) : lines.slice(1);
  return body.join('\n').trim();
}

/**
 * Per-section soft budget: integer division with two slots reserved for
 * the introduction and conclusion. The remainder is not redistributed.
 */
export function wordsPerSection(targetWordCount: number, sectionCount: number): number {
  return Math.floor(targetWordCount / (sectionCount + 2));
}

// ============================================================================
// Structuring Reply Schema
// ============================================================================

// A bare string is read as a comma or newline separated list.
const stringList = z
  .union([z.array(z.string()), z.string()])
  .nullish()
  .transform((value) => (typeof value === 'string' ? value.split(/[,\n]/) : value ?? []));

// Missing titles become blank and are filtered out with the blank ones.
const optionalTitle = z
  .string()
  .nullish()
  .transform((value) => value?.trim() ?? '');

// Unknown keys are stripped, so a `subsections` field on a subsection never survives.
const RawSubsectionSchema = z.object({
  title: optionalTitle,
  key_points: stringList,
  estimated_words: z.number().int().nonnegative().nullish(),
});

const RawSectionSchema = RawSubsectionSchema.extend({
  subsections: z
    .array(RawSubsectionSchema)
    .nullish()
    .transform((value) => value ?? []),
});

/**
 * Shape of the JSON the structuring call is asked for.
 */
export const StructuredOutlineSchema = z.object({
  title: z.string().nullish(),
  meta_description: z.string().nullish(),
  layout_type: z.string().nullish(),
  tags: stringList,
  categories: stringList,
  seo_keywords: stringList,
  sections: z.array(RawSectionSchema).min(1),
});

export type StructuredOutline = z.infer<typeof StructuredOutlineSchema>;

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Builds an outline from the structuring reply.
 *
 * Tags and categories are the union of the model's and the caller's, in
 * first-seen order. The target word count is always the caller's.
 */
export function parseStructuredOutline(
  responseText: string,
  context: OutlineParseContext
): OutlineParseResult {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFences(responseText));
  } catch (error) {
    return {
      kind: 'unstructured',
      reason: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const parsed = StructuredOutlineSchema.safeParse(json);
  if (!parsed.success) {
    return { kind: 'unstructured', reason: `schema mismatch: ${formatZodIssues(parsed.error)}` };
  }

  const data = parsed.data;
  const titled = data.sections.filter((section) => section.title.length > 0);
  if (titled.length === 0) {
    return { kind: 'unstructured', reason: 'no section has a title' };
  }

  const budget = wordsPerSection(context.targetWordCount, titled.length);
  const sections: TopSection[] = titled.map((section) => ({
    title: section.title,
    keyPoints: uniqueStrings(section.key_points),
    estimatedWords: section.estimated_words ?? budget,
    subsections: section.subsections
      .filter((sub) => sub.title.length > 0)
      .map((sub) => ({
        title: sub.title,
        keyPoints: uniqueStrings(sub.key_points),
        estimatedWords: sub.estimated_words ?? 0,
      })),
  }));

  const title = data.title?.trim();

  return {
    kind: 'structured',
    outline: {
      title: title && title.length > 0 ? title : context.topic,
      metaDescription: data.meta_description?.trim() ?? '',
      sections,
      tags: uniqueStrings([...data.tags, ...context.suggestedTags]),
      categories: uniqueStrings([...data.categories, ...context.suggestedCategories]),
      targetWordCount: context.targetWordCount,
      seoKeywords: uniqueStrings(data.seo_keywords),
      layoutType: normalizeLayoutType(data.layout_type),
      rawOutlineText: context.rawOutlineText,
    },
  };
}

// ============================================================================
// Fallback Outline
// ============================================================================

/**
 * The deterministic minimal outline used when structuring fails.
 *
 * Its Introduction and Conclusion sections are written in addition to the
 * writer's own introduction and conclusion.
 */
export function buildFallbackOutline(context: OutlineParseContext): BlogOutline {
  const budget = wordsPerSection(context.targetWordCount, PLANNER_CONFIG.FALLBACK_SECTIONS.length);
  const tags = uniqueStrings(context.suggestedTags);
  const categories = uniqueStrings(context.suggestedCategories);
  const topicSlug = slugify(context.topic);

  return {
    title: context.topic,
    metaDescription: `A comprehensive guide to ${context.topic}.`,
    sections: PLANNER_CONFIG.FALLBACK_SECTIONS.map((section) => ({
      title: section.title,
      keyPoints: [...section.keyPoints],
      estimatedWords: budget,
      subsections: [],
    })),
    tags: tags.length > 0 ? tags : topicSlug ? [topicSlug] : [],
    categories: categories.length > 0 ? categories : [PLANNER_CONFIG.FALLBACK_CATEGORY],
    targetWordCount: context.targetWordCount,
    seoKeywords: [],
    layoutType: DEFAULT_LAYOUT,
    rawOutlineText: context.rawOutlineText,
  };
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Renders an outline as markdown, for display and for the refine prompt.
 */
export function outlineToMarkdown(outline: BlogOutline): string {
  const lines = [
    `# ${outline.title}`,
    '',
    `**Meta Description:** ${outline.metaDescription}`,
    '',
    `**Layout:** ${outline.layoutType}`,
    `**Tags:** ${outline.tags.join(', ')}`,
    `**Categories:** ${outline.categories.join(', ')}`,
    `**Target Word Count:** ${outline.targetWordCount}`,
    '',
    '## Outline',
    '',
  ];

  outline.sections.forEach((section, i) => {
    lines.push(`### ${i + 1}. ${section.title}`);
    for (const point of section.keyPoints) {
      lines.push(`- ${point}`);
    }
    section.subsections.forEach((sub, j) => {
      lines.push(`#### ${i + 1}.${j + 1}. ${sub.title}`);
      for (const point of sub.keyPoints) {
        lines.push(`  - ${point}`);
      }
    });
    lines.push('');
  });

  return lines.join('\n');
}

// ============================================================================
// Outline Documents
// ============================================================================

const SectionDocumentSchema = z.object({
  title: z.string().trim().min(1),
  keyPoints: z.array(z.string()).default([]),
  estimatedWords: z.number().int().nonnegative().default(0),
});

const TopSectionDocumentSchema = SectionDocumentSchema.extend({
  subsections: z.array(SectionDocumentSchema).default([]),
});

/**
 * Schema for a caller-supplied outline (e.g. `--outline-file`), in the
 * same camelCase shape `JSON.stringify(outline)` produces.
 */
export const BlogOutlineDocumentSchema = z.object({
  title: z.string().trim().min(1),
  metaDescription: z.string().default(''),
  sections: z.array(TopSectionDocumentSchema).min(1),
  tags: z.array(z.string()).default([]),
  categories: z.array(z.string()).default([]),
  targetWordCount: z.number().int().positive(),
  seoKeywords: z.array(z.string()).default([]),
  layoutType: z.string().default(DEFAULT_LAYOUT),
  rawOutlineText: z.string().default(''),
});

/**
 * Validates an outline document. Throws a ZodError on invalid input.
 */
export function parseOutlineDocument(value: unknown): BlogOutline {
  const doc = BlogOutlineDocumentSchema.parse(value);
  return {
    ...doc,
    tags: uniqueStrings(doc.tags),
    categories: uniqueStrings(doc.categories),
    seoKeywords: uniqueStrings(doc.seoKeywords),
    layoutType: normalizeLayoutType(doc.layoutType),
  };
}
