/**
 * Blog Enhancer
 *
 * Rewrites existing markdown posts in place: analysis, a rewrite that
 * folds in search-trend keywords, a new meta description, tag suggestions
 * and a frontmatter fix-up. The original is backed up first.
 *
 * Per-file failures come back as `{ ok: false }`; only cancellation throws.
 */

import { copyFile, mkdir, readdir, readFile, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import type { Settings } from '../../config/settings';
import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { getModel } from '../config/utils';
import { createModelClient, type ModelClient } from '../model-client';
import { createTrendsClient, trendsToResearchContext } from '../tools/trends';
import type { TrendsClient, TrendsData } from '../tools/types';
import { ENHANCER_CONFIG } from './config';
import { createFrontmatterGenerator, parseFrontmatter } from './frontmatter';
import { cleanContent, countProseWords, findFirstH1, findThinSections } from './markdown-utils';
import { getAnalysisPrompt, getEnhancementPrompt, getMetaDescriptionPrompt, getTagSuggestionPrompt } from './prompts';
import { sleep } from './retry';
import {
  BlogGenerationError,
  errorMessage,
  isBlogGenerationError,
  systemClock,
  type Clock,
} from './types';

// ============================================================================
// Types
// ============================================================================

export interface EnhanceOptions {
  /** Defaults to `settings.blog.minWordCount` */
  readonly targetWordCount?: number;
  /** Regenerate the meta description (default: true) */
  readonly improveSeo?: boolean;
  readonly useTrends?: boolean;
  readonly fixFrontmatter?: boolean;
  readonly backup?: boolean;
  /** Defaults to `.backup/` beside the file */
  readonly backupDir?: string;
  readonly signal?: AbortSignal;
}

export interface EnhanceDirectoryOptions extends EnhanceOptions {
  readonly recursive?: boolean;
  /** Keep going after a failed file (default: true) */
  readonly skipOnError?: boolean;
  /** Pause between files (default: 2000) */
  readonly delayMs?: number;
}

export interface EnhanceSuccess {
  readonly ok: true;
  readonly filePath: string;
  readonly originalWordCount: number;
  readonly enhancedWordCount: number;
  readonly enhancedContent: string;
  readonly backupPath?: string;
  readonly improvements: readonly string[];
  readonly trends?: TrendsData;
}

export interface EnhanceFailure {
  readonly ok: false;
  readonly filePath: string;
  readonly error: string;
  readonly backupPath?: string;
}

export type EnhanceResult = EnhanceSuccess | EnhanceFailure;

export interface BlogEnhancerDeps {
  readonly model?: ModelClient;
  readonly trends?: TrendsClient;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly onProgress?: (message: string) => void;
  readonly sleep?: (ms: number) => Promise<void>;
}

export interface BlogEnhancer {
  enhance(filePath: string, options?: EnhanceOptions): Promise<EnhanceResult>;
  /**
   * @throws BlogGenerationError (INPUT_INVALID) when `dir` is not a directory
   */
  enhanceDirectory(dir: string, options?: EnhanceDirectoryOptions): Promise<EnhanceResult[]>;
}

// ============================================================================
// Helpers
// ============================================================================

const STOP_WORDS: ReadonlySet<string> = new Set(ENHANCER_CONFIG.STOP_WORDS);

/**
 * First few meaningful words of a title, for a trends lookup.
 *
 * @example
 * extractTrendTerm('How to Brew the Perfect Espresso at Home') // "brew perfect espresso"
 */
export function extractTrendTerm(title: string): string {
  return title
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 2 && !STOP_WORDS.has(word))
    .slice(0, ENHANCER_CONFIG.TREND_TERM_KEYWORDS)
    .join(' ');
}

const LLM_PREAMBLES = [
  /^Here'?s? (?:is )?the enhanced (?:blog |content|version).*?:\n+/gim,
  /^I've enhanced.*?:\n+/gim,
  /^Below is the.*?:\n+/gim,
];

/**
 * Strips what models tend to wrap a rewrite in: a frontmatter block, a
 * repeated title heading, a "Here is the enhanced..." preamble and a
 * trailing rule.
 */
export function cleanEnhancedContent(content: string): string {
  let cleaned = content;

  if (cleaned.startsWith('---')) {
    const end = cleaned.indexOf('\n---\n', 3);
    if (end !== -1) cleaned = cleaned.slice(end + 5);
  }

  cleaned = cleaned.replace(/^#\s+.+\n+/, '');
  for (const pattern of LLM_PREAMBLES) {
    cleaned = cleaned.replace(pattern, '');
  }
  cleaned = cleaned.replace(/\n*---\s*$/, '');

  return cleaned.trim();
}

/**
 * Strips surrounding quotes and caps the length at 160 characters.
 */
export function normalizeMetaDescription(text: string): string {
  const max = ENHANCER_CONFIG.META_DESCRIPTION_MAX;
  const cleaned = text.trim().replace(/^"+|"+$/g, '').trim();
  return cleaned.length > max ? `${cleaned.slice(0, max - 3)}...` : cleaned;
}

const TagSuggestionSchema = z.object({
  tags: z.array(z.string()).optional(),
  categories: z.array(z.string()).optional(),
});

export interface TagSuggestion {
  readonly tags: readonly string[];
  readonly categories: readonly string[];
}

/**
 * Reads the `{...}` object in a tag-suggestion reply. Missing fields and
 * unparseable replies keep the current values.
 */
export function parseTagSuggestion(reply: string, current: TagSuggestion): TagSuggestion {
  const match = /\{[\s\S]*\}/.exec(reply);
  if (!match) return current;

  try {
    const parsed = TagSuggestionSchema.safeParse(JSON.parse(match[0]));
    if (!parsed.success) return current;
    return {
      tags: parsed.data.tags ?? current.tags,
      categories: parsed.data.categories ?? current.categories,
    };
  } catch {
    return current;
  }
}

/**
 * `YYYYMMDD_HHMMSS` in UTC.
 */
export function formatBackupTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 4)}${iso.slice(5, 7)}${iso.slice(8, 10)}_${iso.slice(11, 13)}${iso.slice(14, 16)}${iso.slice(17, 19)}`;
}

export function buildBackupPath(filePath: string, backupDir: string, date: Date): string {
  const { name, ext } = path.parse(filePath);
  return path.join(backupDir, `${name}_${formatBackupTimestamp(date)}${ext}`);
}

function readStringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((item, i) => item === b[i]);
}

/**
 * Markdown files under `dir`, sorted. Backup directories are never entered.
 */
async function listMarkdownFiles(dir: string, recursive: boolean): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (recursive && entry.name !== ENHANCER_CONFIG.BACKUP_DIR_NAME) {
        files.push(...(await listMarkdownFiles(fullPath, true)));
      }
    } else if (entry.isFile() && entry.name.endsWith('.md')) {
      files.push(fullPath);
    }
  }

  return files.sort();
}

// ============================================================================
// Enhancer
// ============================================================================

export function createBlogEnhancer(settings: Settings, deps: BlogEnhancerDeps = {}): BlogEnhancer {
  const log = deps.logger ?? createPrefixedLogger('[Enhancer]');
  const clock = deps.clock ?? systemClock;
  const wait = deps.sleep ?? sleep;
  const model =
    deps.model ??
    createModelClient({ ...settings.llm, model: getModel('ENHANCEMENT', settings.llm.model) });
  const trendsClient = deps.trends ?? createTrendsClient({ clock, logger: log });

  const report = (message: string): void => {
    log.info(message);
    deps.onProgress?.(message);
  };

  const lookupTrends = async (
    title: string
  ): Promise<{ readonly data?: TrendsData; readonly context: string }> => {
    const term = extractTrendTerm(title);
    if (!term) return { context: ENHANCER_CONFIG.TRENDS_UNAVAILABLE_TEXT };

    report(`Fetching search trends for "${term}"...`);
    const result = await trendsClient.lookup(term);
    if (!result.ok) {
      log.warn(`Trends lookup failed: ${result.error}`);
      return { context: ENHANCER_CONFIG.TRENDS_UNAVAILABLE_TEXT };
    }
    return { data: result.data, context: trendsToResearchContext(result.data) };
  };

  const enhance = async (filePath: string, options: EnhanceOptions = {}): Promise<EnhanceResult> => {
    const {
      improveSeo = true,
      useTrends = true,
      fixFrontmatter = true,
      backup = true,
      signal,
    } = options;
    const targetWordCount = options.targetWordCount ?? settings.blog.minWordCount;
    const backupDir = options.backupDir ?? path.join(path.dirname(filePath), ENHANCER_CONFIG.BACKUP_DIR_NAME);
    const generate = (prompt: string, context: string): Promise<string> =>
      model.generate(prompt, undefined, { signal, context });

    report(`Enhancing: ${path.basename(filePath)}`);
    const improvements: string[] = [];
    let backupPath: string | undefined;

    try {
      const original = await readFile(filePath, 'utf-8');
      const originalWordCount = countProseWords(original);
      const parsed = parseFrontmatter(original);
      const { fields, body } = parsed;
      const title =
        (typeof fields.title === 'string' && fields.title.trim()) || findFirstH1(body) || 'Untitled';

      if (backup) {
        await mkdir(backupDir, { recursive: true });
        backupPath = buildBackupPath(filePath, backupDir, new Date(clock.now()));
        await copyFile(filePath, backupPath);
        log.info(`Backed up to: ${backupPath}`);
        improvements.push('Created backup');
      }

      // ===== Trends =====
      let trends: TrendsData | undefined;
      let trendsContext: string = ENHANCER_CONFIG.NO_TRENDS_TEXT;
      let trendingKeywords: string[] = [];
      if (useTrends) {
        const lookup = await lookupTrends(title);
        trendsContext = lookup.context;
        trends = lookup.data;
        if (trends) {
          const perList = ENHANCER_CONFIG.KEYWORDS_PER_TRENDS_LIST;
          trendingKeywords = [...trends.risingQueries.slice(0, perList), ...trends.relatedQueries.slice(0, perList)];
          improvements.push('Integrated search trends data');
        }
      }

      // ===== Analysis and rewrite =====
      report('Analyzing content...');
      const bodyWordCount = countProseWords(body);
      const analysis = await generate(
        getAnalysisPrompt({
          title,
          wordCount: bodyWordCount,
          targetWordCount,
          content: body.slice(0, ENHANCER_CONFIG.ANALYSIS_CONTENT_CHARS),
          trendsContext,
          thinSections: findThinSections(body, ENHANCER_CONFIG.THIN_SECTION_WORDS),
        }),
        'Enhancer analysis'
      );

      report('Enhancing content...');
      const enhancedBody = cleanEnhancedContent(
        await generate(
          getEnhancementPrompt({
            body: body.slice(0, ENHANCER_CONFIG.ENHANCEMENT_BODY_CHARS),
            analysis: analysis.slice(0, ENHANCER_CONFIG.ANALYSIS_EXCERPT_CHARS),
            trendsContext,
            currentWordCount: bodyWordCount,
            targetWordCount,
            trendingKeywords: trendingKeywords.slice(0, ENHANCER_CONFIG.TRENDING_KEYWORDS),
          }),
          'Enhancer rewrite'
        )
      );
      if (!enhancedBody) {
        throw new Error('Enhancement returned no content');
      }
      improvements.push('Enhanced content quality');

      // ===== Metadata =====
      let description = typeof fields.description === 'string' ? fields.description : '';
      if (improveSeo) {
        description = normalizeMetaDescription(
          await generate(
            getMetaDescriptionPrompt({
              title,
              contentSummary: enhancedBody.slice(0, ENHANCER_CONFIG.META_SUMMARY_CHARS).replace(/\n/g, ' '),
              keywords: trendingKeywords.slice(0, ENHANCER_CONFIG.META_KEYWORDS),
            }),
            'Enhancer meta description'
          )
        );
        improvements.push('Optimized meta description');
      }

      const current: TagSuggestion = {
        tags: readStringList(fields.tags),
        categories: readStringList(fields.categories),
      };
      const suggested = parseTagSuggestion(
        await generate(
          getTagSuggestionPrompt({
            title,
            topics: enhancedBody.slice(0, ENHANCER_CONFIG.TAG_TOPICS_CHARS).replace(/\n/g, ' '),
            risingKeywords: trends?.risingQueries.slice(0, ENHANCER_CONFIG.KEYWORDS_PER_TRENDS_LIST) ?? [],
            currentTags: current.tags,
            currentCategories: current.categories,
          }),
          'Enhancer tag suggestion'
        ),
        current
      );
      if (!sameList(suggested.tags, current.tags) || !sameList(suggested.categories, current.categories)) {
        improvements.push('Updated tags/categories');
      }

      // ===== Frontmatter and write-back =====
      let finalFields: Record<string, unknown> = { ...fields };
      if (fixFrontmatter) {
        const now = new Date(clock.now());
        finalFields = { ...finalFields, title, description };
        if (!finalFields.date) finalFields.date = now;
        if (suggested.tags.length > 0) finalFields.tags = [...suggested.tags];
        if (suggested.categories.length > 0) finalFields.categories = [...suggested.categories];
        finalFields.draft = false;
        finalFields.lastmod = now;
        improvements.push('Fixed frontmatter');
      }

      // Keep the file's own frontmatter format when it has one
      const generator = createFrontmatterGenerator(parsed.format ?? settings.frontmatter.format);
      const enhancedContent = cleanContent(`${generator.serialize(finalFields)}\n${enhancedBody}`);
      await writeFile(filePath, enhancedContent, 'utf-8');

      const enhancedWordCount = countProseWords(enhancedContent);
      report(`Enhanced: ${originalWordCount} → ${enhancedWordCount} words`);

      return {
        ok: true,
        filePath,
        originalWordCount,
        enhancedWordCount,
        enhancedContent,
        backupPath,
        improvements,
        trends,
      };
    } catch (error) {
      if (isBlogGenerationError(error) && error.code === 'CANCELLED') throw error;
      log.error(`Enhancement failed for ${filePath}: ${errorMessage(error)}`);
      return { ok: false, filePath, error: errorMessage(error), backupPath };
    }
  };

  const enhanceDirectory = async (
    dir: string,
    options: EnhanceDirectoryOptions = {}
  ): Promise<EnhanceResult[]> => {
    const { recursive = false, skipOnError = true, delayMs = ENHANCER_CONFIG.DEFAULT_DELAY_MS, ...enhanceOptions } =
      options;

    const info = await stat(dir).catch(() => undefined);
    if (!info?.isDirectory()) {
      throw new BlogGenerationError('INPUT_INVALID', `Not a directory: ${dir}`);
    }

    const files = await listMarkdownFiles(dir, recursive);
    report(`Found ${files.length} files to enhance`);

    const results: EnhanceResult[] = [];
    for (const [i, file] of files.entries()) {
      report(`[${i + 1}/${files.length}] Processing: ${path.basename(file)}`);
      const result = await enhance(file, enhanceOptions);
      results.push(result);

      if (!result.ok) {
        log.error(`Error enhancing ${path.basename(file)}: ${result.error}`);
        if (!skipOnError) break;
      }

      if (i < files.length - 1 && delayMs > 0) {
        await wait(delayMs);
      }
    }

    const succeeded = results.filter((result): result is EnhanceSuccess => result.ok);
    const before = succeeded.reduce((sum, result) => sum + result.originalWordCount, 0);
    const after = succeeded.reduce((sum, result) => sum + result.enhancedWordCount, 0);
    report(
      `Complete: ${succeeded.length} enhanced, ${results.length - succeeded.length} failed. Total words: ${before} → ${after}`
    );

    return results;
  };

  return { enhance, enhanceDirectory };
}
