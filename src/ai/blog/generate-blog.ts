/**
 * Blog Generator
 *
 * Drives the four phases in order: research → plan → write → assemble.
 * Research and planning can be replaced by caller-supplied material;
 * writing and assembly always run.
 *
 * Phases never overlap. Cancellation is checked before and after every
 * phase, and the signal is handed to every model, search and fetch call
 * so in-flight work is abandoned as well.
 */

import type { generateText } from 'ai';

import type { LlmSettings, Settings } from '../../config/settings';
import {
  createContextualLogger,
  generateCorrelationId,
  type ContextualLogger,
} from '../../utils/logger';
import { getModel, type AITaskKey } from '../config/utils';
import { createModelClient, type ModelClient } from '../model-client';
import { createWebScraper } from '../tools/scraper';
import { createSearchClient } from '../tools/search';
import type { FetchClient, SearchClient } from '../tools/types';
import { refineOutline, runCollector, runPlanner, runSynthesizer, runWriter } from './agents';
import { assembleBlog, saveBlogToFile } from './assembler';
import { buildSources } from './citations';
import { createFrontmatterGenerator, type FrontmatterGenerator } from './frontmatter';
import type { BlogOutline } from './outline';
import { PhaseTimer } from './phase-timer';
import { ProgressTracker } from './progress-tracker';
import {
  BlogGenerationError,
  errorMessage,
  isBlogGenerationError,
  PHASE_ERROR_CODES,
  systemClock,
  type BlogGenerationPhase,
  type BlogProgressCallback,
  type Clock,
  type GeneratedBlog,
  type ResearchSummary,
  type TokenUsage,
} from './types';

// ============================================================================
// Types
// ============================================================================

export interface BlogGeneratorDeps {
  /** Used for every task that has no entry in `models` */
  readonly model?: ModelClient;
  readonly models?: Partial<Record<AITaskKey, ModelClient>>;
  readonly search?: SearchClient;
  readonly fetch?: FetchClient;
  readonly clock?: Clock;
  /** Passed to model clients built here */
  readonly generateText?: typeof generateText;
  readonly env?: NodeJS.ProcessEnv;
}

export interface ResearchOptions {
  readonly additionalContext?: string;
  readonly signal?: AbortSignal;
}

export interface OutlineOptions {
  /** Defaults to `Topic: <topic>` */
  readonly researchSummary?: string;
  readonly targetWordCount?: number;
  readonly tags?: readonly string[];
  readonly categories?: readonly string[];
  readonly signal?: AbortSignal;
}

export interface BlogGenerateOptions {
  readonly additionalContext?: string;
  /** Defaults to `settings.blog.minWordCount` */
  readonly targetWordCount?: number;
  /** Default to the settings' default tags and categories */
  readonly tags?: readonly string[];
  readonly categories?: readonly string[];
  readonly author?: string;
  readonly draft?: boolean;
  /** Skips research; the brief becomes the topic plus additional context */
  readonly skipResearch?: boolean;
  /** Skips research and uses this text as the brief. Wins over skipResearch. */
  readonly customResearch?: string;
  /** Skips planning */
  readonly customOutline?: BlogOutline;
  /** When set, the document is written to this directory */
  readonly outputDir?: string;
  readonly filename?: string;
  readonly signal?: AbortSignal;
  readonly onProgress?: BlogProgressCallback;
  readonly correlationId?: string;
}

export interface BlogGenerator {
  /**
   * @throws BlogGenerationError tagged with the failing phase, or CANCELLED
   */
  generate(topic: string, options?: BlogGenerateOptions): Promise<GeneratedBlog>;
  researchOnly(topic: string, options?: ResearchOptions): Promise<ResearchSummary>;
  outlineOnly(topic: string, options?: OutlineOptions): Promise<BlogOutline>;
  refineOutline(outline: BlogOutline, feedback: string, signal?: AbortSignal): Promise<BlogOutline>;
}

// ============================================================================
// Phase Execution Helper
// ============================================================================

interface PhaseRunContext {
  readonly topic: string;
  readonly signal: AbortSignal | undefined;
  readonly log: ContextualLogger;
  readonly timer: PhaseTimer;
  readonly progress: ProgressTracker;
}

/**
 * Throws CANCELLED if the caller's signal has fired.
 */
function assertCanProceed(signal: AbortSignal | undefined, topic: string): void {
  if (signal?.aborted) {
    throw new BlogGenerationError('CANCELLED', `Blog generation for "${topic}" was cancelled`);
  }
}

/**
 * Runs one phase with timing, progress and phase-tagged error wrapping.
 * BlogGenerationErrors (cancellation, config) pass through unchanged.
 *
 * @param describe - Completion message built from the phase output
 */
async function runPhase<T>(
  phase: BlogGenerationPhase,
  fn: () => Promise<T>,
  describe: (output: T) => string,
  ctx: PhaseRunContext
): Promise<T> {
  assertCanProceed(ctx.signal, ctx.topic);
  ctx.timer.start(phase);
  ctx.progress.startPhase(phase);

  let output: T;
  try {
    output = await fn();
  } catch (error) {
    ctx.timer.end(phase);
    if (isBlogGenerationError(error)) throw error;
    if (ctx.signal?.aborted) {
      throw new BlogGenerationError(
        'CANCELLED',
        `Blog generation for "${ctx.topic}" was cancelled during ${phase} phase`,
        { phase, cause: error }
      );
    }

    ctx.log.error(`${phase} phase failed: ${errorMessage(error)}`);
    throw new BlogGenerationError(
      PHASE_ERROR_CODES[phase],
      `Blog generation failed during ${phase} phase for "${ctx.topic}": ${errorMessage(error)}`,
      { phase, cause: error }
    );
  }

  const durationMs = ctx.timer.end(phase);
  const message = describe(output);
  ctx.progress.completePhase(phase, message);
  ctx.log.structured('info', { event: 'phase_complete', phase, durationMs, message });
  assertCanProceed(ctx.signal, ctx.topic);
  return output;
}

// ============================================================================
// Helpers
// ============================================================================

function validateTopic(topic: string): string {
  const trimmed = topic.trim();
  if (trimmed.length === 0) {
    throw new BlogGenerationError('INPUT_INVALID', 'Topic must not be empty');
  }
  return trimmed;
}

function validateWordCount(value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new BlogGenerationError('INPUT_INVALID', `Target word count must be a positive integer (got ${value})`);
  }
  return value;
}

/**
 * The brief used when research is skipped.
 */
export function buildTopicOnlyResearch(topic: string, additionalContext = ''): string {
  return `Topic: ${topic}\n\n${additionalContext}`.trim();
}

function sumUsage(clients: Iterable<ModelClient>): TokenUsage {
  let input = 0;
  let output = 0;
  for (const client of clients) {
    const usage = client.getTokenUsage();
    input += usage.input;
    output += usage.output;
  }
  return { input, output };
}

function researchWithoutSources(topic: string, summary: string): ResearchSummary {
  return { topic, summary, sources: [], searchResults: [], scrapedContent: [] };
}

// ============================================================================
// Generator
// ============================================================================

/**
 * Builds a generator bound to one settings value.
 *
 * Model clients are created up front (one per distinct model id), so a
 * missing API key surfaces here as CONFIG_ERROR rather than mid-run.
 *
 * @example
 * const generator = createBlogGenerator(loadSettings());
 * const blog = await generator.generate('Intro to Testing', { skipResearch: true });
 */
export function createBlogGenerator(settings: Settings, deps: BlogGeneratorDeps = {}): BlogGenerator {
  const env = deps.env ?? process.env;
  const clock = deps.clock ?? systemClock;
  const frontmatter: FrontmatterGenerator = createFrontmatterGenerator(
    settings.frontmatter.format,
    settings.frontmatter.defaultFields
  );

  const clientsById = new Map<string, ModelClient>();
  const resolveModel = (task: AITaskKey): ModelClient => {
    const injected = deps.models?.[task] ?? deps.model;
    if (injected) return injected;

    const llm: LlmSettings = { ...settings.llm, model: getModel(task, settings.llm.model, env) };
    const existing = clientsById.get(llm.model);
    if (existing) return existing;
    const client = createModelClient(llm, { generateText: deps.generateText, env });
    clientsById.set(llm.model, client);
    return client;
  };

  const models = {
    research: resolveModel('RESEARCH'),
    planning: resolveModel('PLANNING'),
    writing: resolveModel('WRITING'),
  };
  const uniqueModels = new Set([models.research, models.planning, models.writing]);

  const search =
    deps.search ??
    createSearchClient({
      provider: settings.research.searchProvider,
      tavilyApiKey: settings.research.tavilyApiKey ?? env.TAVILY_API_KEY,
    });
  const fetchClient = deps.fetch ?? createWebScraper();

  const research = async (
    topic: string,
    additionalContext: string,
    signal: AbortSignal | undefined,
    log: ContextualLogger
  ): Promise<ResearchSummary> => {
    const input = await runCollector(
      {
        topic,
        additionalContext,
        maxResults: settings.research.maxSearchResults,
        scrapeTopN: settings.research.scrapeTopN,
      },
      { model: models.research, search, fetch: fetchClient, logger: log.withPhase('collect'), signal }
    );

    const summary = await runSynthesizer(input, {
      model: models.research,
      systemPrompt: settings.prompts.researchSystem,
      logger: log.withPhase('synthesize'),
      signal,
    });

    return {
      topic,
      summary,
      sources: buildSources(input.searchResults, input.scrapedContent, settings.research.maxSources),
      searchResults: input.searchResults,
      scrapedContent: input.scrapedContent,
    };
  };

  const plannerDeps = (log: ContextualLogger, signal: AbortSignal | undefined) => ({
    model: models.planning,
    systemPrompt: settings.prompts.plannerSystem,
    logger: log,
    signal,
  });

  const generate = async (rawTopic: string, options: BlogGenerateOptions = {}): Promise<GeneratedBlog> => {
    const topic = validateTopic(rawTopic);
    const targetWordCount = validateWordCount(options.targetWordCount ?? settings.blog.minWordCount);
    const tags = options.tags && options.tags.length > 0 ? options.tags : settings.blog.defaultTags;
    const categories =
      options.categories && options.categories.length > 0 ? options.categories : settings.blog.defaultCategories;
    const additionalContext = options.additionalContext ?? '';
    const { signal } = options;

    const correlationId = options.correlationId ?? generateCorrelationId();
    const log = createContextualLogger('[Generator]', { correlationId });
    const timer = new PhaseTimer(clock);
    const progress = new ProgressTracker(options.onProgress);
    const ctx: PhaseRunContext = { topic, signal, log, timer, progress };
    const startedAt = clock.now();
    const usageAtStart = sumUsage(uniqueModels);

    log.info(`=== Starting blog generation for "${topic}" (${targetWordCount} words) ===`);
    assertCanProceed(signal, topic);

    // ===== PHASE 1: RESEARCH =====
    let researchSummary: ResearchSummary;
    if (options.customResearch !== undefined) {
      log.info('Using provided research');
      researchSummary = researchWithoutSources(topic, options.customResearch);
      progress.completePhase('research', 'Using provided research');
    } else if (options.skipResearch) {
      log.info('Skipping research phase');
      researchSummary = researchWithoutSources(topic, buildTopicOnlyResearch(topic, additionalContext));
      progress.completePhase('research', 'Research skipped');
    } else {
      researchSummary = await runPhase(
        'research',
        () => research(topic, additionalContext, signal, log.withPhase('research')),
        (out) => `Found ${out.sources.length} sources`,
        ctx
      );
    }

    // ===== PHASE 2: PLAN =====
    let outline: BlogOutline;
    if (options.customOutline) {
      log.info('Using provided outline');
      outline = options.customOutline;
      progress.completePhase('plan', 'Using provided outline');
    } else {
      outline = await runPhase(
        'plan',
        () =>
          runPlanner(
            {
              topic,
              researchSummary: researchSummary.summary,
              targetWordCount,
              suggestedTags: tags,
              suggestedCategories: categories,
            },
            plannerDeps(log.withPhase('plan'), signal)
          ),
        (out) => `Outline: ${out.sections.length} sections`,
        ctx
      );
    }

    // ===== PHASE 3: WRITE =====
    const post = await runPhase(
      'write',
      () =>
        runWriter(
          { outline, researchSummary: researchSummary.summary, sources: researchSummary.sources, topic },
          {
            model: models.writing,
            systemPrompt: settings.prompts.writerSystem,
            includeCitations: settings.blog.includeCitations,
            logger: log.withPhase('write'),
            signal,
            onSectionWritten: (current, total, label) => progress.reportSectionProgress(current, total, label),
          }
        ),
      (out) => `Wrote ${out.wordCount} words`,
      ctx
    );

    // ===== PHASE 4: ASSEMBLE =====
    const date = new Date(clock.now());
    const assembled = await runPhase(
      'assemble',
      async () => {
        const blog = assembleBlog({
          post,
          outline,
          frontmatter,
          date,
          includeToc: settings.blog.includeToc,
          draft: options.draft,
          author: options.author,
          defaultTags: tags,
          defaultCategories: categories,
        });
        const filePath = options.outputDir
          ? await saveBlogToFile(blog, options.outputDir, { filename: options.filename, date })
          : undefined;
        return { blog, filePath };
      },
      (out) => (out.filePath ? `Saved to ${out.filePath}` : `Assembled ${out.blog.wordCount} words`),
      ctx
    );

    const usageAtEnd = sumUsage(uniqueModels);
    // Clients outlive a run; report only what this run consumed
    const tokenUsage: TokenUsage = {
      input: usageAtEnd.input - usageAtStart.input,
      output: usageAtEnd.output - usageAtStart.output,
    };
    const generationTimeSeconds = (clock.now() - startedAt) / 1000;

    log.info(`=== Blog generation complete in ${generationTimeSeconds.toFixed(2)}s ===`);
    if (assembled.filePath) log.info(`Saved to: ${assembled.filePath}`);

    return {
      title: assembled.blog.title,
      slug: assembled.blog.slug,
      fullContent: assembled.blog.fullContent,
      frontmatter: assembled.blog.frontmatter,
      sections: post.sections,
      sources: post.sources,
      outline,
      researchSummary: researchSummary.summary,
      wordCount: assembled.blog.wordCount,
      generationTimeSeconds,
      phaseDurations: timer.getDurations(),
      tokenUsage,
      correlationId,
      filePath: assembled.filePath,
    };
  };

  return {
    generate,

    async researchOnly(rawTopic, options = {}) {
      const topic = validateTopic(rawTopic);
      const log = createContextualLogger('[Generator]', { correlationId: generateCorrelationId() });
      assertCanProceed(options.signal, topic);
      try {
        return await research(topic, options.additionalContext ?? '', options.signal, log.withPhase('research'));
      } catch (error) {
        if (isBlogGenerationError(error)) throw error;
        throw new BlogGenerationError('RESEARCH_FAILED', `Research failed: ${errorMessage(error)}`, {
          phase: 'research',
          cause: error,
        });
      }
    },

    async outlineOnly(rawTopic, options = {}) {
      const topic = validateTopic(rawTopic);
      const targetWordCount = validateWordCount(options.targetWordCount ?? settings.blog.minWordCount);
      const log = createContextualLogger('[Generator]', { correlationId: generateCorrelationId() });
      assertCanProceed(options.signal, topic);
      try {
        return await runPlanner(
          {
            topic,
            researchSummary: options.researchSummary?.trim() || buildTopicOnlyResearch(topic),
            targetWordCount,
            suggestedTags: options.tags ?? settings.blog.defaultTags,
            suggestedCategories: options.categories ?? settings.blog.defaultCategories,
          },
          plannerDeps(log.withPhase('plan'), options.signal)
        );
      } catch (error) {
        if (isBlogGenerationError(error)) throw error;
        throw new BlogGenerationError('PLAN_FAILED', `Planning failed: ${errorMessage(error)}`, {
          phase: 'plan',
          cause: error,
        });
      }
    },

    async refineOutline(outline, feedback, signal) {
      const log = createContextualLogger('[Generator]', { correlationId: generateCorrelationId() });
      try {
        return await refineOutline(outline, feedback, plannerDeps(log.withPhase('plan'), signal));
      } catch (error) {
        if (isBlogGenerationError(error)) throw error;
        throw new BlogGenerationError('PLAN_FAILED', `Outline refinement failed: ${errorMessage(error)}`, {
          phase: 'plan',
          cause: error,
        });
      }
    },
  };
}
