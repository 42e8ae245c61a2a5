/**
 * Blog Generation Types
 *
 * Shared types for the research → plan → write → assemble pipeline.
 */

import type { ScrapedContent, SearchResult } from '../tools/types';
import type { BlogOutline } from './outline';

export type { ScrapedContent, SearchResult } from '../tools/types';

// ============================================================================
// Phase Constants
// ============================================================================

/**
 * All phases of blog generation as a const array, in execution order.
 */
export const BLOG_GENERATION_PHASES = ['research', 'plan', 'write', 'assemble'] as const;

export type BlogGenerationPhase = (typeof BLOG_GENERATION_PHASES)[number];

// ============================================================================
// Error Types
// ============================================================================

/**
 * Error codes for blog generation failures.
 * Each phase has its own code so callers can decide what to retry.
 */
export type BlogGenerationErrorCode =
  | 'CONFIG_ERROR'
  | 'INPUT_INVALID'
  | 'RESEARCH_FAILED'
  | 'PLAN_FAILED'
  | 'WRITE_FAILED'
  | 'ASSEMBLE_FAILED'
  | 'CANCELLED';

export const PHASE_ERROR_CODES: Record<BlogGenerationPhase, BlogGenerationErrorCode> = {
  research: 'RESEARCH_FAILED',
  plan: 'PLAN_FAILED',
  write: 'WRITE_FAILED',
  assemble: 'ASSEMBLE_FAILED',
};

export interface BlogGenerationErrorOptions {
  readonly phase?: BlogGenerationPhase;
  readonly cause?: unknown;
}

/**
 * Custom error class for blog generation failures.
 *
 * @example
 * try {
 *   await generator.generate('Intro to Testing');
 * } catch (error) {
 *   if (isBlogGenerationError(error) && error.code === 'RESEARCH_FAILED') {
 *     // research can be skipped on the next attempt
 *   }
 * }
 */
export class BlogGenerationError extends Error {
  readonly name = 'BlogGenerationError';
  readonly phase?: BlogGenerationPhase;

  constructor(
    readonly code: BlogGenerationErrorCode,
    message: string,
    options: BlogGenerationErrorOptions = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.phase = options.phase;
    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BlogGenerationError);
    }
  }
}

/**
 * Type guard to check if an error is a BlogGenerationError.
 */
export function isBlogGenerationError(error: unknown): error is BlogGenerationError {
  return error instanceof BlogGenerationError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Research Types
// ============================================================================

/**
 * Raw material gathered by the Source Collector.
 */
export interface ResearchInput {
  readonly topic: string;
  readonly additionalContext: string;
  readonly queries: readonly string[];
  /** Deduplicated by url, first-seen order */
  readonly searchResults: readonly SearchResult[];
  /** One entry per fetched url, in fetch order */
  readonly scrapedContent: readonly ScrapedContent[];
}

/**
 * A citation-ready source.
 */
export interface Source {
  readonly title: string;
  readonly url: string;
  readonly description: string;
}

export interface ResearchSummary {
  readonly topic: string;
  /** Prose research brief */
  readonly summary: string;
  /** Deduplicated by url; scraped pages win over search snippets */
  readonly sources: readonly Source[];
  readonly searchResults: readonly SearchResult[];
  readonly scrapedContent: readonly ScrapedContent[];
}

// ============================================================================
// Writer Output
// ============================================================================

/**
 * Output of the Section Writer.
 */
export interface BlogPost {
  readonly title: string;
  /** Introduction, headed sections, conclusion and references joined */
  readonly content: string;
  /** Section name → generated text (`introduction`, each outline title, `conclusion`) */
  readonly sections: Readonly<Record<string, string>>;
  readonly sources: readonly Source[];
  readonly wordCount: number;
}

// ============================================================================
// Final Artifact
// ============================================================================

export interface TokenUsage {
  readonly input: number;
  readonly output: number;
}

export function createEmptyTokenUsage(): TokenUsage {
  return { input: 0, output: 0 };
}

export function addTokenUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return { input: a.input + b.input, output: a.output + b.output };
}

export type PhaseDurations = Readonly<Record<BlogGenerationPhase, number>>;

/**
 * The terminal artifact of one generation run. Ownership passes to the caller.
 */
export interface GeneratedBlog {
  readonly title: string;
  readonly slug: string;
  /** Frontmatter block followed by the title heading, TOC and body */
  readonly fullContent: string;
  readonly frontmatter: string;
  readonly sections: Readonly<Record<string, string>>;
  readonly sources: readonly Source[];
  readonly outline: BlogOutline;
  /** The brief the writer worked from (synthesized, supplied or topic-only) */
  readonly researchSummary: string;
  /** Whitespace-split token count of `fullContent` */
  readonly wordCount: number;
  readonly generationTimeSeconds: number;
  readonly phaseDurations: PhaseDurations;
  readonly tokenUsage: TokenUsage;
  readonly correlationId: string;
  readonly filePath?: string;
}

// ============================================================================
// Progress
// ============================================================================

/**
 * Progress callback. `progress` is 0-100 within the given phase.
 */
export type BlogProgressCallback = (
  phase: BlogGenerationPhase,
  progress: number,
  message?: string
) => void;

// ============================================================================
// Clock Abstraction (for testability)
// ============================================================================

/**
 * Clock interface for time-related operations.
 * Enables deterministic testing by allowing time to be mocked.
 *
 * @example
 * const mockClock: Clock = { now: () => 1234567890000 };
 */
export interface Clock {
  /** Returns current timestamp in milliseconds (like Date.now()) */
  now(): number;
}

/**
 * Default clock implementation using system time.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Creates a mock clock for testing with a fixed or advancing time.
 *
 * @param initialTime - Starting timestamp in milliseconds
 * @param autoAdvance - If provided, advances time by this many ms on each call
 *
 * @example
 * const clock = createMockClock(1000000, 100);
 * clock.now(); // 1000000
 * clock.now(); // 1000100
 */
export function createMockClock(initialTime: number, autoAdvance?: number): Clock {
  let currentTime = initialTime;
  return {
    now: () => {
      const time = currentTime;
      if (autoAdvance !== undefined) {
        currentTime += autoAdvance;
      }
      return time;
    },
  };
}
