/**
 * Blog Generation Configuration
 *
 * Tuning parameters for the pipeline agents and utilities.
 * All magic numbers live here; runtime settings (model, word counts,
 * output directory) come from `Settings` instead.
 */

// ============================================================================
// Configuration Validation
// ============================================================================

/**
 * Configuration validation error.
 * Thrown at module load time if configuration is inconsistent.
 */
class ConfigValidationError extends Error {
  constructor(message: string) {
    super(`Blog generation config error: ${message}`);
    this.name = 'ConfigValidationError';
  }
}

function validateMinMax(
  minValue: number,
  maxValue: number,
  minName: string,
  maxName: string
): void {
  if (minValue > maxValue) {
    throw new ConfigValidationError(
      `${minName} (${minValue}) cannot be greater than ${maxName} (${maxValue})`
    );
  }
}

function validatePositive(value: number, name: string): void {
  if (value <= 0) {
    throw new ConfigValidationError(`${name} must be positive (got ${value})`);
  }
}

function validateTemperature(value: number, name: string): void {
  if (value < 0 || value > 2) {
    throw new ConfigValidationError(`${name} must be between 0 and 2 (got ${value})`);
  }
}

// ============================================================================
// Source Collector Configuration
// ============================================================================

export const COLLECTOR_CONFIG = {
  /** Unique results whose pages are fetched in full */
  DEFAULT_SCRAPE_TOP_N: 3,
  /** Queries kept from the model's reply */
  MAX_QUERIES: 5,
  /** Suffixes appended to the topic when query generation fails */
  FALLBACK_QUERY_SUFFIXES: ['guide', 'best practices'],
} as const;

// ============================================================================
// Research Synthesizer Configuration
// ============================================================================

export const SYNTHESIZER_CONFIG = {
  /** Search results embedded in the research prompt */
  TOP_SEARCH_RESULTS: 10,
  /** Characters of each scraped page embedded in the research prompt */
  SCRAPED_EXCERPT_CHARS: 2000,
  /** Editorial brief used when the caller gives none */
  NO_CONTEXT_TEXT: 'No additional context provided.',
} as const;

// ============================================================================
// Outline Planner Configuration
// ============================================================================

export const PLANNER_CONFIG = {
  /** Low temperature for the structuring call; it should transcribe, not invent */
  STRUCTURING_TEMPERATURE: 0.3,
  FALLBACK_CATEGORY: 'general',
  FALLBACK_SECTIONS: [
    { title: 'Introduction', keyPoints: ['Set the context'] },
    { title: 'Main Content', keyPoints: ['Core information'] },
    { title: 'Conclusion', keyPoints: ['Summarize key points'] },
  ],
} as const;

// ============================================================================
// Section Writer Configuration
// ============================================================================

export const WRITER_CONFIG = {
  /** Trailing characters of already-written text given to each section */
  PREVIOUS_CONTENT_WINDOW: 1500,
  /** Leading characters of the research summary given to each section */
  RESEARCH_NOTES_CHARS: 2000,
  /** Key points per section shown in the introduction preview */
  INTRO_KEY_POINTS: 3,
  /** Budget slots reserved for the introduction and conclusion */
  RESERVED_SECTIONS: 2,
  /** Characters of a source description kept in the references list */
  REFERENCE_DESCRIPTION_CHARS: 100,
} as const;

// ============================================================================
// Enhancer Configuration
// ============================================================================

export const ENHANCER_CONFIG = {
  ANALYSIS_CONTENT_CHARS: 15000,
  ENHANCEMENT_BODY_CHARS: 12000,
  /** Characters of the analysis forwarded to the enhancement prompt */
  ANALYSIS_EXCERPT_CHARS: 3000,
  META_SUMMARY_CHARS: 500,
  META_DESCRIPTION_MAX: 160,
  TAG_TOPICS_CHARS: 1000,
  TRENDING_KEYWORDS: 10,
  TREND_TERM_KEYWORDS: 3,
  /** H2 sections shorter than this are flagged as thin */
  THIN_SECTION_WORDS: 150,
  /** Rising and related queries each contribute this many keywords */
  KEYWORDS_PER_TRENDS_LIST: 5,
  META_KEYWORDS: 5,
  DEFAULT_DELAY_MS: 2000,
  BACKUP_DIR_NAME: '.backup',
  NO_TRENDS_TEXT: 'No Google Trends data.',
  TRENDS_UNAVAILABLE_TEXT: 'No Google Trends data available.',
  STOP_WORDS: [
    'the', 'a', 'an', 'is', 'are', 'how', 'to', 'what', 'why', 'when', 'your', 'you',
    'and', 'or', 'for', 'with', 'from', 'in', 'on', 'at', 'by', 'of', 'that', 'this', 'it',
  ],
} as const;

// ============================================================================
// Retry Configuration
// ============================================================================

export const RETRY_CONFIG = {
  /** Maximum number of retry attempts */
  MAX_RETRIES: 3,
  /** Initial delay in milliseconds before first retry */
  INITIAL_DELAY_MS: 1000,
  /** Maximum delay in milliseconds between retries */
  MAX_DELAY_MS: 10000,
  /** Multiplier for exponential backoff */
  BACKOFF_MULTIPLIER: 2,
} as const;

// ============================================================================
// Generator Configuration
// ============================================================================

export const GENERATOR_CONFIG = {
  /**
   * Progress reporting constants for the write phase.
   * Section progress is reported between START and END percentages.
   */
  WRITE_PROGRESS_START: 10,
  WRITE_PROGRESS_END: 90,
} as const;

// ============================================================================
// Runtime Configuration Validation
// ============================================================================

function validateConfiguration(): void {
  validatePositive(COLLECTOR_CONFIG.MAX_QUERIES, 'COLLECTOR_CONFIG.MAX_QUERIES');
  validatePositive(SYNTHESIZER_CONFIG.TOP_SEARCH_RESULTS, 'SYNTHESIZER_CONFIG.TOP_SEARCH_RESULTS');
  validatePositive(SYNTHESIZER_CONFIG.SCRAPED_EXCERPT_CHARS, 'SYNTHESIZER_CONFIG.SCRAPED_EXCERPT_CHARS');
  validateTemperature(PLANNER_CONFIG.STRUCTURING_TEMPERATURE, 'PLANNER_CONFIG.STRUCTURING_TEMPERATURE');
  validatePositive(WRITER_CONFIG.PREVIOUS_CONTENT_WINDOW, 'WRITER_CONFIG.PREVIOUS_CONTENT_WINDOW');
  validatePositive(WRITER_CONFIG.RESEARCH_NOTES_CHARS, 'WRITER_CONFIG.RESEARCH_NOTES_CHARS');
  validateMinMax(
    ENHANCER_CONFIG.ENHANCEMENT_BODY_CHARS,
    ENHANCER_CONFIG.ANALYSIS_CONTENT_CHARS,
    'ENHANCER_CONFIG.ENHANCEMENT_BODY_CHARS',
    'ENHANCER_CONFIG.ANALYSIS_CONTENT_CHARS'
  );
  validateMinMax(
    RETRY_CONFIG.INITIAL_DELAY_MS,
    RETRY_CONFIG.MAX_DELAY_MS,
    'RETRY_CONFIG.INITIAL_DELAY_MS',
    'RETRY_CONFIG.MAX_DELAY_MS'
  );
  validateMinMax(
    GENERATOR_CONFIG.WRITE_PROGRESS_START,
    GENERATOR_CONFIG.WRITE_PROGRESS_END,
    'GENERATOR_CONFIG.WRITE_PROGRESS_START',
    'GENERATOR_CONFIG.WRITE_PROGRESS_END'
  );
}

// Run validation at module load time
validateConfiguration();
