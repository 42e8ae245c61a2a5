/**
 * Logger Abstraction
 *
 * Console-backed logger shared by the pipeline, the tools and the CLI.
 * Output is gated by LOG_LEVEL (default: info).
 *
 * Supports both string messages (simple logging) and structured data objects
 * (production-friendly JSON logging for better parsing and analysis).
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log level for structured logging.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry for production logging.
 */
export interface StructuredLogEntry {
  /** Event type identifier (e.g., 'phase_complete', 'search_executed') */
  readonly event: string;
  /** Optional message for human readability */
  readonly message?: string;
  /** Additional structured data */
  readonly [key: string]: unknown;
}

/**
 * Basic logger interface (string-based).
 */
export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
}

/**
 * Extended logger interface supporting structured logging.
 */
export interface StructuredLogger extends Logger {
  /**
   * Log structured data at the specified level.
   * In production (JSON mode), outputs as JSON.
   * In development, formats as readable string.
   */
  structured: (level: LogLevel, entry: StructuredLogEntry) => void;
}

/**
 * Context carried through one generation run.
 */
export interface LoggingContext {
  readonly correlationId: string;
  readonly phase?: string;
}

export interface ContextualLogger extends StructuredLogger {
  readonly context: LoggingContext;
  /** Returns a logger with the same correlation ID tagged with a new phase. */
  withPhase: (phase: string) => ContextualLogger;
}

// ============================================================================
// Configuration
// ============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let levelOverride: LogLevel | undefined;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Overrides LOG_LEVEL for the rest of the process (the CLI's --verbose flag).
 * Pass undefined to go back to the environment value.
 */
export function setLogLevel(level: LogLevel | undefined): void {
  levelOverride = level;
}

export function getLogLevel(): LogLevel {
  if (levelOverride) return levelOverride;
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[getLogLevel()];
}

/**
 * Whether to output logs as JSON (for production log aggregators).
 * Controlled by LOG_FORMAT environment variable.
 */
const isJsonLogging = (): boolean => process.env.LOG_FORMAT === 'json';

// ============================================================================
// String-Based Logger
// ============================================================================

/**
 * Default logger implementation writing to the console.
 */
export const logger: Logger = {
  info: (message: string) => {
    if (isEnabled('info')) console.log(message);
  },
  warn: (message: string) => {
    if (isEnabled('warn')) console.warn(message);
  },
  error: (message: string) => {
    if (isEnabled('error')) console.error(message);
  },
  debug: (message: string) => {
    if (isEnabled('debug')) console.log(message);
  },
};

/**
 * Creates a prefixed logger for specific modules.
 *
 * @param prefix - The prefix to add to all log messages
 * @returns A logger with the prefix prepended to all messages
 *
 * @example
 * const log = createPrefixedLogger('[Collector]');
 * log.info('Starting research'); // logs: "[Collector] Starting research"
 */
export function createPrefixedLogger(prefix: string): Logger {
  return {
    info: (message: string) => logger.info(`${prefix} ${message}`),
    warn: (message: string) => logger.warn(`${prefix} ${message}`),
    error: (message: string) => logger.error(`${prefix} ${message}`),
    debug: (message: string) => logger.debug(`${prefix} ${message}`),
  };
}

// ============================================================================
// Structured Logger
// ============================================================================

/**
 * Formats a structured log entry as a readable string for development.
 */
function formatStructuredEntry(prefix: string, entry: StructuredLogEntry): string {
  const { event, message, ...rest } = entry;
  const dataStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  const msgStr = message ? `: ${message}` : '';
  return `${prefix} [${event}]${msgStr}${dataStr}`;
}

/**
 * Formats a structured log entry as JSON for production.
 */
function formatStructuredJson(prefix: string, level: LogLevel, entry: StructuredLogEntry): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    module: prefix.replace(/[[\]]/g, '').trim(),
    ...entry,
  });
}

function logAtLevel(level: LogLevel, message: string): void {
  switch (level) {
    case 'debug':
      logger.debug(message);
      break;
    case 'info':
      logger.info(message);
      break;
    case 'warn':
      logger.warn(message);
      break;
    case 'error':
      logger.error(message);
      break;
  }
}

/**
 * Creates a structured logger for specific modules.
 * Supports both string messages and structured data objects.
 *
 * @example
 * const log = createStructuredLogger('[Generator]');
 * log.structured('info', {
 *   event: 'phase_complete',
 *   phase: 'research',
 *   durationMs: 1500,
 *   sourcesFound: 5,
 * });
 */
export function createStructuredLogger(prefix: string): StructuredLogger {
  return {
    ...createPrefixedLogger(prefix),

    structured: (level: LogLevel, entry: StructuredLogEntry): void => {
      const formatted = isJsonLogging()
        ? formatStructuredJson(prefix, level, entry)
        : formatStructuredEntry(prefix, entry);
      logAtLevel(level, formatted);
    },
  };
}

// ============================================================================
// Contextual Logger
// ============================================================================

/**
 * Generates a short correlation ID: base36 timestamp, a dash, base36 random.
 */
export function generateCorrelationId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).slice(2, 10).padEnd(8, '0');
  return `${timestamp}-${random}`;
}

function contextTag(context: LoggingContext): string {
  return context.phase
    ? `[${context.correlationId}:${context.phase}]`
    : `[${context.correlationId}]`;
}

/**
 * Creates a logger that stamps every line with the run's correlation ID
 * (and phase, when set). JSON entries carry them as fields.
 *
 * @example
 * const log = createContextualLogger('[Generator]', { correlationId: 'abc-123' });
 * log.withPhase('plan').info('Outline ready');
 * // logs: "[Generator] [abc-123:plan] Outline ready"
 */
export function createContextualLogger(prefix: string, context: LoggingContext): ContextualLogger {
  const tagged = `${prefix} ${contextTag(context)}`;
  const base = createPrefixedLogger(tagged);

  return {
    ...base,
    context,

    structured: (level: LogLevel, entry: StructuredLogEntry): void => {
      const formatted = isJsonLogging()
        ? formatStructuredJson(prefix, level, {
            ...entry,
            correlationId: context.correlationId,
            ...(context.phase ? { phase: context.phase } : {}),
          })
        : formatStructuredEntry(tagged, entry);
      logAtLevel(level, formatted);
    },

    withPhase: (phase: string) => createContextualLogger(prefix, { ...context, phase }),
  };
}
