/**
 * Retry Utilities
 *
 * Retry logic with exponential backoff for transient failures in model
 * calls. Used by the model client; pipeline components never retry on
 * their own.
 */

import { APICallError } from 'ai';

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { RETRY_CONFIG } from './config';
import { BlogGenerationError } from './types';

// ============================================================================
// Types
// ============================================================================

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  readonly maxRetries?: number;
  /** Initial delay in ms before first retry (default: 1000) */
  readonly initialDelayMs?: number;
  /** Maximum delay in ms between retries (default: 10000) */
  readonly maxDelayMs?: number;
  /** Context for logging (e.g., "Planner outline generation") */
  readonly context?: string;
  /** Custom function to determine if an error is retryable (default: isRetryableError) */
  readonly shouldRetry?: (error: unknown) => boolean;
  /** Called before each wait, with the 1-indexed attempt that failed */
  readonly onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Optional AbortSignal to cancel the operation */
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
}

// ============================================================================
// Error Classification
// ============================================================================

/**
 * Known transient error patterns that should trigger a retry.
 */
const RETRYABLE_ERROR_PATTERNS = [
  // Rate limiting
  /rate.?limit/i,
  /too.?many.?requests/i,
  /429/,
  // Network issues
  /network/i,
  /fetch.*fail/i,
  /ETIMEDOUT/,
  /ECONNRESET/,
  /ECONNREFUSED/,
  /socket.?hang.?up/i,
  // Server errors (5xx)
  /5\d{2}/,
  /internal.?server.?error/i,
  /service.?unavailable/i,
  /bad.?gateway/i,
  // Provider load shedding
  /overloaded/i,
  /capacity/i,
  /temporarily/i,
];

function readStatus(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

/**
 * Determines if an error is likely transient and worth retrying.
 * Aborts and per-request timeouts are never retried; provider call
 * errors carry their own verdict.
 */
export function isRetryableError(error: unknown): boolean {
  if (!error) return false;

  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return false;
  }

  // The provider already classified HTTP failures
  if (APICallError.isInstance(error)) return error.isRetryable;

  const message = error instanceof Error ? error.message : String(error);

  for (const pattern of RETRYABLE_ERROR_PATTERNS) {
    if (pattern.test(message)) {
      return true;
    }
  }

  if (error instanceof Error) {
    const status = readStatus(error);
    if (status === 429 || (status !== undefined && status >= 500 && status < 600)) {
      return true;
    }
  }

  return false;
}

// ============================================================================
// Retry Logic
// ============================================================================

/**
 * Calculates delay for exponential backoff with jitter.
 */
function calculateDelay(attempt: number, initialDelayMs: number, maxDelayMs: number): number {
  const exponentialDelay = initialDelayMs * Math.pow(RETRY_CONFIG.BACKOFF_MULTIPLIER, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

  // ±25% jitter
  const jitter = cappedDelay * 0.25 * (Math.random() * 2 - 1);

  return Math.round(cappedDelay + jitter);
}

/**
 * Sleeps for the specified duration.
 *
 * @example
 * await sleep(1000); // Wait 1 second
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Executes an async function with retry logic and exponential backoff.
 *
 * Only retries on transient errors (rate limits, network issues, server errors).
 * Other errors fail immediately.
 *
 * @throws The last error if all retries fail, immediately for non-retryable
 * errors, or a CANCELLED BlogGenerationError once the signal aborts
 *
 * @example
 * const text = await withRetry(
 *   () => generateText({ model, prompt }),
 *   { context: 'Writer section generation', maxRetries: 3 }
 * );
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = RETRY_CONFIG.MAX_RETRIES,
    initialDelayMs = RETRY_CONFIG.INITIAL_DELAY_MS,
    maxDelayMs = RETRY_CONFIG.MAX_DELAY_MS,
    context = 'operation',
    shouldRetry = isRetryableError,
    onRetry,
    signal,
  } = options;

  const log = options.logger ?? createPrefixedLogger('[Retry]');
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (signal?.aborted) {
      throw new BlogGenerationError('CANCELLED', `${context} was cancelled`);
    }

    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (signal?.aborted) {
        throw new BlogGenerationError('CANCELLED', `${context} was cancelled`, { cause: error });
      }

      if (!shouldRetry(error)) {
        throw error;
      }

      if (attempt >= maxRetries) {
        log.warn(
          `${context} failed after ${maxRetries + 1} attempts: ${error instanceof Error ? error.message : String(error)}`
        );
        throw error;
      }

      const delay = calculateDelay(attempt, initialDelayMs, maxDelayMs);
      log.info(
        `${context} failed (attempt ${attempt + 1}/${maxRetries + 1}), ` +
          `retrying in ${delay}ms: ${error instanceof Error ? error.message : String(error)}`
      );
      onRetry?.(error, attempt + 1, delay);
      await sleep(delay);
    }
  }

  // Unreachable: the loop either returns or throws
  throw lastError;
}
