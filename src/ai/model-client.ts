/**
 * Model Client
 *
 * The single model capability every pipeline component calls. Backed by the
 * `ai` package's generateText; provider is OpenRouter unless an
 * OpenAI-compatible endpoint is configured.
 */

import { createOpenAI } from '@ai-sdk/openai';
import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { generateText, type LanguageModel } from 'ai';

import type { LlmSettings } from '../config/settings';
import { createPrefixedLogger, type Logger } from '../utils/logger';
import { isRetryableError, withRetry, type RetryOptions } from './blog/retry';
import {
  addTokenUsage,
  BlogGenerationError,
  createEmptyTokenUsage,
  errorMessage,
  isBlogGenerationError,
  type TokenUsage,
} from './blog/types';

// ============================================================================
// Types
// ============================================================================

export interface GenerateOptions {
  /** Defaults to the client's configured temperature */
  readonly temperature?: number;
  /** Defaults to the client's configured max tokens */
  readonly maxTokens?: number;
  readonly signal?: AbortSignal;
  /** Label for retry logs, e.g. "Planner structuring" */
  readonly context?: string;
}

export interface ModelClient {
  readonly modelId: string;
  /**
   * Single completion. Rejects with ModelCallError once retries are
   * exhausted, or with a CANCELLED BlogGenerationError when `signal` aborts.
   */
  generate(prompt: string, systemPrompt?: string, options?: GenerateOptions): Promise<string>;
  /** Tokens consumed by every call on this client so far */
  getTokenUsage(): TokenUsage;
}

export interface ModelClientDeps {
  readonly generateText?: typeof generateText;
  /** Skips provider construction */
  readonly languageModel?: LanguageModel;
  readonly env?: NodeJS.ProcessEnv;
  readonly logger?: Logger;
  /** Backoff tuning, mainly for tests */
  readonly retry?: Pick<RetryOptions, 'initialDelayMs' | 'maxDelayMs'>;
}

/**
 * A model call that failed after all retries.
 */
export class ModelCallError extends Error {
  readonly name = 'ModelCallError';
  readonly retryable: boolean;

  constructor(message: string, options: { readonly retryable: boolean; readonly cause?: unknown }) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.retryable = options.retryable;
  }
}

export function isModelCallError(error: unknown): error is ModelCallError {
  return error instanceof ModelCallError;
}

// ============================================================================
// Provider
// ============================================================================

const OPENROUTER_KEY_ENV = 'OPENROUTER_API_KEY';
const OPENAI_KEY_ENV = 'OPENAI_API_KEY';

function usesOpenAICompatible(llm: LlmSettings): boolean {
  return llm.provider === 'openai' || llm.baseUrl !== undefined;
}

/**
 * API key from settings, else from the provider's environment variable.
 */
export function resolveApiKey(llm: LlmSettings, env: NodeJS.ProcessEnv = process.env): string | undefined {
  if (llm.apiKey) return llm.apiKey;
  return usesOpenAICompatible(llm) ? env[OPENAI_KEY_ENV] : env[OPENROUTER_KEY_ENV];
}

/**
 * @throws BlogGenerationError (CONFIG_ERROR) when OpenRouter is selected without a key
 */
export function createLanguageModel(llm: LlmSettings, env: NodeJS.ProcessEnv = process.env): LanguageModel {
  const apiKey = resolveApiKey(llm, env);

  if (usesOpenAICompatible(llm)) {
    // Local OpenAI-compatible servers usually accept any key
    const openai = createOpenAI({ apiKey: apiKey ?? 'not-needed', baseURL: llm.baseUrl });
    return openai.chat(llm.model);
  }

  if (!apiKey) {
    throw new BlogGenerationError('CONFIG_ERROR', `${OPENROUTER_KEY_ENV} environment variable is required`);
  }
  return createOpenRouter({ apiKey })(llm.model);
}

// ============================================================================
// Client
// ============================================================================

export function createModelClient(llm: LlmSettings, deps: ModelClientDeps = {}): ModelClient {
  const model = deps.languageModel ?? createLanguageModel(llm, deps.env);
  const generate = deps.generateText ?? generateText;
  const log = deps.logger ?? createPrefixedLogger('[Model]');
  const timeoutMs = llm.timeoutSeconds * 1000;
  let usage = createEmptyTokenUsage();

  return {
    modelId: llm.model,

    async generate(prompt, systemPrompt, options = {}): Promise<string> {
      const context = options.context ?? `Model call (${llm.model})`;

      try {
        const result = await withRetry(
          () => {
            // Fresh timeout per attempt
            const timeoutSignal = AbortSignal.timeout(timeoutMs);
            return generate({
              model,
              system: systemPrompt,
              prompt,
              temperature: options.temperature ?? llm.temperature,
              maxOutputTokens: options.maxTokens ?? llm.maxTokens,
              maxRetries: 0,
              abortSignal: options.signal ? AbortSignal.any([options.signal, timeoutSignal]) : timeoutSignal,
            });
          },
          {
            maxRetries: llm.maxRetries,
            context,
            signal: options.signal,
            logger: log,
            ...deps.retry,
          }
        );

        usage = addTokenUsage(usage, {
          input: result.usage.inputTokens ?? 0,
          output: result.usage.outputTokens ?? 0,
        });
        return result.text.trim();
      } catch (error) {
        if (isBlogGenerationError(error)) throw error;
        throw new ModelCallError(`${context} failed: ${errorMessage(error)}`, {
          retryable: isRetryableError(error),
          cause: error,
        });
      }
    },

    getTokenUsage: () => usage,
  };
}
