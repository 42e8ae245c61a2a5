/**
 * AI Configuration Utilities
 *
 * Per-task model selection. Every task runs on `settings.llm.model` unless
 * its environment variable names a different model.
 */

/**
 * Environment variable names for each AI task.
 * Set these env vars to run one task on a different model.
 */
export const AI_ENV_KEYS = {
  RESEARCH: 'AI_MODEL_RESEARCH',
  PLANNING: 'AI_MODEL_PLANNING',
  WRITING: 'AI_MODEL_WRITING',
  ENHANCEMENT: 'AI_MODEL_ENHANCEMENT',
} as const;

export type AITaskKey = keyof typeof AI_ENV_KEYS;
export type AIEnvKey = (typeof AI_ENV_KEYS)[AITaskKey];

/**
 * Get the model for a specific AI task.
 * Checks the task's environment variable first, then falls back.
 *
 * @example
 * const model = getModel('WRITING', settings.llm.model);
 * // AI_MODEL_WRITING if set, otherwise settings.llm.model
 */
export function getModel(
  taskKey: AITaskKey,
  fallbackModel: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  return env[AI_ENV_KEYS[taskKey]]?.trim() || fallbackModel;
}
