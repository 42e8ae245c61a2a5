/**
 * Outline Planner
 *
 * Two model calls per plan:
 * 1. Free-form: the model drafts an outline in prose/markdown.
 * 2. Structuring: the model re-expresses its own draft as JSON.
 *
 * When the structuring reply cannot be used (bad JSON, missing fields,
 * or the call itself failing) the deterministic fallback outline is
 * returned instead. That path logs a warning and never throws.
 */

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import type { ModelClient } from '../../model-client';
import { PLANNER_CONFIG } from '../config';
import {
  buildFallbackOutline,
  outlineToMarkdown,
  parseStructuredOutline,
  type BlogOutline,
  type OutlineParseContext,
  type OutlineParseResult,
} from '../outline';
import { getOutlineUserPrompt, getRefineUserPrompt, getStructuringPrompt } from '../prompts';
import { errorMessage, isBlogGenerationError } from '../types';

// ============================================================================
// Types
// ============================================================================

export interface PlannerInput {
  readonly topic: string;
  /** May be empty */
  readonly researchSummary: string;
  readonly targetWordCount: number;
  readonly suggestedTags?: readonly string[];
  readonly suggestedCategories?: readonly string[];
}

export interface PlannerDeps {
  readonly model: ModelClient;
  readonly systemPrompt: string;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
}

// ============================================================================
// Structuring
// ============================================================================

/**
 * Runs the structuring call and parses its reply. Transport failures
 * come back as `unstructured`; only cancellation is rethrown.
 */
export async function structureOutline(
  rawOutline: string,
  context: OutlineParseContext,
  deps: PlannerDeps
): Promise<OutlineParseResult> {
  let reply: string;
  try {
    reply = await deps.model.generate(getStructuringPrompt(rawOutline), deps.systemPrompt, {
      temperature: PLANNER_CONFIG.STRUCTURING_TEMPERATURE,
      signal: deps.signal,
      context: 'Planner structuring',
    });
  } catch (error) {
    if (isBlogGenerationError(error) && error.code === 'CANCELLED') throw error;
    return { kind: 'unstructured', reason: `structuring call failed: ${errorMessage(error)}` };
  }

  return parseStructuredOutline(reply, context);
}

function resolveOutline(result: OutlineParseResult, context: OutlineParseContext, log: Logger): BlogOutline {
  if (result.kind === 'structured') {
    log.info(`Outline ready: "${result.outline.title}" with ${result.outline.sections.length} sections`);
    return result.outline;
  }

  log.warn(`Could not structure outline (${result.reason}); using fallback outline`);
  return buildFallbackOutline(context);
}

// ============================================================================
// Main Planner Functions
// ============================================================================

/**
 * Plans an outline for a topic. Always returns at least one section.
 *
 * @throws the model client's error when the free-form call fails
 */
export async function runPlanner(input: PlannerInput, deps: PlannerDeps): Promise<BlogOutline> {
  const log = deps.logger ?? createPrefixedLogger('[Planner]');

  log.info(`Drafting outline for "${input.topic}" (${input.targetWordCount} words)`);
  const rawOutline = await deps.model.generate(
    getOutlineUserPrompt({
      topic: input.topic,
      researchSummary: input.researchSummary,
      targetWordCount: input.targetWordCount,
    }),
    deps.systemPrompt,
    { signal: deps.signal, context: 'Planner outline' }
  );

  const context: OutlineParseContext = {
    topic: input.topic,
    targetWordCount: input.targetWordCount,
    suggestedTags: input.suggestedTags ?? [],
    suggestedCategories: input.suggestedCategories ?? [],
    rawOutlineText: rawOutline,
  };

  return resolveOutline(await structureOutline(rawOutline, context, deps), context, log);
}

/**
 * Revises an outline from free-text feedback. The current title anchors
 * the fallback; target word count, tags and categories carry over.
 */
export async function refineOutline(
  outline: BlogOutline,
  feedback: string,
  deps: PlannerDeps
): Promise<BlogOutline> {
  const log = deps.logger ?? createPrefixedLogger('[Planner]');

  log.info(`Refining outline "${outline.title}"`);
  const rawOutline = await deps.model.generate(
    getRefineUserPrompt(outlineToMarkdown(outline), feedback),
    deps.systemPrompt,
    { signal: deps.signal, context: 'Planner refinement' }
  );

  const context: OutlineParseContext = {
    topic: outline.title,
    targetWordCount: outline.targetWordCount,
    suggestedTags: outline.tags,
    suggestedCategories: outline.categories,
    rawOutlineText: rawOutline,
  };

  return resolveOutline(await structureOutline(rawOutline, context, deps), context, log);
}
