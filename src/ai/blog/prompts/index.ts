/**
 * Blog Generation Prompts
 */

export * from './research-prompts';
export * from './planner-prompts';
export * from './writer-prompts';
export * from './enhancer-prompts';
