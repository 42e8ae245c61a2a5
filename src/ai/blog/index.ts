/**
 * Blog Generation
 *
 * Public API of the research → plan → write → assemble pipeline and the
 * enhancer for existing posts.
 *
 * @example
 * import { createBlogGenerator } from './ai/blog';
 * import { loadSettings } from './config/settings';
 *
 * const generator = createBlogGenerator(loadSettings());
 * const blog = await generator.generate('Intro to Testing', {
 *   targetWordCount: 1200,
 *   outputDir: './output',
 *   onProgress: (phase, progress, message) => console.log(`[${phase}] ${progress}% ${message ?? ''}`),
 * });
 */

// Orchestrator
export {
  createBlogGenerator,
  buildTopicOnlyResearch,
  type BlogGenerator,
  type BlogGeneratorDeps,
  type BlogGenerateOptions,
  type ResearchOptions,
  type OutlineOptions,
} from './generate-blog';

// Enhancer
export {
  createBlogEnhancer,
  type BlogEnhancer,
  type BlogEnhancerDeps,
  type EnhanceOptions,
  type EnhanceDirectoryOptions,
  type EnhanceResult,
  type EnhanceSuccess,
  type EnhanceFailure,
} from './enhancer';

// Outline
export {
  LAYOUT_TYPES,
  outlineToMarkdown,
  parseOutlineDocument,
  type BlogOutline,
  type LayoutType,
  type Section,
  type TopSection,
} from './outline';

// Assembly
export { assembleBlog, saveBlogToFile, buildBlogFilename, type AssembledBlog } from './assembler';
export { createFrontmatterGenerator, FRONTMATTER_FORMATS, type FrontmatterFormat } from './frontmatter';

// Types
export {
  BlogGenerationError,
  isBlogGenerationError,
  BLOG_GENERATION_PHASES,
  type BlogGenerationPhase,
  type BlogGenerationErrorCode,
  type BlogPost,
  type GeneratedBlog,
  type ResearchSummary,
  type Source,
  type TokenUsage,
  type BlogProgressCallback,
} from './types';
