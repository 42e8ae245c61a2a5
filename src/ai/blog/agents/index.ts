/**
 * Blog Generation Agents
 *
 * - Collector: search queries, deduplicated hits, scraped pages
 * - Synthesizer: prose research brief
 * - Planner: structured outline with a deterministic fallback
 * - Writer: section-by-section prose
 */

export {
  runCollector,
  generateSearchQueries,
  buildFallbackQueries,
  parseQueryLines,
  dedupeByUrl,
  type CollectorInput,
  type CollectorDeps,
} from './collector';

export { runSynthesizer, type SynthesizerDeps } from './synthesizer';

export {
  runPlanner,
  refineOutline,
  structureOutline,
  type PlannerInput,
  type PlannerDeps,
} from './planner';

export {
  runWriter,
  INTRODUCTION_KEY,
  CONCLUSION_KEY,
  NO_RESEARCH_NOTES_TEXT,
  type WriterInput,
  type WriterDeps,
  type SectionWrittenCallback,
} from './writer';
