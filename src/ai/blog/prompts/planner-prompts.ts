/**
 * Outline Planner prompts: free-form outline, structuring, refinement.
 */

import { LAYOUT_TYPES } from '../outline';

export interface OutlinePromptContext {
  readonly topic: string;
  readonly researchSummary: string;
  readonly targetWordCount: number;
}

/**
 * Free-form outline request. No structural guarantee on the reply.
 */
export function getOutlineUserPrompt(ctx: OutlinePromptContext): string {
  const research = ctx.researchSummary.trim() || 'No research is available; plan from general knowledge.';

  return `Plan a publication-ready article.

**Topic:** ${ctx.topic}

**Research Available:**
${research}

**Target Length:** ${ctx.targetWordCount} words

---

Provide the following:

### 1. Title
Specific and intriguing. Avoid "The Ultimate Guide to..." and "Everything You Need to Know About...".

### 2. Meta Description
One sentence of 150-160 characters that makes a reader want to click.

### 3. Layout Type
Pick the format that suits the topic best: ${LAYOUT_TYPES.join(', ')}.

### 4. Sections
4-6 sections, not counting the introduction and conclusion. Each section builds on the one before it.
For each section give a specific title and 3-5 key points. Add subsections only where a section clearly needs them.

### 5. Tags and Categories
Relevant tags (lowercase, hyphenated) and 1-2 categories.

### 6. SEO Keywords
3-5 keywords people actually search for.`;
}

/**
 * Asks the model to re-express its own outline as JSON.
 */
export function getStructuringPrompt(rawOutline: string): string {
  return `Extract the following from this article outline and return it as JSON:

Outline:
${rawOutline}

Return a JSON object with these fields:
- title: The article title
- meta_description: The meta description (150-160 chars)
- layout_type: One of ${LAYOUT_TYPES.join(', ')}
- tags: Array of tags
- categories: Array of categories
- seo_keywords: Array of SEO keywords
- sections: Array of section objects, each with:
  - title: Section title
  - key_points: Array of key points to cover
  - subsections: Array of subsection objects with title and key_points only

Return only valid JSON, no other text.`;
}

/**
 * Refinement request. `currentOutline` is the markdown rendering of the outline.
 */
export function getRefineUserPrompt(currentOutline: string, feedback: string): string {
  return `Refine the following article outline based on the feedback provided.

Current Outline:
${currentOutline}

Feedback:
${feedback}

Provide an improved outline that addresses the feedback and keeps what already works.`;
}
