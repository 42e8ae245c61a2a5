/**
 * Blog Enhancer prompts.
 */

export interface AnalysisPromptContext {
  readonly title: string;
  readonly wordCount: number;
  readonly targetWordCount: number;
  readonly content: string;
  readonly trendsContext: string;
  /** H2 sections below the minimum length */
  readonly thinSections: readonly string[];
}

export interface EnhancementPromptContext {
  readonly body: string;
  readonly analysis: string;
  readonly trendsContext: string;
  readonly currentWordCount: number;
  readonly targetWordCount: number;
  readonly trendingKeywords: readonly string[];
}

export interface MetaDescriptionPromptContext {
  readonly title: string;
  readonly contentSummary: string;
  readonly keywords: readonly string[];
}

export interface TagSuggestionPromptContext {
  readonly title: string;
  readonly topics: string;
  readonly risingKeywords: readonly string[];
  readonly currentTags: readonly string[];
  readonly currentCategories: readonly string[];
}

function listOrNone(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : 'None';
}

export function getAnalysisPrompt(ctx: AnalysisPromptContext): string {
  const thin = ctx.thinSections.length > 0 ? ctx.thinSections.map((s) => `- ${s}`).join('\n') : 'None detected';

  return `Review this published article and list what would make it better.

**Title:** ${ctx.title}
**Current length:** ${ctx.wordCount} words (target: ${ctx.targetWordCount})

**Sections that look thin:**
${thin}

**Search trends:**
${ctx.trendsContext}

**Article:**
${ctx.content}

---

Cover each of these, citing the exact passage where it applies:
1. Sections that need more depth, examples or data
2. SEO problems: heading structure, missing keywords, weak opening
3. Writing problems: filler, repetition, unclear passages
4. Trending searches the article does not address yet

Be specific and brief.`;
}

export function getEnhancementPrompt(ctx: EnhancementPromptContext): string {
  return `Rewrite the article below using the review notes.

**Review notes:**
${ctx.analysis}

**Search trends:**
${ctx.trendsContext}

**Keywords to work in naturally:** ${listOrNone(ctx.trendingKeywords)}

**Length:** currently ${ctx.currentWordCount} words; bring it to at least ${ctx.targetWordCount}.

**Rules:**
- Keep the existing headings unless the notes say a heading is weak
- Expand thin sections with concrete examples and explanation, not padding
- Keep every link and reference that is already there
- Return markdown for the article body only: no frontmatter, no title heading, no commentary

**Article:**
${ctx.body}`;
}

export function getMetaDescriptionPrompt(ctx: MetaDescriptionPromptContext): string {
  return `Write a meta description for this article.

**Title:** ${ctx.title}
**Opening:** ${ctx.contentSummary}
**Keywords:** ${listOrNone(ctx.keywords)}

One sentence, at most 155 characters, that makes a searcher want to click. Return the description only, without quotes.`;
}

export function getTagSuggestionPrompt(ctx: TagSuggestionPromptContext): string {
  return `Suggest tags and categories for this article.

**Title:** ${ctx.title}
**Topics:** ${ctx.topics}
**Rising searches:** ${listOrNone(ctx.risingKeywords)}
**Current tags:** ${listOrNone(ctx.currentTags)}
**Current categories:** ${listOrNone(ctx.currentCategories)}

Return JSON only, in this shape:
{"tags": ["lowercase-hyphenated", "..."], "categories": ["One or two broad categories"]}

Use 5-8 tags. Keep current tags that still fit.`;
}
