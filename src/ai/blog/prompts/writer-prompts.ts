/**
 * Section Writer prompts.
 */

export interface IntroductionPromptContext {
  readonly title: string;
  readonly topic: string;
  /** One `- Title: point, point` line per section */
  readonly sectionPreview: string;
  readonly targetWords: number;
}

export interface SectionPromptContext {
  readonly title: string;
  readonly sectionTitle: string;
  readonly sectionOutline: string;
  /** Trailing window of everything written so far */
  readonly previousContent: string;
  readonly researchNotes: string;
  readonly targetWords: number;
}

export interface ConclusionPromptContext {
  readonly title: string;
  readonly topic: string;
  /** One `- Title` line per section */
  readonly mainPoints: string;
}

export function getIntroductionPrompt(ctx: IntroductionPromptContext): string {
  return `Write the introduction of a feature article.

**Title:** ${ctx.title}
**Topic:** ${ctx.topic}
**What follows:**
${ctx.sectionPreview}

---

**Length:** about ${ctx.targetWords} words.

**Open with one of:** a striking fact, a concrete scene, a claim that challenges a common belief, or a direct question.

**Requirements:**
- The first sentence has to make the reader want the second
- Make clear why the topic matters now
- Hint at what the article will show without giving it away
- End with a natural lead into the first section

Write the introduction only. No headings.`;
}

export function getSectionPrompt(ctx: SectionPromptContext): string {
  return `Continue a feature article by writing its next section.

**Article Title:** ${ctx.title}
**Current Section:** ${ctx.sectionTitle}

**Section Brief:**
${ctx.sectionOutline}

**What came before:**
${ctx.previousContent}

**Research to incorporate:**
${ctx.researchNotes}

**Target length:** ${ctx.targetWords} words

---

**Guidelines:**
- Pick up naturally from what came before; do not repeat it
- One clear point per paragraph, with at least one concrete example
- Explain what any figure means for the reader
- Use ### for subsections named in the brief

Write the section content only. Do NOT include the section title as a heading.`;
}

export function getConclusionPrompt(ctx: ConclusionPromptContext): string {
  return `Write the conclusion of a feature article.

**Article Title:** ${ctx.title}
**Topic:** ${ctx.topic}
**Sections Covered:**
${ctx.mainPoints}

---

**Length:** 150-200 words.

**Requirements:**
- Draw the sections together into one takeaway instead of summarizing each
- Say what the reader can do or think about differently
- Finish on a memorable line
- No new information, and never start with "In conclusion"

Write the conclusion only. No headings.`;
}
