/**
 * URL Slug Generation Utility
 *
 * Single source of truth for slugs: post file names, the `slug` frontmatter
 * field, table-of-contents anchors and the fallback outline's tag.
 */

/**
 * Generate a URL-safe slug from a string.
 *
 * Transformations:
 * 1. Lowercase the string
 * 2. Normalize Unicode and remove diacritics (é → e, ñ → n)
 * 3. Replace runs of non-alphanumeric characters with a single hyphen
 * 4. Remove leading/trailing hyphens
 *
 * @example
 * slugify("Why Your Tests Lie: Flaky Suites Explained")
 * // → "why-your-tests-lie-flaky-suites-explained"
 *
 * @example
 * slugify("Café Culture & Remote Work")
 * // → "cafe-culture-remote-work"
 */
export function slugify(value: string): string {
  return value
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '') // Remove diacritics
    .replace(/[^a-z0-9]+/g, '-')     // Replace non-alphanumeric with hyphens
    .replace(/^-|-$/g, '');          // Remove leading/trailing hyphens
}
