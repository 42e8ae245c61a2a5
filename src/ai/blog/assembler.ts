/**
 * Assembler
 *
 * Joins frontmatter, the title heading, an optional table of contents and
 * the written body into the final document, and writes it to disk.
 *
 * `assembleBlog` is pure: the date is a parameter, so identical input
 * always produces identical output.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { slugify } from '../../utils/slug';
import type { FrontmatterGenerator } from './frontmatter';
import { cleanContent, countWords, extractHeadings, generateToc } from './markdown-utils';
import type { BlogOutline } from './outline';
import type { BlogPost } from './types';

// ============================================================================
// Types
// ============================================================================

export interface AssembleInput {
  readonly post: BlogPost;
  readonly outline: BlogOutline;
  readonly frontmatter: FrontmatterGenerator;
  readonly date: Date;
  readonly includeToc: boolean;
  readonly draft?: boolean;
  readonly author?: string;
  /** Used only when the outline has none */
  readonly defaultTags?: readonly string[];
  readonly defaultCategories?: readonly string[];
}

export interface AssembledBlog {
  readonly title: string;
  readonly slug: string;
  readonly frontmatter: string;
  readonly fullContent: string;
  readonly wordCount: number;
}

// ============================================================================
// Assembly
// ============================================================================

function preferOutline(fromOutline: readonly string[], defaults: readonly string[] = []): string[] {
  return fromOutline.length > 0 ? [...fromOutline] : [...defaults];
}

export function assembleBlog(input: AssembleInput): AssembledBlog {
  const { post, outline } = input;
  const title = post.title;
  const slug = slugify(title);

  const frontmatter = input.frontmatter.generate({
    title,
    date: input.date,
    draft: input.draft ?? false,
    author: input.author,
    description: outline.metaDescription,
    tags: preferOutline(outline.tags, input.defaultTags),
    categories: preferOutline(outline.categories, input.defaultCategories),
    slug,
    toc: input.includeToc,
  });

  const blocks = [`# ${title}`];
  if (input.includeToc && extractHeadings(post.content).length > 0) {
    blocks.push(generateToc(post.content));
  }
  blocks.push(post.content);

  const fullContent = cleanContent(`${frontmatter}\n${blocks.join('\n\n')}`);

  return {
    title,
    slug,
    frontmatter,
    fullContent,
    wordCount: countWords(fullContent),
  };
}

// ============================================================================
// Persistence
// ============================================================================

/**
 * `YYYY-MM-DD-slug.md`, using the UTC date.
 */
export function buildBlogFilename(slug: string, date: Date): string {
  return `${date.toISOString().slice(0, 10)}-${slug || 'untitled'}.md`;
}

/**
 * Writes the document, creating `outputDir` as needed. An existing file
 * with the same name is overwritten.
 *
 * @returns The path written
 */
export async function saveBlogToFile(
  blog: Pick<AssembledBlog, 'slug' | 'fullContent'>,
  outputDir: string,
  options: { readonly filename?: string; readonly date: Date }
): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const filePath = path.join(outputDir, options.filename ?? buildBlogFilename(blog.slug, options.date));
  await writeFile(filePath, blog.fullContent, 'utf-8');
  return filePath;
}
