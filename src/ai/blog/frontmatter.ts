/**
 * Frontmatter
 *
 * Emits and parses the metadata block at the top of a post:
 * YAML between `---` lines, TOML between `+++` lines, or a bare JSON object.
 */

import { parse as parseToml, stringify as stringifyToml } from 'smol-toml';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';

import { isRecord } from '../tools/types';
import { BlogGenerationError } from './types';

// ============================================================================
// Types
// ============================================================================

export const FRONTMATTER_FORMATS = ['yaml', 'toml', 'json'] as const;

export type FrontmatterFormat = (typeof FRONTMATTER_FORMATS)[number];

export type FrontmatterFields = Readonly<Record<string, unknown>>;

export interface FrontmatterInput {
  readonly title: string;
  /** Written as ISO-8601 with milliseconds and trailing Z */
  readonly date: Date | string;
  readonly draft?: boolean;
  readonly description?: string;
  readonly tags?: readonly string[];
  readonly categories?: readonly string[];
  readonly author?: string;
  readonly slug?: string;
  readonly featuredImage?: string;
  /** Defaults to true; false omits the field */
  readonly toc?: boolean;
  readonly lastmod?: Date | string;
  /** Written last, overriding anything above */
  readonly extra?: FrontmatterFields;
}

export interface ParsedFrontmatter {
  readonly fields: Record<string, unknown>;
  readonly body: string;
  /** Undefined when the content has no (valid) frontmatter */
  readonly format?: FrontmatterFormat;
}

export interface FrontmatterGenerator {
  readonly format: FrontmatterFormat;
  /** Builds the standard field set and serializes it */
  generate(input: FrontmatterInput): string;
  /** Serializes arbitrary fields, in insertion order */
  serialize(fields: FrontmatterFields): string;
  parse(content: string): ParsedFrontmatter;
  /** Merges `updates` into the content's frontmatter and re-serializes in this format */
  update(content: string, updates: FrontmatterFields): string;
}

export function isFrontmatterFormat(value: string): value is FrontmatterFormat {
  return FRONTMATTER_FORMATS.some((format) => format === value);
}

// ============================================================================
// Serialization
// ============================================================================

function formatDate(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : value;
}

/**
 * Converts dates to ISO strings, flattens multi-line strings and drops
 * null/undefined so every format can represent the result.
 */
function normalizeValue(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string') return value.replace(/\r?\n/g, ' ').trim();
  if (Array.isArray(value)) {
    return value.filter((item) => item !== null && item !== undefined).map(normalizeValue);
  }
  if (isRecord(value)) return normalizeFields(value);
  return value;
}

function normalizeFields(fields: FrontmatterFields): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value === null || value === undefined) continue;
    out[key] = normalizeValue(value);
  }
  return out;
}

function serializeAs(format: FrontmatterFormat, fields: FrontmatterFields): string {
  const data = normalizeFields(fields);
  switch (format) {
    case 'yaml':
      return `---\n${stringifyYaml(data, { lineWidth: 0, indentSeq: true })}---\n`;
    case 'toml':
      return `+++\n${stringifyToml(data).trim()}\n+++\n`;
    case 'json':
      return `${JSON.stringify(data, null, 2)}\n`;
  }
}

// ============================================================================
// Parsing
// ============================================================================

function splitDelimited(
  content: string,
  delimiter: string
): { readonly inner: string; readonly body: string } | undefined {
  const lines = content.split('\n');
  if (lines[0]?.trim() !== delimiter) return undefined;
  const end = lines.findIndex((line, i) => i > 0 && line.trim() === delimiter);
  if (end === -1) return undefined;
  return {
    inner: lines.slice(1, end).join('\n'),
    body: lines.slice(end + 1).join('\n').trim(),
  };
}

/**
 * Index of the brace closing the object that opens at position 0,
 * skipping braces inside JSON strings. -1 when unbalanced.
 */
function findJsonObjectEnd(content: string): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') inString = true;
    else if (char === '{') depth++;
    else if (char === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function tryParse(parse: () => unknown): Record<string, unknown> | undefined {
  try {
    const value = parse();
    if (value === null || value === undefined) return {};
    return isRecord(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Splits content into frontmatter fields and body. Detects the format from
 * the opening delimiter; content without valid frontmatter comes back as body.
 */
export function parseFrontmatter(content: string): ParsedFrontmatter {
  const trimmed = content.replace(/\r\n/g, '\n').trim();

  const yamlBlock = splitDelimited(trimmed, '---');
  if (yamlBlock) {
    const fields = tryParse(() => parseYaml(yamlBlock.inner));
    if (fields) return { fields, body: yamlBlock.body, format: 'yaml' };
  }

  const tomlBlock = splitDelimited(trimmed, '+++');
  if (tomlBlock) {
    const fields = tryParse(() => parseToml(tomlBlock.inner));
    if (fields) return { fields, body: tomlBlock.body, format: 'toml' };
  }

  if (trimmed.startsWith('{')) {
    const end = findJsonObjectEnd(trimmed);
    if (end > 0) {
      const fields = tryParse(() => JSON.parse(trimmed.slice(0, end + 1)));
      if (fields) return { fields, body: trimmed.slice(end + 1).trim(), format: 'json' };
    }
  }

  return { fields: {}, body: trimmed };
}

// ============================================================================
// Generator
// ============================================================================

/**
 * Creates a generator for one output format.
 *
 * @param format - 'yaml' | 'toml' | 'json' (case-insensitive)
 * @param defaultFields - Added to every generated block unless already set
 * @throws BlogGenerationError (CONFIG_ERROR) for an unsupported format
 */
export function createFrontmatterGenerator(
  format: string,
  defaultFields: FrontmatterFields = {}
): FrontmatterGenerator {
  const normalized = format.trim().toLowerCase();
  if (!isFrontmatterFormat(normalized)) {
    throw new BlogGenerationError(
      'CONFIG_ERROR',
      `Unsupported frontmatter format: "${format}" (expected one of ${FRONTMATTER_FORMATS.join(', ')})`
    );
  }

  const serialize = (fields: FrontmatterFields): string => serializeAs(normalized, fields);

  const generate = (input: FrontmatterInput): string => {
    const fields: Record<string, unknown> = {
      title: input.title,
      date: formatDate(input.date),
      draft: input.draft ?? false,
    };

    if (input.description) fields.description = input.description;
    if (input.tags && input.tags.length > 0) fields.tags = [...input.tags];
    if (input.categories && input.categories.length > 0) fields.categories = [...input.categories];
    if (input.author) fields.author = input.author;
    if (input.slug) fields.slug = input.slug;
    if (input.featuredImage) fields.featured_image = input.featuredImage;
    if (input.toc ?? true) fields.toc = true;

    for (const [key, value] of Object.entries(defaultFields)) {
      if (key in fields) continue;
      // A post without a table of contents never advertises one
      if (key === 'toc' && input.toc === false) continue;
      fields[key] = value;
    }

    Object.assign(fields, input.extra);
    if (input.lastmod !== undefined) fields.lastmod = formatDate(input.lastmod);

    return serialize(fields);
  };

  const update = (content: string, updates: FrontmatterFields): string => {
    const { fields, body } = parseFrontmatter(content);
    return `${serialize({ ...fields, ...updates })}\n${body}\n`;
  };

  return {
    format: normalized,
    generate,
    serialize,
    parse: parseFrontmatter,
    update,
  };
}
