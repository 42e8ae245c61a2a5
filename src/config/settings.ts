/**
 * Settings
 *
 * One validated settings value, built once and passed to every component.
 * Sources, lowest precedence first: schema defaults, a YAML config file,
 * `DRAFTSMITH_<SECTION>__<FIELD>` environment variables, explicit overrides.
 */

import { readFileSync } from 'node:fs';
import { extname } from 'node:path';

import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';

import {
  DEFAULT_PLANNER_SYSTEM_PROMPT,
  DEFAULT_RESEARCH_SYSTEM_PROMPT,
  DEFAULT_WRITER_SYSTEM_PROMPT,
} from '../ai/config/system-prompts';
import { FRONTMATTER_FORMATS } from '../ai/blog/frontmatter';
import { BlogGenerationError } from '../ai/blog/types';
import { SEARCH_PROVIDERS } from '../ai/tools/search';
import { isRecord } from '../ai/tools/types';

export const ENV_PREFIX = 'DRAFTSMITH_';
export const CONFIG_FILE_ENV = 'DRAFTSMITH_CONFIG_FILE';

// ============================================================================
// Schema
// ============================================================================

export const LLM_PROVIDERS = ['openrouter', 'openai'] as const;

const LlmSettingsSchema = z.object({
  provider: z.enum(LLM_PROVIDERS).default('openrouter'),
  /** OpenRouter model id, or the plain model name for an OpenAI-compatible endpoint */
  model: z.string().min(1).default('openai/gpt-4o'),
  /** Setting this routes requests to an OpenAI-compatible endpoint */
  baseUrl: z.string().url().optional(),
  /** Falls back to OPENROUTER_API_KEY / OPENAI_API_KEY */
  apiKey: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().default(4096),
  timeoutSeconds: z.number().positive().default(120),
  maxRetries: z.number().int().min(0).default(3),
});

const ResearchSettingsSchema = z.object({
  maxSearchResults: z.number().int().positive().default(10),
  maxSources: z.number().int().positive().default(5),
  scrapeTopN: z.number().int().min(0).default(3),
  searchProvider: z.enum(SEARCH_PROVIDERS).default('tavily'),
  /** Falls back to TAVILY_API_KEY */
  tavilyApiKey: z.string().min(1).optional(),
});

const OutputSettingsSchema = z.object({
  directory: z.string().min(1).default('./output'),
});

const FrontmatterSettingsSchema = z.object({
  format: z.enum(FRONTMATTER_FORMATS).default('yaml'),
  defaultFields: z.record(z.unknown()).default({ draft: false, toc: true }),
});

const BlogSettingsSchema = z
  .object({
    minWordCount: z.number().int().positive().default(1500),
    maxWordCount: z.number().int().positive().default(5000),
    includeToc: z.boolean().default(true),
    includeCitations: z.boolean().default(true),
    defaultTags: z.array(z.string()).default([]),
    defaultCategories: z.array(z.string()).default([]),
  })
  .refine((blog) => blog.minWordCount <= blog.maxWordCount, {
    message: 'minWordCount cannot be greater than maxWordCount',
    path: ['minWordCount'],
  });

const PromptSettingsSchema = z.object({
  researchSystem: z.string().min(1).default(DEFAULT_RESEARCH_SYSTEM_PROMPT),
  plannerSystem: z.string().min(1).default(DEFAULT_PLANNER_SYSTEM_PROMPT),
  writerSystem: z.string().min(1).default(DEFAULT_WRITER_SYSTEM_PROMPT),
});

export const SettingsSchema = z.object({
  llm: LlmSettingsSchema.default({}),
  research: ResearchSettingsSchema.default({}),
  output: OutputSettingsSchema.default({}),
  frontmatter: FrontmatterSettingsSchema.default({}),
  blog: BlogSettingsSchema.default({}),
  prompts: PromptSettingsSchema.default({}),
  verbose: z.boolean().default(false),
  debug: z.boolean().default(false),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type LlmSettings = Settings['llm'];
export type ResearchSettings = Settings['research'];
export type BlogSettings = Settings['blog'];

export type SettingsOverrides = {
  readonly [K in keyof Settings]?: Settings[K] extends Record<string, unknown>
    ? Partial<Settings[K]>
    : Settings[K];
};

export const DEFAULT_SETTINGS: Settings = SettingsSchema.parse({});

export interface LoadSettingsOptions {
  /** YAML file; defaults to $DRAFTSMITH_CONFIG_FILE */
  readonly configFile?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly overrides?: SettingsOverrides;
}

// ============================================================================
// Merging
// ============================================================================

/**
 * Recursively merges plain objects. Arrays and scalars in `override`
 * replace those in `base`; undefined values are skipped.
 */
export function mergeDeep(base: Record<string, unknown>, override: unknown): Record<string, unknown> {
  if (!isRecord(override)) return base;

  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = out[key];
    out[key] = isRecord(current) && isRecord(value) ? mergeDeep(current, value) : value;
  }
  return out;
}

// ============================================================================
// Config File
// ============================================================================

function readConfigFile(path: string): Record<string, unknown> {
  const ext = extname(path).toLowerCase();
  if (ext !== '.yaml' && ext !== '.yml') {
    throw new BlogGenerationError('CONFIG_ERROR', `Unsupported config format: ${ext || '(none)'}`);
  }

  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new BlogGenerationError('CONFIG_ERROR', `Cannot read config file ${path}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (error) {
    throw new BlogGenerationError('CONFIG_ERROR', `Invalid YAML in ${path}`, { cause: error });
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new BlogGenerationError('CONFIG_ERROR', `Config file ${path} must contain a mapping`);
  }
  return parsed;
}

// ============================================================================
// Environment
// ============================================================================

function toCamelCase(name: string): string {
  return name.toLowerCase().replace(/_([a-z0-9])/g, (_, char: string) => char.toUpperCase());
}

function lookupDefault(path: readonly string[]): unknown {
  let node: unknown = DEFAULT_SETTINGS;
  for (const key of path) {
    if (!isRecord(node)) return undefined;
    node = node[key];
  }
  return node;
}

/**
 * Converts an env string to the type the default for that field has.
 * Values that do not convert are left as strings so validation reports them.
 */
function coerceEnvValue(raw: string, defaultValue: unknown): unknown {
  if (typeof defaultValue === 'number') {
    const num = Number(raw);
    return raw.trim() !== '' && Number.isFinite(num) ? num : raw;
  }
  if (typeof defaultValue === 'boolean') {
    if (/^(true|1|yes|on)$/i.test(raw.trim())) return true;
    if (/^(false|0|no|off)$/i.test(raw.trim())) return false;
    return raw;
  }
  if (Array.isArray(defaultValue)) {
    return raw
      .split(',')
      .map((item) => item.trim())
      .filter(Boolean);
  }
  if (isRecord(defaultValue)) {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      return raw;
    }
  }
  return raw;
}

/**
 * Collects `DRAFTSMITH_<SECTION>__<FIELD>` and `DRAFTSMITH_<FIELD>` variables
 * into a nested object.
 *
 * @example
 * settingsFromEnv({ DRAFTSMITH_LLM__MAX_TOKENS: '2048' })
 * // { llm: { maxTokens: 2048 } }
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  let out: Record<string, unknown> = {};

  for (const [name, raw] of Object.entries(env)) {
    if (!name.startsWith(ENV_PREFIX) || name === CONFIG_FILE_ENV || raw === undefined) continue;

    const path = name.slice(ENV_PREFIX.length).split('__').map(toCamelCase);
    if (path.length === 0 || path.length > 2 || path.some((part) => part === '')) continue;

    const value = coerceEnvValue(raw, lookupDefault(path));
    const nested = path.reduceRight<unknown>((acc, key) => ({ [key]: acc }), value);
    out = mergeDeep(out, nested);
  }

  return out;
}

// ============================================================================
// Loading
// ============================================================================

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `- ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}

/**
 * Validates a raw settings object.
 *
 * @throws BlogGenerationError (CONFIG_ERROR) listing every invalid field
 */
export function parseSettings(raw: unknown): Settings {
  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    throw new BlogGenerationError('CONFIG_ERROR', `Invalid settings:\n${formatIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Builds the effective settings.
 *
 * @example
 * const settings = loadSettings({ configFile: 'draftsmith.yaml', overrides: { verbose: true } });
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const env = options.env ?? process.env;
  const configFile = options.configFile ?? env[CONFIG_FILE_ENV];

  let raw: Record<string, unknown> = {};
  if (configFile) raw = mergeDeep(raw, readConfigFile(configFile));
  raw = mergeDeep(raw, settingsFromEnv(env));
  raw = mergeDeep(raw, options.overrides);

  return parseSettings(raw);
}

/**
 * YAML dump of the effective settings with secrets masked.
 */
export function settingsToYaml(settings: Settings): string {
  const masked = {
    ...settings,
    llm: { ...settings.llm, ...(settings.llm.apiKey ? { apiKey: '***' } : {}) },
    research: {
      ...settings.research,
      ...(settings.research.tavilyApiKey ? { tavilyApiKey: '***' } : {}),
    },
  };
  return stringifyYaml(masked, { lineWidth: 0 });
}
