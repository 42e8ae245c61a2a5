/**
 * draftsmith command line
 *
 * Usage:
 *   npx tsx src/cli.ts write "Intro to Testing" --words 1200
 *   npx tsx src/cli.ts research "Intro to Testing"
 *   npx tsx src/cli.ts outline "Intro to Testing" --json
 *   npx tsx src/cli.ts enhance ./posts --recursive
 *   npx tsx src/cli.ts config
 *
 * Reads .env from the working directory. Exits 1 with a single error line
 * on failure.
 */

import { config as loadEnv } from 'dotenv';

import { readFile } from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';

import {
  createBlogEnhancer,
  createBlogGenerator,
  outlineToMarkdown,
  parseOutlineDocument,
  type BlogEnhancer,
  type BlogGenerator,
} from './ai/blog';
import { errorMessage } from './ai/blog/types';
import { loadSettings, settingsToYaml, type Settings, type SettingsOverrides } from './config/settings';
import { setLogLevel } from './utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface CliIO {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

export interface CliDeps extends Partial<CliIO> {
  readonly env?: NodeJS.ProcessEnv;
  readonly createGenerator?: (settings: Settings) => BlogGenerator;
  readonly createEnhancer?: (settings: Settings) => BlogEnhancer;
}

export const COMMANDS = ['write', 'research', 'outline', 'enhance', 'config'] as const;

type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

export const USAGE = `Usage: draftsmith <command> [options]

Commands:
  write <topic>      Research, outline, write and save a post
  research <topic>   Print a research brief
  outline <topic>    Print an outline
  enhance <path>     Improve an existing post, or every post in a directory
  config             Print the effective settings

Common options:
  --config <file>    YAML settings file
  --verbose          Debug logging`;

// ============================================================================
// Argument Parsing
// ============================================================================

const OPTIONS = {
  config: { type: 'string' },
  verbose: { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
  context: { type: 'string' },
  words: { type: 'string' },
  tags: { type: 'string' },
  categories: { type: 'string' },
  author: { type: 'string' },
  draft: { type: 'boolean', default: false },
  output: { type: 'string' },
  filename: { type: 'string' },
  'skip-research': { type: 'boolean', default: false },
  'outline-file': { type: 'string' },
  'research-file': { type: 'string' },
  json: { type: 'boolean', default: false },
  'no-trends': { type: 'boolean', default: false },
  'no-seo': { type: 'boolean', default: false },
  'no-backup': { type: 'boolean', default: false },
  recursive: { type: 'boolean', default: false },
} as const;

function parseCommaList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

function parseWordCount(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`--words must be a positive integer (got "${value}")`);
  }
  return parsed;
}

function requirePositional(positionals: readonly string[], name: string): string {
  const value = positionals.join(' ').trim();
  if (!value) throw new Error(`Missing <${name}>`);
  return value;
}

// ============================================================================
// Commands
// ============================================================================

/**
 * Runs one command. Resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(`${text}\n`));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(`${text}\n`));

  try {
    const { values, positionals } = parseArgs({
      args: [...argv],
      options: OPTIONS,
      allowPositionals: true,
      strict: true,
    });

    const [commandName, ...rest] = positionals;
    if (values.help || commandName === undefined) {
      stdout(USAGE);
      return values.help ? 0 : 1;
    }
    if (!isCommand(commandName)) {
      throw new Error(`Unknown command "${commandName}". Expected one of: ${COMMANDS.join(', ')}`);
    }

    const overrides: SettingsOverrides = {
      ...(values.verbose ? { verbose: true } : {}),
      ...(values.output ? { output: { directory: values.output } } : {}),
    };
    const settings = loadSettings({ configFile: values.config, env: deps.env, overrides });
    if (settings.verbose || settings.debug) setLogLevel('debug');

    const makeGenerator = deps.createGenerator ?? ((s: Settings) => createBlogGenerator(s));
    const makeEnhancer = deps.createEnhancer ?? ((s: Settings) => createBlogEnhancer(s));
    const targetWordCount = parseWordCount(values.words);

    switch (commandName) {
      case 'config': {
        stdout(settingsToYaml(settings).trimEnd());
        return 0;
      }

      case 'research': {
        const topic = requirePositional(rest, 'topic');
        const research = await makeGenerator(settings).researchOnly(topic, {
          additionalContext: values.context,
        });
        stdout(research.summary);
        if (research.sources.length > 0) {
          stdout('\nSources:');
          research.sources.forEach((source, i) => stdout(`${i + 1}. ${source.title} (${source.url})`));
        }
        return 0;
      }

      case 'outline': {
        const topic = requirePositional(rest, 'topic');
        const outline = await makeGenerator(settings).outlineOnly(topic, {
          targetWordCount,
          tags: parseCommaList(values.tags),
          categories: parseCommaList(values.categories),
        });
        stdout(values.json ? JSON.stringify(outline, null, 2) : outlineToMarkdown(outline));
        return 0;
      }

      case 'write': {
        const topic = requirePositional(rest, 'topic');
        const customOutline = values['outline-file']
          ? parseOutlineDocument(JSON.parse(await readFile(values['outline-file'], 'utf-8')))
          : undefined;
        const customResearch = values['research-file']
          ? await readFile(values['research-file'], 'utf-8')
          : undefined;

        const blog = await makeGenerator(settings).generate(topic, {
          additionalContext: values.context,
          targetWordCount,
          tags: parseCommaList(values.tags),
          categories: parseCommaList(values.categories),
          author: values.author,
          draft: values.draft,
          skipResearch: values['skip-research'],
          customOutline,
          customResearch,
          outputDir: settings.output.directory,
          filename: values.filename,
        });

        stdout(`Title: ${blog.title}`);
        stdout(`Words: ${blog.wordCount}`);
        stdout(`Time: ${blog.generationTimeSeconds.toFixed(1)}s`);
        stdout(`Tokens: ${blog.tokenUsage.input} in / ${blog.tokenUsage.output} out`);
        if (blog.filePath) stdout(`Saved: ${blog.filePath}`);
        return 0;
      }

      case 'enhance': {
        const target = requirePositional(rest, 'path');
        const enhancer = makeEnhancer(settings);
        const options = {
          targetWordCount,
          useTrends: !values['no-trends'],
          improveSeo: !values['no-seo'],
          backup: !values['no-backup'],
        };

        const results = target.endsWith('.md')
          ? [await enhancer.enhance(target, options)]
          : await enhancer.enhanceDirectory(target, { ...options, recursive: values.recursive });

        for (const result of results) {
          stdout(
            result.ok
              ? `✓ ${result.filePath}: ${result.originalWordCount} → ${result.enhancedWordCount} words`
              : `✗ ${result.filePath}: ${result.error}`
          );
        }
        return results.every((result) => result.ok) ? 0 : 1;
      }
    }
  } catch (error) {
    stderr(`Error: ${errorMessage(error).replace(/\s*\n\s*/g, '; ')}`);
    return 1;
  }
}

// ============================================================================
// Entry Point
// ============================================================================

const isMain = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isMain) {
  loadEnv();
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.stderr.write(`Error: ${errorMessage(error)}\n`);
      process.exitCode = 1;
    });
}
