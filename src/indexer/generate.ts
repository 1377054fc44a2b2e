/**
 * Generate-and-write workflow shared by the CLI and the protocol server
 */

import fs from 'node:fs';
import path from 'node:path';

import { loadConfig, loadConfigOrDefault, type Config } from '../config/index.js';
import {
  computeStats,
  detectFormat,
  writeSummary,
} from '../serializer/index.js';
import type { OutputFormat, RepoSummary, SummaryStats } from '../types/index.js';
import { resolveUserPath } from '../utils/paths.js';
import { Indexer, type FileResult } from './index.js';
import { SqliteCache } from './storage/index.js';
import { createSummaryProvider, type SummaryProvider } from './summaries/index.js';
import { createClock } from './timestamp.js';

export interface GenerateOptions {
  directory: string;
  /** Output file; relative paths resolve against outputBase */
  output?: string;
  /** Base for a relative output path, defaults to the working directory */
  outputBase?: string;
  format?: OutputFormat;
  /** Explicit config file; otherwise looked up from the directory */
  configPath?: string;
  config?: Config;
  include?: string[];
  exclude?: string[];
  concurrency?: number;
  cache?: boolean;
  timestamp?: boolean;
  /** Overrides summaries.enabled from the configuration */
  summaries?: boolean;
  /** Used instead of the configured provider when summaries are on */
  summarizer?: SummaryProvider;
  now?: () => Date;
  signal?: AbortSignal;
  onFile?: (result: FileResult) => void;
}

export interface GenerateResult {
  directory: string;
  outputPath: string;
  format: OutputFormat;
  summary: RepoSummary;
  content: string;
  stats: SummaryStats;
  /** Files whose summary request failed; their signatures are still written */
  summaryErrors: Array<{ path: string; message: string }>;
}

const FORMAT_EXTENSIONS: Record<OutputFormat, string> = {
  json: '.tldr.json',
  text: '.tldr',
  markdown: '.tldr.md',
};

/**
 * `<dir>/<dirname>.tldr.json` (or `.tldr` / `.tldr.md`)
 */
export function defaultOutputPath(directory: string, format: OutputFormat = 'json'): string {
  const name = path.basename(path.resolve(directory)) || 'root';
  return path.join(directory, `${name}${FORMAT_EXTENSIONS[format]}`);
}

export async function assertDirectory(directory: string): Promise<void> {
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(directory);
  } catch {
    throw new Error(`Directory not found: ${directory}`);
  }
  if (!stats.isDirectory()) {
    throw new Error(`Not a directory: ${directory}`);
  }
}

export async function resolveConfig(directory: string, configPath?: string): Promise<Config> {
  return configPath ? loadConfig(configPath) : loadConfigOrDefault(directory);
}

/**
 * Resolve output path and format from explicit options, the file name and
 * the configuration, in that order
 */
export function resolveOutput(
  directory: string,
  config: Config,
  options: Pick<GenerateOptions, 'output' | 'outputBase' | 'format'>
): { outputPath: string; format: OutputFormat } {
  if (options.output) {
    const outputPath = resolveUserPath(options.output, options.outputBase);
    return { outputPath, format: options.format ?? detectFormat(outputPath) ?? config.output.format };
  }
  if (config.output.path) {
    const outputPath = resolveUserPath(config.output.path, directory);
    return { outputPath, format: options.format ?? detectFormat(outputPath) ?? config.output.format };
  }
  const format = options.format ?? config.output.format;
  return { outputPath: defaultOutputPath(directory, format), format };
}

export function createIndexer(
  directory: string,
  config: Config,
  overrides: Pick<
    GenerateOptions,
    'include' | 'exclude' | 'concurrency' | 'cache' | 'timestamp' | 'summaries' | 'summarizer' | 'now'
  > = {}
): Indexer {
  const cacheEnabled = overrides.cache ?? config.cache.enabled;
  const summariesEnabled = overrides.summaries ?? config.summaries.enabled;
  const summarizer = summariesEnabled
    ? (overrides.summarizer ?? createSummaryProvider(config.summaries))
    : null;

  return new Indexer({
    rootDirectory: directory,
    include: overrides.include && overrides.include.length > 0 ? overrides.include : config.include,
    exclude: [...config.exclude, ...(overrides.exclude ?? [])],
    parserOptions: config.parser,
    languages: config.languages,
    concurrency: overrides.concurrency ?? config.concurrency,
    cache: cacheEnabled ? new SqliteCache(path.resolve(directory, config.cache.path)) : null,
    summarizer,
    clock: createClock(overrides.timestamp ?? config.output.timestamp, overrides.now),
  });
}

/**
 * Extract a directory and write the artifact
 */
export async function generateTldr(options: GenerateOptions): Promise<GenerateResult> {
  const directory = resolveUserPath(options.directory);
  await assertDirectory(directory);

  const config = options.config ?? (await resolveConfig(directory, options.configPath));
  const { outputPath, format } = resolveOutput(directory, config, options);
  const indexer = createIndexer(directory, config, options);

  const summaryErrors: GenerateResult['summaryErrors'] = [];

  try {
    const summary = await indexer.indexDirectory({
      signal: options.signal,
      ignore: [outputPath],
      onFile: result => {
        if (result.kind === 'file' && result.summaryError !== undefined) {
          summaryErrors.push({ path: result.file.path, message: result.summaryError });
        }
        options.onFile?.(result);
      },
    });
    const content = await writeSummary(outputPath, summary, format);

    return { directory, outputPath, format, summary, content, stats: computeStats(summary), summaryErrors };
  } finally {
    await indexer.close();
  }
}
