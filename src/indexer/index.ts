/**
 * Main indexer orchestration: file discovery, per-file extraction and
 * aggregation into a RepoSummary
 */

import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import fg from 'fast-glob';
import { mapLimit } from 'async';

import {
  FORMAT_VERSION,
  UNSUPPORTED,
  type FileSummary,
  type RepoSummary,
  type SkippedFile,
} from '../types/index.js';
import { TOOL_NAME, TOOL_VERSION } from '../version.js';
import { ParserRegistry, createDefaultRegistry, type ParserOptions, type RegistryOptions } from './parsers/index.js';
import type { CacheStorage } from './storage/index.js';
import type { SummaryProvider } from './summaries/index.js';
import { createClock, type Clock } from './timestamp.js';

export interface IndexerConfig {
  rootDirectory: string;
  include: string[];
  exclude: string[];
  parserOptions?: ParserOptions;
  languages?: RegistryOptions['languages'];
  concurrency?: number;
  cache?: CacheStorage | null;
  /** Adds a prose summary to each extracted file */
  summarizer?: SummaryProvider | null;
  /** Produces generatedAt; defaults to the current time */
  clock?: Clock;
  runtime?: RegistryOptions['runtime'];
}

export interface IndexOptions {
  signal?: AbortSignal;
  /** Extra paths or globs excluded from this run, e.g. the output file */
  ignore?: string[];
  /** Process exactly these files instead of discovering them */
  files?: string[];
  onFile?: (result: FileResult) => void;
}

export type FileResult =
  | { kind: 'file'; file: FileSummary; cached: boolean; summaryError?: string }
  | { kind: 'skipped'; skipped: SkippedFile };

const BINARY_SNIFF_BYTES = 8192;
const DEFAULT_CONCURRENCY = 8;

export function resultPath(result: FileResult): string {
  return result.kind === 'file' ? result.file.path : result.skipped.path;
}

function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function isBinary(buffer: Buffer): boolean {
  return buffer.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

/**
 * Run `worker` over `items` with at most `limit` in flight. Results keep
 * the input order. An aborted signal stops new work from starting.
 */
export async function mapWithConcurrency<T, R>(
  items: T[],
  limit: number,
  worker: (item: T) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const results = await mapLimit<T, R>(items, Math.max(1, limit), async (item: T) => {
    signal?.throwIfAborted();
    return worker(item);
  });
  signal?.throwIfAborted();
  return results;
}

export class Indexer {
  private config: IndexerConfig;
  private registry: ParserRegistry | null = null;
  private initialized = false;
  private results: Map<string, FileResult> = new Map();
  private clock: Clock;

  constructor(config: IndexerConfig) {
    this.config = {
      ...config,
      rootDirectory: path.resolve(config.rootDirectory),
    };
    this.clock = config.clock ?? createClock(true);
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;

    await this.config.cache?.initialize();
    this.registry = await createDefaultRegistry({
      parser: this.config.parserOptions,
      languages: this.config.languages,
      runtime: this.config.runtime,
    });
    this.initialized = true;
  }

  async close(): Promise<void> {
    await this.config.cache?.close();
    this.initialized = false;
  }

  getRegistry(): ParserRegistry {
    if (!this.registry) {
      throw new Error('Parser registry not initialized');
    }
    return this.registry;
  }

  /**
   * Root-relative, forward-slash path
   */
  toRelative(filePath: string): string {
    const absolute = path.resolve(this.config.rootDirectory, filePath);
    return path.relative(this.config.rootDirectory, absolute).split(path.sep).join('/');
  }

  /**
   * Files matching include and not exclude, sorted
   */
  async discoverFiles(extraIgnore: string[] = []): Promise<string[]> {
    const ignore = [
      ...this.config.exclude,
      ...extraIgnore.map(entry => (path.isAbsolute(entry) ? fg.escapePath(this.toRelative(entry)) : entry)),
    ];

    const files = await fg(this.config.include, {
      cwd: this.config.rootDirectory,
      ignore,
      onlyFiles: true,
      followSymbolicLinks: false,
    });

    return Array.from(new Set(files.map(file => this.toRelative(file)))).sort(compareCodeUnits);
  }

  async indexDirectory(options: IndexOptions = {}): Promise<RepoSummary> {
    await this.initialize();
    const { signal } = options;
    signal?.throwIfAborted();

    const relativePaths = options.files
      ? Array.from(new Set(options.files.map(file => this.toRelative(file)))).sort(compareCodeUnits)
      : await this.discoverFiles(options.ignore);

    const results = await mapWithConcurrency(
      relativePaths,
      this.config.concurrency ?? DEFAULT_CONCURRENCY,
      async relativePath => {
        const result = await this.processFile(relativePath);
        options.onFile?.(result);
        return result;
      },
      signal
    );

    this.results = new Map(results.map(result => [resultPath(result), result]));

    if (this.config.cache && !options.files) {
      await this.config.cache.prune(relativePaths);
    }

    return this.getSummary();
  }

  /**
   * Re-extract one file and update the current summary
   */
  async updateFile(filePath: string): Promise<FileResult> {
    await this.initialize();
    const result = await this.processFile(this.toRelative(filePath));
    this.results.set(resultPath(result), result);
    return result;
  }

  /**
   * Drop one file from the current summary
   */
  async removeFile(filePath: string): Promise<boolean> {
    await this.initialize();
    const relativePath = this.toRelative(filePath);
    await this.config.cache?.delete(relativePath);
    return this.results.delete(relativePath);
  }

  /**
   * The summary of the latest run plus incremental updates
   */
  getSummary(): RepoSummary {
    const files: FileSummary[] = [];
    const skipped: SkippedFile[] = [];
    const ordered = Array.from(this.results.values()).sort((a, b) =>
      compareCodeUnits(resultPath(a), resultPath(b))
    );

    for (const result of ordered) {
      if (result.kind === 'file') files.push(result.file);
      else skipped.push(result.skipped);
    }

    return {
      formatVersion: FORMAT_VERSION,
      tool: { name: TOOL_NAME, version: TOOL_VERSION },
      rootPath: this.config.rootDirectory,
      generatedAt: this.clock(),
      files,
      skipped,
    };
  }

  /**
   * Extract a single file. Per-file failures become skip records.
   */
  async processFile(relativePath: string): Promise<FileResult> {
    const registry = this.getRegistry();
    const skip = (reason: SkippedFile['reason'], message: string): FileResult => ({
      kind: 'skipped',
      skipped: { path: relativePath, reason, message },
    });

    const language = registry.getDetector().detect(relativePath);
    const parser = language === UNSUPPORTED ? undefined : registry.getByLanguage(language);
    if (!parser) {
      const ext = path.extname(relativePath);
      return skip('UNSUPPORTED_LANGUAGE', ext ? `No grammar for "${ext}" files` : 'No grammar for this file name');
    }

    const absolutePath = path.join(this.config.rootDirectory, relativePath);
    let buffer: Buffer;
    try {
      const { size } = await fs.promises.stat(absolutePath);
      if (parser.exceedsMaxFileSize(size)) {
        return { kind: 'skipped', skipped: parser.createFileTooLargeSkip(relativePath, size) };
      }
      buffer = await fs.promises.readFile(absolutePath);
    } catch (error) {
      return skip('READ_ERROR', error instanceof Error ? error.message : String(error));
    }

    // The file may have grown between stat and read
    if (parser.exceedsMaxFileSize(buffer.length)) {
      return { kind: 'skipped', skipped: parser.createFileTooLargeSkip(relativePath, buffer.length) };
    }

    if (isBinary(buffer)) {
      return skip('BINARY_FILE', 'File appears to be binary');
    }

    const content = buffer.toString('utf-8');
    const checksum = crypto.createHash('sha256').update(content).digest('hex');

    const cache = this.config.cache;
    const summarizer = this.config.summarizer;
    const fingerprint = summarizer ? `${parser.fingerprint}:${summarizer.id}` : parser.fingerprint;
    if (cache) {
      const cached = await cache.get(relativePath, checksum, fingerprint);
      if (cached) return { kind: 'file', file: cached, cached: true };
    }

    let file: FileSummary;
    try {
      const parseResult = await parser.parseFile(relativePath, content);
      file = parser.buildFileSummary(relativePath, content, checksum, parseResult);
    } catch (error) {
      return skip('PARSE_ERROR', error instanceof Error ? error.message : String(error));
    }

    if (summarizer) {
      try {
        const summary = await summarizer.summarize({
          path: relativePath,
          language: file.language,
          content,
          signatures: file.signatures,
        });
        file = { ...file, summary };
      } catch (error) {
        // Not cached, so the next run asks again
        const summaryError = error instanceof Error ? error.message : String(error);
        return { kind: 'file', file, cached: false, summaryError };
      }
    }

    await cache?.set(file, fingerprint);
    return { kind: 'file', file, cached: false };
  }
}

export { Watcher, type WatcherOptions, type WatcherEvents, type WatchTarget } from './watcher.js';
export { LanguageDetector, type LanguageDetectorOptions } from './language-detector.js';
export { resolveGeneratedAt, createClock, type Clock } from './timestamp.js';
export {
  createSummaryProvider,
  OpenAIProvider,
  buildSummaryPrompt,
  type SummaryProvider,
  type SummaryRequest,
} from './summaries/index.js';
