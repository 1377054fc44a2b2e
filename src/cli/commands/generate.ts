/**
 * generate command - Extract signatures and write a TLDR file
 */

import { Command } from 'commander';
import path from 'node:path';
import { generateTldr, type GenerateResult } from '../../indexer/generate.js';
import { parseFormatOption, parseIntegerOption } from '../options.js';

interface GenerateCommandOptions {
  output?: string;
  format?: string;
  config?: string;
  include?: string[];
  exclude?: string[];
  concurrency?: string;
  cache?: boolean;
  timestamp: boolean;
  summaries?: boolean;
  verbose: boolean;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

function printResult(result: GenerateResult, durationMs: number, verbose: boolean): void {
  const { stats, summary } = result;

  console.log('TLDR generated!\n');
  console.log(`  Files:      ${stats.totalFiles}`);
  console.log(`  Skipped:    ${stats.skippedFiles}`);
  console.log(`  Functions:  ${stats.functions}`);
  console.log(`  Methods:    ${stats.methods + stats.constructors}`);
  console.log(`  Classes:    ${stats.classes + stats.structs}`);
  if (stats.partialFiles > 0) {
    console.log(`  Partial:    ${stats.partialFiles}`);
  }
  console.log(`  Duration:   ${durationMs}ms`);
  console.log(`  Output:     ${result.outputPath}\n`);

  if (result.summaryErrors.length > 0) {
    console.error(`Summaries failed for ${result.summaryErrors.length} file(s):`);
    for (const failure of result.summaryErrors) {
      console.error(`  ${failure.path}: ${failure.message}`);
    }
  }

  if (!verbose) return;

  for (const [language, langStats] of Object.entries(stats.byLanguage).sort(([a], [b]) => a.localeCompare(b))) {
    console.log(`  ${language}: ${langStats.files} files, ${langStats.functions} functions, ${langStats.methods} methods, ${langStats.classes} classes`);
  }

  if (summary.skipped.length > 0) {
    console.log('\nSkipped:');
    for (const skipped of summary.skipped) {
      console.log(`  ${skipped.path}: ${skipped.reason} (${skipped.message})`);
    }
  }

  const partial = summary.files.filter(file => file.status === 'partial');
  if (partial.length > 0) {
    console.log('\nWarnings:');
    for (const file of partial) {
      for (const warning of file.warnings) {
        console.log(`  ${file.path}:${warning.line}: ${warning.message}`);
      }
    }
  }
  console.log('');
}

export const generateCommand = new Command('generate')
  .description('Extract signatures from a directory and write a TLDR file')
  .argument('[directory]', 'Directory to summarize', '.')
  .option('-o, --output <path>', 'Output file; the extension picks the format (.tldr.json, .tldr, .md)')
  .option('-f, --format <format>', 'Output format: json, text or markdown')
  .option('-c, --config <path>', 'Path to config file')
  .option('--include <patterns...>', 'Glob patterns to include')
  .option('--exclude <patterns...>', 'Additional glob patterns to exclude')
  .option('--concurrency <n>', 'Files processed in parallel')
  .option('--cache', 'Reuse extraction results for unchanged files')
  .option('--no-timestamp', 'Leave generatedAt empty so unchanged trees give identical files')
  .option('--summaries', 'Add a model-written summary to each file (needs an API key)')
  .option('--verbose', 'Show skipped files and parse warnings', false)
  .action(async (directory: string, options: GenerateCommandOptions, command: Command) => {
    const startTime = Date.now();
    const rootDirectory = path.resolve(directory);
    const controller = new AbortController();
    const onInterrupt = (): void => controller.abort();
    process.once('SIGINT', onInterrupt);

    console.log(`Generating TLDR for ${rootDirectory}...\n`);

    try {
      const result = await generateTldr({
        directory: rootDirectory,
        output: options.output,
        format: parseFormatOption(options.format),
        configPath: options.config,
        include: options.include,
        exclude: options.exclude,
        concurrency: parseIntegerOption('--concurrency', options.concurrency, 1),
        cache: options.cache,
        summaries: options.summaries,
        // Only an explicit --no-timestamp overrides the configuration
        timestamp: command.getOptionValueSource('timestamp') === 'cli' ? options.timestamp : undefined,
        signal: controller.signal,
      });

      printResult(result, Date.now() - startTime, options.verbose);
    } catch (error) {
      if (isAbortError(error)) {
        console.error('Cancelled.');
        process.exit(130);
        return;
      }
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    } finally {
      process.off('SIGINT', onInterrupt);
    }
  });
