/**
 * watch command - Regenerate the TLDR file when sources change
 */

import { Command } from 'commander';
import path from 'node:path';
import { Watcher } from '../../indexer/index.js';
import { createIndexer, resolveConfig, resolveOutput, assertDirectory } from '../../indexer/generate.js';
import { computeStats, formatStatsLine, writeSummary } from '../../serializer/index.js';
import { parseFormatOption, parseIntegerOption } from '../options.js';

interface WatchCommandOptions {
  output?: string;
  format?: string;
  config?: string;
  debounce: string;
  verbose: boolean;
}

export const watchCommand = new Command('watch')
  .description('Generate a TLDR file, then rewrite it whenever sources change')
  .argument('[directory]', 'Directory to watch', '.')
  .option('-o, --output <path>', 'Output file; the extension picks the format')
  .option('-f, --format <format>', 'Output format: json, text or markdown')
  .option('-c, --config <path>', 'Path to config file')
  .option('--debounce <ms>', 'Delay before re-extracting a changed file', '300')
  .option('--verbose', 'Show verbose output', false)
  .action(async (directory: string, options: WatchCommandOptions) => {
    const rootDirectory = path.resolve(directory);

    try {
      await assertDirectory(rootDirectory);
      const requestedFormat = parseFormatOption(options.format);
      const debounceMs = parseIntegerOption('--debounce', options.debounce, 0) ?? 300;

      const config = await resolveConfig(rootDirectory, options.config);
      const { outputPath, format } = resolveOutput(rootDirectory, config, {
        output: options.output,
        format: requestedFormat,
      });
      const indexer = createIndexer(rootDirectory, config);

      console.log(`Watching ${rootDirectory} for changes...`);
      console.log(`Output: ${outputPath}\n`);

      console.log('Performing initial extraction...');
      const summary = await indexer.indexDirectory({ ignore: [outputPath] });
      await writeSummary(outputPath, summary, format);
      console.log(`${formatStatsLine(computeStats(summary))}\n`);

      const watcher = new Watcher(
        indexer,
        rootDirectory,
        config.include,
        [...config.exclude, outputPath],
        { debounceMs }
      );

      const rewrite = async (updated: number, removed: number): Promise<void> => {
        try {
          const current = indexer.getSummary();
          await writeSummary(outputPath, current, format);
          console.log(`Rewrote ${path.relative(rootDirectory, outputPath)} (${updated} updated, ${removed} removed)`);
        } catch (error) {
          console.error(`Error writing ${outputPath}: ${error instanceof Error ? error.message : error}`);
        }
      };

      watcher.on('indexed', ({ filePath, isNew, result }) => {
        if (!options.verbose && !isNew) return;
        const relativePath = path.relative(rootDirectory, filePath);
        const note = result.kind === 'skipped' ? ` (skipped: ${result.skipped.reason})` : '';
        console.log(`${isNew ? 'Added' : 'Updated'}: ${relativePath}${note}`);
      });

      watcher.on('removed', ({ filePath }) => {
        console.log(`Removed: ${path.relative(rootDirectory, filePath)}`);
      });

      watcher.on('settled', ({ updated, removed }) => {
        void rewrite(updated, removed);
      });

      watcher.on('error', ({ filePath, error }) => {
        const relativePath = path.relative(rootDirectory, filePath);
        console.error(`Error extracting ${relativePath}: ${error.message}`);
      });

      watcher.on('ready', () => {
        console.log('Watching for changes... (Press Ctrl+C to stop)\n');
      });

      await watcher.start();

      const shutdown = async (): Promise<void> => {
        console.log('\nShutting down...');
        await watcher.stop();
        await indexer.close();
        process.exit(0);
      };

      process.on('SIGINT', () => void shutdown());
      process.on('SIGTERM', () => void shutdown());
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
