/**
 * read command - Print a TLDR file
 */

import { Command } from 'commander';
import {
  computeStats,
  readRawSummary,
  readSummary,
} from '../../serializer/index.js';
import { resolveUserPath } from '../../utils/paths.js';

interface ReadCommandOptions {
  stats: boolean;
}

export const readCommand = new Command('read')
  .description('Print a TLDR file unchanged, or its counts with --stats')
  .argument('<file>', 'Path to a .tldr or .tldr.json file')
  .option('--stats', 'Print counts instead of the content', false)
  .action(async (file: string, options: ReadCommandOptions) => {
    try {
      const filePath = resolveUserPath(file);

      if (!options.stats) {
        process.stdout.write(await readRawSummary(filePath));
        return;
      }

      const summary = await readSummary(filePath);
      const stats = computeStats(summary);

      console.log(`TLDR: ${filePath}`);
      console.log(`  Root:         ${summary.rootPath}`);
      console.log(`  Generated:    ${summary.generatedAt ?? '-'}`);
      console.log(`  Files:        ${stats.totalFiles}`);
      console.log(`  Skipped:      ${stats.skippedFiles}`);
      console.log(`  Partial:      ${stats.partialFiles}`);
      console.log(`  Signatures:   ${stats.totalSignatures}`);
      console.log(`  Functions:    ${stats.functions}`);
      console.log(`  Methods:      ${stats.methods}`);
      console.log(`  Constructors: ${stats.constructors}`);
      console.log(`  Classes:      ${stats.classes}`);
      console.log(`  Interfaces:   ${stats.interfaces}`);
      console.log(`  Structs:      ${stats.structs}`);
      console.log(`  Enums:        ${stats.enums}`);
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
