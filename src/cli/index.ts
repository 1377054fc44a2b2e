#!/usr/bin/env node

/**
 * tldr-code CLI
 */

import { Command } from 'commander';
import { generateCommand } from './commands/generate.js';
import { readCommand } from './commands/read.js';
import { serveCommand } from './commands/serve.js';
import { watchCommand } from './commands/watch.js';
import { initCommand } from './commands/init.js';
import { languagesCommand } from './commands/languages.js';
import { TOOL_NAME, TOOL_VERSION } from '../version.js';

const program = new Command();

program
  .name(TOOL_NAME)
  .description('Summarize a source tree as function and class signatures')
  .version(TOOL_VERSION);

program.addCommand(generateCommand, { isDefault: true });
program.addCommand(readCommand);
program.addCommand(serveCommand);
program.addCommand(watchCommand);
program.addCommand(initCommand);
program.addCommand(languagesCommand);

await program.parseAsync(process.argv);
