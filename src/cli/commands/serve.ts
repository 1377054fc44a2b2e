/**
 * serve command - Start the MCP server
 */

import { Command } from 'commander';
import { startStdioServer } from '../../server/index.js';

export const serveCommand = new Command('serve')
  .description('Start the MCP server (stdio) with the generate_tldr and read_tldr tools')
  .action(async () => {
    try {
      await startStdioServer();
    } catch (error) {
      // Log to stderr since stdout is used for MCP communication
      console.error('Error starting server:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
