/**
 * MCP Tool registration
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { generateTldr } from '../../indexer/generate.js';
import { generateTldrTool, type GenerateFn } from './generate-tldr.js';
import { readTldrTool } from './read-tldr.js';

export interface ToolDependencies {
  generate?: GenerateFn;
}

export function registerTools(server: McpServer, deps: ToolDependencies = {}): void {
  const generate = deps.generate ?? generateTldr;

  server.tool(
    'generate_tldr',
    'Extract function and class signatures from a local directory and write a TLDR summary file. Returns the file path, counts and the summary content.',
    {
      path: z.string().describe('Local directory to summarize ("~" expands to the home directory)'),
      output_filename: z.string().optional().describe('Output file; relative names resolve against the directory. ".tldr" writes the compact text format, ".json" JSON'),
    },
    { title: 'Generate TLDR' },
    async ({ path, output_filename }, extra) => {
      return generateTldrTool({ path, output_filename }, extra.signal, generate);
    }
  );

  server.tool(
    'read_tldr',
    'Read a previously generated TLDR summary file and return its content.',
    {
      file_path: z.string().describe('Path to the .tldr or .tldr.json file'),
    },
    { title: 'Read TLDR' },
    async ({ file_path }) => {
      return readTldrTool({ file_path });
    }
  );
}

export { generateTldrTool, formatGenerateReport, type GenerateTldrInput } from './generate-tldr.js';
export { readTldrTool, type ReadTldrInput } from './read-tldr.js';
export { errorResult, type ToolResult } from './result.js';
