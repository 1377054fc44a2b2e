/**
 * MCP Server setup
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { TOOL_NAME, TOOL_VERSION } from '../version.js';
import { registerTools, type ToolDependencies } from './tools/index.js';

export interface ServerOptions extends ToolDependencies {
  name?: string;
  version?: string;
}

export async function createServer(options: ServerOptions = {}): Promise<McpServer> {
  const server = new McpServer({
    name: options.name ?? TOOL_NAME,
    version: options.version ?? TOOL_VERSION,
  });

  registerTools(server, options);

  return server;
}

export async function startStdioServer(options: ServerOptions = {}): Promise<McpServer> {
  const server = await createServer(options);
  const transport = new StdioServerTransport();

  await server.connect(transport);

  // Handle graceful shutdown
  const shutdown = async (): Promise<void> => {
    await server.close();
    process.exit(0);
  };
  process.on('SIGINT', () => {
    void shutdown();
  });
  process.on('SIGTERM', () => {
    void shutdown();
  });

  return server;
}

export { registerTools } from './tools/index.js';
