/**
 * read_tldr tool implementation
 *
 * The stored text comes back unchanged; when it parses, the derived counts
 * follow in a second block.
 */

import {
  computeStats,
  detectFormat,
  formatStatsLine,
  parseAnySummary,
  parseSummary,
  readRawSummary,
} from '../../serializer/index.js';
import { resolveUserPath } from '../../utils/paths.js';
import { errorResult, type ToolResult } from './result.js';

export interface ReadTldrInput {
  file_path: string;
}

function describeCounts(content: string, filePath: string): string | null {
  const format = detectFormat(filePath);
  if (format === 'markdown') return null;
  try {
    const summary = format ? parseSummary(content, format) : parseAnySummary(content);
    return `Summary: ${formatStatsLine(computeStats(summary))}`;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return `Summary unavailable: ${message.split('\n')[0]}`;
  }
}

export async function readTldrTool(input: ReadTldrInput): Promise<ToolResult> {
  try {
    const filePath = resolveUserPath(input.file_path);
    const content = await readRawSummary(filePath);
    const counts = describeCounts(content, filePath);

    const blocks: ToolResult['content'] = [{ type: 'text', text: content }];
    if (counts) blocks.push({ type: 'text', text: counts });
    return { content: blocks };
  } catch (error) {
    return errorResult('read_tldr', error);
  }
}
