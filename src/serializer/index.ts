/**
 * Serializer: RepoSummary <-> artifact text
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type { OutputFormat, RepoSummary } from '../types/index.js';
import { parseJson, serializeJson } from './json.js';
import { renderMarkdown } from './markdown.js';
import { parseText, serializeText } from './text.js';

export { serializeJson, parseJson, toJsonDocument } from './json.js';
export { serializeText, parseText } from './text.js';
export { renderMarkdown } from './markdown.js';
export { computeStats, formatStatsLine } from './stats.js';
export { jsonDocumentSchema, fileSummarySchema, signatureSchema, formatZodIssues } from './schema.js';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'text', 'markdown'];

/**
 * Format implied by a file name, or null when the name says nothing
 */
export function detectFormat(filePath: string): OutputFormat | null {
  const name = path.basename(filePath).toLowerCase();
  if (name.endsWith('.json')) return 'json';
  if (name.endsWith('.tldr')) return 'text';
  if (name.endsWith('.md') || name.endsWith('.markdown')) return 'markdown';
  return null;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

export function serializeSummary(summary: RepoSummary, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return serializeJson(summary);
    case 'text':
      return serializeText(summary);
    case 'markdown':
      return renderMarkdown(summary);
  }
}

/**
 * Parse artifact content. Markdown is write-only.
 */
export function parseSummary(content: string, format: OutputFormat): RepoSummary {
  switch (format) {
    case 'json':
      return parseJson(content);
    case 'text':
      return parseText(content);
    case 'markdown':
      throw new Error('Markdown summaries cannot be read back; use the json or text format');
  }
}

/**
 * Parse artifact content whose format is unknown: JSON when it looks like
 * an object, `.tldr` text otherwise
 */
export function parseAnySummary(content: string): RepoSummary {
  return content.trimStart().startsWith('{') ? parseJson(content) : parseText(content);
}

export async function writeSummary(
  filePath: string,
  summary: RepoSummary,
  format: OutputFormat = detectFormat(filePath) ?? 'json'
): Promise<string> {
  const content = serializeSummary(summary, format);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, 'utf-8');
  return content;
}

export async function readRawSummary(filePath: string): Promise<string> {
  return fs.readFile(filePath, 'utf-8');
}

export async function readSummary(filePath: string): Promise<RepoSummary> {
  const content = await readRawSummary(filePath);
  const format = detectFormat(filePath);
  return format ? parseSummary(content, format) : parseAnySummary(content);
}
