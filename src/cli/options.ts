/**
 * Option parsing shared by the CLI commands
 */

import { isOutputFormat, OUTPUT_FORMATS } from '../serializer/index.js';
import type { OutputFormat } from '../types/index.js';

export function parseFormatOption(value: string | undefined): OutputFormat | undefined {
  if (value === undefined) return undefined;
  if (!isOutputFormat(value)) {
    throw new Error(`Unknown format "${value}" (expected ${OUTPUT_FORMATS.join(', ')})`);
  }
  return value;
}

export function parseIntegerOption(name: string, value: string | undefined, min: number): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new Error(`${name} must be an integer of at least ${min}, got "${value}"`);
  }
  return parsed;
}
