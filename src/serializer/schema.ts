/**
 * Zod schemas for reading TLDR artifacts back
 */

import { z } from 'zod';
import { FORMAT_VERSION } from '../types/index.js';

export const parameterSchema = z.object({
  name: z.string(),
  type: z.string().nullable(),
});

export const signatureKindSchema = z.enum([
  'function',
  'method',
  'constructor',
  'class',
  'struct',
  'interface',
  'enum',
]);

export const signatureSchema = z.object({
  name: z.string().min(1),
  kind: signatureKindSchema,
  parameters: z.array(parameterSchema),
  returnType: z.string().nullable(),
  typeParameters: z.string().nullable(),
  scope: z.array(z.string()),
  line: z.number().int().min(1),
  endLine: z.number().int().min(1),
  signature: z.string(),
  decorators: z.array(z.string()),
  modifiers: z.array(z.string()),
});

export const parseWarningSchema = z.object({
  code: z.literal('SYNTAX_ERROR'),
  message: z.string(),
  line: z.number().int().min(1),
});

export const fileSummarySchema = z.object({
  path: z.string().min(1),
  language: z.string().min(1),
  status: z.enum(['complete', 'partial']),
  lineCount: z.number().int().min(0),
  checksum: z.string(),
  signatures: z.array(signatureSchema),
  warnings: z.array(parseWarningSchema),
  summary: z.string().optional(),
});

export const skippedFileSchema = z.object({
  path: z.string().min(1),
  reason: z.enum(['UNSUPPORTED_LANGUAGE', 'FILE_TOO_LARGE', 'BINARY_FILE', 'READ_ERROR', 'PARSE_ERROR']),
  message: z.string(),
});

export const jsonDocumentSchema = z.object({
  format: z.literal('tldr'),
  formatVersion: z.literal(FORMAT_VERSION),
  tool: z.object({ name: z.string(), version: z.string() }),
  rootPath: z.string(),
  generatedAt: z.string().nullable(),
  files: z.array(fileSummarySchema),
  skipped: z.array(skippedFileSchema),
});

export type JsonDocument = z.infer<typeof jsonDocumentSchema>;

export function formatZodIssues(error: z.ZodError): string {
  return error.errors
    .map(e => `  - ${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`)
    .join('\n');
}
