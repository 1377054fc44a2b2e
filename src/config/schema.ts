/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { grammarDefinitionInputSchema } from '../indexer/parsers/grammar.js';

export const DEFAULT_EXCLUDE = [
  '**/node_modules/**',
  '**/dist/**',
  '**/build/**',
  '**/.git/**',
  '**/.hg/**',
  '**/.svn/**',
  '**/venv/**',
  '**/.venv/**',
  '**/__pycache__/**',
  '**/coverage/**',
  '**/.next/**',
  '**/.nuxt/**',
  '**/target/**',
  '**/.tldr/**',
  '**/*.tldr',
  '**/*.tldr.json',
  '**/*.min.js',
];

export const parserConfigSchema = z.object({
  maxFileSize: z.number().int().min(0).default(1024 * 1024), // 1MB default, 0 = unlimited
  maxSignatureLength: z.number().int().min(20).default(400),
  includePrivate: z.boolean().default(true),
  includeNested: z.boolean().default(true),
});

export const languagesConfigSchema = z.object({
  extensions: z.record(z.string(), z.string()).default({}),
  filenames: z.record(z.string(), z.string()).default({}),
  disabled: z.array(z.string()).default([]),
  grammars: z.array(grammarDefinitionInputSchema).default([]),
});

export const outputConfigSchema = z.object({
  format: z.enum(['json', 'text', 'markdown']).default('json'),
  path: z.string().optional(),
  timestamp: z.boolean().default(true),
});

export const cacheConfigSchema = z.object({
  enabled: z.boolean().default(false),
  path: z.string().default('.tldr/cache.db'),
});

export const summariesConfigSchema = z.object({
  enabled: z.boolean().default(false),
  provider: z.literal('openai').default('openai'),
  model: z.string().min(1).default('gpt-4o-mini'),
  endpoint: z.string().url().default('https://api.openai.com/v1/chat/completions'),
  /** Environment variable holding the API key; the key itself never lives in config */
  apiKeyEnv: z.string().min(1).default('OPENAI_API_KEY'),
  maxTokens: z.number().int().min(1).default(200),
  maxContentChars: z.number().int().min(1).default(12000),
});

export const configSchema = z.object({
  include: z.array(z.string()).min(1).default(['**/*']),
  exclude: z.array(z.string()).default(DEFAULT_EXCLUDE),
  output: outputConfigSchema.default({}),
  parser: parserConfigSchema.default({}),
  languages: languagesConfigSchema.default({}),
  cache: cacheConfigSchema.default({}),
  summaries: summariesConfigSchema.default({}),
  concurrency: z.number().int().min(1).max(64).default(8),
});

export type Config = z.infer<typeof configSchema>;
export type ParserConfig = z.infer<typeof parserConfigSchema>;
export type LanguagesConfig = z.infer<typeof languagesConfigSchema>;
export type OutputConfig = z.infer<typeof outputConfigSchema>;
export type CacheConfig = z.infer<typeof cacheConfigSchema>;
export type SummariesConfig = z.infer<typeof summariesConfigSchema>;
