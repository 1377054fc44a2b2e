/**
 * Optional prose summaries of files, produced by a language model after
 * signature extraction
 */

import type { SummariesConfig } from '../../config/index.js';
import type { Language, Signature } from '../../types/index.js';
import { OpenAIProvider } from './openai.js';

export interface SummaryRequest {
  /** Root-relative path */
  path: string;
  language: Language;
  content: string;
  signatures: readonly Signature[];
}

export interface SummaryProvider {
  /** Provider and model; folded into the cache fingerprint */
  readonly id: string;
  summarize(request: SummaryRequest): Promise<string>;
}

/**
 * Provider for the configured backend. The API key is read from the
 * environment variable the configuration names.
 */
export function createSummaryProvider(
  config: SummariesConfig,
  env: NodeJS.ProcessEnv = process.env,
  fetchImpl?: typeof fetch
): SummaryProvider {
  const apiKey = env[config.apiKeyEnv]?.trim();
  if (!apiKey) {
    throw new Error(`Summaries are enabled but ${config.apiKeyEnv} is not set`);
  }

  return new OpenAIProvider({
    apiKey,
    model: config.model,
    endpoint: config.endpoint,
    maxTokens: config.maxTokens,
    maxContentChars: config.maxContentChars,
    fetch: fetchImpl,
  });
}

export { OpenAIProvider, type OpenAIProviderOptions } from './openai.js';
export { buildSummaryPrompt } from './prompt.js';
