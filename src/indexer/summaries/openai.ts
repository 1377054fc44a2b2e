/**
 * Summary provider for OpenAI-compatible chat completion endpoints
 */

import { z } from 'zod';
import { formatZodIssues } from '../../serializer/schema.js';
import type { SummaryProvider, SummaryRequest } from './index.js';
import { buildSummaryPrompt } from './prompt.js';

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
});

export interface OpenAIProviderOptions {
  apiKey: string;
  model: string;
  endpoint: string;
  maxTokens: number;
  maxContentChars: number;
  fetch?: typeof fetch;
}

export class OpenAIProvider implements SummaryProvider {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OpenAIProviderOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get id(): string {
    return `openai:${this.options.model}`;
  }

  async summarize(request: SummaryRequest): Promise<string> {
    const response = await this.fetchImpl(this.options.endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.options.apiKey}`,
      },
      body: JSON.stringify({
        model: this.options.model,
        messages: [{ role: 'user', content: buildSummaryPrompt(request, this.options.maxContentChars) }],
        max_tokens: this.options.maxTokens,
        temperature: 0.3,
      }),
    });

    if (!response.ok) {
      throw new Error(`Summary request failed: ${response.status} ${response.statusText}`.trimEnd());
    }

    const result = chatCompletionSchema.safeParse(await response.json());
    if (!result.success) {
      throw new Error(`Unexpected summary response:\n${formatZodIssues(result.error)}`);
    }

    const content = result.data.choices[0]?.message.content?.trim();
    if (!content) {
      throw new Error('Summary response was empty');
    }
    return content;
  }
}
