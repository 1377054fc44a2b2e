/**
 * Prompt text for per-file summaries
 */

import type { SummaryRequest } from './index.js';

export function buildSummaryPrompt(request: SummaryRequest, maxContentChars: number): string {
  const chars = Array.from(request.content);
  const truncated = chars.length > maxContentChars;
  const source = truncated ? chars.slice(0, maxContentChars).join('') : request.content;
  const signatures =
    request.signatures.length > 0 ? request.signatures.map(sig => `- ${sig.signature}`).join('\n') : '(none)';

  return [
    `Summarize what the ${request.language} file ${request.path} does in two or three sentences.`,
    'Describe its purpose and main responsibilities rather than listing every function.',
    '',
    'Signatures:',
    signatures,
    '',
    truncated ? `Source (first ${maxContentChars} characters):` : 'Source:',
    source,
  ].join('\n');
}
