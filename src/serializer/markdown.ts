/**
 * Markdown rendering of a RepoSummary (write-only)
 */

import type { FileSummary, RepoSummary, Signature } from '../types/index.js';

function inlineCode(text: string): string {
  const longest = Math.max(0, ...Array.from(text.matchAll(/`+/g), m => m[0].length));
  const fence = '`'.repeat(longest + 1);
  const pad = text.startsWith('`') || text.endsWith('`') ? ' ' : '';
  return `${fence}${pad}${text}${pad}${fence}`;
}

function renderSignature(sig: Signature): string {
  const indent = '  '.repeat(sig.scope.length);
  const decorators = sig.decorators.length > 0 ? ` ${sig.decorators.map(inlineCode).join(' ')}` : '';
  return `${indent}- L${sig.line} ${sig.kind} ${inlineCode(sig.signature)}${decorators}`;
}

function renderFile(file: FileSummary): string[] {
  const lines = [`## File: ${inlineCode(file.path)} (${file.language})`, ''];

  if (file.summary !== undefined) {
    lines.push('### File Summary', '', file.summary, '');
  }

  if (file.status === 'partial') {
    lines.push(`> Partially parsed: ${file.warnings.map(w => w.message).join('; ')}`, '');
  }

  if (file.signatures.length === 0) {
    lines.push('No signatures found.');
  } else {
    lines.push('### Signatures', '', ...file.signatures.map(renderSignature));
  }

  lines.push('');
  return lines;
}

export function renderMarkdown(summary: RepoSummary): string {
  const lines = ['# TLDR Summary', '', `Directory: ${inlineCode(summary.rootPath)}`];
  if (summary.generatedAt) {
    lines.push(`Generated: ${summary.generatedAt}`);
  }
  lines.push(`Tool: ${summary.tool.name} ${summary.tool.version}`, '');

  for (const file of summary.files) {
    lines.push(...renderFile(file));
  }

  if (summary.skipped.length > 0) {
    lines.push('## Skipped files', '');
    for (const skipped of summary.skipped) {
      lines.push(`- ${inlineCode(skipped.path)}: ${skipped.reason} (${skipped.message})`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
