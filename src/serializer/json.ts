/**
 * JSON rendering of a RepoSummary
 *
 * Keys are written in a fixed order so the same summary always renders to
 * the same bytes, whether it came from the extractor, the cache or a parse.
 */

import type {
  FileSummary,
  RepoSummary,
  Signature,
  SkippedFile,
} from '../types/index.js';
import { formatZodIssues, jsonDocumentSchema, type JsonDocument } from './schema.js';

function orderSignature(sig: Signature): Signature {
  return {
    name: sig.name,
    kind: sig.kind,
    parameters: sig.parameters.map(p => ({ name: p.name, type: p.type })),
    returnType: sig.returnType,
    typeParameters: sig.typeParameters,
    scope: [...sig.scope],
    line: sig.line,
    endLine: sig.endLine,
    signature: sig.signature,
    decorators: [...sig.decorators],
    modifiers: [...sig.modifiers],
  };
}

function orderFile(file: FileSummary): FileSummary {
  const ordered: FileSummary = {
    path: file.path,
    language: file.language,
    status: file.status,
    lineCount: file.lineCount,
    checksum: file.checksum,
    signatures: file.signatures.map(orderSignature),
    warnings: file.warnings.map(w => ({ code: w.code, message: w.message, line: w.line })),
  };
  if (file.summary !== undefined) ordered.summary = file.summary;
  return ordered;
}

function orderSkipped(skipped: SkippedFile): SkippedFile {
  return { path: skipped.path, reason: skipped.reason, message: skipped.message };
}

export function toJsonDocument(summary: RepoSummary): JsonDocument {
  return {
    format: 'tldr',
    formatVersion: 1,
    tool: { name: summary.tool.name, version: summary.tool.version },
    rootPath: summary.rootPath,
    generatedAt: summary.generatedAt,
    files: summary.files.map(orderFile),
    skipped: summary.skipped.map(orderSkipped),
  };
}

export function serializeJson(summary: RepoSummary): string {
  return JSON.stringify(toJsonDocument(summary), null, 2) + '\n';
}

export function parseJson(content: string): RepoSummary {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid TLDR JSON: ${message}`);
  }

  const result = jsonDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid TLDR JSON:\n${formatZodIssues(result.error)}`);
  }

  const doc = result.data;
  return {
    formatVersion: doc.formatVersion,
    tool: doc.tool,
    rootPath: doc.rootPath,
    generatedAt: doc.generatedAt,
    files: doc.files.map(orderFile),
    skipped: doc.skipped.map(orderSkipped),
  };
}
