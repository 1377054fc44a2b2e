/**
 * Summary types: the shape of a TLDR artifact
 */

import type { Language, ParseStatus, ParseWarning, Signature, SkipReason } from './symbols.js';

export const FORMAT_VERSION = 1;

export interface FileSummary {
  /** Root-relative path with forward slashes */
  path: string;
  language: Language;
  status: ParseStatus;
  lineCount: number;
  checksum: string;
  signatures: Signature[];
  warnings: ParseWarning[];
  /** Prose description from a summary provider; absent when none ran */
  summary?: string;
}

export interface SkippedFile {
  path: string;
  reason: SkipReason;
  message: string;
}

export interface ToolInfo {
  name: string;
  version: string;
}

export interface RepoSummary {
  formatVersion: number;
  tool: ToolInfo;
  rootPath: string;
  /** ISO-8601 timestamp, or null when the artifact is written without one */
  generatedAt: string | null;
  files: FileSummary[];
  skipped: SkippedFile[];
}

export interface LanguageStats {
  files: number;
  functions: number;
  methods: number;
  classes: number;
}

export interface SummaryStats {
  totalFiles: number;
  skippedFiles: number;
  partialFiles: number;
  totalSignatures: number;
  functions: number;
  methods: number;
  constructors: number;
  classes: number;
  interfaces: number;
  structs: number;
  enums: number;
  byLanguage: Record<Language, LanguageStats>;
}

export type OutputFormat = 'json' | 'text' | 'markdown';
