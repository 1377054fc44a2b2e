/**
 * Abstract base class for language parsers
 */

import type {
  FileSummary,
  Language,
  ParseStatus,
  ParseWarning,
  Signature,
  SkippedFile,
} from '../../types/index.js';

export interface ParseResult {
  signatures: Signature[];
  warnings: ParseWarning[];
  status: ParseStatus;
}

export interface ParserOptions {
  /** Bytes; 0 disables the limit */
  maxFileSize?: number;
  maxSignatureLength?: number;
  includePrivate?: boolean;
  includeNested?: boolean;
}

export const DEFAULT_PARSER_OPTIONS: Required<ParserOptions> = {
  maxFileSize: 1024 * 1024, // 1MB
  maxSignatureLength: 400,
  includePrivate: true,
  includeNested: true,
};

export abstract class LanguageParser {
  protected options: Required<ParserOptions>;

  constructor(options: ParserOptions = {}) {
    this.options = {
      maxFileSize: options.maxFileSize ?? DEFAULT_PARSER_OPTIONS.maxFileSize,
      maxSignatureLength: options.maxSignatureLength ?? DEFAULT_PARSER_OPTIONS.maxSignatureLength,
      includePrivate: options.includePrivate ?? DEFAULT_PARSER_OPTIONS.includePrivate,
      includeNested: options.includeNested ?? DEFAULT_PARSER_OPTIONS.includeNested,
    };
  }

  /**
   * Parse a file and extract signatures
   */
  abstract parseFile(filePath: string, content: string): Promise<ParseResult>;

  /**
   * Get the language this parser handles
   */
  abstract get language(): Language;

  /**
   * Identifies everything that affects extraction output; cached results
   * are only reused under the same fingerprint
   */
  abstract get fingerprint(): string;

  /**
   * Check if a file of the given byte size exceeds max file size
   */
  exceedsMaxFileSize(byteLength: number): boolean {
    return this.options.maxFileSize > 0 && byteLength > this.options.maxFileSize;
  }

  /**
   * Build a file summary from parse results
   */
  buildFileSummary(
    relativePath: string,
    content: string,
    checksum: string,
    parseResult: ParseResult
  ): FileSummary {
    return {
      path: relativePath,
      language: this.language,
      status: parseResult.status,
      lineCount: countLines(content),
      checksum,
      signatures: parseResult.signatures,
      warnings: parseResult.warnings,
    };
  }

  /**
   * Create a FILE_TOO_LARGE skip record
   */
  createFileTooLargeSkip(relativePath: string, fileSize: number): SkippedFile {
    return {
      path: relativePath,
      reason: 'FILE_TOO_LARGE',
      message: `File size (${formatBytes(fileSize)}) exceeds limit (${formatBytes(this.options.maxFileSize)})`,
    };
  }
}

/**
 * Lines in the content; a trailing newline does not start a new line
 */
export function countLines(content: string): number {
  if (content.length === 0) return 0;
  const lines = content.split('\n').length;
  return content.endsWith('\n') ? lines - 1 : lines;
}

/**
 * Format bytes to human readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

