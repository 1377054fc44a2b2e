/**
 * Test cache and summary factories
 */

import os from 'node:os';
import path from 'node:path';
import fs from 'node:fs';
import { SqliteCache } from '../../src/indexer/storage/sqlite.js';
import type {
  FileSummary,
  RepoSummary,
  Signature,
  SkippedFile,
} from '../../src/types/index.js';

export interface TestCacheResult {
  cache: SqliteCache;
  dbPath: string;
  tempDir: string;
  cleanup: () => void;
}

/**
 * Create a file-backed cache in a unique temp directory
 */
export async function createTestCache(): Promise<TestCacheResult> {
  const tempDir = path.join(os.tmpdir(), `tldr-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  fs.mkdirSync(tempDir, { recursive: true });

  const dbPath = path.join(tempDir, 'nested', 'cache.db');
  const cache = new SqliteCache(dbPath);
  await cache.initialize();

  const cleanup = () => {
    try {
      fs.rmSync(tempDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  };

  return { cache, dbPath, tempDir, cleanup };
}

export function createTestSignature(overrides: Partial<Signature> = {}): Signature {
  return {
    name: 'greet',
    kind: 'function',
    parameters: [{ name: 'name', type: 'string' }],
    returnType: 'string',
    typeParameters: null,
    scope: [],
    line: 1,
    endLine: 3,
    signature: 'export function greet(name: string): string',
    decorators: [],
    modifiers: ['export'],
    ...overrides,
  };
}

export function createTestFileSummary(overrides: Partial<FileSummary> = {}): FileSummary {
  return {
    path: 'src/greet.ts',
    language: 'typescript',
    status: 'complete',
    lineCount: 3,
    checksum: 'checksum-1',
    signatures: [createTestSignature()],
    warnings: [],
    ...overrides,
  };
}

export function createTestSkippedFile(overrides: Partial<SkippedFile> = {}): SkippedFile {
  return {
    path: 'assets/logo.png',
    reason: 'UNSUPPORTED_LANGUAGE',
    message: 'No grammar for ".png" files',
    ...overrides,
  };
}

/**
 * A summary exercising every record type: a complete file with a class and
 * members, a partial file with a warning and a skipped file
 */
export function createTestRepoSummary(overrides: Partial<RepoSummary> = {}): RepoSummary {
  return {
    formatVersion: 1,
    tool: { name: 'tldr-code', version: '0.1.0' },
    rootPath: '/work/project',
    generatedAt: '2024-01-02T03:04:05.000Z',
    files: [
      createTestFileSummary({
        path: 'src/service.ts',
        lineCount: 12,
        checksum: 'abc123',
        signatures: [
          createTestSignature({
            name: 'UserService',
            kind: 'class',
            parameters: [],
            returnType: null,
            line: 1,
            endLine: 12,
            signature: 'export class UserService',
          }),
          createTestSignature({
            name: 'constructor',
            kind: 'constructor',
            parameters: [{ name: 'db', type: 'Database' }],
            returnType: null,
            scope: ['UserService'],
            line: 2,
            endLine: 2,
            signature: 'constructor(private db: Database)',
            modifiers: [],
          }),
          createTestSignature({
            name: 'find',
            kind: 'method',
            parameters: [
              { name: 'id', type: 'string' },
              { name: 'options', type: null },
            ],
            returnType: 'Promise<User | null>',
            typeParameters: null,
            scope: ['UserService'],
            line: 4,
            endLine: 6,
            signature: 'async find(id: string, options): Promise<User | null>',
            decorators: ['@cached()'],
            modifiers: ['async'],
          }),
        ],
      }),
      createTestFileSummary({
        path: 'src/broken.py',
        language: 'python',
        status: 'partial',
        lineCount: 4,
        checksum: 'def456',
        signatures: [
          createTestSignature({
            name: 'ok',
            parameters: [],
            returnType: null,
            signature: 'def ok()',
            modifiers: [],
          }),
        ],
        warnings: [{ code: 'SYNTAX_ERROR', message: 'Unexpected syntax at line 3', line: 3 }],
      }),
    ],
    skipped: [createTestSkippedFile()],
    ...overrides,
  };
}
