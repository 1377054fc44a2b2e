/**
 * Extraction cache interface and exports
 */

import type { FileSummary } from '../../types/index.js';

export interface CacheStats {
  entries: number;
  hits: number;
  misses: number;
}

/**
 * Stores extracted FileSummaries keyed by relative path. An entry is only
 * returned when both the content checksum and the extractor fingerprint
 * still match.
 */
export interface CacheStorage {
  get(relativePath: string, checksum: string, fingerprint: string): Promise<FileSummary | null>;
  set(summary: FileSummary, fingerprint: string): Promise<void>;
  delete(relativePath: string): Promise<void>;
  /** Remove entries for paths not in the list; returns how many were removed */
  prune(keepPaths: readonly string[]): Promise<number>;
  getStats(): Promise<CacheStats>;

  // Lifecycle
  initialize(): Promise<void>;
  close(): Promise<void>;
  clear(): Promise<void>;
}

export { SqliteCache } from './sqlite.js';
