/**
 * SQLite storage for the extraction cache
 */

import Database from 'better-sqlite3';
import path from 'node:path';
import fs from 'node:fs';

import type { FileSummary } from '../../types/index.js';
import { fileSummarySchema } from '../../serializer/schema.js';
import type { CacheStats, CacheStorage } from './index.js';

interface SummaryRow {
  checksum: string;
  fingerprint: string;
  data: string;
}

export class SqliteCache implements CacheStorage {
  private db: Database.Database | null = null;
  private dbPath: string;
  private hits = 0;
  private misses = 0;

  /**
   * @param dbPath database file, or ":memory:"
   */
  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  async initialize(): Promise<void> {
    if (this.dbPath !== ':memory:') {
      // Ensure directory exists
      const dir = path.dirname(this.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);

    // Enable WAL mode for better concurrency
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS file_summaries (
        path TEXT PRIMARY KEY,
        checksum TEXT NOT NULL,
        fingerprint TEXT NOT NULL,
        data TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `);
  }

  private requireDb(): Database.Database {
    if (!this.db) throw new Error('Database not initialized');
    return this.db;
  }

  async get(relativePath: string, checksum: string, fingerprint: string): Promise<FileSummary | null> {
    const db = this.requireDb();
    const row = db
      .prepare<[string], SummaryRow>('SELECT checksum, fingerprint, data FROM file_summaries WHERE path = ?')
      .get(relativePath);

    if (!row || row.checksum !== checksum || row.fingerprint !== fingerprint) {
      this.misses++;
      return null;
    }

    const result = fileSummarySchema.safeParse(JSON.parse(row.data));
    if (!result.success) {
      // Written by an incompatible release; treat as absent
      db.prepare('DELETE FROM file_summaries WHERE path = ?').run(relativePath);
      this.misses++;
      return null;
    }

    this.hits++;
    return result.data;
  }

  async set(summary: FileSummary, fingerprint: string): Promise<void> {
    this.requireDb()
      .prepare(`
        INSERT INTO file_summaries (path, checksum, fingerprint, data, updated_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(path) DO UPDATE SET
          checksum = excluded.checksum,
          fingerprint = excluded.fingerprint,
          data = excluded.data,
          updated_at = excluded.updated_at
      `)
      .run(summary.path, summary.checksum, fingerprint, JSON.stringify(summary), Date.now());
  }

  async delete(relativePath: string): Promise<void> {
    this.requireDb().prepare('DELETE FROM file_summaries WHERE path = ?').run(relativePath);
  }

  async prune(keepPaths: readonly string[]): Promise<number> {
    const db = this.requireDb();
    const keep = new Set(keepPaths);
    const rows = db.prepare<[], { path: string }>('SELECT path FROM file_summaries').all();
    const stale = rows.filter(row => !keep.has(row.path));

    const remove = db.prepare('DELETE FROM file_summaries WHERE path = ?');
    const transaction = db.transaction((paths: string[]) => {
      for (const p of paths) remove.run(p);
    });
    transaction(stale.map(row => row.path));

    return stale.length;
  }

  async getStats(): Promise<CacheStats> {
    const row = this.requireDb()
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM file_summaries')
      .get();
    return { entries: row?.count ?? 0, hits: this.hits, misses: this.misses };
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  async clear(): Promise<void> {
    this.requireDb().exec('DELETE FROM file_summaries');
    this.hits = 0;
    this.misses = 0;
  }
}
