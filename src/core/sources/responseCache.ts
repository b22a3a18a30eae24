import path from 'path';
import fs from 'fs-extra';
import Database from 'better-sqlite3';

const SECONDS_PER_DAY = 86_400;

export type Clock = () => number;

const epochSeconds: Clock = () => Math.floor(Date.now() / 1000);

/**
 * Store of raw provider responses keyed by a query fingerprint.
 */
export interface ResponseCache {
  get(key: string, ttlDays: number): string | undefined;
  put(key: string, payload: string): void;
  /** Drops every entry; returns how many were removed. */
  clear(): number;
  /** Drops entries older than the TTL; returns how many were removed. */
  prune(ttlDays: number): number;
  count(): number;
  close(): void;
}

interface CacheRow {
  created_at: number;
  payload: string;
}

export class SqliteResponseCache implements ResponseCache {
  readonly dbPath: string;
  private db: Database.Database;
  private now: Clock;

  constructor(dbPath: string, options: { now?: Clock } = {}) {
    this.dbPath = dbPath;
    this.now = options.now ?? epochSeconds;
    if (dbPath !== ':memory:') fs.ensureDirSync(path.dirname(dbPath));
    this.db = new Database(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS cache (
        key TEXT PRIMARY KEY,
        created_at INTEGER NOT NULL,
        payload TEXT NOT NULL
      )
    `);
  }

  get(key: string, ttlDays: number): string | undefined {
    const row = this.db
      .prepare<[string], CacheRow>('SELECT created_at, payload FROM cache WHERE key = ?')
      .get(key);
    if (!row) return undefined;
    const cutoff = this.now() - ttlDays * SECONDS_PER_DAY;
    if (Number(row.created_at) < cutoff) return undefined;
    return String(row.payload);
  }

  put(key: string, payload: string): void {
    this.db
      .prepare<[string, number, string]>('INSERT OR REPLACE INTO cache(key, created_at, payload) VALUES(?, ?, ?)')
      .run(key, this.now(), payload);
  }

  clear(): number {
    return this.db.prepare('DELETE FROM cache').run().changes;
  }

  prune(ttlDays: number): number {
    const cutoff = this.now() - ttlDays * SECONDS_PER_DAY;
    return this.db.prepare<[number]>('DELETE FROM cache WHERE created_at < ?').run(cutoff).changes;
  }

  count(): number {
    const row = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM cache').get();
    return row ? Number(row.n) : 0;
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}

/**
 * In-process LRU with the same contract, for embedding the probe as a library.
 */
export class MemoryResponseCache implements ResponseCache {
  private maxSize: number;
  private map: Map<string, CacheRow>;
  private now: Clock;

  constructor(maxSize: number, options: { now?: Clock } = {}) {
    this.maxSize = Math.max(1, maxSize);
    this.map = new Map();
    this.now = options.now ?? epochSeconds;
  }

  get(key: string, ttlDays: number): string | undefined {
    const row = this.map.get(key);
    if (!row) return undefined;
    if (row.created_at < this.now() - ttlDays * SECONDS_PER_DAY) return undefined;
    this.map.delete(key);
    this.map.set(key, row);
    return row.payload;
  }

  put(key: string, payload: string): void {
    if (this.map.has(key)) this.map.delete(key);
    this.map.set(key, { created_at: this.now(), payload });
    if (this.map.size > this.maxSize) {
      const first = this.map.keys().next().value;
      if (first !== undefined) this.map.delete(first);
    }
  }

  clear(): number {
    const n = this.map.size;
    this.map.clear();
    return n;
  }

  prune(ttlDays: number): number {
    const cutoff = this.now() - ttlDays * SECONDS_PER_DAY;
    let removed = 0;
    for (const [key, row] of this.map) {
      if (row.created_at < cutoff) {
        this.map.delete(key);
        removed++;
      }
    }
    return removed;
  }

  count(): number {
    return this.map.size;
  }

  close(): void {}
}
