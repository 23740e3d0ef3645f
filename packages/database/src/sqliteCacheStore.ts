/**
 * SQLite-backed search cache (better-sqlite3). Survives restarts when given a file path.
 * Statements run synchronously, so a reader never sees a half-written row.
 */

import Database from "better-sqlite3";
import { z } from "zod";
import { CACHE_TTL_MS, isFresh, type CacheStore, type CacheStoreOptions } from "./cacheStore.js";
import { TrialListSchema, type CacheEntry, type Trial } from "./types.js";

const CacheRowSchema = z.object({
  key: z.string(),
  payload: z.string(),
  created_at: z.number(),
});

export interface SqliteCacheStoreOptions extends CacheStoreOptions {
  /** File path, or ":memory:" (default). */
  path?: string;
}

export class SqliteCacheStore implements CacheStore {
  private readonly db: Database.Database;
  private readonly now: () => number;

  constructor(options: SqliteCacheStoreOptions = {}) {
    const path = options.path ?? ":memory:";
    this.now = options.now ?? Date.now;
    this.db = new Database(path);
    if (path !== ":memory:") this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS trial_search_cache (
        key TEXT PRIMARY KEY,
        payload TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_trial_search_cache_created_at ON trial_search_cache(created_at);
    `);
  }

  async get(key: string): Promise<CacheEntry | null> {
    const row = this.db
      .prepare("SELECT key, payload, created_at FROM trial_search_cache WHERE key = ?")
      .get(key);
    if (row === undefined) return null;

    const parsedRow = CacheRowSchema.safeParse(row);
    if (!parsedRow.success) {
      console.warn(`[cache] Unreadable row for ${key}, treating as absent`);
      return null;
    }
    const { created_at, payload } = parsedRow.data;
    if (!isFresh(created_at, this.now())) return null;

    const trials = decodePayload(payload);
    if (!trials) {
      console.warn(`[cache] Corrupt payload for ${key}, treating as absent`);
      return null;
    }
    return { key, payload: trials, created_at };
  }

  async put(key: string, payload: readonly Trial[]): Promise<void> {
    this.db
      .prepare("INSERT OR REPLACE INTO trial_search_cache (key, payload, created_at) VALUES (?, ?, ?)")
      .run(key, JSON.stringify(payload), this.now());
  }

  async invalidateExpired(): Promise<number> {
    const cutoff = this.now() - CACHE_TTL_MS;
    const info = this.db.prepare("DELETE FROM trial_search_cache WHERE created_at <= ?").run(cutoff);
    return info.changes;
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}

function decodePayload(payload: string): Trial[] | null {
  let value: unknown;
  try {
    value = JSON.parse(payload);
  } catch {
    return null;
  }
  const parsed = TrialListSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
