import type { CacheEntry, Trial } from "./types.js";

/** Cached search results are valid for 24 hours. */
export const CACHE_TTL_MS = 24 * 60 * 60 * 1000;

/**
 * Time-bounded store of normalized trial lists. An expired entry is reported as
 * absent; `put` overwrites, last writer for a key wins.
 */
export interface CacheStore {
  get(key: string): Promise<CacheEntry | null>;
  put(key: string, payload: readonly Trial[]): Promise<void>;
  /** Deletes expired entries; returns how many were removed. */
  invalidateExpired(): Promise<number>;
  close(): Promise<void>;
}

export interface CacheStoreOptions {
  /** Clock in epoch ms. Defaults to Date.now. */
  now?: () => number;
}

export function isFresh(createdAt: number, now: number): boolean {
  return now - createdAt < CACHE_TTL_MS;
}

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly now: () => number;

  constructor(options: CacheStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<CacheEntry | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (!isFresh(entry.created_at, this.now())) {
      this.entries.delete(key);
      return null;
    }
    return { ...entry, payload: [...entry.payload] };
  }

  async put(key: string, payload: readonly Trial[]): Promise<void> {
    this.entries.set(key, { key, payload: [...payload], created_at: this.now() });
  }

  async invalidateExpired(): Promise<number> {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (!isFresh(entry.created_at, now)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}
