/**
 * Search cache kept in a Supabase table (see sql/trial_search_cache.sql).
 * Each key is one row; upsert on the primary key makes the last writer win.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { CACHE_TTL_MS, isFresh, type CacheStore, type CacheStoreOptions } from "./cacheStore.js";
import { TrialListSchema, type CacheEntry, type Trial } from "./types.js";

const DEFAULT_TABLE = "trial_search_cache";

const CacheRowSchema = z.object({
  key: z.string(),
  payload: TrialListSchema,
  created_at: z.coerce.number(),
});

export interface SupabaseCacheStoreOptions extends CacheStoreOptions {
  table?: string;
}

export class SupabaseCacheStore implements CacheStore {
  private readonly table: string;
  private readonly now: () => number;

  constructor(
    private readonly supabase: SupabaseClient,
    options: SupabaseCacheStoreOptions = {}
  ) {
    this.table = options.table ?? DEFAULT_TABLE;
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<CacheEntry | null> {
    const { data, error } = await this.supabase
      .from(this.table)
      .select("key, payload, created_at")
      .eq("key", key)
      .maybeSingle();
    if (error) throw new Error(`${this.table}: ${error.message}`);
    if (data == null) return null;

    const parsed = CacheRowSchema.safeParse(data);
    if (!parsed.success) {
      console.warn(`[cache] Corrupt row for ${key}, treating as absent`);
      return null;
    }
    if (!isFresh(parsed.data.created_at, this.now())) return null;
    return parsed.data;
  }

  async put(key: string, payload: readonly Trial[]): Promise<void> {
    const { error } = await this.supabase
      .from(this.table)
      .upsert({ key, payload, created_at: this.now() }, { onConflict: "key" });
    if (error) throw new Error(`${this.table}: ${error.message}`);
  }

  async invalidateExpired(): Promise<number> {
    const cutoff = this.now() - CACHE_TTL_MS;
    const { count, error } = await this.supabase
      .from(this.table)
      .delete({ count: "exact" })
      .lte("created_at", cutoff);
    if (error) throw new Error(`${this.table}: ${error.message}`);
    return count ?? 0;
  }

  async close(): Promise<void> {
    // The client holds no connection of its own.
  }
}
