export * from "./types.js";
export * from "./cacheKey.js";
export * from "./cacheStore.js";
export { SqliteCacheStore, type SqliteCacheStoreOptions } from "./sqliteCacheStore.js";
export { SupabaseCacheStore, type SupabaseCacheStoreOptions } from "./supabaseCacheStore.js";
export { getSupabaseServiceRole } from "./client.js";
