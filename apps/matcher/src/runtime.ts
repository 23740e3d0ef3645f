import {
  MemoryCacheStore,
  SqliteCacheStore,
  SupabaseCacheStore,
  getSupabaseServiceRole,
  type CacheStore,
} from "@trialmatch/database";
import { ConfigError, createReasoningProvider, type ReasoningProvider } from "@trialmatch/match-ai";
import { TrialRegistryClient } from "./clinicaltrials.js";
import type { CacheConfig, MatcherConfig } from "./config.js";
import { TrialMatcher } from "./matcher.js";

export function createCacheStore(config: CacheConfig): CacheStore {
  switch (config.backend) {
    case "memory":
      return new MemoryCacheStore();
    case "sqlite":
      return new SqliteCacheStore({ path: config.path });
    case "supabase": {
      const supabase = getSupabaseServiceRole(config.url, config.serviceRoleKey);
      if (!supabase) throw new ConfigError("Supabase cache selected without credentials");
      return new SupabaseCacheStore(supabase);
    }
  }
}

export interface MatcherRuntime {
  cache: CacheStore;
  registry: TrialRegistryClient;
  provider: ReasoningProvider;
  matcher: TrialMatcher;
  close(): Promise<void>;
}

/** Wires the configured cache, registry client and reasoning backend once per process. */
export function createMatcherRuntime(config: MatcherConfig): MatcherRuntime {
  const provider = createReasoningProvider(config.reasoning);
  const cache = createCacheStore(config.cache);
  const registry = new TrialRegistryClient({
    cache,
    baseUrl: config.registry.baseUrl,
    retry: config.registry.retry,
  });
  const matcher = new TrialMatcher(registry, provider, { concurrency: config.concurrency });
  console.log(`[matcher] Using ${provider.name} reasoning (${provider.model}), ${config.cache.backend} cache`);
  return { cache, registry, provider, matcher, close: () => cache.close() };
}
