import { ConfigError, DEFAULT_PROVIDER_TIMEOUT_MS, type ReasoningConfig } from "@trialmatch/match-ai";
import { z } from "zod";
import { CT_BASE } from "./clinicaltrials.js";
import type { RetryConfig } from "./fetchWithRetry.js";

/** Blank variables count as unset. */
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (typeof v === "string" && v.trim() === "" ? undefined : v), schema);

const EnvSchema = z.object({
  REASONING_PROVIDER: optional(z.enum(["local", "cloud"]).default("local")),
  CLOUD_VENDOR: optional(z.enum(["anthropic", "openai"]).default("anthropic")),
  ANTHROPIC_API_KEY: optional(z.string().optional()),
  OPENAI_API_KEY: optional(z.string().optional()),
  CLOUD_MODEL: optional(z.string().optional()),
  OLLAMA_BASE_URL: optional(z.string().url().default("http://localhost:11434")),
  OLLAMA_MODEL: optional(z.string().default("llama3.1:8b")),
  PROVIDER_TIMEOUT_MS: optional(z.coerce.number().int().positive().default(DEFAULT_PROVIDER_TIMEOUT_MS)),
  CLINICALTRIALS_API_URL: optional(z.string().url().default(CT_BASE)),
  REGISTRY_TIMEOUT_MS: optional(z.coerce.number().int().positive().default(30_000)),
  CACHE_BACKEND: optional(z.enum(["sqlite", "memory", "supabase"]).default("sqlite")),
  CACHE_DB_PATH: optional(z.string().default("trials_cache.db")),
  SUPABASE_URL: optional(z.string().url().optional()),
  SUPABASE_SERVICE_ROLE_KEY: optional(z.string().optional()),
  MATCH_CONCURRENCY: optional(z.coerce.number().int().min(1).max(32).default(4)),
});

export type CacheConfig =
  | { backend: "memory" }
  | { backend: "sqlite"; path: string }
  | { backend: "supabase"; url: string; serviceRoleKey: string };

export interface MatcherConfig {
  reasoning: ReasoningConfig;
  registry: { baseUrl: string; retry: RetryConfig };
  cache: CacheConfig;
  concurrency: number;
}

function cacheConfig(e: z.infer<typeof EnvSchema>): CacheConfig {
  switch (e.CACHE_BACKEND) {
    case "memory":
      return { backend: "memory" };
    case "sqlite":
      return { backend: "sqlite", path: e.CACHE_DB_PATH };
    case "supabase":
      if (!e.SUPABASE_URL || !e.SUPABASE_SERVICE_ROLE_KEY) {
        throw new ConfigError("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required when CACHE_BACKEND=supabase");
      }
      return { backend: "supabase", url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY };
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MatcherConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  const e = parsed.data;

  let reasoning: ReasoningConfig;
  if (e.REASONING_PROVIDER === "cloud") {
    const apiKey = e.CLOUD_VENDOR === "anthropic" ? e.ANTHROPIC_API_KEY : e.OPENAI_API_KEY;
    if (!apiKey) {
      const name = e.CLOUD_VENDOR === "anthropic" ? "ANTHROPIC_API_KEY" : "OPENAI_API_KEY";
      throw new ConfigError(`${name} is required when REASONING_PROVIDER=cloud`);
    }
    reasoning = {
      provider: "cloud",
      vendor: e.CLOUD_VENDOR,
      apiKey,
      model: e.CLOUD_MODEL,
      timeoutMs: e.PROVIDER_TIMEOUT_MS,
    };
  } else {
    reasoning = {
      provider: "local",
      baseUrl: e.OLLAMA_BASE_URL,
      model: e.OLLAMA_MODEL,
      timeoutMs: e.PROVIDER_TIMEOUT_MS,
    };
  }

  return {
    reasoning,
    registry: {
      baseUrl: e.CLINICALTRIALS_API_URL,
      retry: { maxRetries: 2, initialMs: 800, timeoutMs: e.REGISTRY_TIMEOUT_MS },
    },
    cache: cacheConfig(e),
    concurrency: e.MATCH_CONCURRENCY,
  };
}
