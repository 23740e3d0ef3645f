import { ConfigError } from "@trialmatch/match-ai";
import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("defaults to a local model and a SQLite cache", () => {
    expect(loadConfig({})).toEqual({
      reasoning: {
        provider: "local",
        baseUrl: "http://localhost:11434",
        model: "llama3.1:8b",
        timeoutMs: 120_000,
      },
      registry: {
        baseUrl: "https://clinicaltrials.gov/api/v2",
        retry: { maxRetries: 2, initialMs: 800, timeoutMs: 30_000 },
      },
      cache: { backend: "sqlite", path: "trials_cache.db" },
      concurrency: 4,
    });
  });

  it("treats blank variables as unset", () => {
    const config = loadConfig({ OLLAMA_MODEL: "  ", MATCH_CONCURRENCY: "" });
    expect(config.reasoning).toMatchObject({ model: "llama3.1:8b" });
    expect(config.concurrency).toBe(4);
  });

  it("configures the cloud provider with the vendor's key", () => {
    const config = loadConfig({
      REASONING_PROVIDER: "cloud",
      CLOUD_VENDOR: "openai",
      OPENAI_API_KEY: "test-secret",
      CLOUD_MODEL: "gpt-4o",
      PROVIDER_TIMEOUT_MS: "60000",
    });
    expect(config.reasoning).toEqual({
      provider: "cloud",
      vendor: "openai",
      apiKey: "test-secret",
      model: "gpt-4o",
      timeoutMs: 60_000,
    });
  });

  it("requires an API key for the cloud provider", () => {
    expect(() => loadConfig({ REASONING_PROVIDER: "cloud" })).toThrow(
      new ConfigError("ANTHROPIC_API_KEY is required when REASONING_PROVIDER=cloud")
    );
  });

  it("requires credentials for the Supabase cache", () => {
    expect(() => loadConfig({ CACHE_BACKEND: "supabase", SUPABASE_URL: "https://project.supabase.test" })).toThrow(
      ConfigError
    );
    expect(
      loadConfig({
        CACHE_BACKEND: "supabase",
        SUPABASE_URL: "https://project.supabase.test",
        SUPABASE_SERVICE_ROLE_KEY: "test-secret",
      }).cache
    ).toEqual({ backend: "supabase", url: "https://project.supabase.test", serviceRoleKey: "test-secret" });
  });

  it("rejects values outside their allowed range", () => {
    expect(() => loadConfig({ MATCH_CONCURRENCY: "0" })).toThrow(/^Invalid configuration: MATCH_CONCURRENCY/);
    expect(() => loadConfig({ REASONING_PROVIDER: "remote" })).toThrow(ConfigError);
    expect(() => loadConfig({ PROVIDER_TIMEOUT_MS: "soon" })).toThrow(ConfigError);
  });
});
