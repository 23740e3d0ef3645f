import { describe, expect, it } from "vitest";
import { normalizeCondition, searchCacheKey, trialCacheKey } from "./cacheKey.js";

describe("searchCacheKey", () => {
  it("ignores case and surrounding whitespace of the condition", () => {
    const a = searchCacheKey({ condition: "Diabetes", maxResults: 10 });
    const b = searchCacheKey({ condition: "  diabetes ", maxResults: 10 });
    expect(a).toBe(b);
  });

  it("collapses inner whitespace", () => {
    expect(searchCacheKey({ condition: "type  2\tdiabetes", maxResults: 5 })).toBe(
      searchCacheKey({ condition: "Type 2 Diabetes", maxResults: 5 })
    );
  });

  it("is insensitive to filter order", () => {
    const a = searchCacheKey({ condition: "asthma", maxResults: 5, filters: { a: "1", b: "2" } });
    const b = searchCacheKey({ condition: "asthma", maxResults: 5, filters: { b: "2", a: "1" } });
    expect(a).toBe(b);
  });

  it("distinguishes result limits and filters", () => {
    const base = searchCacheKey({ condition: "asthma", maxResults: 5 });
    expect(searchCacheKey({ condition: "asthma", maxResults: 6 })).not.toBe(base);
    expect(searchCacheKey({ condition: "asthma", maxResults: 5, filters: { status: "RECRUITING" } })).not.toBe(base);
  });

  it("produces a namespaced sha-256 hex digest", () => {
    expect(searchCacheKey({ condition: "asthma", maxResults: 5 })).toMatch(/^search:[0-9a-f]{64}$/);
  });
});

describe("normalizeCondition", () => {
  it("trims, lower-cases and collapses whitespace", () => {
    expect(normalizeCondition("  Heart   Failure ")).toBe("heart failure");
  });
});

describe("trialCacheKey", () => {
  it("upper-cases the NCT id", () => {
    expect(trialCacheKey(" nct01234567 ")).toBe("trial:NCT01234567");
  });
});
