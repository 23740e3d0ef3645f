import { createHash } from "node:crypto";
import type { SearchQuery } from "./types.js";

export function normalizeCondition(condition: string): string {
  return condition.trim().replace(/\s+/g, " ").toLowerCase();
}

function sha256(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

/**
 * Deterministic key for a trial search. Queries that differ only in the case or
 * whitespace of the condition, or in filter order, share a key.
 */
export function searchCacheKey(query: SearchQuery): string {
  const filters = Object.entries(query.filters ?? {}).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const canonical = JSON.stringify({
    condition: normalizeCondition(query.condition),
    filters,
    max_results: query.maxResults,
  });
  return `search:${sha256(canonical)}`;
}

/** Key for the single-trial cache used by lookups by NCT id. */
export function trialCacheKey(nctId: string): string {
  return `trial:${nctId.trim().toUpperCase()}`;
}
