/**
 * Canonical identity: trial.nct_id. It is stable across cache refreshes; a refreshed
 * entry supersedes the old trial object rather than mutating it.
 */

import { z } from "zod";

export const TrialSchema = z.object({
  nct_id: z.string().min(1),
  title: z.string().nullable(),
  phase: z.string().nullable(),
  status: z.string().nullable(),
  brief_summary: z.string().nullable(),
  inclusion_criteria: z.string().nullable(),
  exclusion_criteria: z.string().nullable(),
  conditions: z.array(z.string()),
  locations: z.array(z.string()),
  interventions: z.array(z.string()),
  minimum_age: z.string().nullable(),
  maximum_age: z.string().nullable(),
  sex: z.string().nullable(),
  enrollment: z.number().int().nullable(),
  source_url: z.string(),
});

export type Trial = z.infer<typeof TrialSchema>;

export const TrialListSchema = z.array(TrialSchema);

export interface CacheEntry {
  key: string;
  payload: Trial[];
  /** Epoch ms. */
  created_at: number;
}

/** Query parameters a search cache key is derived from. */
export interface SearchQuery {
  condition: string;
  maxResults: number;
  filters?: Record<string, string>;
}
