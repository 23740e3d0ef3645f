import type { Trial } from "@trialmatch/database";

/** Verdict for one (patient, trial) pair. Built once by the parser, never mutated. */
export interface MatchResult {
  readonly trial: Trial;
  readonly eligible: boolean;
  /** In [0, 1]. */
  readonly score: number;
  readonly explanation: string;
  readonly reasoning: string | null;
  readonly inclusion_matches: readonly string[];
  readonly inclusion_mismatches: readonly string[];
  readonly exclusion_violations: readonly string[];
  readonly exclusion_passes: readonly string[];
  /** Corrections the parser applied to the backend's answer; empty when it was consistent. */
  readonly adjustments: readonly string[];
}
