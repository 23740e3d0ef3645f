/**
 * Turns a reasoning backend's reply into a MatchResult. The reply is asked to be a
 * JSON object but may carry prose or code fences around it, stringly-typed numbers,
 * out-of-range scores, or a verdict that contradicts its own criterion lists.
 * Unrecoverable replies raise ParseFailureError; no score is ever made up.
 */

import type { Trial } from "@trialmatch/database";
import { z } from "zod";
import { ParseFailureError } from "./errors.js";
import type { MatchResult } from "./types.js";

/** Lower bounds of the descriptive scoring bands given to the backend. */
export const SCORE_BANDS = {
  strong: 0.9,
  moderate: 0.6,
  weak: 0.4,
} as const;

/** Highest score an ineligible verdict may carry. */
export const INELIGIBLE_SCORE_CEILING = 0.89;
/** Highest score when an exclusion criterion is violated. */
export const EXCLUSION_VIOLATION_SCORE_CEILING = 0.3;

const VERDICT_WORDS = new Map<string, boolean>([
  ["true", true],
  ["yes", true],
  ["eligible", true],
  ["false", false],
  ["no", false],
  ["ineligible", false],
]);

const Verdict = z.preprocess(
  (v) => (typeof v === "string" ? VERDICT_WORDS.get(v.trim().toLowerCase()) ?? v : v),
  z.boolean({ invalid_type_error: "eligibility verdict must be a boolean" })
);

/** "0.45", "45%" and 0.45 all read as 0.45. */
const Score = z.preprocess((v) => {
  if (typeof v !== "string") return v;
  const text = v.trim();
  const percent = text.endsWith("%");
  const digits = percent ? text.slice(0, -1).trim() : text;
  if (digits === "") return v;
  return percent ? Number(digits) / 100 : Number(digits);
}, z.number({ invalid_type_error: "score must be a number" }).finite());

const Text = z.unknown().transform((v) => (typeof v === "string" && v.trim() ? v.trim() : undefined));

const StringList = z.unknown().transform(toStringList);

const RawAssessmentSchema = z.object({
  eligible: Verdict.optional(),
  is_eligible: Verdict.optional(),
  score: Score.optional(),
  match_score: Score.optional(),
  explanation: Text,
  reasoning: Text,
  inclusion_matches: StringList,
  inclusion_mismatches: StringList,
  exclusion_violations: StringList,
  exclusion_passes: StringList,
});

function toStringList(value: unknown): string[] {
  if (typeof value === "string") return value.trim() ? [value.trim()] : [];
  if (!Array.isArray(value)) return [];
  return value
    .filter((item): item is string => typeof item === "string")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Index of the brace closing the object opened at `start`, or -1 if it never closes. */
function findClosingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * First balanced `{...}` span in `raw` that parses as a JSON object and satisfies
 * `accept`. Spans that fail to parse are skipped.
 */
export function extractJsonObject(
  raw: string,
  accept: (value: Record<string, unknown>) => boolean = () => true
): Record<string, unknown> | null {
  for (let start = raw.indexOf("{"); start !== -1; start = raw.indexOf("{", start + 1)) {
    const end = findClosingBrace(raw, start);
    if (end === -1) continue;
    const value = tryParseJson(raw.slice(start, end + 1));
    if (isRecord(value) && accept(value)) return value;
  }
  return null;
}

function hasVerdictField(value: Record<string, unknown>): boolean {
  return "eligible" in value || "is_eligible" in value || "score" in value || "match_score" in value;
}

function clamp(score: number): number {
  return Math.min(1, Math.max(0, score));
}

export function parseMatchResponse(raw: string, trial: Trial): MatchResult {
  const object = extractJsonObject(raw, hasVerdictField);
  if (!object) throw new ParseFailureError(`No JSON verdict object in response for ${trial.nct_id}`, raw);

  const parsed = RawAssessmentSchema.safeParse(object);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ParseFailureError(`Unusable response for ${trial.nct_id}: ${detail}`, raw);
  }
  const data = parsed.data;

  const verdict = data.eligible ?? data.is_eligible;
  if (verdict === undefined) throw new ParseFailureError(`Response for ${trial.nct_id} has no eligibility verdict`, raw);
  const rawScore = data.score ?? data.match_score;
  if (rawScore === undefined) throw new ParseFailureError(`Response for ${trial.nct_id} has no score`, raw);
  const explanationText = data.explanation ?? data.reasoning;
  if (explanationText === undefined) throw new ParseFailureError(`Response for ${trial.nct_id} has no explanation`, raw);

  const adjustments: string[] = [];
  let eligible = verdict;
  let score = clamp(rawScore);
  let explanation = explanationText;
  if (score !== rawScore) adjustments.push(`score ${rawScore} clamped to ${score}`);

  if (eligible && data.exclusion_violations.length > 0) {
    eligible = false;
    adjustments.push("verdict downgraded to ineligible: exclusion criteria violated");
    explanation += " (Verdict changed to ineligible: the assessment lists violated exclusion criteria.)";
  }
  if (!eligible) {
    const ceiling =
      data.exclusion_violations.length > 0 ? EXCLUSION_VIOLATION_SCORE_CEILING : INELIGIBLE_SCORE_CEILING;
    if (score > ceiling) {
      adjustments.push(`score ${score} capped at ${ceiling} for an ineligible verdict`);
      score = ceiling;
    }
  }

  return Object.freeze({
    trial,
    eligible,
    score,
    explanation,
    reasoning: data.explanation !== undefined ? data.reasoning ?? null : null,
    inclusion_matches: data.inclusion_matches,
    inclusion_mismatches: data.inclusion_mismatches,
    exclusion_violations: data.exclusion_violations,
    exclusion_passes: data.exclusion_passes,
    adjustments,
  });
}
