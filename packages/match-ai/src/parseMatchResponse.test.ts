import type { Trial } from "@trialmatch/database";
import { describe, expect, it } from "vitest";
import { ParseFailureError } from "./errors.js";
import {
  EXCLUSION_VIOLATION_SCORE_CEILING,
  INELIGIBLE_SCORE_CEILING,
  SCORE_BANDS,
  extractJsonObject,
  parseMatchResponse,
} from "./parseMatchResponse.js";

const trial: Trial = {
  nct_id: "NCT00000042",
  title: "Study 42",
  phase: null,
  status: "RECRUITING",
  brief_summary: null,
  inclusion_criteria: "* Adults",
  exclusion_criteria: "* Pregnancy",
  conditions: [],
  locations: [],
  interventions: [],
  minimum_age: null,
  maximum_age: null,
  sex: null,
  enrollment: null,
  source_url: "https://clinicaltrials.gov/study/NCT00000042",
};

function reply(fields: Record<string, unknown>): string {
  return JSON.stringify({
    eligible: true,
    score: 0.8,
    explanation: "Looks good.",
    inclusion_matches: [],
    inclusion_mismatches: [],
    exclusion_violations: [],
    exclusion_passes: [],
    ...fields,
  });
}

describe("extractJsonObject", () => {
  it("finds an object embedded in prose", () => {
    expect(extractJsonObject('Sure! {"a": 1} Hope that helps.')).toEqual({ a: 1 });
  });

  it("ignores braces inside strings", () => {
    expect(extractJsonObject('{"text": "a } b { c", "n": 2}')).toEqual({ text: "a } b { c", n: 2 });
  });

  it("skips spans that are not JSON", () => {
    expect(extractJsonObject('Note {see below}: {"ok": true}')).toEqual({ ok: true });
  });

  it("returns null when nothing parses", () => {
    expect(extractJsonObject("no json here {broken")).toBeNull();
  });
});

describe("parseMatchResponse", () => {
  it("extracts the verdict object from surrounding prose", () => {
    const raw =
      'Here is my analysis: {"eligible": true, "score": 0.85, "explanation": "...", "inclusion_matches": [], "inclusion_mismatches": [], "exclusion_violations": [], "exclusion_passes": []} Let me know if you need more.';
    const result = parseMatchResponse(raw, trial);
    expect(result.eligible).toBe(true);
    expect(result.score).toBe(0.85);
    expect(result.explanation).toBe("...");
    expect(result.inclusion_matches).toEqual([]);
    expect(result.adjustments).toEqual([]);
    expect(result.trial).toBe(trial);
  });

  it("reads a reply wrapped in a markdown code fence", () => {
    const raw = "```json\n" + reply({ score: 0.7 }) + "\n```";
    expect(parseMatchResponse(raw, trial).score).toBe(0.7);
  });

  it("accepts the is_eligible / match_score field names", () => {
    const raw = JSON.stringify({ is_eligible: false, match_score: 0.45, explanation: "Weak." });
    const result = parseMatchResponse(raw, trial);
    expect(result.eligible).toBe(false);
    expect(result.score).toBe(0.45);
  });

  it("clamps a string-typed out-of-range score", () => {
    const result = parseMatchResponse(reply({ score: "1.5" }), trial);
    expect(result.score).toBe(1);
    expect(result.adjustments).toEqual(["score 1.5 clamped to 1"]);
  });

  it("reads a percentage score as a fraction", () => {
    const result = parseMatchResponse(reply({ score: "45%" }), trial);
    expect(result.score).toBe(0.45);
    expect(result.adjustments).toEqual([]);
  });

  it("clamps a percentage above 100", () => {
    const result = parseMatchResponse(reply({ score: " 120 % " }), trial);
    expect(result.score).toBe(1);
    expect(result.adjustments).toEqual(["score 1.2 clamped to 1"]);
  });

  it("clamps a negative score to zero", () => {
    expect(parseMatchResponse(reply({ eligible: false, score: -0.2 }), trial).score).toBe(0);
  });

  it("coerces verdict words", () => {
    expect(parseMatchResponse(reply({ eligible: "Yes" }), trial).eligible).toBe(true);
    expect(parseMatchResponse(reply({ eligible: "false", score: 0.2 }), trial).eligible).toBe(false);
  });

  it("defaults missing lists to empty and drops non-string entries", () => {
    const raw = JSON.stringify({
      eligible: true,
      score: 0.9,
      explanation: "Fine.",
      inclusion_matches: ["Age met", 3, null, "  "],
    });
    const result = parseMatchResponse(raw, trial);
    expect(result.inclusion_matches).toEqual(["Age met"]);
    expect(result.inclusion_mismatches).toEqual([]);
    expect(result.exclusion_violations).toEqual([]);
    expect(result.exclusion_passes).toEqual([]);
  });

  it("keeps reasoning separate from the explanation", () => {
    const result = parseMatchResponse(reply({ reasoning: "All criteria checked." }), trial);
    expect(result.explanation).toBe("Looks good.");
    expect(result.reasoning).toBe("All criteria checked.");
  });

  it("falls back to reasoning when the explanation is missing", () => {
    const raw = JSON.stringify({ eligible: true, score: 0.9, reasoning: "Meets every criterion." });
    const result = parseMatchResponse(raw, trial);
    expect(result.explanation).toBe("Meets every criterion.");
    expect(result.reasoning).toBeNull();
  });

  it("downgrades an eligible verdict that lists exclusion violations", () => {
    const result = parseMatchResponse(
      reply({ eligible: true, score: 0.95, exclusion_violations: ["Currently pregnant"] }),
      trial
    );
    expect(result.eligible).toBe(false);
    expect(result.score).toBe(EXCLUSION_VIOLATION_SCORE_CEILING);
    expect(result.explanation).toBe(
      "Looks good. (Verdict changed to ineligible: the assessment lists violated exclusion criteria.)"
    );
    expect(result.adjustments).toEqual([
      "verdict downgraded to ineligible: exclusion criteria violated",
      "score 0.95 capped at 0.3 for an ineligible verdict",
    ]);
  });

  it("keeps an ineligible verdict below the strong-match threshold", () => {
    const result = parseMatchResponse(reply({ eligible: false, score: 0.95 }), trial);
    expect(result.score).toBe(INELIGIBLE_SCORE_CEILING);
    expect(result.score).toBeLessThan(SCORE_BANDS.strong);
  });

  it("leaves a low ineligible score untouched", () => {
    const result = parseMatchResponse(reply({ eligible: false, score: 0.2, exclusion_violations: ["Smoker"] }), trial);
    expect(result.score).toBe(0.2);
    expect(result.adjustments).toEqual([]);
  });

  it("never pairs an eligible verdict with exclusion violations", () => {
    const replies = [
      reply({ eligible: true, exclusion_violations: ["a"] }),
      reply({ eligible: "yes", score: "2", exclusion_violations: ["a", "b"] }),
      reply({ eligible: true, score: 0.1, exclusion_violations: "single violation" }),
      JSON.stringify({ is_eligible: true, match_score: 0.99, reasoning: "x", exclusion_violations: ["c"] }),
    ];
    for (const raw of replies) {
      const result = parseMatchResponse(raw, trial);
      expect(result.eligible && result.exclusion_violations.length > 0).toBe(false);
      expect(result.score).toBeGreaterThanOrEqual(0);
      expect(result.score).toBeLessThanOrEqual(1);
    }
  });

  it("fails when no JSON object is present", () => {
    expect(() => parseMatchResponse("I cannot determine eligibility.", trial)).toThrow(ParseFailureError);
  });

  it("fails on a non-numeric score instead of inventing one", () => {
    expect(() => parseMatchResponse(reply({ score: "high" }), trial)).toThrow("score: score must be a number");
  });

  it("fails when the verdict is missing", () => {
    const raw = JSON.stringify({ score: 0.5, explanation: "Unclear." });
    expect(() => parseMatchResponse(raw, trial)).toThrow("has no eligibility verdict");
  });

  it("fails when neither explanation nor reasoning is present", () => {
    const raw = JSON.stringify({ eligible: true, score: 0.5 });
    expect(() => parseMatchResponse(raw, trial)).toThrow("has no explanation");
  });

  it("keeps the start of the unusable reply on the error", () => {
    try {
      parseMatchResponse("nothing useful", trial);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ParseFailureError);
      if (err instanceof ParseFailureError) expect(err.excerpt).toBe("nothing useful");
    }
  });
});
