import type { Trial } from "@trialmatch/database";
import {
  ParseFailureError,
  ProviderUnavailableError,
  RegistryUnavailableError,
  TrialNotFoundError,
  ValidationError,
  buildMatchPrompt,
  parseMatchResponse,
  parsePatientRecord,
  type MatchResult,
  type PatientRecord,
  type ReasoningProvider,
} from "@trialmatch/match-ai";
import type { TrialSource } from "./clinicaltrials.js";
import { ConcurrencyLimiter } from "./limiter.js";

export const DEFAULT_CONCURRENCY = 4;
export const MAX_TRIALS = 50;

export interface MatchOptions {
  /** Candidates fetched from the registry, 1–50. */
  maxTrials?: number;
  /** Results scoring below this are dropped, 0–1. */
  minScore?: number;
  /** Wall-clock budget for the whole call; unfinished trials are reported as failures. */
  deadlineMs?: number;
  signal?: AbortSignal;
}

export type MatchFailureReason = "provider" | "parse" | "deadline";

export interface MatchFailure {
  nct_id: string;
  reason: MatchFailureReason;
  message: string;
}

export interface MatchOutcome {
  /** Ranked by score, highest first; ties keep registry order. */
  results: MatchResult[];
  candidates: number;
  unevaluated: number;
  filtered_out: number;
  failures: MatchFailure[];
}

type Evaluation = { ok: true; result: MatchResult } | { ok: false; failure: MatchFailure };

class DeadlineExceeded extends Error {}

/** Rejects as soon as `signal` fires; `work` keeps running but its outcome is ignored. */
function abortable<T>(work: () => Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(new DeadlineExceeded());
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new DeadlineExceeded());
    signal.addEventListener("abort", onAbort, { once: true });
    work().then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

function validateMatchOptions(condition: string, maxTrials: number, minScore: number, deadlineMs?: number): void {
  const issues: string[] = [];
  if (!condition.trim()) issues.push("condition: must not be blank");
  if (!Number.isInteger(maxTrials) || maxTrials < 1 || maxTrials > MAX_TRIALS) {
    issues.push(`maxTrials: must be an integer between 1 and ${MAX_TRIALS}`);
  }
  if (!Number.isFinite(minScore) || minScore < 0 || minScore > 1) issues.push("minScore: must be between 0 and 1");
  if (deadlineMs !== undefined && (!Number.isFinite(deadlineMs) || deadlineMs <= 0)) {
    issues.push("deadlineMs: must be a positive number");
  }
  if (issues.length > 0) throw new ValidationError(issues);
}

/**
 * Fetches candidate trials for a condition, has the reasoning backend assess each
 * one against the patient, and ranks the verdicts. Trials are evaluated
 * concurrently, bounded by a limit shared across calls on the same instance.
 */
export class TrialMatcher {
  private readonly limiter: ConcurrencyLimiter;

  constructor(
    private readonly registry: TrialSource,
    private readonly provider: ReasoningProvider,
    options: { concurrency?: number } = {}
  ) {
    this.limiter = new ConcurrencyLimiter(options.concurrency ?? DEFAULT_CONCURRENCY);
  }

  search(condition: string, maxResults?: number): Promise<Trial[]> {
    return this.registry.search(condition, maxResults ?? 20);
  }

  async match(patientInput: unknown, condition: string, options: MatchOptions = {}): Promise<MatchOutcome> {
    const { maxTrials = 10, minScore = 0, deadlineMs } = options;
    const patient = parsePatientRecord(patientInput);
    validateMatchOptions(condition, maxTrials, minScore, deadlineMs);

    const signals: AbortSignal[] = [];
    if (options.signal) signals.push(options.signal);
    if (deadlineMs !== undefined) signals.push(AbortSignal.timeout(deadlineMs));
    const signal = signals.length > 0 ? AbortSignal.any(signals) : new AbortController().signal;

    const trials = await this.searchWithin(condition, maxTrials, signal, options.signal);
    console.log(`[matcher] Evaluating ${trials.length} trials for "${condition.trim()}" with ${this.provider.model}`);

    const evaluations = await Promise.all(
      trials.map((trial) => this.evaluateWithin(patient, trial, signal, options.signal))
    );

    const scored: MatchResult[] = [];
    const failures: MatchFailure[] = [];
    for (const evaluation of evaluations) {
      if (evaluation.ok) scored.push(evaluation.result);
      else failures.push(evaluation.failure);
    }
    scored.sort((a, b) => b.score - a.score);
    const results = scored.filter((r) => r.score >= minScore);

    if (failures.length > 0) {
      console.warn(`[matcher] ${failures.length} of ${trials.length} trials could not be evaluated`);
    }
    return {
      results,
      candidates: trials.length,
      unevaluated: failures.length,
      filtered_out: scored.length - results.length,
      failures,
    };
  }

  /** Registry search bounded by the match deadline; an unfinished search is a registry failure. */
  private async searchWithin(
    condition: string,
    maxTrials: number,
    signal: AbortSignal,
    callerSignal?: AbortSignal
  ): Promise<Trial[]> {
    try {
      return await abortable(() => this.registry.search(condition, maxTrials, { signal }), signal);
    } catch (err) {
      if (!(err instanceof DeadlineExceeded) && !signal.aborted) throw err;
      const message = callerSignal?.aborted
        ? "Match aborted by caller before the trial search finished"
        : "Deadline reached before the trial search finished";
      console.warn(`[matcher] ${message}`);
      throw new RegistryUnavailableError(message, { cause: err });
    }
  }

  /** Assess one trial by NCT id. Provider and parse failures propagate. */
  async matchOne(patientInput: unknown, nctId: string): Promise<MatchResult> {
    const patient = parsePatientRecord(patientInput);
    const trial = await this.registry.getById(nctId);
    if (!trial) throw new TrialNotFoundError(nctId.trim().toUpperCase());
    return this.limiter.run(() => this.evaluate(patient, trial));
  }

  private async evaluate(patient: PatientRecord, trial: Trial, signal?: AbortSignal): Promise<MatchResult> {
    const raw = await this.provider.execute(buildMatchPrompt(patient, trial), { signal });
    return parseMatchResponse(raw, trial);
  }

  private async evaluateWithin(
    patient: PatientRecord,
    trial: Trial,
    signal: AbortSignal,
    callerSignal?: AbortSignal
  ): Promise<Evaluation> {
    try {
      const result = await abortable(
        () =>
          this.limiter.run(() => {
            if (signal.aborted) return Promise.reject(new DeadlineExceeded());
            return this.evaluate(patient, trial, signal);
          }),
        signal
      );
      return { ok: true, result };
    } catch (err) {
      const nct_id = trial.nct_id;
      if (err instanceof DeadlineExceeded || signal.aborted) {
        const message = callerSignal?.aborted ? "match aborted by caller" : "deadline reached before evaluation finished";
        return { ok: false, failure: { nct_id, reason: "deadline", message } };
      }
      if (err instanceof ProviderUnavailableError) {
        console.warn(`[matcher] Provider failed for ${nct_id}: ${err.message}`);
        return { ok: false, failure: { nct_id, reason: "provider", message: err.message } };
      }
      if (err instanceof ParseFailureError) {
        console.warn(`[matcher] Unusable response for ${nct_id}: ${err.message}`, err.excerpt);
        return { ok: false, failure: { nct_id, reason: "parse", message: err.message } };
      }
      throw err;
    }
  }
}
