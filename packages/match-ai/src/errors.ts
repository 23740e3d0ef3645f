export type MatchingErrorCode =
  | "validation"
  | "registry_unavailable"
  | "provider_unavailable"
  | "parse_failure"
  | "trial_not_found"
  | "config";

export class MatchingError extends Error {
  readonly code: MatchingErrorCode;

  constructor(code: MatchingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed patient or request input. Raised before any network call. */
export class ValidationError extends MatchingError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("validation", `Invalid input: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class RegistryUnavailableError extends MatchingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("registry_unavailable", message, options);
  }
}

export class ProviderUnavailableError extends MatchingError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super("provider_unavailable", message, options);
    this.provider = provider;
  }
}

export class ParseFailureError extends MatchingError {
  /** Start of the unusable response, for logs. */
  readonly excerpt: string;

  constructor(message: string, raw: string) {
    super("parse_failure", message);
    this.excerpt = raw.slice(0, 500);
  }
}

export class TrialNotFoundError extends MatchingError {
  readonly nctId: string;

  constructor(nctId: string) {
    super("trial_not_found", `Trial ${nctId} not found`);
    this.nctId = nctId;
  }
}

export class ConfigError extends MatchingError {
  constructor(message: string) {
    super("config", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
