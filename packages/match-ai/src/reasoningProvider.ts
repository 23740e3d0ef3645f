export type ReasoningProviderName = "cloud" | "local";

export interface ExecuteOptions {
  /** Abandons the request; the provider rejects with ProviderUnavailableError. */
  signal?: AbortSignal;
}

/**
 * Natural-language reasoning backend. Implementations absorb their own envelope
 * format and hand back only the raw answer text.
 */
export interface ReasoningProvider {
  readonly name: ReasoningProviderName;
  readonly model: string;
  execute(prompt: string, options?: ExecuteOptions): Promise<string>;
}

export const DEFAULT_PROVIDER_TIMEOUT_MS = 120_000;
export const MAX_OUTPUT_TOKENS = 2000;

/** Per-request signal: fires on timeout or when the caller's signal fires. */
export function requestSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([timeout, signal]) : timeout;
}
