/**
 * Fetch with retries and exponential backoff for external APIs.
 * Rate limits (429) and server errors (5xx) use longer backoff; optional Retry-After header honored.
 * Other 4xx responses are returned at once, since repeating them cannot help.
 */
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_INITIAL_MS = 500;
const RATE_LIMIT_BACKOFF_MS = 2000;
const SERVER_ERROR_BACKOFF_MS = 1000;

export interface RetryConfig {
  maxRetries?: number;
  initialMs?: number;
  /** Per-attempt timeout. */
  timeoutMs?: number;
}

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || (status >= 500 && status < 600);
}

/** Resolves after `ms`, or rejects with the signal's reason once it fires. */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function fetchWithRetry(
  url: string,
  options: RequestInit = {},
  config: RetryConfig = {}
): Promise<Response> {
  const { maxRetries = DEFAULT_MAX_RETRIES, initialMs = DEFAULT_INITIAL_MS, timeoutMs } = config;
  // The caller's signal cancels the whole call, including backoff waits.
  const outer = options.signal ?? undefined;
  let lastError: Error | null = null;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    let delay = initialMs * Math.pow(2, attempt);
    try {
      const signal = timeoutMs
        ? outer
          ? AbortSignal.any([outer, AbortSignal.timeout(timeoutMs)])
          : AbortSignal.timeout(timeoutMs)
        : outer;
      const res = await fetch(url, { ...options, signal });
      if (res.ok || attempt === maxRetries || !isRetryableStatus(res.status)) return res;
      await res.body?.cancel();
      lastError = new Error(`HTTP ${res.status}`);
      delay = Math.max(delay, res.status === 429 ? RATE_LIMIT_BACKOFF_MS : SERVER_ERROR_BACKOFF_MS);
      const retryAfter = res.headers.get("Retry-After");
      if (retryAfter) {
        const sec = parseInt(retryAfter, 10);
        if (!Number.isNaN(sec)) delay = Math.max(delay, sec * 1000);
      }
    } catch (err) {
      if (outer?.aborted) throw err;
      lastError = err instanceof Error ? err : new Error(String(err));
      if (attempt === maxRetries) break;
    }
    await sleep(delay, outer);
  }
  throw lastError ?? new Error("fetch failed");
}
