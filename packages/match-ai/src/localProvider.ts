/**
 * Local reasoning backend: an Ollama-compatible server on loopback. No credential,
 * no usage cost; slower, so the default timeout is generous.
 */

import { z } from "zod";
import { ProviderUnavailableError, errorMessage } from "./errors.js";
import {
  DEFAULT_PROVIDER_TIMEOUT_MS,
  MAX_OUTPUT_TOKENS,
  requestSignal,
  type ExecuteOptions,
  type ReasoningProvider,
} from "./reasoningProvider.js";

/** `/api/generate` with stream=false returns one document; the answer is its `response` field. */
const GenerateResponseSchema = z.object({
  response: z.string(),
});

export interface LocalProviderOptions {
  baseUrl: string;
  model: string;
  timeoutMs?: number;
}

export class LocalReasoningProvider implements ReasoningProvider {
  readonly name = "local" as const;
  readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: LocalProviderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
  }

  async execute(prompt: string, options: ExecuteOptions = {}): Promise<string> {
    let body: unknown;
    try {
      const res = await fetch(`${this.baseUrl}/api/generate`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model: this.model,
          prompt,
          stream: false,
          format: "json",
          options: { temperature: 0, num_predict: MAX_OUTPUT_TOKENS },
        }),
        signal: requestSignal(this.timeoutMs, options.signal),
      });
      if (!res.ok) {
        await res.body?.cancel();
        throw new ProviderUnavailableError(this.name, `Local reasoning server returned HTTP ${res.status}`);
      }
      body = await res.json();
    } catch (err) {
      if (err instanceof ProviderUnavailableError) throw err;
      console.error(`[provider] local server at ${this.baseUrl} failed:`, errorMessage(err));
      throw new ProviderUnavailableError(
        this.name,
        `Cannot reach the local reasoning server at ${this.baseUrl} (model ${this.model}): ${errorMessage(err)}`,
        { cause: err }
      );
    }

    const parsed = GenerateResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderUnavailableError(this.name, "Local reasoning server response has no text body");
    }
    return parsed.data.response;
  }
}
