/**
 * Cloud reasoning backend through the AI SDK. The SDK unwraps the chat-completion
 * envelope, so `execute` returns the assistant text as-is.
 */

import { generateText, type LanguageModel } from "ai";
import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAI } from "@ai-sdk/openai";
import { ConfigError, ProviderUnavailableError, errorMessage } from "./errors.js";
import {
  DEFAULT_PROVIDER_TIMEOUT_MS,
  MAX_OUTPUT_TOKENS,
  requestSignal,
  type ExecuteOptions,
  type ReasoningProvider,
} from "./reasoningProvider.js";

export const DEFAULT_CLOUD_MODELS = {
  anthropic: "claude-sonnet-4-5-20250929",
  openai: "gpt-4o-mini",
} as const;

export type CloudVendor = keyof typeof DEFAULT_CLOUD_MODELS;

export function createCloudModel(vendor: CloudVendor, apiKey: string, modelId?: string): LanguageModel {
  if (!apiKey.trim()) throw new ConfigError(`An API key is required for the ${vendor} reasoning provider`);
  switch (vendor) {
    case "anthropic":
      return createAnthropic({ apiKey })(modelId ?? DEFAULT_CLOUD_MODELS.anthropic);
    case "openai":
      return createOpenAI({ apiKey })(modelId ?? DEFAULT_CLOUD_MODELS.openai);
  }
}

export interface CloudProviderOptions {
  model: LanguageModel;
  timeoutMs?: number;
  /** AI SDK retries for transient failures. */
  maxRetries?: number;
}

export class CloudReasoningProvider implements ReasoningProvider {
  readonly name = "cloud" as const;
  readonly model: string;
  private readonly languageModel: LanguageModel;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;

  constructor(options: CloudProviderOptions) {
    this.languageModel = options.model;
    this.model = options.model.modelId;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? 2;
  }

  async execute(prompt: string, options: ExecuteOptions = {}): Promise<string> {
    try {
      const { text } = await generateText({
        model: this.languageModel,
        prompt,
        temperature: 0,
        maxTokens: MAX_OUTPUT_TOKENS,
        maxRetries: this.maxRetries,
        abortSignal: requestSignal(this.timeoutMs, options.signal),
      });
      return text;
    } catch (err) {
      console.error(`[provider] ${this.model} request failed:`, errorMessage(err));
      throw new ProviderUnavailableError(this.name, `${this.model} request failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
