import { CloudReasoningProvider, createCloudModel, type CloudVendor } from "./cloudProvider.js";
import { LocalReasoningProvider } from "./localProvider.js";
import type { ReasoningProvider } from "./reasoningProvider.js";

export type ReasoningConfig =
  | { provider: "local"; baseUrl: string; model: string; timeoutMs: number }
  | { provider: "cloud"; vendor: CloudVendor; apiKey: string; model?: string; timeoutMs: number };

/** Resolved once per process; callers only ever see the interface. */
export function createReasoningProvider(config: ReasoningConfig): ReasoningProvider {
  switch (config.provider) {
    case "local":
      return new LocalReasoningProvider({
        baseUrl: config.baseUrl,
        model: config.model,
        timeoutMs: config.timeoutMs,
      });
    case "cloud":
      return new CloudReasoningProvider({
        model: createCloudModel(config.vendor, config.apiKey, config.model),
        timeoutMs: config.timeoutMs,
      });
  }
}
