export * from "./errors.js";
export * from "./patient.js";
export type { MatchResult } from "./types.js";
export { buildMatchPrompt, formatPatient, formatTrial } from "./buildMatchPrompt.js";
export {
  DEFAULT_PROVIDER_TIMEOUT_MS,
  type ExecuteOptions,
  type ReasoningProvider,
  type ReasoningProviderName,
} from "./reasoningProvider.js";
export { CloudReasoningProvider, DEFAULT_CLOUD_MODELS, createCloudModel, type CloudVendor } from "./cloudProvider.js";
export { LocalReasoningProvider } from "./localProvider.js";
export { createReasoningProvider, type ReasoningConfig } from "./createReasoningProvider.js";
export {
  EXCLUSION_VIOLATION_SCORE_CEILING,
  INELIGIBLE_SCORE_CEILING,
  SCORE_BANDS,
  extractJsonObject,
  parseMatchResponse,
} from "./parseMatchResponse.js";
