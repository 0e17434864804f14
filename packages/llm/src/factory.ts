// ──────────────────────────────────────────────
// Strata - LLM Provider Factory
// ──────────────────────────────────────────────

import type { LLMAdapter, LLMProviderConfig } from "@strata/types";
import { ValidationError } from "@strata/utils";
import { GeminiProvider } from "./gemini-provider.js";
import { GroqProvider } from "./groq-provider.js";

export function createLLMProvider(config: LLMProviderConfig): LLMAdapter {
  switch (config.provider) {
    case "gemini":
      return new GeminiProvider(config.apiKey, config.model, config.embeddingModel);
    case "groq":
      return new GroqProvider(config.apiKey, config.model);
    default:
      throw new ValidationError(`Unsupported LLM provider: ${String(config.provider)}`);
  }
}
