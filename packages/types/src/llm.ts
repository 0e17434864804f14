// ──────────────────────────────────────────────
// Strata - LLM Types
// ──────────────────────────────────────────────

export type LLMProviderType = "gemini" | "groq";

export interface LLMGenerationParameters {
  maxTokens?: number;
  temperature?: number;
  timeoutMs?: number;
  systemPrompt?: string;
}

export interface LLMResponse {
  content: string;
  provider: string;
  model: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  durationMs: number;
}

export interface LLMProviderConfig {
  provider: LLMProviderType;
  apiKey: string;
  model?: string;
  embeddingModel?: string;
}

/**
 * Inference and embedding capability of a language-model backend.
 * Implementations translate provider failures into TransientError / AdapterError.
 */
export interface LLMAdapter {
  readonly provider: string;
  readonly model: string;
  readonly embeddingModel: string;
  generate(
    prompt: string,
    parameters?: LLMGenerationParameters,
    signal?: AbortSignal
  ): Promise<LLMResponse>;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export const DEFAULT_LLM_OPTIONS: Required<LLMGenerationParameters> = {
  maxTokens: 2048,
  temperature: 0.7,
  timeoutMs: 30000,
  systemPrompt: "You are a helpful assistant.",
};

export const PROVIDER_MODELS: Record<LLMProviderType, string> = {
  gemini: "gemini-2.0-flash",
  groq: "llama-3.3-70b-versatile",
};

export const EMBEDDING_MODELS: Record<LLMProviderType, string> = {
  gemini: "text-embedding-004",
  groq: "unsupported",
};
