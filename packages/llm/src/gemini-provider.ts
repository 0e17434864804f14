// ──────────────────────────────────────────────
// Strata - Gemini Provider Implementation
// ──────────────────────────────────────────────

import { z } from "zod";
import type {
  LLMAdapter,
  LLMGenerationParameters,
  LLMResponse,
  LLMProviderType,
} from "@strata/types";
import { DEFAULT_LLM_OPTIONS, EMBEDDING_MODELS, PROVIDER_MODELS } from "@strata/types";
import { AdapterError, startTimer, measureDuration } from "@strata/utils";
import { postJson } from "./http.js";

const GEMINI_API_BASE = "https://generativelanguage.googleapis.com/v1beta/models";

// Map deprecated model names to their current replacements
const DEPRECATED_MODEL_MAP: Record<string, string> = {
  "gemini-pro": "gemini-2.0-flash",
  "gemini-pro-vision": "gemini-2.0-flash",
  "gemini-ultra": "gemini-2.0-flash",
};

const generateResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
      })
    )
    .optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional(),
    })
    .optional(),
});

const embedResponseSchema = z.object({
  embedding: z.object({
    values: z.array(z.number()),
  }),
});

export class GeminiProvider implements LLMAdapter {
  readonly provider: LLMProviderType = "gemini";
  readonly model: string;
  readonly embeddingModel: string;
  private readonly apiKey: string;

  constructor(apiKey: string, model?: string, embeddingModel?: string) {
    this.apiKey = apiKey;
    const requested = (model && model.trim()) || PROVIDER_MODELS.gemini;
    this.model = DEPRECATED_MODEL_MAP[requested] ?? requested;
    this.embeddingModel = embeddingModel ?? EMBEDDING_MODELS.gemini;
  }

  async generate(
    prompt: string,
    parameters: LLMGenerationParameters = {},
    signal?: AbortSignal
  ): Promise<LLMResponse> {
    const mergedOptions = { ...DEFAULT_LLM_OPTIONS, ...parameters };
    const timer = startTimer();

    const data = await postJson(
      {
        provider: this.provider,
        url: `${GEMINI_API_BASE}/${this.model}:generateContent?key=${this.apiKey}`,
        timeoutMs: mergedOptions.timeoutMs,
        signal,
        body: {
          contents: [
            {
              parts: [{ text: prompt }],
            },
          ],
          systemInstruction: mergedOptions.systemPrompt
            ? { parts: [{ text: mergedOptions.systemPrompt }] }
            : undefined,
          generationConfig: {
            maxOutputTokens: mergedOptions.maxTokens,
            temperature: mergedOptions.temperature,
          },
        },
      },
      generateResponseSchema
    );

    const content = data.candidates?.[0]?.content?.parts?.[0]?.text ?? "";
    const usage = data.usageMetadata ?? {};

    return {
      content,
      provider: this.provider,
      model: this.model,
      usage: {
        promptTokens: usage.promptTokenCount ?? 0,
        completionTokens: usage.candidatesTokenCount ?? 0,
        totalTokens: usage.totalTokenCount ?? 0,
      },
      durationMs: measureDuration(timer),
    };
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const data = await postJson(
      {
        provider: this.provider,
        url: `${GEMINI_API_BASE}/${this.embeddingModel}:embedContent?key=${this.apiKey}`,
        timeoutMs: DEFAULT_LLM_OPTIONS.timeoutMs,
        signal,
        body: {
          model: `models/${this.embeddingModel}`,
          content: { parts: [{ text }] },
        },
      },
      embedResponseSchema
    );

    if (data.embedding.values.length === 0) {
      throw new AdapterError("gemini returned an empty embedding", { provider: this.provider });
    }
    return data.embedding.values;
  }
}
