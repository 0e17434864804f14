// ──────────────────────────────────────────────
// Strata - Groq Provider Implementation
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

const GROQ_API_BASE = "https://api.groq.com/openai/v1/chat/completions";

// Groq (OpenAI-compatible) response shape
const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      })
    )
    .optional(),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

export class GroqProvider implements LLMAdapter {
  readonly provider: LLMProviderType = "groq";
  readonly model: string;
  readonly embeddingModel = EMBEDDING_MODELS.groq;
  private readonly apiKey: string;

  constructor(apiKey: string, model?: string) {
    this.apiKey = apiKey;
    this.model = model ?? PROVIDER_MODELS.groq;
  }

  async generate(
    prompt: string,
    parameters: LLMGenerationParameters = {},
    signal?: AbortSignal
  ): Promise<LLMResponse> {
    const mergedOptions = { ...DEFAULT_LLM_OPTIONS, ...parameters };
    const timer = startTimer();

    const messages: Array<{ role: string; content: string }> = [];
    if (mergedOptions.systemPrompt) {
      messages.push({ role: "system", content: mergedOptions.systemPrompt });
    }
    messages.push({ role: "user", content: prompt });

    const data = await postJson(
      {
        provider: this.provider,
        url: GROQ_API_BASE,
        headers: { Authorization: `Bearer ${this.apiKey}` },
        timeoutMs: mergedOptions.timeoutMs,
        signal,
        body: {
          model: this.model,
          messages,
          max_tokens: mergedOptions.maxTokens,
          temperature: mergedOptions.temperature,
        },
      },
      chatCompletionSchema
    );

    const usage = data.usage ?? {};

    return {
      content: data.choices?.[0]?.message?.content ?? "",
      provider: this.provider,
      model: this.model,
      usage: {
        promptTokens: usage.prompt_tokens ?? 0,
        completionTokens: usage.completion_tokens ?? 0,
        totalTokens: usage.total_tokens ?? 0,
      },
      durationMs: measureDuration(timer),
    };
  }

  async embed(): Promise<number[]> {
    throw new AdapterError("groq does not expose an embeddings endpoint", {
      provider: this.provider,
    });
  }
}
