// ──────────────────────────────────────────────
// Strata - Step Output Schemas
// Narrow untyped dependency outputs and inputs at step boundaries
// ──────────────────────────────────────────────

import { z } from "zod";

export const chunkSchema = z.object({
  documentId: z.string(),
  range: z.object({ start: z.number().int(), end: z.number().int() }),
  text: z.string(),
  score: z.number(),
  embedding: z.array(z.number()).optional(),
});

export const retrievalResultSchema = z.object({
  query: z.string(),
  chunks: z.array(chunkSchema),
  totalTokens: z.number(),
  discarded: z.object({
    belowThreshold: z.number(),
    duplicates: z.number(),
    overBudget: z.number(),
  }),
});

export const assembledPromptSchema = z.object({
  template: z.string(),
  text: z.string(),
  tokenCount: z.number(),
  includedChunks: z.number(),
  includedHistory: z.number(),
  droppedChunks: z.number(),
  droppedHistory: z.number(),
});

export const llmResponseSchema = z.object({
  content: z.string(),
  provider: z.string(),
  model: z.string(),
  usage: z.object({
    promptTokens: z.number(),
    completionTokens: z.number(),
    totalTokens: z.number(),
  }),
  durationMs: z.number(),
});

export const conversationHistorySchema = z.array(
  z.object({
    role: z.enum(["system", "user", "assistant"]),
    content: z.string(),
  })
);

export const promptTemplateSchema = z.object({
  name: z.string().min(1).default("inline"),
  text: z.string().min(1),
  tokenBudget: z.number().int().positive().optional(),
});

export const generationParametersSchema = z
  .object({
    maxTokens: z.number().int().positive().optional(),
    temperature: z.number().min(0).max(2).optional(),
    timeoutMs: z.number().int().positive().optional(),
    systemPrompt: z.string().optional(),
  })
  .strict();

// Metadata a vector match must carry to be turned into a chunk.
export const chunkMetadataSchema = z.object({
  documentId: z.string().min(1),
  start: z.number().int().min(0),
  end: z.number().int().min(0),
  text: z.string(),
});

/** Text carried by a dependency output: a plain string or a generated response. */
export function textOf(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  const response = llmResponseSchema.safeParse(value);
  return response.success ? response.data.content : undefined;
}
