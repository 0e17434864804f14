// ──────────────────────────────────────────────
// Strata - Step Helpers
// Config validation and prompt building shared by built-in steps
// ──────────────────────────────────────────────

import { z } from "zod";
import type {
  AssembledPrompt,
  ConversationTurn,
  PromptTemplate,
  RetrievalResult,
} from "@strata/types";
import { ValidationError, estimateTokens } from "@strata/utils";
import { assemblePrompt } from "../prompt-assembler.js";
import type { StepContext, StepInput, StepValidationResult } from "../registry.js";
import { rankUnique } from "../retrieval.js";
import { conversationHistorySchema, promptTemplateSchema, retrievalResultSchema, textOf } from "../schemas.js";

export function validateWithSchema(
  schema: z.ZodTypeAny,
  config: Readonly<Record<string, unknown>>
): StepValidationResult {
  const parsed = schema.safeParse(config);
  if (parsed.success) {
    return { valid: true, errors: [] };
  }
  return {
    valid: false,
    errors: parsed.error.issues.map(
      (issue) => `config.${issue.path.join(".") || "(root)"}: ${issue.message}`
    ),
  };
}

/** Parses config that `validate` already accepted before the run started. */
export function parseConfig<T extends z.ZodTypeAny>(
  schema: T,
  input: StepInput
): z.output<T> {
  const parsed: z.SafeParseReturnType<z.input<T>, z.output<T>> = schema.safeParse(input.config);
  if (!parsed.success) {
    throw new ValidationError(`Node "${input.nodeId}" has invalid config`, [parsed.error.message]);
  }
  return parsed.data;
}

export const promptConfigSchema = z.object({
  template: z.union([z.string().min(1), promptTemplateSchema]).optional(),
  tokenBudget: z.number().int().positive().optional(),
  historyKey: z.string().min(1).default("history"),
  variables: z.record(z.unknown()).default({}),
});

export type PromptConfig = z.infer<typeof promptConfigSchema>;

/** Every retrieval result among the available inputs, merged into one ranked, deduplicated set. */
export function collectRetrieval(input: StepInput): RetrievalResult | null {
  const results: RetrievalResult[] = [];
  for (const value of Object.values(input.inputs)) {
    const parsed = retrievalResultSchema.safeParse(value);
    if (parsed.success) results.push(parsed.data);
  }

  const [first] = results;
  if (!first) return null;
  if (results.length === 1) return first;

  const ranked = rankUnique(results.flatMap((result) => result.chunks));
  return {
    query: results.map((result) => result.query).join(" | "),
    chunks: ranked.chunks,
    totalTokens: ranked.chunks.reduce((sum, chunk) => sum + estimateTokens(chunk.text), 0),
    discarded: {
      belowThreshold: sum(results, (result) => result.discarded.belowThreshold),
      duplicates: sum(results, (result) => result.discarded.duplicates) + ranked.duplicates,
      overBudget: sum(results, (result) => result.discarded.overBudget),
    },
  };
}

export function buildPrompt(
  config: PromptConfig,
  input: StepInput,
  context: StepContext
): AssembledPrompt {
  if (config.template === undefined) {
    throw new ValidationError(`Node "${input.nodeId}" has no prompt template`);
  }

  const base =
    typeof config.template === "string"
      ? { name: input.nodeId, text: config.template, tokenBudget: undefined }
      : config.template;
  const template: PromptTemplate = {
    name: base.name,
    text: base.text,
    tokenBudget: config.tokenBudget ?? base.tokenBudget ?? context.services.config.contextTokenBudget,
  };

  return assemblePrompt({
    template,
    retrieval: collectRetrieval(input),
    history: readHistory(input, config.historyKey),
    variables: { ...input.initialInputs, ...dependencyText(input), ...config.variables },
  });
}

function readHistory(input: StepInput, historyKey: string): ConversationTurn[] {
  const raw = input.initialInputs[historyKey];
  if (raw === undefined) return [];
  const parsed = conversationHistorySchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Initial input "${historyKey}" is not a conversation history`, [
      parsed.error.message,
    ]);
  }
  return parsed.data;
}

// Text outputs of dependencies, addressable in templates by dependency id.
function dependencyText(input: StepInput): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const [dependencyId, value] of Object.entries(input.inputs)) {
    const text = textOf(value);
    if (text !== undefined) variables[dependencyId] = text;
  }
  return variables;
}

function sum<T>(items: readonly T[], pick: (item: T) => number): number {
  return items.reduce((total, item) => total + pick(item), 0);
}
