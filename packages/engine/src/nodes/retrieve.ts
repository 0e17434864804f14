// ──────────────────────────────────────────────
// Strata - RetrieveStep
// Runs the retrieval pipeline for a query
// ──────────────────────────────────────────────

import { z } from "zod";
import type { RetrievalResult } from "@strata/types";
import { ValidationError, isNonEmptyString } from "@strata/utils";
import type { StepContext, StepDefinition, StepInput } from "../registry.js";
import { textOf } from "../schemas.js";
import { parseConfig, validateWithSchema } from "./shared.js";

const retrieveConfigSchema = z
  .object({
    query: z.string().min(1).optional(),
    // Dependency whose text output is the query.
    queryFrom: z.string().min(1).optional(),
    queryKey: z.string().min(1).default("query"),
    topK: z.number().int().min(1).max(100).default(8),
    minScore: z.number().min(-1).max(1).optional(),
    tokenBudget: z.number().int().positive().optional(),
    rerank: z.boolean().optional(),
    cache: z.boolean().optional(),
  })
  .refine((config) => !(config.query && config.queryFrom), {
    message: "query and queryFrom are mutually exclusive",
    path: ["queryFrom"],
  });

type RetrieveConfig = z.infer<typeof retrieveConfigSchema>;

export const RetrieveStep = {
  name: "retrieve",
  requires: ["retrieval"] as const,

  validate(config: Readonly<Record<string, unknown>>) {
    return validateWithSchema(retrieveConfigSchema, config);
  },

  async execute(input: StepInput, context: StepContext): Promise<RetrievalResult> {
    const { retrieval, config: engineConfig } = context.services;
    if (!retrieval) {
      throw new ValidationError("retrieve step requires a retrieval pipeline");
    }

    const config = parseConfig(retrieveConfigSchema, input);
    const query = resolveQuery(config, input);
    if (!isNonEmptyString(query)) {
      throw new ValidationError(`Node "${input.nodeId}" has no query to retrieve for`);
    }

    context.logger.debug({ topK: config.topK }, "Retrieving context");
    return retrieval.retrieve(query, {
      topK: config.topK,
      minScore: config.minScore ?? engineConfig.minSimilarity,
      tokenBudget: config.tokenBudget ?? engineConfig.contextTokenBudget,
      rerank: config.rerank,
      cache: config.cache,
      signal: context.signal,
    });
  },
} satisfies StepDefinition;

function resolveQuery(config: RetrieveConfig, input: StepInput): string | undefined {
  if (config.query) return config.query;
  if (config.queryFrom) return textOf(input.inputs[config.queryFrom]);
  return textOf(input.initialInputs[config.queryKey]);
}
