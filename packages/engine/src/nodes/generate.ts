// ──────────────────────────────────────────────
// Strata - GenerateStep
// Sends a prompt to the configured LLM adapter
// Provider-agnostic; repeated prompts are served from the generation cache
// ──────────────────────────────────────────────

import { z } from "zod";
import type { LLMResponse } from "@strata/types";
import { ValidationError, normalizeText } from "@strata/utils";
import type { StepContext, StepDefinition, StepInput } from "../registry.js";
import { assembledPromptSchema, generationParametersSchema } from "../schemas.js";
import type { PromptConfig } from "./shared.js";
import { buildPrompt, parseConfig, promptConfigSchema, validateWithSchema } from "./shared.js";

const generateConfigSchema = promptConfigSchema.extend({
  // Dependency whose output is the prompt; defaults to the first prompt-like input.
  promptFrom: z.string().min(1).optional(),
  parameters: generationParametersSchema.default({}),
  cache: z.boolean().default(true),
});

export const GenerateStep = {
  name: "generate",
  requires: ["llm"] as const,

  validate(config: Readonly<Record<string, unknown>>) {
    return validateWithSchema(generateConfigSchema, config);
  },

  async execute(input: StepInput, context: StepContext): Promise<LLMResponse> {
    const { llm, generationCache } = context.services;
    if (!llm) {
      throw new ValidationError("generate step requires an LLM adapter");
    }

    const config = parseConfig(generateConfigSchema, input);
    const prompt = resolvePrompt(config, input, context);
    const parameters = config.parameters;
    const compute = () => llm.generate(prompt, parameters, context.signal);

    if (!generationCache || !config.cache) {
      return compute();
    }

    const key = generationCache.key(
      "generate",
      llm.provider,
      llm.model,
      normalizeText(prompt),
      parameters
    );
    const response = await generationCache.getOrCompute(key, compute);
    context.logger.debug(
      { provider: response.provider, model: response.model, tokens: response.usage.totalTokens },
      "Generation complete"
    );
    return response;
  },
} satisfies StepDefinition;

function resolvePrompt(
  config: PromptConfig & { promptFrom?: string },
  input: StepInput,
  context: StepContext
): string {
  const { promptFrom } = config;
  if (promptFrom !== undefined) {
    const text = promptText(input.inputs[promptFrom]);
    if (text === undefined) {
      throw new ValidationError(`Node "${input.nodeId}" has no prompt from "${promptFrom}"`);
    }
    return text;
  }

  for (const value of Object.values(input.inputs)) {
    const text = promptText(value);
    if (text !== undefined) return text;
  }

  if (config.template !== undefined) {
    return buildPrompt(config, input, context).text;
  }
  throw new ValidationError(
    `Node "${input.nodeId}" needs a prompt dependency or a config.template`
  );
}

function promptText(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  const assembled = assembledPromptSchema.safeParse(value);
  return assembled.success ? assembled.data.text : undefined;
}
