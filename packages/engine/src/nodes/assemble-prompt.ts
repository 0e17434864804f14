// ──────────────────────────────────────────────
// Strata - AssemblePromptStep
// Renders a prompt template from retrieved context, history and inputs
// ──────────────────────────────────────────────

import type { AssembledPrompt } from "@strata/types";
import type { StepContext, StepDefinition, StepInput } from "../registry.js";
import { buildPrompt, parseConfig, promptConfigSchema, validateWithSchema } from "./shared.js";

const assemblePromptConfigSchema = promptConfigSchema.refine(
  (config) => config.template !== undefined,
  { message: "template is required", path: ["template"] }
);

export const AssemblePromptStep = {
  name: "assemble-prompt",

  validate(config: Readonly<Record<string, unknown>>) {
    return validateWithSchema(assemblePromptConfigSchema, config);
  },

  async execute(input: StepInput, context: StepContext): Promise<AssembledPrompt> {
    const config = parseConfig(assemblePromptConfigSchema, input);
    const prompt = buildPrompt(config, input, context);

    context.logger.debug(
      {
        tokenCount: prompt.tokenCount,
        droppedChunks: prompt.droppedChunks,
        droppedHistory: prompt.droppedHistory,
      },
      "Prompt assembled"
    );
    return prompt;
  },
} satisfies StepDefinition;
