// ──────────────────────────────────────────────
// Strata - Built-in Steps
// ──────────────────────────────────────────────

import { StepRegistry } from "../registry.js";
import { AssemblePromptStep } from "./assemble-prompt.js";
import { GenerateStep } from "./generate.js";
import { RetrieveStep } from "./retrieve.js";

/** A registry holding the built-in kinds; custom handlers are registered on top. */
export function createDefaultRegistry(): StepRegistry {
  return new StepRegistry()
    .register(RetrieveStep)
    .register(AssemblePromptStep)
    .register(GenerateStep);
}

export { RetrieveStep, AssemblePromptStep, GenerateStep };
