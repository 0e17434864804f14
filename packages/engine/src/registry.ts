// ──────────────────────────────────────────────
// Strata - Step Registry
// Registration and resolution of step implementations
// ──────────────────────────────────────────────

import type { LLMAdapter, LLMResponse, StepKind, WorkflowNode } from "@strata/types";
import type { EngineConfig, Logger } from "@strata/utils";
import { ValidationError, isNonEmptyString } from "@strata/utils";
import type { CacheLayer } from "./cache.js";
import type { RetrievalPipeline } from "./retrieval.js";

export interface StepValidationResult {
  valid: boolean;
  errors: string[];
}

export interface StepInput {
  nodeId: string;
  kind: StepKind;
  config: Readonly<Record<string, unknown>>;
  // Outputs of succeeded dependencies, keyed by dependency id.
  inputs: Readonly<Record<string, unknown>>;
  // Dependencies that failed or were skipped and are absent from `inputs`.
  missingInputs: readonly string[];
  initialInputs: Readonly<Record<string, unknown>>;
}

export interface StepServices {
  llm?: LLMAdapter;
  retrieval?: RetrievalPipeline;
  generationCache?: CacheLayer<LLMResponse>;
  config: EngineConfig;
}

export interface StepContext {
  runId: string;
  workflowId: string;
  nodeId: string;
  attempt: number;
  // Aborted on attempt timeout or run cancellation.
  signal: AbortSignal;
  logger: Logger;
  services: StepServices;
}

export interface StepDefinition {
  // Step kind for built-ins, handler name for custom steps.
  name: string;
  requires?: ReadonlyArray<Exclude<keyof StepServices, "config">>;
  validate(config: Readonly<Record<string, unknown>>): StepValidationResult;
  execute(input: StepInput, context: StepContext): Promise<unknown>;
}

export class StepRegistry {
  private readonly steps = new Map<string, StepDefinition>();

  register(step: StepDefinition): this {
    if (this.steps.has(step.name)) {
      throw new Error(`Step "${step.name}" is already registered`);
    }
    this.steps.set(step.name, step);
    return this;
  }

  resolve(name: string): StepDefinition {
    const step = this.steps.get(name);
    if (!step) {
      throw new ValidationError(
        `Unknown step "${name}". Available steps: ${this.names().join(", ")}`
      );
    }
    return step;
  }

  /**
   * Built-in kinds resolve by kind; `custom` nodes resolve through the
   * handler named in their config.
   */
  resolveForNode(node: WorkflowNode): StepDefinition {
    if (node.kind !== "custom") {
      return this.resolve(node.kind);
    }
    const handler = node.config["handler"];
    if (!isNonEmptyString(handler)) {
      throw new ValidationError(`Node "${node.id}" is a custom step without a config.handler`);
    }
    return this.resolve(handler);
  }

  has(name: string): boolean {
    return this.steps.has(name);
  }

  names(): string[] {
    return Array.from(this.steps.keys());
  }

  clear(): void {
    this.steps.clear();
  }
}
