// ──────────────────────────────────────────────
// Strata - Test Helpers
// In-process stand-ins shared by the engine tests
// ──────────────────────────────────────────────

import pino from "pino";
import type {
  LLMAdapter,
  LLMGenerationParameters,
  LLMResponse,
  StepKind,
  VectorMatch,
  VectorStore,
  WorkflowNode,
} from "@strata/types";
import { sleep } from "@strata/utils";
import type { StepDefinition, StepInput, StepContext } from "./registry.js";

export const silentLogger = pino({ level: "silent" });

export function node(
  id: string,
  dependsOn: string[] = [],
  overrides: Partial<WorkflowNode> = {}
): WorkflowNode {
  return {
    id,
    kind: "custom",
    dependsOn,
    optionalDependencies: [],
    retryPolicy: { maxAttempts: 1, backoffBaseMs: 0, backoffCapMs: 0 },
    timeoutMs: 1_000,
    optional: false,
    config: { handler: "echo" },
    ...overrides,
  };
}

export function builtin(
  id: string,
  kind: Exclude<StepKind, "custom">,
  dependsOn: string[] = [],
  config: Record<string, unknown> = {}
): WorkflowNode {
  return node(id, dependsOn, { kind, config });
}

export function customStep(
  name: string,
  execute: (input: StepInput, context: StepContext) => Promise<unknown>
): StepDefinition {
  return {
    name,
    validate: () => ({ valid: true, errors: [] }),
    execute,
  };
}

export interface FakeLLMOptions {
  // Embedding returned for every text.
  embedding?: number[];
  reply?: (prompt: string) => string;
  delayMs?: number;
}

export class FakeLLM implements LLMAdapter {
  readonly provider = "fake";
  readonly model = "fake-model";
  readonly embeddingModel = "fake-embedding";
  readonly prompts: string[] = [];
  readonly embedded: string[] = [];
  private readonly options: FakeLLMOptions;

  constructor(options: FakeLLMOptions = {}) {
    this.options = options;
  }

  async generate(
    prompt: string,
    _parameters?: LLMGenerationParameters,
    signal?: AbortSignal
  ): Promise<LLMResponse> {
    this.prompts.push(prompt);
    if (this.options.delayMs) {
      await sleep(this.options.delayMs, signal);
    }
    const content = this.options.reply ? this.options.reply(prompt) : `answer(${prompt.length})`;
    return {
      content,
      provider: this.provider,
      model: this.model,
      usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
      durationMs: 0,
    };
  }

  async embed(text: string): Promise<number[]> {
    this.embedded.push(text);
    return this.options.embedding ?? [1, 0];
  }
}

/** Returns the same ranked matches for every query, truncated to k. */
export class FixedVectorStore implements VectorStore {
  readonly queries: number[][] = [];
  private readonly matches: VectorMatch[];

  constructor(matches: VectorMatch[]) {
    this.matches = matches;
  }

  async upsert(): Promise<void> {
    throw new Error("FixedVectorStore is read-only");
  }

  async query(vector: number[], k: number): Promise<VectorMatch[]> {
    this.queries.push(vector);
    return this.matches.slice(0, k);
  }
}

export function match(
  id: string,
  score: number,
  documentId: string,
  start: number,
  text: string
): VectorMatch {
  return {
    id,
    score,
    metadata: { documentId, start, end: start + text.length, text },
  };
}

export function deferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
