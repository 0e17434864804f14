import test from "node:test";
import assert from "node:assert/strict";
import type {
  CacheEntry,
  Chunk,
  LLMResponse,
  RetrievalResult,
  StepKind,
} from "@strata/types";
import { MemoryCacheAdapter } from "@strata/stores";
import { DEFAULT_ENGINE_CONFIG, ValidationError } from "@strata/utils";
import { CacheLayer } from "./cache.js";
import { AssemblePromptStep, GenerateStep, RetrieveStep } from "./nodes/index.js";
import type { StepContext, StepInput, StepServices } from "./registry.js";
import { RetrievalPipeline } from "./retrieval.js";
import { FakeLLM, FixedVectorStore, match, silentLogger } from "./test-helpers.js";

function stepInput(
  nodeId: string,
  kind: StepKind,
  config: Record<string, unknown>,
  inputs: Record<string, unknown> = {},
  initialInputs: Record<string, unknown> = {}
): StepInput {
  return { nodeId, kind, config, inputs, missingInputs: [], initialInputs };
}

function stepContext(services: Omit<StepServices, "config"> = {}): StepContext {
  return {
    runId: "run",
    workflowId: "wf",
    nodeId: "n",
    attempt: 1,
    signal: new AbortController().signal,
    logger: silentLogger,
    services: { ...services, config: DEFAULT_ENGINE_CONFIG },
  };
}

function chunk(documentId: string, score: number): Chunk {
  const text = documentId.repeat(2);
  return { documentId, range: { start: 0, end: text.length }, text, score };
}

function retrievalOf(query: string, chunks: Chunk[]): RetrievalResult {
  return {
    query,
    chunks,
    totalTokens: chunks.length,
    discarded: { belowThreshold: 0, duplicates: 0, overBudget: 0 },
  };
}

function response(content: string): LLMResponse {
  return {
    content,
    provider: "fake",
    model: "fake-model",
    usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
    durationMs: 0,
  };
}

test("retrieve validates its config", () => {
  assert.deepEqual(RetrieveStep.validate({ topK: 0 }), {
    valid: false,
    errors: ["config.topK: Number must be greater than or equal to 1"],
  });
  assert.deepEqual(RetrieveStep.validate({ query: "a", queryFrom: "b" }), {
    valid: false,
    errors: ["config.queryFrom: query and queryFrom are mutually exclusive"],
  });
  assert.deepEqual(RetrieveStep.validate({}), { valid: true, errors: [] });
});

test("retrieve reads its query from a dependency's generated text", async () => {
  const llm = new FakeLLM();
  const retrieval = new RetrievalPipeline({
    llm,
    vectorStore: new FixedVectorStore([match("m", 0.5, "doc", 0, "text")]),
    minScore: 0,
    tokenBudget: 100,
    logger: silentLogger,
  });

  const result = await RetrieveStep.execute(
    stepInput("r", "retrieve", { queryFrom: "rewrite" }, { rewrite: response("rewritten  query") }),
    stepContext({ retrieval })
  );

  assert.deepEqual(llm.embedded, ["rewritten query"]);
  assert.deepEqual(result, {
    query: "rewritten query",
    chunks: [{ documentId: "doc", range: { start: 0, end: 4 }, text: "text", score: 0.5 }],
    totalTokens: 1,
    discarded: { belowThreshold: 0, duplicates: 0, overBudget: 0 },
  });
});

test("retrieve without any query fails validation at run time", async () => {
  const retrieval = new RetrievalPipeline({
    llm: new FakeLLM(),
    vectorStore: new FixedVectorStore([]),
    minScore: 0,
    tokenBudget: 100,
    logger: silentLogger,
  });

  await assert.rejects(
    RetrieveStep.execute(stepInput("r", "retrieve", {}), stepContext({ retrieval })),
    (err: unknown) =>
      err instanceof ValidationError && err.message === 'Node "r" has no query to retrieve for'
  );
});

test("assemble-prompt requires a template", () => {
  assert.deepEqual(AssemblePromptStep.validate({}), {
    valid: false,
    errors: ["config.template: template is required"],
  });
});

test("assemble-prompt merges every retrieval input into one ranked context", async () => {
  const prompt = await AssemblePromptStep.execute(
    stepInput(
      "p",
      "assemble-prompt",
      { template: "{{context}}" },
      {
        first: retrievalOf("q1", [chunk("x", 0.9), chunk("y", 0.5)]),
        second: retrievalOf("q2", [chunk("x", 0.7), chunk("z", 0.8)]),
      }
    ),
    stepContext()
  );

  assert.deepEqual(prompt, {
    template: "p",
    text:
      "[1] (x:0-2, score=0.9000)\nxx\n\n" +
      "[2] (z:0-2, score=0.8000)\nzz\n\n" +
      "[3] (y:0-2, score=0.5000)\nyy",
    tokenCount: 22,
    includedChunks: 3,
    includedHistory: 0,
    droppedChunks: 0,
    droppedHistory: 0,
  });
});

test("assemble-prompt exposes dependency text, initial inputs and history", async () => {
  const prompt = await AssemblePromptStep.execute(
    stepInput(
      "p",
      "assemble-prompt",
      { template: "{{history}}|{{draft}}|{{topic}}|{{tone}}", variables: { tone: "dry" } },
      { draft: "first draft" },
      { topic: "graphs", history: [{ role: "user", content: "hey" }] }
    ),
    stepContext()
  );

  assert.equal(prompt.text, "user: hey|first draft|graphs|dry");
});

test("assemble-prompt rejects a malformed history input", async () => {
  await assert.rejects(
    AssemblePromptStep.execute(
      stepInput("p", "assemble-prompt", { template: "{{history}}" }, {}, { history: "not turns" }),
      stepContext()
    ),
    (err: unknown) =>
      err instanceof ValidationError &&
      err.message === 'Initial input "history" is not a conversation history'
  );
});

test("generate uses the first assembled prompt and caches the response", async () => {
  const llm = new FakeLLM({ reply: (prompt) => `echo: ${prompt}` });
  const generationCache = new CacheLayer<LLMResponse>({
    adapter: new MemoryCacheAdapter<CacheEntry<LLMResponse>>(),
    namespace: "generation",
    defaultTtlMs: 60_000,
    logger: silentLogger,
  });
  const assembled = {
    template: "t",
    text: "Explain DAGs",
    tokenCount: 3,
    includedChunks: 0,
    includedHistory: 0,
    droppedChunks: 0,
    droppedHistory: 0,
  };
  const input = stepInput("g", "generate", {}, { prompt: assembled });

  const first = await GenerateStep.execute(input, stepContext({ llm, generationCache }));
  const second = await GenerateStep.execute(input, stepContext({ llm, generationCache }));

  assert.deepEqual(first, second);
  assert.deepEqual(llm.prompts, ["Explain DAGs"]);

  await GenerateStep.execute(
    stepInput("g", "generate", { cache: false }, { prompt: assembled }),
    stepContext({ llm, generationCache })
  );
  assert.equal(llm.prompts.length, 2);
});

test("generate can assemble its own template", async () => {
  const llm = new FakeLLM();

  await GenerateStep.execute(
    stepInput("g", "generate", { template: "Say {{word}}" }, {}, { word: "hi" }),
    stepContext({ llm })
  );

  assert.deepEqual(llm.prompts, ["Say hi"]);
});

test("generate without a prompt source is a validation error", async () => {
  await assert.rejects(
    GenerateStep.execute(stepInput("g", "generate", {}), stepContext({ llm: new FakeLLM() })),
    (err: unknown) =>
      err instanceof ValidationError &&
      err.message === 'Node "g" needs a prompt dependency or a config.template'
  );
});

test("generate rejects unknown generation parameters", () => {
  const result = GenerateStep.validate({ parameters: { topP: 0.5 } });

  assert.equal(result.valid, false);
  assert.equal(result.errors.length, 1);
});
