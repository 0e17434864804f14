import test from "node:test";
import assert from "node:assert/strict";
import { MemoryVectorStore } from "@strata/stores";
import { createEngine } from "./engine.js";
import { retrievalResultSchema } from "./schemas.js";
import { FakeLLM, silentLogger } from "./test-helpers.js";

const definition = {
  id: "qa",
  nodes: [
    { id: "search", step_kind: "retrieve", config: { topK: 3 } },
    {
      id: "prompt",
      step_kind: "assemble-prompt",
      depends_on: ["search"],
      config: { template: "Context:\n{{context}}\n\nQuestion: {{query}}" },
    },
    { id: "answer", step_kind: "generate", depends_on: ["prompt"] },
  ],
};

async function seededStore(): Promise<MemoryVectorStore> {
  const store = new MemoryVectorStore();
  await store.upsert("c1", [1, 0], { documentId: "guide", start: 0, end: 17, text: "Strata runs DAGs." });
  await store.upsert("c2", [0.6, 0.8], {
    documentId: "faq",
    start: 0,
    end: 20,
    text: "Retries use backoff.",
  });
  await store.upsert("c3", [0, 1], { documentId: "misc", start: 0, end: 15, text: "Unrelated note." });
  return store;
}

test("a retrieve, assemble, generate pipeline runs end to end and reuses its caches", async () => {
  const llm = new FakeLLM({ reply: () => "It retries with backoff." });
  const engine = createEngine({
    llm,
    vectorStore: await seededStore(),
    config: { minSimilarity: 0.1 },
    logger: silentLogger,
  });
  const graph = engine.buildGraph(definition);

  const first = await engine.run(graph, { query: "How do   retries work?" });

  assert.equal(first.status, "success");
  assert.equal(first.workflowId, "qa");
  const retrieval = retrievalResultSchema.parse(first.outputs["search"]);
  assert.equal(retrieval.query, "How do retries work?");
  assert.deepEqual(
    retrieval.chunks.map((chunk) => chunk.documentId),
    ["guide", "faq"]
  );
  assert.equal(retrieval.totalTokens, 10);
  assert.deepEqual(retrieval.discarded, { belowThreshold: 1, duplicates: 0, overBudget: 0 });
  assert.deepEqual(llm.prompts, [
    "Context:\n" +
      "[1] (guide:0-17, score=1.0000)\nStrata runs DAGs.\n\n" +
      "[2] (faq:0-20, score=0.6000)\nRetries use backoff.\n\n" +
      "Question: How do   retries work?",
  ]);

  const second = await engine.run(graph, { query: "How do   retries work?" });

  assert.equal(second.status, "success");
  assert.deepEqual(llm.embedded, ["How do retries work?"]);
  assert.equal(llm.prompts.length, 1);
  assert.equal(engine.embeddingCache.stats().hits, 1);
  assert.equal(engine.generationCache.stats().hits, 1);
});

test("per-run config overrides apply to that run only", async () => {
  const llm = new FakeLLM({ reply: () => "ok" });
  const engine = createEngine({
    llm,
    vectorStore: await seededStore(),
    config: { minSimilarity: 0.1 },
    logger: silentLogger,
  });
  const graph = engine.buildGraph(definition);

  const strict = await engine.run(graph, { query: "retries" }, { config: { minSimilarity: 0.7 } });

  assert.equal(strict.status, "success");
  assert.deepEqual(llm.prompts, [
    "Context:\n[1] (guide:0-17, score=1.0000)\nStrata runs DAGs.\n\nQuestion: retries",
  ]);
  assert.equal(engine.config.minSimilarity, 0.1);
});

test("an engine without a vector store rejects retrieve nodes before running", async () => {
  const engine = createEngine({ llm: new FakeLLM(), logger: silentLogger });

  assert.equal(engine.retrieval, undefined);
  await assert.rejects(
    engine.run(engine.buildGraph(definition), { query: "q" }),
    /search: retrieve step requires the "retrieval" service/
  );
});
