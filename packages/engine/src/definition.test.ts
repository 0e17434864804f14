import test from "node:test";
import assert from "node:assert/strict";
import { CycleDetectedError, DEFAULT_ENGINE_CONFIG, ValidationError } from "@strata/utils";
import { loadWorkflowGraph, parseWorkflowDefinition, serializeWorkflowGraph } from "./definition.js";

const ragDefinition = {
  id: "rag-answer",
  nodes: [
    { id: "retrieve", step_kind: "retrieve", config: { topK: 4 } },
    {
      id: "prompt",
      step_kind: "assemble-prompt",
      depends_on: ["retrieve"],
      config: { template: "{{context}}\n\nQ: {{question}}" },
    },
    {
      id: "answer",
      step_kind: "generate",
      depends_on: ["prompt"],
      retry_policy: { max_attempts: 5, backoff_base: 100, backoff_cap: 1000 },
      timeout: 60000,
    },
  ],
};

test("parses records and fills defaults from engine config", () => {
  const parsed = parseWorkflowDefinition(ragDefinition);

  assert.equal(parsed.workflowId, "rag-answer");
  assert.equal(parsed.allowMultipleRoots, false);
  assert.deepEqual(parsed.nodes[0], {
    id: "retrieve",
    kind: "retrieve",
    dependsOn: [],
    optionalDependencies: [],
    retryPolicy: DEFAULT_ENGINE_CONFIG.defaultRetryPolicy,
    timeoutMs: DEFAULT_ENGINE_CONFIG.defaultNodeTimeoutMs,
    optional: false,
    config: { topK: 4 },
  });
  assert.deepEqual(parsed.nodes[2]?.retryPolicy, {
    maxAttempts: 5,
    backoffBaseMs: 100,
    backoffCapMs: 1000,
  });
  assert.equal(parsed.nodes[2]?.timeoutMs, 60000);
});

test("lists every schema violation with its path", () => {
  assert.throws(
    () =>
      parseWorkflowDefinition({
        nodes: [
          { id: "a", step_kind: "summarize" },
          {
            id: "b",
            step_kind: "generate",
            retry_policy: { max_attempts: 0, backoff_base: 10, backoff_cap: 10 },
          },
        ],
      }),
    (err: unknown) => {
      assert.ok(err instanceof ValidationError);
      assert.equal(err.issues.length, 2);
      assert.match(err.issues[0] ?? "", /^nodes\.0\.step_kind: /);
      assert.match(err.issues[1] ?? "", /^nodes\.1\.retry_policy\.max_attempts: /);
      return true;
    }
  );
});

test("rejects a backoff cap below the base", () => {
  assert.throws(
    () =>
      parseWorkflowDefinition({
        nodes: [
          {
            id: "a",
            step_kind: "custom",
            retry_policy: { max_attempts: 2, backoff_base: 500, backoff_cap: 100 },
          },
        ],
      }),
    (err: unknown) =>
      err instanceof ValidationError &&
      err.issues[0] ===
        "nodes.0.retry_policy.backoff_cap: backoff_cap must be greater than or equal to backoff_base"
  );
});

test("rejects an empty node list and unknown fields", () => {
  assert.throws(
    () => parseWorkflowDefinition({ nodes: [] }),
    (err: unknown) =>
      err instanceof ValidationError && err.issues[0] === "nodes: At least one node is required"
  );
  assert.throws(
    () => parseWorkflowDefinition({ nodes: [{ id: "a", step_kind: "custom", label: "x" }] }),
    ValidationError
  );
});

test("loading a cyclic definition fails before anything runs", () => {
  assert.throws(
    () =>
      loadWorkflowGraph({
        nodes: [
          { id: "a", step_kind: "custom", depends_on: ["b"] },
          { id: "b", step_kind: "custom", depends_on: ["a"] },
        ],
      }),
    CycleDetectedError
  );
});

test("serializing a loaded graph reproduces the record format", () => {
  const graph = loadWorkflowGraph(ragDefinition);
  const serialized = serializeWorkflowGraph(graph);

  assert.equal(serialized.id, "rag-answer");
  assert.deepEqual(serialized.nodes[1], {
    id: "prompt",
    step_kind: "assemble-prompt",
    depends_on: ["retrieve"],
    retry_policy: { max_attempts: 3, backoff_base: 250, backoff_cap: 5000 },
    timeout: 30000,
    optional: false,
    optional_dependencies: [],
    config: { template: "{{context}}\n\nQ: {{question}}" },
  });
  assert.deepEqual(
    loadWorkflowGraph(serialized).executionOrder,
    ["retrieve", "prompt", "answer"]
  );
});
