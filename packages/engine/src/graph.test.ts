import test from "node:test";
import assert from "node:assert/strict";
import { CycleDetectedError, ValidationError } from "@strata/utils";
import { WorkflowGraph, validateGraph } from "./graph.js";
import { node } from "./test-helpers.js";

const diamond = () => [node("a"), node("b", ["a"]), node("c", ["a"]), node("d", ["b", "c"])];

test("builds execution order, waves and dependents for a diamond", () => {
  const graph = WorkflowGraph.build(diamond(), { workflowId: "wf-diamond" });

  assert.equal(graph.workflowId, "wf-diamond");
  assert.equal(graph.size, 4);
  assert.deepEqual(graph.executionOrder, ["a", "b", "c", "d"]);
  assert.deepEqual(graph.waves, [["a"], ["b", "c"], ["d"]]);
  assert.deepEqual(graph.dependentsOf("a"), ["b", "c"]);
  assert.deepEqual(graph.transitiveDependentsOf("b"), ["d"]);
  assert.deepEqual(graph.transitiveDependentsOf("a"), ["b", "c", "d"]);
});

test("ready set only contains unstarted nodes whose dependencies completed", () => {
  const graph = WorkflowGraph.build(diamond());

  assert.deepEqual(
    graph.readySet(new Set(), new Set()).map((n) => n.id),
    ["a"]
  );
  assert.deepEqual(
    graph.readySet(new Set(["a"]), new Set(["a"])).map((n) => n.id),
    ["b", "c"]
  );
  assert.deepEqual(
    graph.readySet(new Set(["a", "b"]), new Set(["a", "b", "c"])).map((n) => n.id),
    []
  );
  assert.deepEqual(
    graph.readySet(new Set(["a", "b", "c"]), new Set(["a", "b", "c"])).map((n) => n.id),
    ["d"]
  );
});

test("rejects a cycle with the offending path", () => {
  const nodes = [node("a", ["c"]), node("b", ["a"]), node("c", ["b"])];

  assert.throws(
    () => WorkflowGraph.build(nodes),
    (err: unknown) => {
      assert.ok(err instanceof CycleDetectedError);
      assert.deepEqual(err.cycle, ["a", "c", "b", "a"]);
      assert.equal(err.message, "Workflow contains a cycle: a -> c -> b -> a");
      return true;
    }
  );
});

test("rejects a self-dependency as a cycle", () => {
  assert.throws(
    () => WorkflowGraph.build([node("a", ["a"])]),
    (err: unknown) => err instanceof CycleDetectedError && err.cycle.join(",") === "a,a"
  );
});

test("a cycle is reported even when a dependency is also dangling", () => {
  assert.throws(
    () => WorkflowGraph.build([node("a", ["b", "ghost"]), node("b", ["a"])]),
    (err: unknown) => err instanceof CycleDetectedError && err.cycle.join(",") === "a,b,a"
  );
});

test("rejects unknown dependencies and duplicate ids", () => {
  const errors = validateGraph([node("a"), node("a"), node("b", ["missing"])]);

  assert.deepEqual(errors, [
    'Duplicate node id "a"',
    'Node "b" depends on unknown node "missing"',
  ]);
  assert.throws(
    () => WorkflowGraph.build([node("a"), node("b", ["missing"])]),
    (err: unknown) =>
      err instanceof ValidationError &&
      err.message === 'Invalid workflow DAG: Node "b" depends on unknown node "missing"'
  );
});

test("optional dependencies must be declared dependencies", () => {
  const errors = validateGraph([
    node("a"),
    node("b", ["a"], { optionalDependencies: ["c"] }),
  ]);

  assert.deepEqual(errors, [
    'Node "b" marks "c" as an optional dependency but does not depend on it',
  ]);
});

test("multiple roots require an explicit opt-in", () => {
  const nodes = [node("a"), node("b"), node("c", ["a", "b"])];

  assert.deepEqual(validateGraph(nodes), [
    "Workflow has 2 root nodes (a, b); multiple roots must be explicitly allowed",
  ]);
  assert.deepEqual(validateGraph(nodes, { allowMultipleRoots: true }), []);
  assert.deepEqual(
    WorkflowGraph.build(nodes, { allowMultipleRoots: true }).waves,
    [["a", "b"], ["c"]]
  );
});

test("an empty workflow is invalid", () => {
  assert.deepEqual(validateGraph([]), ["Workflow must contain at least one node"]);
});

test("edges report soft dependencies", () => {
  const graph = WorkflowGraph.build([
    node("a"),
    node("b", ["a"], { optional: true }),
    node("c", ["a", "b"], { optionalDependencies: [] }),
    node("d", ["a", "c"], { optionalDependencies: ["a"] }),
  ]);

  assert.deepEqual(graph.edges, [
    { source: "a", target: "b", soft: false },
    { source: "a", target: "c", soft: false },
    { source: "b", target: "c", soft: true },
    { source: "a", target: "d", soft: true },
    { source: "c", target: "d", soft: false },
  ]);
});

test("nodes are frozen once built", () => {
  const graph = WorkflowGraph.build([node("a")]);
  const built = graph.getNode("a");

  assert.ok(Object.isFrozen(built));
  assert.ok(Object.isFrozen(built.dependsOn));
  assert.throws(() => graph.getNode("zzz"), ValidationError);
});
