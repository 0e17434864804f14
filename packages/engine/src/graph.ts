// ──────────────────────────────────────────────
// Strata - Workflow Graph
// Immutable arena of nodes keyed by id
// ──────────────────────────────────────────────

import type { GraphBuildOptions, WorkflowEdge, WorkflowNode } from "@strata/types";
import { CycleDetectedError, ValidationError, generateId } from "@strata/utils";
import { validateDAG } from "./dag-validator.js";

export class WorkflowGraph {
  readonly workflowId: string;
  readonly allowMultipleRoots: boolean;
  readonly executionOrder: readonly string[];
  readonly waves: readonly (readonly string[])[];
  private readonly nodesById: ReadonlyMap<string, WorkflowNode>;
  private readonly declarationOrder: readonly string[];
  private readonly dependentsById: ReadonlyMap<string, readonly string[]>;

  private constructor(
    workflowId: string,
    allowMultipleRoots: boolean,
    nodes: readonly WorkflowNode[],
    executionOrder: string[]
  ) {
    this.workflowId = workflowId;
    this.allowMultipleRoots = allowMultipleRoots;
    this.nodesById = new Map(nodes.map((node) => [node.id, node]));
    this.declarationOrder = Object.freeze(nodes.map((node) => node.id));
    this.executionOrder = Object.freeze(executionOrder);

    const dependents = new Map<string, string[]>(nodes.map((node) => [node.id, []]));
    for (const node of nodes) {
      for (const dependencyId of node.dependsOn) {
        dependents.get(dependencyId)?.push(node.id);
      }
    }
    this.dependentsById = dependents;
    this.waves = buildExecutionWaves(executionOrder, this.nodesById);
  }

  /**
   * Validates and freezes the node set. Throws CycleDetectedError for a cycle
   * and ValidationError for any other structural problem.
   */
  static build(nodes: readonly WorkflowNode[], options: GraphBuildOptions = {}): WorkflowGraph {
    const frozen = nodes.map(freezeNode);
    const result = validateDAG(frozen, { allowMultipleRoots: options.allowMultipleRoots });

    if (result.cycle) {
      throw new CycleDetectedError(result.cycle);
    }
    if (!result.valid) {
      throw new ValidationError(`Invalid workflow DAG: ${result.errors.join("; ")}`, result.errors);
    }

    return new WorkflowGraph(
      options.workflowId ?? generateId(),
      options.allowMultipleRoots ?? false,
      frozen,
      result.executionOrder
    );
  }

  get size(): number {
    return this.nodesById.size;
  }

  /** Nodes in declaration order. */
  get nodes(): WorkflowNode[] {
    return this.declarationOrder.map((id) => this.getNode(id));
  }

  get edges(): WorkflowEdge[] {
    const edges: WorkflowEdge[] = [];
    for (const node of this.nodes) {
      for (const dependencyId of node.dependsOn) {
        edges.push({
          source: dependencyId,
          target: node.id,
          soft: this.isSoftDependency(node.id, dependencyId),
        });
      }
    }
    return edges;
  }

  hasNode(id: string): boolean {
    return this.nodesById.has(id);
  }

  getNode(id: string): WorkflowNode {
    const node = this.nodesById.get(id);
    if (!node) {
      throw new ValidationError(`Node "${id}" not found in workflow`);
    }
    return node;
  }

  dependentsOf(id: string): readonly string[] {
    return this.dependentsById.get(id) ?? [];
  }

  transitiveDependentsOf(id: string): string[] {
    const seen = new Set<string>();
    const queue = [...this.dependentsOf(id)];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || seen.has(current)) continue;
      seen.add(current);
      queue.push(...this.dependentsOf(current));
    }
    return this.executionOrder.filter((nodeId) => seen.has(nodeId));
  }

  /**
   * A dependency is soft when its failure leaves the dependent runnable:
   * the dependent lists it as optional, or the dependency is itself optional
   * and failed on its own. An optional node that was skipped still blocks,
   * so a hard failure upstream keeps cascading through it.
   */
  isSoftDependency(
    nodeId: string,
    dependencyId: string,
    status: "failed" | "skipped" = "failed"
  ): boolean {
    const node = this.getNode(nodeId);
    if (node.optionalDependencies.includes(dependencyId)) return true;
    return status === "failed" && this.getNode(dependencyId).optional;
  }

  /** Not-yet-started nodes whose dependencies have all completed, in execution order. */
  readySet(completed: ReadonlySet<string>, started: ReadonlySet<string>): WorkflowNode[] {
    const ready: WorkflowNode[] = [];
    for (const id of this.executionOrder) {
      if (started.has(id) || completed.has(id)) continue;
      const node = this.getNode(id);
      if (node.dependsOn.every((dependencyId) => completed.has(dependencyId))) {
        ready.push(node);
      }
    }
    return ready;
  }
}

export function buildWorkflowGraph(
  nodes: readonly WorkflowNode[],
  options: GraphBuildOptions = {}
): WorkflowGraph {
  return WorkflowGraph.build(nodes, options);
}

/** Non-throwing counterpart of `build`; an empty list means the nodes form a valid graph. */
export function validateGraph(
  nodes: readonly WorkflowNode[],
  options: GraphBuildOptions = {}
): string[] {
  return validateDAG(nodes, { allowMultipleRoots: options.allowMultipleRoots }).errors;
}

function freezeNode(node: WorkflowNode): WorkflowNode {
  return Object.freeze({
    id: node.id,
    kind: node.kind,
    dependsOn: Object.freeze([...node.dependsOn]),
    optionalDependencies: Object.freeze([...node.optionalDependencies]),
    retryPolicy: Object.freeze({ ...node.retryPolicy }),
    timeoutMs: node.timeoutMs,
    optional: node.optional,
    config: Object.freeze({ ...node.config }),
  });
}

// Groups nodes by dependency depth; every wave only depends on earlier waves.
function buildExecutionWaves(
  executionOrder: readonly string[],
  nodesById: ReadonlyMap<string, WorkflowNode>
): string[][] {
  const levelByNode = new Map<string, number>();
  for (const nodeId of executionOrder) {
    let level = 0;
    for (const parentId of nodesById.get(nodeId)?.dependsOn ?? []) {
      level = Math.max(level, (levelByNode.get(parentId) ?? 0) + 1);
    }
    levelByNode.set(nodeId, level);
  }

  const wavesByLevel = new Map<number, string[]>();
  for (const nodeId of executionOrder) {
    const level = levelByNode.get(nodeId) ?? 0;
    const wave = wavesByLevel.get(level) ?? [];
    wave.push(nodeId);
    wavesByLevel.set(level, wave);
  }

  return Array.from(wavesByLevel.entries())
    .sort((a, b) => a[0] - b[0])
    .map((entry) => entry[1]);
}
