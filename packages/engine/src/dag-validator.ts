// ──────────────────────────────────────────────
// Strata - DAG Validator
// Ensures workflow graph is a valid DAG (no cycles)
// and resolves topological execution order
// ──────────────────────────────────────────────

import type { WorkflowNode } from "@strata/types";

export interface DAGValidationResult {
  valid: boolean;
  executionOrder: string[];
  errors: string[];
  // Dependency path that closes on itself, first node repeated at the end.
  cycle: string[] | null;
}

export interface DAGValidationOptions {
  allowMultipleRoots?: boolean;
}

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;

export function validateDAG(
  nodes: readonly WorkflowNode[],
  options: DAGValidationOptions = {}
): DAGValidationResult {
  const errors: string[] = [];

  if (nodes.length === 0) {
    return invalid(["Workflow must contain at least one node"]);
  }

  const nodeIds = new Set<string>();
  for (const node of nodes) {
    if (nodeIds.has(node.id)) {
      errors.push(`Duplicate node id "${node.id}"`);
    }
    nodeIds.add(node.id);
  }

  // A cycle wins over every other problem except ambiguous ids.
  if (errors.length === 0) {
    const cycle = findCycle(nodes);
    if (cycle) {
      return {
        valid: false,
        executionOrder: [],
        errors: [
          `Workflow contains a cycle (${cycle.join(" -> ")}). Workflows must be directed acyclic graphs (DAG).`,
        ],
        cycle,
      };
    }
  }

  // Validate dependencies reference existing nodes
  for (const node of nodes) {
    const declared = new Set<string>();
    for (const dependencyId of node.dependsOn) {
      if (declared.has(dependencyId)) {
        errors.push(`Node "${node.id}" declares dependency "${dependencyId}" more than once`);
        continue;
      }
      declared.add(dependencyId);
      if (!nodeIds.has(dependencyId)) {
        errors.push(`Node "${node.id}" depends on unknown node "${dependencyId}"`);
      }
    }
    for (const optionalId of node.optionalDependencies) {
      if (!declared.has(optionalId)) {
        errors.push(
          `Node "${node.id}" marks "${optionalId}" as an optional dependency but does not depend on it`
        );
      }
    }
  }

  if (errors.length > 0) {
    return invalid(errors);
  }

  const roots = nodes.filter((node) => node.dependsOn.length === 0);
  if (roots.length > 1 && !options.allowMultipleRoots) {
    return invalid([
      `Workflow has ${roots.length} root nodes (${roots
        .map((node) => node.id)
        .join(", ")}); multiple roots must be explicitly allowed`,
    ]);
  }

  return { valid: true, executionOrder: topologicalOrder(nodes), errors: [], cycle: null };
}

function invalid(errors: string[]): DAGValidationResult {
  return { valid: false, executionOrder: [], errors, cycle: null };
}

/**
 * Three-colour depth-first search along dependency edges. Iterative so deep
 * chains do not exhaust the call stack.
 */
function findCycle(nodes: readonly WorkflowNode[]): string[] | null {
  const dependenciesById = new Map(nodes.map((node) => [node.id, node.dependsOn]));
  const color = new Map<string, number>();

  for (const start of nodes) {
    if ((color.get(start.id) ?? WHITE) !== WHITE) continue;

    const stack: Array<{ id: string; next: number }> = [{ id: start.id, next: 0 }];
    const path: string[] = [start.id];
    color.set(start.id, GRAY);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (!frame) break;
      const dependencies = dependenciesById.get(frame.id) ?? [];
      const dependencyId = dependencies[frame.next];

      if (dependencyId === undefined) {
        color.set(frame.id, BLACK);
        stack.pop();
        path.pop();
        continue;
      }

      frame.next += 1;
      const state = color.get(dependencyId) ?? WHITE;
      if (state === GRAY) {
        return [...path.slice(path.indexOf(dependencyId)), dependencyId];
      }
      if (state === WHITE) {
        color.set(dependencyId, GRAY);
        stack.push({ id: dependencyId, next: 0 });
        path.push(dependencyId);
      }
    }
  }

  return null;
}

// Kahn's algorithm; ties resolve in declaration order.
function topologicalOrder(nodes: readonly WorkflowNode[]): string[] {
  const adjacency = new Map<string, string[]>();
  const inDegree = new Map<string, number>();

  for (const node of nodes) {
    adjacency.set(node.id, []);
    inDegree.set(node.id, node.dependsOn.length);
  }
  for (const node of nodes) {
    for (const dependencyId of node.dependsOn) {
      adjacency.get(dependencyId)?.push(node.id);
    }
  }

  const queue: string[] = nodes.filter((node) => node.dependsOn.length === 0).map((node) => node.id);
  const executionOrder: string[] = [];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    executionOrder.push(current);

    for (const neighbor of adjacency.get(current) ?? []) {
      const remaining = (inDegree.get(neighbor) ?? 0) - 1;
      inDegree.set(neighbor, remaining);
      if (remaining === 0) {
        queue.push(neighbor);
      }
    }
  }

  return executionOrder;
}
