// ──────────────────────────────────────────────
// Strata - Workflow Definition
// Parses and serializes the external node-record format
// ──────────────────────────────────────────────

import { z } from "zod";
import type { WorkflowDefinition, WorkflowNode, WorkflowNodeRecord } from "@strata/types";
import { STEP_KINDS } from "@strata/types";
import type { EngineConfig } from "@strata/utils";
import { DEFAULT_ENGINE_CONFIG, ValidationError } from "@strata/utils";
import { WorkflowGraph } from "./graph.js";

const retryPolicyRecordSchema = z
  .object({
    max_attempts: z.number().int().min(1).max(10),
    backoff_base: z.number().int().min(0),
    backoff_cap: z.number().int().min(0),
  })
  .strict()
  .refine((policy) => policy.backoff_cap >= policy.backoff_base, {
    message: "backoff_cap must be greater than or equal to backoff_base",
    path: ["backoff_cap"],
  });

export const workflowNodeRecordSchema = z
  .object({
    id: z.string().min(1).max(255),
    step_kind: z.enum(STEP_KINDS),
    depends_on: z.array(z.string().min(1)).default([]),
    retry_policy: retryPolicyRecordSchema.optional(),
    timeout: z.number().int().min(1).optional(),
    optional: z.boolean().default(false),
    optional_dependencies: z.array(z.string().min(1)).default([]),
    config: z.record(z.unknown()).default({}),
  })
  .strict();

export const workflowDefinitionSchema = z
  .object({
    id: z.string().min(1).max(255).optional(),
    allow_multiple_roots: z.boolean().default(false),
    nodes: z.array(workflowNodeRecordSchema).min(1, "At least one node is required"),
  })
  .strict();

export interface ParsedWorkflowDefinition {
  workflowId: string | undefined;
  allowMultipleRoots: boolean;
  nodes: WorkflowNode[];
}

export type DefinitionDefaults = Pick<EngineConfig, "defaultNodeTimeoutMs" | "defaultRetryPolicy">;

/**
 * Validates a definition document and fills omitted timeouts and retry
 * policies from `defaults`. Structural graph checks happen in WorkflowGraph.
 */
export function parseWorkflowDefinition(
  input: unknown,
  defaults: DefinitionDefaults = DEFAULT_ENGINE_CONFIG
): ParsedWorkflowDefinition {
  const parsed = workflowDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ValidationError(`Invalid workflow definition: ${issues.join("; ")}`, issues);
  }

  const definition = parsed.data;
  return {
    workflowId: definition.id,
    allowMultipleRoots: definition.allow_multiple_roots,
    nodes: definition.nodes.map((record) => ({
      id: record.id,
      kind: record.step_kind,
      dependsOn: record.depends_on,
      optionalDependencies: record.optional_dependencies,
      retryPolicy: record.retry_policy
        ? {
            maxAttempts: record.retry_policy.max_attempts,
            backoffBaseMs: record.retry_policy.backoff_base,
            backoffCapMs: record.retry_policy.backoff_cap,
          }
        : { ...defaults.defaultRetryPolicy },
      timeoutMs: record.timeout ?? defaults.defaultNodeTimeoutMs,
      optional: record.optional,
      config: record.config,
    })),
  };
}

export function loadWorkflowGraph(
  input: unknown,
  defaults: DefinitionDefaults = DEFAULT_ENGINE_CONFIG
): WorkflowGraph {
  const definition = parseWorkflowDefinition(input, defaults);
  return WorkflowGraph.build(definition.nodes, {
    workflowId: definition.workflowId,
    allowMultipleRoots: definition.allowMultipleRoots,
  });
}

export function serializeWorkflowGraph(graph: WorkflowGraph): WorkflowDefinition {
  return {
    id: graph.workflowId,
    allow_multiple_roots: graph.allowMultipleRoots,
    nodes: graph.nodes.map(
      (node): WorkflowNodeRecord => ({
        id: node.id,
        step_kind: node.kind,
        depends_on: [...node.dependsOn],
        retry_policy: {
          max_attempts: node.retryPolicy.maxAttempts,
          backoff_base: node.retryPolicy.backoffBaseMs,
          backoff_cap: node.retryPolicy.backoffCapMs,
        },
        timeout: node.timeoutMs,
        optional: node.optional,
        optional_dependencies: [...node.optionalDependencies],
        config: { ...node.config },
      })
    ),
  };
}
