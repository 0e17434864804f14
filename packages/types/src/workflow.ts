// ──────────────────────────────────────────────
// Strata - Workflow Types
// ──────────────────────────────────────────────

export const STEP_KINDS = ["retrieve", "assemble-prompt", "generate", "custom"] as const;

export type StepKind = (typeof STEP_KINDS)[number];

export interface RetryPolicy {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffCapMs: number;
}

export interface WorkflowNode {
  readonly id: string;
  readonly kind: StepKind;
  readonly dependsOn: readonly string[];
  // Dependencies whose failure leaves this node runnable with a partial input set.
  readonly optionalDependencies: readonly string[];
  readonly retryPolicy: Readonly<RetryPolicy>;
  readonly timeoutMs: number;
  readonly optional: boolean;
  readonly config: Readonly<Record<string, unknown>>;
}

export interface WorkflowEdge {
  source: string;
  target: string;
  // True when a failure of `source` does not block `target`.
  soft: boolean;
}

/** Wire format of one node in a workflow definition document. */
export interface WorkflowNodeRecord {
  id: string;
  step_kind: StepKind;
  depends_on: string[];
  retry_policy: {
    max_attempts: number;
    backoff_base: number;
    backoff_cap: number;
  };
  timeout: number;
  optional: boolean;
  optional_dependencies?: string[];
  config?: Record<string, unknown>;
}

export interface WorkflowDefinition {
  id?: string;
  allow_multiple_roots?: boolean;
  nodes: WorkflowNodeRecord[];
}

export interface GraphBuildOptions {
  workflowId?: string;
  allowMultipleRoots?: boolean;
}
