// ──────────────────────────────────────────────
// Strata - Execution Types
// ──────────────────────────────────────────────

export type NodeStatus = "pending" | "running" | "succeeded" | "failed" | "skipped";
export type TerminalNodeStatus = "succeeded" | "failed" | "skipped";
export type RunStatus = "success" | "partial" | "failed";

// "awaiting" while an attempt is suspended on its step, "backoff" between attempts.
export type AttemptPhase = "idle" | "awaiting" | "backoff";

export type ErrorKind =
  | "ValidationError"
  | "CycleDetectedError"
  | "TransientError"
  | "AdapterError"
  | "BudgetExceededError"
  | "CancelledError"
  | "DependencyFailedError";

export interface NodeError {
  kind: ErrorKind;
  message: string;
  retryable: boolean;
}

export interface ExecutionEntry {
  nodeId: string;
  status: NodeStatus;
  output: unknown;
  error: NodeError | null;
  attempt: number;
  phase: AttemptPhase;
  attempts: NodeAttemptSummary[];
  startedAt: string | null;
  finishedAt: string | null;
}

export type ExecutionContextSnapshot = Record<string, ExecutionEntry>;

export interface RunFailure {
  nodeId: string;
  status: "failed" | "skipped";
  errorKind: ErrorKind;
  message: string;
}

export interface RunResult {
  runId: string;
  workflowId: string;
  status: RunStatus;
  outputs: Record<string, unknown>;
  failures: RunFailure[];
  context: ExecutionContextSnapshot;
  durationMs: number;
}

export type ExecutionContextUpdateReason = "init" | "node" | "final";

export interface ExecutionContextUpdate {
  reason: ExecutionContextUpdateReason;
  nodeId: string | null;
  state: ExecutionContextSnapshot;
}

export interface NodeAttemptSummary {
  attempt: number;
  status: "succeeded" | "retry" | "failed";
  durationMs: number;
  reason: string | null;
}
