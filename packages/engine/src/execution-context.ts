// ──────────────────────────────────────────────
// Strata - Execution Context
// Per-run node state; terminal entries are write-once
// ──────────────────────────────────────────────

import type {
  AttemptPhase,
  ExecutionContextSnapshot,
  ExecutionEntry,
  NodeAttemptSummary,
  NodeError,
  NodeStatus,
} from "@strata/types";

const TERMINAL_STATUSES: ReadonlySet<NodeStatus> = new Set(["succeeded", "failed", "skipped"]);

export function isTerminalStatus(status: NodeStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export class ExecutionContext {
  private readonly entries = new Map<string, ExecutionEntry>();
  private readonly now: () => Date;

  constructor(nodeIds: Iterable<string>, now: () => Date = () => new Date()) {
    this.now = now;
    for (const nodeId of nodeIds) {
      this.entries.set(nodeId, {
        nodeId,
        status: "pending",
        output: undefined,
        error: null,
        attempt: 0,
        phase: "idle",
        attempts: [],
        startedAt: null,
        finishedAt: null,
      });
    }
  }

  get(nodeId: string): Readonly<ExecutionEntry> {
    return this.entry(nodeId);
  }

  status(nodeId: string): NodeStatus {
    return this.entry(nodeId).status;
  }

  isTerminal(nodeId: string): boolean {
    return isTerminalStatus(this.entry(nodeId).status);
  }

  /** Output of a succeeded node; undefined for every other status. */
  output(nodeId: string): unknown {
    const entry = this.entry(nodeId);
    return entry.status === "succeeded" ? entry.output : undefined;
  }

  terminalIds(): Set<string> {
    return this.idsWhere((entry) => isTerminalStatus(entry.status));
  }

  startedIds(): Set<string> {
    return this.idsWhere((entry) => entry.status !== "pending");
  }

  unfinishedIds(): string[] {
    return [...this.idsWhere((entry) => !isTerminalStatus(entry.status))];
  }

  markRunning(nodeId: string): void {
    const entry = this.entry(nodeId);
    if (entry.status !== "pending") {
      throw new Error(`Node "${nodeId}" cannot start from status "${entry.status}"`);
    }
    entry.status = "running";
    entry.startedAt = this.now().toISOString();
  }

  markAttempt(nodeId: string, attempt: number, phase: AttemptPhase): void {
    const entry = this.entry(nodeId);
    if (entry.status !== "running") return;
    entry.attempt = attempt;
    entry.phase = phase;
  }

  /** Returns false when the entry was already terminal and is left untouched. */
  succeed(nodeId: string, output: unknown, attempts: NodeAttemptSummary[] = []): boolean {
    return this.finish(nodeId, "succeeded", { output, attempts });
  }

  fail(nodeId: string, error: NodeError, attempts: NodeAttemptSummary[] = []): boolean {
    return this.finish(nodeId, "failed", { error, attempts });
  }

  skip(nodeId: string, error: NodeError): boolean {
    return this.finish(nodeId, "skipped", { error });
  }

  snapshot(): ExecutionContextSnapshot {
    const snapshot: ExecutionContextSnapshot = {};
    for (const [nodeId, entry] of this.entries) {
      snapshot[nodeId] = {
        ...entry,
        error: entry.error ? { ...entry.error } : null,
        attempts: entry.attempts.map((attempt) => ({ ...attempt })),
      };
    }
    return snapshot;
  }

  private finish(
    nodeId: string,
    status: "succeeded" | "failed" | "skipped",
    result: { output?: unknown; error?: NodeError; attempts?: NodeAttemptSummary[] }
  ): boolean {
    const entry = this.entry(nodeId);
    if (isTerminalStatus(entry.status)) {
      return false;
    }
    if (status !== "skipped" && entry.status !== "running") {
      throw new Error(`Node "${nodeId}" cannot finish as ${status} before it started`);
    }

    entry.status = status;
    entry.output = result.output;
    entry.error = result.error ?? null;
    entry.phase = "idle";
    if (result.attempts) {
      entry.attempts = [...result.attempts];
    }
    entry.finishedAt = this.now().toISOString();
    return true;
  }

  private entry(nodeId: string): ExecutionEntry {
    const entry = this.entries.get(nodeId);
    if (!entry) {
      throw new Error(`Node "${nodeId}" is not part of this execution`);
    }
    return entry;
  }

  private idsWhere(predicate: (entry: ExecutionEntry) => boolean): Set<string> {
    const ids = new Set<string>();
    for (const [nodeId, entry] of this.entries) {
      if (predicate(entry)) ids.add(nodeId);
    }
    return ids;
  }
}
