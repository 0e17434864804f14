// ──────────────────────────────────────────────
// Strata - Workflow Execution Engine
// Pure domain logic, free of HTTP and framework code
// ──────────────────────────────────────────────

import type {
  ExecutionContextUpdate,
  ExecutionContextUpdateReason,
  NodeAttemptSummary,
  NodeError,
  RunFailure,
  RunResult,
  RunStatus,
  StepKind,
  TerminalNodeStatus,
  WorkflowNode,
} from "@strata/types";
import type { EngineConfig, Logger } from "@strata/utils";
import {
  CancelledError,
  DEFAULT_ENGINE_CONFIG,
  DependencyFailedError,
  ValidationError,
  classifyError,
  createCorrelationId,
  createRunLogger,
  generateId,
  measureDuration,
  sanitizeErrorMessage,
  startTimer,
} from "@strata/utils";
import { ExecutionContext } from "./execution-context.js";
import type { WorkflowGraph } from "./graph.js";
import { runNode } from "./node-runner.js";
import { createDefaultRegistry } from "./nodes/index.js";
import type { StepDefinition, StepInput, StepRegistry, StepServices } from "./registry.js";

export interface NodeCompletion {
  nodeId: string;
  kind: StepKind;
  status: TerminalNodeStatus;
  output: unknown;
  error: NodeError | null;
  attempts: NodeAttemptSummary[];
}

export interface RunOptions {
  runId?: string;
  config?: EngineConfig;
  registry?: StepRegistry;
  services?: Omit<StepServices, "config">;
  signal?: AbortSignal;
  logger?: Logger;
  // Jitter source for retry backoff.
  random?: () => number;
  onNodeStart?: (nodeId: string, kind: StepKind) => void | Promise<void>;
  onNodeComplete?: (completion: NodeCompletion) => void | Promise<void>;
  onContextUpdate?: (update: ExecutionContextUpdate) => void | Promise<void>;
}

/**
 * Runs every node of `graph` as soon as its dependencies are terminal, up
 * to `maxConcurrency` at once. A failed or skipped dependency skips its
 * dependents unless the edge is soft. Step configuration and required
 * services are checked for every node before any node runs.
 */
export async function executeWorkflow(
  graph: WorkflowGraph,
  initialInputs: Readonly<Record<string, unknown>> = {},
  options: RunOptions = {}
): Promise<RunResult> {
  const runId = options.runId ?? generateId();
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const registry = options.registry ?? createDefaultRegistry();
  const services: StepServices = { ...options.services, config };
  const correlationId = createCorrelationId();
  const logger = createRunLogger(runId, graph.workflowId, correlationId, options.logger);

  const steps = resolveSteps(graph, registry, services);

  const runTimer = startTimer();
  const context = new ExecutionContext(graph.executionOrder);
  const controller = new AbortController();
  const releaseCancellation = linkCancellation(controller, options.signal, config.runTimeoutMs);
  const cancelled = whenAborted(controller.signal);
  const inFlight = new Map<string, Promise<void>>();

  logger.info(
    { nodeCount: graph.size, maxConcurrency: config.maxConcurrency },
    "Workflow execution started"
  );
  logger.info(
    {
      waveCount: graph.waves.length,
      parallelCandidateWaves: graph.waves.filter((wave) => wave.length > 1).length,
    },
    "Execution waves planned"
  );

  const callHook = async (hook: string, call: () => void | Promise<void>): Promise<void> => {
    try {
      await call();
    } catch (err) {
      logger.warn({ hook, error: sanitizeErrorMessage(err) }, "Lifecycle hook failed");
    }
  };

  const emitContextUpdate = (reason: ExecutionContextUpdateReason, nodeId: string | null) =>
    callHook("onContextUpdate", () =>
      options.onContextUpdate?.({ reason, nodeId, state: context.snapshot() })
    );

  const notifyCompletion = async (node: WorkflowNode): Promise<void> => {
    const entry = context.get(node.id);
    if (entry.status !== "succeeded" && entry.status !== "failed" && entry.status !== "skipped") {
      return;
    }
    const completion: NodeCompletion = {
      nodeId: node.id,
      kind: node.kind,
      status: entry.status,
      output: entry.output,
      error: entry.error,
      attempts: [...entry.attempts],
    };
    await callHook("onNodeComplete", () => options.onNodeComplete?.(completion));
    await emitContextUpdate("node", node.id);
  };

  const skipNode = async (node: WorkflowNode, reason: DependencyFailedError | CancelledError) => {
    if (!context.skip(node.id, reason.toNodeError())) return;
    logger.info({ nodeId: node.id, kind: node.kind, reason: reason.message }, "Node skipped");
    await notifyCompletion(node);
  };

  const buildStepInput = (node: WorkflowNode): StepInput => {
    const inputs: Record<string, unknown> = {};
    const missingInputs: string[] = [];
    for (const dependencyId of node.dependsOn) {
      if (context.status(dependencyId) === "succeeded") {
        inputs[dependencyId] = context.output(dependencyId);
      } else {
        missingInputs.push(dependencyId);
      }
    }
    return {
      nodeId: node.id,
      kind: node.kind,
      config: node.config,
      inputs,
      missingInputs,
      initialInputs,
    };
  };

  const runNodeTask = async (node: WorkflowNode, step: StepDefinition): Promise<void> => {
    const nodeLogger = logger.child({ nodeId: node.id, kind: node.kind });
    const nodeTimer = startTimer();
    await callHook("onNodeStart", () => options.onNodeStart?.(node.id, node.kind));

    const input = buildStepInput(node);
    if (input.missingInputs.length > 0) {
      nodeLogger.info({ missingInputs: input.missingInputs }, "Running with partial inputs");
    }

    const outcome = await runNode({
      node,
      signal: controller.signal,
      logger: nodeLogger,
      random: options.random,
      onAttempt: (attempt, phase) => context.markAttempt(node.id, attempt, phase),
      invoke: (attempt, signal) =>
        step.execute(input, {
          runId,
          workflowId: graph.workflowId,
          nodeId: node.id,
          attempt,
          signal,
          logger: nodeLogger,
          services,
        }),
    });

    if (outcome.status === "succeeded") {
      if (!context.succeed(node.id, outcome.output, outcome.attempts)) return;
      nodeLogger.info(
        { durationMs: measureDuration(nodeTimer), attempts: outcome.attempts.length },
        "Node executed successfully"
      );
    } else if (controller.signal.aborted && outcome.error instanceof CancelledError) {
      // Cancelled nodes end skipped, whichever of this task and the scheduler gets there first.
      await skipNode(node, outcome.error);
      return;
    } else {
      if (!context.fail(node.id, outcome.error.toNodeError(), outcome.attempts)) return;
      nodeLogger.error(
        {
          durationMs: measureDuration(nodeTimer),
          attempts: outcome.attempts.length,
          errorKind: outcome.error.kind,
          error: sanitizeErrorMessage(outcome.error),
        },
        "Node execution failed"
      );
    }
    await notifyCompletion(node);
  };

  const dispatch = (node: WorkflowNode): void => {
    const step = steps.get(node.id);
    if (!step) {
      throw new Error(`Node "${node.id}" has no resolved step`);
    }
    context.markRunning(node.id);
    const task = runNodeTask(node, step)
      .catch(async (err: unknown) => {
        const error = classifyError(err, `${node.kind} step`);
        logger.error({ nodeId: node.id, error: sanitizeErrorMessage(error) }, "Node task crashed");
        if (context.fail(node.id, error.toNodeError())) {
          await notifyCompletion(node);
        }
      })
      .finally(() => {
        inFlight.delete(node.id);
      });
    inFlight.set(node.id, task);
  };

  // Skips blocked nodes (which may unblock further skips) and fills free slots.
  const dispatchReady = async (): Promise<void> => {
    let progressed = true;
    while (progressed && !controller.signal.aborted) {
      progressed = false;
      for (const node of graph.readySet(context.terminalIds(), context.startedIds())) {
        const blocker = findBlockingDependency(graph, context, node);
        if (blocker) {
          await skipNode(node, new DependencyFailedError(blocker.id, blocker.status));
          progressed = true;
          continue;
        }
        if (inFlight.size < config.maxConcurrency) {
          dispatch(node);
        }
      }
    }
  };

  try {
    await emitContextUpdate("init", null);

    while (!controller.signal.aborted) {
      await dispatchReady();
      if (inFlight.size === 0) break;
      await Promise.race([...inFlight.values(), cancelled.promise]);
    }

    if (controller.signal.aborted) {
      const reason = cancellationReason(controller.signal);
      logger.warn({ reason: reason.message, inFlight: inFlight.size }, "Workflow execution cancelled");
      for (const nodeId of context.unfinishedIds()) {
        await skipNode(graph.getNode(nodeId), reason);
      }
      await Promise.allSettled(inFlight.values());
    }
  } finally {
    cancelled.release();
    releaseCancellation();
  }

  const result = buildRunResult(runId, graph, context, measureDuration(runTimer));

  logger.info(
    {
      status: result.status,
      durationMs: result.durationMs,
      succeeded: Object.keys(result.outputs).length,
      failed: result.failures.filter((failure) => failure.status === "failed").length,
      skipped: result.failures.filter((failure) => failure.status === "skipped").length,
    },
    "Workflow execution finished"
  );
  await emitContextUpdate("final", null);

  return result;
}

/**
 * Resolves and validates the step of every node. Collects all problems and
 * throws one ValidationError, so nothing runs when any node is misconfigured.
 */
function resolveSteps(
  graph: WorkflowGraph,
  registry: StepRegistry,
  services: StepServices
): Map<string, StepDefinition> {
  const steps = new Map<string, StepDefinition>();
  const errors: string[] = [];

  for (const node of graph.nodes) {
    let step: StepDefinition;
    try {
      step = registry.resolveForNode(node);
    } catch (err) {
      errors.push(`${node.id}: ${sanitizeErrorMessage(err)}`);
      continue;
    }

    const validation = step.validate(node.config);
    for (const error of validation.errors) {
      errors.push(`${node.id}: ${error}`);
    }
    for (const service of step.requires ?? []) {
      if (services[service] === undefined) {
        errors.push(`${node.id}: ${step.name} step requires the "${service}" service`);
      }
    }
    steps.set(node.id, step);
  }

  if (errors.length > 0) {
    throw new ValidationError(`Workflow validation failed: ${errors.join("; ")}`, errors);
  }
  return steps;
}

// A node runs only if every failed or skipped
// dependency is soft; the first hard one in declaration order is reported.
function findBlockingDependency(
  graph: WorkflowGraph,
  context: ExecutionContext,
  node: WorkflowNode
): { id: string; status: "failed" | "skipped" } | null {
  for (const dependencyId of node.dependsOn) {
    const status = context.status(dependencyId);
    if (status !== "failed" && status !== "skipped") continue;
    if (!graph.isSoftDependency(node.id, dependencyId, status)) {
      return { id: dependencyId, status };
    }
  }
  return null;
}

function linkCancellation(
  controller: AbortController,
  signal: AbortSignal | undefined,
  runTimeoutMs: number | null
): () => void {
  const onAbort = () => controller.abort(new CancelledError("Run was cancelled"));
  if (signal?.aborted) {
    onAbort();
  } else {
    signal?.addEventListener("abort", onAbort, { once: true });
  }

  const timer =
    runTimeoutMs === null
      ? null
      : setTimeout(
          () => controller.abort(new CancelledError(`Run timed out after ${runTimeoutMs}ms`)),
          runTimeoutMs
        );

  return () => {
    signal?.removeEventListener("abort", onAbort);
    if (timer) clearTimeout(timer);
  };
}

/** Resolves once `signal` aborts; `release` detaches the listener. */
export function whenAborted(signal: AbortSignal): { promise: Promise<void>; release: () => void } {
  let onAbort: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    onAbort = resolve;
  });
  if (signal.aborted) {
    onAbort();
  } else {
    signal.addEventListener("abort", onAbort, { once: true });
  }
  return { promise, release: () => signal.removeEventListener("abort", onAbort) };
}

function cancellationReason(signal: AbortSignal): CancelledError {
  const reason: unknown = signal.reason;
  return reason instanceof CancelledError ? reason : new CancelledError();
}

function buildRunResult(
  runId: string,
  graph: WorkflowGraph,
  context: ExecutionContext,
  durationMs: number
): RunResult {
  const outputs: Record<string, unknown> = {};
  const failures: RunFailure[] = [];

  for (const nodeId of graph.executionOrder) {
    const entry = context.get(nodeId);
    if (entry.status === "succeeded") {
      outputs[nodeId] = entry.output;
    } else if (entry.status === "failed" || entry.status === "skipped") {
      failures.push({
        nodeId,
        status: entry.status,
        errorKind: entry.error?.kind ?? "AdapterError",
        message: entry.error?.message ?? "",
      });
    }
  }

  const succeeded = Object.keys(outputs).length;
  let status: RunStatus = "partial";
  if (succeeded === graph.size) status = "success";
  else if (succeeded === 0) status = "failed";

  return {
    runId,
    workflowId: graph.workflowId,
    status,
    outputs,
    failures,
    context: context.snapshot(),
    durationMs,
  };
}
