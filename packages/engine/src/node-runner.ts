// ──────────────────────────────────────────────
// Strata - Node Runner
// One node, many attempts: timeout, classification, backoff
// ──────────────────────────────────────────────

import type { AttemptPhase, NodeAttemptSummary, RetryPolicy, WorkflowNode } from "@strata/types";
import type { Logger, StrataError } from "@strata/utils";
import {
  CancelledError,
  TransientError,
  classifyError,
  measureDuration,
  sanitizeErrorMessage,
  sleep,
  startTimer,
} from "@strata/utils";

export type StepInvocation = (attempt: number, signal: AbortSignal) => Promise<unknown>;

export interface RunNodeParams {
  node: WorkflowNode;
  invoke: StepInvocation;
  // Run-level signal; aborting it cancels the current attempt or backoff.
  signal: AbortSignal;
  logger: Logger;
  random?: () => number;
  onAttempt?: (attempt: number, phase: AttemptPhase) => void;
}

export type NodeRunOutcome =
  | { status: "succeeded"; output: unknown; error: null; attempts: NodeAttemptSummary[] }
  | { status: "failed"; output: undefined; error: StrataError; attempts: NodeAttemptSummary[] };

/**
 * Delay before the attempt after `attempt`: the capped exponential
 * `min(cap, base * 2^(attempt-1))`, jittered into its upper half. A
 * provider's retry-after hint raises the delay, still bounded by the cap.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
  error?: StrataError
): number {
  const capped = Math.min(policy.backoffCapMs, policy.backoffBaseMs * 2 ** (attempt - 1));
  const jittered = Math.round(capped / 2 + random() * (capped / 2));
  if (error instanceof TransientError && error.retryAfterMs !== null) {
    return Math.min(policy.backoffCapMs, Math.max(jittered, error.retryAfterMs));
  }
  return jittered;
}

export async function runNode(params: RunNodeParams): Promise<NodeRunOutcome> {
  const { node, signal, logger } = params;
  const random = params.random ?? Math.random;
  const { maxAttempts } = node.retryPolicy;
  const attempts: NodeAttemptSummary[] = [];
  let attempt = 0;

  while (true) {
    attempt += 1;
    params.onAttempt?.(attempt, "awaiting");
    const attemptTimer = startTimer();

    try {
      const output = await runAttempt(node, params.invoke, attempt, signal, logger);
      attempts.push({
        attempt,
        status: "succeeded",
        durationMs: measureDuration(attemptTimer),
        reason: null,
      });
      return { status: "succeeded", output, error: null, attempts };
    } catch (attemptErr) {
      const error = signal.aborted ? cancellationOf(signal) : classifyAttemptError(node, attemptErr);
      const reason = sanitizeErrorMessage(error);
      const canRetry = error.retryable && attempt < maxAttempts;

      attempts.push({
        attempt,
        status: canRetry ? "retry" : "failed",
        durationMs: measureDuration(attemptTimer),
        reason,
      });

      if (!canRetry) {
        return { status: "failed", output: undefined, error, attempts };
      }

      const delayMs = computeBackoffDelay(attempt, node.retryPolicy, random, error);
      logger.warn(
        { attempt, maxAttempts, delayMs, error: reason },
        "Node execution failed; retrying"
      );

      params.onAttempt?.(attempt, "backoff");
      try {
        await sleep(delayMs, signal);
      } catch (sleepErr) {
        const cancelled = sleepErr instanceof CancelledError ? sleepErr : cancellationOf(signal);
        return { status: "failed", output: undefined, error: cancelled, attempts };
      }
    }
  }
}

/**
 * Races one invocation against its timeout and the run signal. The step
 * receives its own signal, aborted with the losing reason; a step that
 * settles after losing is only logged.
 */
function runAttempt(
  node: WorkflowNode,
  invoke: StepInvocation,
  attempt: number,
  runSignal: AbortSignal,
  logger: Logger
): Promise<unknown> {
  if (runSignal.aborted) {
    return Promise.reject(cancellationOf(runSignal));
  }

  const controller = new AbortController();

  return new Promise<unknown>((resolve, reject) => {
    let settled = false;

    const settle = (): boolean => {
      if (settled) return false;
      settled = true;
      clearTimeout(timer);
      runSignal.removeEventListener("abort", onRunAbort);
      return true;
    };

    const onRunAbort = () => {
      if (!settle()) return;
      const reason = cancellationOf(runSignal);
      controller.abort(reason);
      reject(reason);
    };

    const timer = setTimeout(() => {
      if (!settle()) return;
      const reason = new TransientError(
        `Node "${node.id}" timed out after ${node.timeoutMs}ms (attempt ${attempt})`
      );
      controller.abort(reason);
      reject(reason);
    }, node.timeoutMs);

    runSignal.addEventListener("abort", onRunAbort, { once: true });

    Promise.resolve()
      .then(() => invoke(attempt, controller.signal))
      .then(
        (value) => {
          if (settle()) resolve(value);
        },
        (err: unknown) => {
          if (settle()) {
            reject(err);
            return;
          }
          logger.debug(
            { attempt, error: sanitizeErrorMessage(err) },
            "Abandoned attempt settled with an error"
          );
        }
      );
  });
}

/**
 * A cancellation the run did not ask for came from somewhere else, such as a
 * shared cache computation started by another node's attempt. It is retried
 * like any other transient interruption.
 */
function classifyAttemptError(node: WorkflowNode, attemptErr: unknown): StrataError {
  const error = classifyError(attemptErr, `${node.kind} step`);
  if (error instanceof CancelledError) {
    return new TransientError(`${node.kind} step was interrupted: ${error.message}`, {
      cause: error,
    });
  }
  return error;
}

function cancellationOf(signal: AbortSignal): CancelledError {
  const reason: unknown = signal.reason;
  return reason instanceof CancelledError ? reason : new CancelledError();
}
