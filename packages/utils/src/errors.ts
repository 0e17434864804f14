// ──────────────────────────────────────────────
// Strata - Error Taxonomy
// ──────────────────────────────────────────────

import type { ErrorKind, NodeError } from "@strata/types";
import { sanitizeErrorMessage } from "./helpers.js";

export class StrataError extends Error {
  readonly kind: ErrorKind;
  readonly retryable: boolean;

  constructor(kind: ErrorKind, message: string, retryable: boolean, options?: ErrorOptions) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
    this.retryable = retryable;
  }

  toNodeError(): NodeError {
    return {
      kind: this.kind,
      message: sanitizeErrorMessage(this),
      retryable: this.retryable,
    };
  }
}

/** Malformed graph, dangling dependency, or template/placeholder mismatch. */
export class ValidationError extends StrataError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super("ValidationError", message, false, options);
    this.issues = issues;
  }
}

export class CycleDetectedError extends StrataError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super("CycleDetectedError", `Workflow contains a cycle: ${cycle.join(" -> ")}`, false);
    this.cycle = cycle;
  }
}

/** Timeout, rate limit or transient network fault. Retried per node policy. */
export class TransientError extends StrataError {
  readonly retryAfterMs: number | null;

  constructor(message: string, options?: ErrorOptions & { retryAfterMs?: number }) {
    super("TransientError", message, true, options);
    this.retryAfterMs = options?.retryAfterMs ?? null;
  }
}

/** Non-transient provider failure: malformed response, unauthorized, bad request. */
export class AdapterError extends StrataError {
  readonly provider: string | null;
  readonly statusCode: number | null;

  constructor(
    message: string,
    options?: ErrorOptions & { provider?: string; statusCode?: number }
  ) {
    super("AdapterError", message, false, options);
    this.provider = options?.provider ?? null;
    this.statusCode = options?.statusCode ?? null;
  }
}

export class BudgetExceededError extends StrataError {
  readonly required: number;
  readonly budget: number;

  constructor(required: number, budget: number, detail?: string) {
    super(
      "BudgetExceededError",
      `Prompt requires at least ${required} tokens but the budget is ${budget}` +
        (detail ? ` (${detail})` : ""),
      false
    );
    this.required = required;
    this.budget = budget;
  }
}

export class CancelledError extends StrataError {
  constructor(message = "Run was cancelled") {
    super("CancelledError", message, false);
  }
}

export class DependencyFailedError extends StrataError {
  readonly dependencyId: string;

  constructor(dependencyId: string, status: "failed" | "skipped") {
    super("DependencyFailedError", `Dependency "${dependencyId}" ${status}`, false);
    this.dependencyId = dependencyId;
  }
}

const TRANSIENT_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

const TRANSIENT_MESSAGE_PATTERN = /rate.?limit|too many requests|timed out|timeout|temporarily unavailable/i;

function readErrorCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  const code: unknown = Reflect.get(error, "code");
  if (typeof code === "string") return code;
  return error.cause === undefined ? undefined : readErrorCode(error.cause);
}

/**
 * Maps an arbitrary thrown value onto the taxonomy. Errors already in the
 * taxonomy pass through; socket failures, rate limits and timeouts become
 * TransientError; anything else is a terminal AdapterError.
 */
export function classifyError(error: unknown, source = "step"): StrataError {
  if (error instanceof StrataError) return error;

  const detail = error instanceof Error ? error.message : String(error);
  const code = readErrorCode(error);
  if (code && TRANSIENT_NETWORK_CODES.has(code)) {
    return new TransientError(`${source} network error (${code}): ${detail}`, { cause: error });
  }
  if (error instanceof TypeError && detail === "fetch failed") {
    return new TransientError(`${source} network error: ${detail}`, { cause: error });
  }
  if (error instanceof Error && (error.name === "TimeoutError" || TRANSIENT_MESSAGE_PATTERN.test(detail))) {
    return new TransientError(`${source} failed transiently: ${detail}`, { cause: error });
  }
  return new AdapterError(`${source} failed: ${detail}`, { cause: error });
}
