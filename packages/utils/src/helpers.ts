// ──────────────────────────────────────────────
// Strata - Utility Helpers
// ──────────────────────────────────────────────

import { randomUUID } from "node:crypto";

export function generateId(): string {
  return randomUUID();
}

/**
 * Resolves after `ms`. When `signal` aborts first the promise rejects
 * with the signal's reason and the timer is cleared.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function measureDuration(startTime: bigint): number {
  const duration = process.hrtime.bigint() - startTime;
  return Number(duration / 1_000_000n); // Convert nanoseconds to milliseconds
}

export function startTimer(): bigint {
  return process.hrtime.bigint();
}

export function sanitizeErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    // Strip potential API key leaks from error messages
    return error.message
      .replace(/key[=:]\s*["']?[a-zA-Z0-9_-]{20,}["']?/gi, "key=[REDACTED]")
      .replace(/Bearer\s+[a-zA-Z0-9._-]+/gi, "Bearer [REDACTED]");
  }
  return "An unexpected error occurred";
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

