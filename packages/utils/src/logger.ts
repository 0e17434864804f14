// ──────────────────────────────────────────────
// Strata - Structured Logger (Pino)
// ──────────────────────────────────────────────

import pino from "pino";
import { randomUUID } from "node:crypto";

const LOG_LEVEL = process.env["LOG_LEVEL"] ?? "info";

export type Logger = pino.Logger;

export const rootLogger = pino({
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  redact: {
    paths: ["apiKey", "authorization", "headers.authorization", "*.apiKey"],
    censor: "[REDACTED]",
  },
});

export function createLogger(module: string, extra?: Record<string, unknown>): pino.Logger {
  return rootLogger.child({ module, ...extra });
}

export function createCorrelationId(): string {
  return randomUUID();
}

export function createRunLogger(
  runId: string,
  workflowId: string,
  correlationId: string,
  parent: pino.Logger = rootLogger
): pino.Logger {
  return parent.child({
    module: "run",
    runId,
    workflowId,
    correlationId,
  });
}
