// ──────────────────────────────────────────────
// Strata - Provider Error Translation
// Maps HTTP and network failures onto the engine's error taxonomy
// ──────────────────────────────────────────────

import { AdapterError, TransientError, classifyError } from "@strata/utils";
import type { StrataError } from "@strata/utils";

const TRANSIENT_STATUS_CODES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

/** Parses a Retry-After header given either in seconds or as an HTTP date. */
export function parseRetryAfter(header: string | null, now = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

export function errorFromStatusCode(
  provider: string,
  statusCode: number,
  body: string,
  retryAfterMs?: number
): StrataError {
  const message = `${provider} API request failed with status ${statusCode}: ${body}`;
  if (TRANSIENT_STATUS_CODES.has(statusCode)) {
    return new TransientError(message, { retryAfterMs });
  }
  return new AdapterError(message, { provider, statusCode });
}

/**
 * Classifies a failure thrown by `fetch` itself (never an HTTP status).
 * Undici reports connection failures as `TypeError: fetch failed` with the
 * socket error attached as `cause`.
 */
export function errorFromNetworkFailure(provider: string, error: unknown): StrataError {
  return classifyError(error, provider);
}
