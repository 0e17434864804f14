// ──────────────────────────────────────────────
// Strata - Content Fingerprints
// Stable cache keys over canonicalized inputs
// ──────────────────────────────────────────────

import { createHash } from "node:crypto";
import { isRecord } from "./helpers.js";

function canonicalValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalValue);
  }
  if (isRecord(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const entry = value[key];
      if (entry === undefined) continue;
      sorted[key] = canonicalValue(entry);
    }
    return sorted;
  }
  return value;
}

/** JSON with object keys sorted at every depth and undefined members dropped. */
export function canonicalize(value: unknown): string {
  return JSON.stringify(canonicalValue(value)) ?? "null";
}

export function fingerprint(...parts: unknown[]): string {
  return createHash("sha256").update(canonicalize(parts)).digest("hex");
}
