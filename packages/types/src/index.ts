// ──────────────────────────────────────────────
// Strata - Shared Types
// ──────────────────────────────────────────────

export * from "./workflow.js";
export * from "./execution.js";
export * from "./llm.js";
export * from "./knowledge.js";
export * from "./cache.js";
export * from "./prompt.js";
