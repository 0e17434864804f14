// ──────────────────────────────────────────────
// Strata - Stores Package
// ──────────────────────────────────────────────

export { MemoryCacheAdapter } from "./memory-cache.js";
export type { MemoryCacheOptions } from "./memory-cache.js";
export { MemoryVectorStore } from "./memory-vector-store.js";
