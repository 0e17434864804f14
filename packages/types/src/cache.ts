// ──────────────────────────────────────────────
// Strata - Cache Types
// ──────────────────────────────────────────────

export interface CacheEntry<T> {
  readonly value: T;
  readonly createdAt: number;
  readonly ttlMs: number;
}

export interface CacheAdapter<V> {
  get(key: string): Promise<V | undefined>;
  set(key: string, value: V, ttlMs: number): Promise<void>;
  delete(key: string): Promise<void>;
}

export interface CacheOptions {
  ttlMs?: number;
  // Skip lookup, storage and coalescing for this call.
  bypass?: boolean;
}

export interface CacheStats {
  hits: number;
  misses: number;
  coalesced: number;
  computes: number;
  failures: number;
}
