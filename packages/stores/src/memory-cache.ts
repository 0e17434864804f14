// ──────────────────────────────────────────────
// Strata - In-Memory Cache Adapter
// ──────────────────────────────────────────────

import type { CacheAdapter } from "@strata/types";

interface StoredValue<V> {
  value: V;
  expiresAt: number;
}

export interface MemoryCacheOptions {
  maxEntries?: number;
  now?: () => number;
}

/**
 * Map-backed cache with per-entry expiry. Expired entries are evicted lazily
 * on read; when `maxEntries` is reached the oldest insertion is dropped.
 */
export class MemoryCacheAdapter<V> implements CacheAdapter<V> {
  private readonly entries = new Map<string, StoredValue<V>>();
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: MemoryCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? 10_000;
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<V | undefined> {
    const stored = this.entries.get(key);
    if (!stored) return undefined;
    if (stored.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return stored.value;
  }

  async set(key: string, value: V, ttlMs: number): Promise<void> {
    this.entries.delete(key);
    if (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
