// ──────────────────────────────────────────────
// Strata - Cache Layer
// Content-addressed get-or-compute with per-key call coalescing
// ──────────────────────────────────────────────

import type { CacheAdapter, CacheEntry, CacheOptions, CacheStats } from "@strata/types";
import type { Logger } from "@strata/utils";
import { createLogger, fingerprint, sanitizeErrorMessage } from "@strata/utils";

export interface CacheLayerOptions<T> {
  adapter: CacheAdapter<CacheEntry<T>>;
  // Prefix that keeps several layers apart on one adapter.
  namespace: string;
  defaultTtlMs: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * At most one computation per key is in flight; concurrent callers for the
 * same key share its promise, value or error alike. A failed computation
 * evicts the key so the next caller computes again.
 */
export class CacheLayer<T> {
  private readonly adapter: CacheAdapter<CacheEntry<T>>;
  private readonly namespace: string;
  private readonly defaultTtlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly inFlight = new Map<string, Promise<T>>();
  private readonly counters: CacheStats = {
    hits: 0,
    misses: 0,
    coalesced: 0,
    computes: 0,
    failures: 0,
  };

  constructor(options: CacheLayerOptions<T>) {
    this.adapter = options.adapter;
    this.namespace = options.namespace;
    this.defaultTtlMs = options.defaultTtlMs;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger("cache", { namespace: options.namespace });
  }

  /** Stable key over canonicalized request inputs. */
  key(...parts: unknown[]): string {
    return fingerprint(...parts);
  }

  getOrCompute(key: string, compute: () => Promise<T>, options: CacheOptions = {}): Promise<T> {
    if (options.bypass) {
      this.counters.computes += 1;
      return compute();
    }

    const storageKey = this.storageKey(key);
    const pending = this.inFlight.get(storageKey);
    if (pending) {
      this.counters.coalesced += 1;
      return pending;
    }

    const ttlMs = options.ttlMs ?? this.defaultTtlMs;
    // The claim is taken synchronously, before the first await.
    const claim: Promise<T> = (async () => {
      try {
        return await this.lookupOrCompute(storageKey, compute, ttlMs);
      } finally {
        if (this.inFlight.get(storageKey) === claim) {
          this.inFlight.delete(storageKey);
        }
      }
    })();
    this.inFlight.set(storageKey, claim);
    return claim;
  }

  async invalidate(key: string): Promise<void> {
    await this.adapter.delete(this.storageKey(key));
  }

  isComputing(key: string): boolean {
    return this.inFlight.has(this.storageKey(key));
  }

  stats(): CacheStats {
    return { ...this.counters };
  }

  private async lookupOrCompute(
    storageKey: string,
    compute: () => Promise<T>,
    ttlMs: number
  ): Promise<T> {
    const cached = await this.adapter.get(storageKey);
    if (cached && this.isLive(cached)) {
      this.counters.hits += 1;
      return cached.value;
    }
    if (cached) {
      await this.adapter.delete(storageKey);
    }

    this.counters.misses += 1;
    this.counters.computes += 1;

    let value: T;
    try {
      value = await compute();
    } catch (err) {
      this.counters.failures += 1;
      await this.evictAfterFailure(storageKey, err);
      throw err;
    }

    if (ttlMs > 0) {
      const entry: CacheEntry<T> = Object.freeze({ value, createdAt: this.now(), ttlMs });
      try {
        await this.adapter.set(storageKey, entry, ttlMs);
      } catch (err) {
        this.logger.warn(
          { key: storageKey, error: sanitizeErrorMessage(err) },
          "Cache write failed; returning computed value uncached"
        );
      }
    }
    return value;
  }

  private async evictAfterFailure(storageKey: string, cause: unknown): Promise<void> {
    this.logger.debug({ key: storageKey, error: sanitizeErrorMessage(cause) }, "Cache compute failed");
    try {
      await this.adapter.delete(storageKey);
    } catch (err) {
      this.logger.warn(
        { key: storageKey, error: sanitizeErrorMessage(err) },
        "Cache eviction after failed compute failed"
      );
    }
  }

  private isLive(entry: CacheEntry<T>): boolean {
    return this.now() - entry.createdAt < entry.ttlMs;
  }

  private storageKey(key: string): string {
    return `${this.namespace}:${key}`;
  }
}
