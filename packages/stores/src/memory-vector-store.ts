// ──────────────────────────────────────────────
// Strata - In-Memory Vector Store
// Exact cosine-similarity search over upserted vectors
// ──────────────────────────────────────────────

import type { VectorMatch, VectorStore } from "@strata/types";
import { AdapterError, cosineSimilarity } from "@strata/utils";

interface StoredVector {
  vector: number[];
  metadata: Record<string, unknown>;
}

export class MemoryVectorStore implements VectorStore {
  private readonly vectors = new Map<string, StoredVector>();
  private dimensions: number | null = null;

  async upsert(id: string, vector: number[], metadata: Record<string, unknown>): Promise<void> {
    if (vector.length === 0 || vector.some((value) => !Number.isFinite(value))) {
      throw new AdapterError(`Vector for "${id}" must be a non-empty list of finite numbers`, {
        provider: "memory",
      });
    }
    if (this.dimensions !== null && vector.length !== this.dimensions) {
      throw new AdapterError(
        `Vector for "${id}" has ${vector.length} dimensions, store holds ${this.dimensions}`,
        { provider: "memory" }
      );
    }
    this.dimensions = vector.length;
    this.vectors.set(id, { vector: [...vector], metadata: { ...metadata } });
  }

  async query(vector: number[], k: number): Promise<VectorMatch[]> {
    if (k <= 0) return [];
    if (this.dimensions !== null && vector.length !== this.dimensions) {
      throw new AdapterError(
        `Query vector has ${vector.length} dimensions, store holds ${this.dimensions}`,
        { provider: "memory" }
      );
    }

    const matches: VectorMatch[] = [];
    for (const [id, stored] of this.vectors) {
      matches.push({
        id,
        score: cosineSimilarity(vector, stored.vector),
        metadata: { ...stored.metadata },
      });
    }

    return matches
      .sort((a, b) => b.score - a.score || a.id.localeCompare(b.id))
      .slice(0, k);
  }

  async delete(id: string): Promise<void> {
    this.vectors.delete(id);
    if (this.vectors.size === 0) {
      this.dimensions = null;
    }
  }

  get size(): number {
    return this.vectors.size;
  }
}
