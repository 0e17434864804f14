// ──────────────────────────────────────────────
// Strata - Knowledge & Retrieval Types
// ──────────────────────────────────────────────

export interface ChunkRange {
  start: number;
  end: number;
}

export interface Chunk {
  documentId: string;
  range: ChunkRange;
  text: string;
  score: number;
  embedding?: number[];
}

export interface RetrievalResult {
  query: string;
  chunks: Chunk[];
  totalTokens: number;
  discarded: {
    belowThreshold: number;
    duplicates: number;
    overBudget: number;
  };
}

export interface VectorMatch {
  id: string;
  score: number;
  metadata: Record<string, unknown>;
}

export interface VectorStore {
  upsert(id: string, vector: number[], metadata: Record<string, unknown>): Promise<void>;
  query(vector: number[], k: number, signal?: AbortSignal): Promise<VectorMatch[]>;
}

/** Finer-grained scorer applied to the candidate set after the vector query. */
export interface ChunkReranker {
  rerank(query: string, chunks: Chunk[], signal?: AbortSignal): Promise<Chunk[]>;
}

export interface RetrievalOptions {
  topK: number;
  minScore?: number;
  tokenBudget?: number;
  rerank?: boolean;
  cache?: boolean;
  signal?: AbortSignal;
}
