// ──────────────────────────────────────────────
// Strata - Retrieval Pipeline
// Embed, search, threshold, rerank, dedupe, pack into a token budget
// ──────────────────────────────────────────────

import type {
  Chunk,
  ChunkReranker,
  LLMAdapter,
  RetrievalOptions,
  RetrievalResult,
  VectorMatch,
  VectorStore,
} from "@strata/types";
import type { Logger } from "@strata/utils";
import {
  AdapterError,
  ValidationError,
  createLogger,
  estimateTokens,
  normalizeText,
} from "@strata/utils";
import type { CacheLayer } from "./cache.js";
import { chunkMetadataSchema } from "./schemas.js";

export interface RetrievalPipelineOptions {
  llm: LLMAdapter;
  vectorStore: VectorStore;
  embeddingCache?: CacheLayer<number[]>;
  reranker?: ChunkReranker;
  minScore: number;
  tokenBudget: number;
  logger?: Logger;
}

export function chunkIdentity(chunk: Chunk): string {
  return `${chunk.documentId}:${chunk.range.start}:${chunk.range.end}`;
}

/** Descending score; ties broken by document then offset so the order is total. */
export function compareChunks(a: Chunk, b: Chunk): number {
  return (
    b.score - a.score ||
    a.documentId.localeCompare(b.documentId) ||
    a.range.start - b.range.start ||
    a.range.end - b.range.end
  );
}

/** Sorts, keeps the best-scored copy of each identity, and reports how many were dropped. */
export function rankUnique(chunks: readonly Chunk[]): { chunks: Chunk[]; duplicates: number } {
  const seen = new Set<string>();
  const unique: Chunk[] = [];
  for (const chunk of [...chunks].sort(compareChunks)) {
    const identity = chunkIdentity(chunk);
    if (seen.has(identity)) continue;
    seen.add(identity);
    unique.push(chunk);
  }
  return { chunks: unique, duplicates: chunks.length - unique.length };
}

/**
 * Takes chunks in order until the first one that does not fit, so the
 * result is always a prefix of the input.
 */
export function packWithinBudget(
  chunks: readonly Chunk[],
  tokenBudget: number
): { chunks: Chunk[]; totalTokens: number; overBudget: number } {
  const packed: Chunk[] = [];
  let totalTokens = 0;
  for (const chunk of chunks) {
    const tokens = estimateTokens(chunk.text);
    if (totalTokens + tokens > tokenBudget) break;
    packed.push(chunk);
    totalTokens += tokens;
  }
  return { chunks: packed, totalTokens, overBudget: chunks.length - packed.length };
}

export class RetrievalPipeline {
  private readonly llm: LLMAdapter;
  private readonly vectorStore: VectorStore;
  private readonly embeddingCache: CacheLayer<number[]> | undefined;
  private readonly reranker: ChunkReranker | undefined;
  private readonly minScore: number;
  private readonly tokenBudget: number;
  private readonly logger: Logger;

  constructor(options: RetrievalPipelineOptions) {
    this.llm = options.llm;
    this.vectorStore = options.vectorStore;
    this.embeddingCache = options.embeddingCache;
    this.reranker = options.reranker;
    this.minScore = options.minScore;
    this.tokenBudget = options.tokenBudget;
    this.logger = options.logger ?? createLogger("retrieval");
  }

  async retrieve(query: string, options: RetrievalOptions): Promise<RetrievalResult> {
    const normalized = normalizeText(query);
    if (!normalized) {
      throw new ValidationError("Retrieval query must not be empty");
    }
    if (!Number.isInteger(options.topK) || options.topK < 1) {
      throw new ValidationError(`topK must be a positive integer, got ${options.topK}`);
    }

    const minScore = options.minScore ?? this.minScore;
    const tokenBudget = options.tokenBudget ?? this.tokenBudget;

    const embedding = await this.embed(normalized, options);
    const matches = await this.vectorStore.query(embedding, options.topK, options.signal);

    const candidates = matches.map(toChunk);
    let kept = candidates.filter((chunk) => chunk.score >= minScore);
    const belowThreshold = candidates.length - kept.length;

    if (this.reranker && options.rerank !== false && kept.length > 0) {
      kept = await this.reranker.rerank(normalized, kept, options.signal);
    }

    const ranked = rankUnique(kept);
    const packed = packWithinBudget(ranked.chunks, tokenBudget);

    this.logger.debug(
      {
        topK: options.topK,
        matches: matches.length,
        kept: packed.chunks.length,
        totalTokens: packed.totalTokens,
      },
      "Retrieval complete"
    );

    return {
      query: normalized,
      chunks: packed.chunks,
      totalTokens: packed.totalTokens,
      discarded: {
        belowThreshold,
        duplicates: ranked.duplicates,
        overBudget: packed.overBudget,
      },
    };
  }

  private embed(normalized: string, options: RetrievalOptions): Promise<number[]> {
    const compute = () => this.llm.embed(normalized, options.signal);
    if (!this.embeddingCache) {
      return compute();
    }
    const key = this.embeddingCache.key(
      "embed",
      this.llm.provider,
      this.llm.embeddingModel,
      normalized
    );
    return this.embeddingCache.getOrCompute(key, compute, { bypass: options.cache === false });
  }
}

function toChunk(match: VectorMatch): Chunk {
  const metadata = chunkMetadataSchema.safeParse(match.metadata);
  if (!metadata.success) {
    throw new AdapterError(`Vector match "${match.id}" has invalid chunk metadata`, {
      provider: "vector-store",
      cause: metadata.error,
    });
  }
  return {
    documentId: metadata.data.documentId,
    range: { start: metadata.data.start, end: metadata.data.end },
    text: metadata.data.text,
    score: match.score,
  };
}
