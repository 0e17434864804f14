// ──────────────────────────────────────────────
// Strata - Engine
// Wires adapters, caches and config into a reusable run entry point
// ──────────────────────────────────────────────

import type {
  CacheAdapter,
  CacheEntry,
  ChunkReranker,
  LLMAdapter,
  LLMResponse,
  RunResult,
  VectorStore,
} from "@strata/types";
import type { EngineConfig, Logger } from "@strata/utils";
import { createLogger, resolveEngineConfig } from "@strata/utils";
import { MemoryCacheAdapter } from "@strata/stores";
import { CacheLayer } from "./cache.js";
import { loadWorkflowGraph } from "./definition.js";
import { executeWorkflow } from "./execution-engine.js";
import type { RunOptions } from "./execution-engine.js";
import type { WorkflowGraph } from "./graph.js";
import { createDefaultRegistry } from "./nodes/index.js";
import type { StepRegistry } from "./registry.js";
import { RetrievalPipeline } from "./retrieval.js";

export interface EngineOptions {
  llm?: LLMAdapter;
  vectorStore?: VectorStore;
  reranker?: ChunkReranker;
  embeddingCacheAdapter?: CacheAdapter<CacheEntry<number[]>>;
  generationCacheAdapter?: CacheAdapter<CacheEntry<LLMResponse>>;
  config?: Partial<EngineConfig>;
  registry?: StepRegistry;
  logger?: Logger;
}

export type EngineRunOptions = Omit<RunOptions, "config" | "registry" | "services"> & {
  // Overrides merged over the engine's config for this run only.
  config?: Partial<EngineConfig>;
};

export interface Engine {
  readonly config: EngineConfig;
  readonly registry: StepRegistry;
  readonly retrieval: RetrievalPipeline | undefined;
  readonly embeddingCache: CacheLayer<number[]>;
  readonly generationCache: CacheLayer<LLMResponse>;
  buildGraph(definition: unknown): WorkflowGraph;
  run(
    graph: WorkflowGraph,
    initialInputs?: Readonly<Record<string, unknown>>,
    options?: EngineRunOptions
  ): Promise<RunResult>;
}

export function createEngine(options: EngineOptions = {}): Engine {
  const config = resolveEngineConfig(options.config);
  const logger = options.logger ?? createLogger("engine");
  const registry = options.registry ?? createDefaultRegistry();

  const embeddingCache = new CacheLayer<number[]>({
    adapter: options.embeddingCacheAdapter ?? new MemoryCacheAdapter<CacheEntry<number[]>>(),
    namespace: "embedding",
    defaultTtlMs: config.defaultCacheTtlMs,
    logger: logger.child({ cache: "embedding" }),
  });
  const generationCache = new CacheLayer<LLMResponse>({
    adapter: options.generationCacheAdapter ?? new MemoryCacheAdapter<CacheEntry<LLMResponse>>(),
    namespace: "generation",
    defaultTtlMs: config.defaultCacheTtlMs,
    logger: logger.child({ cache: "generation" }),
  });

  const retrieval =
    options.llm && options.vectorStore
      ? new RetrievalPipeline({
          llm: options.llm,
          vectorStore: options.vectorStore,
          embeddingCache,
          reranker: options.reranker,
          minScore: config.minSimilarity,
          tokenBudget: config.contextTokenBudget,
          logger: logger.child({ module: "retrieval" }),
        })
      : undefined;

  return {
    config,
    registry,
    retrieval,
    embeddingCache,
    generationCache,

    buildGraph(definition: unknown): WorkflowGraph {
      return loadWorkflowGraph(definition, config);
    },

    run(graph, initialInputs = {}, runOptions = {}) {
      const { config: overrides, ...rest } = runOptions;
      return executeWorkflow(graph, initialInputs, {
        ...rest,
        logger: rest.logger ?? logger,
        config: overrides ? resolveEngineConfig({ ...config, ...overrides }) : config,
        registry,
        services: { llm: options.llm, retrieval, generationCache },
      });
    },
  };
}
