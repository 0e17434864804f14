// ──────────────────────────────────────────────
// Strata - Engine Package
// ──────────────────────────────────────────────

export { validateDAG } from "./dag-validator.js";
export type { DAGValidationResult, DAGValidationOptions } from "./dag-validator.js";
export { WorkflowGraph, buildWorkflowGraph, validateGraph } from "./graph.js";
export {
  parseWorkflowDefinition,
  loadWorkflowGraph,
  serializeWorkflowGraph,
  workflowDefinitionSchema,
  workflowNodeRecordSchema,
} from "./definition.js";
export type { ParsedWorkflowDefinition, DefinitionDefaults } from "./definition.js";
export { ExecutionContext, isTerminalStatus } from "./execution-context.js";
export { CacheLayer } from "./cache.js";
export type { CacheLayerOptions } from "./cache.js";
export {
  RetrievalPipeline,
  chunkIdentity,
  compareChunks,
  rankUnique,
  packWithinBudget,
} from "./retrieval.js";
export type { RetrievalPipelineOptions } from "./retrieval.js";
export { assemblePrompt, templatePlaceholders, formatChunks, formatHistory } from "./prompt-assembler.js";
export type { AssemblePromptInput } from "./prompt-assembler.js";
export { runNode, computeBackoffDelay } from "./node-runner.js";
export type { RunNodeParams, NodeRunOutcome, StepInvocation } from "./node-runner.js";
export { StepRegistry } from "./registry.js";
export type {
  StepDefinition,
  StepInput,
  StepContext,
  StepServices,
  StepValidationResult,
} from "./registry.js";
export { createDefaultRegistry, RetrieveStep, AssemblePromptStep, GenerateStep } from "./nodes/index.js";
export { executeWorkflow } from "./execution-engine.js";
export type { RunOptions, NodeCompletion } from "./execution-engine.js";
export { createEngine } from "./engine.js";
export type { Engine, EngineOptions, EngineRunOptions } from "./engine.js";
