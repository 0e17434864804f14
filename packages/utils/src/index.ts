// ──────────────────────────────────────────────
// Strata - Utils Package
// ──────────────────────────────────────────────

export { rootLogger, createLogger, createCorrelationId, createRunLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export {
  loadEngineConfig,
  resolveEngineConfig,
  engineConfigSchema,
  DEFAULT_ENGINE_CONFIG,
  getEnvAsNumber,
} from "./config.js";
export type { EngineConfig } from "./config.js";
export {
  StrataError,
  ValidationError,
  CycleDetectedError,
  TransientError,
  AdapterError,
  BudgetExceededError,
  CancelledError,
  DependencyFailedError,
  classifyError,
} from "./errors.js";
export { canonicalize, fingerprint } from "./fingerprint.js";
export { estimateTokens, normalizeText, cosineSimilarity } from "./knowledge.js";
export {
  generateId,
  sleep,
  measureDuration,
  startTimer,
  sanitizeErrorMessage,
  isNonEmptyString,
  isRecord,
} from "./helpers.js";
