// ──────────────────────────────────────────────
// Strata - Environment Configuration Helper
// ──────────────────────────────────────────────

import { z } from "zod";

export function getEnvAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

export const engineConfigSchema = z.object({
  maxConcurrency: z.number().int().min(1).max(256),
  defaultNodeTimeoutMs: z.number().int().min(1),
  defaultCacheTtlMs: z.number().int().min(0),
  contextTokenBudget: z.number().int().min(1),
  minSimilarity: z.number().min(-1).max(1),
  runTimeoutMs: z.number().int().min(1).nullable(),
  defaultRetryPolicy: z
    .object({
      maxAttempts: z.number().int().min(1).max(10),
      backoffBaseMs: z.number().int().min(0),
      backoffCapMs: z.number().int().min(0),
    })
    .refine((policy) => policy.backoffCapMs >= policy.backoffBaseMs, {
      message: "backoffCapMs must be greater than or equal to backoffBaseMs",
      path: ["backoffCapMs"],
    }),
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  maxConcurrency: 4,
  defaultNodeTimeoutMs: 30_000,
  defaultCacheTtlMs: 300_000,
  contextTokenBudget: 2048,
  minSimilarity: 0,
  runTimeoutMs: null,
  defaultRetryPolicy: {
    maxAttempts: 3,
    backoffBaseMs: 250,
    backoffCapMs: 5_000,
  },
};

/**
 * Validates a partial override on top of the defaults.
 * Throws with the offending paths when a value is out of range.
 */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const parsed = engineConfigSchema.safeParse({ ...DEFAULT_ENGINE_CONFIG, ...overrides });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid engine configuration: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export function loadEngineConfig(): EngineConfig {
  const runTimeout = getEnvAsNumber("STRATA_RUN_TIMEOUT_MS", 0);

  return resolveEngineConfig({
    maxConcurrency: getEnvAsNumber("STRATA_MAX_CONCURRENCY", DEFAULT_ENGINE_CONFIG.maxConcurrency),
    defaultNodeTimeoutMs: getEnvAsNumber(
      "STRATA_NODE_TIMEOUT_MS",
      DEFAULT_ENGINE_CONFIG.defaultNodeTimeoutMs
    ),
    defaultCacheTtlMs: getEnvAsNumber("STRATA_CACHE_TTL_MS", DEFAULT_ENGINE_CONFIG.defaultCacheTtlMs),
    contextTokenBudget: getEnvAsNumber(
      "STRATA_CONTEXT_TOKEN_BUDGET",
      DEFAULT_ENGINE_CONFIG.contextTokenBudget
    ),
    minSimilarity: getEnvAsNumber("STRATA_MIN_SIMILARITY", DEFAULT_ENGINE_CONFIG.minSimilarity),
    runTimeoutMs: runTimeout > 0 ? runTimeout : null,
    defaultRetryPolicy: {
      maxAttempts: getEnvAsNumber(
        "STRATA_RETRY_MAX_ATTEMPTS",
        DEFAULT_ENGINE_CONFIG.defaultRetryPolicy.maxAttempts
      ),
      backoffBaseMs: getEnvAsNumber(
        "STRATA_RETRY_BACKOFF_BASE_MS",
        DEFAULT_ENGINE_CONFIG.defaultRetryPolicy.backoffBaseMs
      ),
      backoffCapMs: getEnvAsNumber(
        "STRATA_RETRY_BACKOFF_CAP_MS",
        DEFAULT_ENGINE_CONFIG.defaultRetryPolicy.backoffCapMs
      ),
    },
  });
}
