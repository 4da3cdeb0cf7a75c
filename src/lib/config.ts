import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const OptimizerEnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  EXPIRY_DEFAULT_VOLATILITY: z.coerce.number().positive().default(0.3),
  EXPIRY_MAX_CANDIDATES: z.coerce.number().int().positive().default(2000),
  EXPIRY_WEIGHT_TOLERANCE: z.coerce.number().positive().max(0.5).default(0.001),
  EXPIRY_PROFILE_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(15 * 60 * 1000)
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export type OptimizerConfig = {
  logLevel: LogLevel;
  defaultVolatility: number;
  maxCandidates: number;
  weightTolerance: number;
  profileCacheTtlMs: number;
};

/**
 * Reads optimizer settings from the environment. Unset variables fall back to defaults;
 * malformed ones throw with the validation message so misconfiguration surfaces at startup.
 */
export const loadOptimizerConfig = (env: NodeJS.ProcessEnv = process.env): OptimizerConfig => {
  const parsed = OptimizerEnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid optimizer configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    logLevel: values.LOG_LEVEL,
    defaultVolatility: values.EXPIRY_DEFAULT_VOLATILITY,
    maxCandidates: values.EXPIRY_MAX_CANDIDATES,
    weightTolerance: values.EXPIRY_WEIGHT_TOLERANCE,
    profileCacheTtlMs: values.EXPIRY_PROFILE_CACHE_TTL_MS
  };
};
