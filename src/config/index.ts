/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to every environment variable the service
 * reads. Parsed lazily on first `getConfig()` call and cached thereafter.
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    if (lower === "true" || lower === "1") return true;
    return Boolean(val);
  });

/**
 * Comma-separated list, blanks dropped
 */
const commaList = z
  .string()
  .transform((val) =>
    val
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const Environment = z.enum(["development", "production", "test"]);

const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const ConfigSchema = z
  .object({
    server: z.object({
      port: z.coerce.number().int().positive().default(3000),
      host: z.string().default("0.0.0.0"),
      nodeEnv: Environment.default("development"),
      bodyLimitBytes: z.coerce.number().int().positive().default(1_048_576),
    }),

    logging: z.object({
      level: LogLevel.default("info"),
    }),

    // Orchestration loop
    healing: z.object({
      maxAttempts: z.coerce.number().int().min(1).max(20).default(4),
      stagnationWarnAt: z.coerce.number().int().positive().default(2),
      stagnationStopAt: z.coerce.number().int().positive().default(3),
      storeCountsAsTerminal: booleanString.default(true),
    }),

    validation: z.object({
      boundaryTerminationEnabled: booleanString.default(true),
      strictTransformations: booleanString.default(false),
      registeredTransformations: commaList.default(""),
      fanOutThreshold: z.coerce.number().int().positive().default(2),
      fanInThreshold: z.coerce.number().int().positive().default(2),
      excessiveFanOutThreshold: z.coerce.number().int().positive().default(3),
      pipelineEdgeSlack: z.coerce.number().int().min(0).default(2),
    }),

    matrix: z.object({
      path: z.string().min(1).optional(),
    }),
  })
  .refine((cfg) => cfg.healing.stagnationWarnAt <= cfg.healing.stagnationStopAt, {
    message: "HEALING_STAGNATION_WARN_AT must not exceed HEALING_STAGNATION_STOP_AT",
    path: ["healing", "stagnationWarnAt"],
  });

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: env.PORT,
      host: env.HOST,
      nodeEnv: env.NODE_ENV,
      bodyLimitBytes: env.BODY_LIMIT_BYTES,
    },
    logging: {
      level: env.LOG_LEVEL,
    },
    healing: {
      maxAttempts: env.HEALING_MAX_ATTEMPTS,
      stagnationWarnAt: env.HEALING_STAGNATION_WARN_AT,
      stagnationStopAt: env.HEALING_STAGNATION_STOP_AT,
      storeCountsAsTerminal: env.HEAL_STORE_AS_TERMINAL,
    },
    validation: {
      boundaryTerminationEnabled: env.BOUNDARY_TERMINATION_ENABLED,
      strictTransformations: env.STRICT_TRANSFORMATIONS,
      registeredTransformations: env.REGISTERED_TRANSFORMATIONS,
      fanOutThreshold: env.PATTERN_FAN_OUT_THRESHOLD,
      fanInThreshold: env.PATTERN_FAN_IN_THRESHOLD,
      excessiveFanOutThreshold: env.EXCESSIVE_FAN_OUT_THRESHOLD,
      pipelineEdgeSlack: env.PATTERN_PIPELINE_EDGE_SLACK,
    },
    matrix: {
      path: env.CONNECTIVITY_MATRIX_PATH || undefined,
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const fields = result.error.flatten();
    throw new Error(
      `Invalid configuration. Please check environment variables: ${JSON.stringify(fields)}`
    );
  }
  return result.data;
}

let _cachedConfig: Config | null = null;

/**
 * Get configuration, parsing the environment on first access.
 */
export function getConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

export function isTest(): boolean {
  return getConfig().server.nodeEnv === "test" || Boolean(process.env.VITEST);
}
