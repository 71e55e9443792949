/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger redaction paths.
 * Used by both server.ts (Fastify) and telemetry.ts (standalone Pino).
 *
 * SECURITY: blueprint bodies can carry arbitrary user-authored policy
 * blocks, so they are redacted along with credentials and auth headers.
 */

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  // Auth secrets (at any depth)
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.authorization",
  "*.credentials",

  // Headers
  "*.headers.authorization",
  "*.headers.x-api-key",
  "*.headers.cookie",

  // Raw blueprint payloads
  "*.blueprint",
  "*.blueprint_yaml",
  "*.policy",
] as const;

export const REDACT_CENSOR = "[REDACTED]";

export function createRedactConfig() {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string) {
  return {
    level,
    redact: createRedactConfig(),
  };
}
