import { env } from "node:process";
import pino from "pino";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret and payload redaction.
 *
 * Redaction paths are centralized in src/utils/logger-config.ts so the
 * Fastify request logger and this standalone logger stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryData = Record<string, unknown>;

type TelemetrySink = (eventName: string, data: TelemetryData) => void;

/**
 * Test sink for capturing telemetry events.
 * Only used when NODE_ENV=test or VITEST is set.
 */
let testSink: TelemetrySink | null = null;

export function setTestSink(sink: TelemetrySink | null): void {
  // Direct env check: config may not be parseable this early
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names.
 * Dashboards key on these strings; rename with care.
 */
export const TelemetryEvents = {
  // Validation
  ValidationCompleted: "blueprint.validation.completed",

  // Healing lifecycle
  HealingStarted: "blueprint.healing.started",
  HealingAttemptCompleted: "blueprint.healing.attempt_completed",
  HealingStagnationWarning: "blueprint.healing.stagnation_warning",
  HealingSucceeded: "blueprint.healing.succeeded",
  HealingFailed: "blueprint.healing.failed",

  // Matrix
  MatrixLoaded: "blueprint.matrix.loaded",
} as const;

export type TelemetryEvent = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * Emit a telemetry event: always logged, mirrored to the test sink when set.
 */
export function emit(event: TelemetryEvent, data: TelemetryData): void {
  if (testSink) {
    testSink(event, data);
  }
  log.info({ event, ...data });
}
