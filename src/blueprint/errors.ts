/**
 * Domain errors raised by the blueprint engine.
 *
 * @module blueprint/errors
 */

import type { ValidationIssue } from "../validators/architectural-validator.types.js";

/**
 * Blueprint text could not be decoded as YAML or JSON.
 */
export class BlueprintSourceError extends Error {
  readonly name = "BlueprintSourceError";

  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BlueprintSourceError);
    }
  }
}

/**
 * Connectivity matrix definition is unreadable, incomplete, or breaks the
 * symmetry or source/terminal shape contract.
 */
export class MatrixConfigurationError extends Error {
  readonly name = "MatrixConfigurationError";

  constructor(
    message: string,
    public readonly violations: readonly string[] = [],
  ) {
    super(violations.length > 0 ? `${message}:\n  ${violations.join("\n  ")}` : message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MatrixConfigurationError);
    }
  }
}

export type HealingFailureReason = "attempts_exhausted" | "stagnation" | "invalid_input";

/**
 * Heal-and-validate gave up. The message lists every unresolved issue.
 */
export class HealingFailedError extends Error {
  readonly name = "HealingFailedError";

  constructor(
    public readonly reason: HealingFailureReason,
    public readonly attempts: number,
    public readonly issues: readonly ValidationIssue[],
  ) {
    super(formatFailureMessage(reason, attempts, issues));
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HealingFailedError);
    }
  }
}

function formatFailureMessage(
  reason: HealingFailureReason,
  attempts: number,
  issues: readonly ValidationIssue[],
): string {
  const header =
    reason === "invalid_input"
      ? "Blueprint is not a document object"
      : `Blueprint healing failed after ${attempts} attempt(s) (${reason.replace("_", " ")})`;
  const lines = issues.map(
    (issue) => `  ${issue.path ?? "<document>"} [${issue.severity}] ${issue.message}`
  );
  return [header, ...lines].join("\n");
}
