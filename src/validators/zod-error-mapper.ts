/**
 * Zod Error Mapper
 *
 * Converts Zod validation errors from the typed blueprint parse into
 * StructuralError entries and, for the orchestrator, into structure-kind
 * ValidationIssues.
 *
 * @module validators/zod-error-mapper
 */

import type { ZodError, ZodIssue } from "zod";
import type {
  StructuralError,
  StructureIssueCode,
  ValidationIssue,
} from "./architectural-validator.types.js";

const CUSTOM_CODES: ReadonlySet<string> = new Set<StructureIssueCode>([
  "DUPLICATE_COMPONENT",
  "UNKNOWN_COMPONENT_REF",
  "ARITY_MISMATCH",
]);

function isCustomCode(value: unknown): value is StructureIssueCode {
  return typeof value === "string" && CUSTOM_CODES.has(value);
}

/**
 * Map a Zod issue to a structure issue code.
 */
function mapZodCodeToErrorCode(issue: ZodIssue): StructureIssueCode {
  switch (issue.code) {
    case "invalid_type":
      return issue.received === "undefined" ? "MISSING_FIELD" : "INVALID_TYPE";
    case "custom": {
      const code: unknown = issue.params?.code;
      return isCustomCode(code) ? code : "INVALID_VALUE";
    }
    default:
      return "INVALID_VALUE";
  }
}

/**
 * Convert Zod path to a dotted path string.
 * e.g., ["system", "components", 0, "type"] → "system.components[0].type"
 */
export function formatZodPath(path: (string | number)[]): string {
  let formatted = "";
  path.forEach((segment, index) => {
    if (typeof segment === "number") {
      formatted += `[${segment}]`;
    } else {
      formatted += index === 0 ? segment : `.${segment}`;
    }
  });
  return formatted;
}

function describeIssue(issue: ZodIssue, path: string): string {
  const location = path ? ` at ${path}` : "";

  switch (issue.code) {
    case "invalid_type":
      if (issue.received === "undefined") {
        return `Missing required field${location}`;
      }
      return `Expected ${issue.expected}, received ${issue.received}${location}`;

    case "invalid_enum_value":
      return `Invalid value '${String(issue.received)}'${location}. Must be one of: ${issue.options.join(", ")}`;

    case "too_small":
      if (issue.type === "array") {
        return `Array${location} must have at least ${String(issue.minimum)} item(s)`;
      }
      if (issue.type === "string") {
        return `String${location} must not be empty`;
      }
      return `Value${location} is too small (minimum: ${String(issue.minimum)})`;

    case "invalid_string":
      return `${issue.message}${location}`;

    default:
      return issue.message;
  }
}

/**
 * Map a ZodError from the blueprint schema to structural errors.
 */
export function zodToStructuralErrors(error: ZodError): StructuralError[] {
  return error.issues.map((issue) => {
    const path = formatZodPath(issue.path);
    return {
      code: mapZodCodeToErrorCode(issue),
      message: describeIssue(issue, path),
      path,
    };
  });
}

/**
 * Structural errors as validation issues, so parse failures and graph
 * findings travel in one list.
 */
export function structuralErrorsToIssues(errors: readonly StructuralError[]): ValidationIssue[] {
  return errors.map((error) => ({
    kind: "structure",
    code: error.code,
    severity: "error",
    message: error.message,
    path: error.path || undefined,
  }));
}
