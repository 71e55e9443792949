import { ZodError } from "zod";
import { BlueprintSourceError } from "../blueprint/errors.js";

/**
 * Error codes for structured error responses
 */
export type ErrorCode = "BAD_INPUT" | "NOT_FOUND" | "UNPROCESSABLE" | "INTERNAL";

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: "error.v1";
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

/**
 * Build a structured error response
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: "error.v1",
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

/**
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError, requestId?: string): ErrorV1 {
  return buildErrorV1(
    "BAD_INPUT",
    "Validation failed",
    {
      validation_errors: error.flatten(),
    },
    requestId
  );
}

/**
 * Client errors raised by Fastify itself (malformed JSON, body too large,
 * unsupported media type) carry a 4xx `statusCode`.
 */
function clientStatusCode(error: Error): number | undefined {
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode >= 400 && error.statusCode < 500 ? error.statusCode : undefined;
  }
  return undefined;
}

/**
 * Convert any error to ErrorV1 (safe, never leaks stack or file paths)
 */
export function toErrorV1(error: unknown, requestId?: string): ErrorV1 {
  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  if (error instanceof BlueprintSourceError) {
    return buildErrorV1(
      "BAD_INPUT",
      error.message,
      { line: error.line, column: error.column },
      requestId
    );
  }

  if (error instanceof Error) {
    const status = clientStatusCode(error);
    if (status === 404) {
      return buildErrorV1("NOT_FOUND", error.message, undefined, requestId);
    }
    if (status !== undefined) {
      return buildErrorV1("BAD_INPUT", error.message, undefined, requestId);
    }

    // Strip file paths before the message leaves the process
    const message = (error.message || "An unexpected error occurred").replace(
      /\/[\w/.@-]+/g,
      "[path]"
    );
    return buildErrorV1("INTERNAL", message, undefined, requestId);
  }

  return buildErrorV1("INTERNAL", "An unexpected error occurred", undefined, requestId);
}

/**
 * Get HTTP status code for error code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case "BAD_INPUT":
      return 400;
    case "NOT_FOUND":
      return 404;
    case "UNPROCESSABLE":
      return 422;
    case "INTERNAL":
    default:
      return 500;
  }
}
