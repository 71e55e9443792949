import { randomUUID } from "node:crypto";
import type { IncomingMessage } from "node:http";

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = "X-Request-Id";
export const REQUEST_ID_HEADER_LOWER = "x-request-id";

const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Generate a new request ID (UUID v4)
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Fastify `genReqId` hook: reuse an incoming X-Request-Id or mint one.
 */
export function getOrGenerateRequestId(request: Pick<IncomingMessage, "headers">): string {
  const incomingId = request.headers[REQUEST_ID_HEADER_LOWER];

  if (
    typeof incomingId === "string" &&
    incomingId.trim().length > 0 &&
    incomingId.length <= MAX_REQUEST_ID_LENGTH
  ) {
    return incomingId.trim();
  }

  return generateRequestId();
}
