import type { IncomingMessage } from "node:http";
import { describe, it, expect } from "vitest";
import { generateRequestId, getOrGenerateRequestId } from "../../src/utils/request-id.js";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function requestWith(headers: IncomingMessage["headers"]): Pick<IncomingMessage, "headers"> {
  return { headers };
}

describe("request IDs", () => {
  it("generates UUID v4 values", () => {
    expect(generateRequestId()).toMatch(UUID_PATTERN);
  });

  it("reuses a valid incoming header", () => {
    expect(getOrGenerateRequestId(requestWith({ "x-request-id": " trace-123 " }))).toBe("trace-123");
  });

  it("replaces blank or oversized headers", () => {
    expect(getOrGenerateRequestId(requestWith({ "x-request-id": "   " }))).toMatch(UUID_PATTERN);
    expect(getOrGenerateRequestId(requestWith({ "x-request-id": "x".repeat(129) }))).toMatch(UUID_PATTERN);
  });

  it("generates one when the header is absent", () => {
    expect(getOrGenerateRequestId(requestWith({}))).toMatch(UUID_PATTERN);
  });
});
