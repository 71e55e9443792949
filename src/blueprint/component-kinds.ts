/**
 * Component kind classification.
 *
 * Every check that depends on what a component *is* goes through
 * `roleOf()`, whose switch is exhaustive over the kind union: adding a
 * kind without classifying it fails to compile.
 *
 * @module blueprint/component-kinds
 */

import { COMPONENT_KINDS, type ComponentKindT } from "../schemas/blueprint.js";

/**
 * Coarse architectural role of a component kind.
 */
export type ComponentRole =
  | "origin"
  | "processor"
  | "endpoint"
  | "orchestrator"
  | "storage"
  | "sink";

export function assertNever(value: never): never {
  throw new Error(`Unhandled component kind: ${String(value)}`);
}

export function roleOf(kind: ComponentKindT): ComponentRole {
  switch (kind) {
    case "Source":
    case "EventSource":
      return "origin";
    case "Transformer":
    case "Filter":
    case "Router":
    case "Aggregator":
    case "StreamProcessor":
      return "processor";
    case "APIEndpoint":
      return "endpoint";
    case "Controller":
      return "orchestrator";
    case "Store":
      return "storage";
    case "Sink":
      return "sink";
    default:
      return assertNever(kind);
  }
}

export function isTerminalRole(role: ComponentRole): boolean {
  return role === "storage" || role === "sink";
}

// ============================================================================
// Kind name resolution
// ============================================================================

/**
 * Lookup from a squashed, lower-cased spelling to the canonical kind.
 * "api_endpoint", "API-Endpoint" and "apiendpoint" all resolve to APIEndpoint.
 */
const KIND_LOOKUP: ReadonlyMap<string, ComponentKindT> = new Map(
  COMPONENT_KINDS.map((kind) => [squash(kind), kind])
);

function squash(value: string): string {
  return value.toLowerCase().replace(/[\s_-]/g, "");
}

/**
 * Resolve a user-written type name to a component kind, ignoring casing and
 * separators. Returns undefined for names outside the closed kind set.
 */
export function resolveComponentKind(value: string): ComponentKindT | undefined {
  return KIND_LOOKUP.get(squash(value));
}
