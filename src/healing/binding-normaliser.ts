/**
 * Binding shape normalisation.
 *
 * Accepted shapes, all rewritten to the canonical
 * `{ from_component, from_port, to_components[], to_ports[] }`:
 * - canonical (to_ports padded or trimmed to match to_components)
 * - singular target: `to_component` / `to_port`
 * - dotted strings: `from: "a.out"`, `to: "b.in"` or `to: ["b.in", "c.in"]`
 *
 * @module healing/binding-normaliser
 */

import { getString, isRecord, type RawRecord } from "../utils/raw-document.js";

export type PortDirection = "input" | "output";

/**
 * Port name to use when a binding leaves one out.
 */
export type DefaultPortResolver = (component: string, direction: PortDirection) => string;

export interface DroppedBinding {
  index: number;
  reason: string;
}

export interface NormalisedBindings {
  bindings: RawRecord[];
  normalised: number;
  dropped: DroppedBinding[];
}

interface Endpoint {
  component: string;
  port?: string;
}

const LEGACY_KEYS = ["from", "to", "to_component", "to_port"] as const;
const CARRIED_KEYS = [
  "transformation",
  "transformation_synthesized",
  "condition",
  "description",
  "generated_by",
] as const;

function splitEndpoint(value: string): Endpoint {
  const dot = value.indexOf(".");
  if (dot < 0) return { component: value.trim() };
  const component = value.slice(0, dot).trim();
  const port = value.slice(dot + 1).trim();
  return port ? { component, port } : { component };
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isCanonical(entry: RawRecord): boolean {
  const { from_component, from_port, to_components, to_ports } = entry;
  return (
    typeof from_component === "string" &&
    typeof from_port === "string" &&
    isStringList(to_components) &&
    to_components.length > 0 &&
    isStringList(to_ports) &&
    to_ports.length === to_components.length &&
    LEGACY_KEYS.every((key) => !(key in entry))
  );
}

function readSource(entry: RawRecord): Endpoint | undefined {
  const component = getString(entry, "from_component");
  if (component) {
    return { component, port: getString(entry, "from_port") };
  }
  const dotted = getString(entry, "from");
  if (dotted) {
    const endpoint = splitEndpoint(dotted);
    const explicitPort = getString(entry, "from_port");
    return explicitPort ? { component: endpoint.component, port: explicitPort } : endpoint;
  }
  return undefined;
}

function readTargets(entry: RawRecord): Endpoint[] | string {
  const { to_components, to_ports, to_component, to } = entry;

  if (to_components !== undefined) {
    if (!isStringList(to_components)) return "to_components must be a list of names";
    const ports = isStringList(to_ports) ? to_ports : [];
    return to_components.map((component, i) => ({ component, port: ports[i] }));
  }

  if (typeof to_component === "string") {
    return [{ component: to_component, port: getString(entry, "to_port") }];
  }

  if (typeof to === "string") {
    return [splitEndpoint(to)];
  }
  if (isStringList(to)) {
    return to.map(splitEndpoint);
  }

  return [];
}

function normaliseOne(
  entry: unknown,
  defaultPort: DefaultPortResolver
): { binding: RawRecord; changed: boolean } | string {
  if (!isRecord(entry)) return "binding is not an object";
  if (isCanonical(entry)) return { binding: entry, changed: false };

  const source = readSource(entry);
  if (!source || !source.component) return "missing source component";

  const targets = readTargets(entry);
  if (typeof targets === "string") return targets;
  if (targets.length === 0) return "missing target component";
  if (targets.some((t) => !t.component)) return "empty target component name";

  const binding: RawRecord = {
    from_component: source.component,
    from_port: source.port || defaultPort(source.component, "output"),
    to_components: targets.map((t) => t.component),
    to_ports: targets.map((t) => t.port || defaultPort(t.component, "input")),
  };
  for (const key of CARRIED_KEYS) {
    if (entry[key] !== undefined) binding[key] = entry[key];
  }

  return { binding, changed: true };
}

/**
 * Canonicalise a binding list. Entries that cannot be read are dropped and
 * reported with their index.
 */
export function normaliseBindings(
  entries: readonly unknown[],
  defaultPort: DefaultPortResolver
): NormalisedBindings {
  const result: NormalisedBindings = { bindings: [], normalised: 0, dropped: [] };

  entries.forEach((entry, index) => {
    const outcome = normaliseOne(entry, defaultPort);
    if (typeof outcome === "string") {
      result.dropped.push({ index, reason: outcome });
      return;
    }
    result.bindings.push(outcome.binding);
    if (outcome.changed) result.normalised++;
  });

  return result;
}
