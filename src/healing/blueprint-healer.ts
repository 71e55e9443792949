/**
 * Blueprint Healer
 *
 * Deterministic repairs on the raw (untyped) blueprint. Two phases:
 *
 * - structural: document layout, binding shape, version marker, policy
 *   block, missing bindings, missing terminal, component field cleanup
 * - schema: transformation labels on bindings whose port schemas disagree
 *
 * Every generated binding is filtered through the connectivity matrix and
 * through the session's generated/rejected sets, so a run never proposes
 * the same (from, to) pair twice. Typed documents are never touched; the
 * healer edits a copy of the raw document and returns it with the list of
 * operations it applied.
 *
 * @module healing/blueprint-healer
 */

import {
  isTerminalRole,
  resolveComponentKind,
  roleOf,
  type ComponentRole,
} from "../blueprint/component-kinds.js";
import { getConfig } from "../config/index.js";
import type { ConnectivityMatrix } from "../matrix/connectivity-matrix.js";
import { SYSTEM_NAME_PATTERN, type ComponentKindT } from "../schemas/blueprint.js";
import {
  cloneRecord,
  getArray,
  getRecord,
  getString,
  isRecord,
  recordsOf,
  type RawRecord,
} from "../utils/raw-document.js";
import { log } from "../utils/telemetry.js";
import { areSchemasCompatible, transformationName } from "../validators/schema-compatibility.js";
import { normaliseBindings, type PortDirection } from "./binding-normaliser.js";
import { defaultInputPort, defaultOutputPort } from "./port-templates.js";
import { bindingPairKey, type HealingSession } from "./session.js";

export type HealingPhase = "structural" | "schema";

export interface HealerOptions {
  /** Store components are eligible terminal targets for generated bindings */
  storeCountsAsTerminal: boolean;
}

export interface HealResult {
  document: RawRecord;
  operations: string[];
}

export const CURRENT_SCHEMA_VERSION = "1.0.0";
export const GENERATED_BY_STRUCTURAL = "healer_structural";

const DEFAULT_SYSTEM_NAME = "generated_system";

const DEFAULT_POLICY = {
  security: {
    encryption_at_rest: true,
    authentication_required: true,
  },
  resource_limits: {
    max_memory: "512Mi",
    max_cpu: "500m",
  },
  validation: {
    strict_mode: true,
  },
} as const;

/**
 * A raw component whose name and kind could be read.
 */
interface ComponentView {
  record: RawRecord;
  name: string;
  kind: ComponentKindT;
  role: ComponentRole;
  terminalHint: boolean;
}

// =============================================================================
// Raw component helpers
// =============================================================================

function viewOf(record: RawRecord): ComponentView | undefined {
  const name = getString(record, "name");
  const type = getString(record, "type");
  if (!name || !type) return undefined;
  const kind = resolveComponentKind(type);
  if (!kind) return undefined;
  return {
    record,
    name,
    kind,
    role: roleOf(kind),
    terminalHint: record.terminal_hint === true || record.terminal === true,
  };
}

function firstPortName(record: RawRecord, field: "inputs" | "outputs"): string | undefined {
  for (const port of recordsOf(record[field])) {
    const name = getString(port, "name");
    if (name) return name;
  }
  return undefined;
}

function portSchema(
  record: RawRecord | undefined,
  field: "inputs" | "outputs",
  portName: string | undefined
): string | undefined {
  if (!record || portName === undefined) return undefined;
  const port = recordsOf(record[field]).find((p) => p.name === portName);
  if (!port) return undefined;
  return getString(port, "schema") ?? getString(port, "schema_type");
}

function uniqueName(base: string, taken: ReadonlySet<string>): string {
  if (!taken.has(base)) return base;
  let suffix = 2;
  while (taken.has(`${base}_${suffix}`)) suffix++;
  return `${base}_${suffix}`;
}

/**
 * "Order Pipeline v2" → "order_pipeline_v2"
 */
export function toSystemName(value: string): string {
  const snake = value
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  if (!snake) return DEFAULT_SYSTEM_NAME;
  return /^[a-z]/.test(snake) ? snake : `system_${snake}`;
}

// =============================================================================
// Healer
// =============================================================================

export class BlueprintHealer {
  private readonly options: HealerOptions;

  constructor(
    private readonly matrix: ConnectivityMatrix,
    options: Partial<HealerOptions> = {}
  ) {
    this.options = {
      storeCountsAsTerminal: getConfig().healing.storeCountsAsTerminal,
      ...options,
    };
  }

  heal(raw: RawRecord, phase: HealingPhase, session: HealingSession): HealResult {
    const document = cloneRecord(raw);
    const operations =
      phase === "structural"
        ? this.healStructure(document, session)
        : this.healSchemas(document);

    log.debug(
      {
        event: "healer.phase.completed",
        phase,
        session_id: session.id,
        operation_count: operations.length,
      },
      `Healer ${phase} phase applied ${operations.length} operation(s)`
    );

    return { document, operations };
  }

  /**
   * Layout and binding-shape normalisation only. Run once before the first
   * attempt; the structural phase repeats it.
   */
  normaliseFormats(raw: RawRecord): HealResult {
    const document = cloneRecord(raw);
    const operations = this.normaliseLayout(document);
    const system = getRecord(document, "system");
    if (system) {
      this.normaliseBindingList(system, operations);
    }
    return { document, operations };
  }

  // ===========================================================================
  // Structural phase
  // ===========================================================================

  private healStructure(doc: RawRecord, session: HealingSession): string[] {
    const operations = this.normaliseLayout(doc);
    const system = getRecord(doc, "system");
    if (!system) return operations;

    const bindings = this.normaliseBindingList(system, operations);
    this.ensureVersionAndPolicy(doc, operations);

    const components = getArray(system, "components") ?? [];
    const views = recordsOf(components)
      .map(viewOf)
      .filter((view): view is ComponentView => view !== undefined);

    const proposer = this.createProposer(bindings, session, operations);
    this.generateMissingBindings(views, proposer);
    this.ensureTerminal(components, views, operations);
    // a terminal added just now still needs its processors
    this.terminateProcessors(views, proposer);
    this.connectOrphanedOrigins(views, proposer);
    this.normaliseComponents(system, operations);

    return operations;
  }

  private normaliseLayout(doc: RawRecord): string[] {
    const operations: string[] = [];

    let system = getRecord(doc, "system");
    if (!system) {
      system = {};
      let moved = 0;
      for (const key of ["name", "description", "version", "components", "bindings"]) {
        if (key in doc) {
          system[key] = doc[key];
          delete doc[key];
          moved++;
        }
      }
      doc.system = system;
      operations.push(
        moved > 0 ? "Moved top-level system fields into a system block" : "Added missing system block"
      );
    }

    if ("schema_version" in system) {
      if (doc.schema_version === undefined) {
        doc.schema_version = system.schema_version;
      }
      delete system.schema_version;
      operations.push("Moved schema_version from system block to document root");
    }

    const rootBindings = getArray(doc, "bindings");
    if (rootBindings) {
      system.bindings = [...(getArray(system, "bindings") ?? []), ...rootBindings];
      delete doc.bindings;
      operations.push(`Moved ${rootBindings.length} root-level binding(s) into system block`);
    }

    for (const field of ["components", "bindings"]) {
      if (system[field] === undefined) {
        system[field] = [];
        operations.push(`Added empty system.${field} list`);
      } else if (!Array.isArray(system[field])) {
        system[field] = [];
        operations.push(`Replaced non-list system.${field} with an empty list`);
      }
    }

    return operations;
  }

  private normaliseBindingList(system: RawRecord, operations: string[]): RawRecord[] {
    const components = new Map<string, RawRecord>();
    for (const record of recordsOf(system.components)) {
      const name = getString(record, "name");
      if (name) components.set(name, record);
    }

    const defaultPort = (name: string, direction: PortDirection): string => {
      const record = components.get(name);
      const field = direction === "input" ? "inputs" : "outputs";
      const declared = record ? firstPortName(record, field) : undefined;
      if (declared) return declared;
      const view = record ? viewOf(record) : undefined;
      if (!view) return direction;
      return direction === "input" ? defaultInputPort(view.kind) : defaultOutputPort(view.kind);
    };

    const result = normaliseBindings(getArray(system, "bindings") ?? [], defaultPort);
    system.bindings = result.bindings;

    if (result.normalised > 0) {
      operations.push(`Normalized ${result.normalised} binding(s) to canonical form`);
    }
    for (const dropped of result.dropped) {
      log.warn(
        { event: "healer.binding.dropped", index: dropped.index, reason: dropped.reason },
        "Dropped malformed binding"
      );
      operations.push(`Dropped malformed binding system.bindings[${dropped.index}]: ${dropped.reason}`);
    }

    return result.bindings;
  }

  private ensureVersionAndPolicy(doc: RawRecord, operations: string[]): void {
    const version = doc.schema_version;
    if (typeof version !== "string" || version.trim() === "") {
      doc.schema_version = CURRENT_SCHEMA_VERSION;
      operations.push(`Added schema_version ${CURRENT_SCHEMA_VERSION}`);
    } else if (version === "1.0") {
      doc.schema_version = CURRENT_SCHEMA_VERSION;
      operations.push(`Upgraded schema_version 1.0 to ${CURRENT_SCHEMA_VERSION}`);
    }

    if (!isRecord(doc.policy)) {
      doc.policy = structuredClone(DEFAULT_POLICY);
      operations.push("Added default policy block");
    }
  }

  // ---------------------------------------------------------------------------
  // Binding generation
  // ---------------------------------------------------------------------------

  /**
   * Returns a function that adds a binding from→to when the pair is new to
   * this run, not already bound, and allowed by the matrix.
   */
  private createProposer(
    bindings: RawRecord[],
    session: HealingSession,
    operations: string[]
  ): Proposer {
    const existing = new Set<string>();
    const outgoing = new Set<string>();

    for (const binding of bindings) {
      const from = getString(binding, "from_component");
      if (!from) continue;
      outgoing.add(from);
      for (const to of getArray(binding, "to_components") ?? []) {
        if (typeof to === "string") existing.add(bindingPairKey(from, to));
      }
    }

    const propose = (from: ComponentView, to: ComponentView, reason: string): boolean => {
      if (from.name === to.name || from.terminalHint) return false;

      const key = bindingPairKey(from.name, to.name);
      if (
        existing.has(key) ||
        session.generatedBindings.has(key) ||
        session.rejectedBindings.has(key)
      ) {
        return false;
      }

      if (!this.matrix.allows(from.kind, to.kind)) {
        session.rejectedBindings.add(key);
        log.debug(
          {
            event: "healer.binding.rejected",
            session_id: session.id,
            from: from.name,
            to: to.name,
            from_type: from.kind,
            to_type: to.kind,
          },
          "Proposed binding refused by connectivity matrix"
        );
        return false;
      }

      const fromPort = firstPortName(from.record, "outputs") ?? defaultOutputPort(from.kind);
      const toPort = firstPortName(to.record, "inputs") ?? defaultInputPort(to.kind);

      bindings.push({
        from_component: from.name,
        from_port: fromPort,
        to_components: [to.name],
        to_ports: [toPort],
        description: reason,
        generated_by: GENERATED_BY_STRUCTURAL,
      });
      session.generatedBindings.add(key);
      existing.add(key);
      outgoing.add(from.name);
      operations.push(`Generated binding ${from.name}.${fromPort} -> ${to.name}.${toPort}`);
      return true;
    };

    return { propose, hasOutgoing: (name) => outgoing.has(name) };
  }

  private generateMissingBindings(views: ComponentView[], proposer: Proposer): void {
    const byRole = (role: ComponentRole) => views.filter((v) => v.role === role);
    const processors = byRole("processor");
    const stores = byRole("storage");
    const terminals = this.terminalTargets(views);

    // origin → first processor, or a terminal when there are none
    for (const origin of byRole("origin")) {
      if (proposer.hasOutgoing(origin.name)) continue;
      const candidates = processors.length > 0 ? processors : terminals;
      for (const target of candidates) {
        if (proposer.propose(origin, target, `Connect origin ${origin.name} to ${target.name}`)) break;
      }
    }

    this.terminateProcessors(views, proposer);

    // endpoint ↔ store
    const [store] = stores;
    if (store) {
      for (const endpoint of byRole("endpoint")) {
        if (proposer.hasOutgoing(endpoint.name)) continue;
        proposer.propose(endpoint, store, `Persist requests from ${endpoint.name}`);
        proposer.propose(store, endpoint, `Serve ${endpoint.name} from ${store.name}`);
      }
    }

    // orchestrator → up to two peers
    for (const orchestrator of byRole("orchestrator")) {
      if (proposer.hasOutgoing(orchestrator.name)) continue;
      let connected = 0;
      for (const peer of views) {
        if (connected >= 2) break;
        if (peer.role === "orchestrator") continue;
        if (proposer.propose(orchestrator, peer, `Control ${peer.name} from ${orchestrator.name}`)) {
          connected++;
        }
      }
    }
  }

  private terminalTargets(views: ComponentView[]): ComponentView[] {
    return views.filter(
      (v) => v.role === "sink" || (v.role === "storage" && this.options.storeCountsAsTerminal)
    );
  }

  // processor → terminal
  private terminateProcessors(views: ComponentView[], proposer: Proposer): void {
    const terminals = this.terminalTargets(views);
    for (const processor of views.filter((v) => v.role === "processor")) {
      if (proposer.hasOutgoing(processor.name)) continue;
      for (const target of terminals) {
        if (proposer.propose(processor, target, `Terminate ${processor.name} at ${target.name}`)) break;
      }
    }
  }

  private ensureTerminal(
    components: unknown[],
    views: ComponentView[],
    operations: string[]
  ): void {
    if (views.length === 0 || views.some((v) => isTerminalRole(v.role))) return;

    const preferStore = views.some((v) => v.role === "processor" || v.role === "endpoint");
    const kind: ComponentKindT = preferStore ? "Store" : "Sink";
    const taken = new Set(views.map((v) => v.name));
    const name = uniqueName(preferStore ? "primary_store" : "data_sink", taken);

    const record: RawRecord = {
      name,
      type: kind,
      description: preferStore ? "Primary data store added during healing" : "Data sink added during healing",
      generated_by: GENERATED_BY_STRUCTURAL,
    };
    components.push(record);
    views.push({ record, name, kind, role: roleOf(kind), terminalHint: false });
    operations.push(`Added missing terminal component '${name}' (${kind})`);
  }

  private connectOrphanedOrigins(views: ComponentView[], proposer: Proposer): void {
    const terminals = views.filter((v) => isTerminalRole(v.role));
    for (const origin of views.filter((v) => v.role === "origin")) {
      if (proposer.hasOutgoing(origin.name)) continue;
      for (const target of terminals) {
        if (proposer.propose(origin, target, `Connect orphaned origin ${origin.name} to ${target.name}`)) break;
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Component and system field cleanup
  // ---------------------------------------------------------------------------

  private normaliseComponents(system: RawRecord, operations: string[]): void {
    const entries = getArray(system, "components") ?? [];
    const kept = entries.filter(isRecord);
    if (kept.length !== entries.length) {
      system.components = kept;
      operations.push(`Dropped ${entries.length - kept.length} non-object component(s)`);
    }

    const taken = new Set(
      kept.map((c) => getString(c, "name")).filter((n): n is string => n !== undefined)
    );

    kept.forEach((component, index) => {
      let name = getString(component, "name");
      if (!name || name.trim() === "") {
        name = uniqueName(`component_${index + 1}`, taken);
        taken.add(name);
        component.name = name;
        operations.push(`Named unnamed component at system.components[${index}] '${name}'`);
      }

      const type = getString(component, "type");
      const kind = type === undefined ? undefined : resolveComponentKind(type);
      if (type !== undefined && kind !== undefined && kind !== type) {
        component.type = kind;
        operations.push(`Normalized type of '${name}' from '${type}' to '${kind}'`);
      }

      for (const field of ["inputs", "outputs"]) {
        if (component[field] !== undefined && !Array.isArray(component[field])) {
          component[field] = [];
          operations.push(`Replaced non-list ${field} of '${name}' with an empty list`);
        }
      }
    });

    const systemName = getString(system, "name");
    if (!systemName) {
      system.name = DEFAULT_SYSTEM_NAME;
      operations.push(`Added system name '${DEFAULT_SYSTEM_NAME}'`);
    } else if (!SYSTEM_NAME_PATTERN.test(systemName)) {
      const renamed = toSystemName(systemName);
      system.name = renamed;
      operations.push(`Renamed system '${systemName}' to '${renamed}'`);
    }

    if (getString(system, "version") === undefined) {
      system.version = CURRENT_SCHEMA_VERSION;
      operations.push(`Added system version ${CURRENT_SCHEMA_VERSION}`);
    }
  }

  // ===========================================================================
  // Schema phase
  // ===========================================================================

  private healSchemas(doc: RawRecord): string[] {
    const operations: string[] = [];
    const system = getRecord(doc, "system");
    if (!system) return operations;

    const components = new Map<string, RawRecord>();
    for (const record of recordsOf(system.components)) {
      const name = getString(record, "name");
      if (name) components.set(name, record);
    }

    for (const binding of recordsOf(system.bindings)) {
      if (binding.transformation !== undefined) continue;

      const from = getString(binding, "from_component");
      const fromPort = getString(binding, "from_port");
      const fromSchema = portSchema(from ? components.get(from) : undefined, "outputs", fromPort);
      if (fromSchema === undefined) continue;

      const targets = getArray(binding, "to_components") ?? [];
      const ports = getArray(binding, "to_ports") ?? [];

      for (let i = 0; i < targets.length; i++) {
        const target = targets[i];
        const toPort = ports[i];
        if (typeof target !== "string" || typeof toPort !== "string") continue;

        const toSchema = portSchema(components.get(target), "inputs", toPort);
        if (toSchema === undefined || areSchemasCompatible(fromSchema, toSchema)) continue;

        const name = transformationName(fromSchema, toSchema);
        binding.transformation = name;
        binding.transformation_synthesized = true;
        operations.push(`Added transformation ${name} to ${from}.${fromPort} -> ${target}.${toPort}`);
        break;
      }
    }

    return operations;
  }
}

interface Proposer {
  propose(from: ComponentView, to: ComponentView, reason: string): boolean;
  hasOutgoing(name: string): boolean;
}
