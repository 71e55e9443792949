/**
 * Connectivity Matrix
 *
 * Immutable per-kind rule table governing which bindings are legal. Loaded
 * once and passed explicitly to the validator, healer and orchestrator;
 * there is no module-level instance.
 *
 * @module matrix/connectivity-matrix
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { MatrixConfigurationError } from "../blueprint/errors.js";
import {
  COMPONENT_KINDS,
  ComponentKind,
  type ComponentKindT,
} from "../schemas/blueprint.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";

// =============================================================================
// Definition Schema
// =============================================================================

const ConnectivityRuleDefinition = z.object({
  description: z.string().optional(),
  can_connect_to: z.array(ComponentKind),
  can_receive_from: z.array(ComponentKind),
  expected_inputs: z.number().int().min(0),
  expected_outputs: z.number().int().min(0),
  is_source: z.boolean(),
  is_terminal: z.boolean(),
});

export const ConnectivityMatrixDefinition = z.object({
  version: z.number().int().positive(),
  rules: z.record(ComponentKind, ConnectivityRuleDefinition),
});

export type ConnectivityMatrixDefinitionT = z.infer<typeof ConnectivityMatrixDefinition>;

// =============================================================================
// Rule Model
// =============================================================================

export interface ConnectivityRule {
  readonly kind: ComponentKindT;
  readonly description?: string;
  readonly canConnectTo: ReadonlySet<ComponentKindT>;
  readonly canReceiveFrom: ReadonlySet<ComponentKindT>;
  readonly expectedInputs: number;
  readonly expectedOutputs: number;
  readonly isSource: boolean;
  readonly isTerminal: boolean;
}

export class ConnectivityMatrix {
  private readonly rules: ReadonlyMap<ComponentKindT, ConnectivityRule>;

  private constructor(rules: Map<ComponentKindT, ConnectivityRule>) {
    this.rules = rules;
    Object.freeze(this);
  }

  /**
   * Build a matrix from a validated definition. Every kind must have a rule.
   */
  static fromDefinition(definition: ConnectivityMatrixDefinitionT): ConnectivityMatrix {
    const missing = COMPONENT_KINDS.filter((kind) => definition.rules[kind] === undefined);
    if (missing.length > 0) {
      throw new MatrixConfigurationError(
        "Connectivity matrix is missing rules",
        missing.map((kind) => `no rule for ${kind}`)
      );
    }

    const rules = new Map<ComponentKindT, ConnectivityRule>();
    for (const kind of COMPONENT_KINDS) {
      const rule = definition.rules[kind];
      if (rule === undefined) continue;
      rules.set(
        kind,
        Object.freeze({
          kind,
          description: rule.description,
          canConnectTo: new Set(rule.can_connect_to),
          canReceiveFrom: new Set(rule.can_receive_from),
          expectedInputs: rule.expected_inputs,
          expectedOutputs: rule.expected_outputs,
          isSource: rule.is_source,
          isTerminal: rule.is_terminal,
        })
      );
    }
    return new ConnectivityMatrix(rules);
  }

  rulesFor(kind: ComponentKindT): ConnectivityRule {
    const rule = this.rules.get(kind);
    if (rule === undefined) {
      // fromDefinition guarantees full coverage
      throw new MatrixConfigurationError(`No connectivity rule for ${kind}`);
    }
    return rule;
  }

  /**
   * A binding from→to is legal only when both sides agree: `to` is in the
   * sender's can_connect_to AND `from` is in the receiver's can_receive_from.
   */
  allows(from: ComponentKindT, to: ComponentKindT): boolean {
    return this.rulesFor(from).canConnectTo.has(to) && this.rulesFor(to).canReceiveFrom.has(from);
  }

  allowedTargets(from: ComponentKindT): ComponentKindT[] {
    return COMPONENT_KINDS.filter((to) => this.allows(from, to));
  }

  allowedSources(to: ComponentKindT): ComponentKindT[] {
    return COMPONENT_KINDS.filter((from) => this.allows(from, to));
  }

  kinds(): readonly ComponentKindT[] {
    return COMPONENT_KINDS;
  }
}

// =============================================================================
// Self-consistency
// =============================================================================

/**
 * Check the matrix's own contract:
 * - B ∈ A.can_connect_to ⇔ A ∈ B.can_receive_from
 * - source kinds receive from nobody, terminal kinds send to nobody
 */
export function checkMatrixConsistency(matrix: ConnectivityMatrix): string[] {
  const violations: string[] = [];

  for (const a of matrix.kinds()) {
    const ruleA = matrix.rulesFor(a);
    for (const b of matrix.kinds()) {
      const ruleB = matrix.rulesFor(b);
      const sends = ruleA.canConnectTo.has(b);
      const received = ruleB.canReceiveFrom.has(a);
      if (sends && !received) {
        violations.push(`${a} can_connect_to ${b}, but ${b} does not list ${a} in can_receive_from`);
      } else if (received && !sends) {
        violations.push(`${b} can_receive_from ${a}, but ${a} does not list ${b} in can_connect_to`);
      }
    }

    if (ruleA.isSource && ruleA.canReceiveFrom.size > 0) {
      violations.push(`${a} is a source but can_receive_from is not empty`);
    }
    if (ruleA.isTerminal && ruleA.canConnectTo.size > 0) {
      violations.push(`${a} is terminal but can_connect_to is not empty`);
    }
  }

  return violations;
}

// =============================================================================
// Loading
// =============================================================================

const BUNDLED_MATRIX_CANDIDATES = [
  // src/matrix/ → data/
  "../../data/connectivity-matrix.json",
  // dist/src/matrix/ → data/
  "../../../data/connectivity-matrix.json",
];

function readBundledMatrix(): string {
  for (const candidate of BUNDLED_MATRIX_CANDIDATES) {
    try {
      return readFileSync(fileURLToPath(new URL(candidate, import.meta.url)), "utf-8");
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
  }
  throw new MatrixConfigurationError("Bundled connectivity matrix not found");
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export interface LoadMatrixOptions {
  /** JSON file to load instead of the bundled table */
  path?: string;
}

export function parseConnectivityMatrix(json: string): ConnectivityMatrix {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new MatrixConfigurationError(
      `Connectivity matrix is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = ConnectivityMatrixDefinition.safeParse(raw);
  if (!parsed.success) {
    throw new MatrixConfigurationError(
      "Connectivity matrix definition is malformed",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const matrix = ConnectivityMatrix.fromDefinition(parsed.data);
  const violations = checkMatrixConsistency(matrix);
  if (violations.length > 0) {
    throw new MatrixConfigurationError("Connectivity matrix is inconsistent", violations);
  }
  return matrix;
}

/**
 * Load, validate and self-check a connectivity matrix.
 */
export function loadConnectivityMatrix(options: LoadMatrixOptions = {}): ConnectivityMatrix {
  const json = options.path ? readFileSync(options.path, "utf-8") : readBundledMatrix();
  const matrix = parseConnectivityMatrix(json);

  emit(TelemetryEvents.MatrixLoaded, {
    source: options.path ? "custom" : "bundled",
    kinds: matrix.kinds().length,
  });

  return matrix;
}
