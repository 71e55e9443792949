/**
 * Shared Blueprint Builder Utilities for Tests
 *
 * Usage:
 *   import { rawBlueprint, typed, bundledMatrix } from '../utils/blueprint-builders.js';
 *   const doc = typed(rawBlueprint([component('ingest', 'Source')]));
 */

import { ZodBlueprintParser } from "../../src/blueprint/parser.js";
import { loadConnectivityMatrix, type ConnectivityMatrix } from "../../src/matrix/connectivity-matrix.js";
import type { BlueprintT } from "../../src/schemas/blueprint.js";
import type { RawRecord } from "../../src/utils/raw-document.js";

let matrix: ConnectivityMatrix | undefined;

/**
 * The bundled connectivity matrix, loaded once per test file.
 */
export function bundledMatrix(): ConnectivityMatrix {
  matrix ??= loadConnectivityMatrix();
  return matrix;
}

export function component(name: string, type: string, extra: RawRecord = {}): RawRecord {
  return { name, type, ...extra };
}

export function binding(from: string, fromPort: string, to: string, toPort: string): RawRecord {
  return {
    from_component: from,
    from_port: fromPort,
    to_components: [to],
    to_ports: [toPort],
  };
}

/**
 * A complete raw document: nothing for the structural phase to add beyond
 * bindings and terminals.
 */
export function rawBlueprint(
  components: RawRecord[],
  bindings: RawRecord[] = [],
  system: RawRecord = {}
): RawRecord {
  return {
    schema_version: "1.0.0",
    policy: {},
    system: {
      name: "test_system",
      version: "1.0.0",
      components,
      bindings,
      ...system,
    },
  };
}

/**
 * Typed parse that fails the test on structural errors.
 */
export function typed(raw: unknown): BlueprintT {
  const result = new ZodBlueprintParser().parse(raw);
  if (!result.ok) {
    throw new Error(`Fixture failed to parse: ${JSON.stringify(result.errors)}`);
  }
  return result.document;
}
