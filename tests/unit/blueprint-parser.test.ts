/**
 * Blueprint Parser Tests
 *
 * Source decoding, typed parse defaults and structural error mapping.
 */

import { describe, it, expect } from "vitest";
import { BlueprintSourceError } from "../../src/blueprint/errors.js";
import { parseBlueprintSource, ZodBlueprintParser } from "../../src/blueprint/parser.js";
import { resolveComponentKind } from "../../src/blueprint/component-kinds.js";
import { formatZodPath, structuralErrorsToIssues } from "../../src/validators/zod-error-mapper.js";
import { binding, component, rawBlueprint } from "../utils/blueprint-builders.js";

const parser = new ZodBlueprintParser();

function errorsFor(raw: unknown) {
  const result = parser.parse(raw);
  if (result.ok) throw new Error("expected structural errors");
  return result.errors;
}

describe("parseBlueprintSource", () => {
  it("decodes YAML", () => {
    const text = ['schema_version: "1.0.0"', "system:", "  name: orders", "  components: []"].join("\n");

    expect(parseBlueprintSource(text)).toEqual({
      schema_version: "1.0.0",
      system: { name: "orders", components: [] },
    });
  });

  it("decodes JSON", () => {
    expect(parseBlueprintSource('{"system": {"name": "orders"}}')).toEqual({ system: { name: "orders" } });
  });

  it("raises a source error for malformed text", () => {
    expect(() => parseBlueprintSource("items: [1, 2")).toThrow(BlueprintSourceError);
  });
});

describe("ZodBlueprintParser", () => {
  it("applies kind-specific defaults", () => {
    const result = parser.parse(
      rawBlueprint([
        component("db", "Store"),
        component("merge", "Aggregator", { terminal: true }),
        component("t", "Transformer", { inputs: [{ name: "in", schema_type: "OrderSchema" }] }),
      ])
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const [db, merge, t] = result.document.components;

    expect(db).toMatchObject({ durable: true, statefulness: "stateful", terminal_hint: false });
    expect(merge).toMatchObject({ durable: false, statefulness: "stateful", terminal_hint: true });
    expect(t?.inputs[0]).toEqual({
      name: "in",
      schema_id: "OrderSchema",
      required: true,
      boundary_ingress: false,
      boundary_egress: false,
      reply_required: false,
      satisfies_reply: false,
    });
  });

  it("exposes system fields at the top level", () => {
    const result = parser.parse(rawBlueprint([component("db", "Store")], [], { description: "Ledger" }));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.document).toMatchObject({
      schemaVersion: "1.0.0",
      name: "test_system",
      description: "Ledger",
      version: "1.0.0",
      policy: {},
      schemas: {},
    });
  });

  it("reports missing top-level fields", () => {
    expect(errorsFor({})).toEqual([
      { code: "MISSING_FIELD", message: "Missing required field at schema_version", path: "schema_version" },
      { code: "MISSING_FIELD", message: "Missing required field at system", path: "system" },
    ]);
  });

  it("reports unknown component kinds", () => {
    const [error] = errorsFor(rawBlueprint([component("db", "Database")]));

    expect(error?.code).toBe("INVALID_VALUE");
    expect(error?.path).toBe("system.components[0].type");
    expect(error?.message).toContain("Invalid value 'Database' at system.components[0].type");
  });

  it("reports an empty component list", () => {
    expect(errorsFor(rawBlueprint([]))).toEqual([
      {
        code: "INVALID_VALUE",
        message: "Array at system.components must have at least 1 item(s)",
        path: "system.components",
      },
    ]);
  });

  it("reports system names that are not snake_case", () => {
    const [error] = errorsFor(rawBlueprint([component("db", "Store")], [], { name: "Order Pipeline" }));

    expect(error).toEqual({
      code: "INVALID_VALUE",
      message: "System name must be snake_case and start with a lowercase letter at system.name",
      path: "system.name",
    });
  });

  it("reports duplicate component names", () => {
    expect(errorsFor(rawBlueprint([component("db", "Store"), component("db", "Sink")]))).toEqual([
      { code: "DUPLICATE_COMPONENT", message: "Duplicate component name 'db'", path: "system.components[1].name" },
    ]);
  });

  it("reports bindings to undeclared components", () => {
    const errors = errorsFor(
      rawBlueprint([component("ingest", "Source")], [binding("ingest", "output", "ghost", "input")])
    );

    expect(errors).toEqual([
      {
        code: "UNKNOWN_COMPONENT_REF",
        message: "Binding target 'ghost' is not a declared component",
        path: "system.bindings[0].to_components[0]",
      },
    ]);
  });

  it("reports target and port lists of different lengths", () => {
    const errors = errorsFor(
      rawBlueprint(
        [component("ingest", "Source"), component("db", "Store")],
        [{ from_component: "ingest", from_port: "output", to_components: ["db"], to_ports: [] }]
      )
    );

    expect(errors).toEqual([
      {
        code: "ARITY_MISMATCH",
        message: "to_components and to_ports must have the same length",
        path: "system.bindings[0].to_ports",
      },
    ]);
  });
});

describe("zod error mapping", () => {
  it("formats paths with index brackets", () => {
    expect(formatZodPath(["system", "components", 0, "type"])).toBe("system.components[0].type");
    expect(formatZodPath([])).toBe("");
  });

  it("turns structural errors into structure issues", () => {
    expect(
      structuralErrorsToIssues([
        { code: "MISSING_FIELD", message: "Missing required field at system", path: "system" },
        { code: "INVALID_TYPE", message: "Expected object, received string", path: "" },
      ])
    ).toEqual([
      {
        kind: "structure",
        code: "MISSING_FIELD",
        severity: "error",
        message: "Missing required field at system",
        path: "system",
      },
      {
        kind: "structure",
        code: "INVALID_TYPE",
        severity: "error",
        message: "Expected object, received string",
        path: undefined,
      },
    ]);
  });
});

describe("resolveComponentKind", () => {
  it("ignores casing and separators", () => {
    expect(resolveComponentKind("api_endpoint")).toBe("APIEndpoint");
    expect(resolveComponentKind("Stream-Processor")).toBe("StreamProcessor");
    expect(resolveComponentKind("event source")).toBe("EventSource");
  });

  it("rejects names outside the kind set", () => {
    expect(resolveComponentKind("Database")).toBeUndefined();
  });
});
