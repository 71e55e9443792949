/**
 * Architectural Validator Tests
 *
 * One block per pass, plus the cross-pass scenarios the healer relies on.
 */

import { afterEach, describe, it, expect } from "vitest";
import { buildSystemGraph } from "../../src/graph/system-graph.js";
import { setTestSink, type TelemetryData } from "../../src/utils/telemetry.js";
import {
  ArchitecturalValidator,
  classifyArchitecture,
  hasErrors,
  summarizeIssues,
} from "../../src/validators/architectural-validator.js";
import type { ValidationIssue, ValidatorOptions } from "../../src/validators/architectural-validator.types.js";
import { binding, bundledMatrix, component, rawBlueprint, typed } from "../utils/blueprint-builders.js";

function validate(raw: Record<string, unknown>, options: Partial<ValidatorOptions> = {}): ValidationIssue[] {
  return new ArchitecturalValidator(bundledMatrix(), options).validate(typed(raw));
}

function codes(issues: ValidationIssue[]): string[] {
  return issues.map((issue) => issue.code);
}

function errorsOf(issues: ValidationIssue[]): ValidationIssue[] {
  return issues.filter((issue) => issue.severity === "error");
}

describe("ArchitecturalValidator", () => {
  afterEach(() => {
    setTestSink(null);
  });

  describe("connectivity", () => {
    it("flags bindings the matrix forbids", () => {
      const issues = validate(
        rawBlueprint(
          [component("ingest", "Source"), component("db", "Store")],
          [binding("db", "output", "ingest", "input")]
        )
      );

      const connection = issues.find((issue) => issue.code === "INVALID_CONNECTION");
      expect(connection).toMatchObject({
        kind: "connectivity",
        severity: "error",
        path: "system.bindings[0].to_components[0]",
        binding: "db.output -> ingest.input",
        suggestion: "Store is terminal and cannot send data",
      });
    });

    it("names the allowed targets in the suggestion", () => {
      const issues = validate(
        rawBlueprint(
          [component("ctl", "Controller"), component("gate", "Filter"), component("db", "Store")],
          [binding("ctl", "command", "gate", "input"), binding("gate", "output", "db", "input")]
        )
      );

      const connection = issues.find((issue) => issue.code === "INVALID_CONNECTION");
      expect(connection?.suggestion).toBe("Controller may connect to: Transformer, APIEndpoint, Store, Sink");
    });

    it("flags ports a component does not declare", () => {
      const issues = validate(
        rawBlueprint(
          [
            component("ingest", "Source", { outputs: [{ name: "out" }] }),
            component("db", "Store", { inputs: [{ name: "rows" }] }),
          ],
          [binding("ingest", "wrong", "db", "records")]
        )
      );

      expect(errorsOf(issues).map((issue) => [issue.code, issue.path])).toEqual([
        ["UNKNOWN_PORT", "system.bindings[0].from_port"],
        ["UNKNOWN_PORT", "system.bindings[0].to_ports[0]"],
      ]);
    });

    it("does not check ports on components that declare none", () => {
      const issues = validate(
        rawBlueprint(
          [component("ingest", "Source"), component("db", "Store")],
          [binding("ingest", "anything", "db", "whatever")]
        )
      );

      expect(codes(issues)).not.toContain("UNKNOWN_PORT");
    });
  });

  describe("lint contradictions", () => {
    it("flags a terminal component with outputs", () => {
      const issues = validate(
        rawBlueprint(
          [
            component("src", "Source", { outputs: [{ name: "output" }] }),
            component("sink", "Sink", {
              terminal_hint: true,
              inputs: [{ name: "input" }],
              outputs: [{ name: "leak" }],
            }),
          ],
          [binding("src", "output", "sink", "input")]
        )
      );

      expect(errorsOf(issues)).toEqual([
        expect.objectContaining({
          kind: "lint",
          code: "TERMINAL_HAS_OUTPUTS",
          path: "system.components[1].outputs",
          component: "sink",
        }),
      ]);
    });

    it("flags a terminal component with outgoing bindings", () => {
      const issues = validate(
        rawBlueprint(
          [component("t", "Transformer", { terminal: true }), component("db", "Store")],
          [binding("t", "output", "db", "input")]
        )
      );

      expect(codes(errorsOf(issues))).toEqual(["TERMINAL_HAS_OUTGOING"]);
    });
  });

  describe("boundary termination", () => {
    it("requires a reply port when an ingress demands one", () => {
      const issues = validate(
        rawBlueprint(
          [
            component("api", "APIEndpoint", {
              inputs: [{ name: "request", boundary_ingress: true, reply_required: true }],
              outputs: [{ name: "response" }],
            }),
            component("db", "Store", { inputs: [{ name: "input" }] }),
          ],
          [binding("api", "response", "db", "input")]
        )
      );

      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatchObject({
        kind: "boundary_termination",
        code: "MISSING_REPLY",
        severity: "error",
        path: "system.components[0].inputs.request",
        component: "api",
      });
    });

    it("accepts an ingress whose own component answers", () => {
      const issues = validate(
        rawBlueprint(
          [
            component("api", "APIEndpoint", {
              inputs: [{ name: "request", boundary_ingress: true, reply_required: true }],
              outputs: [{ name: "response", boundary_egress: true }],
            }),
            component("db", "Store", { inputs: [{ name: "input" }] }),
          ],
          [binding("api", "response", "db", "input")]
        )
      );

      expect(issues).toEqual([]);
    });

    it("flags an ingress that reaches no commitment point", () => {
      const raw = rawBlueprint(
        [
          component("t", "Transformer", {
            inputs: [{ name: "in", boundary_ingress: true }],
            outputs: [{ name: "out" }],
          }),
          component("log", "Sink", { inputs: [{ name: "input" }] }),
        ],
        [binding("t", "out", "log", "input")]
      );

      const issues = validate(raw);
      expect(codes(issues)).toEqual(["INGRESS_NO_COMMITMENT"]);
      expect(issues[0]?.path).toBe("system.components[0].inputs.in");
    });

    it("accepts an ingress that reaches a durable component", () => {
      const issues = validate(
        rawBlueprint(
          [
            component("t", "Transformer", {
              inputs: [{ name: "in", boundary_ingress: true }],
              outputs: [{ name: "out" }],
            }),
            component("log", "Sink", { durable: true, inputs: [{ name: "input" }] }),
          ],
          [binding("t", "out", "log", "input")]
        )
      );

      expect(issues).toEqual([]);
    });

    it("warns when no boundary flags exist and no endpoint pairs with persistence", () => {
      const issues = validate(
        rawBlueprint(
          [component("ingest", "Source"), component("db", "Store")],
          [binding("ingest", "output", "db", "input")]
        )
      );

      expect(issues).toEqual([
        expect.objectContaining({
          kind: "boundary_termination",
          code: "NO_BOUNDARY_SEMANTICS",
          severity: "warning",
        }),
      ]);
    });

    it("accepts an endpoint with persistence when no boundary flags exist", () => {
      const issues = validate(
        rawBlueprint(
          [component("api", "APIEndpoint"), component("db", "Store")],
          [binding("api", "response", "db", "input")]
        )
      );

      expect(codes(issues)).not.toContain("NO_BOUNDARY_SEMANTICS");
    });

    it("reports orphans instead when reachability analysis is disabled", () => {
      const issues = validate(
        rawBlueprint(
          [component("ingest", "Source"), component("db", "Store"), component("audit", "Sink")],
          [binding("ingest", "output", "db", "input")]
        ),
        { boundaryTerminationEnabled: false }
      );

      expect(issues.filter((issue) => issue.code === "ORPHANED_COMPONENT")).toEqual([
        expect.objectContaining({ kind: "completeness", severity: "warning", component: "audit" }),
      ]);
      expect(codes(issues)).not.toContain("NO_BOUNDARY_SEMANTICS");
    });
  });

  describe("pattern classification", () => {
    // s → t1, t2, t3 → db: 5 nodes, 6 edges
    const fanOut = typed(
      rawBlueprint(
        [
          component("s", "Source"),
          component("t1", "Transformer"),
          component("t2", "Transformer"),
          component("t3", "Transformer"),
          component("db", "Store"),
        ],
        [
          { from_component: "s", from_port: "output", to_components: ["t1", "t2", "t3"], to_ports: ["input", "input", "input"] },
          binding("t1", "output", "db", "input"),
          binding("t2", "output", "db", "input"),
          binding("t3", "output", "db", "input"),
        ]
      )
    );

    it("treats sparse graphs as pipelines", () => {
      const graph = buildSystemGraph(fanOut);
      expect(classifyArchitecture(graph, { pipelineEdgeSlack: 2, fanOutThreshold: 2, fanInThreshold: 2 })).toBe(
        "pipeline"
      );
    });

    it("detects fan-out, then fan-in, then gives up", () => {
      const graph = buildSystemGraph(fanOut);
      expect(classifyArchitecture(graph, { pipelineEdgeSlack: 0, fanOutThreshold: 2, fanInThreshold: 2 })).toBe(
        "fan_out"
      );
      expect(classifyArchitecture(graph, { pipelineEdgeSlack: 0, fanOutThreshold: 5, fanInThreshold: 2 })).toBe(
        "fan_in"
      );
      expect(classifyArchitecture(graph, { pipelineEdgeSlack: 0, fanOutThreshold: 5, fanInThreshold: 5 })).toBe(
        "unknown"
      );
    });

    it("prefers request/response when an endpoint is present", () => {
      const doc = typed(
        rawBlueprint(
          [
            component("api", "APIEndpoint"),
            component("t1", "Transformer"),
            component("t2", "Transformer"),
            component("db", "Store"),
          ],
          [
            binding("api", "response", "t1", "input"),
            binding("api", "response", "t2", "input"),
            binding("t1", "output", "db", "input"),
            binding("t2", "output", "db", "input"),
            binding("t1", "output", "t2", "input"),
          ]
        )
      );

      expect(
        classifyArchitecture(buildSystemGraph(doc), { pipelineEdgeSlack: 0, fanOutThreshold: 2, fanInThreshold: 2 })
      ).toBe("request_response");
    });

    it("warns only for unrecognised structures", () => {
      const validator = new ArchitecturalValidator(bundledMatrix(), {
        pipelineEdgeSlack: 0,
        fanOutThreshold: 5,
        fanInThreshold: 5,
      });

      expect(validator.classify(fanOut)).toBe("unknown");
      expect(codes(validator.validate(fanOut))).toContain("UNKNOWN_PATTERN");
    });
  });

  describe("completeness", () => {
    it("reads essential components from the system description", () => {
      const issues = validate(
        rawBlueprint(
          [component("src", "Source"), component("out", "Sink")],
          [binding("src", "output", "out", "input")],
          { description: "REST service that must persist orders" }
        )
      );

      expect(
        issues
          .filter((issue) => issue.code === "MISSING_ESSENTIAL_COMPONENT")
          .map((issue) => issue.severity)
      ).toEqual(["error", "warning"]);
    });

    it("matches keywords on word boundaries only", () => {
      const issues = validate(
        rawBlueprint(
          [component("src", "Source"), component("out", "Sink")],
          [binding("src", "output", "out", "input")],
          { description: "Rapid ingestion from the datastore feed" }
        )
      );

      expect(codes(issues)).not.toContain("MISSING_ESSENTIAL_COMPONENT");
    });

    it("notes components with fewer connections than their kind expects", () => {
      const issues = validate(
        rawBlueprint(
          [component("a", "Source"), component("b", "Source"), component("merge", "Aggregator"), component("db", "Store")],
          [binding("a", "output", "merge", "input1"), binding("merge", "output", "db", "input"), binding("b", "output", "db", "input")]
        )
      );

      expect(issues.filter((issue) => issue.code === "UNDER_CONNECTED")).toEqual([
        expect.objectContaining({
          severity: "info",
          component: "merge",
          message: "Aggregator 'merge' expects 2 input connection(s) but has 1",
        }),
      ]);
    });
  });

  describe("anti-patterns", () => {
    it("flags storage feeding an origin", () => {
      const issues = validate(
        rawBlueprint(
          [component("ingest", "Source"), component("db", "Store")],
          [binding("db", "output", "ingest", "input")]
        )
      );

      const antipatterns = issues.filter((issue) => issue.kind === "antipattern");
      expect(antipatterns).toHaveLength(1);
      expect(antipatterns[0]).toMatchObject({
        code: "STORE_FEEDS_ORIGIN",
        severity: "error",
        path: "system.bindings[0]",
        context: { from: "db", to: "ingest" },
      });
    });

    it("warns on excessive fan-out", () => {
      const issues = validate(
        rawBlueprint(
          [
            component("s", "Source"),
            component("t1", "Transformer"),
            component("t2", "Transformer"),
            component("t3", "Transformer"),
            component("t4", "Transformer"),
          ],
          [
            {
              from_component: "s",
              from_port: "output",
              to_components: ["t1", "t2", "t3", "t4"],
              to_ports: ["input", "input", "input", "input"],
            },
          ]
        )
      );

      expect(issues.filter((issue) => issue.code === "EXCESSIVE_FAN_OUT")).toEqual([
        expect.objectContaining({ severity: "warning", component: "s" }),
      ]);
    });
  });

  describe("schema compatibility", () => {
    const orders = component("orders", "Source", { outputs: [{ name: "out", schema: "OrderSchema" }] });
    const ledger = component("ledger", "Store", { inputs: [{ name: "records", schema: "LedgerSchema" }] });

    it("flags incompatible port schemas", () => {
      const issues = validate(rawBlueprint([orders, ledger], [binding("orders", "out", "ledger", "records")]));

      expect(errorsOf(issues)).toEqual([
        expect.objectContaining({
          kind: "schema",
          code: "SCHEMA_MISMATCH",
          path: "system.bindings[0].to_ports[0]",
          suggestion: "Declare a transformation such as 'convert_OrderSchema_to_LedgerSchema'",
        }),
      ]);
    });

    it("accepts widening conversions", () => {
      const issues = validate(
        rawBlueprint(
          [
            component("counter", "Source", { outputs: [{ name: "out", schema_type: "integer" }] }),
            component("db", "Store", { inputs: [{ name: "in", schema: "number" }] }),
          ],
          [binding("counter", "out", "db", "in")]
        )
      );

      expect(hasErrors(issues)).toBe(false);
    });

    it("does not treat distinct generic schemas as compatible", () => {
      const issues = validate(
        rawBlueprint(
          [
            component("counter", "Source", { outputs: [{ name: "out", schema: "common_integer_schema" }] }),
            component("flags", "Store", { inputs: [{ name: "in", schema: "common_boolean_schema" }] }),
          ],
          [binding("counter", "out", "flags", "in")]
        )
      );

      expect(codes(errorsOf(issues))).toEqual(["SCHEMA_MISMATCH"]);
    });

    it("notes synthesized transformations", () => {
      const issues = validate(
        rawBlueprint(
          [orders, ledger],
          [
            {
              ...binding("orders", "out", "ledger", "records"),
              transformation: "convert_OrderSchema_to_LedgerSchema",
              transformation_synthesized: true,
            },
          ]
        )
      );

      expect(issues.filter((issue) => issue.kind === "schema")).toEqual([
        expect.objectContaining({ code: "SYNTHETIC_TRANSFORMATION", severity: "info" }),
      ]);
    });

    it("rejects unregistered transformations in strict mode", () => {
      const raw = rawBlueprint(
        [orders, ledger],
        [{ ...binding("orders", "out", "ledger", "records"), transformation: "orders_to_ledger" }]
      );

      const strict = validate(raw, { strictTransformations: true, registeredTransformations: new Set() });
      expect(codes(errorsOf(strict))).toEqual(["UNREGISTERED_TRANSFORMATION"]);

      const registered = validate(raw, {
        strictTransformations: true,
        registeredTransformations: new Set(["orders_to_ledger"]),
      });
      expect(hasErrors(registered)).toBe(false);
    });
  });

  describe("reporting", () => {
    it("summarizes issues by severity", () => {
      const issues: ValidationIssue[] = [
        { kind: "lint", code: "TERMINAL_HAS_OUTPUTS", severity: "error", message: "a" },
        { kind: "pattern", code: "UNKNOWN_PATTERN", severity: "warning", message: "b" },
        { kind: "completeness", code: "UNDER_CONNECTED", severity: "info", message: "c" },
        { kind: "completeness", code: "UNDER_CONNECTED", severity: "info", message: "d" },
      ];

      expect(summarizeIssues(issues)).toEqual({ errors: 1, warnings: 1, info: 2 });
      expect(hasErrors(issues.slice(1))).toBe(false);
    });

    it("emits a completion event per document", () => {
      const matrix = bundledMatrix();
      const events: Array<{ name: string; data: TelemetryData }> = [];
      setTestSink((name, data) => events.push({ name, data }));

      new ArchitecturalValidator(matrix).validate(
        typed(rawBlueprint([component("ingest", "Source"), component("db", "Store")], [binding("db", "output", "ingest", "input")])),
        "req-1"
      );

      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        name: "blueprint.validation.completed",
        data: { request_id: "req-1", system: "test_system", components: 2, bindings: 1, errors: 2, warnings: 1, info: 1 },
      });
    });
  });
});
