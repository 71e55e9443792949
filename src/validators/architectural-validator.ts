/**
 * Architectural Validator
 *
 * Graph-level checks over a typed blueprint. Runs after the typed parse,
 * and collects every issue from every pass rather than stopping at the
 * first one.
 *
 * Passes, in order:
 * 1. Connectivity (matrix rules, declared ports)
 * 2. Lint contradictions (terminal_hint with outputs or outgoing edges)
 * 3. Boundary termination (ingress → commitment reachability, replies)
 * 4. Pattern classification
 * 5. Completeness heuristics
 * 6. Anti-patterns
 * 7. Schema compatibility across bindings
 *
 * The validator holds no per-document state; one instance can serve any
 * number of documents concurrently.
 *
 * @module validators/architectural-validator
 */

import { roleOf } from "../blueprint/component-kinds.js";
import { getConfig } from "../config/index.js";
import {
  buildSystemGraph,
  inDegree,
  outDegree,
  reachableFrom,
  successors,
  type SystemGraph,
} from "../graph/system-graph.js";
import type { ConnectivityMatrix } from "../matrix/connectivity-matrix.js";
import type { BindingT, BlueprintT, ComponentT, PortT } from "../schemas/blueprint.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import type {
  ArchitecturalPattern,
  IssueSummary,
  PatternThresholds,
  ValidationIssue,
  ValidatorOptions,
} from "./architectural-validator.types.js";
import { areSchemasCompatible, transformationName } from "./schema-compatibility.js";

// =============================================================================
// Options & Context
// =============================================================================

/**
 * Validator options from configuration.
 */
export function resolveValidatorOptions(): ValidatorOptions {
  const { validation } = getConfig();
  return {
    boundaryTerminationEnabled: validation.boundaryTerminationEnabled,
    strictTransformations: validation.strictTransformations,
    registeredTransformations: new Set(validation.registeredTransformations),
    fanOutThreshold: validation.fanOutThreshold,
    fanInThreshold: validation.fanInThreshold,
    excessiveFanOutThreshold: validation.excessiveFanOutThreshold,
    pipelineEdgeSlack: validation.pipelineEdgeSlack,
  };
}

interface ValidationContext {
  document: BlueprintT;
  graph: SystemGraph;
  matrix: ConnectivityMatrix;
  options: ValidatorOptions;
  components: ReadonlyMap<string, ComponentT>;
}

function componentPath(ctx: ValidationContext, name: string): string | undefined {
  const node = ctx.graph.nodes.get(name);
  return node ? `system.components[${node.index}]` : undefined;
}

function bindingLabel(binding: BindingT, targetIndex: number): string {
  const target = binding.to_components[targetIndex] ?? "?";
  const port = binding.to_ports[targetIndex] ?? "?";
  return `${binding.from_component}.${binding.from_port} -> ${target}.${port}`;
}

// =============================================================================
// Pass 1: Connectivity
// =============================================================================

function validateConnectivity(ctx: ValidationContext): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  ctx.document.bindings.forEach((binding, bindingIndex) => {
    const source = ctx.components.get(binding.from_component);
    if (!source) return;

    if (source.outputs.length > 0 && !source.outputs.some((p) => p.name === binding.from_port)) {
      issues.push({
        kind: "connectivity",
        code: "UNKNOWN_PORT",
        severity: "error",
        message: `Component '${source.name}' has no output port '${binding.from_port}'`,
        path: `system.bindings[${bindingIndex}].from_port`,
        component: source.name,
        suggestion: `Use one of: ${source.outputs.map((p) => p.name).join(", ")}`,
      });
    }

    binding.to_components.forEach((targetName, targetIndex) => {
      const target = ctx.components.get(targetName);
      if (!target) return;

      if (!ctx.matrix.allows(source.type, target.type)) {
        const allowed = ctx.matrix.allowedTargets(source.type);
        issues.push({
          kind: "connectivity",
          code: "INVALID_CONNECTION",
          severity: "error",
          message: `${source.type} '${source.name}' cannot connect to ${target.type} '${target.name}'`,
          path: `system.bindings[${bindingIndex}].to_components[${targetIndex}]`,
          component: source.name,
          binding: bindingLabel(binding, targetIndex),
          suggestion:
            allowed.length > 0
              ? `${source.type} may connect to: ${allowed.join(", ")}`
              : `${source.type} is terminal and cannot send data`,
          context: { from_type: source.type, to_type: target.type, allowed_targets: allowed },
        });
      }

      const toPort = binding.to_ports[targetIndex];
      if (
        toPort !== undefined &&
        target.inputs.length > 0 &&
        !target.inputs.some((p) => p.name === toPort)
      ) {
        issues.push({
          kind: "connectivity",
          code: "UNKNOWN_PORT",
          severity: "error",
          message: `Component '${target.name}' has no input port '${toPort}'`,
          path: `system.bindings[${bindingIndex}].to_ports[${targetIndex}]`,
          component: target.name,
          binding: bindingLabel(binding, targetIndex),
          suggestion: `Use one of: ${target.inputs.map((p) => p.name).join(", ")}`,
        });
      }
    });
  });

  return issues;
}

// =============================================================================
// Pass 2: Lint Contradictions
// =============================================================================

/**
 * terminal_hint components must have no outputs and no outgoing edges.
 * These are never healed by shims; the document itself has to change.
 */
function validateLint(ctx: ValidationContext): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const component of ctx.document.components) {
    if (!component.terminal_hint) continue;

    if (component.outputs.length > 0) {
      issues.push({
        kind: "lint",
        code: "TERMINAL_HAS_OUTPUTS",
        severity: "error",
        message: `Component '${component.name}' is marked terminal but declares ${component.outputs.length} output port(s)`,
        path: `${componentPath(ctx, component.name)}.outputs`,
        component: component.name,
        suggestion: "Remove the outputs or clear terminal_hint",
      });
    }

    const targets = successors(ctx.graph, component.name);
    if (targets.length > 0) {
      issues.push({
        kind: "lint",
        code: "TERMINAL_HAS_OUTGOING",
        severity: "error",
        message: `Component '${component.name}' is marked terminal but sends to: ${targets.join(", ")}`,
        path: componentPath(ctx, component.name),
        component: component.name,
        suggestion: "Remove the outgoing bindings or clear terminal_hint",
      });
    }
  }

  return issues;
}

// =============================================================================
// Pass 3: Boundary Termination
// =============================================================================

interface IngressPoint {
  component: ComponentT;
  port: PortT;
}

function validateBoundaryTermination(ctx: ValidationContext): ValidationIssue[] {
  const ingressPoints: IngressPoint[] = [];
  const commitment = new Set<string>();
  let hasBoundaryFlags = false;

  for (const component of ctx.document.components) {
    for (const port of component.inputs) {
      if (port.boundary_ingress) {
        ingressPoints.push({ component, port });
        hasBoundaryFlags = true;
      }
    }
    for (const port of component.outputs) {
      if (port.boundary_egress) {
        commitment.add(component.name);
        hasBoundaryFlags = true;
      }
    }
    if (component.durable) {
      commitment.add(component.name);
    }
  }

  if (!hasBoundaryFlags) {
    return boundaryFallback(ctx);
  }

  const issues: ValidationIssue[] = [];
  const reachCache = new Map<string, boolean>();

  const reachesCommitment = (name: string): boolean => {
    // Same-node commitment needs no traversal
    if (commitment.has(name)) return true;
    const cached = reachCache.get(name);
    if (cached !== undefined) return cached;
    let found = false;
    for (const reached of reachableFrom(ctx.graph, name)) {
      if (commitment.has(reached)) {
        found = true;
        break;
      }
    }
    reachCache.set(name, found);
    return found;
  };

  for (const { component, port } of ingressPoints) {
    const path = `${componentPath(ctx, component.name)}.inputs.${port.name}`;

    if (!reachesCommitment(component.name)) {
      issues.push({
        kind: "boundary_termination",
        code: "INGRESS_NO_COMMITMENT",
        severity: "error",
        message: `Ingress '${component.name}.${port.name}' does not reach any durable component or boundary egress`,
        path,
        component: component.name,
        suggestion: `Bind '${component.name}' (directly or through processors) to a Store or to a component with a boundary_egress output`,
      });
    }

    if (port.reply_required && !component.outputs.some((o) => o.boundary_egress)) {
      issues.push({
        kind: "boundary_termination",
        code: "MISSING_REPLY",
        severity: "error",
        message: `Ingress '${component.name}.${port.name}' requires a reply but '${component.name}' has no boundary_egress output`,
        path,
        component: component.name,
        suggestion: `Add an output port with boundary_egress: true to '${component.name}'`,
      });
    }
  }

  return issues;
}

/**
 * No boundary flags anywhere: accept an endpoint paired with persistence or
 * orchestration, otherwise warn.
 */
function boundaryFallback(ctx: ValidationContext): ValidationIssue[] {
  const roles = new Set(ctx.document.components.map((c) => roleOf(c.type)));

  if (roles.has("endpoint") && (roles.has("storage") || roles.has("orchestrator"))) {
    log.debug(
      { event: "validator.boundary.fallback_passed", system: ctx.document.name },
      "No boundary flags; endpoint with persistence/orchestration accepted"
    );
    return [];
  }

  return [
    {
      kind: "boundary_termination",
      code: "NO_BOUNDARY_SEMANTICS",
      severity: "warning",
      message: "No ports declare boundary_ingress or boundary_egress; ingress-to-commitment reachability was not checked",
      suggestion:
        "Mark externally triggered inputs with boundary_ingress and externally visible outputs with boundary_egress",
    },
  ];
}

/**
 * Reachability analysis disabled: flag components with no bindings at all.
 */
function validateOrphans(ctx: ValidationContext): ValidationIssue[] {
  if (ctx.document.components.length === 1) return [];

  return ctx.document.components
    .filter((c) => inDegree(ctx.graph, c.name) === 0 && outDegree(ctx.graph, c.name) === 0)
    .map((c): ValidationIssue => ({
      kind: "completeness",
      code: "ORPHANED_COMPONENT",
      severity: "warning",
      message: `Component '${c.name}' has no bindings`,
      path: componentPath(ctx, c.name),
      component: c.name,
      suggestion: `Bind '${c.name}' to the rest of the system or remove it`,
    }));
}

// =============================================================================
// Pass 4: Pattern Classification
// =============================================================================

export function classifyArchitecture(
  graph: SystemGraph,
  thresholds: PatternThresholds
): ArchitecturalPattern {
  const names = [...graph.nodes.keys()];

  if (graph.edges.size <= graph.nodes.size + thresholds.pipelineEdgeSlack) {
    return "pipeline";
  }
  if ([...graph.nodes.values()].some((node) => roleOf(node.kind) === "endpoint")) {
    return "request_response";
  }
  if (names.some((name) => outDegree(graph, name) > thresholds.fanOutThreshold)) {
    return "fan_out";
  }
  if (names.some((name) => inDegree(graph, name) > thresholds.fanInThreshold)) {
    return "fan_in";
  }
  return "unknown";
}

function validatePattern(ctx: ValidationContext): ValidationIssue[] {
  const pattern = classifyArchitecture(ctx.graph, ctx.options);
  if (pattern !== "unknown") return [];

  return [
    {
      kind: "pattern",
      code: "UNKNOWN_PATTERN",
      severity: "warning",
      message: "System does not follow a recognizable architectural pattern",
      suggestion: "Consider restructuring as a pipeline, request/response, fan-out or fan-in flow",
      context: { nodes: ctx.graph.nodes.size, edges: ctx.graph.edges.size },
    },
  ];
}

// =============================================================================
// Pass 5: Completeness
// =============================================================================

const API_KEYWORDS = /\b(api|rest)\b/i;
const STORAGE_KEYWORDS = /\b(store|persist|save)\b/i;

function validateCompleteness(ctx: ValidationContext): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const roles = new Set(ctx.document.components.map((c) => roleOf(c.type)));
  const description = ctx.document.description ?? "";

  if (API_KEYWORDS.test(description) && !roles.has("endpoint")) {
    issues.push({
      kind: "completeness",
      code: "MISSING_ESSENTIAL_COMPONENT",
      severity: "error",
      message: "System description mentions an API but no APIEndpoint component is declared",
      path: "system.description",
      suggestion: "Add an APIEndpoint component",
    });
  }

  if (STORAGE_KEYWORDS.test(description) && !roles.has("storage")) {
    issues.push({
      kind: "completeness",
      code: "MISSING_ESSENTIAL_COMPONENT",
      severity: "warning",
      message: "System description mentions storage but no Store component is declared",
      path: "system.description",
      suggestion: "Add a Store component",
    });
  }

  for (const component of ctx.document.components) {
    const expected = ctx.matrix.rulesFor(component.type).expectedInputs;
    const actual = inDegree(ctx.graph, component.name);
    if (actual >= expected) continue;
    if (component.inputs.some((p) => p.boundary_ingress)) continue;

    issues.push({
      kind: "completeness",
      code: "UNDER_CONNECTED",
      severity: "info",
      message: `${component.type} '${component.name}' expects ${expected} input connection(s) but has ${actual}`,
      path: componentPath(ctx, component.name),
      component: component.name,
    });
  }

  return issues;
}

// =============================================================================
// Pass 6: Anti-patterns
// =============================================================================

function validateAntiPatterns(ctx: ValidationContext): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const edge of ctx.graph.edges.values()) {
    const from = ctx.graph.nodes.get(edge.from);
    const to = ctx.graph.nodes.get(edge.to);
    if (!from || !to) continue;

    if (roleOf(from.kind) === "storage" && roleOf(to.kind) === "origin") {
      const [first] = edge.ports;
      issues.push({
        kind: "antipattern",
        code: "STORE_FEEDS_ORIGIN",
        severity: "error",
        message: `${from.kind} '${from.name}' feeds ${to.kind} '${to.name}'; storage must not drive an origin`,
        path: first ? `system.bindings[${first.bindingIndex}]` : undefined,
        component: from.name,
        binding: first ? `${edge.from}.${first.fromPort} -> ${edge.to}.${first.toPort}` : undefined,
        suggestion: `Remove the binding from '${from.name}' to '${to.name}'`,
        context: { from: from.name, to: to.name },
      });
    }
  }

  for (const name of ctx.graph.nodes.keys()) {
    const degree = outDegree(ctx.graph, name);
    if (degree > ctx.options.excessiveFanOutThreshold) {
      issues.push({
        kind: "antipattern",
        code: "EXCESSIVE_FAN_OUT",
        severity: "warning",
        message: `Component '${name}' sends to ${degree} components`,
        path: componentPath(ctx, name),
        component: name,
        suggestion: `Route the outputs of '${name}' through a Router component`,
      });
    }
  }

  return issues;
}

// =============================================================================
// Pass 7: Schema Compatibility
// =============================================================================

function validateSchemas(ctx: ValidationContext): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  ctx.document.bindings.forEach((binding, bindingIndex) => {
    const source = ctx.components.get(binding.from_component);
    if (!source) return;
    const path = `system.bindings[${bindingIndex}]`;

    if (binding.transformation !== undefined) {
      if (
        ctx.options.strictTransformations &&
        !ctx.options.registeredTransformations.has(binding.transformation)
      ) {
        issues.push({
          kind: "schema",
          code: "UNREGISTERED_TRANSFORMATION",
          severity: "error",
          message: `Transformation '${binding.transformation}' is not registered`,
          path: `${path}.transformation`,
          binding: bindingLabel(binding, 0),
          suggestion: "Register the transformation or declare compatible port schemas",
        });
      } else if (binding.transformation_synthesized) {
        issues.push({
          kind: "schema",
          code: "SYNTHETIC_TRANSFORMATION",
          severity: "info",
          message: `Transformation '${binding.transformation}' was synthesized; its conversion is not verified`,
          path: `${path}.transformation`,
          binding: bindingLabel(binding, 0),
        });
      }
      return;
    }

    const fromSchema = source.outputs.find((p) => p.name === binding.from_port)?.schema_id;
    if (fromSchema === undefined) return;

    binding.to_components.forEach((targetName, targetIndex) => {
      const target = ctx.components.get(targetName);
      const toPort = binding.to_ports[targetIndex];
      const toSchema = target?.inputs.find((p) => p.name === toPort)?.schema_id;
      if (toSchema === undefined || areSchemasCompatible(fromSchema, toSchema)) return;

      issues.push({
        kind: "schema",
        code: "SCHEMA_MISMATCH",
        severity: "error",
        message: `Schema '${fromSchema}' of '${binding.from_component}.${binding.from_port}' is not compatible with '${toSchema}' of '${targetName}.${toPort}'`,
        path: `${path}.to_ports[${targetIndex}]`,
        binding: bindingLabel(binding, targetIndex),
        suggestion: `Declare a transformation such as '${transformationName(fromSchema, toSchema)}'`,
      });
    });
  });

  return issues;
}

// =============================================================================
// Validator
// =============================================================================

export class ArchitecturalValidator {
  private readonly options: ValidatorOptions;

  constructor(
    private readonly matrix: ConnectivityMatrix,
    options: Partial<ValidatorOptions> = {}
  ) {
    this.options = { ...resolveValidatorOptions(), ...options };
  }

  validate(document: BlueprintT, requestId?: string): ValidationIssue[] {
    const startTime = Date.now();
    const ctx: ValidationContext = {
      document,
      graph: buildSystemGraph(document),
      matrix: this.matrix,
      options: this.options,
      components: new Map(document.components.map((c) => [c.name, c])),
    };

    const issues: ValidationIssue[] = [
      ...validateConnectivity(ctx),
      ...validateLint(ctx),
      ...(this.options.boundaryTerminationEnabled
        ? validateBoundaryTermination(ctx)
        : validateOrphans(ctx)),
      ...validatePattern(ctx),
      ...validateCompleteness(ctx),
      ...validateAntiPatterns(ctx),
      ...validateSchemas(ctx),
    ];

    const summary = summarizeIssues(issues);
    emit(TelemetryEvents.ValidationCompleted, {
      request_id: requestId,
      system: document.name,
      components: document.components.length,
      bindings: document.bindings.length,
      ...summary,
      duration_ms: Date.now() - startTime,
    });

    return issues;
  }

  classify(document: BlueprintT): ArchitecturalPattern {
    return classifyArchitecture(buildSystemGraph(document), this.options);
  }
}

export function summarizeIssues(issues: readonly ValidationIssue[]): IssueSummary {
  const summary: IssueSummary = { errors: 0, warnings: 0, info: 0 };
  for (const issue of issues) {
    if (issue.severity === "error") summary.errors++;
    else if (issue.severity === "warning") summary.warnings++;
    else summary.info++;
  }
  return summary;
}

export function hasErrors(issues: readonly ValidationIssue[]): boolean {
  return issues.some((issue) => issue.severity === "error");
}
