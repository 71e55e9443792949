/**
 * Healing Orchestrator
 *
 * Drives parse → heal → validate to a fixed point:
 *
 *   NormalizeFormats → { StructuralHeal → Parse → InferPorts → SyncWorkingDoc
 *                        → SchemaHeal → Parse → Validate } → Success | Retry | Fail
 *
 * One working document is carried across attempts, so earlier repairs are
 * never lost. The loop ends on the first attempt without error-severity
 * issues, when the stagnation counter reaches its stop threshold, or when
 * the attempt budget runs out.
 *
 * @module healing/healing-orchestrator
 */

import { HealingFailedError, type HealingFailureReason } from "../blueprint/errors.js";
import { ZodBlueprintParser, type BlueprintParser } from "../blueprint/parser.js";
import { getConfig } from "../config/index.js";
import type { ConnectivityMatrix } from "../matrix/connectivity-matrix.js";
import type { BlueprintT, PortT } from "../schemas/blueprint.js";
import {
  cloneRecord,
  getArray,
  getRecord,
  getString,
  isRecord,
  recordsOf,
  type RawRecord,
} from "../utils/raw-document.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { ArchitecturalValidator, hasErrors, summarizeIssues } from "../validators/architectural-validator.js";
import type { ValidationIssue } from "../validators/architectural-validator.types.js";
import { structuralErrorsToIssues } from "../validators/zod-error-mapper.js";
import { BlueprintHealer } from "./blueprint-healer.js";
import { TemplatePortInference, type PortInference } from "./port-inference.js";
import { createHealingSession, recordAttempt } from "./session.js";

export interface HealingOrchestratorDeps {
  matrix: ConnectivityMatrix;
  parser?: BlueprintParser;
  portInference?: PortInference;
  validator?: ArchitecturalValidator;
  healer?: BlueprintHealer;
}

export interface HealOptions {
  /** Total attempts including the first; defaults to HEALING_MAX_ATTEMPTS */
  maxAttempts?: number;
  requestId?: string;
}

export interface HealingSuccess {
  status: "healed";
  document: BlueprintT;
  /** Healed raw document, ready to serialise */
  rawDocument: RawRecord;
  /** Remaining warning/info issues */
  issues: ValidationIssue[];
  attempts: number;
  /** Operations per attempt */
  operations: string[][];
}

export interface HealingFailure {
  status: "failed";
  reason: HealingFailureReason;
  /** Every issue from the final attempt */
  issues: ValidationIssue[];
  attempts: number;
  rawDocument?: RawRecord;
  operations: string[][];
}

export type HealingOutcome = HealingSuccess | HealingFailure;

// =============================================================================
// Working document sync
// =============================================================================

function serializePort(port: PortT): RawRecord {
  const raw: RawRecord = { name: port.name };
  if (port.schema_id !== undefined) raw.schema = port.schema_id;
  if (!port.required) raw.required = false;
  if (port.boundary_ingress) raw.boundary_ingress = true;
  if (port.boundary_egress) raw.boundary_egress = true;
  if (port.reply_required) raw.reply_required = true;
  if (port.satisfies_reply) raw.satisfies_reply = true;
  if (port.data_classification !== undefined) raw.data_classification = port.data_classification;
  if (port.description !== undefined) raw.description = port.description;
  return raw;
}

function appendMissingPorts(record: RawRecord, field: "inputs" | "outputs", ports: readonly PortT[]): void {
  const declared = getArray(record, field) ?? [];
  const names = new Set(recordsOf(declared).map((p) => p.name));
  const added = ports.filter((p) => !names.has(p.name)).map(serializePort);
  if (added.length > 0) {
    record[field] = [...declared, ...added];
  }
}

/**
 * Write ports from a typed (port-inferred) document back into the raw
 * working document. Ports are only appended; declared ones stay as written.
 */
export function syncWorkingDocument(working: RawRecord, typed: BlueprintT): RawRecord {
  const document = cloneRecord(working);
  const system = getRecord(document, "system");
  if (!system) return document;

  const byName = new Map(typed.components.map((c) => [c.name, c]));
  for (const record of recordsOf(system.components)) {
    const name = getString(record, "name");
    const component = name === undefined ? undefined : byName.get(name);
    if (!component) continue;
    appendMissingPorts(record, "inputs", component.inputs);
    appendMissingPorts(record, "outputs", component.outputs);
  }

  return document;
}

// Non-integer budgets fall back to the configured one; at least one attempt always runs
function resolveMaxAttempts(requested: number | undefined, configured: number): number {
  if (requested === undefined || !Number.isInteger(requested)) return configured;
  return Math.max(1, requested);
}

// =============================================================================
// Orchestrator
// =============================================================================

export class HealingOrchestrator {
  private readonly parser: BlueprintParser;
  private readonly portInference: PortInference;
  private readonly validator: ArchitecturalValidator;
  private readonly healer: BlueprintHealer;

  constructor(deps: HealingOrchestratorDeps) {
    this.parser = deps.parser ?? new ZodBlueprintParser();
    this.portInference = deps.portInference ?? new TemplatePortInference();
    this.validator = deps.validator ?? new ArchitecturalValidator(deps.matrix);
    this.healer = deps.healer ?? new BlueprintHealer(deps.matrix);
  }

  healAndValidate(raw: unknown, options: HealOptions = {}): HealingOutcome {
    const healingConfig = getConfig().healing;
    const maxAttempts = resolveMaxAttempts(options.maxAttempts, healingConfig.maxAttempts);
    const thresholds = {
      warnAt: healingConfig.stagnationWarnAt,
      stopAt: healingConfig.stagnationStopAt,
    };
    const requestId = options.requestId;

    if (!isRecord(raw)) {
      const issues: ValidationIssue[] = [
        {
          kind: "structure",
          code: "INVALID_DOCUMENT",
          severity: "error",
          message: "Blueprint must be a mapping with a system block",
        },
      ];
      emit(TelemetryEvents.HealingFailed, { request_id: requestId, reason: "invalid_input", attempts: 0 });
      return { status: "failed", reason: "invalid_input", issues, attempts: 0, operations: [] };
    }

    const session = createHealingSession();
    const startTime = Date.now();
    emit(TelemetryEvents.HealingStarted, {
      request_id: requestId,
      session_id: session.id,
      max_attempts: maxAttempts,
    });

    const normalised = this.healer.normaliseFormats(raw);
    let working = normalised.document;
    if (normalised.operations.length > 0) {
      log.debug(
        { event: "healing.formats.normalised", session_id: session.id, operations: normalised.operations },
        "Normalized blueprint formats"
      );
    }

    let issues: ValidationIssue[] = [];

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const structural = this.healer.heal(working, "structural", session);
      working = structural.document;
      const operations = [...structural.operations];

      let parsed = this.parser.parse(working);
      if (parsed.ok) {
        const inferred = this.portInference.inferPorts(parsed.document);
        working = syncWorkingDocument(working, inferred);

        const schema = this.healer.heal(working, "schema", session);
        working = schema.document;
        operations.push(...schema.operations);

        parsed = this.parser.parse(working);
      }

      if (parsed.ok) {
        issues = this.validator.validate(parsed.document, requestId);
        if (!hasErrors(issues)) {
          session.history.push(operations);
          emit(TelemetryEvents.HealingSucceeded, {
            request_id: requestId,
            session_id: session.id,
            attempts: attempt,
            ...summarizeIssues(issues),
            duration_ms: Date.now() - startTime,
          });
          return {
            status: "healed",
            document: parsed.document,
            rawDocument: working,
            issues,
            attempts: attempt,
            operations: session.history,
          };
        }
      } else {
        issues = structuralErrorsToIssues(parsed.errors);
      }

      const verdict = recordAttempt(session, operations, thresholds);
      emit(TelemetryEvents.HealingAttemptCompleted, {
        request_id: requestId,
        session_id: session.id,
        attempt,
        operation_count: operations.length,
        verdict,
        ...summarizeIssues(issues),
      });

      if (verdict === "warn") {
        emit(TelemetryEvents.HealingStagnationWarning, {
          request_id: requestId,
          session_id: session.id,
          attempt,
          stagnation_count: session.stagnationCount,
        });
      } else if (verdict === "stop") {
        return this.fail("stagnation", attempt, issues, working, session.history, requestId);
      }
    }

    return this.fail("attempts_exhausted", maxAttempts, issues, working, session.history, requestId);
  }

  /**
   * Heal and validate, throwing HealingFailedError on failure.
   */
  healAndValidateOrThrow(raw: unknown, options: HealOptions = {}): BlueprintT {
    const outcome = this.healAndValidate(raw, options);
    if (outcome.status === "failed") {
      throw new HealingFailedError(outcome.reason, outcome.attempts, outcome.issues);
    }
    return outcome.document;
  }

  private fail(
    reason: HealingFailureReason,
    attempts: number,
    issues: ValidationIssue[],
    rawDocument: RawRecord,
    operations: string[][],
    requestId: string | undefined
  ): HealingFailure {
    emit(TelemetryEvents.HealingFailed, {
      request_id: requestId,
      reason,
      attempts,
      ...summarizeIssues(issues),
    });
    return { status: "failed", reason, issues, attempts, rawDocument, operations };
  }
}
