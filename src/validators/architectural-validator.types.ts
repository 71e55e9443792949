/**
 * Architectural Validator Types
 *
 * Issue codes and shapes produced by the architectural validator and by the
 * typed parse (structure issues).
 *
 * @module validators/architectural-validator.types
 */

// =============================================================================
// Issue Kinds
// =============================================================================

export type IssueKind =
  | "structure"
  | "connectivity"
  | "lint"
  | "boundary_termination"
  | "pattern"
  | "completeness"
  | "antipattern"
  | "schema";

// =============================================================================
// Issue Codes
// =============================================================================

export type StructureIssueCode =
  | "MISSING_FIELD"
  | "INVALID_TYPE"
  | "INVALID_VALUE"
  | "DUPLICATE_COMPONENT"
  | "UNKNOWN_COMPONENT_REF"
  | "ARITY_MISMATCH"
  | "INVALID_DOCUMENT";

export type ConnectivityIssueCode = "INVALID_CONNECTION" | "UNKNOWN_PORT";

export type LintIssueCode = "TERMINAL_HAS_OUTPUTS" | "TERMINAL_HAS_OUTGOING";

export type BoundaryIssueCode =
  | "INGRESS_NO_COMMITMENT"
  | "MISSING_REPLY"
  | "NO_BOUNDARY_SEMANTICS";

export type PatternIssueCode = "UNKNOWN_PATTERN";

export type CompletenessIssueCode =
  | "MISSING_ESSENTIAL_COMPONENT"
  | "UNDER_CONNECTED"
  | "ORPHANED_COMPONENT";

export type AntiPatternIssueCode = "STORE_FEEDS_ORIGIN" | "EXCESSIVE_FAN_OUT";

export type SchemaIssueCode =
  | "SCHEMA_MISMATCH"
  | "UNREGISTERED_TRANSFORMATION"
  | "SYNTHETIC_TRANSFORMATION";

export type IssueCode =
  | StructureIssueCode
  | ConnectivityIssueCode
  | LintIssueCode
  | BoundaryIssueCode
  | PatternIssueCode
  | CompletenessIssueCode
  | AntiPatternIssueCode
  | SchemaIssueCode;

// =============================================================================
// Validation Issue
// =============================================================================

export type IssueSeverity = "error" | "warning" | "info";

export interface ValidationIssue {
  kind: IssueKind;
  code: IssueCode;
  severity: IssueSeverity;
  message: string;
  /** Document path, e.g. 'system.bindings[2].to_components[0]' */
  path?: string;
  /** Component the issue is about */
  component?: string;
  /** Binding label, 'from.port -> to.port' */
  binding?: string;
  suggestion?: string;
  context?: Record<string, unknown>;
}

/**
 * Shape error reported by the typed parse before any graph analysis.
 */
export interface StructuralError {
  code: StructureIssueCode;
  message: string;
  path: string;
}

// =============================================================================
// Pattern Classification
// =============================================================================

export type ArchitecturalPattern =
  | "pipeline"
  | "request_response"
  | "fan_out"
  | "fan_in"
  | "unknown";

export interface PatternThresholds {
  /** Pipeline when edges <= nodes + slack */
  pipelineEdgeSlack: number;
  /** Fan-out when some out-degree exceeds this */
  fanOutThreshold: number;
  /** Fan-in when some in-degree exceeds this */
  fanInThreshold: number;
}

// =============================================================================
// Options
// =============================================================================

export interface ValidatorOptions extends PatternThresholds {
  /** Reachability analysis; when off, the legacy orphan check runs instead */
  boundaryTerminationEnabled: boolean;
  /** Out-degree above which a routing component is suggested */
  excessiveFanOutThreshold: number;
  /** Reject transformations not listed in registeredTransformations */
  strictTransformations: boolean;
  registeredTransformations: ReadonlySet<string>;
}

export interface IssueSummary {
  errors: number;
  warnings: number;
  info: number;
}
