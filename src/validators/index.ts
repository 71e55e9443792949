/**
 * Validators module
 *
 * Architectural validation of typed blueprints.
 */

export {
  ArchitecturalValidator,
  classifyArchitecture,
  hasErrors,
  resolveValidatorOptions,
  summarizeIssues,
} from "./architectural-validator.js";

export { areSchemasCompatible, transformationName } from "./schema-compatibility.js";

export { structuralErrorsToIssues, zodToStructuralErrors } from "./zod-error-mapper.js";

export type {
  ArchitecturalPattern,
  IssueCode,
  IssueKind,
  IssueSeverity,
  IssueSummary,
  PatternThresholds,
  StructuralError,
  ValidationIssue,
  ValidatorOptions,
} from "./architectural-validator.types.js";
