/**
 * Schema label compatibility.
 *
 * Labels are opaque type names; compatibility is decided by name only.
 *
 * @module validators/schema-compatibility
 */

const ANY_SCHEMA = "any";

// Pairs that flow without a transformation, in either direction
const FREELY_COMPATIBLE: readonly (readonly [string, string])[] = [
  ["integer", "number"],
  ["float", "number"],
  ["array", "list"],
];

/**
 * `any` on either side accepts every label. Generic `common_*_schema`
 * labels get no special treatment: they only match themselves and `any`.
 */
export function areSchemasCompatible(fromSchema: string, toSchema: string): boolean {
  if (fromSchema === toSchema) return true;
  if (toSchema === ANY_SCHEMA || fromSchema === ANY_SCHEMA) return true;
  return FREELY_COMPATIBLE.some(
    ([a, b]) => (fromSchema === a && toSchema === b) || (fromSchema === b && toSchema === a)
  );
}

export function transformationName(fromSchema: string, toSchema: string): string {
  return `convert_${fromSchema}_to_${toSchema}`;
}
