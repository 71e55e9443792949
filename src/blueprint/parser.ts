/**
 * Blueprint decoding and typed parse.
 *
 * @module blueprint/parser
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import { Blueprint, type BlueprintT } from "../schemas/blueprint.js";
import type { StructuralError } from "../validators/architectural-validator.types.js";
import { zodToStructuralErrors } from "../validators/zod-error-mapper.js";
import { BlueprintSourceError } from "./errors.js";

export type ParseResult =
  | { ok: true; document: BlueprintT }
  | { ok: false; errors: StructuralError[] };

/**
 * Typed parse: raw document in, typed document or structural errors out.
 * Field validation and defaulting only; graph semantics belong to the
 * validator.
 */
export interface BlueprintParser {
  parse(raw: unknown): ParseResult;
}

export class ZodBlueprintParser implements BlueprintParser {
  parse(raw: unknown): ParseResult {
    const result = Blueprint.safeParse(raw);
    if (result.success) {
      return { ok: true, document: result.data };
    }
    return { ok: false, errors: zodToStructuralErrors(result.error) };
  }
}

/**
 * Decode blueprint text. YAML is a superset of JSON, so both are accepted.
 */
export function parseBlueprintSource(text: string): unknown {
  try {
    return parseYaml(text);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      const position = error.linePos?.[0];
      throw new BlueprintSourceError(
        `Blueprint text is not valid YAML or JSON: ${error.code}`,
        position?.line,
        position?.col,
      );
    }
    throw error;
  }
}
