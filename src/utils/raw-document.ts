/**
 * Helpers for reading and editing the untyped working document.
 *
 * The healer operates on the raw representation; these narrow `unknown`
 * values without casting.
 */

export type RawRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function getRecord(obj: RawRecord, key: string): RawRecord | undefined {
  const value = obj[key];
  return isRecord(value) ? value : undefined;
}

export function getString(obj: RawRecord, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

export function getArray(obj: RawRecord, key: string): unknown[] | undefined {
  const value = obj[key];
  return Array.isArray(value) ? value : undefined;
}

/**
 * Records in a list, skipping anything else.
 */
export function recordsOf(value: unknown): RawRecord[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

export function cloneRecord(obj: RawRecord): RawRecord {
  return structuredClone(obj);
}
