import { JsonValue } from "../types.js";

export type JsonRecord = { readonly [key: string]: JsonValue };

export function isRecord(value: JsonValue): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * The value as a read-only array, or undefined when it is not an array.
 */
export function asJsonArray(value: JsonValue): readonly JsonValue[] | undefined {
  return Array.isArray(value) ? value : undefined;
}

/**
 * Coerce identifiers that APIs return either as strings or numbers.
 */
export function asIdentifier(value: JsonValue): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}
