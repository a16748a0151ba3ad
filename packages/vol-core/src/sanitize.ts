import type { JsonObject, JsonValue } from "@core-types";

/** Arbitrary-precision and fixed-width wrappers (decimal.js, bignumber.js, Long, ...). */
export interface NumericWrapper {
  toNumber(): number;
}

export type NumericLike = number | bigint | Number | NumericWrapper;

export function isNumericWrapper(value: unknown): value is NumericWrapper {
  return (
    typeof value === "object" &&
    value !== null &&
    "toNumber" in value &&
    typeof value.toNumber === "function"
  );
}

function toFloat(value: NumericLike): number {
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  if (value instanceof Number) return value.valueOf();
  return Number(value.toNumber());
}

/**
 * Turn any numeric into a JSON-safe float. NaN and infinities become null,
 * as do null/undefined.
 */
export function sanitizeNumber(value: NumericLike | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const x = toFloat(value);
  return Number.isFinite(x) ? x : null;
}

function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value && typeof value[Symbol.iterator] === "function";
}

/**
 * Serialization boundary: walk a value and return something JSON.stringify
 * writes without loss or NaN. Inside objects, undefined / functions / symbols
 * are dropped; inside arrays they become null.
 */
export function sanitizeDeep(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
    case "bigint":
      return sanitizeNumber(value);
    case "function":
    case "symbol":
      return null;
  }

  if (typeof value !== "object") return null;

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (value instanceof Number || isNumericWrapper(value)) {
    return sanitizeNumber(value);
  }
  if (value instanceof String || value instanceof Boolean) {
    return value.valueOf();
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeDeep);
  }
  if (value instanceof Map) {
    return sanitizeEntries(Array.from(value.entries(), ([k, v]) => [String(k), v] as const));
  }
  // typed arrays, Sets and other iterables
  if (isIterable(value)) {
    return Array.from(value, sanitizeDeep);
  }
  // plain objects and class instances alike: own enumerable fields
  return sanitizeEntries(Object.entries(value));
}

function sanitizeEntries(entries: ReadonlyArray<readonly [string, unknown]>): JsonObject {
  const out: JsonObject = {};
  for (const [key, v] of entries) {
    if (v === undefined || typeof v === "function" || typeof v === "symbol") continue;
    out[key] = sanitizeDeep(v);
  }
  return out;
}

/** Sanitize a record, keeping the object shape in the type. */
export function sanitizeRecord(value: Record<string, unknown>): JsonObject {
  return sanitizeEntries(Object.entries(value));
}
