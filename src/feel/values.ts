// FEEL runtime values
// Null is an ordinary value; lists and contexts mirror JSON arrays and objects.

import { EvalError } from "../errors.js";

export type Value = null | boolean | number | string | Value[] | Context;

export interface Context {
  [key: string]: Value;
}

export type ValueType = "null" | "boolean" | "number" | "string" | "list" | "context";

export function typeName(value: Value): ValueType {
  if (value === null) return "null";
  if (Array.isArray(value)) return "list";
  switch (typeof value) {
    case "boolean":
      return "boolean";
    case "number":
      return "number";
    case "string":
      return "string";
    default:
      return "context";
  }
}

export function isContext(value: Value): value is Context {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Convert arbitrary parsed JSON/YAML data into a Value.
 * Dates become ISO strings; undefined and functions become null; non-finite
 * numbers become null.
 */
export function toValue(data: unknown): Value {
  if (data === null || data === undefined) return null;
  if (typeof data === "boolean" || typeof data === "string") return data;
  if (typeof data === "number") return Number.isFinite(data) ? data : null;
  if (typeof data === "bigint") return Number(data);
  if (data instanceof Date) return data.toISOString();
  if (Array.isArray(data)) return data.map(toValue);
  if (isPlainObject(data)) {
    return Object.fromEntries(Object.entries(data).map(([key, item]) => [key, toValue(item)]));
  }
  return null;
}

export function deepEqual(a: Value, b: Value): boolean {
  if (a === b) return true;
  if (Array.isArray(a)) {
    return (
      Array.isArray(b) &&
      a.length === b.length &&
      a.every((item, i) => deepEqual(item, b[i]))
    );
  }
  if (isContext(a)) {
    if (!isContext(b)) return false;
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => key in b && deepEqual(a[key], b[key]));
  }
  return false;
}

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Parse a numeric string; null when the text is not a number. */
export function parseNumeric(text: string): number | null {
  const trimmed = text.trim();
  if (!NUMERIC.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

/** Arithmetic coercion: booleans count as 1/0, numeric strings are parsed. */
export function toNumber(value: Value): number {
  if (typeof value === "number") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string") {
    const n = parseNumeric(value);
    if (n !== null) return n;
    throw new EvalError(`Cannot convert string "${value}" to a number`);
  }
  throw new EvalError(`Cannot convert ${typeName(value)} to a number`);
}

/** String rendering used for concatenation and unary-test candidates. */
export function formatValue(value: Value): string {
  if (value === null) return "null";
  if (typeof value === "string") return value;
  if (typeof value === "boolean" || typeof value === "number") return String(value);
  return JSON.stringify(value);
}
