// Shared plumbing for the built-in function modules.

import type { Context, Value } from "../values.js";
import { isContext } from "../values.js";

/** Receives the bound argument vector; returns null for invalid input, never throws. */
export type BuiltinImpl = (args: Value[]) => Value;

export interface BuiltinFunction {
  readonly name: string;
  readonly signature: string;
  /** Argument positions where null short-circuits the call to null. */
  readonly nullGuarded: readonly number[];
  readonly impl: BuiltinImpl;
}

export interface DefineOptions {
  /** Required parameters that legitimately take null. */
  nullable?: readonly string[];
}

export function define(
  signature: string,
  impl: BuiltinImpl,
  options: DefineOptions = {}
): BuiltinFunction {
  const open = signature.indexOf("(");
  const name = signature.slice(0, open).trim();
  const params = signature
    .slice(open + 1, signature.lastIndexOf(")"))
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0 && part !== "...");

  const nullable = new Set(options.nullable ?? []);
  const nullGuarded: number[] = [];
  params.forEach((param, i) => {
    if (!param.endsWith("?") && !nullable.has(param)) nullGuarded.push(i);
  });

  return { name, signature, nullGuarded, impl };
}

// --- Argument helpers ---

export function asNumber(value: Value | undefined): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

/** Numbers are truncated toward zero, as scales and positions are. */
export function asInteger(value: Value | undefined): number | null {
  const n = asNumber(value);
  return n === null ? null : Math.trunc(n);
}

export function asString(value: Value | undefined): string | null {
  return typeof value === "string" ? value : null;
}

export function asList(value: Value | undefined): Value[] | null {
  return Array.isArray(value) ? value : null;
}

export function asContext(value: Value | undefined): Context | null {
  return value !== undefined && isContext(value) ? value : null;
}

/** Every item a number, or null. */
export function asNumberList(items: readonly Value[]): number[] | null {
  const out: number[] = [];
  for (const item of items) {
    const n = asNumber(item);
    if (n === null) return null;
    out.push(n);
  }
  return out;
}

/**
 * Item list for functions that take either one list or their items as
 * separate arguments: `sum([1, 2])` and `sum(1, 2)`.
 */
export function listOrArguments(args: readonly Value[]): Value[] {
  if (args.length === 1) {
    const only = args[0];
    return Array.isArray(only) ? only : [only];
  }
  return [...args];
}

/** -0 becomes 0 so results compare cleanly. */
export function normalizeZero(n: number): number {
  return n === 0 ? 0 : n;
}
