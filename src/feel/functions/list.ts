// Boolean and list built-ins

import { deepEqual, type Value } from "../values.js";
import {
  asInteger,
  asList,
  asNumberList,
  define,
  listOrArguments,
  type BuiltinFunction,
} from "./define.js";

function asBoolean(value: Value): boolean | null {
  if (typeof value === "boolean") return value;
  if (value === "true") return true;
  if (value === "false") return false;
  return null;
}

/**
 * Shared by all() and any(): `stop` is the value that decides the result
 * early. Null items are skipped; any non-boolean item makes the result null.
 */
function quantifier(arg: Value, stop: boolean): Value {
  const items = Array.isArray(arg) ? arg : [arg];
  let decided = false;
  for (const item of items) {
    if (item === null) continue;
    const b = asBoolean(item);
    if (b === null) return null;
    if (b === stop) decided = true;
  }
  return decided ? stop : !stop;
}

function numeric(
  signature: string,
  fn: (items: number[]) => Value
): BuiltinFunction {
  return define(signature, (args) => {
    const items = asNumberList(listOrArguments(args));
    return items === null ? null : fn(items);
  });
}

function listUnary(signature: string, fn: (list: Value[]) => Value): BuiltinFunction {
  return define(signature, ([arg]) => {
    const list = asList(arg);
    return list === null ? null : fn(list);
  });
}

/** 1-based list position, negative counting from the end; null when out of range. */
function resolvePosition(list: readonly Value[], position: Value): number | null {
  const p = asInteger(position);
  if (p === null || p === 0) return null;
  const index = p > 0 ? p - 1 : list.length + p;
  return index >= 0 && index < list.length ? index : null;
}

function distinct(items: readonly Value[]): Value[] {
  const out: Value[] = [];
  for (const item of items) {
    if (!out.some((seen) => deepEqual(seen, item))) out.push(item);
  }
  return out;
}

function flattenDeep(items: readonly Value[]): Value[] {
  return items.flatMap((item) => (Array.isArray(item) ? flattenDeep(item) : [item]));
}

function compareSortable(a: number | string, b: number | string): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const x = String(a);
  const y = String(b);
  if (x < y) return -1;
  return x > y ? 1 : 0;
}

/** min/max over all-number or all-string items; null when empty or mixed. */
function extreme(items: Value[], pick: 1 | -1): Value {
  if (items.length === 0) return null;
  const first = items[0];
  if (typeof first !== "number" && typeof first !== "string") return null;
  let best: number | string = first;
  for (const item of items.slice(1)) {
    if (typeof item !== typeof first || (typeof item !== "number" && typeof item !== "string")) {
      return null;
    }
    if (compareSortable(item, best) * pick > 0) best = item;
  }
  return best;
}

function sumOf(items: readonly number[]): number {
  return items.reduce((acc, n) => acc + n, 0);
}

export const listFunctions: readonly BuiltinFunction[] = [
  define("not(negand)", ([arg]) => {
    const b = asBoolean(arg);
    return b === null ? null : !b;
  }),
  define("all(list)", ([arg]) => quantifier(arg, false)),
  define("any(list)", ([arg]) => quantifier(arg, true)),

  define(
    "list contains(list, element)",
    ([listArg, element]) => {
      const list = asList(listArg);
      return list === null ? null : list.some((item) => deepEqual(item, element));
    },
    { nullable: ["element"] }
  ),

  define("count(list, ...)", (args) => listOrArguments(args).length),
  define("min(list, ...)", (args) => extreme(listOrArguments(args), -1)),
  define("max(list, ...)", (args) => extreme(listOrArguments(args), 1)),
  numeric("sum(list, ...)", (items) => (items.length === 0 ? null : sumOf(items))),
  numeric("mean(list, ...)", (items) =>
    items.length === 0 ? null : sumOf(items) / items.length
  ),
  numeric("product(list, ...)", (items) =>
    items.length === 0 ? null : items.reduce((acc, n) => acc * n, 1)
  ),
  numeric("median(list, ...)", (items) => {
    if (items.length === 0) return null;
    const sorted = [...items].sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
  }),
  numeric("stddev(list, ...)", (items) => {
    if (items.length < 2) return null;
    const mean = sumOf(items) / items.length;
    const squares = sumOf(items.map((n) => (n - mean) ** 2));
    return Math.sqrt(squares / (items.length - 1));
  }),
  numeric("mode(list, ...)", (items) => {
    const counts = new Map<number, number>();
    for (const n of items) counts.set(n, (counts.get(n) ?? 0) + 1);
    const top = Math.max(0, ...counts.values());
    return [...counts.entries()]
      .filter(([, count]) => count === top)
      .map(([n]) => n)
      .sort((a, b) => a - b);
  }),

  define("sublist(list, start position, length?)", ([listArg, startArg, lengthArg]) => {
    const list = asList(listArg);
    if (list === null) return null;
    const start = resolvePosition(list, startArg);
    if (start === null) return null;
    if (lengthArg === null) return list.slice(start);
    const length = asInteger(lengthArg);
    if (length === null || length < 0) return null;
    return list.slice(start, start + length);
  }),

  define("append(list, ...)", ([listArg, ...items]) => {
    const list = asList(listArg);
    return list === null ? null : [...list, ...items];
  }),
  define("concatenate(list, ...)", (args) => {
    const out: Value[] = [];
    for (const arg of args) {
      const list = asList(arg);
      if (list === null) return null;
      out.push(...list);
    }
    return out;
  }),
  define(
    "insert before(list, position, newItem)",
    ([listArg, position, newItem]) => {
      const list = asList(listArg);
      if (list === null) return null;
      const index = resolvePosition(list, position);
      if (index === null) return null;
      return [...list.slice(0, index), newItem, ...list.slice(index)];
    },
    { nullable: ["newItem"] }
  ),
  define("remove(list, position)", ([listArg, position]) => {
    const list = asList(listArg);
    if (list === null) return null;
    const index = resolvePosition(list, position);
    if (index === null) return null;
    return [...list.slice(0, index), ...list.slice(index + 1)];
  }),
  listUnary("reverse(list)", (list) => [...list].reverse()),
  define(
    "index of(list, match)",
    ([listArg, match]) => {
      const list = asList(listArg);
      if (list === null) return null;
      const positions: Value[] = [];
      list.forEach((item, i) => {
        if (deepEqual(item, match)) positions.push(i + 1);
      });
      return positions;
    },
    { nullable: ["match"] }
  ),
  define("union(list, ...)", (args) => {
    const out: Value[] = [];
    for (const arg of args) {
      const list = asList(arg);
      if (list === null) return null;
      out.push(...list);
    }
    return distinct(out);
  }),
  listUnary("distinct values(list)", distinct),
  listUnary("flatten(list)", flattenDeep),
  define(
    "list replace(list, position, newItem)",
    ([listArg, position, newItem]) => {
      const list = asList(listArg);
      if (list === null) return null;
      const index = resolvePosition(list, position);
      if (index === null) return null;
      const copy = [...list];
      copy[index] = newItem;
      return copy;
    },
    { nullable: ["newItem"] }
  ),
];
