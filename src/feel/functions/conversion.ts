// Conversion and context built-ins

import {
  deepEqual,
  formatValue,
  parseNumeric,
  typeName,
  type Context,
  type Value,
} from "../values.js";
import { asContext, asList, asString, define, type BuiltinFunction } from "./define.js";

const GROUPING_SEPARATORS = new Set([" ", ",", ".", "'"]);
const DECIMAL_SEPARATORS = new Set([".", ","]);

function convertNumber(text: string, grouping: string | null, decimal: string | null): number | null {
  if (grouping !== null && !GROUPING_SEPARATORS.has(grouping)) return null;
  if (decimal !== null && !DECIMAL_SEPARATORS.has(decimal)) return null;
  if (grouping !== null && grouping === decimal) return null;

  let normalized = text;
  if (grouping !== null) normalized = normalized.split(grouping).join("");
  if (decimal !== null && decimal !== ".") normalized = normalized.split(decimal).join(".");
  return parseNumeric(normalized);
}

export const conversionFunctions: readonly BuiltinFunction[] = [
  define("string(from)", ([from]) => formatValue(from)),

  define("number(from, grouping separator?, decimal separator?)", ([from, g, d]) => {
    if (typeof from === "number") return from;
    const text = asString(from);
    if (text === null) return null;
    const grouping = g === null ? null : asString(g);
    const decimal = d === null ? null : asString(d);
    if ((g !== null && grouping === null) || (d !== null && decimal === null)) return null;
    return convertNumber(text, grouping, decimal);
  }),

  define("get value(m, key)", ([m, k]) => {
    const context = asContext(m);
    const key = asString(k);
    if (context === null || key === null) return null;
    return Object.prototype.hasOwnProperty.call(context, key) ? context[key] : null;
  }),

  define("get entries(m)", ([m]) => {
    const context = asContext(m);
    if (context === null) return null;
    return Object.entries(context).map(([key, value]): Value => ({ key, value }));
  }),

  define(
    "context put(context, key, value)",
    ([c, k, value]) => {
      const context = asContext(c);
      const key = asString(k);
      if (context === null || key === null) return null;
      return { ...context, [key]: value };
    },
    { nullable: ["value"] }
  ),

  define("context merge(contexts)", ([list]) => {
    const contexts = asList(list);
    if (contexts === null) return null;
    const merged: Context = {};
    for (const item of contexts) {
      const context = asContext(item);
      if (context === null) return null;
      Object.assign(merged, context);
    }
    return merged;
  }),

  define(
    "is(value1, value2)",
    ([a, b]) => typeName(a) === typeName(b) && deepEqual(a, b),
    { nullable: ["value1", "value2"] }
  ),
];
