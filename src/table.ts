// Decision table engine: rule matching and hit-policy resolution

import { AllowedValuesError, isSemanticError } from "./errors.js";
import { evaluate, type EvaluateOptions } from "./feel/evaluator.js";
import { matchesUnaryTest, unquote } from "./feel/unary.js";
import {
  deepEqual,
  formatValue,
  isContext,
  parseNumeric,
  type Context,
  type Value,
} from "./feel/values.js";
import { log } from "./log.js";
import type {
  CollectAggregation,
  DecisionTable,
  Entry,
  HitPolicy,
  Rule,
} from "./model.js";

// --- Hit policy names ---

const HIT_POLICIES: Record<string, HitPolicy> = {
  FIRST: "FIRST",
  F: "FIRST",
  UNIQUE: "UNIQUE",
  U: "UNIQUE",
  PRIORITY: "PRIORITY",
  P: "PRIORITY",
  ANY: "ANY",
  A: "ANY",
  RULE_ORDER: "RULE_ORDER",
  "RULE ORDER": "RULE_ORDER",
  R: "RULE_ORDER",
  OUTPUT_ORDER: "OUTPUT_ORDER",
  "OUTPUT ORDER": "OUTPUT_ORDER",
  O: "OUTPUT_ORDER",
  COLLECT: "COLLECT",
  C: "COLLECT",
};

const AGGREGATIONS: Record<string, CollectAggregation> = {
  NONE: "NONE",
  SUM: "SUM",
  "+": "SUM",
  COUNT: "COUNT",
  "#": "COUNT",
  MIN: "MIN",
  "<": "MIN",
  MAX: "MAX",
  ">": "MAX",
};

export interface ResolvedHitPolicy {
  hitPolicy: HitPolicy;
  aggregation: CollectAggregation;
}

/**
 * Read a hit policy written as a full name ("RULE ORDER"), a single letter
 * ("R") or a collect operator ("C+"). Unknown text falls back to FIRST.
 */
export function parseHitPolicy(text: string | undefined, aggregation?: string): ResolvedHitPolicy {
  const raw = (text ?? "FIRST").trim().toUpperCase();
  let hitPolicy: HitPolicy | undefined = HIT_POLICIES[raw];
  let agg: CollectAggregation = "NONE";

  if (hitPolicy === undefined && raw.length === 2 && raw.startsWith("C") && raw[1] in AGGREGATIONS) {
    hitPolicy = "COLLECT";
    agg = AGGREGATIONS[raw[1]];
  }
  if (hitPolicy === undefined) {
    log.warn(`Unknown hit policy '${text ?? ""}', using FIRST`);
    hitPolicy = "FIRST";
  }

  if (aggregation !== undefined && aggregation.trim() !== "") {
    const named = AGGREGATIONS[aggregation.trim().toUpperCase()];
    if (named === undefined) {
      log.warn(`Unknown aggregation '${aggregation}', using NONE`);
    } else {
      agg = named;
    }
  }

  return { hitPolicy, aggregation: agg };
}

// --- Input resolution ---

/** Direct key, then a dotted path through nested objects; null when absent. */
export function resolveLabel(context: Context, label: string): Value {
  if (Object.prototype.hasOwnProperty.call(context, label)) return context[label];
  if (!label.includes(".")) return null;

  let node: Value = context;
  for (const part of label.split(".")) {
    if (!isContext(node) || !Object.prototype.hasOwnProperty.call(node, part)) return null;
    node = node[part];
  }
  return node;
}

function checkAllowedValues(table: DecisionTable, context: Context): void {
  for (const input of table.inputs) {
    if (input.allowedValues.length === 0) continue;
    const value = resolveLabel(context, input.label);
    if (value === null) continue;
    const text = formatValue(value);
    if (!input.allowedValues.includes(text)) {
      throw new AllowedValuesError(input.label, text);
    }
  }
}

// --- Rule matching ---

/** Semantic failures while evaluating a cell are absorbed; structural ones propagate. */
function tryEvaluate(entry: Entry, context: Context, options: EvaluateOptions): { value: Value } | undefined {
  if (!entry.ast) return undefined;
  try {
    return { value: evaluate(entry.ast, context, options) };
  } catch (err) {
    if (isSemanticError(err)) return undefined;
    throw err;
  }
}

function entryMatches(
  entry: Entry,
  inputValue: Value,
  context: Context,
  options: EvaluateOptions
): boolean {
  const result = tryEvaluate(entry, context, options);
  if (result) return deepEqual(result.value, inputValue);
  return matchesUnaryTest(entry.text, inputValue);
}

function ruleMatches(
  table: DecisionTable,
  rule: Rule,
  context: Context,
  options: EvaluateOptions
): boolean {
  const columns = Math.min(table.inputs.length, rule.inputEntries.length);
  for (let i = 0; i < columns; i++) {
    const inputValue = resolveLabel(context, table.inputs[i].label);
    if (!entryMatches(rule.inputEntries[i], inputValue, context, options)) return false;
  }
  return true;
}

export function evaluateOutputEntry(entry: Entry, context: Context, options: EvaluateOptions): Value {
  const result = tryEvaluate(entry, context, options);
  return result ? result.value : unquote(entry.text);
}

function ruleOutput(
  table: DecisionTable,
  rule: Rule,
  context: Context,
  options: EvaluateOptions
): Value {
  if (table.outputs.length === 1) {
    const entry = rule.outputEntries[0];
    return entry ? evaluateOutputEntry(entry, context, options) : null;
  }
  const result: Context = {};
  table.outputs.forEach((output, i) => {
    const entry = rule.outputEntries[i];
    result[output.label] = entry ? evaluateOutputEntry(entry, context, options) : null;
  });
  return result;
}

function defaultOutput(table: DecisionTable, context: Context, options: EvaluateOptions): Value {
  if (table.outputs.length === 0) return {};
  const values: Context = {};
  for (const output of table.outputs) {
    if (!output.defaultValue) return {};
    values[output.label] = evaluateOutputEntry(output.defaultValue, context, options);
  }
  return table.outputs.length === 1 ? values[table.outputs[0].label] : values;
}

// --- Hit policies ---

function columnValue(table: DecisionTable, match: Value, label: string): Value {
  if (table.outputs.length === 1) return match;
  return isContext(match) && Object.prototype.hasOwnProperty.call(match, label) ? match[label] : null;
}

/** Lower index = higher priority; -1 when the value is not in the list. */
function priorityOf(priorities: readonly string[], value: Value): number {
  return value === null ? -1 : priorities.indexOf(formatValue(value));
}

function applyPriority(table: DecisionTable, matches: Value[]): Value {
  let best = 0;
  for (let i = 1; i < matches.length; i++) {
    for (const output of table.outputs) {
      if (output.priorities.length === 0) continue;
      const bestRank = priorityOf(output.priorities, columnValue(table, matches[best], output.label));
      const rank = priorityOf(output.priorities, columnValue(table, matches[i], output.label));
      if (rank >= 0 && (bestRank < 0 || rank < bestRank)) {
        best = i;
        break;
      }
      if (bestRank >= 0 && (rank < 0 || bestRank < rank)) break;
    }
  }
  return matches[best];
}

function compareOutputs(a: Value, b: Value): number {
  if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (isContext(a) && isContext(b)) {
    for (const key of Object.keys(a)) {
      if (!Object.prototype.hasOwnProperty.call(b, key)) continue;
      const x = a[key];
      const y = b[key];
      if ((typeof x === "string" && typeof y === "string") || (typeof x === "number" && typeof y === "number")) {
        return compareOutputs(x, y);
      }
    }
  }
  return 0;
}

function numericItems(matches: readonly Value[]): number[] {
  const out: number[] = [];
  for (const match of matches) {
    if (typeof match === "number") out.push(match);
    else if (typeof match === "string") {
      const n = parseNumeric(match);
      if (n !== null) out.push(n);
    }
  }
  return out;
}

function applyCollect(aggregation: CollectAggregation, matches: Value[]): Value {
  switch (aggregation) {
    case "NONE":
      return matches;
    case "COUNT":
      return matches.length;
    case "SUM":
      return numericItems(matches).reduce((acc, n) => acc + n, 0);
    case "MIN":
    case "MAX": {
      const items = numericItems(matches);
      if (items.length === 0) return matches[0];
      return aggregation === "MIN" ? Math.min(...items) : Math.max(...items);
    }
  }
}

function stopsAtFirst(hitPolicy: HitPolicy): boolean {
  return hitPolicy === "FIRST" || hitPolicy === "UNIQUE" || hitPolicy === "ANY";
}

/**
 * Evaluate a decision table against `context`.
 *
 * Throws AllowedValuesError when an input value is outside its declared
 * allowed values. With no matching rule the result is the outputs' default
 * values when every output declares one, otherwise `{}`.
 */
export function evaluateTable(
  table: DecisionTable,
  context: Context,
  options: EvaluateOptions = {}
): Value {
  checkAllowedValues(table, context);

  const matches: Value[] = [];
  for (const rule of table.rules) {
    if (!ruleMatches(table, rule, context, options)) continue;
    matches.push(ruleOutput(table, rule, context, options));
    if (stopsAtFirst(table.hitPolicy)) break;
  }

  if (matches.length === 0) {
    return defaultOutput(table, context, options);
  }

  switch (table.hitPolicy) {
    case "FIRST":
    case "UNIQUE":
    case "ANY":
      return matches[0];
    case "PRIORITY":
      return applyPriority(table, matches);
    case "RULE_ORDER":
      return matches;
    case "OUTPUT_ORDER":
      // Array.prototype.sort is stable, so ties keep declaration order.
      return [...matches].sort(compareOutputs);
    case "COLLECT":
      return applyCollect(table.aggregation, matches);
  }
}
