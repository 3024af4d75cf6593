// FEEL evaluator
// Walks an AST against an explicit context. Semantic failures throw EvalError;
// callers that follow DMN rules turn those into null.

import { BindingError, EvalError } from "../errors.js";
import type {
  AstNode,
  BinaryNode,
  CallNode,
  ComparisonOperator,
  ConditionalNode,
  PropertyNode,
} from "./ast.js";
import { bindParameters } from "./binder.js";
import { callBuiltin, isBuiltin } from "./functions/index.js";
import type { FunctionRegistry } from "./registry.js";
import {
  deepEqual,
  formatValue,
  isContext,
  toNumber,
  typeName,
  type Context,
  type Value,
} from "./values.js";

/** Resolves calls to names that are not built-ins (business knowledge models). */
export interface BkmResolver {
  has(name: string): boolean;
  invoke(name: string, args: Value[], context: Context, options: EvaluateOptions): Value;
}

export interface EvaluateOptions {
  registry?: FunctionRegistry;
  bkms?: BkmResolver;
  /** Current nesting of BKM invocations. */
  depth?: number;
  /** Upper bound on nested BKM invocations. */
  maxDepth?: number;
}

export function evaluate(node: AstNode, context: Context, options: EvaluateOptions = {}): Value {
  switch (node.type) {
    case "number":
    case "string":
    case "boolean":
      return node.value;
    case "null":
      return null;
    case "list":
      return node.items.map((item) => evaluate(item, context, options));
    case "variable":
      return lookupVariable(node.name, context);
    case "binary":
      return evaluateBinary(node, context, options);
    case "unary": {
      const operand = evaluate(node.operand, context, options);
      if (operand === null) return null;
      if (typeof operand !== "number") {
        throw new EvalError(`Cannot negate ${typeName(operand)}`);
      }
      return -operand;
    }
    case "call":
      return evaluateCall(node, context, options);
    case "property":
      return evaluateProperty(node, context, options);
    case "conditional":
      return evaluateConditional(node, context, options);
  }
}

// --- Names ---

function has(context: Context, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(context, key);
}

function firstPresent(context: Context, candidates: string[]): string | undefined {
  return candidates.find((key) => has(context, key));
}

/** Exact, then spaces as underscores, lowercase, both, and spaces dropped. */
export function lookupVariable(name: string, context: Context): Value {
  const underscored = name.replace(/ /g, "_");
  const lower = name.toLowerCase();
  const key = firstPresent(context, [
    name,
    underscored,
    lower,
    lower.replace(/ /g, "_"),
    name.replace(/ /g, ""),
  ]);
  if (key === undefined) {
    throw new EvalError(`Variable '${name}' not found in context`);
  }
  return context[key];
}

function camelToSnake(name: string): string {
  return name.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toLowerCase();
}

function evaluateProperty(node: PropertyNode, context: Context, options: EvaluateOptions): Value {
  const object = evaluate(node.object, context, options);
  if (object === null) return null;
  if (!isContext(object)) {
    throw new EvalError(`Cannot access property '${node.property}' of ${typeName(object)}`);
  }
  const name = node.property;
  const key = firstPresent(object, [
    name,
    name.replace(/ /g, "_"),
    camelToSnake(name),
    name.toLowerCase(),
  ]);
  if (key === undefined) {
    throw new EvalError(`Property '${name}' not found`);
  }
  return object[key];
}

// --- Operators ---

// "false" and "0" read as false, lists and contexts as true.
function truthy(value: Value): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") return value !== "" && value !== "false" && value !== "0";
  return value !== null;
}

function logical(value: Value): boolean | null {
  return value === null ? null : truthy(value);
}

function arithmetic(result: number): Value {
  return Number.isFinite(result) ? result : null;
}

function compare(op: ComparisonOperator, left: Value, right: Value): Value {
  if (typeof left === "string" && typeof right === "string") {
    return orderResult(op, left < right ? -1 : left > right ? 1 : 0);
  }
  if (op === "=" || op === "!=") {
    const equal = typeName(left) === typeName(right) && deepEqual(left, right);
    return op === "=" ? equal : !equal;
  }
  if (left === null || right === null) return null;
  const a = toNumber(left);
  const b = toNumber(right);
  return orderResult(op, a < b ? -1 : a > b ? 1 : 0);
}

function orderResult(op: ComparisonOperator, cmp: number): boolean {
  switch (op) {
    case "<":
      return cmp < 0;
    case "<=":
      return cmp <= 0;
    case ">":
      return cmp > 0;
    case ">=":
      return cmp >= 0;
    case "=":
      return cmp === 0;
    case "!=":
      return cmp !== 0;
  }
}

function evaluateBinary(node: BinaryNode, context: Context, options: EvaluateOptions): Value {
  const left = evaluate(node.left, context, options);

  // and/or short-circuit on the deciding value, so the right side may never run.
  if (node.op === "and") {
    const l = logical(left);
    if (l === false) return false;
    const r = logical(evaluate(node.right, context, options));
    if (r === false) return false;
    return l === null || r === null ? null : true;
  }
  if (node.op === "or") {
    const l = logical(left);
    if (l === true) return true;
    const r = logical(evaluate(node.right, context, options));
    if (r === true) return true;
    return l === null || r === null ? null : false;
  }

  const right = evaluate(node.right, context, options);

  switch (node.op) {
    case "+":
      if (typeof left === "string" || typeof right === "string") {
        return formatValue(left) + formatValue(right);
      }
      if (left === null || right === null) return null;
      return arithmetic(toNumber(left) + toNumber(right));
    case "-":
    case "*":
    case "/":
    case "**": {
      if (left === null || right === null) return null;
      const a = toNumber(left);
      const b = toNumber(right);
      if (node.op === "-") return arithmetic(a - b);
      if (node.op === "*") return arithmetic(a * b);
      if (node.op === "/") return b === 0 ? null : arithmetic(a / b);
      return arithmetic(a ** b);
    }
    default:
      return compare(node.op, left, right);
  }
}

function evaluateConditional(
  node: ConditionalNode,
  context: Context,
  options: EvaluateOptions
): Value {
  const condition = evaluate(node.condition, context, options);
  if (condition === null) return evaluate(node.else, context, options);
  if (typeof condition !== "boolean") return null;
  return evaluate(condition ? node.then : node.else, context, options);
}

// --- Calls ---

function evaluateCall(node: CallNode, context: Context, options: EvaluateOptions): Value {
  let args: Value[];
  try {
    args = bindParameters(
      node.name,
      node.params,
      (arg) => evaluate(arg, context, options),
      options.registry
    );
  } catch (err) {
    if (err instanceof BindingError) return null;
    throw err;
  }

  if (isBuiltin(node.name)) {
    return callBuiltin(node.name, args);
  }
  if (options.bkms?.has(node.name)) {
    return options.bkms.invoke(node.name, args, context, options);
  }
  throw new EvalError(`Unknown function '${node.name}'`);
}
