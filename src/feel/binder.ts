// Parameter binder
// Maps the actual arguments of a call onto the registered signature and
// produces the ordered argument vector a built-in receives.

import { BindingError } from "../errors.js";
import type { AstNode, FunctionParameter } from "./ast.js";
import { defaultRegistry, type FunctionRegistry } from "./registry.js";
import type { Value } from "./values.js";

export type ArgumentEvaluator = (node: AstNode) => Value;

/**
 * Bind call arguments for `name`.
 *
 * Unknown functions get every argument evaluated positionally, in order.
 * For registered functions a missing optional parameter binds to null and
 * variadic extras are appended after the declared parameters.
 */
export function bindParameters(
  name: string,
  params: readonly FunctionParameter[],
  evaluateArg: ArgumentEvaluator,
  registry: FunctionRegistry = defaultRegistry()
): Value[] {
  const signature = registry.get(name);
  if (!signature) {
    return params.map((param) => evaluateArg(param.value));
  }

  const namedCount = params.filter((param) => param.name !== undefined).length;
  if (namedCount > 0 && namedCount < params.length) {
    throw new BindingError(`Cannot mix named and positional arguments in call to '${name}'`);
  }

  const declared = signature.parameters;

  // --- Positional ---

  if (namedCount === 0) {
    if (params.length > declared.length && !signature.variadic) {
      throw new BindingError(
        `Function '${name}' takes at most ${declared.length} argument(s), got ${params.length}`
      );
    }
    const args: Value[] = [];
    declared.forEach((spec, i) => {
      if (i < params.length) {
        args.push(evaluateArg(params[i].value));
      } else if (spec.optional) {
        args.push(null);
      } else {
        throw new BindingError(`Missing required parameter '${spec.name}' for function '${name}'`);
      }
    });
    for (let i = declared.length; i < params.length; i++) {
      args.push(evaluateArg(params[i].value));
    }
    return args;
  }

  // --- Named ---

  const slots = new Map<number, Value>();
  const extras: Value[] = [];
  for (const param of params) {
    const paramName = param.name ?? "";
    const index = declared.findIndex((spec) => spec.name === paramName);
    if (index < 0) {
      if (!signature.variadic) {
        throw new BindingError(`Unknown parameter '${paramName}' for function '${name}'`);
      }
      extras.push(evaluateArg(param.value));
      continue;
    }
    if (slots.has(index)) {
      throw new BindingError(`Parameter '${paramName}' given twice in call to '${name}'`);
    }
    slots.set(index, evaluateArg(param.value));
  }

  const args = declared.map((spec, i) => {
    const value = slots.get(i);
    if (value !== undefined) return value;
    if (spec.optional) return null;
    throw new BindingError(`Missing required parameter '${spec.name}' for function '${name}'`);
  });
  return [...args, ...extras];
}
