// Built-in function library: dispatch table over every module.

import { EvalError } from "../../errors.js";
import type { Value } from "../values.js";
import { conversionFunctions } from "./conversion.js";
import { dateFunctions } from "./dates.js";
import type { BuiltinFunction } from "./define.js";
import { listFunctions } from "./list.js";
import { mathFunctions } from "./math.js";
import { stringFunctions } from "./string.js";

export type { BuiltinFunction, BuiltinImpl } from "./define.js";

export const BUILTINS: readonly BuiltinFunction[] = [
  ...mathFunctions,
  ...stringFunctions,
  ...listFunctions,
  ...conversionFunctions,
  ...dateFunctions,
];

const BY_NAME: ReadonlyMap<string, BuiltinFunction> = new Map(
  BUILTINS.map((builtin) => [builtin.name, builtin])
);

export function isBuiltin(name: string): boolean {
  return BY_NAME.has(name);
}

/**
 * Call a built-in with an already bound argument vector. A null in any
 * null-guarded position yields null without calling the function.
 */
export function callBuiltin(name: string, args: readonly Value[]): Value {
  const builtin = BY_NAME.get(name);
  if (!builtin) {
    throw new EvalError(`Unknown function '${name}'`);
  }
  if (builtin.nullGuarded.some((i) => i < args.length && args[i] === null)) {
    return null;
  }
  return builtin.impl([...args]);
}
