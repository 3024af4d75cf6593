// Numeric built-ins

import type { Value } from "../values.js";
import { asInteger, asNumber, define, normalizeZero, type BuiltinFunction } from "./define.js";

function unary(signature: string, fn: (n: number) => number | null): BuiltinFunction {
  return define(signature, ([arg]) => {
    const n = asNumber(arg);
    if (n === null) return null;
    const result = fn(n);
    return result === null || !Number.isFinite(result) ? null : normalizeZero(result);
  });
}

/** Ties go to the even neighbour. */
export function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export type RoundingMode = "half even" | "up" | "down" | "half up" | "half down";

type Rounding = (scaled: number, negative: boolean) => number;

const ROUNDINGS: Record<RoundingMode, Rounding> = {
  "half even": (x) => roundHalfEven(x),
  up: (x, negative) => (negative ? Math.floor(x) : Math.ceil(x)),
  down: (x, negative) => (negative ? Math.ceil(x) : Math.floor(x)),
  "half up": (x, negative) => (negative ? Math.ceil(x - 0.5) : Math.floor(x + 0.5)),
  "half down": (x, negative) => (negative ? Math.floor(x + 0.5) : Math.ceil(x - 0.5)),
};

/** Round `value` to `scale` decimal places with the given mode. */
export function roundTo(value: number, scale: number, mode: RoundingMode): number {
  const factor = 10 ** scale;
  const rounded = ROUNDINGS[mode](value * factor, value < 0) / factor;
  return normalizeZero(rounded);
}

function rounding(signature: string, mode: RoundingMode): BuiltinFunction {
  return define(signature, ([value, scaleArg]: Value[]) => {
    const n = asNumber(value);
    const scale = asInteger(scaleArg);
    if (n === null || scale === null) return null;
    const result = roundTo(n, scale, mode);
    return Number.isFinite(result) ? result : null;
  });
}

export const mathFunctions: readonly BuiltinFunction[] = [
  unary("abs(n)", Math.abs),
  unary("floor(n)", Math.floor),
  unary("ceiling(n)", Math.ceil),
  unary("sqrt(number)", (n) => (n < 0 ? null : Math.sqrt(n))),
  unary("exp(number)", Math.exp),
  unary("log(number)", (n) => (n <= 0 ? null : Math.log(n))),

  define("odd(number)", ([arg]) => {
    const n = asNumber(arg);
    return n === null || !Number.isInteger(n) ? null : Math.abs(n % 2) === 1;
  }),
  define("even(number)", ([arg]) => {
    const n = asNumber(arg);
    return n === null || !Number.isInteger(n) ? null : n % 2 === 0;
  }),

  define("modulo(dividend, divisor)", ([a, b]) => {
    const dividend = asNumber(a);
    const divisor = asNumber(b);
    if (dividend === null || divisor === null || divisor === 0) return null;
    return normalizeZero(dividend - divisor * Math.floor(dividend / divisor));
  }),

  rounding("decimal(n, scale)", "half even"),
  rounding("round(n, scale)", "half even"),
  rounding("round up(n, scale)", "up"),
  rounding("round down(n, scale)", "down"),
  rounding("round half up(n, scale)", "half up"),
  rounding("round half down(n, scale)", "half down"),
];
