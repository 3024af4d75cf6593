// String built-ins. Positions are 1-based and count code points.

import type { Value } from "../values.js";
import { asInteger, asList, asString, define, type BuiltinFunction } from "./define.js";

function stringPair(
  signature: string,
  fn: (text: string, match: string) => Value
): BuiltinFunction {
  return define(signature, ([a, b]) => {
    const text = asString(a);
    const match = asString(b);
    return text === null || match === null ? null : fn(text, match);
  });
}

function stringUnary(signature: string, fn: (text: string) => Value): BuiltinFunction {
  return define(signature, ([a]) => {
    const text = asString(a);
    return text === null ? null : fn(text);
  });
}

export const stringFunctions: readonly BuiltinFunction[] = [
  define("substring(string, start position, length?)", ([s, startArg, lengthArg]) => {
    const text = asString(s);
    let start = asInteger(startArg);
    if (text === null || start === null) return null;

    const chars = Array.from(text);
    if (start < 0) start = chars.length + start + 1;
    if (start < 1 || start > chars.length) return "";

    if (lengthArg === null) return chars.slice(start - 1).join("");
    const length = asInteger(lengthArg);
    if (length === null) return null;
    if (length < 0) return "";
    return chars.slice(start - 1, start - 1 + length).join("");
  }),

  stringUnary("string length(string)", (text) => Array.from(text).length),
  stringUnary("upper case(string)", (text) => text.toUpperCase()),
  stringUnary("lower case(string)", (text) => text.toLowerCase()),

  stringPair("substring before(string, match)", (text, match) => {
    const index = text.indexOf(match);
    return index < 0 ? "" : text.slice(0, index);
  }),
  stringPair("substring after(string, match)", (text, match) => {
    const index = text.indexOf(match);
    return index < 0 ? "" : text.slice(index + match.length);
  }),
  stringPair("contains(string, match)", (text, match) => text.includes(match)),
  stringPair("starts with(string, match)", (text, match) => text.startsWith(match)),
  stringPair("ends with(string, match)", (text, match) => text.endsWith(match)),

  // Patterns are literal text; flags are accepted and ignored.
  define("replace(input, pattern, replacement, flags?)", ([a, b, c]) => {
    const input = asString(a);
    const pattern = asString(b);
    const replacement = asString(c);
    if (input === null || pattern === null || replacement === null) return null;
    if (pattern === "") return input;
    return input.split(pattern).join(replacement);
  }),
  define("matches(input, pattern, flags?)", ([a, b]) => {
    const input = asString(a);
    const pattern = asString(b);
    return input === null || pattern === null ? null : input.includes(pattern);
  }),

  stringPair("split(string, delimiter)", (text, delimiter) =>
    delimiter === "" ? Array.from(text) : text.split(delimiter)
  ),

  define("string join(list, delimiter?)", ([listArg, delimiterArg]) => {
    const list = asList(listArg);
    if (list === null) return null;
    const delimiter = delimiterArg === null ? "" : asString(delimiterArg);
    if (delimiter === null) return null;

    const parts: string[] = [];
    for (const item of list) {
      if (item === null) parts.push("");
      else if (typeof item === "string") parts.push(item);
      else return null;
    }
    return parts.join(delimiter);
  }),
];
