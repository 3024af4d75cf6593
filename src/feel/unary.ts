// Unary tests: the decision-table cell language.
//
//   -  (or empty)        matches anything
//   not(t1, t2, ...)     matches when none of the tests match
//   t1, t2, ...          matches when any test matches
//   < 10   >= "B"  != 3  comparison against the candidate
//   [1..5]  (1..5)  ]1..5[   range; ( ) and outward brackets exclude the bound
//   "Gold"  42  true     literal equality
//
// Candidates are compared in their string form; values are ordered by trying
// number, date, time, date-time, duration, then plain text.

import { compareTemporal } from "./temporal.js";
import { formatValue, parseNumeric, type Value } from "./values.js";

const COMPARISON = /^(<=|>=|!=|==|<|>|=)\s*(.+)$/s;
const RANGE = /^([[(\]])\s*(.+?)\s*\.\.\s*(.+?)\s*([\])[)])$/s;

export function unquote(text: string): string {
  const t = text.trim();
  if (t.length >= 2 && t.startsWith('"') && t.endsWith('"')) return t.slice(1, -1);
  return t;
}

/** Split on commas outside quotes and parentheses. Brackets are not tracked: ]a..b[ leaves them unbalanced. */
export function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quoted = false;
  let current = "";

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === "\\" && i + 1 < text.length) {
        current += ch + text[++i];
        continue;
      }
      if (ch === '"') quoted = false;
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === "(") {
      depth++;
    } else if (ch === ")") {
      depth = Math.max(0, depth - 1);
    } else if (ch === "," && depth === 0) {
      parts.push(current.trim());
      current = "";
      continue;
    }
    current += ch;
  }
  parts.push(current.trim());
  return parts;
}

function parseBoolean(text: string): boolean | null {
  if (text === "true") return true;
  if (text === "false") return false;
  return null;
}

/** Three-way ordering of two value texts. */
export function compareText(a: string, b: string): number {
  const na = parseNumeric(a);
  const nb = parseNumeric(b);
  if (na !== null && nb !== null) return na < nb ? -1 : na > nb ? 1 : 0;

  const temporal = compareTemporal(a, b);
  if (temporal !== null) return temporal;

  return a < b ? -1 : a > b ? 1 : 0;
}

function matchesLiteral(test: string, candidate: string): boolean {
  const expected = unquote(test);

  const na = parseNumeric(expected);
  const nb = parseNumeric(candidate);
  if (na !== null && nb !== null) return na === nb;

  const ba = parseBoolean(expected);
  const bb = parseBoolean(candidate);
  if (ba !== null && bb !== null) return ba === bb;

  const temporal = compareTemporal(expected, candidate);
  if (temporal !== null) return temporal === 0;

  return expected === candidate;
}

function matchesText(raw: string, candidate: string, isNull: boolean): boolean {
  const test = raw.trim();

  if (test === "" || test === "-") return true;

  if (test.startsWith("not(") && test.endsWith(")")) {
    const inner = test.slice(4, -1);
    return !splitTopLevel(inner).some((part) => matchesText(part, candidate, isNull));
  }

  const parts = splitTopLevel(test);
  if (parts.length > 1) {
    return parts.some((part) => matchesText(part, candidate, isNull));
  }

  const comparison = COMPARISON.exec(test);
  if (comparison) {
    const op = comparison[1];
    const rhs = unquote(comparison[2]);
    if (op === "=" || op === "==") return matchesLiteral(comparison[2], candidate);
    if (op === "!=") return !matchesLiteral(comparison[2], candidate);
    if (isNull) return false;
    const cmp = compareText(candidate, rhs);
    switch (op) {
      case "<":
        return cmp < 0;
      case "<=":
        return cmp <= 0;
      case ">":
        return cmp > 0;
      default:
        return cmp >= 0;
    }
  }

  const range = RANGE.exec(test);
  if (range) {
    if (isNull) return false;
    const lower = compareText(candidate, unquote(range[2]));
    const upper = compareText(candidate, unquote(range[3]));
    const lowerOk = range[1] === "[" ? lower >= 0 : lower > 0;
    const upperOk = range[4] === "]" ? upper <= 0 : upper < 0;
    return lowerOk && upperOk;
  }

  return matchesLiteral(test, candidate);
}

/**
 * Does `candidate` satisfy the unary test? A list candidate matches when any
 * element does. Ordering tests never match a null candidate.
 */
export function matchesUnaryTest(test: string, candidate: Value): boolean {
  if (Array.isArray(candidate)) {
    return candidate.some((item) => matchesUnaryTest(test, item));
  }
  return matchesText(test, formatValue(candidate), candidate === null);
}
