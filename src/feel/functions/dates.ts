// Temporal constructors. Values stay ISO strings; a constructor validates the
// shape and returns the string, or null.

import { asNumber, asString, define, type BuiltinFunction } from "./define.js";
import {
  formatDate,
  isIsoDate,
  isIsoDateTime,
  isIsoDuration,
  isIsoTime,
} from "../temporal.js";

export const dateFunctions: readonly BuiltinFunction[] = [
  // date("2024-01-31"), date("2024-01-31T10:00:00"), date(2024, 1, 31)
  // or date(year: 2024, month: 1, day: 31), where the names bind after an empty 'from'
  define("date(from?, ...)", (args) => {
    if (args.length === 4 && args[0] === null) args = args.slice(1);
    if (args.length === 3) {
      const [y, m, d] = args.map(asNumber);
      return y === null || m === null || d === null ? null : formatDate(y, m, d);
    }
    if (args.length !== 1) return null;
    const text = asString(args[0]);
    if (text === null) return null;
    if (isIsoDate(text)) return text;
    if (isIsoDateTime(text)) return text.slice(0, text.indexOf("T"));
    return null;
  }),

  define("time(from)", ([from]) => {
    const text = asString(from);
    if (text === null) return null;
    if (isIsoTime(text)) return text;
    if (isIsoDateTime(text)) return text.slice(text.indexOf("T") + 1);
    return null;
  }),

  // date and time("2024-01-31T10:00:00") or date and time("2024-01-31", "10:00:00")
  define("date and time(from, ...)", (args) => {
    if (args.length === 2) {
      const date = asString(args[0]);
      const time = asString(args[1]);
      if (date === null || time === null || !isIsoDate(date) || !isIsoTime(time)) return null;
      return `${date}T${time}`;
    }
    if (args.length !== 1) return null;
    const text = asString(args[0]);
    if (text === null) return null;
    if (isIsoDateTime(text)) return text;
    if (isIsoDate(text)) return `${text}T00:00:00`;
    return null;
  }),

  define("duration(from)", ([from]) => {
    const text = asString(from);
    return text !== null && isIsoDuration(text) ? text : null;
  }),
];
