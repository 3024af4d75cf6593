// ISO 8601 recognisers for dates, times, date-times and durations.
// Temporal values stay ISO strings; these helpers only validate them and give
// the decision-table matcher something to order them by.

const DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME = /^(\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?$/;
const DURATION =
  /^(-)?P(?:(\d+)Y)?(?:(\d+)M)?(?:(\d+)W)?(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?)?$/;

export interface IsoDate {
  year: number;
  month: number;
  day: number;
}

export interface IsoTime {
  /** Seconds since midnight, normalised to UTC when an offset is given. */
  seconds: number;
}

export interface IsoDuration {
  months: number;
  seconds: number;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function parseDate(text: string): IsoDate | null {
  const m = DATE.exec(text);
  if (!m) return null;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return { year, month, day };
}

export function parseTime(text: string): IsoTime | null {
  const m = TIME.exec(text);
  if (!m) return null;
  const hours = Number(m[1]);
  const minutes = Number(m[2]);
  const secs = m[3] !== undefined ? Number(m[3]) : 0;
  const fraction = m[4] !== undefined ? Number(m[4]) : 0;
  if (hours > 23 || minutes > 59 || secs > 59) return null;

  let offset = 0;
  const zone = m[5];
  if (zone !== undefined && zone !== "Z") {
    const sign = zone.startsWith("-") ? -1 : 1;
    offset = sign * (Number(zone.slice(1, 3)) * 3600 + Number(zone.slice(4, 6)) * 60);
  }
  return { seconds: hours * 3600 + minutes * 60 + secs + fraction - offset };
}

/** Epoch seconds; a date-time without an offset is read as UTC. */
export function parseDateTime(text: string): number | null {
  const sep = text.indexOf("T");
  if (sep < 0) return null;
  const date = parseDate(text.slice(0, sep));
  const time = parseTime(text.slice(sep + 1));
  if (!date || !time) return null;
  return Date.UTC(date.year, date.month - 1, date.day) / 1000 + time.seconds;
}

export function parseDuration(text: string): IsoDuration | null {
  const m = DURATION.exec(text);
  if (!m || text.endsWith("T") || /^-?P$/.test(text)) return null;
  const n = (group: string | undefined): number => (group !== undefined ? Number(group) : 0);
  const sign = m[1] === "-" ? -1 : 1;
  const months = n(m[2]) * 12 + n(m[3]);
  const seconds =
    (n(m[4]) * 7 + n(m[5])) * 86400 + n(m[6]) * 3600 + n(m[7]) * 60 + n(m[8]);
  return { months: sign * months, seconds: sign * seconds };
}

export const isIsoDate = (text: string): boolean => parseDate(text) !== null;
export const isIsoTime = (text: string): boolean => parseTime(text) !== null;
export const isIsoDateTime = (text: string): boolean => parseDateTime(text) !== null;
export const isIsoDuration = (text: string): boolean => parseDuration(text) !== null;

function sign(diff: number): number {
  return diff < 0 ? -1 : diff > 0 ? 1 : 0;
}

/**
 * Three-way comparison of two ISO strings of the same temporal kind, tried as
 * date, time, date-time, then duration. Null when neither kind fits both.
 */
export function compareTemporal(a: string, b: string): number | null {
  const da = parseDate(a);
  const db = parseDate(b);
  if (da && db) {
    return sign(da.year - db.year || da.month - db.month || da.day - db.day);
  }

  const ta = parseTime(a);
  const tb = parseTime(b);
  if (ta && tb) return sign(ta.seconds - tb.seconds);

  const dta = parseDateTime(a);
  const dtb = parseDateTime(b);
  if (dta !== null && dtb !== null) return sign(dta - dtb);

  const pa = parseDuration(a);
  const pb = parseDuration(b);
  if (pa && pb) return sign(pa.months - pb.months || pa.seconds - pb.seconds);

  return null;
}

export function formatDate(year: number, month: number, day: number): string | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return null;
  }
  if (year < 0 || year > 9999) return null;
  const text = `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
  return isIsoDate(text) ? text : null;
}
