import { describe, it, expect } from "vitest";
import {
  compareTemporal,
  formatDate,
  parseDate,
  parseDateTime,
  parseDuration,
  parseTime,
} from "../src/feel/temporal.js";

describe("parseDate", () => {
  it("validates the calendar", () => {
    expect(parseDate("2024-02-29")).toEqual({ year: 2024, month: 2, day: 29 });
    expect(parseDate("2023-02-29")).toBeNull();
    expect(parseDate("2024-13-01")).toBeNull();
    expect(parseDate("2024-1-1")).toBeNull();
  });
});

describe("parseTime", () => {
  it("reads seconds since midnight in UTC", () => {
    expect(parseTime("10:30")).toEqual({ seconds: 37800 });
    expect(parseTime("10:30:00Z")).toEqual({ seconds: 37800 });
    expect(parseTime("10:30:00+02:00")).toEqual({ seconds: 30600 });
    expect(parseTime("10:30:15.5")).toEqual({ seconds: 37815.5 });
  });

  it("rejects out-of-range fields", () => {
    expect(parseTime("24:00:00")).toBeNull();
    expect(parseTime("10:60")).toBeNull();
  });
});

describe("parseDateTime", () => {
  it("returns epoch seconds", () => {
    expect(parseDateTime("1970-01-02T00:00:00")).toBe(86400);
    expect(parseDateTime("1970-01-01T01:00:00+01:00")).toBe(0);
    expect(parseDateTime("1970-01-01")).toBeNull();
  });
});

describe("parseDuration", () => {
  it("splits into months and seconds", () => {
    expect(parseDuration("P1Y2M")).toEqual({ months: 14, seconds: 0 });
    expect(parseDuration("P1W")).toEqual({ months: 0, seconds: 604800 });
    expect(parseDuration("P1DT2H30M")).toEqual({ months: 0, seconds: 95400 });
    expect(parseDuration("-PT90S")?.seconds).toBe(-90);
  });

  it("rejects empty designators", () => {
    expect(parseDuration("P")).toBeNull();
    expect(parseDuration("P1DT")).toBeNull();
    expect(parseDuration("1D")).toBeNull();
  });
});

describe("compareTemporal", () => {
  it("compares values of the same kind", () => {
    expect(compareTemporal("2024-01-01", "2023-12-31")).toBe(1);
    expect(compareTemporal("2024-01-01", "2024-01-01")).toBe(0);
    expect(compareTemporal("10:00:00Z", "11:00:00+02:00")).toBe(1);
    expect(compareTemporal("2024-01-01T10:00:00", "2024-01-01T09:00:00-02:00")).toBe(-1);
    expect(compareTemporal("P1Y", "P13M")).toBe(-1);
  });

  it("returns null across kinds or for non-temporal text", () => {
    expect(compareTemporal("2024-01-01", "10:00:00")).toBeNull();
    expect(compareTemporal("apple", "pear")).toBeNull();
  });
});

describe("formatDate", () => {
  it("pads fields and validates the date", () => {
    expect(formatDate(2024, 1, 5)).toBe("2024-01-05");
    expect(formatDate(2024, 2, 30)).toBeNull();
    expect(formatDate(2024.5, 1, 1)).toBeNull();
  });
});
