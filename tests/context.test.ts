import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { parseContext, readContext } from "../src/context.js";
import { ModelError } from "../src/errors.js";

const FIXTURES = fileURLToPath(new URL("./fixtures/", import.meta.url));

describe("readContext", () => {
  it("reads inline JSON", () => {
    expect(readContext(' {"age": 30, "tags": ["a"]} ')).toEqual({ age: 30, tags: ["a"] });
  });

  it("reads a JSON file", () => {
    expect(readContext(join(FIXTURES, "applicant.json"))).toEqual({
      age: 16,
      "credit score": 650,
      employment: "unemployed",
      amount: 6000,
      term: 12,
    });
  });

  it("reads a YAML file and turns dates into ISO strings", () => {
    expect(readContext(join(FIXTURES, "applicant.yaml"))).toEqual({
      age: 30,
      "credit score": 720,
      employment: "employed",
      amount: 12000,
      term: 24,
      since: "2024-01-15T00:00:00.000Z",
    });
  });
});

describe("parseContext", () => {
  it("requires an object", () => {
    expect(() => parseContext("[1, 2]", "json", "inline data")).toThrow(
      "Input data in inline data must be an object"
    );
    expect(() => parseContext("just text", "yaml", "data.yaml")).toThrow(ModelError);
  });

  it("keeps a __proto__ key as plain data", () => {
    const context = parseContext('{"__proto__": {"a": 1}, "b": 2}', "json", "inline data");
    expect(Object.keys(context)).toEqual(["__proto__", "b"]);
    expect(Object.getPrototypeOf(context)).toBe(Object.prototype);
  });

  it("reports malformed input", () => {
    expect(() => parseContext("{bad", "json", "inline data")).toThrow(/^Invalid input data in inline data: /);
  });
});
