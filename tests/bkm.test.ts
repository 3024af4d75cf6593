import { afterEach, describe, it, expect } from "vitest";
import { BkmLibrary, DEFAULT_MAX_BKM_DEPTH, invokeBkm } from "../src/bkm.js";
import { evaluate } from "../src/feel/evaluator.js";
import { parseExpression } from "../src/feel/parser.js";
import type { BusinessKnowledgeModel } from "../src/model.js";
import { BkmRecursionError, ContractViolation } from "../src/errors.js";
import { setLogSink } from "../src/log.js";

function bkm(name: string, parameters: string[], expression: string): BusinessKnowledgeModel {
  return { name, parameters, expression, ast: parseExpression(expression) };
}

afterEach(() => {
  setLogSink();
});

describe("invokeBkm", () => {
  const library = new BkmLibrary([
    bkm("monthly payment", ["principal", "months"], "principal / months"),
    bkm("with fee", ["amount"], "monthly payment(amount, 12) + fee"),
  ]);

  it("binds arguments to parameters by position", () => {
    const payment = library.get("monthly payment");
    expect(payment).toBeDefined();
    if (payment) expect(invokeBkm(payment, [1200, 12], {}, library)).toBe(100);
  });

  it("sees the caller's context and other BKMs", () => {
    const node = parseExpression("with fee(2400)");
    expect(evaluate(node, { fee: 5 }, { bkms: library })).toBe(205);
  });

  it("does not leak bindings into the caller's context", () => {
    const context = { principal: 1 };
    const payment = library.get("monthly payment");
    if (payment) invokeBkm(payment, [600, 6], context, library);
    expect(context).toEqual({ principal: 1 });
  });

  it("parses the expression when no compiled form is present", () => {
    const plain: BusinessKnowledgeModel = { name: "twice", parameters: ["x"], expression: "x * 2" };
    expect(invokeBkm(plain, [21], {}, library)).toBe(42);
  });

  it("warns on an argument count mismatch and binds what it can", () => {
    const lines: string[] = [];
    setLogSink((line) => lines.push(line));
    const pair = bkm("pair", ["a", "b"], "[a, b]");
    expect(invokeBkm(pair, [1], { b: "outer" }, library)).toEqual([1, "outer"]);
    expect(lines).toEqual(["[dmn-engine] warning: BKM 'pair' expects 2 argument(s), got 1"]);
  });

  it("rejects an empty name or expression", () => {
    const unnamed: BusinessKnowledgeModel = { name: " ", parameters: [], expression: "1" };
    const empty: BusinessKnowledgeModel = { name: "empty", parameters: [], expression: "" };
    expect(() => invokeBkm(unnamed, [], {}, library)).toThrow(ContractViolation);
    expect(() => invokeBkm(empty, [], {}, library)).toThrow("BKM 'empty' has an empty expression");
  });
});

describe("recursion limit", () => {
  const loop = new BkmLibrary([bkm("loop", ["n"], "loop(n + 1)")]);

  it("stops unbounded recursion at the default depth", () => {
    expect(DEFAULT_MAX_BKM_DEPTH).toBe(64);
    const node = parseExpression("loop(0)");
    expect(() => evaluate(node, {}, { bkms: loop })).toThrow(BkmRecursionError);
    expect(() => evaluate(node, {}, { bkms: loop })).toThrow(
      "BKM 'loop' exceeded the maximum invocation depth of 64"
    );
  });

  it("honours a custom depth", () => {
    const node = parseExpression("loop(0)");
    expect(() => evaluate(node, {}, { bkms: loop, maxDepth: 3 })).toThrow(
      "BKM 'loop' exceeded the maximum invocation depth of 3"
    );
  });

  it("allows bounded recursion within the limit", () => {
    const countdown = new BkmLibrary([
      bkm("countdown", ["n"], "if n <= 0 then 0 else countdown(n - 1) + 1"),
    ]);
    const node = parseExpression("countdown(5)");
    expect(evaluate(node, {}, { bkms: countdown, maxDepth: 6 })).toBe(5);
    expect(() => evaluate(node, {}, { bkms: countdown, maxDepth: 5 })).toThrow(BkmRecursionError);
  });
});

describe("BkmLibrary", () => {
  it("lists, finds and rejects unknown names", () => {
    const library = new BkmLibrary([bkm("a", [], "1"), bkm("b", [], "2")]);
    expect(library.names()).toEqual(["a", "b"]);
    expect(library.has("a")).toBe(true);
    expect(library.has("c")).toBe(false);
    expect(() => library.invoke("c", [], {}, {})).toThrow("No BKM named 'c'");
  });

  it("rejects a BKM without a name", () => {
    const library = new BkmLibrary();
    expect(() => library.add({ name: "", parameters: [], expression: "1" })).toThrow(ContractViolation);
  });
});
