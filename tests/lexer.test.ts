import { describe, it, expect } from "vitest";
import { tokenize, type Token } from "../src/feel/lexer.js";
import { LexError } from "../src/errors.js";

function kinds(tokens: Token[]): string[] {
  return tokens.map((t) => t.kind);
}

function texts(tokens: Token[]): string[] {
  return tokens.map((t) => t.text);
}

describe("tokenize", () => {
  it("always ends with EndOfInput", () => {
    expect(tokenize("")).toEqual([{ kind: "EndOfInput", text: "", position: 0 }]);
    const tokens = tokenize("1 + 2");
    expect(tokens[tokens.length - 1]).toEqual({ kind: "EndOfInput", text: "", position: 5 });
  });

  it("records token positions", () => {
    expect(tokenize("1 + 2")).toEqual([
      { kind: "Number", text: "1", position: 0 },
      { kind: "Operator", text: "+", position: 2 },
      { kind: "Number", text: "2", position: 4 },
      { kind: "EndOfInput", text: "", position: 5 },
    ]);
  });

  it("reads decimals, leading-dot decimals and scientific notation", () => {
    expect(texts(tokenize("3.14 .5 1e-5 2.5E+10"))).toEqual(["3.14", ".5", "1e-5", "2.5E+10", ""]);
    expect(kinds(tokenize(".5"))).toEqual(["Number", "EndOfInput"]);
  });

  it("folds a minus into the number only in unary position", () => {
    expect(texts(tokenize("-5"))).toEqual(["-5", ""]);
    expect(texts(tokenize("(-2)"))).toEqual(["(", "-2", ")", ""]);
    expect(texts(tokenize("[1, -2]"))).toEqual(["[", "1", ",", "-2", "]", ""]);
    expect(texts(tokenize("3 * -.5"))).toEqual(["3", "*", "-.5", ""]);

    expect(kinds(tokenize("3 - 2"))).toEqual(["Number", "Operator", "Number", "EndOfInput"]);
    expect(kinds(tokenize("3 -2"))).toEqual(["Number", "Operator", "Number", "EndOfInput"]);
    expect(kinds(tokenize("x -1"))).toEqual(["Identifier", "Operator", "Number", "EndOfInput"]);
  });

  it("keeps quotes and escapes in string token text", () => {
    const [token] = tokenize('"say \\"hi\\""');
    expect(token).toEqual({ kind: "String", text: '"say \\"hi\\""', position: 0 });
  });

  it("reads two-character operators", () => {
    expect(texts(tokenize("a ** b <= c >= d != e == f"))).toEqual([
      "a", "**", "b", "<=", "c", ">=", "d", "!=", "e", "==", "f", "",
    ]);
  });

  it("reads identifiers with embedded spaces", () => {
    const tokens = tokenize("monthly salary * 12");
    expect(tokens[0]).toEqual({ kind: "Identifier", text: "monthly salary", position: 0 });
    expect(texts(tokens)).toEqual(["monthly salary", "*", "12", ""]);
  });

  it("stops an identifier before a keyword", () => {
    const tokens = tokenize("age >= 18 and age < 65");
    expect(kinds(tokens)).toEqual([
      "Identifier", "Operator", "Number", "Keyword", "Identifier", "Operator", "Number", "EndOfInput",
    ]);
    expect(texts(tokenize("x and y"))).toEqual(["x", "and", "y", ""]);
  });

  it("trims trailing spaces from identifiers", () => {
    expect(texts(tokenize("credit score   "))).toEqual(["credit score", ""]);
  });

  it("reads multi-word function names", () => {
    expect(texts(tokenize("string length(name)"))).toEqual(["string length", "(", "name", ")", ""]);
    expect(texts(tokenize('date and time("2024-01-01T00:00:00")'))).toEqual([
      "date and time", "(", '"2024-01-01T00:00:00"', ")", "",
    ]);
    expect(texts(tokenize("index of(xs, 1)"))).toEqual(["index of", "(", "xs", ",", "1", ")", ""]);
  });

  it("classifies keywords", () => {
    expect(kinds(tokenize("if x then true else null"))).toEqual([
      "Keyword", "Identifier", "Keyword", "Keyword", "Keyword", "Keyword", "EndOfInput",
    ]);
  });

  it("reads punctuation", () => {
    expect(kinds(tokenize("f(a: 1).b[0]"))).toEqual([
      "Identifier", "LParen", "Identifier", "Colon", "Number", "RParen",
      "Dot", "Identifier", "LBracket", "Number", "RBracket", "EndOfInput",
    ]);
  });

  it("rejects unknown characters with their position", () => {
    expect(() => tokenize("1 @ 2")).toThrow(LexError);
    expect(() => tokenize("1 @ 2")).toThrow("Lex error at position 2: Unexpected character '@'");
  });

  it("rejects an unterminated string at its opening quote", () => {
    let caught: unknown;
    try {
      tokenize('x + "abc');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(LexError);
    if (caught instanceof LexError) expect(caught.position).toBe(4);
  });
});
