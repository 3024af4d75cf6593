// FEEL tokenizer
// Turns expression text into a flat token stream that always ends with EndOfInput.

import { LexError } from "../errors.js";

export type TokenKind =
  | "Number"
  | "String"
  | "Identifier"
  | "Keyword"
  | "Operator"
  | "LParen"
  | "RParen"
  | "LBracket"
  | "RBracket"
  | "Comma"
  | "Dot"
  | "Colon"
  | "EndOfInput"
  | "Unknown";

export interface Token {
  kind: TokenKind;
  text: string;
  position: number;
}

export const KEYWORDS: ReadonlySet<string> = new Set([
  "true",
  "false",
  "null",
  "and",
  "or",
  "not",
  "if",
  "then",
  "else",
  "in",
  "for",
  "some",
  "every",
  "return",
  "between",
  "instance",
  "of",
]);

// Built-in names that contain a keyword and would otherwise be split by it.
const KEYWORD_BEARING_NAMES = ["date and time", "index of"];

const PUNCTUATION: Record<string, TokenKind> = {
  "(": "LParen",
  ")": "RParen",
  "[": "LBracket",
  "]": "RBracket",
  ",": "Comma",
  ":": "Colon",
  ".": "Dot",
};

const OPERATOR_START = new Set(["+", "-", "*", "/", "<", ">", "=", "!"]);
const TWO_CHAR_OPERATORS = new Set(["**", "<=", ">=", "!=", "=="]);

// An identifier's embedded space ends before any of these.
const STOP_CHARS = new Set([
  "+", "-", "*", "/", "<", ">", "=", "!", "(", ")", "[", "]", ",", ".",
]);

const IDENT_START = /[\p{L}_]/u;
const IDENT_PART = /[\p{L}\p{N}_]/u;
const DIGIT = /[0-9]/;
const WHITESPACE = /\s/;

export function isKeyword(text: string): boolean {
  return KEYWORDS.has(text);
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && DIGIT.test(ch);
}

function isIdentPart(ch: string | undefined): boolean {
  return ch !== undefined && IDENT_PART.test(ch);
}

/**
 * Tokenize a FEEL expression.
 *
 * A `-` becomes part of a Number token only in unary position (stream start,
 * after an operator, `(`, `[` or `,`); elsewhere it is an Operator token and
 * the parser decides between subtraction and negation.
 */
export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < input.length) {
    skipWhitespace();
    if (pos >= input.length) break;

    const ch = input[pos];

    if (startsNumber(ch)) {
      tokens.push(readNumber());
    } else if (ch === '"') {
      tokens.push(readString());
    } else if (IDENT_START.test(ch)) {
      tokens.push(readIdentifier());
    } else if (ch in PUNCTUATION) {
      tokens.push({ kind: PUNCTUATION[ch], text: ch, position: pos });
      pos++;
    } else if (OPERATOR_START.has(ch)) {
      tokens.push(readOperator());
    } else {
      throw new LexError(`Unexpected character '${ch}'`, pos);
    }
  }

  tokens.push({ kind: "EndOfInput", text: "", position: pos });
  return tokens;

  function skipWhitespace(): void {
    while (pos < input.length && WHITESPACE.test(input[pos])) pos++;
  }

  function inUnaryContext(): boolean {
    const last = tokens[tokens.length - 1];
    if (last === undefined) return true;
    return (
      last.kind === "Operator" ||
      last.kind === "LParen" ||
      last.kind === "LBracket" ||
      last.kind === "Comma"
    );
  }

  function startsNumber(ch: string): boolean {
    if (isDigit(ch)) return true;
    if (ch === "." && isDigit(input[pos + 1])) return true;
    if (ch === "-" && inUnaryContext()) {
      if (isDigit(input[pos + 1])) return true;
      if (input[pos + 1] === "." && isDigit(input[pos + 2])) return true;
    }
    return false;
  }

  function readNumber(): Token {
    const start = pos;
    if (input[pos] === "-") pos++;
    while (isDigit(input[pos])) pos++;
    if (input[pos] === ".") {
      pos++;
      while (isDigit(input[pos])) pos++;
    }
    if (input[pos] === "e" || input[pos] === "E") {
      pos++;
      if (input[pos] === "+" || input[pos] === "-") pos++;
      while (isDigit(input[pos])) pos++;
    }
    return { kind: "Number", text: input.slice(start, pos), position: start };
  }

  // Token text keeps the quotes and raw escapes; the parser unescapes.
  function readString(): Token {
    const start = pos;
    pos++; // opening quote
    while (pos < input.length && input[pos] !== '"') {
      if (input[pos] === "\\" && pos + 1 < input.length) pos++;
      pos++;
    }
    if (pos >= input.length) {
      throw new LexError("Unterminated string literal", start);
    }
    pos++; // closing quote
    return { kind: "String", text: input.slice(start, pos), position: start };
  }

  function readIdentifier(): Token {
    const start = pos;

    for (const name of KEYWORD_BEARING_NAMES) {
      if (input.startsWith(name, pos) && !isIdentPart(input[pos + name.length])) {
        pos += name.length;
        return { kind: "Identifier", text: name, position: start };
      }
    }

    let text = input[pos++];
    while (pos < input.length && (isIdentPart(input[pos]) || input[pos] === " ")) {
      if (input[pos] === " " && shouldStopAtSpace(text)) break;
      text += input[pos++];
    }
    text = text.trimEnd();

    return {
      kind: isKeyword(text) ? "Keyword" : "Identifier",
      text,
      position: start,
    };
  }

  function shouldStopAtSpace(textSoFar: string): boolean {
    if (isKeyword(textSoFar)) return true;

    let ahead = pos + 1;
    while (ahead < input.length && WHITESPACE.test(input[ahead])) ahead++;
    if (ahead >= input.length) return true;
    if (STOP_CHARS.has(input[ahead])) return true;

    let word = "";
    while (ahead < input.length && isIdentPart(input[ahead])) {
      word += input[ahead++];
    }
    return word.length > 0 && isKeyword(word);
  }

  function readOperator(): Token {
    const start = pos;
    const pair = input.slice(pos, pos + 2);
    if (TWO_CHAR_OPERATORS.has(pair)) {
      pos += 2;
      return { kind: "Operator", text: pair, position: start };
    }
    pos++;
    return { kind: "Operator", text: input[start], position: start };
  }
}
