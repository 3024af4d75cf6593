// FEEL parser
// Recursive descent over the token stream, one function per precedence level:
//
//   expr        := conditional
//   conditional := "if" or "then" conditional "else" conditional | or
//   or          := and ("or" and)*
//   and         := cmp ("and" cmp)*
//   cmp         := add (("<"|">"|"<="|">="|"="|"=="|"!=") add)*
//   add         := mul (("+"|"-") mul)*
//   mul         := pow (("*"|"/") pow)*
//   pow         := primary ("**" pow)?
//   primary     := NUMBER | STRING | true | false | null
//                | IDENT ("(" args ")")? ("." IDENT)*
//                | "(" expr ")" ("." IDENT)* | "[" list "]" | "-" primary

import { ParseError } from "../errors.js";
import { tokenize, type Token, type TokenKind } from "./lexer.js";
import {
  isBinaryOperator,
  type AstNode,
  type BinaryOperator,
  type CallNode,
  type FunctionParameter,
} from "./ast.js";

const COMPARISON_OPERATORS = new Set(["<", ">", "<=", ">=", "=", "==", "!="]);

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  '"': '"',
  "\\": "\\",
  "'": "'",
};

/** Strip the quotes from a String token and resolve backslash escapes. */
export function unquoteString(text: string): string {
  const body =
    text.length >= 2 && text.startsWith('"') && text.endsWith('"')
      ? text.slice(1, -1)
      : text;
  return body.replace(/\\(u[0-9a-fA-F]{4}|.)/g, (_, esc: string) =>
    esc.length === 5 ? String.fromCharCode(parseInt(esc.slice(1), 16)) : ESCAPES[esc] ?? esc
  );
}

/**
 * Parse a token stream (as produced by `tokenize`) into an AST.
 * The whole stream must be consumed.
 */
export function parse(tokens: Token[]): AstNode {
  let pos = 0;

  if (tokens.length === 0 || tokens[0].kind === "EndOfInput") {
    throw new ParseError("Cannot parse empty expression", 0);
  }

  const ast = parseConditional();

  if (!atEnd()) {
    throw new ParseError(`Unexpected token '${peek().text}' after expression`, peek().position);
  }

  return ast;

  // --- Token cursor ---

  function peek(offset = 0): Token {
    const index = Math.min(pos + offset, tokens.length - 1);
    return tokens[index];
  }

  function advance(): Token {
    const token = peek();
    if (!atEnd()) pos++;
    return token;
  }

  function atEnd(): boolean {
    return peek().kind === "EndOfInput";
  }

  function check(kind: TokenKind, text?: string): boolean {
    const token = peek();
    return token.kind === kind && (text === undefined || token.text === text);
  }

  function expect(kind: TokenKind, message: string): Token {
    if (!check(kind)) {
      const token = peek();
      const found = token.kind === "EndOfInput" ? "end of input" : `'${token.text}'`;
      throw new ParseError(`${message} (got ${found})`, token.position);
    }
    return advance();
  }

  function binary(op: BinaryOperator, left: AstNode, right: AstNode): AstNode {
    return { type: "binary", op, left, right };
  }

  // --- Precedence levels ---

  function parseConditional(): AstNode {
    if (!check("Keyword", "if")) return parseOr();
    advance();

    const condition = parseOr();
    if (!check("Keyword", "then")) {
      throw new ParseError("Expected 'then' after if condition", peek().position);
    }
    advance();
    const thenBranch = parseConditional();

    if (!check("Keyword", "else")) {
      throw new ParseError("Expected 'else' after then expression", peek().position);
    }
    advance();
    const elseBranch = parseConditional();

    return { type: "conditional", condition, then: thenBranch, else: elseBranch };
  }

  function parseOr(): AstNode {
    let left = parseAnd();
    while (check("Keyword", "or")) {
      advance();
      left = binary("or", left, parseAnd());
    }
    return left;
  }

  function parseAnd(): AstNode {
    let left = parseComparison();
    while (check("Keyword", "and")) {
      advance();
      left = binary("and", left, parseComparison());
    }
    return left;
  }

  function parseComparison(): AstNode {
    let left = parseAdditive();
    while (check("Operator") && COMPARISON_OPERATORS.has(peek().text)) {
      const token = advance();
      const op = token.text === "==" ? "=" : token.text;
      if (!isBinaryOperator(op)) {
        throw new ParseError(`Unknown operator '${token.text}'`, token.position);
      }
      left = binary(op, left, parseAdditive());
    }
    return left;
  }

  function parseAdditive(): AstNode {
    let left = parseMultiplicative();
    while (check("Operator", "+") || check("Operator", "-")) {
      const op = advance().text === "+" ? "+" : "-";
      left = binary(op, left, parseMultiplicative());
    }
    return left;
  }

  function parseMultiplicative(): AstNode {
    let left = parseExponentiation();
    while (check("Operator", "*") || check("Operator", "/")) {
      const op = advance().text === "*" ? "*" : "/";
      left = binary(op, left, parseExponentiation());
    }
    return left;
  }

  // Right-associative: 2 ** 3 ** 2 = 2 ** (3 ** 2)
  function parseExponentiation(): AstNode {
    const left = parsePrimary();
    if (check("Operator", "**")) {
      advance();
      return binary("**", left, parseExponentiation());
    }
    return left;
  }

  // --- Primary expressions ---

  function parsePrimary(): AstNode {
    const token = peek();
    switch (token.kind) {
      case "Number":
        return parseNumber();
      case "String":
        advance();
        return { type: "string", value: unquoteString(token.text) };
      case "Keyword":
        return parseKeyword();
      case "Identifier":
        advance();
        if (check("LParen")) return parseCall(token.text);
        return parsePropertyChain({ type: "variable", name: token.text });
      case "LParen": {
        advance();
        const inner = parseConditional();
        expect("RParen", "Expected ')' after expression");
        return parsePropertyChain(inner);
      }
      case "LBracket":
        return parseList();
      case "Operator":
        if (token.text === "-") {
          advance();
          return { type: "unary", op: "-", operand: parsePrimary() };
        }
        break;
      default:
        break;
    }
    const found = token.kind === "EndOfInput" ? "end of input" : `token '${token.text}'`;
    throw new ParseError(`Unexpected ${found}`, token.position);
  }

  function parseNumber(): AstNode {
    const token = advance();
    const value = Number(token.text);
    if (!Number.isFinite(value)) {
      throw new ParseError(`Invalid number literal '${token.text}'`, token.position);
    }
    return { type: "number", value, raw: token.text };
  }

  function parseKeyword(): AstNode {
    const token = peek();
    switch (token.text) {
      case "true":
      case "false":
        advance();
        return { type: "boolean", value: token.text === "true" };
      case "null":
        advance();
        return { type: "null" };
      case "not":
        if (peek(1).kind === "LParen") {
          advance();
          return parseCall("not");
        }
        break;
      default:
        break;
    }
    throw new ParseError(`Unexpected keyword '${token.text}'`, token.position);
  }

  function parsePropertyChain(start: AstNode): AstNode {
    let node = start;
    while (check("Dot")) {
      advance();
      if (!check("Identifier")) {
        throw new ParseError("Expected property name after '.'", peek().position);
      }
      node = { type: "property", object: node, property: advance().text };
    }
    return node;
  }

  function parseCall(name: string): CallNode {
    advance(); // '('
    const params: FunctionParameter[] = [];
    let named = false;
    let positional = false;

    if (!check("RParen")) {
      for (;;) {
        let paramName: string | undefined;
        if (check("Identifier") && peek(1).kind === "Colon") {
          paramName = advance().text;
          advance(); // ':'
        }

        if (paramName !== undefined) named = true;
        else positional = true;
        if (named && positional) {
          throw new ParseError(
            `Cannot mix named and positional parameters in call to '${name}'`,
            peek().position
          );
        }

        const value = parseConditional();
        params.push(paramName !== undefined ? { name: paramName, value } : { value });

        if (!check("Comma")) break;
        advance();
      }
    }

    expect("RParen", "Expected ')' after function arguments");
    return { type: "call", name, params };
  }

  function parseList(): AstNode {
    advance(); // '['
    const items: AstNode[] = [];
    while (!check("RBracket")) {
      items.push(parseConditional());
      if (!check("Comma")) break;
      advance(); // trailing comma allowed
    }
    expect("RBracket", "Expected ']' after list elements");
    return { type: "list", items };
  }
}

/** Tokenize and parse in one step. */
export function parseExpression(text: string): AstNode {
  return parse(tokenize(text));
}
