// Decision model loader
// Reads a YAML (or JSON) model file into a DecisionModel and compiles every
// FEEL entry once, so evaluation never re-parses.

import { readFileSync } from "node:fs";
import yaml from "js-yaml";
import { LexError, ModelError, ParseError, errorMessage } from "./errors.js";
import type { AstNode } from "./feel/ast.js";
import { parseExpression } from "./feel/parser.js";
import { isPlainObject } from "./feel/values.js";
import type {
  BusinessKnowledgeModel,
  Decision,
  DecisionModel,
  DecisionTable,
  Entry,
  InputClause,
  OutputClause,
  Rule,
} from "./model.js";
import { parseHitPolicy } from "./table.js";

type RawMap = Record<string, unknown>;

// --- Entry compilation ---

const UNARY_MARKERS = [">=", "<=", "..", "[", "("];

/** Input cells that are plainly unary tests are left to the unary matcher. */
export function looksLikeUnaryTest(text: string): boolean {
  const t = text.trim();
  return t === "" || t === "-" || UNARY_MARKERS.some((marker) => t.includes(marker));
}

function tryParse(text: string): AstNode | undefined {
  try {
    return parseExpression(text);
  } catch (err) {
    if (err instanceof LexError || err instanceof ParseError) return undefined;
    throw err;
  }
}

export function compileInputEntry(text: string): Entry {
  if (looksLikeUnaryTest(text)) return { text };
  const ast = tryParse(text);
  return ast ? { text, ast } : { text };
}

export function compileOutputEntry(text: string): Entry {
  const ast = tryParse(text);
  return ast ? { text, ast } : { text };
}

function compileRequired(text: string, what: string): AstNode {
  try {
    return parseExpression(text);
  } catch (err) {
    throw new ModelError(`${what}: ${errorMessage(err)}`);
  }
}

// --- Raw YAML helpers ---

function asMap(value: unknown, what: string): RawMap {
  if (!isPlainObject(value)) {
    throw new ModelError(`${what} must be a mapping`);
  }
  return value;
}

function asArray(value: unknown, what: string): unknown[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ModelError(`${what} must be a list`);
  }
  return value;
}

function asStringArray(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) return value.map(String);
  return [String(value)];
}

function optionalString(value: unknown): string | undefined {
  return value !== undefined && value !== null ? String(value) : undefined;
}

/** YAML scalars (numbers, booleans) are accepted as cell text. */
function entryText(value: unknown, whenNull: string): string {
  if (value === undefined || value === null) return whenNull;
  if (typeof value === "string") return value;
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

// --- Tables ---

function parseInput(raw: unknown, where: string): InputClause {
  const map = asMap(raw, where);
  const label = optionalString(map["label"] ?? map["name"]);
  if (label === undefined || label.trim() === "") {
    throw new ModelError(`${where} has no label`);
  }
  return {
    label,
    typeRef: optionalString(map["typeRef"]),
    allowedValues: asStringArray(map["allowedValues"]),
  };
}

function parseOutput(raw: unknown, where: string): OutputClause {
  const map = asMap(raw, where);
  const label = optionalString(map["label"] ?? map["name"]) ?? "";
  const output: OutputClause = {
    label,
    typeRef: optionalString(map["typeRef"]),
    priorities: asStringArray(map["priorities"]),
  };
  if (map["default"] !== undefined) {
    output.defaultValue = compileOutputEntry(entryText(map["default"], "null"));
  }
  return output;
}

function parseRule(raw: unknown, where: string): Rule {
  const map = asMap(raw, where);
  return {
    id: optionalString(map["id"]),
    description: optionalString(map["description"]),
    inputEntries: asArray(map["inputs"], `${where} inputs`).map((v) =>
      compileInputEntry(entryText(v, "-"))
    ),
    outputEntries: asArray(map["outputs"], `${where} outputs`).map((v) =>
      compileOutputEntry(entryText(v, "null"))
    ),
  };
}

function toId(name: string): string {
  return name.trim().toLowerCase().replace(/[^a-z0-9]+/g, "_").replace(/^_|_$/g, "");
}

function parseTable(raw: unknown, decisionName: string): DecisionTable {
  const where = `Decision '${decisionName}' table`;
  const map = asMap(raw, where);
  const { hitPolicy, aggregation } = parseHitPolicy(
    optionalString(map["hitPolicy"]),
    optionalString(map["aggregation"])
  );
  return {
    id: optionalString(map["id"]) ?? toId(decisionName),
    name: decisionName,
    hitPolicy,
    aggregation,
    inputs: asArray(map["inputs"], `${where} inputs`).map((v, i) =>
      parseInput(v, `${where} input ${i + 1}`)
    ),
    outputs: asArray(map["outputs"], `${where} outputs`).map((v, i) =>
      parseOutput(v, `${where} output ${i + 1}`)
    ),
    rules: asArray(map["rules"], `${where} rules`).map((v, i) =>
      parseRule(v, `${where} rule ${i + 1}`)
    ),
  };
}

// --- Decisions and BKMs ---

function parseDecision(raw: unknown, index: number): Decision {
  const map = asMap(raw, `Decision ${index + 1}`);
  const name = optionalString(map["name"]);
  if (name === undefined || name.trim() === "") {
    throw new ModelError(`Decision ${index + 1} has no name`);
  }

  const hasTable = map["table"] !== undefined;
  const hasExpression = map["expression"] !== undefined;
  if (hasTable === hasExpression) {
    throw new ModelError(`Decision '${name}' must have exactly one of 'table' or 'expression'`);
  }

  const base = {
    name,
    description: optionalString(map["description"]),
    requires: asStringArray(map["requires"]),
  };

  if (hasTable) {
    return { ...base, kind: "table", table: parseTable(map["table"], name) };
  }

  const expression = entryText(map["expression"], "null");
  return {
    ...base,
    kind: "literal",
    literal: {
      name,
      expression,
      ast: compileRequired(expression, `Decision '${name}' expression`),
    },
  };
}

function parseBkm(raw: unknown, index: number): BusinessKnowledgeModel {
  const map = asMap(raw, `BKM ${index + 1}`);
  const name = optionalString(map["name"]);
  if (name === undefined || name.trim() === "") {
    throw new ModelError(`BKM ${index + 1} has no name`);
  }
  const expression = entryText(map["expression"], "");
  return {
    name,
    parameters: asStringArray(map["parameters"]),
    expression,
    ast: expression.trim() === "" ? undefined : compileRequired(expression, `BKM '${name}'`),
  };
}

// --- Public API ---

/** Build a DecisionModel from plain data, as produced by yaml.load or JSON.parse. */
export function parseDict(data: RawMap): DecisionModel {
  return {
    name: String(data["name"] ?? ""),
    version: String(data["version"] ?? ""),
    description: optionalString(data["description"]),
    decisions: asArray(data["decisions"], "decisions").map(parseDecision),
    bkms: asArray(data["bkms"], "bkms").map(parseBkm),
  };
}

/**
 * Load a model file from disk. YAML is read with the safe default schema;
 * JSON files parse as YAML too.
 */
export function parseFile(filePath: string): DecisionModel {
  const raw = readFileSync(filePath, "utf-8");
  let data: unknown;
  try {
    data = yaml.load(raw, { schema: yaml.DEFAULT_SCHEMA });
  } catch (err) {
    throw new ModelError(`Invalid YAML in ${filePath}: ${errorMessage(err)}`);
  }
  if (!isPlainObject(data)) {
    throw new ModelError(`Invalid model structure in: ${filePath}`);
  }
  return parseDict(data);
}
