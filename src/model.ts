// DMN data model: decision tables, literal decisions and business knowledge models

import type { AstNode } from "./feel/ast.js";

export type HitPolicy =
  | "FIRST"
  | "UNIQUE"
  | "PRIORITY"
  | "ANY"
  | "RULE_ORDER"
  | "OUTPUT_ORDER"
  | "COLLECT";

export type CollectAggregation = "NONE" | "SUM" | "MIN" | "MAX" | "COUNT";

/** A cell's source text plus its compiled form, when it compiled. */
export interface Entry {
  text: string;
  ast?: AstNode;
}

export interface InputClause {
  label: string;
  typeRef?: string;
  allowedValues: string[];  // empty = unrestricted
}

export interface OutputClause {
  label: string;
  typeRef?: string;
  priorities: string[];     // earlier = higher priority
  defaultValue?: Entry;
}

export interface Rule {
  id?: string;
  description?: string;
  inputEntries: Entry[];
  outputEntries: Entry[];
}

export interface DecisionTable {
  id: string;
  name: string;
  hitPolicy: HitPolicy;
  aggregation: CollectAggregation;
  inputs: InputClause[];
  outputs: OutputClause[];
  rules: Rule[];
}

export interface LiteralDecision {
  name: string;
  expression: string;
  ast?: AstNode;
}

export interface BusinessKnowledgeModel {
  name: string;
  parameters: string[];
  expression: string;
  ast?: AstNode;
}

interface DecisionBase {
  name: string;
  description?: string;
  requires: string[];       // names of decisions evaluated first
}

export interface TableDecision extends DecisionBase {
  kind: "table";
  table: DecisionTable;
}

export interface LiteralExpressionDecision extends DecisionBase {
  kind: "literal";
  literal: LiteralDecision;
}

export type Decision = TableDecision | LiteralExpressionDecision;

export interface DecisionModel {
  name: string;
  version: string;
  description?: string;
  decisions: Decision[];
  bkms: BusinessKnowledgeModel[];
}

export interface ValidationResult {
  errors: string[];
  warnings: string[];
  isValid: boolean;
}
