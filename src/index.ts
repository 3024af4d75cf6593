// dmn-feel-engine public library surface
// FEEL expressions, decision tables, BKMs and the MCP server for decision models.

// FEEL
export { tokenize, isKeyword, KEYWORDS } from "./feel/lexer.js";
export { parse, parseExpression } from "./feel/parser.js";
export { evaluate, lookupVariable } from "./feel/evaluator.js";
export { bindParameters } from "./feel/binder.js";
export { FunctionRegistry, defaultRegistry, parseSignature } from "./feel/registry.js";
export { callBuiltin, isBuiltin } from "./feel/functions/index.js";
export { matchesUnaryTest } from "./feel/unary.js";
export { deepEqual, formatValue, toValue, typeName } from "./feel/values.js";

// Decisions
export { evaluateTable, parseHitPolicy } from "./table.js";
export { invokeBkm, BkmLibrary, DEFAULT_MAX_BKM_DEPTH } from "./bkm.js";
export { DecisionEngine } from "./engine.js";
export { parseFile, parseDict } from "./loader.js";
export { validate } from "./validator.js";
export { readContext } from "./context.js";

// MCP
export { createDmnServer } from "./server.js";
export {
  toModelSlug,
  toToolName,
  buildModelUri,
  buildDecisionUri,
  buildToolInputSchema,
  buildDecisionTool,
  buildModelResource,
  buildDecisionResource,
  modelToJson,
  decisionToJson,
} from "./mapper.js";

// Errors and logging
export {
  DmnError,
  LexError,
  ParseError,
  AllowedValuesError,
  ContractViolation,
  BkmRecursionError,
  ModelError,
  UnknownDecisionError,
  CyclicRequirementError,
  EvalError,
  BindingError,
  isSemanticError,
} from "./errors.js";
export { log, setLogLevel, setLogSink, type LogLevel } from "./log.js";

export type { Token, TokenKind } from "./feel/lexer.js";
export type { AstNode, FunctionParameter } from "./feel/ast.js";
export type { EvaluateOptions, BkmResolver } from "./feel/evaluator.js";
export type { FunctionSignature, ParameterSpec } from "./feel/registry.js";
export type { Value, Context } from "./feel/values.js";
export type { EngineOptions } from "./engine.js";
export type {
  BusinessKnowledgeModel,
  CollectAggregation,
  Decision,
  DecisionModel,
  DecisionTable,
  Entry,
  HitPolicy,
  InputClause,
  LiteralDecision,
  OutputClause,
  Rule,
  ValidationResult,
} from "./model.js";
export type { DmnServerOptions, DmnMcpServer } from "./server.js";
export type { McpResourceMeta, McpToolMeta, ToolInputSchema } from "./mapper.js";
