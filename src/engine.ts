// Decision engine facade
// Owns a loaded model and evaluates its decisions, required decisions first.

import { BkmLibrary, DEFAULT_MAX_BKM_DEPTH } from "./bkm.js";
import {
  CyclicRequirementError,
  UnknownDecisionError,
  errorMessage,
  isSemanticError,
} from "./errors.js";
import { evaluate, type EvaluateOptions } from "./feel/evaluator.js";
import { parseExpression } from "./feel/parser.js";
import type { FunctionRegistry } from "./feel/registry.js";
import { formatValue, type Context, type Value } from "./feel/values.js";
import { parseFile } from "./loader.js";
import { log } from "./log.js";
import type { Decision, DecisionModel, LiteralDecision } from "./model.js";
import { evaluateTable } from "./table.js";

export interface EngineOptions {
  /** Upper bound on nested BKM invocations (default 64). */
  maxBkmDepth?: number;
  registry?: FunctionRegistry;
}

export class DecisionEngine {
  private readonly decisions = new Map<string, Decision>();
  private readonly bkms: BkmLibrary;
  private readonly evalOptions: EvaluateOptions;

  constructor(
    readonly model: DecisionModel,
    options: EngineOptions = {}
  ) {
    for (const decision of model.decisions) this.decisions.set(decision.name, decision);
    this.bkms = new BkmLibrary(model.bkms);
    this.evalOptions = {
      registry: options.registry,
      bkms: this.bkms,
      maxDepth: options.maxBkmDepth ?? DEFAULT_MAX_BKM_DEPTH,
    };
  }

  static fromFile(filePath: string, options?: EngineOptions): DecisionEngine {
    return new DecisionEngine(parseFile(filePath), options);
  }

  decisionNames(): string[] {
    return [...this.decisions.keys()];
  }

  bkmNames(): string[] {
    return this.bkms.names();
  }

  getDecision(name: string): Decision | undefined {
    return this.decisions.get(name);
  }

  /**
   * Evaluate one decision. Decisions it requires are evaluated first and
   * their results added to the context under their names.
   */
  evaluateDecision(name: string, context: Context): Value {
    return this.evaluateWithRequirements(name, context, new Map(), []);
  }

  /** Evaluate every decision; results are keyed by decision name. */
  evaluate(context: Context): Record<string, Value> {
    const cache = new Map<string, Value>();
    const results: Record<string, Value> = {};
    for (const name of this.decisions.keys()) {
      results[name] = this.evaluateWithRequirements(name, context, cache, []);
    }
    return results;
  }

  private evaluateWithRequirements(
    name: string,
    context: Context,
    cache: Map<string, Value>,
    path: string[]
  ): Value {
    const cached = cache.get(name);
    if (cached !== undefined) return cached;

    const decision = this.decisions.get(name);
    if (!decision) throw new UnknownDecisionError(name);
    if (path.includes(name)) throw new CyclicRequirementError([...path, name]);

    let scope = context;
    if (decision.requires.length > 0) {
      scope = { ...context };
      for (const required of decision.requires) {
        scope[required] = this.evaluateWithRequirements(required, context, cache, [...path, name]);
      }
    }

    const result =
      decision.kind === "table"
        ? evaluateTable(decision.table, scope, this.evalOptions)
        : this.evaluateLiteral(decision.literal, scope);
    cache.set(name, result);
    return result;
  }

  private evaluateLiteral(literal: LiteralDecision, context: Context): Value {
    if (literal.expression.trim() === "") return null;
    const ast = literal.ast ?? parseExpression(literal.expression);
    try {
      const result = evaluate(ast, context, this.evalOptions);
      log.debug(`Literal decision '${literal.name}' = ${formatValue(result)}`);
      return result;
    } catch (err) {
      if (!isSemanticError(err)) throw err;
      log.debug(`Literal decision '${literal.name}' evaluated to null: ${errorMessage(err)}`);
      return null;
    }
  }
}
