// Business knowledge model invocation

import { BkmRecursionError, ContractViolation } from "./errors.js";
import type { BkmResolver, EvaluateOptions } from "./feel/evaluator.js";
import { evaluate } from "./feel/evaluator.js";
import { parseExpression } from "./feel/parser.js";
import type { Context, Value } from "./feel/values.js";
import { log } from "./log.js";
import type { BusinessKnowledgeModel } from "./model.js";

export const DEFAULT_MAX_BKM_DEPTH = 64;

/**
 * Invoke `bkm` with positional `args`.
 *
 * Arguments are bound to the BKM's parameters by position in a copy of
 * `context`; the body is evaluated with `bkms` visible so BKMs can call one
 * another. Nesting deeper than `options.maxDepth` throws BkmRecursionError.
 */
export function invokeBkm(
  bkm: BusinessKnowledgeModel,
  args: readonly Value[],
  context: Context,
  bkms: BkmResolver,
  options: EvaluateOptions = {}
): Value {
  if (bkm.name.trim() === "") {
    throw new ContractViolation("BKM name must not be empty");
  }
  if (bkm.expression.trim() === "") {
    throw new ContractViolation(`BKM '${bkm.name}' has an empty expression`);
  }

  const maxDepth = options.maxDepth ?? DEFAULT_MAX_BKM_DEPTH;
  const depth = (options.depth ?? 0) + 1;
  if (depth > maxDepth) {
    throw new BkmRecursionError(bkm.name, maxDepth);
  }

  if (args.length !== bkm.parameters.length) {
    log.warn(
      `BKM '${bkm.name}' expects ${bkm.parameters.length} argument(s), got ${args.length}`
    );
  }

  const scope: Context = { ...context };
  const bound = Math.min(args.length, bkm.parameters.length);
  for (let i = 0; i < bound; i++) {
    scope[bkm.parameters[i]] = args[i];
  }

  const ast = bkm.ast ?? parseExpression(bkm.expression);
  return evaluate(ast, scope, { ...options, bkms, depth, maxDepth });
}

/** Named collection of BKMs, resolvable from FEEL function calls. */
export class BkmLibrary implements BkmResolver {
  private readonly byName = new Map<string, BusinessKnowledgeModel>();

  constructor(bkms: Iterable<BusinessKnowledgeModel> = []) {
    for (const bkm of bkms) this.add(bkm);
  }

  add(bkm: BusinessKnowledgeModel): void {
    if (bkm.name.trim() === "") {
      throw new ContractViolation("BKM name must not be empty");
    }
    this.byName.set(bkm.name, bkm);
  }

  get(name: string): BusinessKnowledgeModel | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  names(): string[] {
    return [...this.byName.keys()];
  }

  invoke(name: string, args: Value[], context: Context, options: EvaluateOptions): Value {
    const bkm = this.byName.get(name);
    if (!bkm) {
      throw new ContractViolation(`No BKM named '${name}'`);
    }
    return invokeBkm(bkm, args, context, this, options);
  }
}
