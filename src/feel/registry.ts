// Function registry
// Read-only table of built-in signatures used by the parameter binder.
// Signatures are written the way they read in FEEL: "substring(string, start
// position, length?)"; a trailing "?" marks an optional parameter and a final
// "..." marks the function variadic.

import { ContractViolation } from "../errors.js";
import { BUILTINS } from "./functions/index.js";

export interface ParameterSpec {
  readonly name: string;
  readonly optional: boolean;
}

export interface FunctionSignature {
  readonly name: string;
  readonly parameters: readonly ParameterSpec[];
  readonly variadic: boolean;
}

const SIGNATURE = /^\s*([^()]+?)\s*\(([^()]*)\)\s*$/;

export function parseSignature(text: string): FunctionSignature {
  const match = SIGNATURE.exec(text);
  if (!match) {
    throw new ContractViolation(`Malformed function signature: ${text}`);
  }
  const name = match[1];
  const parts = match[2]
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

  let variadic = false;
  const parameters: ParameterSpec[] = [];
  parts.forEach((part, i) => {
    if (part === "...") {
      if (i !== parts.length - 1) {
        throw new ContractViolation(`'...' must come last in signature: ${text}`);
      }
      variadic = true;
      return;
    }
    const optional = part.endsWith("?");
    parameters.push({ name: optional ? part.slice(0, -1).trim() : part, optional });
  });

  return { name, parameters, variadic };
}

export class FunctionRegistry {
  private readonly signatures = new Map<string, FunctionSignature>();
  private frozen = false;

  /** Add a signature; duplicate parameter names and re-registration are rejected. */
  register(signature: FunctionSignature | string): this {
    if (this.frozen) {
      throw new ContractViolation("Function registry is frozen");
    }
    const sig = typeof signature === "string" ? parseSignature(signature) : signature;

    const seen = new Set<string>();
    for (const param of sig.parameters) {
      if (seen.has(param.name)) {
        throw new ContractViolation(`Duplicate parameter '${param.name}' in function '${sig.name}'`);
      }
      seen.add(param.name);
    }
    if (this.signatures.has(sig.name)) {
      throw new ContractViolation(`Function '${sig.name}' is already registered`);
    }

    this.signatures.set(sig.name, sig);
    return this;
  }

  get(name: string): FunctionSignature | undefined {
    return this.signatures.get(name);
  }

  has(name: string): boolean {
    return this.signatures.has(name);
  }

  names(): string[] {
    return [...this.signatures.keys()];
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }
}

let defaultInstance: FunctionRegistry | undefined;

/** The registry of every built-in function, built on first use and frozen. */
export function defaultRegistry(): FunctionRegistry {
  if (!defaultInstance) {
    const registry = new FunctionRegistry();
    for (const builtin of BUILTINS) registry.register(builtin.signature);
    defaultInstance = registry.freeze();
  }
  return defaultInstance;
}
