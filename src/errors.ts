// Error classes shared by the FEEL engine, the decision table engine and the facade.
//
// Two families: structural errors abort an evaluation and reach the caller;
// semantic errors (EvalError, BindingError) are the ones DMN allows a caller
// to turn into null.

export class DmnError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = "DmnError";
  }
}

// --- Structural ---

export class LexError extends DmnError {
  constructor(
    message: string,
    public readonly position: number
  ) {
    super(`Lex error at position ${position}: ${message}`, "LEX_ERROR");
    this.name = "LexError";
  }
}

export class ParseError extends DmnError {
  constructor(
    message: string,
    public readonly position: number
  ) {
    super(`Parse error at position ${position}: ${message}`, "PARSE_ERROR");
    this.name = "ParseError";
  }
}

export class AllowedValuesError extends DmnError {
  constructor(
    public readonly label: string,
    public readonly value: string
  ) {
    super(
      `Input value for '${label}' not in allowed values: ${value}`,
      "ALLOWED_VALUES"
    );
    this.name = "AllowedValuesError";
  }
}

export class ContractViolation extends DmnError {
  constructor(message: string) {
    super(message, "CONTRACT_VIOLATION");
    this.name = "ContractViolation";
  }
}

export class BkmRecursionError extends DmnError {
  constructor(
    public readonly bkm: string,
    public readonly depth: number
  ) {
    super(
      `BKM '${bkm}' exceeded the maximum invocation depth of ${depth}`,
      "BKM_RECURSION"
    );
    this.name = "BkmRecursionError";
  }
}

export class ModelError extends DmnError {
  constructor(message: string) {
    super(message, "MODEL_ERROR");
    this.name = "ModelError";
  }
}

export class UnknownDecisionError extends DmnError {
  constructor(public readonly decision: string) {
    super(`No decision named '${decision}'`, "UNKNOWN_DECISION");
    this.name = "UnknownDecisionError";
  }
}

export class CyclicRequirementError extends DmnError {
  constructor(public readonly path: string[]) {
    super(
      `Cyclic decision requirement: ${path.join(" -> ")}`,
      "CYCLIC_REQUIREMENT"
    );
    this.name = "CyclicRequirementError";
  }
}

// --- Semantic (null under DMN rules) ---

export class EvalError extends DmnError {
  constructor(message: string) {
    super(message, "EVAL_ERROR");
    this.name = "EvalError";
  }
}

export class BindingError extends DmnError {
  constructor(message: string) {
    super(message, "BINDING_ERROR");
    this.name = "BindingError";
  }
}

/** True for the errors a caller may map to null. */
export function isSemanticError(err: unknown): err is EvalError | BindingError {
  return err instanceof EvalError || err instanceof BindingError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
