// FEEL AST node types
// Nodes are plain readonly objects discriminated by `type`; a tree is never
// mutated after the parser returns it, so one parse can serve many evaluations.

export type AstNode =
  | NumberNode
  | StringNode
  | BooleanNode
  | NullNode
  | ListNode
  | VariableNode
  | BinaryNode
  | UnaryNode
  | CallNode
  | PropertyNode
  | ConditionalNode;

export interface NumberNode {
  readonly type: "number";
  readonly value: number;
  /** Source text, kept for error messages. */
  readonly raw: string;
}

export interface StringNode {
  readonly type: "string";
  readonly value: string;
}

export interface BooleanNode {
  readonly type: "boolean";
  readonly value: boolean;
}

export interface NullNode {
  readonly type: "null";
}

export interface ListNode {
  readonly type: "list";
  readonly items: readonly AstNode[];
}

export interface VariableNode {
  readonly type: "variable";
  readonly name: string;
}

export type ArithmeticOperator = "+" | "-" | "*" | "/" | "**";
export type ComparisonOperator = "<" | ">" | "<=" | ">=" | "=" | "!=";
export type LogicalOperator = "and" | "or";
export type BinaryOperator = ArithmeticOperator | ComparisonOperator | LogicalOperator;

export interface BinaryNode {
  readonly type: "binary";
  readonly op: BinaryOperator;
  readonly left: AstNode;
  readonly right: AstNode;
}

export interface UnaryNode {
  readonly type: "unary";
  readonly op: "-";
  readonly operand: AstNode;
}

/** An actual call argument; `name` is absent for positional arguments. */
export interface FunctionParameter {
  readonly name?: string;
  readonly value: AstNode;
}

export interface CallNode {
  readonly type: "call";
  readonly name: string;
  readonly params: readonly FunctionParameter[];
}

export interface PropertyNode {
  readonly type: "property";
  readonly object: AstNode;
  readonly property: string;
}

export interface ConditionalNode {
  readonly type: "conditional";
  readonly condition: AstNode;
  readonly then: AstNode;
  readonly else: AstNode;
}

const BINARY_OPERATORS: ReadonlySet<string> = new Set<BinaryOperator>([
  "+", "-", "*", "/", "**", "<", ">", "<=", ">=", "=", "!=", "and", "or",
]);

export function isBinaryOperator(text: string): text is BinaryOperator {
  return BINARY_OPERATORS.has(text);
}
