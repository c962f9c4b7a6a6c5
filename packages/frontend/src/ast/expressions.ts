/**
 * Expression nodes of the BSL syntax tree
 */

/**
 * 1-based position of the first character of a node
 */
export type NodePosition = {
  readonly line: number;
  readonly column: number;
};

export type Expression =
  | NumberLiteral
  | StringLiteral
  | BooleanLiteral
  | DateLiteral
  | UndefinedLiteral
  | NullLiteral
  | Identifier
  | MemberAccess
  | IndexExpression
  | CallExpression
  | NewExpression
  | BinaryExpression
  | UnaryExpression
  | TernaryExpression
  | ArrayLiteral
  | StructureLiteral;

export type NumberLiteral = {
  readonly kind: "numberLiteral";
  readonly value: number;
  readonly location?: NodePosition;
};

export type StringLiteral = {
  readonly kind: "stringLiteral";
  readonly value: string;
  readonly location?: NodePosition;
};

export type BooleanLiteral = {
  readonly kind: "booleanLiteral";
  readonly value: boolean;
  readonly location?: NodePosition;
};

/** Raw digits between the quotes, e.g. `20240131` */
export type DateLiteral = {
  readonly kind: "dateLiteral";
  readonly value: string;
  readonly location?: NodePosition;
};

export type UndefinedLiteral = {
  readonly kind: "undefinedLiteral";
  readonly location?: NodePosition;
};

export type NullLiteral = {
  readonly kind: "nullLiteral";
  readonly location?: NodePosition;
};

export type Identifier = {
  readonly kind: "identifier";
  readonly name: string;
  readonly location?: NodePosition;
};

export type MemberAccess = {
  readonly kind: "memberAccess";
  readonly object: Expression;
  readonly member: string;
  readonly location?: NodePosition;
};

export type IndexExpression = {
  readonly kind: "index";
  readonly object: Expression;
  readonly index: Expression;
  readonly location?: NodePosition;
};

export type CallExpression = {
  readonly kind: "call";
  readonly callee: Expression;
  readonly args: readonly Expression[];
  readonly location?: NodePosition;
};

export type NewExpression = {
  readonly kind: "new";
  readonly typeName: string;
  readonly args: readonly Expression[];
  readonly location?: NodePosition;
};

export type ArithmeticOperator = "+" | "-" | "*" | "/" | "%";
export type ComparisonOperator = "=" | "<>" | "<" | "<=" | ">" | ">=";
export type LogicalOperator = "and" | "or";

export type BinaryOperator =
  | ArithmeticOperator
  | ComparisonOperator
  | LogicalOperator;

export type UnaryOperator = "not" | "-";

export type BinaryExpression = {
  readonly kind: "binary";
  readonly operator: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
  readonly location?: NodePosition;
};

export type UnaryExpression = {
  readonly kind: "unary";
  readonly operator: UnaryOperator;
  readonly operand: Expression;
  readonly location?: NodePosition;
};

/** `?(condition, whenTrue, whenFalse)` */
export type TernaryExpression = {
  readonly kind: "ternary";
  readonly condition: Expression;
  readonly whenTrue: Expression;
  readonly whenFalse: Expression;
  readonly location?: NodePosition;
};

export type ArrayLiteral = {
  readonly kind: "arrayLiteral";
  readonly elements: readonly Expression[];
  readonly location?: NodePosition;
};

export type StructureField = {
  readonly name: string;
  readonly value: Expression;
};

export type StructureLiteral = {
  readonly kind: "structureLiteral";
  readonly fields: readonly StructureField[];
  readonly location?: NodePosition;
};

export const isArithmeticOperator = (
  operator: BinaryOperator
): operator is ArithmeticOperator =>
  operator === "+" ||
  operator === "-" ||
  operator === "*" ||
  operator === "/" ||
  operator === "%";

export const isComparisonOperator = (
  operator: BinaryOperator
): operator is ComparisonOperator =>
  operator === "=" ||
  operator === "<>" ||
  operator === "<" ||
  operator === "<=" ||
  operator === ">" ||
  operator === ">=";
