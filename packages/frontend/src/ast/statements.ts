/**
 * Statement nodes of the BSL syntax tree
 */

import type { Expression, NodePosition } from "./expressions.js";

export type Statement =
  | VarDeclaration
  | ProcedureDeclaration
  | FunctionDeclaration
  | Assignment
  | ProcedureCall
  | IfStatement
  | ForStatement
  | ForEachStatement
  | WhileStatement
  | ReturnStatement
  | BreakStatement
  | ContinueStatement
  | TryStatement
  | RaiseStatement;

export type Program = {
  readonly kind: "program";
  readonly statements: readonly Statement[];
};

export type Parameter = {
  readonly name: string;
  /** Declared with `Знач` */
  readonly byValue: boolean;
  readonly defaultValue?: Expression;
};

export type VarDeclaration = {
  readonly kind: "varDeclaration";
  readonly name: string;
  readonly exported: boolean;
  readonly value?: Expression;
  readonly location?: NodePosition;
};

export type ProcedureDeclaration = {
  readonly kind: "procedureDeclaration";
  readonly name: string;
  readonly params: readonly Parameter[];
  readonly body: readonly Statement[];
  readonly exported: boolean;
  readonly location?: NodePosition;
};

export type FunctionDeclaration = {
  readonly kind: "functionDeclaration";
  readonly name: string;
  readonly params: readonly Parameter[];
  readonly body: readonly Statement[];
  readonly exported: boolean;
  readonly location?: NodePosition;
};

export type RoutineDeclaration = ProcedureDeclaration | FunctionDeclaration;

export type Assignment = {
  readonly kind: "assignment";
  readonly target: Expression;
  readonly value: Expression;
  readonly location?: NodePosition;
};

/**
 * A call in statement position. `object` is set for method calls
 * such as `Массив.Добавить(1);`, in which case `name` is the method.
 */
export type ProcedureCall = {
  readonly kind: "procedureCall";
  readonly name: string;
  readonly object?: Expression;
  readonly args: readonly Expression[];
  readonly location?: NodePosition;
};

export type ElseIfBranch = {
  readonly condition: Expression;
  readonly body: readonly Statement[];
};

export type IfStatement = {
  readonly kind: "ifStatement";
  readonly condition: Expression;
  readonly thenBranch: readonly Statement[];
  readonly elseIfBranches: readonly ElseIfBranch[];
  readonly elseBranch?: readonly Statement[];
  readonly location?: NodePosition;
};

export type ForStatement = {
  readonly kind: "forStatement";
  readonly variable: string;
  readonly from: Expression;
  readonly to: Expression;
  readonly body: readonly Statement[];
  readonly location?: NodePosition;
};

export type ForEachStatement = {
  readonly kind: "forEachStatement";
  readonly variable: string;
  readonly collection: Expression;
  readonly body: readonly Statement[];
  readonly location?: NodePosition;
};

export type WhileStatement = {
  readonly kind: "whileStatement";
  readonly condition: Expression;
  readonly body: readonly Statement[];
  readonly location?: NodePosition;
};

export type ReturnStatement = {
  readonly kind: "returnStatement";
  readonly value?: Expression;
  readonly location?: NodePosition;
};

export type BreakStatement = {
  readonly kind: "breakStatement";
  readonly location?: NodePosition;
};

export type ContinueStatement = {
  readonly kind: "continueStatement";
  readonly location?: NodePosition;
};

export type TryStatement = {
  readonly kind: "tryStatement";
  readonly tryBlock: readonly Statement[];
  readonly exceptBlock?: readonly Statement[];
  readonly location?: NodePosition;
};

export type RaiseStatement = {
  readonly kind: "raiseStatement";
  readonly message?: Expression;
  readonly location?: NodePosition;
};

export const isRoutineDeclaration = (
  statement: Statement
): statement is RoutineDeclaration =>
  statement.kind === "procedureDeclaration" ||
  statement.kind === "functionDeclaration";
