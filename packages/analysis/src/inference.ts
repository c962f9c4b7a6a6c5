/**
 * Expression typing shared by the flow and interprocedural analyzers
 */

import {
  isArithmeticOperator,
  type BinaryExpression,
  type BinaryOperator,
  type CallExpression,
  type Expression,
  type Identifier,
  type Parameter,
  type UnaryExpression,
} from "@bsl-gradual/frontend";
import {
  lookupGlobalFunction,
  resolveConstructedType,
  resolveGlobalReturnType,
} from "./builtins.js";
import { lookupFunction, type FunctionSignature } from "./context.js";
import {
  concreteTypeOf,
  concreteTypesEqual,
  isNumber,
  isString,
  platformType,
  primitiveType,
  specialType,
  unknown,
  type TypeResolution,
} from "./types/resolution.js";
import { createUnion } from "./unions.js";

/**
 * Where an expression's names are looked up while it is typed
 */
export interface InferenceEnvironment {
  lookupVariable(name: string, node: Identifier): TypeResolution | undefined;
  resolveCall(
    name: string,
    args: readonly TypeResolution[],
    node: CallExpression
  ): TypeResolution;
  /** Called after the operands of an operator have been typed */
  onOperator?(
    node: BinaryExpression | UnaryExpression,
    operands: readonly TypeResolution[]
  ): void;
}

/**
 * Resolve a call against known signatures, then the built-in functions
 */
export const resolveKnownCall = (
  functions: ReadonlyMap<string, FunctionSignature>,
  name: string,
  args: readonly TypeResolution[]
): TypeResolution | undefined => {
  const signature = lookupFunction(functions, name);
  if (signature) {
    return signature.returnType;
  }
  const builtin = lookupGlobalFunction(name);
  return builtin ? resolveGlobalReturnType(builtin, args) : undefined;
};

export const inferBinaryType = (
  operator: BinaryOperator,
  left: TypeResolution,
  right: TypeResolution
): TypeResolution => {
  if (operator === "%") {
    return primitiveType("Number");
  }
  if (isArithmeticOperator(operator)) {
    if (isNumber(left) || isNumber(right)) {
      return primitiveType("Number");
    }
    if (operator === "+" && (isString(left) || isString(right))) {
      return primitiveType("String");
    }
    return unknown();
  }
  return primitiveType("Boolean");
};

const inferUnaryType = (
  node: UnaryExpression,
  operand: TypeResolution
): TypeResolution => {
  if (node.operator === "not") {
    return primitiveType("Boolean");
  }
  return isNumber(operand) ? primitiveType("Number") : unknown();
};

/**
 * Branches of `?(...)` keep their type when they agree, else form a union
 */
const joinBranches = (
  whenTrue: TypeResolution,
  whenFalse: TypeResolution
): TypeResolution => {
  const left = concreteTypeOf(whenTrue);
  const right = concreteTypeOf(whenFalse);
  if (left && right && concreteTypesEqual(left, right)) {
    return whenTrue;
  }
  return createUnion([whenTrue, whenFalse]);
};

export const inferExpressionType = (
  expr: Expression,
  env: InferenceEnvironment
): TypeResolution => {
  switch (expr.kind) {
    case "numberLiteral":
      return primitiveType("Number");
    case "stringLiteral":
      return primitiveType("String");
    case "booleanLiteral":
      return primitiveType("Boolean");
    case "dateLiteral":
      return primitiveType("Date");
    case "undefinedLiteral":
      return specialType("Undefined");
    case "nullLiteral":
      return specialType("Null");

    case "identifier":
      return env.lookupVariable(expr.name, expr) ?? unknown("Unknown variable");

    case "binary": {
      const left = inferExpressionType(expr.left, env);
      const right = inferExpressionType(expr.right, env);
      env.onOperator?.(expr, [left, right]);
      return inferBinaryType(expr.operator, left, right);
    }

    case "unary": {
      const operand = inferExpressionType(expr.operand, env);
      env.onOperator?.(expr, [operand]);
      return inferUnaryType(expr, operand);
    }

    case "call": {
      const args = expr.args.map((arg) => inferExpressionType(arg, env));
      if (expr.callee.kind === "identifier") {
        return env.resolveCall(expr.callee.name, args, expr);
      }
      inferExpressionType(expr.callee, env);
      return unknown("Method call");
    }

    case "memberAccess":
      inferExpressionType(expr.object, env);
      return unknown("Member access");

    case "index":
      inferExpressionType(expr.object, env);
      inferExpressionType(expr.index, env);
      return unknown("Indexed access");

    case "new":
      for (const arg of expr.args) {
        inferExpressionType(arg, env);
      }
      return resolveConstructedType(expr.typeName);

    case "ternary": {
      inferExpressionType(expr.condition, env);
      return joinBranches(
        inferExpressionType(expr.whenTrue, env),
        inferExpressionType(expr.whenFalse, env)
      );
    }

    case "arrayLiteral":
      for (const element of expr.elements) {
        inferExpressionType(element, env);
      }
      return platformType("Массив");

    case "structureLiteral":
      for (const field of expr.fields) {
        inferExpressionType(field.value, env);
      }
      return platformType("Структура");
  }
};

/**
 * Parameter type from its default literal
 */
export const inferParameterType = (param: Parameter): TypeResolution => {
  switch (param.defaultValue?.kind) {
    case "numberLiteral":
      return primitiveType("Number");
    case "stringLiteral":
      return primitiveType("String");
    case "booleanLiteral":
      return primitiveType("Boolean");
    case "dateLiteral":
      return primitiveType("Date");
    case "undefinedLiteral":
      return specialType("Undefined");
    case "nullLiteral":
      return specialType("Null");
    default:
      return unknown("Parameter type to be inferred");
  }
};
