/**
 * Type checker
 *
 * Runs the analysis stages over one module:
 * 1. dependency graph
 * 2. call graph and interprocedural signatures
 * 3-4. flow-sensitive walk over the module body, reporting diagnostics
 * 5. final flow state copied into the context
 *
 * Analysis never aborts; every finding becomes a diagnostic.
 */

import {
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
  type BinaryExpression,
  type Diagnostic,
  type DiagnosticsCollector,
  type Expression,
  type Identifier,
  type NodePosition,
  type Program,
  type SourceLocation,
  type UnaryExpression,
} from "@bsl-gradual/frontend";
import { lookupGlobalFunction } from "./builtins.js";
import {
  createTypeContext,
  lookupFunction,
  requiredArgumentCount,
  withVariables,
  type FunctionSignature,
  type TypeContext,
} from "./context.js";
import {
  FlowSensitiveAnalyzer,
  type FlowHooks,
  type FlowState,
  type MergePoint,
} from "./flow.js";
import { buildDependencyGraph } from "./graph/builder.js";
import type { DependencyGraph } from "./graph/dependency-graph.js";
import {
  buildCallGraph,
  InterproceduralAnalyzer,
  type CallGraph,
} from "./interprocedural.js";
import {
  concreteTypeName,
  concreteTypeOf,
  concreteTypesEqual,
  confidenceOf,
  formatResolution,
  isUnknown,
  type ConcreteType,
  type TypeResolution,
} from "./types/resolution.js";
import { isCompatibleWithUnion } from "./unions.js";

export type TypeCheckerOptions = {
  /** Signatures of routines declared in other modules */
  readonly externalSignatures?: ReadonlyMap<string, FunctionSignature>;
};

export type CheckResult = {
  readonly context: TypeContext;
  readonly diagnostics: readonly Diagnostic[];
  readonly graph: DependencyGraph;
  readonly callGraph: CallGraph;
  readonly states: readonly FlowState[];
  readonly mergePoints: readonly MergePoint[];
};

/**
 * Operand types below this confidence are not reported as mismatches
 */
export const MISMATCH_CONFIDENCE = 0.7;

const OPERATOR_NAMES: Readonly<Record<string, string>> = {
  and: "И",
  or: "ИЛИ",
  not: "НЕ",
};

const operatorName = (operator: string): string =>
  OPERATOR_NAMES[operator] ?? operator;

/**
 * Concrete type of an operand that is certain enough to report on
 */
const confidentType = (type: TypeResolution): ConcreteType | undefined =>
  confidenceOf(type.certainty) >= MISMATCH_CONFIDENCE
    ? concreteTypeOf(type)
    : undefined;

const isPrimitive = (
  type: ConcreteType,
  ...kinds: readonly string[]
): boolean => type.kind === "primitive" && kinds.includes(type.primitive);

const isAbsentValue = (type: ConcreteType | undefined): boolean =>
  type?.kind === "special" &&
  (type.special === "Undefined" || type.special === "Null");

/**
 * Whether `next` may be assigned over a variable currently typed
 * `previous`. Unknown and dynamic types are compatible with everything;
 * so are `Неопределено` and `Null`, which BSL code uses to reset values.
 */
export const isAssignmentCompatible = (
  previous: TypeResolution,
  next: TypeResolution
): boolean => {
  if (isUnknown(previous) || isUnknown(next)) {
    return true;
  }
  if (isAbsentValue(concreteTypeOf(next))) {
    return true;
  }
  if (previous.result.kind === "union") {
    return isCompatibleWithUnion(next, previous.result.members);
  }
  const before = concreteTypeOf(previous);
  const after = concreteTypeOf(next);
  if (!before || !after || isAbsentValue(before) || isAbsentValue(after)) {
    return true;
  }
  return concreteTypesEqual(before, after);
};

const binaryMismatch = (
  operator: BinaryExpression["operator"],
  left: ConcreteType,
  right: ConcreteType
): boolean => {
  switch (operator) {
    case "+":
      return (
        !isPrimitive(left, "String") &&
        !isPrimitive(right, "String") &&
        !(isPrimitive(left, "Number", "Date") && isPrimitive(right, "Number", "Date"))
      );
    case "-":
      return !isPrimitive(left, "Number", "Date") || !isPrimitive(right, "Number");
    case "*":
    case "/":
    case "%":
      return !isPrimitive(left, "Number") || !isPrimitive(right, "Number");
    case "and":
    case "or":
      return !isPrimitive(left, "Boolean") || !isPrimitive(right, "Boolean");
    default:
      return false;
  }
};

const unaryMismatch = (
  operator: UnaryExpression["operator"],
  operand: ConcreteType
): boolean =>
  operator === "not"
    ? !isPrimitive(operand, "Boolean")
    : !isPrimitive(operand, "Number");

export class TypeChecker {
  private collector: DiagnosticsCollector = createDiagnosticsCollector();
  private context: TypeContext;

  constructor(
    private readonly file: string,
    private readonly options: TypeCheckerOptions = {}
  ) {
    this.context = this.initialContext();
  }

  check(program: Program): CheckResult {
    this.collector = createDiagnosticsCollector();
    this.context = this.initialContext();

    const graph = buildDependencyGraph(program, this.file);

    const callGraph = buildCallGraph(program);
    const interprocedural = new InterproceduralAnalyzer(callGraph, this.context);
    interprocedural.analyzeAllFunctions();
    this.context = interprocedural.updateTypeContext(this.context);

    const flow = new FlowSensitiveAnalyzer(this.context, this.hooks());
    flow.analyzeBlock(program.statements);

    this.context = withVariables(this.context, flow.finalState().variables);

    return {
      context: this.context,
      diagnostics: this.collector.diagnostics,
      graph,
      callGraph,
      states: flow.allStates(),
      mergePoints: flow.mergePoints(),
    };
  }

  private initialContext(): TypeContext {
    return createTypeContext(
      { kind: "module", name: this.file },
      this.options.externalSignatures
    );
  }

  private hooks(): FlowHooks {
    return {
      onUndeclaredVariable: (node) => this.checkUndeclared(node),
      onCall: (name, argumentCount, location) =>
        this.checkCall(name, argumentCount, location),
      onOperator: (node, operands) => this.checkOperator(node, operands),
      onCondition: (condition, type) => this.checkCondition(condition, type),
      onAssignment: (name, previous, next, location) =>
        this.checkAssignment(name, previous, next, location),
    };
  }

  private report(
    code: Diagnostic["code"],
    severity: Diagnostic["severity"],
    message: string,
    position: NodePosition | undefined,
    hint?: string
  ): void {
    this.collector = addDiagnostic(
      this.collector,
      createDiagnostic(code, severity, message, this.locate(position), hint)
    );
  }

  private locate(position: NodePosition | undefined): SourceLocation | undefined {
    return position
      ? { file: this.file, line: position.line, column: position.column }
      : undefined;
  }

  private checkUndeclared(node: Identifier): void {
    this.report(
      "BSL2002",
      "warning",
      `Переменная '${node.name}' используется без объявления`,
      node.location
    );
  }

  private checkCall(
    name: string,
    argumentCount: number,
    position: NodePosition | undefined
  ): void {
    const signature = lookupFunction(this.context.functions, name);
    const builtin = signature ? undefined : lookupGlobalFunction(name);
    const arity = signature
      ? { expected: signature.params.length, required: requiredArgumentCount(signature) }
      : builtin
        ? {
            expected: builtin.parameters.length,
            required: builtin.parameters.filter((p) => !p.optional).length,
          }
        : undefined;

    if (!arity) {
      this.report(
        "BSL2005",
        "info",
        `Функция '${name}' не найдена в контексте`,
        position
      );
      return;
    }
    if (argumentCount > arity.expected || argumentCount < arity.required) {
      this.report(
        "BSL2001",
        "error",
        `Функция '${name}' ожидает ${arity.expected} аргументов, передано ${argumentCount}`,
        position
      );
    }
  }

  private checkOperator(
    node: BinaryExpression | UnaryExpression,
    operands: readonly TypeResolution[]
  ): void {
    const types = operands.map(confidentType);
    const names = types
      .filter((type): type is ConcreteType => type !== undefined)
      .map(concreteTypeName);

    if (node.kind === "binary") {
      const [left, right] = types;
      if (left && right && binaryMismatch(node.operator, left, right)) {
        this.report(
          "BSL2004",
          "warning",
          `Несовместимые типы операндов для оператора '${operatorName(node.operator)}': ${names.join(" и ")}`,
          node.location
        );
      }
      return;
    }

    const [operand] = types;
    if (operand && unaryMismatch(node.operator, operand)) {
      this.report(
        "BSL2004",
        "warning",
        `Несовместимый тип операнда для оператора '${operatorName(node.operator)}': ${names.join("")}`,
        node.location
      );
    }
  }

  private checkCondition(condition: Expression, type: TypeResolution): void {
    const conditionType = confidentType(type);
    if (
      conditionType &&
      !isPrimitive(conditionType, "Boolean", "Number") &&
      !isAbsentValue(conditionType)
    ) {
      this.report(
        "BSL2004",
        "warning",
        `Условие имеет тип ${concreteTypeName(conditionType)}, ожидается Булево`,
        condition.location
      );
    }
  }

  private checkAssignment(
    name: string,
    previous: TypeResolution | undefined,
    next: TypeResolution,
    position: NodePosition | undefined
  ): void {
    if (previous && !isAssignmentCompatible(previous, next)) {
      this.report(
        "BSL2003",
        "warning",
        `Несовместимое присваивание переменной '${name}'`,
        position,
        `${formatResolution(previous)} := ${formatResolution(next)}`
      );
    }
  }
}
