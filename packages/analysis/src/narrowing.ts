/**
 * Type narrowing from branch conditions
 */

import type {
  BinaryOperator,
  CallExpression,
  Expression,
} from "@bsl-gradual/frontend";
import { canonicalPlatformTypeName } from "./builtins.js";
import { withVariables, type TypeContext } from "./context.js";
import {
  inferredCertainty,
  known,
  platform,
  primitive,
  special,
  unknown,
  withNote,
  withSource,
  DYNAMIC,
  type ConcreteType,
  type PrimitiveKind,
  type TypeResolution,
} from "./types/resolution.js";

export type RefinementCondition =
  | { readonly kind: "typeEquals"; readonly typeName: string }
  | { readonly kind: "typeNotEquals"; readonly typeName: string }
  | { readonly kind: "isUndefined" }
  | { readonly kind: "isNotUndefined" }
  | { readonly kind: "isNull" }
  | { readonly kind: "isNotNull" }
  | { readonly kind: "isTruthy" }
  | { readonly kind: "isFalsy" };

export type TypeRefinement = {
  readonly variable: string;
  readonly refinedType: TypeResolution;
  readonly condition: RefinementCondition;
};

const NARROWED_NOTE = "Type narrowed from condition";

const PRIMITIVE_TYPE_NAMES: ReadonlyMap<string, PrimitiveKind> = new Map<
  string,
  PrimitiveKind
>([
  ["строка", "String"],
  ["string", "String"],
  ["число", "Number"],
  ["number", "Number"],
  ["булево", "Boolean"],
  ["boolean", "Boolean"],
  ["дата", "Date"],
  ["date", "Date"],
]);

const namedConcreteType = (typeName: string): ConcreteType | undefined => {
  const primitiveKind = PRIMITIVE_TYPE_NAMES.get(typeName.toLowerCase());
  if (primitiveKind) {
    return primitive(primitiveKind);
  }
  const platformName = canonicalPlatformTypeName(typeName);
  return platformName ? platform(platformName) : undefined;
};

const narrowed = (type: ConcreteType): TypeResolution =>
  withNote(withSource(known(type), "inferred"), NARROWED_NOTE);

const truthyMarker = (): TypeResolution => ({
  certainty: inferredCertainty(0.8),
  result: DYNAMIC,
  source: "inferred",
  metadata: { notes: ["Truthy value in condition"] },
  availableFacets: [],
});

const isCallTo = (
  expr: Expression,
  names: readonly string[]
): expr is CallExpression =>
  expr.kind === "call" &&
  expr.callee.kind === "identifier" &&
  names.includes(expr.callee.name.toLowerCase());

const isUndefinedValue = (expr: Expression): boolean =>
  expr.kind === "undefinedLiteral" ||
  (expr.kind === "identifier" &&
    ["неопределено", "undefined"].includes(expr.name.toLowerCase()));

const isNullValue = (expr: Expression): boolean =>
  expr.kind === "nullLiteral" ||
  (expr.kind === "identifier" && expr.name.toLowerCase() === "null");

export const complementOf = (
  condition: RefinementCondition
): RefinementCondition => {
  switch (condition.kind) {
    case "typeEquals":
      return { kind: "typeNotEquals", typeName: condition.typeName };
    case "typeNotEquals":
      return { kind: "typeEquals", typeName: condition.typeName };
    case "isUndefined":
      return { kind: "isNotUndefined" };
    case "isNotUndefined":
      return { kind: "isUndefined" };
    case "isNull":
      return { kind: "isNotNull" };
    case "isNotNull":
      return { kind: "isNull" };
    case "isTruthy":
      return { kind: "isFalsy" };
    case "isFalsy":
      return { kind: "isTruthy" };
  }
};

export class TypeNarrower {
  constructor(private readonly context: TypeContext) {}

  /**
   * Refinements implied by `condition` being true
   */
  analyzeCondition(condition: Expression): readonly TypeRefinement[] {
    switch (condition.kind) {
      case "binary":
        return this.analyzeBinary(
          condition.left,
          condition.operator,
          condition.right
        );

      case "unary":
        if (
          condition.operator === "not" &&
          condition.operand.kind === "identifier"
        ) {
          return [
            this.refinement(condition.operand.name, { kind: "isFalsy" }),
          ];
        }
        return [];

      case "identifier":
        return [this.refinement(condition.name, { kind: "isTruthy" })];

      default:
        return [];
    }
  }

  /**
   * Refinements for the branch where the condition is false
   */
  invertRefinements(
    refinements: readonly TypeRefinement[]
  ): readonly TypeRefinement[] {
    return refinements.map((refinement) =>
      this.refinement(refinement.variable, complementOf(refinement.condition))
    );
  }

  /**
   * New context with the refined variables overwritten
   */
  applyRefinementsToContext(
    refinements: readonly TypeRefinement[]
  ): TypeContext {
    const variables = new Map(this.context.variables);
    for (const refinement of refinements) {
      variables.set(refinement.variable, refinement.refinedType);
    }
    return withVariables(this.context, variables);
  }

  private analyzeBinary(
    left: Expression,
    operator: BinaryOperator,
    right: Expression
  ): readonly TypeRefinement[] {
    if (operator !== "=" && operator !== "<>") {
      return [];
    }
    const equals = operator === "=";

    if (isCallTo(left, ["типзнч", "typeof"]) && isCallTo(right, ["тип", "type"])) {
      const subject = left.args[0];
      const typeArg = right.args[0];
      if (
        subject?.kind !== "identifier" ||
        typeArg?.kind !== "stringLiteral" ||
        !namedConcreteType(typeArg.value)
      ) {
        return [];
      }
      return [
        this.refinement(
          subject.name,
          equals
            ? { kind: "typeEquals", typeName: typeArg.value }
            : { kind: "typeNotEquals", typeName: typeArg.value }
        ),
      ];
    }

    if (left.kind !== "identifier") {
      return [];
    }
    if (isUndefinedValue(right)) {
      return [
        this.refinement(
          left.name,
          equals ? { kind: "isUndefined" } : { kind: "isNotUndefined" }
        ),
      ];
    }
    if (isNullValue(right)) {
      return [
        this.refinement(
          left.name,
          equals ? { kind: "isNull" } : { kind: "isNotNull" }
        ),
      ];
    }
    return [];
  }

  private refinement(
    variable: string,
    condition: RefinementCondition
  ): TypeRefinement {
    return {
      variable,
      refinedType: this.refinedType(variable, condition),
      condition,
    };
  }

  /**
   * Positive conditions name the type; negative ones leave the prior type
   */
  private refinedType(
    variable: string,
    condition: RefinementCondition
  ): TypeResolution {
    switch (condition.kind) {
      case "typeEquals": {
        const type = namedConcreteType(condition.typeName);
        return type ? narrowed(type) : this.priorType(variable);
      }
      case "isUndefined":
        return narrowed(special("Undefined"));
      case "isNull":
        return narrowed(special("Null"));
      case "isTruthy":
        return truthyMarker();
      case "isFalsy":
        return narrowed(primitive("Boolean"));
      case "typeNotEquals":
      case "isNotUndefined":
      case "isNotNull":
        return this.priorType(variable);
    }
  }

  private priorType(variable: string): TypeResolution {
    return (
      this.context.variables.get(variable) ??
      withSource(unknown("Unknown type"), "inferred")
    );
  }
}
