/**
 * Type context shared by the checker, the flow analyzer and the narrower
 */

import type { TypeResolution } from "./types/resolution.js";

export type Scope =
  | { readonly kind: "global" }
  | { readonly kind: "module"; readonly name: string }
  | { readonly kind: "function"; readonly name: string }
  | {
      readonly kind: "local";
      readonly function: string;
      readonly blockId: number;
    };

export const GLOBAL_SCOPE: Scope = { kind: "global" };

export const scopeKey = (scope: Scope): string => {
  switch (scope.kind) {
    case "global":
      return "global";
    case "module":
      return `module:${scope.name}`;
    case "function":
      return `function:${scope.name}`;
    case "local":
      return `local:${scope.function}#${scope.blockId}`;
  }
};

export type FunctionParameterSignature = {
  readonly name: string;
  readonly type: TypeResolution;
  /** Has a default value and may be omitted at the call site */
  readonly optional: boolean;
};

/**
 * Fewest arguments a call must pass
 */
export const requiredArgumentCount = (signature: FunctionSignature): number =>
  signature.params.filter((param) => !param.optional).length;

export type FunctionSignature = {
  readonly params: readonly FunctionParameterSignature[];
  readonly returnType: TypeResolution;
  readonly exported: boolean;
};

/**
 * Routine names in BSL are case-insensitive; an exact match wins
 */
export const lookupFunction = <T>(
  functions: ReadonlyMap<string, T>,
  name: string
): T | undefined => {
  const exact = functions.get(name);
  if (exact !== undefined) {
    return exact;
  }
  const lower = name.toLowerCase();
  for (const [key, value] of functions) {
    if (key.toLowerCase() === lower) {
      return value;
    }
  }
  return undefined;
};

export type TypeContext = {
  readonly variables: ReadonlyMap<string, TypeResolution>;
  readonly functions: ReadonlyMap<string, FunctionSignature>;
  readonly currentScope: Scope;
  readonly scopeStack: readonly Scope[];
};

export const createTypeContext = (
  scope: Scope = GLOBAL_SCOPE,
  functions: ReadonlyMap<string, FunctionSignature> = new Map()
): TypeContext => ({
  variables: new Map(),
  functions,
  currentScope: scope,
  scopeStack: [],
});

export const withVariables = (
  context: TypeContext,
  variables: ReadonlyMap<string, TypeResolution>
): TypeContext => ({ ...context, variables });

export const withFunction = (
  context: TypeContext,
  name: string,
  signature: FunctionSignature
): TypeContext => ({
  ...context,
  functions: new Map([...context.functions, [name, signature]]),
});

export const enterScope = (context: TypeContext, scope: Scope): TypeContext => ({
  ...context,
  currentScope: scope,
  scopeStack: [...context.scopeStack, context.currentScope],
});

/**
 * Return to the enclosing scope; the global context stays as it is
 */
export const exitScope = (context: TypeContext): TypeContext => {
  const previous = context.scopeStack[context.scopeStack.length - 1];
  if (!previous) {
    return context;
  }
  return {
    ...context,
    currentScope: previous,
    scopeStack: context.scopeStack.slice(0, -1),
  };
};
