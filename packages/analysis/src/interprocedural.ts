/**
 * Interprocedural analysis
 *
 * Builds the call graph of a module and infers a signature for every
 * routine, callees first. Recursive calls resolve to `unknown` instead of
 * re-entering the analysis.
 */

import {
  isRoutineDeclaration,
  type Expression,
  type NodePosition,
  type Program,
  type RoutineDeclaration,
  type Statement,
} from "@bsl-gradual/frontend";
import {
  lookupFunction,
  withFunction,
  type FunctionSignature,
  type Scope,
  type TypeContext,
} from "./context.js";
import {
  inferExpressionType,
  inferParameterType,
  resolveKnownCall,
  type InferenceEnvironment,
} from "./inference.js";
import { unknown, voidType, type TypeResolution } from "./types/resolution.js";
import { joinTypes, joinVariableTypes } from "./unions.js";

export type ParameterInfo = {
  readonly name: string;
  readonly type: TypeResolution;
  readonly defaultValue?: Expression;
  readonly byReference: boolean;
};

export type FunctionInfo = {
  readonly name: string;
  readonly parameters: readonly ParameterInfo[];
  readonly returnType?: TypeResolution;
  readonly body: readonly Statement[];
  readonly exported: boolean;
  /** `Функция` rather than `Процедура` */
  readonly returnsValue: boolean;
  readonly scope: Scope;
  readonly location?: NodePosition;
};

export type CallSite = {
  readonly calleeName: string;
  readonly argumentCount: number;
  /** The call is an expression whose value is used */
  readonly expectsReturn: boolean;
  readonly location?: NodePosition;
};

const collectCallsInExpression = (
  expr: Expression,
  calls: CallSite[]
): void => {
  switch (expr.kind) {
    case "call":
      if (expr.callee.kind === "identifier") {
        calls.push({
          calleeName: expr.callee.name,
          argumentCount: expr.args.length,
          expectsReturn: true,
          location: expr.location,
        });
      } else {
        collectCallsInExpression(expr.callee, calls);
      }
      for (const arg of expr.args) {
        collectCallsInExpression(arg, calls);
      }
      return;
    case "binary":
      collectCallsInExpression(expr.left, calls);
      collectCallsInExpression(expr.right, calls);
      return;
    case "unary":
      collectCallsInExpression(expr.operand, calls);
      return;
    case "memberAccess":
      collectCallsInExpression(expr.object, calls);
      return;
    case "index":
      collectCallsInExpression(expr.object, calls);
      collectCallsInExpression(expr.index, calls);
      return;
    case "new":
      for (const arg of expr.args) {
        collectCallsInExpression(arg, calls);
      }
      return;
    case "ternary":
      collectCallsInExpression(expr.condition, calls);
      collectCallsInExpression(expr.whenTrue, calls);
      collectCallsInExpression(expr.whenFalse, calls);
      return;
    case "arrayLiteral":
      for (const element of expr.elements) {
        collectCallsInExpression(element, calls);
      }
      return;
    case "structureLiteral":
      for (const field of expr.fields) {
        collectCallsInExpression(field.value, calls);
      }
      return;
    default:
      return;
  }
};

const collectCalls = (
  statements: readonly Statement[],
  calls: CallSite[]
): void => {
  for (const statement of statements) {
    switch (statement.kind) {
      case "varDeclaration":
        if (statement.value) {
          collectCallsInExpression(statement.value, calls);
        }
        break;
      case "assignment":
        collectCallsInExpression(statement.target, calls);
        collectCallsInExpression(statement.value, calls);
        break;
      case "procedureCall":
        if (statement.object) {
          collectCallsInExpression(statement.object, calls);
        } else {
          calls.push({
            calleeName: statement.name,
            argumentCount: statement.args.length,
            expectsReturn: false,
            location: statement.location,
          });
        }
        for (const arg of statement.args) {
          collectCallsInExpression(arg, calls);
        }
        break;
      case "ifStatement":
        collectCallsInExpression(statement.condition, calls);
        collectCalls(statement.thenBranch, calls);
        for (const branch of statement.elseIfBranches) {
          collectCallsInExpression(branch.condition, calls);
          collectCalls(branch.body, calls);
        }
        if (statement.elseBranch) {
          collectCalls(statement.elseBranch, calls);
        }
        break;
      case "forStatement":
        collectCallsInExpression(statement.from, calls);
        collectCallsInExpression(statement.to, calls);
        collectCalls(statement.body, calls);
        break;
      case "forEachStatement":
        collectCallsInExpression(statement.collection, calls);
        collectCalls(statement.body, calls);
        break;
      case "whileStatement":
        collectCallsInExpression(statement.condition, calls);
        collectCalls(statement.body, calls);
        break;
      case "tryStatement":
        collectCalls(statement.tryBlock, calls);
        if (statement.exceptBlock) {
          collectCalls(statement.exceptBlock, calls);
        }
        break;
      case "returnStatement":
        if (statement.value) {
          collectCallsInExpression(statement.value, calls);
        }
        break;
      case "raiseStatement":
        if (statement.message) {
          collectCallsInExpression(statement.message, calls);
        }
        break;
      default:
        break;
    }
  }
};

const functionInfoOf = (declaration: RoutineDeclaration): FunctionInfo => ({
  name: declaration.name,
  parameters: declaration.params.map((param) => ({
    name: param.name,
    type: inferParameterType(param),
    defaultValue: param.defaultValue,
    byReference: !param.byValue,
  })),
  body: declaration.body,
  exported: declaration.exported,
  returnsValue: declaration.kind === "functionDeclaration",
  scope: { kind: "function", name: declaration.name },
  location: declaration.location,
});

export class CallGraph {
  constructor(
    readonly functions: ReadonlyMap<string, FunctionInfo>,
    readonly callEdges: ReadonlyMap<string, readonly CallSite[]>,
    readonly callers: ReadonlyMap<string, readonly string[]>
  ) {}

  getFunctionInfo(name: string): FunctionInfo | undefined {
    return lookupFunction(this.functions, name);
  }

  /**
   * Declared spelling of a routine name as written at a call site
   */
  declaredName(name: string): string | undefined {
    return this.getFunctionInfo(name)?.name;
  }

  getCallsFrom(name: string): readonly CallSite[] {
    return this.callEdges.get(name) ?? [];
  }

  getCallers(name: string): readonly string[] {
    return this.callers.get(name) ?? [];
  }

  /**
   * Declared routines with every callee before its callers; `undefined`
   * when the routines call each other recursively
   */
  topologicalSort(): readonly string[] | undefined {
    const callees = new Map<string, Set<string>>();
    const inDegree = new Map<string, number>();
    for (const name of this.functions.keys()) {
      inDegree.set(name, 0);
    }
    for (const name of this.functions.keys()) {
      const targets = new Set(
        this.getCallsFrom(name)
          .map((call) => this.declaredName(call.calleeName))
          .filter((callee): callee is string => callee !== undefined)
      );
      callees.set(name, targets);
      for (const target of targets) {
        inDegree.set(target, (inDegree.get(target) ?? 0) + 1);
      }
    }

    const queue = [...inDegree]
      .filter(([, degree]) => degree === 0)
      .map(([name]) => name);
    const order: string[] = [];
    for (let head = 0; head < queue.length; head++) {
      const name = queue[head];
      if (name === undefined) {
        break;
      }
      order.push(name);
      for (const target of callees.get(name) ?? []) {
        const degree = (inDegree.get(target) ?? 0) - 1;
        inDegree.set(target, degree);
        if (degree === 0) {
          queue.push(target);
        }
      }
    }

    return order.length === this.functions.size ? order.reverse() : undefined;
  }
}

export const buildCallGraph = (program: Program): CallGraph => {
  const functions = new Map<string, FunctionInfo>();
  const callEdges = new Map<string, readonly CallSite[]>();
  const callers = new Map<string, string[]>();

  const routines = program.statements.filter(isRoutineDeclaration);
  for (const statement of routines) {
    functions.set(statement.name, functionInfoOf(statement));
  }

  for (const statement of routines) {
    const calls: CallSite[] = [];
    collectCalls(statement.body, calls);
    callEdges.set(statement.name, calls);

    for (const call of calls) {
      const callee =
        lookupFunction(functions, call.calleeName)?.name ?? call.calleeName;
      const list = callers.get(callee) ?? [];
      if (!list.includes(statement.name)) {
        list.push(statement.name);
      }
      callers.set(callee, list);
    }
  }

  return new CallGraph(functions, callEdges, callers);
};

const RECURSIVE_CALL = "Recursive call detected";

export class InterproceduralAnalyzer {
  private readonly analyzed = new Map<string, FunctionSignature>();
  private readonly inProgress = new Set<string>();

  constructor(
    private readonly callGraph: CallGraph,
    private readonly context: TypeContext
  ) {}

  /**
   * Analyze every routine, callees first; declaration order when the
   * routines are mutually recursive
   */
  analyzeAllFunctions(): ReadonlyMap<string, FunctionSignature> {
    const order =
      this.callGraph.topologicalSort() ?? [...this.callGraph.functions.keys()];
    for (const name of order) {
      this.analyzeFunction(name);
    }
    return this.analyzed;
  }

  analyzeFunction(name: string): FunctionSignature | undefined {
    const cached = this.analyzed.get(name);
    if (cached) {
      return cached;
    }
    const info = this.callGraph.getFunctionInfo(name);
    if (!info) {
      return undefined;
    }

    this.inProgress.add(name);
    const locals = new Map<string, TypeResolution>(this.context.variables);
    for (const param of info.parameters) {
      locals.set(param.name, param.type);
    }
    const returns: TypeResolution[] = [];
    this.collectReturnTypes(info.body, locals, returns);
    this.inProgress.delete(name);

    const signature: FunctionSignature = {
      params: info.parameters.map((param) => ({
        name: param.name,
        type: param.type,
        optional: param.defaultValue !== undefined,
      })),
      returnType: this.combineReturnTypes(info, returns),
      exported: info.exported,
    };
    this.analyzed.set(name, signature);
    return signature;
  }

  getFunctionSignature(name: string): FunctionSignature | undefined {
    return this.analyzed.get(name);
  }

  analyzedFunctions(): ReadonlyMap<string, FunctionSignature> {
    return this.analyzed;
  }

  /**
   * Context extended with every analyzed signature
   */
  updateTypeContext(context: TypeContext): TypeContext {
    let updated = context;
    for (const [name, signature] of this.analyzed) {
      updated = withFunction(updated, name, signature);
    }
    return updated;
  }

  private combineReturnTypes(
    info: FunctionInfo,
    returns: readonly TypeResolution[]
  ): TypeResolution {
    if (!info.returnsValue || returns.length === 0) {
      return voidType();
    }
    return joinTypes(returns);
  }

  private collectReturnTypes(
    statements: readonly Statement[],
    locals: Map<string, TypeResolution>,
    returns: TypeResolution[]
  ): void {
    const env = this.environment(locals);
    for (const statement of statements) {
      switch (statement.kind) {
        case "varDeclaration":
          locals.set(
            statement.name,
            statement.value
              ? inferExpressionType(statement.value, env)
              : unknown("Declared without a value")
          );
          break;
        case "assignment":
          if (statement.target.kind === "identifier") {
            locals.set(
              statement.target.name,
              inferExpressionType(statement.value, env)
            );
          }
          break;
        case "returnStatement":
          if (statement.value) {
            returns.push(inferExpressionType(statement.value, env));
          }
          break;
        case "ifStatement": {
          const bodies = [
            statement.thenBranch,
            ...statement.elseIfBranches.map((branch) => branch.body),
          ];
          const paths = bodies.map((body) => {
            const branchLocals = new Map(locals);
            this.collectReturnTypes(body, branchLocals, returns);
            return branchLocals;
          });
          if (statement.elseBranch) {
            const branchLocals = new Map(locals);
            this.collectReturnTypes(statement.elseBranch, branchLocals, returns);
            paths.push(branchLocals);
          } else {
            paths.push(new Map(locals));
          }
          const joined = joinVariableTypes(paths);
          locals.clear();
          for (const [variable, type] of joined) {
            locals.set(variable, type);
          }
          break;
        }
        case "forStatement":
        case "forEachStatement":
        case "whileStatement":
          this.collectReturnTypes(statement.body, locals, returns);
          break;
        case "tryStatement":
          this.collectReturnTypes(statement.tryBlock, locals, returns);
          if (statement.exceptBlock) {
            this.collectReturnTypes(statement.exceptBlock, locals, returns);
          }
          break;
        default:
          break;
      }
    }
  }

  private environment(
    locals: ReadonlyMap<string, TypeResolution>
  ): InferenceEnvironment {
    return {
      lookupVariable: (name) => locals.get(name),
      resolveCall: (name, args) => {
        const declared = this.callGraph.declaredName(name);
        if (declared !== undefined) {
          if (this.inProgress.has(declared)) {
            return unknown(RECURSIVE_CALL);
          }
          return this.analyzeFunction(declared)?.returnType ?? unknown();
        }
        return (
          resolveKnownCall(this.context.functions, name, args) ??
          unknown("Unknown function")
        );
      },
    };
  }
}
