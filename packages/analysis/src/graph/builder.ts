/**
 * Dependency graph construction from a parsed module
 */

import {
  isRoutineDeclaration,
  type Expression,
  type NodePosition,
  type Program,
  type RoutineDeclaration,
  type Statement,
} from "@bsl-gradual/frontend";
import { lookupFunction, type Scope } from "../context.js";
import {
  DependencyGraph,
  type DependencyNode,
  type DependencyType,
} from "./dependency-graph.js";

const EXPRESSION: DependencyType = { kind: "expression" };

type BuilderState = {
  readonly graph: DependencyGraph;
  readonly file: string;
  readonly routines: ReadonlyMap<string, RoutineDeclaration>;
  scope: Scope;
  currentFunction: string | undefined;
};

/**
 * Spelling of a routine's declaration, whatever case the call uses
 */
const declaredName = (state: BuilderState, name: string): string =>
  lookupFunction(state.routines, name)?.name ?? name;

const functionNode = (
  state: BuilderState,
  name: string
): DependencyNode => ({
  kind: "function",
  name,
  exported: state.routines.get(name)?.exported ?? false,
});

const variableNode = (state: BuilderState, name: string): DependencyNode => ({
  kind: "variable",
  name,
  scope: state.scope,
});

const addDependency = (
  state: BuilderState,
  from: DependencyNode,
  to: DependencyNode,
  type: DependencyType,
  position: NodePosition | undefined
): void => {
  state.graph.addEdge({
    from,
    to,
    type,
    location: position
      ? { file: state.file, line: position.line, column: position.column }
      : undefined,
  });
};

/**
 * Record what `target` depends on inside `expr`. Without a target only
 * nested calls, fields and methods are registered.
 */
const processExpression = (
  state: BuilderState,
  expr: Expression,
  target: DependencyNode | undefined,
  type: DependencyType = EXPRESSION
): void => {
  switch (expr.kind) {
    case "identifier":
      if (target) {
        addDependency(
          state,
          target,
          variableNode(state, expr.name),
          type,
          expr.location
        );
      }
      return;

    case "binary":
      processExpression(state, expr.left, target, type);
      processExpression(state, expr.right, target, type);
      return;

    case "unary":
      processExpression(state, expr.operand, target, type);
      return;

    case "call":
      processCall(state, expr.callee, expr.args, target, expr.location);
      return;

    case "memberAccess":
      if (target && expr.object.kind === "identifier") {
        addDependency(
          state,
          target,
          { kind: "field", object: expr.object.name, field: expr.member },
          { kind: "fieldAccess" },
          expr.location
        );
      }
      processExpression(state, expr.object, undefined);
      return;

    case "index":
      processExpression(state, expr.object, target, type);
      processExpression(state, expr.index, undefined);
      return;

    case "ternary":
      processExpression(state, expr.condition, undefined);
      processExpression(state, expr.whenTrue, target, { kind: "conditional" });
      processExpression(state, expr.whenFalse, target, { kind: "conditional" });
      return;

    case "arrayLiteral":
      for (const element of expr.elements) {
        processExpression(state, element, undefined);
      }
      return;

    case "structureLiteral":
      for (const field of expr.fields) {
        processExpression(state, field.value, undefined);
      }
      return;

    case "new":
      for (const arg of expr.args) {
        processExpression(state, arg, undefined);
      }
      return;

    case "numberLiteral":
    case "stringLiteral":
    case "booleanLiteral":
    case "dateLiteral":
    case "undefinedLiteral":
    case "nullLiteral":
      return;
  }
};

const processCall = (
  state: BuilderState,
  callee: Expression,
  args: readonly Expression[],
  target: DependencyNode | undefined,
  position: NodePosition | undefined
): void => {
  if (callee.kind === "identifier") {
    const name = declaredName(state, callee.name);
    const called = functionNode(state, name);
    if (target) {
      addDependency(state, target, called, EXPRESSION, position);
    }
    linkCaller(state, called, position);
    processArguments(state, name, args);
    return;
  }

  if (callee.kind === "memberAccess" && callee.object.kind === "identifier") {
    const method: DependencyNode = {
      kind: "method",
      object: callee.object.name,
      method: callee.member,
    };
    if (target) {
      addDependency(state, target, method, { kind: "methodCall" }, position);
    }
  }
  for (const arg of args) {
    processExpression(state, arg, target);
  }
};

const linkCaller = (
  state: BuilderState,
  called: DependencyNode,
  position: NodePosition | undefined
): void => {
  if (state.currentFunction !== undefined) {
    addDependency(
      state,
      functionNode(state, state.currentFunction),
      called,
      EXPRESSION,
      position
    );
  }
};

/**
 * Arguments flow into the callee's positional parameters `param_<i>`
 */
const processArguments = (
  state: BuilderState,
  functionName: string,
  args: readonly Expression[]
): void => {
  args.forEach((arg, index) => {
    const parameter: DependencyNode = {
      kind: "parameter",
      function: functionName,
      name: `param_${index}`,
    };
    processExpression(state, arg, parameter, { kind: "parameter", index });
  });
};

const visitBlock = (
  state: BuilderState,
  statements: readonly Statement[]
): void => {
  for (const statement of statements) {
    visitStatement(state, statement);
  }
};

const visitStatement = (state: BuilderState, statement: Statement): void => {
  switch (statement.kind) {
    case "varDeclaration": {
      const node = variableNode(state, statement.name);
      state.graph.addNode(node);
      if (statement.exported) {
        state.graph.addNode({
          kind: "variable",
          name: statement.name,
          scope: { kind: "global" },
        });
      }
      if (statement.value) {
        processExpression(
          state,
          statement.value,
          node,
          statement.value.kind === "identifier"
            ? { kind: "assignment" }
            : EXPRESSION
        );
      }
      return;
    }

    case "procedureDeclaration":
    case "functionDeclaration": {
      state.graph.addNode(functionNode(state, statement.name));
      const previousScope = state.scope;
      const previousFunction = state.currentFunction;
      state.scope = { kind: "function", name: statement.name };
      state.currentFunction = statement.name;

      for (const param of statement.params) {
        const node: DependencyNode = {
          kind: "parameter",
          function: statement.name,
          name: param.name,
        };
        state.graph.addNode(node);
        if (param.defaultValue) {
          processExpression(state, param.defaultValue, node);
        }
      }
      visitBlock(state, statement.body);

      state.scope = previousScope;
      state.currentFunction = previousFunction;
      return;
    }

    case "assignment": {
      const target = statement.target;
      const node: DependencyNode | undefined =
        target.kind === "identifier"
          ? variableNode(state, target.name)
          : target.kind === "memberAccess" && target.object.kind === "identifier"
            ? { kind: "field", object: target.object.name, field: target.member }
            : undefined;
      if (node) {
        state.graph.addNode(node);
        processExpression(
          state,
          statement.value,
          node,
          statement.value.kind === "identifier"
            ? { kind: "assignment" }
            : EXPRESSION
        );
      }
      return;
    }

    case "procedureCall":
      if (statement.object) {
        if (statement.object.kind === "identifier") {
          const method: DependencyNode = {
            kind: "method",
            object: statement.object.name,
            method: statement.name,
          };
          state.graph.addNode(method);
          if (state.currentFunction !== undefined) {
            addDependency(
              state,
              functionNode(state, state.currentFunction),
              method,
              { kind: "methodCall" },
              statement.location
            );
          }
        }
        for (const arg of statement.args) {
          processExpression(state, arg, undefined);
        }
        return;
      }
      state.graph.addNode(functionNode(state, statement.name));
      linkCaller(state, functionNode(state, statement.name), statement.location);
      processArguments(state, statement.name, statement.args);
      return;

    case "returnStatement":
      if (statement.value && state.currentFunction !== undefined) {
        const node: DependencyNode = {
          kind: "returnValue",
          function: state.currentFunction,
        };
        state.graph.addNode(node);
        processExpression(state, statement.value, node, { kind: "return" });
      }
      return;

    case "ifStatement":
      processExpression(state, statement.condition, undefined);
      visitBlock(state, statement.thenBranch);
      for (const branch of statement.elseIfBranches) {
        processExpression(state, branch.condition, undefined);
        visitBlock(state, branch.body);
      }
      if (statement.elseBranch) {
        visitBlock(state, statement.elseBranch);
      }
      return;

    case "forStatement": {
      const node = variableNode(state, statement.variable);
      state.graph.addNode(node);
      processExpression(state, statement.from, node);
      processExpression(state, statement.to, undefined);
      visitBlock(state, statement.body);
      return;
    }

    case "forEachStatement": {
      const node = variableNode(state, statement.variable);
      state.graph.addNode(node);
      processExpression(state, statement.collection, node);
      visitBlock(state, statement.body);
      return;
    }

    case "whileStatement":
      processExpression(state, statement.condition, undefined);
      visitBlock(state, statement.body);
      return;

    case "tryStatement":
      visitBlock(state, statement.tryBlock);
      if (statement.exceptBlock) {
        visitBlock(state, statement.exceptBlock);
      }
      return;

    case "raiseStatement":
      if (statement.message) {
        processExpression(state, statement.message, undefined);
      }
      return;

    case "breakStatement":
    case "continueStatement":
      return;
  }
};

/**
 * Build the dependency graph of one module
 */
export const buildDependencyGraph = (
  program: Program,
  file: string
): DependencyGraph => {
  const routines = new Map<string, RoutineDeclaration>();
  for (const statement of program.statements) {
    if (isRoutineDeclaration(statement)) {
      routines.set(statement.name, statement);
    }
  }

  const state: BuilderState = {
    graph: new DependencyGraph(),
    file,
    routines,
    scope: { kind: "module", name: file },
    currentFunction: undefined,
  };
  visitBlock(state, program.statements);
  return state.graph;
};
