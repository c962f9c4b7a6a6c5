/**
 * Flow-sensitive analysis
 *
 * Every variable update produces a new immutable state linked to its
 * predecessors. Conditionals fork the state through the narrower and join
 * the branch ends at a merge point. Loop bodies are analyzed once.
 */

import type {
  BinaryExpression,
  ElseIfBranch,
  Expression,
  Identifier,
  NodePosition,
  Statement,
  UnaryExpression,
} from "@bsl-gradual/frontend";
import {
  enterScope,
  exitScope,
  scopeKey,
  withVariables,
  type Scope,
  type TypeContext,
} from "./context.js";
import {
  inferExpressionType,
  inferParameterType,
  resolveKnownCall,
  type InferenceEnvironment,
} from "./inference.js";
import { TypeNarrower } from "./narrowing.js";
import {
  primitiveType,
  unknown,
  type TypeResolution,
} from "./types/resolution.js";
import { joinVariableTypes } from "./unions.js";

export type FlowState = {
  readonly id: number;
  readonly variables: ReadonlyMap<string, TypeResolution>;
  readonly predecessors: readonly number[];
  /** Scope the state was created in */
  readonly scope: Scope;
};

export type MergePoint = {
  readonly states: readonly number[];
  readonly mergedState: number;
};

/**
 * Observers of what the analyzer sees while typing statements
 */
export interface FlowHooks {
  onUndeclaredVariable?(node: Identifier): void;
  onCall?(
    name: string,
    argumentCount: number,
    location: NodePosition | undefined
  ): void;
  onOperator?(
    node: BinaryExpression | UnaryExpression,
    operands: readonly TypeResolution[]
  ): void;
  onCondition?(condition: Expression, type: TypeResolution): void;
  onAssignment?(
    name: string,
    previous: TypeResolution | undefined,
    next: TypeResolution,
    location: NodePosition | undefined
  ): void;
}

export class FlowSensitiveAnalyzer {
  private readonly states: FlowState[] = [];
  private readonly merges: MergePoint[] = [];
  private current: FlowState;
  private readonly environment: InferenceEnvironment;

  constructor(
    private context: TypeContext,
    private readonly hooks: FlowHooks = {}
  ) {
    this.current = this.createState(context.variables, []);
    this.environment = {
      lookupVariable: (name, node) => {
        const type = this.current.variables.get(name);
        if (type === undefined) {
          this.hooks.onUndeclaredVariable?.(node);
        }
        return type;
      },
      resolveCall: (name, args, node) => {
        this.hooks.onCall?.(name, args.length, node.location);
        return (
          resolveKnownCall(this.context.functions, name, args) ??
          unknown("Unknown function")
        );
      },
      onOperator: (node, operands) => this.hooks.onOperator?.(node, operands),
    };
  }

  get currentState(): FlowState {
    return this.current;
  }

  finalState(): FlowState {
    return this.current;
  }

  allStates(): readonly FlowState[] {
    return this.states;
  }

  mergePoints(): readonly MergePoint[] {
    return this.merges;
  }

  getVariableType(name: string): TypeResolution | undefined {
    return this.current.variables.get(name);
  }

  /**
   * Context with the variables of the given state
   */
  refinedContextAt(stateId: number): TypeContext | undefined {
    const state = this.states[stateId];
    if (!state) {
      return undefined;
    }
    const context = withVariables(this.context, state.variables);
    return scopeKey(state.scope) === scopeKey(context.currentScope)
      ? context
      : enterScope(context, state.scope);
  }

  updateVariableType(name: string, type: TypeResolution): FlowState {
    const variables = new Map(this.current.variables);
    variables.set(name, type);
    this.current = this.createState(variables, [this.current.id]);
    return this.current;
  }

  analyzeExpression(expr: Expression): TypeResolution {
    return inferExpressionType(expr, this.environment);
  }

  analyzeAssignment(
    name: string,
    value: Expression,
    location?: NodePosition
  ): TypeResolution {
    const type = this.analyzeExpression(value);
    this.hooks.onAssignment?.(
      name,
      this.current.variables.get(name),
      type,
      location
    );
    this.updateVariableType(name, type);
    return type;
  }

  analyzeBlock(statements: readonly Statement[]): void {
    for (const statement of statements) {
      this.analyzeStatement(statement);
    }
  }

  analyzeStatement(statement: Statement): void {
    switch (statement.kind) {
      case "varDeclaration":
        if (statement.value) {
          this.analyzeAssignment(
            statement.name,
            statement.value,
            statement.location
          );
        } else {
          this.updateVariableType(
            statement.name,
            unknown("Declared without a value")
          );
        }
        return;

      case "assignment":
        if (statement.target.kind === "identifier") {
          this.analyzeAssignment(
            statement.target.name,
            statement.value,
            statement.location
          );
        } else {
          this.analyzeTargetObject(statement.target);
          this.analyzeExpression(statement.value);
        }
        return;

      case "procedureDeclaration":
      case "functionDeclaration": {
        const outer = this.current;
        const variables = new Map(outer.variables);
        const signature = this.context.functions.get(statement.name);
        statement.params.forEach((param, index) => {
          variables.set(
            param.name,
            signature?.params[index]?.type ?? inferParameterType(param)
          );
        });
        this.context = enterScope(this.context, {
          kind: "function",
          name: statement.name,
        });
        this.current = this.createState(variables, [outer.id]);
        this.analyzeBlock(statement.body);
        this.context = exitScope(this.context);
        this.current = outer;
        return;
      }

      case "procedureCall": {
        if (statement.object) {
          this.analyzeExpression(statement.object);
        }
        for (const arg of statement.args) {
          this.analyzeExpression(arg);
        }
        if (!statement.object) {
          this.hooks.onCall?.(
            statement.name,
            statement.args.length,
            statement.location
          );
        }
        return;
      }

      case "ifStatement":
        this.analyzeConditional(
          statement.condition,
          statement.thenBranch,
          statement.elseIfBranches,
          statement.elseBranch
        );
        return;

      case "forStatement":
        this.analyzeExpression(statement.from);
        this.analyzeExpression(statement.to);
        this.updateVariableType(statement.variable, primitiveType("Number"));
        this.analyzeBlock(statement.body);
        return;

      case "forEachStatement":
        this.analyzeExpression(statement.collection);
        this.updateVariableType(
          statement.variable,
          unknown("Collection element")
        );
        this.analyzeBlock(statement.body);
        return;

      case "whileStatement":
        this.analyzeCondition(statement.condition);
        this.analyzeBlock(statement.body);
        return;

      case "tryStatement":
        this.analyzeBlock(statement.tryBlock);
        if (statement.exceptBlock) {
          this.analyzeBlock(statement.exceptBlock);
        }
        return;

      case "returnStatement":
        if (statement.value) {
          this.analyzeExpression(statement.value);
        }
        return;

      case "raiseStatement":
        if (statement.message) {
          this.analyzeExpression(statement.message);
        }
        return;

      case "breakStatement":
      case "continueStatement":
        return;
    }
  }

  /**
   * Fork on `condition`, analyze both paths and merge their ends. Else-if
   * branches become nested conditionals on the else path.
   */
  analyzeConditional(
    condition: Expression,
    thenBranch: readonly Statement[],
    elseIfBranches: readonly ElseIfBranch[] = [],
    elseBranch?: readonly Statement[]
  ): FlowState {
    this.analyzeCondition(condition);
    const start = this.current;
    const narrower = new TypeNarrower(
      withVariables(this.context, start.variables)
    );
    const refinements = narrower.analyzeCondition(condition);

    this.current = this.createState(
      narrower.applyRefinementsToContext(refinements).variables,
      [start.id]
    );
    this.analyzeBlock(thenBranch);
    const thenEnd = this.current;

    const [nextBranch, ...remaining] = elseIfBranches;
    let elseEnd = start;
    if (nextBranch || elseBranch) {
      this.current = this.createState(
        narrower.applyRefinementsToContext(
          narrower.invertRefinements(refinements)
        ).variables,
        [start.id]
      );
      if (nextBranch) {
        this.analyzeConditional(
          nextBranch.condition,
          nextBranch.body,
          remaining,
          elseBranch
        );
      } else if (elseBranch) {
        this.analyzeBlock(elseBranch);
      }
      elseEnd = this.current;
    }

    this.current = this.mergeStates([thenEnd, elseEnd]);
    return this.current;
  }

  /**
   * Join states: each variable becomes the union of its types across the
   * inputs that define it
   */
  mergeStates(inputs: readonly FlowState[]): FlowState {
    const [first] = inputs;
    if (!first) {
      return this.current;
    }
    if (inputs.length === 1) {
      return first;
    }

    const variables = joinVariableTypes(
      inputs.map((state) => state.variables)
    );

    const merged = this.createState(
      variables,
      inputs.map((state) => state.id)
    );
    this.merges.push({
      states: inputs.map((state) => state.id),
      mergedState: merged.id,
    });
    return merged;
  }

  private analyzeCondition(condition: Expression): void {
    this.hooks.onCondition?.(condition, this.analyzeExpression(condition));
  }

  private analyzeTargetObject(target: Expression): void {
    switch (target.kind) {
      case "memberAccess":
        this.analyzeExpression(target.object);
        return;
      case "index":
        this.analyzeExpression(target.object);
        this.analyzeExpression(target.index);
        return;
      default:
        this.analyzeExpression(target);
    }
  }

  private createState(
    variables: ReadonlyMap<string, TypeResolution>,
    predecessors: readonly number[]
  ): FlowState {
    const state: FlowState = {
      id: this.states.length,
      variables: new Map(variables),
      predecessors,
      scope: this.context.currentScope,
    };
    this.states.push(state);
    return state;
  }
}
