/**
 * Gradual type system for BSL
 */

export * from "./types/resolution.js";
export * from "./context.js";
export * from "./builtins.js";
export * from "./unions.js";
export * from "./graph/dependency-graph.js";
export { buildDependencyGraph } from "./graph/builder.js";
export {
  inferBinaryType,
  inferExpressionType,
  inferParameterType,
  resolveKnownCall,
  type InferenceEnvironment,
} from "./inference.js";
export {
  TypeNarrower,
  complementOf,
  type RefinementCondition,
  type TypeRefinement,
} from "./narrowing.js";
export {
  FlowSensitiveAnalyzer,
  type FlowHooks,
  type FlowState,
  type MergePoint,
} from "./flow.js";
export {
  CallGraph,
  InterproceduralAnalyzer,
  buildCallGraph,
  type CallSite,
  type FunctionInfo,
  type ParameterInfo,
} from "./interprocedural.js";
export {
  TypeChecker,
  MISMATCH_CONFIDENCE,
  isAssignmentCompatible,
  type CheckResult,
  type TypeCheckerOptions,
} from "./checker.js";
