/**
 * BSL frontend - lexer, parser and syntax tree
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  meetsSeverity,
  isDiagnosticSeverity,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./ast/index.js";
export {
  tokenize,
  lookupKeyword,
  type Token,
  type TokenKind,
  type Keyword,
} from "./lexer.js";
export { parse } from "./parser.js";
