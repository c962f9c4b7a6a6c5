/**
 * Diagnostic types shared by the parser, the type checker and the CLI
 */

export type DiagnosticSeverity = "error" | "warning" | "info" | "hint";

export type DiagnosticCode =
  // Syntax errors (BSL1001-BSL1099)
  | "BSL1001" // Unexpected character
  | "BSL1002" // Unterminated string or date literal
  | "BSL1003" // Unexpected token
  | "BSL1004" // Missing closing keyword
  // Type diagnostics (BSL2001-BSL2099)
  | "BSL2001" // Argument count mismatch
  | "BSL2002" // Identifier used before assignment
  | "BSL2003" // Incompatible reassignment
  | "BSL2004" // Operand type mismatch
  | "BSL2005" // Function not found in context
  // Configuration errors (BSL9001-BSL9099)
  | "BSL9001" // Config file not found
  | "BSL9002" // Invalid JSON in config file
  | "BSL9003"; // Invalid config field

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

const SEVERITY_RANK: Readonly<Record<DiagnosticSeverity, number>> = {
  error: 0,
  warning: 1,
  info: 2,
  hint: 3,
};

/**
 * True when `severity` is at least as serious as `threshold`
 */
export const meetsSeverity = (
  severity: DiagnosticSeverity,
  threshold: DiagnosticSeverity
): boolean => SEVERITY_RANK[severity] <= SEVERITY_RANK[threshold];

export const isDiagnosticSeverity = (
  value: unknown
): value is DiagnosticSeverity =>
  value === "error" ||
  value === "warning" ||
  value === "info" ||
  value === "hint";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (): DiagnosticsCollector => ({
  diagnostics: [],
  hasErrors: false,
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});
