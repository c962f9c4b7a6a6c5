/**
 * Rendering of check results as text or JSON
 */

import {
  formatDiagnostic,
  type Diagnostic,
  type DiagnosticSeverity,
} from "@bsl-gradual/frontend";
import {
  formatResolution,
  type FunctionSignature,
  type TypeContext,
} from "@bsl-gradual/analysis";
import type { OutputFormat } from "../types.js";

export type SeverityCounts = Readonly<Record<DiagnosticSeverity, number>>;

export const countBySeverity = (
  diagnostics: readonly Diagnostic[]
): SeverityCounts => ({
  error: diagnostics.filter((d) => d.severity === "error").length,
  warning: diagnostics.filter((d) => d.severity === "warning").length,
  info: diagnostics.filter((d) => d.severity === "info").length,
  hint: diagnostics.filter((d) => d.severity === "hint").length,
});

export const formatSignature = (
  name: string,
  signature: FunctionSignature
): string => {
  const params = signature.params
    .map((p) => (p.optional ? `${p.name}?` : p.name))
    .join(", ");
  return `${name}(${params}): ${formatResolution(signature.returnType)}`;
};

const typeTable = (
  context: TypeContext
): {
  readonly variables: Readonly<Record<string, string>>;
  readonly functions: Readonly<Record<string, string>>;
} => ({
  variables: Object.fromEntries(
    [...context.variables].map(([name, type]) => [name, formatResolution(type)])
  ),
  functions: Object.fromEntries(
    [...context.functions].map(([name, signature]) => [
      name,
      formatSignature(name, signature),
    ])
  ),
});

export type ReportInput = {
  readonly file: string;
  readonly diagnostics: readonly Diagnostic[];
  /** Present when inferred types should be printed */
  readonly context?: TypeContext;
};

export const renderText = (input: ReportInput): string => {
  const lines = input.diagnostics.map(formatDiagnostic);
  const counts = countBySeverity(input.diagnostics);
  lines.push(
    `${input.file}: ${counts.error} error(s), ${counts.warning} warning(s), ${counts.info} info, ${counts.hint} hint(s)`
  );

  if (input.context) {
    const table = typeTable(input.context);
    lines.push("Variables:");
    for (const [name, type] of Object.entries(table.variables)) {
      lines.push(`  ${name}: ${type}`);
    }
    lines.push("Functions:");
    for (const signature of Object.values(table.functions)) {
      lines.push(`  ${signature}`);
    }
  }

  return lines.join("\n");
};

export const renderJson = (input: ReportInput): string =>
  JSON.stringify(
    {
      file: input.file,
      diagnostics: input.diagnostics,
      summary: countBySeverity(input.diagnostics),
      ...(input.context ? { types: typeTable(input.context) } : {}),
    },
    null,
    2
  );

export const renderReport = (
  input: ReportInput,
  format: OutputFormat
): string => (format === "json" ? renderJson(input) : renderText(input));
