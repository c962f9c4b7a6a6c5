/**
 * Type definitions for CLI
 */

import type { DiagnosticSeverity } from "@bsl-gradual/frontend";

export type OutputFormat = "text" | "json";

/**
 * Routine declared in another module, known only by its arity
 */
export type ExternalFunctionConfig = {
  readonly params: number;
  readonly exported?: boolean;
};

/**
 * bsl-gradual.json configuration
 */
export type BslGradualConfig = {
  readonly sourceRoot?: string;
  readonly minSeverity?: DiagnosticSeverity;
  readonly format?: OutputFormat;
  readonly showTypes?: boolean;
  readonly externalFunctions?: Readonly<Record<string, ExternalFunctionConfig>>;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  format?: OutputFormat;
  types?: boolean;
  minSeverity?: DiagnosticSeverity;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly projectRoot: string; // Directory containing bsl-gradual.json
  readonly sourceRoot: string;
  readonly minSeverity: DiagnosticSeverity;
  readonly format: OutputFormat;
  readonly showTypes: boolean;
  readonly externalFunctions: Readonly<Record<string, ExternalFunctionConfig>>;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
