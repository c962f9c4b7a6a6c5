/**
 * CLI argument parser
 */

import { isDiagnosticSeverity } from "@bsl-gradual/frontend";
import { isOutputFormat } from "../config.js";
import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  readonly command: string;
  readonly entryFile?: string;
  readonly options: CliOptions;
  /** First malformed option, if any */
  readonly error?: string;
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  let entryFile: string | undefined;
  let problem: string | undefined;

  const fail = (message: string): void => {
    problem = problem ?? message;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // First positional arg after command
    if (command && !entryFile && !arg.startsWith("-")) {
      entryFile = arg;
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {} };
      case "-v":
      case "--version":
        return { command: "version", options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "--types":
        options.types = true;
        break;
      case "--format": {
        const format = args[++i];
        if (isOutputFormat(format)) {
          options.format = format;
        } else {
          fail(`--format expects text or json, got '${format ?? ""}'`);
        }
        break;
      }
      case "--min-severity": {
        const severity = args[++i];
        if (isDiagnosticSeverity(severity)) {
          options.minSeverity = severity;
        } else {
          fail(
            `--min-severity expects error, warning, info or hint, got '${severity ?? ""}'`
          );
        }
        break;
      }
      default:
        fail(`Unknown option: ${arg}`);
    }
  }

  return problem === undefined
    ? { command, entryFile, options }
    : { command, entryFile, options, error: problem };
};
