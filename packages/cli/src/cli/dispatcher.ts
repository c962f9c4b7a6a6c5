/**
 * CLI command dispatcher
 */

import { dirname } from "node:path";
import { formatDiagnostic } from "@bsl-gradual/frontend";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { checkCommand } from "../commands/check.js";
import { graphCommand, renderGraph } from "../commands/graph.js";
import { renderReport } from "../commands/report.js";
import type { BslGradualConfig } from "../types.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

/**
 * Main CLI entry point
 */
export const runCli = async (args: readonly string[]): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.command === "version") {
    console.log(`bsl-gradual v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  if (parsed.error) {
    console.error(`Error: ${parsed.error}`);
    return 2;
  }

  if (parsed.command !== "check" && parsed.command !== "graph") {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'bsl-gradual --help' for usage information");
    return 2;
  }

  if (!parsed.entryFile) {
    console.error("Error: Module file required");
    console.error(`Usage: bsl-gradual ${parsed.command} <file.bsl>`);
    return 2;
  }

  // An explicit --config must exist; otherwise the file is optional
  const configPath = parsed.options.config ?? findConfig(process.cwd());
  let fileConfig: BslGradualConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${formatDiagnostic(configResult.error)}`);
      return 3;
    }
    fileConfig = configResult.value;
  }

  const config = resolveConfig(
    fileConfig,
    parsed.options,
    configPath ? dirname(configPath) : process.cwd()
  );

  if (config.verbose && !config.quiet && config.format === "text") {
    console.log(`Config: ${configPath ?? "(none)"}`);
    console.log(`  sourceRoot: ${config.sourceRoot}`);
    console.log(`  minSeverity: ${config.minSeverity}`);
    console.log(
      `  externalFunctions: ${Object.keys(config.externalFunctions).length}`
    );
  }

  if (parsed.command === "graph") {
    const result = await graphCommand(parsed.entryFile, config);
    if (!result.ok) {
      console.error(`Error: ${result.error}`);
      return 1;
    }
    console.log(renderGraph(result.value, config.format, config.verbose));
    return 0;
  }

  const result = await checkCommand(parsed.entryFile, config);
  if (!result.ok) {
    console.error(`Error: ${result.error}`);
    return 1;
  }

  const report = result.value;
  console.log(
    renderReport(
      {
        file: report.file,
        diagnostics: report.diagnostics,
        context: config.showTypes ? report.result?.context : undefined,
      },
      config.format
    )
  );
  return report.hasErrors ? 1 : 0;
};
