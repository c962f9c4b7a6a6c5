/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  createDiagnostic,
  error,
  flatMap,
  isDiagnosticSeverity,
  ok,
  type Diagnostic,
  type Result,
} from "@bsl-gradual/frontend";
import type {
  BslGradualConfig,
  CliOptions,
  ExternalFunctionConfig,
  OutputFormat,
  ResolvedConfig,
} from "./types.js";

export const CONFIG_FILE_NAME = "bsl-gradual.json";

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const isOutputFormat = (value: unknown): value is OutputFormat =>
  value === "text" || value === "json";

const invalidField = (
  configPath: string,
  message: string
): Result<BslGradualConfig, Diagnostic> =>
  error(createDiagnostic("BSL9003", "error", `${configPath}: ${message}`));

const parseExternalFunction = (
  value: unknown
): ExternalFunctionConfig | undefined => {
  if (!isRecord(value)) {
    return undefined;
  }
  const { params, exported } = value;
  if (typeof params !== "number" || !Number.isInteger(params) || params < 0) {
    return undefined;
  }
  if (exported !== undefined && typeof exported !== "boolean") {
    return undefined;
  }
  return exported === undefined ? { params } : { params, exported };
};

/**
 * Check the shape of a parsed config file, field by field
 */
export const validateConfig = (
  raw: unknown,
  configPath: string
): Result<BslGradualConfig, Diagnostic> => {
  if (!isRecord(raw)) {
    return invalidField(configPath, "expected a JSON object");
  }

  const { sourceRoot, minSeverity, format, showTypes, externalFunctions } = raw;

  if (sourceRoot !== undefined && typeof sourceRoot !== "string") {
    return invalidField(configPath, "'sourceRoot' must be a string");
  }
  if (minSeverity !== undefined && !isDiagnosticSeverity(minSeverity)) {
    return invalidField(
      configPath,
      "'minSeverity' must be one of error, warning, info, hint"
    );
  }
  if (format !== undefined && !isOutputFormat(format)) {
    return invalidField(configPath, "'format' must be text or json");
  }
  if (showTypes !== undefined && typeof showTypes !== "boolean") {
    return invalidField(configPath, "'showTypes' must be a boolean");
  }

  const functions: Record<string, ExternalFunctionConfig> = {};
  if (externalFunctions !== undefined) {
    if (!isRecord(externalFunctions)) {
      return invalidField(configPath, "'externalFunctions' must be an object");
    }
    for (const [name, entry] of Object.entries(externalFunctions)) {
      const parsed = parseExternalFunction(entry);
      if (!parsed) {
        return invalidField(
          configPath,
          `'externalFunctions.${name}' needs a non-negative integer 'params'`
        );
      }
      functions[name] = parsed;
    }
  }

  return ok({
    sourceRoot,
    minSeverity,
    format,
    showTypes,
    externalFunctions: externalFunctions === undefined ? undefined : functions,
  });
};

const readJson = (configPath: string): Result<unknown, Diagnostic> => {
  try {
    return ok(JSON.parse(readFileSync(configPath, "utf-8")));
  } catch (e) {
    return error(
      createDiagnostic(
        "BSL9002",
        "error",
        `Failed to parse ${configPath}: ${e instanceof Error ? e.message : String(e)}`
      )
    );
  }
};

/**
 * Load bsl-gradual.json
 */
export const loadConfig = (
  configPath: string
): Result<BslGradualConfig, Diagnostic> => {
  if (!existsSync(configPath)) {
    return error(
      createDiagnostic("BSL9001", "error", `Config file not found: ${configPath}`)
    );
  }
  return flatMap(readJson(configPath), (raw) => validateConfig(raw, configPath));
};

/**
 * Find bsl-gradual.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | undefined => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI overrides
 */
export const resolveConfig = (
  config: BslGradualConfig,
  cliOptions: CliOptions,
  projectRoot: string = process.cwd()
): ResolvedConfig => ({
  projectRoot,
  sourceRoot: resolve(projectRoot, config.sourceRoot ?? "."),
  minSeverity: cliOptions.minSeverity ?? config.minSeverity ?? "hint",
  format: cliOptions.format ?? config.format ?? "text",
  showTypes: cliOptions.types ?? config.showTypes ?? false,
  externalFunctions: config.externalFunctions ?? {},
  verbose: cliOptions.verbose ?? false,
  quiet: cliOptions.quiet ?? false,
});
