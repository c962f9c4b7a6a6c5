/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
bsl-gradual - gradual type checker for BSL v${VERSION}

USAGE:
  bsl-gradual <command> <file.bsl> [options]

COMMANDS:
  check <file.bsl>          Type check a module and report diagnostics
  graph <file.bsl>          Show dependency graph statistics, cycles and call order

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress progress output
  -c, --config <file>       Config file path (default: bsl-gradual.json)

CHECK OPTIONS:
  --format <text|json>      Diagnostic output format
  --types                   Print inferred variable types and signatures
  --min-severity <level>    Lowest severity to report: error, warning, info, hint

EXAMPLES:
  bsl-gradual check src/ОбщийМодуль.bsl
  bsl-gradual check src/ОбщийМодуль.bsl --format json --min-severity warning
  bsl-gradual graph src/ОбщийМодуль.bsl --verbose
`);
};
