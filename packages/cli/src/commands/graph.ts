/**
 * Graph command - dependency and call graph summary of one module
 */

import { readFile } from "node:fs/promises";
import { relative, resolve } from "node:path";
import {
  error,
  formatDiagnostic,
  map,
  mapError,
  parse,
  type Program,
  type Result,
} from "@bsl-gradual/frontend";
import {
  buildCallGraph,
  buildDependencyGraph,
  formatNode,
} from "@bsl-gradual/analysis";
import type { OutputFormat, ResolvedConfig } from "../types.js";

export type GraphSummary = {
  readonly file: string;
  readonly nodes: number;
  readonly edges: number;
  readonly functions: number;
  readonly variables: number;
  /** `from -> to [kind]` per edge */
  readonly edgeList: readonly string[];
  readonly cycles: readonly (readonly string[])[];
  /** Callees before callers; null when recursion prevents an order */
  readonly callOrder: readonly string[] | null;
};

export const summarizeGraph = (program: Program, file: string): GraphSummary => {
  const graph = buildDependencyGraph(program, file);
  const stats = graph.stats();
  return {
    file,
    ...stats,
    edgeList: graph
      .edges()
      .map(
        (edge) =>
          `${formatNode(edge.from)} -> ${formatNode(edge.to)} [${edge.type.kind}]`
      ),
    cycles: graph.findCycles().map((cycle) => cycle.map(formatNode)),
    callOrder: buildCallGraph(program).topologicalSort() ?? null,
  };
};

const renderGraphText = (summary: GraphSummary, verbose: boolean): string => {
  const lines = [
    `Nodes: ${summary.nodes} (${summary.functions} functions, ${summary.variables} variables)`,
    `Edges: ${summary.edges}`,
  ];
  if (verbose) {
    lines.push(...summary.edgeList.map((edge) => `  ${edge}`));
  }

  if (summary.cycles.length === 0) {
    lines.push("Cycles: none");
  } else {
    lines.push(`Cycles: ${summary.cycles.length}`);
    for (const cycle of summary.cycles) {
      lines.push(`  ${cycle.join(" -> ")}`);
    }
  }

  const order = summary.callOrder;
  lines.push(
    order
      ? `Call order: ${order.length > 0 ? order.join(", ") : "(no routines)"}`
      : "Call order: unavailable (recursive calls)"
  );
  return lines.join("\n");
};

export const renderGraph = (
  summary: GraphSummary,
  format: OutputFormat,
  verbose = false
): string =>
  format === "json"
    ? JSON.stringify(summary, null, 2)
    : renderGraphText(summary, verbose);

export const graphCommand = async (
  entryFile: string,
  config: ResolvedConfig
): Promise<Result<GraphSummary, string>> => {
  const path = resolve(config.sourceRoot, entryFile);
  const file = relative(process.cwd(), path) || path;

  let source: string;
  try {
    source = await readFile(path, "utf-8");
  } catch (e) {
    return error(
      `Cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`
    );
  }

  return mapError(
    map(parse(source, file), (program) => summarizeGraph(program, file)),
    formatDiagnostic
  );
};
