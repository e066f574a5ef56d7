// Pure formatting for CLI output; no I/O here.
import { pathString } from "@servicemap/analyzer";
import type { RootCauseReport, ServiceGraph } from "@servicemap/schemas";

export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

export const NO_ROOT_CAUSE_MESSAGE =
  "No potential root causes could be identified. The selected issue nodes might be in " +
  "disconnected parts of the graph or at the start of all paths.";

export interface GraphFormatOptions {
  /** Labels drawn in red, e.g. the flagged issue nodes. */
  highlight?: readonly string[];
}

export function formatGraph(graph: ServiceGraph, options: GraphFormatOptions = {}): string {
  const marked = new Set(options.highlight ?? []);
  const label = (node: string): string => (marked.has(node) ? red(node) : node);
  const seed = graph.seed === null ? "custom" : String(graph.seed);
  const lines = [`Service Map DAG: ${graph.node_count} nodes, max depth ${graph.max_depth}, seed ${seed}`];
  graph.layers.forEach((generation, layer) => {
    lines.push(`Layer ${layer}: ${generation.map(label).join(" ")}`);
  });
  lines.push(`Edges (${graph.edges.length}):`);
  for (const edge of graph.edges) lines.push(`  ${label(edge.from)} -> ${label(edge.to)}`);
  return lines.join("\n");
}

export function formatReport(report: RootCauseReport, options: { verbose?: boolean } = {}): string {
  const lines: string[] = [`Issue nodes: ${report.issue_nodes.join(", ")}`];
  if (options.verbose) {
    lines.push(`Candidate paths (${report.candidate_paths.length}):`);
    for (const path of report.candidate_paths) lines.push(`  ${pathString(path, " -> ")}`);
    lines.push(`Root-cause paths (${report.root_cause_paths.length}):`);
    for (const path of report.root_cause_paths) lines.push(`  ${pathString(path, " -> ")}`);
  }
  if (report.root_causes.length === 0) {
    lines.push(NO_ROOT_CAUSE_MESSAGE);
    return lines.join("\n");
  }
  lines.push("Potential Root Causes");
  for (const { node, count } of report.root_causes) {
    lines.push(`- Node ${node}: occurs in ${count} path(s)`);
  }
  return lines.join("\n");
}
