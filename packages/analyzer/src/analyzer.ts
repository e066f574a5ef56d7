import { InvalidInputError } from "@servicemap/schemas";
import type {
  GraphPath,
  RootCauseCandidate,
  RootCauseReport,
  RootCauseResult,
  ServiceGraph,
} from "@servicemap/schemas";
import { graphLabels, successorMap, topologicalGenerations } from "@servicemap/graph";
import { allSimplePaths } from "./paths.js";
import { filterRootCausePaths } from "./containment.js";

/**
 * Paths between every ordered pair of issue nodes (i before j in the list).
 * Pairs are not symmetrized: a path running against list order is never found.
 */
export function collectCandidatePaths(
  adjacency: ReadonlyMap<string, readonly string[]>,
  issueNodes: readonly string[],
): GraphPath[] {
  const candidates: GraphPath[] = [];
  issueNodes.forEach((start, i) => {
    for (const end of issueNodes.slice(i + 1)) {
      candidates.push(...allSimplePaths(adjacency, start, end));
    }
  });
  return candidates;
}

/** Count terminal nodes, then rank by count; ties keep first-seen order. */
export function rankTerminalNodes(paths: readonly GraphPath[]): RootCauseResult {
  const counts = new Map<string, number>();
  for (const path of paths) {
    const terminal = path[path.length - 1];
    if (terminal === undefined) continue;
    counts.set(terminal, (counts.get(terminal) ?? 0) + 1);
  }
  const ranked: RootCauseCandidate[] = [...counts].map(([node, count]) => ({ node, count }));
  // Array.prototype.sort is stable.
  return ranked.sort((a, b) => b.count - a.count);
}

function assertAnalyzable(graph: ServiceGraph, labels: readonly string[], issueNodes: readonly string[]): void {
  const known = new Set(labels);
  const unknown = issueNodes.filter((label) => !known.has(label));
  if (unknown.length > 0) {
    throw new InvalidInputError(`Unknown issue node(s): ${unknown.join(", ")}`);
  }
  // Throws InvalidInputError on a cycle.
  topologicalGenerations(labels, graph.edges);
}

/**
 * Run the full root-cause pipeline and keep the intermediate paths.
 *
 * @throws InvalidInputError for an unknown label or a cyclic graph
 */
export function explainRootCauses(graph: ServiceGraph, issueNodes: readonly string[]): RootCauseReport {
  const labels = graphLabels(graph);
  assertAnalyzable(graph, labels, issueNodes);

  const report: RootCauseReport = {
    issue_nodes: [...issueNodes],
    candidate_paths: [],
    root_cause_paths: [],
    root_causes: [],
  };
  if (issueNodes.length < 2) return report;

  const adjacency = successorMap(labels, graph.edges);
  report.candidate_paths = collectCandidatePaths(adjacency, issueNodes);
  report.root_cause_paths = filterRootCausePaths(report.candidate_paths);
  report.root_causes = rankTerminalNodes(report.root_cause_paths);
  return report;
}

/**
 * Rank likely root causes for an ordered list of flagged nodes.
 * The order of `issueNodes` is significant. An empty result means no root
 * cause could be inferred.
 */
export function analyze(graph: ServiceGraph, issueNodes: readonly string[]): RootCauseResult {
  return explainRootCauses(graph, issueNodes).root_causes;
}
