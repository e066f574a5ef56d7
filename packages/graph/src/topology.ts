import { InvalidInputError } from "@servicemap/schemas";
import type { GraphEdge, ServiceGraph } from "@servicemap/schemas";

/**
 * Successor lists keyed by label. Every label in `labels` gets an entry;
 * targets keep the order their edges appear in `edges`.
 */
export function successorMap(
  labels: readonly string[],
  edges: readonly GraphEdge[],
): Map<string, string[]> {
  const adjacency = new Map<string, string[]>();
  for (const label of labels) adjacency.set(label, []);
  for (const edge of edges) {
    const targets = adjacency.get(edge.from);
    if (!targets || !adjacency.has(edge.to)) {
      throw new InvalidInputError(`Edge ${edge.from}->${edge.to} references an unknown node`);
    }
    targets.push(edge.to);
  }
  return adjacency;
}

/**
 * Kahn-style leveling. Generation 0 holds every source; generation k+1 holds
 * the nodes whose last remaining predecessor sits in generation k.
 *
 * @throws InvalidInputError when a cycle leaves nodes unplaced
 */
export function topologicalGenerations(
  labels: readonly string[],
  edges: readonly GraphEdge[],
): string[][] {
  const adjacency = successorMap(labels, edges);
  const inDegree = new Map<string, number>();
  for (const label of labels) inDegree.set(label, 0);
  for (const edge of edges) {
    inDegree.set(edge.to, (inDegree.get(edge.to) ?? 0) + 1);
  }

  const generations: string[][] = [];
  let current = labels.filter((label) => inDegree.get(label) === 0);
  let placed = 0;
  while (current.length > 0) {
    generations.push(current);
    placed += current.length;
    const next: string[] = [];
    for (const label of current) {
      for (const target of adjacency.get(label) ?? []) {
        const remaining = (inDegree.get(target) ?? 1) - 1;
        inDegree.set(target, remaining);
        if (remaining === 0) next.push(target);
      }
    }
    current = next;
  }

  if (placed !== labels.length) {
    throw new InvalidInputError(
      `Graph contains a cycle: ${labels.length - placed} node(s) cannot be leveled`,
    );
  }
  return generations;
}

export function graphLabels(graph: Pick<ServiceGraph, "nodes">): string[] {
  return graph.nodes.map((n) => n.label);
}

export function isAcyclic(graph: Pick<ServiceGraph, "nodes" | "edges">): boolean {
  try {
    topologicalGenerations(graphLabels(graph), graph.edges);
    return true;
  } catch (err) {
    if (err instanceof InvalidInputError) return false;
    throw err;
  }
}
