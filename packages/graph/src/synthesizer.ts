import {
  InvalidParameterError,
  MAX_NODE_COUNT,
  MAX_SEED,
  MIN_MAX_DEPTH,
  MIN_NODE_COUNT,
  NODE_LABELS,
} from "@servicemap/schemas";
import type { GraphEdge, GraphNode, ServiceGraph } from "@servicemap/schemas";
import { SeededRandom, type RandomSource } from "./random.js";
import { topologicalGenerations } from "./topology.js";

export const DEFAULT_SEED = 123;

function assertParameters(nodeCount: number, maxDepth: number): void {
  if (!Number.isInteger(nodeCount) || nodeCount < MIN_NODE_COUNT) {
    throw new InvalidParameterError(`nodeCount must be an integer >= ${MIN_NODE_COUNT} (got ${nodeCount})`);
  }
  if (nodeCount > MAX_NODE_COUNT) {
    throw new InvalidParameterError(`nodeCount must be <= ${MAX_NODE_COUNT}, the number of node labels (got ${nodeCount})`);
  }
  if (!Number.isInteger(maxDepth) || maxDepth < MIN_MAX_DEPTH) {
    throw new InvalidParameterError(`maxDepth must be an integer >= ${MIN_MAX_DEPTH} (got ${maxDepth})`);
  }
}

/**
 * Build a random service-map DAG.
 *
 * Every node after the first gets one backbone parent at most `maxDepth`
 * positions earlier, then each node gains a random number of extra children
 * at most `maxDepth` positions later. Edges only ever point forward in
 * generation order, so the result is acyclic without a cycle check.
 *
 * @param seed - integer seed for a fresh SeededRandom, or a caller-owned source
 */
export function synthesize(
  nodeCount: number,
  maxDepth: number,
  seed: number | RandomSource = DEFAULT_SEED,
): ServiceGraph {
  assertParameters(nodeCount, maxDepth);
  if (typeof seed === "number" && (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED)) {
    throw new InvalidParameterError(`seed must be an integer in [0, ${MAX_SEED}] (got ${seed})`);
  }
  const rng = typeof seed === "number" ? new SeededRandom(seed) : seed;
  const labels: string[] = NODE_LABELS.slice(0, nodeCount);

  // Successor lists double as the edge set; a repeated edge is ignored.
  const successors = new Map<string, string[]>(labels.map((l) => [l, []]));
  const addEdge = (from: string, to: string): void => {
    const targets = successors.get(from);
    if (targets && !targets.includes(to)) targets.push(to);
  };

  // Backbone
  for (const [i, child] of labels.entries()) {
    if (i === 0) continue;
    const parents = labels.slice(Math.max(0, i - maxDepth), i);
    addEdge(rng.pick(parents), child);
  }

  // Extra edges
  for (const [i, from] of labels.entries()) {
    const candidates = labels.slice(i + 1, Math.min(nodeCount - 1, i + maxDepth) + 1);
    const extra = rng.nextInt(candidates.length + 1);
    for (let k = 0; k < extra; k++) {
      const child = rng.pick(candidates);
      addEdge(from, child);
      candidates.splice(candidates.indexOf(child), 1);
    }
  }

  const edges: GraphEdge[] = [];
  for (const from of labels) {
    for (const to of successors.get(from) ?? []) edges.push(Object.freeze({ from, to }));
  }

  const layers = topologicalGenerations(labels, edges);
  const layerOf = new Map<string, number>();
  layers.forEach((generation, layer) => {
    for (const label of generation) layerOf.set(label, layer);
  });

  const nodes: GraphNode[] = labels.map((label, index) =>
    Object.freeze({ label, index, layer: layerOf.get(label) ?? 0 }),
  );

  return Object.freeze({
    node_count: nodeCount,
    max_depth: maxDepth,
    seed: typeof seed === "number" ? seed : null,
    nodes: Object.freeze(nodes),
    edges: Object.freeze(edges),
    layers: Object.freeze(layers.map((generation) => Object.freeze(generation))),
  });
}
