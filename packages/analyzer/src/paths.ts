import type { GraphPath } from "@servicemap/schemas";

/**
 * Enumerate every simple directed path from `source` to `target`.
 *
 * Depth-first over successor lists in their stored order, so paths come out
 * in a stable order. The walk stops at `target` rather than continuing past
 * it. Returns [] when the endpoints are equal or unconnected.
 *
 * Exponential in the worst case; callers bound the graph size.
 */
export function allSimplePaths(
  adjacency: ReadonlyMap<string, readonly string[]>,
  source: string,
  target: string,
): GraphPath[] {
  if (source === target) return [];
  const paths: GraphPath[] = [];
  const path: string[] = [source];
  const onPath = new Set<string>([source]);

  const walk = (node: string): void => {
    for (const next of adjacency.get(node) ?? []) {
      if (onPath.has(next)) continue;
      if (next === target) {
        paths.push([...path, next]);
        continue;
      }
      onPath.add(next);
      path.push(next);
      walk(next);
      path.pop();
      onPath.delete(next);
    }
  };

  walk(source);
  return paths;
}

/** Concatenated labels, e.g. ["A", "B", "C"] → "ABC". */
export function pathString(path: GraphPath, separator = ""): string {
  return path.join(separator);
}
