import { describe, it, expect } from "vitest";
import { InvalidParameterError } from "@servicemap/schemas";
import type { ServiceGraph } from "@servicemap/schemas";
import { synthesize } from "./synthesizer.js";
import { isAcyclic } from "./topology.js";
import type { RandomSource } from "./random.js";

const edgeList = (graph: ServiceGraph): string[] => graph.edges.map((e) => `${e.from}->${e.to}`);

describe("synthesize", () => {
  it("reproduces the checked-in graph for seed 123", () => {
    const graph = synthesize(6, 2, 123);
    expect(edgeList(graph)).toEqual([
      "A->B", "A->C", "B->C", "B->D", "C->D", "C->E", "D->E", "D->F", "E->F",
    ]);
    expect(graph.nodes.map((n) => [n.label, n.layer])).toEqual([
      ["A", 0], ["B", 1], ["C", 2], ["D", 3], ["E", 4], ["F", 5],
    ]);
    expect(graph.layers).toEqual([["A"], ["B"], ["C"], ["D"], ["E"], ["F"]]);
  });

  it("records its parameters", () => {
    const graph = synthesize(6, 2, 123);
    expect(graph.node_count).toBe(6);
    expect(graph.max_depth).toBe(2);
    expect(graph.seed).toBe(123);
    expect(graph.nodes.map((n) => n.index)).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it("levels wide generations in discovery order", () => {
    const graph = synthesize(10, 3, 2);
    expect(graph.layers).toEqual([
      ["A"], ["B"], ["C"], ["E", "D"], ["F"], ["I", "G"], ["H", "J"],
    ]);
  });

  it("yields the single backbone edge for two nodes", () => {
    expect(edgeList(synthesize(2, 1, 7))).toEqual(["A->B"]);
    expect(edgeList(synthesize(2, 1, 123))).toEqual(["A->B"]);
  });

  it("clamps depth beyond the node count", () => {
    expect(edgeList(synthesize(6, 10, 123))).toEqual(edgeList(synthesize(6, 5, 123)));
    expect(edgeList(synthesize(6, 10, 123))).toEqual([
      "A->B", "A->D", "A->E", "B->C", "B->D", "B->F", "D->E", "D->F",
    ]);
  });

  it("builds a chain when depth is one", () => {
    expect(edgeList(synthesize(5, 1, 42))).toEqual(["A->B", "B->C", "C->D", "D->E"]);
  });

  it("is deterministic for a seed", () => {
    const a = synthesize(15, 4, 99);
    const b = synthesize(15, 4, 99);
    expect(a.edges).toEqual(b.edges);
    expect(a.nodes).toEqual(b.nodes);
  });

  it("differs across seeds", () => {
    expect(edgeList(synthesize(10, 3, 1))).not.toEqual(edgeList(synthesize(10, 3, 2)));
    expect(edgeList(synthesize(26, 5, 0))).not.toEqual(edgeList(synthesize(26, 5, 0x12345678)));
    expect(edgeList(synthesize(4, 3, 0))).toEqual(["A->B", "A->C", "A->D", "B->C", "B->D", "C->D"]);
  });

  it("draws from a caller-supplied random source", () => {
    const first: RandomSource = {
      nextInt: () => 0,
      pick: <T>(items: readonly T[]): T => {
        const item = items[0];
        if (item === undefined) throw new RangeError("empty");
        return item;
      },
    };
    const graph = synthesize(4, 2, first);
    // Backbone parents are the furthest allowed ancestor; no extra edges.
    expect(edgeList(graph)).toEqual(["A->B", "A->C", "B->D"]);
    expect(graph.seed).toBeNull();
  });

  it("returns a frozen graph", () => {
    const graph = synthesize(4, 2, 5);
    expect(Object.isFrozen(graph)).toBe(true);
    expect(Object.isFrozen(graph.edges)).toBe(true);
    expect(Object.isFrozen(graph.nodes[0])).toBe(true);
  });

  describe("structural invariants", () => {
    const cases: Array<[number, number, number]> = [];
    for (const seed of [0, 1, 2, 3, 17, 123, 2024, 65535]) {
      for (const [n, d] of [[2, 1], [6, 2], [12, 3], [20, 5], [26, 1], [26, 25]] as const) {
        cases.push([n, d, seed]);
      }
    }

    it.each(cases)("n=%i depth=%i seed=%i", (n, d, seed) => {
      const graph = synthesize(n, d, seed);
      const index = new Map(graph.nodes.map((node) => [node.label, node.index]));
      const layer = new Map(graph.nodes.map((node) => [node.label, node.layer]));

      expect(graph.nodes).toHaveLength(n);
      expect(isAcyclic(graph)).toBe(true);

      const inDegree = new Map<string, number>();
      const seen = new Set<string>();
      for (const { from, to } of graph.edges) {
        const fromIndex = index.get(from) ?? -1;
        const toIndex = index.get(to) ?? -1;
        expect(fromIndex).toBeLessThan(toIndex);
        expect(toIndex - fromIndex).toBeLessThanOrEqual(d);
        expect(layer.get(from) ?? -1).toBeLessThan(layer.get(to) ?? -1);
        expect(seen.has(`${from}->${to}`)).toBe(false);
        seen.add(`${from}->${to}`);
        inDegree.set(to, (inDegree.get(to) ?? 0) + 1);
      }

      for (const node of graph.nodes.slice(1)) {
        expect(inDegree.get(node.label) ?? 0).toBeGreaterThanOrEqual(1);
      }
      expect(graph.nodes[0]?.layer).toBe(0);
    });
  });

  describe("parameter validation", () => {
    it("rejects fewer than two nodes", () => {
      expect(() => synthesize(1, 1, 1)).toThrow(InvalidParameterError);
      expect(() => synthesize(1, 1, 1)).toThrow("nodeCount must be an integer >= 2 (got 1)");
    });

    it("rejects more nodes than labels", () => {
      expect(() => synthesize(27, 3, 1)).toThrow(
        "nodeCount must be <= 26, the number of node labels (got 27)",
      );
    });

    it("rejects a depth below one", () => {
      expect(() => synthesize(5, 0, 1)).toThrow("maxDepth must be an integer >= 1 (got 0)");
    });

    it("rejects non-integer arguments", () => {
      expect(() => synthesize(5.5, 2, 1)).toThrow(InvalidParameterError);
      expect(() => synthesize(5, 2, 1.5)).toThrow("seed must be an integer in [0, 4294967294] (got 1.5)");
    });

    it("rejects seeds outside [0, 2^32 - 2]", () => {
      expect(() => synthesize(5, 2, -1)).toThrow("seed must be an integer in [0, 4294967294] (got -1)");
      expect(() => synthesize(5, 2, 2 ** 32 + 1)).toThrow(InvalidParameterError);
    });
  });
});
