/**
 * Service Map Core Types
 *
 * Canonical data models shared by the synthesizer, the analyzer and every
 * surface built on top of them.
 */

// ─── Graph ──────────────────────────────────────────────────────────

/** Node labels, in generation order. A graph uses the first `node_count`. */
export const NODE_LABELS = [
  "A", "B", "C", "D", "E", "F", "G", "H", "I", "J", "K", "L", "M",
  "N", "O", "P", "Q", "R", "S", "T", "U", "V", "W", "X", "Y", "Z",
] as const;

export const MAX_NODE_COUNT = NODE_LABELS.length;
export const MIN_NODE_COUNT = 2;
export const MIN_MAX_DEPTH = 1;
/** Largest accepted seed; one uint32 state is reserved for seed 0. */
export const MAX_SEED = 0xffff_fffe;

export interface GraphNode {
  readonly label: string;
  /** Position in generation order; every edge points to a higher index. */
  readonly index: number;
  /** Topological generation, used for layered display only. */
  readonly layer: number;
}

export interface GraphEdge {
  readonly from: string;
  readonly to: string;
}

export interface ServiceGraph {
  readonly node_count: number;
  readonly max_depth: number;
  /** Null when the caller supplied its own random source. */
  readonly seed: number | null;
  readonly nodes: readonly GraphNode[];
  readonly edges: readonly GraphEdge[];
  /** Topological generations, `layers[i]` holding every node with `layer === i`. */
  readonly layers: readonly (readonly string[])[];
}

export interface SynthesizeParams {
  node_count: number;
  max_depth: number;
  seed?: number;
}

// ─── Analysis ───────────────────────────────────────────────────────

/** Ordered node labels along a simple directed path. */
export type GraphPath = readonly string[];

export interface RootCauseCandidate {
  node: string;
  count: number;
}

export type RootCauseResult = RootCauseCandidate[];

export interface RootCauseReport {
  issue_nodes: string[];
  /** Every simple path found between ordered issue-node pairs, in discovery order. */
  candidate_paths: GraphPath[];
  /** Candidates that survived the containment filter. */
  root_cause_paths: GraphPath[];
  root_causes: RootCauseResult;
}

export interface AnalyzeRequest {
  issue_nodes: string[];
}

// ─── Journal ────────────────────────────────────────────────────────

export type JournalEventType =
  | "session.created"
  | "graph.generated"
  | "graph.rejected"
  | "analysis.completed"
  | "analysis.failed";

export interface JournalEvent {
  event_id: string;
  seq: number;
  timestamp: string;
  session_id: string;
  type: JournalEventType;
  payload: Record<string, unknown>;
  hash_prev?: string;
}
