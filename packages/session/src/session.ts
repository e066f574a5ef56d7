import { v4 as uuid } from "uuid";
import { explainRootCauses } from "@servicemap/analyzer";
import { DEFAULT_SEED, synthesize } from "@servicemap/graph";
import type { Journal } from "@servicemap/journal";
import {
  NoGraphError,
  isServiceMapError,
  parseAnalyzeRequest,
  parseSynthesizeParams,
} from "@servicemap/schemas";
import type { JournalEventType, RootCauseReport, ServiceGraph } from "@servicemap/schemas";

export interface AnalysisSessionOptions {
  sessionId?: string;
  journal?: Journal;
}

/**
 * Owns the graph a user is currently working with.
 *
 * `generate` replaces the graph wholesale and clears the issue selection;
 * the graph itself is never edited. Analysis always runs against whichever
 * snapshot is current when it is called.
 */
export class AnalysisSession {
  readonly sessionId: string;
  private readonly journal: Journal | undefined;
  private currentGraph: ServiceGraph | null = null;
  private currentIssues: string[] = [];
  private started = false;

  constructor(options: AnalysisSessionOptions = {}) {
    this.sessionId = options.sessionId ?? uuid();
    this.journal = options.journal;
  }

  get graph(): ServiceGraph | null {
    return this.currentGraph;
  }

  get issueNodes(): readonly string[] {
    return this.currentIssues;
  }

  /**
   * Validate untrusted parameters, synthesize, and swap in the new graph.
   * The swap happens only once the journal has accepted the event.
   */
  async generate(params: unknown): Promise<ServiceGraph> {
    await this.ensureStarted();
    let graph: ServiceGraph;
    try {
      const { node_count, max_depth, seed } = parseSynthesizeParams(params);
      graph = synthesize(node_count, max_depth, seed ?? DEFAULT_SEED);
    } catch (err) {
      if (isServiceMapError(err)) {
        await this.recordFailure("graph.rejected", { code: err.code, message: err.message });
      }
      throw err;
    }

    await this.record("graph.generated", {
      node_count: graph.node_count,
      max_depth: graph.max_depth,
      seed: graph.seed,
      edge_count: graph.edges.length,
      layer_count: graph.layers.length,
    });
    this.currentGraph = graph;
    this.currentIssues = [];
    return graph;
  }

  /** Rank root causes for an ordered list of flagged nodes on the current graph. */
  async analyze(issueNodes: unknown): Promise<RootCauseReport> {
    await this.ensureStarted();
    const graph = this.currentGraph;
    if (!graph) throw new NoGraphError();

    let report: RootCauseReport;
    try {
      const { issue_nodes } = parseAnalyzeRequest({ issue_nodes: issueNodes });
      report = explainRootCauses(graph, issue_nodes);
    } catch (err) {
      if (isServiceMapError(err)) {
        await this.recordFailure("analysis.failed", { code: err.code, message: err.message });
      }
      throw err;
    }

    await this.record("analysis.completed", {
      issue_nodes: report.issue_nodes,
      candidate_count: report.candidate_paths.length,
      root_cause_path_count: report.root_cause_paths.length,
      root_causes: report.root_causes,
    });
    this.currentIssues = [...report.issue_nodes];
    return report;
  }

  private async ensureStarted(): Promise<void> {
    if (this.started) return;
    await this.record("session.created", {});
    this.started = true;
  }

  private async record(type: JournalEventType, payload: Record<string, unknown>): Promise<void> {
    if (!this.journal) return;
    await this.journal.emit(this.sessionId, type, payload);
  }

  /** Journal a rejected request; the rejection stays the error the caller sees. */
  private async recordFailure(type: JournalEventType, payload: Record<string, unknown>): Promise<void> {
    try {
      await this.record(type, payload);
    } catch (err) {
      console.error(`[servicemap] Failed to journal ${type}:`, err);
    }
  }
}
