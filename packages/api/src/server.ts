import express from "express";
import type { Request, Response, NextFunction } from "express";
import type { Server } from "node:http";
import type { Journal } from "@servicemap/journal";
import { AnalysisSession } from "@servicemap/session";
import { isServiceMapError } from "@servicemap/schemas";
import type { ServiceMapErrorCode } from "@servicemap/schemas";

const MAX_BODY = "16kb";

const STATUS_BY_CODE: Record<ServiceMapErrorCode, number> = {
  INVALID_PARAMETER: 400,
  INVALID_INPUT: 400,
  NO_GRAPH: 409,
};

/** Omits stack traces in production. */
function logError(label: string, err: unknown): void {
  if (process.env.NODE_ENV === "production") {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`[api] ${label}: ${msg}`);
  } else {
    console.error(`[api] ${label}:`, err);
  }
}

function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

export interface ApiServerConfig {
  /** Session to serve; a fresh one (journaled to `journal`) by default. */
  session?: AnalysisSession;
  journal?: Journal;
}

/**
 * HTTP surface over one analysis session. The session's graph is replaced
 * wholesale by POST /api/graph and read by every other route.
 */
export class ApiServer {
  private readonly app: express.Application;
  private readonly session: AnalysisSession;
  private readonly journal: Journal | undefined;
  private httpServer?: Server;

  constructor(config: ApiServerConfig = {}) {
    this.journal = config.journal;
    this.session = config.session ?? new AnalysisSession({ journal: config.journal });
    this.app = express();
    this.app.use(express.json({ limit: MAX_BODY }));
    this.app.use((_req, res, next) => {
      res.setHeader("X-Content-Type-Options", "nosniff");
      res.setHeader("Cache-Control", "no-store");
      next();
    });
    this.app.use("/api", this.createRouter());
    this.app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
      this.handleError(`${req.method} ${req.path}`, err, res, next);
    });
  }

  getExpressApp(): express.Application { return this.app; }

  getSession(): AnalysisSession { return this.session; }

  listen(port: number): Server {
    const server = this.app.listen(port, () => {
      const addr = server.address();
      const actualPort = typeof addr === "object" && addr ? addr.port : port;
      console.log(`Service map API listening on http://localhost:${actualPort}`);
    });
    this.httpServer = server;
    return server;
  }

  async shutdown(): Promise<void> {
    if (this.journal) await this.journal.close();
    const server = this.httpServer;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      this.httpServer = undefined;
    }
  }

  private createRouter(): express.Router {
    const router = express.Router();

    router.get("/health", (_req, res) => {
      res.json({ status: "ok", session_id: this.session.sessionId });
    });

    router.post("/graph", (req, res, next) => {
      this.session.generate(req.body)
        .then((graph) => { res.status(201).json(graph); })
        .catch(next);
    });

    router.get("/graph", (_req, res) => {
      const graph = this.session.graph;
      if (!graph) { res.status(404).json({ error: "No graph has been generated yet" }); return; }
      res.json({ ...graph, issue_nodes: this.session.issueNodes });
    });

    router.post("/analyze", (req, res, next) => {
      const body: unknown = req.body;
      const issueNodes = typeof body === "object" && body !== null && "issue_nodes" in body
        ? body.issue_nodes
        : undefined;
      this.session.analyze(issueNodes)
        .then((report) => { res.json(report); })
        .catch(next);
    });

    router.get("/journal", (_req, res, next) => {
      if (!this.journal) { res.status(404).json({ error: "Journal is not enabled" }); return; }
      this.journal.readSession(this.session.sessionId)
        .then((events) => { res.json({ session_id: this.session.sessionId, events }); })
        .catch(next);
    });

    return router;
  }

  private handleError(label: string, err: unknown, res: Response, next: NextFunction): void {
    if (res.headersSent) { next(err); return; }
    if (isServiceMapError(err)) {
      res.status(STATUS_BY_CODE[err.code]).json({ error: err.message, code: err.code });
      return;
    }
    // Body-parser failures (bad JSON, oversized body) carry their own 4xx status.
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      res.status(status).json({ error: err instanceof Error ? err.message : "Bad request" });
      return;
    }
    logError(label, err);
    res.status(500).json({ error: "Internal server error" });
  }
}
