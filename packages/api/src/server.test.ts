import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { rm } from "node:fs/promises";
import http from "node:http";
import { v4 as uuid } from "uuid";
import { Journal } from "@servicemap/journal";
import { AnalysisSession } from "@servicemap/session";
import { ApiServer } from "./server.js";

interface TestResponse {
  status: number;
  body: unknown;
}

async function request(url: string, opts?: { method?: string; body?: unknown; raw?: string }): Promise<TestResponse> {
  const { method = "GET", body, raw } = opts ?? {};
  const payload = raw ?? (body !== undefined ? JSON.stringify(body) : undefined);
  const headers: Record<string, string> = payload !== undefined ? { "Content-Type": "application/json" } : {};
  return new Promise<TestResponse>((resolve, reject) => {
    const req = http.request(url, { method, headers }, (res) => {
      let data = "";
      res.setEncoding("utf-8");
      res.on("data", (chunk: string) => { data += chunk; });
      res.on("end", () => {
        resolve({ status: res.statusCode ?? 0, body: data ? JSON.parse(data) : null });
      });
    });
    req.on("error", reject);
    if (payload !== undefined) req.write(payload);
    req.end();
  });
}

function field(body: unknown, key: string): unknown {
  if (typeof body !== "object" || body === null) return undefined;
  return Object.entries(body).find(([k]) => k === key)?.[1];
}

async function startServer(apiServer: ApiServer): Promise<{ server: http.Server; baseUrl: string }> {
  return new Promise((resolve) => {
    const server = http.createServer(apiServer.getExpressApp());
    server.listen(0, () => {
      const addr = server.address();
      const port = typeof addr === "object" && addr ? addr.port : 0;
      resolve({ server, baseUrl: `http://127.0.0.1:${port}` });
    });
  });
}

describe("ApiServer", () => {
  let httpServer: http.Server;
  let baseUrl: string;
  let apiServer: ApiServer;

  beforeEach(async () => {
    apiServer = new ApiServer({ session: new AnalysisSession({ sessionId: "sess-api" }) });
    ({ server: httpServer, baseUrl } = await startServer(apiServer));
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => { httpServer.close(() => resolve()); });
  });

  it("GET /api/health", async () => {
    const res = await request(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "ok", session_id: "sess-api" });
  });

  it("GET /api/graph is 404 before generation", async () => {
    const res = await request(`${baseUrl}/api/graph`);
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "No graph has been generated yet" });
  });

  it("POST /api/graph generates the seeded graph", async () => {
    const res = await request(`${baseUrl}/api/graph`, {
      method: "POST",
      body: { node_count: 6, max_depth: 2, seed: 123 },
    });
    expect(res.status).toBe(201);
    expect(field(res.body, "edges")).toEqual([
      { from: "A", to: "B" }, { from: "A", to: "C" }, { from: "B", to: "C" },
      { from: "B", to: "D" }, { from: "C", to: "D" }, { from: "C", to: "E" },
      { from: "D", to: "E" }, { from: "D", to: "F" }, { from: "E", to: "F" },
    ]);
    expect(field(res.body, "layers")).toEqual([["A"], ["B"], ["C"], ["D"], ["E"], ["F"]]);
  });

  it("POST /api/graph rejects invalid parameters", async () => {
    const res = await request(`${baseUrl}/api/graph`, {
      method: "POST",
      body: { node_count: 1, max_depth: 2 },
    });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: "Invalid synthesis parameters: /node_count: must be >= 2",
      code: "INVALID_PARAMETER",
    });
  });

  it("POST /api/graph rejects malformed JSON", async () => {
    const res = await request(`${baseUrl}/api/graph`, { method: "POST", raw: "{not json" });
    expect(res.status).toBe(400);
  });

  it("POST /api/analyze is 409 before generation", async () => {
    const res = await request(`${baseUrl}/api/analyze`, { method: "POST", body: { issue_nodes: ["A", "B"] } });
    expect(res.status).toBe(409);
    expect(res.body).toEqual({ error: "No graph has been generated yet", code: "NO_GRAPH" });
  });

  it("POST /api/analyze ranks root causes in request order", async () => {
    await request(`${baseUrl}/api/graph`, { method: "POST", body: { node_count: 6, max_depth: 2, seed: 123 } });
    const res = await request(`${baseUrl}/api/analyze`, { method: "POST", body: { issue_nodes: ["C", "E", "F"] } });
    expect(res.status).toBe(200);
    expect(field(res.body, "issue_nodes")).toEqual(["C", "E", "F"]);
    expect(field(res.body, "root_causes")).toEqual([{ node: "F", count: 4 }]);
    expect(field(res.body, "root_cause_paths")).toEqual([
      ["C", "D", "E", "F"], ["C", "D", "F"], ["C", "E", "F"], ["E", "F"],
    ]);

    const reversed = await request(`${baseUrl}/api/analyze`, { method: "POST", body: { issue_nodes: ["F", "E", "C"] } });
    expect(field(reversed.body, "root_causes")).toEqual([]);

    const graph = await request(`${baseUrl}/api/graph`);
    expect(field(graph.body, "issue_nodes")).toEqual(["F", "E", "C"]);
  });

  it("POST /api/analyze rejects unknown nodes", async () => {
    await request(`${baseUrl}/api/graph`, { method: "POST", body: { node_count: 3, max_depth: 1, seed: 1 } });
    const res = await request(`${baseUrl}/api/analyze`, { method: "POST", body: { issue_nodes: ["A", "Z"] } });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Unknown issue node(s): Z", code: "INVALID_INPUT" });
  });

  it("POST /api/analyze rejects a missing issue list", async () => {
    await request(`${baseUrl}/api/graph`, { method: "POST", body: { node_count: 3, max_depth: 1, seed: 1 } });
    const res = await request(`${baseUrl}/api/analyze`, { method: "POST", body: {} });
    expect(res.status).toBe(400);
    expect(field(res.body, "code")).toBe("INVALID_INPUT");
  });

  it("GET /api/journal is 404 without a journal", async () => {
    const res = await request(`${baseUrl}/api/journal`);
    expect(res.status).toBe(404);
  });

  it("returns 500 and logs unexpected failures", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(apiServer.getSession(), "generate").mockRejectedValueOnce(new Error("disk full"));
    const res = await request(`${baseUrl}/api/graph`, { method: "POST", body: { node_count: 3, max_depth: 1 } });
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: "Internal server error" });
    expect(errorSpy).toHaveBeenCalledTimes(1);
    vi.restoreAllMocks();
  });
});

describe("ApiServer with a journal", () => {
  let testDir: string;
  let journal: Journal;
  let apiServer: ApiServer;
  let httpServer: http.Server;
  let baseUrl: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `servicemap-api-${uuid()}`);
    journal = new Journal(join(testDir, "events.jsonl"), { fsync: false });
    await journal.init();
    apiServer = new ApiServer({ journal });
    ({ server: httpServer, baseUrl } = await startServer(apiServer));
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => { httpServer.close(() => resolve()); });
    await apiServer.shutdown();
    await rm(testDir, { recursive: true, force: true });
  });

  it("GET /api/journal lists this session's events", async () => {
    await request(`${baseUrl}/api/graph`, { method: "POST", body: { node_count: 4, max_depth: 2, seed: 3 } });
    await request(`${baseUrl}/api/analyze`, { method: "POST", body: { issue_nodes: ["A", "D"] } });

    const res = await request(`${baseUrl}/api/journal`);
    expect(res.status).toBe(200);
    expect(field(res.body, "session_id")).toBe(apiServer.getSession().sessionId);
    const events = field(res.body, "events");
    expect(Array.isArray(events) ? events.map((e) => field(e, "type")) : events).toEqual([
      "session.created", "graph.generated", "analysis.completed",
    ]);
  });
});
