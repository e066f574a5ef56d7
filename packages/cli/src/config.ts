import { resolve } from "node:path";
import { DEFAULT_SEED } from "@servicemap/graph";

export interface CliConfig {
  journalPath: string;
  port: number;
  nodes: number;
  depth: number;
  seed: number;
}

export const DEFAULT_PORT = 3200;
export const DEFAULT_NODES = 15;
export const DEFAULT_DEPTH = 2;

export function parseInteger(value: string, label: string): number {
  const n = Number(value.trim());
  if (value.trim() === "" || !Number.isInteger(n)) {
    throw new Error(`Invalid ${label}: "${value}" (must be an integer)`);
  }
  return n;
}

export function parsePort(value: string, label = "port"): number {
  const port = parseInteger(value, label);
  if (port < 1 || port > 65535) {
    throw new Error(`Invalid ${label}: "${value}" (must be 1–65535)`);
  }
  return port;
}

function fromEnv<T>(raw: string | undefined, parse: (value: string) => T, fallback: T): T {
  return raw === undefined || raw === "" ? fallback : parse(raw);
}

/** Read SERVICEMAP_* settings; flags given on the command line take precedence. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  return {
    journalPath: env.SERVICEMAP_JOURNAL_PATH || resolve("journal/events.jsonl"),
    port: fromEnv(env.SERVICEMAP_PORT, (v) => parsePort(v, "SERVICEMAP_PORT"), DEFAULT_PORT),
    nodes: fromEnv(env.SERVICEMAP_NODES, (v) => parseInteger(v, "SERVICEMAP_NODES"), DEFAULT_NODES),
    depth: fromEnv(env.SERVICEMAP_DEPTH, (v) => parseInteger(v, "SERVICEMAP_DEPTH"), DEFAULT_DEPTH),
    seed: fromEnv(env.SERVICEMAP_SEED, (v) => parseInteger(v, "SERVICEMAP_SEED"), DEFAULT_SEED),
  };
}
