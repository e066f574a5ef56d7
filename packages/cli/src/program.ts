import { Command, InvalidArgumentError } from "commander";
import { ApiServer } from "@servicemap/api";
import { Journal } from "@servicemap/journal";
import { AnalysisSession } from "@servicemap/session";
import { isServiceMapError } from "@servicemap/schemas";
import { loadConfig, parseInteger, parsePort } from "./config.js";
import type { CliConfig } from "./config.js";
import { formatGraph, formatReport, red } from "./formatter.js";

export interface ProgramIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

const defaultIO: ProgramIO = {
  out: (text) => process.stdout.write(text + "\n"),
  err: (text) => process.stderr.write(text + "\n"),
};

interface GraphOptions {
  nodes: number;
  depth: number;
  seed: number;
  json?: boolean;
}

function integerOption(label: string): (value: string) => number {
  return (value) => {
    try {
      return parseInteger(value, label);
    } catch (err) {
      throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
    }
  };
}

/** Issue nodes may be given as separate arguments, comma lists, or both; order is kept. */
export function splitIssueNodes(args: string[]): string[] {
  return args.flatMap((arg) => arg.split(",")).map((s) => s.trim()).filter(Boolean);
}

function addGraphOptions(command: Command, config: CliConfig): Command {
  return command
    .option("-n, --nodes <n>", "Number of nodes (2-26)", integerOption("--nodes"), config.nodes)
    .option("-d, --depth <n>", "Maximum edge span between nodes", integerOption("--depth"), config.depth)
    .option("-s, --seed <n>", "Random seed", integerOption("--seed"), config.seed)
    .option("--json", "Print JSON instead of text");
}

export function createProgram(io: ProgramIO = defaultIO, config: CliConfig = loadConfig()): Command {
  const program = new Command();
  program.name("servicemap")
    .description("Random service dependency maps and root-cause ranking")
    .version("0.1.0")
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
      outputError: (str, write) => write(red(str.trimEnd())),
    });

  // Known failures become a one-line error and exit code 1.
  const fail = (command: Command, err: unknown): never => {
    if (isServiceMapError(err)) command.error(`error: ${err.message}`, { exitCode: 1, code: err.code });
    throw err;
  };

  addGraphOptions(
    program.command("generate").description("Generate a random service map and print its layers"),
    config,
  ).action(async (opts: GraphOptions, command: Command) => {
    const session = new AnalysisSession();
    try {
      const graph = await session.generate({ node_count: opts.nodes, max_depth: opts.depth, seed: opts.seed });
      io.out(opts.json ? JSON.stringify(graph, null, 2) : formatGraph(graph));
    } catch (err) {
      fail(command, err);
    }
  });

  addGraphOptions(
    program.command("analyze")
      .description("Generate a service map and rank root causes for the flagged nodes, in the order given")
      .argument("<issues...>", "Flagged node labels, e.g. C E F or C,E,F"),
    config,
  )
    .option("-v, --verbose", "Also print candidate and surviving paths")
    .action(async (issues: string[], opts: GraphOptions & { verbose?: boolean }, command: Command) => {
      const session = new AnalysisSession();
      try {
        const graph = await session.generate({ node_count: opts.nodes, max_depth: opts.depth, seed: opts.seed });
        const report = await session.analyze(splitIssueNodes(issues));
        if (opts.json) {
          io.out(JSON.stringify(report, null, 2));
          return;
        }
        if (opts.verbose) io.out(formatGraph(graph, { highlight: report.issue_nodes }));
        io.out(formatReport(report, { verbose: opts.verbose }));
      } catch (err) {
        fail(command, err);
      }
    });

  program.command("serve").description("Start the HTTP API with a journaled session")
    .option("-p, --port <port>", "Port number", (v: string) => {
      try {
        return parsePort(v);
      } catch (err) {
        throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
      }
    }, config.port)
    .option("--journal <path>", "Journal file", config.journalPath)
    .action(async (opts: { port: number; journal: string }) => {
      const journal = new Journal(opts.journal);
      await journal.init();
      const server = new ApiServer({ journal });
      server.listen(opts.port);
      const shutdown = (): void => {
        server.shutdown()
          .then(() => process.exit(0))
          .catch((err: unknown) => {
            console.error("[servicemap] Shutdown failed:", err);
            process.exit(1);
          });
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

  return program;
}
