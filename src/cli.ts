#!/usr/bin/env node

import { Command } from "commander";
import { join } from "node:path";
import { collaboratorFromSpec, pipelineFromRunners } from "./bootstrap.js";
import { BudgetGovernor } from "./budget/governor.js";
import { configure, getConfig, type LoadedConfigFile, loadConfigFile } from "./config.js";
import { Engine } from "./engine.js";
import { OrchestratorError, errorMessage } from "./errors.js";
import { RunStore } from "./persistence/store.js";
import { TaskGraph } from "./planner/task-graph.js";
import { resolveTopology } from "./planner/topology.js";
import type { TopologyReport } from "./scheduler/types.js";
import type { RunReport } from "./types.js";
import { StatusServer } from "./ui/server.js";
import { GitWorkspace } from "./workspace/git-workspace.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", errorMessage(reason));
});

const program = new Command();

program
  .name("dagsmith")
  .description("Run dependency-ordered task graphs on role-bounded worker pools")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals<{ debug?: boolean }>();
  if (opts.debug) setLogLevel("debug");
});

type RunCommandOptions = {
  topology: string[];
  config?: string;
  budget?: string;
  db?: string;
  persist: boolean;
  serve?: string | boolean;
  export?: string;
  workspace?: string;
};

// --- run ---
program
  .command("run")
  .description("Run one or more topologies until settled or paused")
  .requiredOption("-t, --topology <nameOrFile...>", "Bundled topology name (kernel-build, model-training) or descriptor file")
  .option("-c, --config <file>", "Engine config file (JSON)")
  .option("-b, --budget <amount>", "Budget ceiling for the run")
  .option("--db <path>", "Run database path")
  .option("--no-persist", "Do not record the run")
  .option("-s, --serve [port]", "Start the status server while running")
  .option("-e, --export <dir>", "Write each topology's final trunk to <dir>/<topology>")
  .option("-w, --workspace <dir>", "Keep each topology's trunk in a git repository at <dir>/<topology>")
  .action(async (opts: RunCommandOptions) => {
    let loaded: LoadedConfigFile = { overrides: {}, collaborators: [], runners: {} };
    if (opts.config) {
      loaded = await loadConfigFile(opts.config);
      configure(loaded.overrides);
    }
    if (loaded.collaborators.length === 0) {
      throw new OrchestratorError("NO_COLLABORATOR", "No collaborators configured; add a \"collaborators\" section to the config file");
    }

    const ceiling = opts.budget === undefined ? undefined : parseAmount(opts.budget, "--budget");
    const store = opts.persist ? new RunStore(opts.db) : undefined;
    const engine = new Engine({
      budget: ceiling === undefined ? undefined : new BudgetGovernor({ ceiling }),
      pipeline: pipelineFromRunners(loaded.runners),
      store,
    });
    for (const spec of loaded.collaborators) engine.addCollaborator(collaboratorFromSpec(spec));
    const workspaceRoot = opts.workspace ?? getConfig().workspace.root;
    for (const t of opts.topology) {
      const descriptor = await resolveTopology(t);
      const workspace = workspaceRoot === undefined
        ? undefined
        : await GitWorkspace.open({ dir: join(workspaceRoot, descriptor.topology), name: descriptor.topology });
      engine.addTopology(descriptor, { workspace });
    }

    let server: StatusServer | undefined;
    if (opts.serve !== undefined && opts.serve !== false) {
      const port = typeof opts.serve === "string" ? parsePort(opts.serve) : getConfig().server.port;
      server = new StatusServer({ engine, port, runStore: store });
      const addr = await server.start();
      console.log(`Status: http://${addr.host}:${addr.port}/api/status`);
    }

    process.on("SIGINT", () => {
      console.error("\nAborting (in-flight work is cancelled, nothing half-merged)...");
      engine.abort("interrupted");
    });

    try {
      const report = await engine.run({
        onTaskStart: (topology, taskId, worker) => console.log(`  -> [${topology}] ${taskId}${worker ? ` on ${worker}` : ""}`),
        onTaskEnd: (topology, taskId, status, summary) =>
          console.log(`  <- [${topology}] ${taskId}: ${status}${status === "completed" ? "" : ` (${summary})`}`),
        onBudgetWarning: (spent, limit) => console.error(`Budget warning: ${spent.toFixed(2)} of ${limit.toFixed(2)} spent`),
      });
      printReport(report);
      if (opts.export) {
        for (const t of report.topologies) {
          const dir = join(opts.export, t.topology);
          await engine.workspace(t.topology)?.exportTrunk(dir);
          console.log(`Exported ${t.topology} r${t.trunkRevision} to ${dir}`);
        }
      }
      if (report.halt !== "completed") process.exitCode = 2;
    } finally {
      await server?.stop();
      store?.close();
    }
  });

// --- check ---
program
  .command("check")
  .description("Validate topology descriptors and print their dependency order")
  .argument("<nameOrFile...>", "Bundled topology names or descriptor files")
  .action(async (files: string[]) => {
    for (const file of files) {
      try {
        const graph = TaskGraph.build(await resolveTopology(file));
        console.log(`[ok] ${graph.topology} (${graph.size} tasks)`);
        for (const id of graph.topologicalOrder()) {
          const task = graph.get(id);
          const deps = task?.dependsOn.length ? ` <- ${task.dependsOn.join(", ")}` : "";
          console.log(`     ${id} [${task?.role ?? "?"}]${deps}`);
        }
      } catch (err) {
        console.error(`[x] ${file}: ${errorMessage(err)}`);
        process.exitCode = 1;
      }
    }
  });

// --- runs ---
const runs = program.command("runs").description("Inspect recorded runs");

runs.command("list")
  .description("List recent runs")
  .option("--db <path>", "Run database path")
  .option("-n, --limit <n>", "How many runs", "20")
  .action((opts: { db?: string; limit: string }) => {
    const store = new RunStore(opts.db);
    try {
      const list = store.list(Number(opts.limit));
      if (list.length === 0) {
        console.log("No runs recorded.");
        return;
      }
      for (const run of list) {
        console.log(
          `${run.runId}  ${new Date(run.startedAt).toISOString()}  ${run.state.padEnd(7)}  ${(run.haltReason ?? "-").padEnd(20)}  ${run.totalCost.toFixed(2)}  ${run.topologies.join(", ")}`,
        );
      }
    } finally {
      store.close();
    }
  });

runs.command("show")
  .description("Show one run's report and ledger")
  .argument("<runId>")
  .option("--db <path>", "Run database path")
  .action((runId: string, opts: { db?: string }) => {
    const store = new RunStore(opts.db);
    try {
      const run = store.get(runId);
      if (!run) {
        console.error(`Run ${runId} not found`);
        process.exitCode = 1;
        return;
      }
      if (run.report) printReport(run.report);
      else console.log(`${run.runId}: ${run.state}`);
      const ledger = store.ledger(runId);
      if (ledger.length > 0) {
        console.log("\nLedger:");
        for (const e of ledger) console.log(`  #${e.seq} ${e.taskId} +${e.delta.toFixed(2)} = ${e.total.toFixed(2)}`);
      }
    } finally {
      store.close();
    }
  });

runs.command("delete")
  .description("Delete a recorded run")
  .argument("<runId>")
  .option("--db <path>", "Run database path")
  .action((runId: string, opts: { db?: string }) => {
    const store = new RunStore(opts.db);
    try {
      if (store.delete(runId)) console.log(`Deleted ${runId}`);
      else {
        console.error(`Run ${runId} not found`);
        process.exitCode = 1;
      }
    } finally {
      store.close();
    }
  });

function printReport(report: RunReport): void {
  console.log(`\n--- Run ${report.runId}: ${report.halt} ---`);
  for (const t of report.topologies) console.log(formatTopology(t));
  console.log(`Spent ${report.spent.toFixed(2)} of ${report.ceiling.toFixed(2)} in ${report.durationMs}ms`);
}

function formatTopology(t: TopologyReport): string {
  const line = `  ${t.topology}: ${t.halt}, completed ${t.completed}, failed ${t.failedTerminal}, blocked ${t.blockedByAncestor}, pending ${t.pending} (trunk r${t.trunkRevision})`;
  return t.error ? `${line}\n    ${t.error}` : line;
}

function parseAmount(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) {
    throw new OrchestratorError("CONFIG_INVALID", `${flag} must be a non-negative number (got "${value}")`);
  }
  return n;
}

function parsePort(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0 || n > 65535) {
    throw new OrchestratorError("CONFIG_INVALID", `Invalid port "${value}"`);
  }
  return n;
}

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
