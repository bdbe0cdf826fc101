import { randomUUID } from "node:crypto";
import type { WorkerCollaborator } from "./agents/adapter.js";
import { WorkerPoolManager } from "./agents/pool.js";
import { CollaboratorRegistry } from "./agents/registry.js";
import { BudgetGovernor, type BudgetEvent } from "./budget/governor.js";
import { getConfig, type PoolSizes } from "./config.js";
import { BudgetExceededError, OrchestratorError, errorMessage } from "./errors.js";
import type { RunStore } from "./persistence/store.js";
import { TaskGraph } from "./planner/task-graph.js";
import type { Role, TopologyDescriptor } from "./planner/types.js";
import { Scheduler } from "./scheduler/scheduler.js";
import { HALT_REASONS, type HaltReason, type SchedulerEvent, type TopologyReport } from "./scheduler/types.js";
import type { EngineEvent, EngineStatus, RunRecord, RunReport, RunState } from "./types.js";
import { log } from "./utils/logger.js";
import { staticRunner } from "./validation/function-runner.js";
import { ValidationPipeline } from "./validation/pipeline.js";
import { MemoryWorkspace } from "./workspace/memory-workspace.js";

export type EngineOptions = {
  /** Shared across every topology. Built from `budget` config when omitted. */
  budget?: BudgetGovernor;
  /** Without one, every change-set passes validation. */
  pipeline?: ValidationPipeline;
  pools?: PoolSizes;
  /** When set, runs and ledger events are persisted. */
  store?: RunStore;
};

export type AddTopologyOptions = {
  /** Files present in the topology's workspace at revision 0. */
  initialFiles?: Record<string, string>;
  /** An already opened workspace (e.g. a `GitWorkspace`); `initialFiles` is then ignored. */
  workspace?: MemoryWorkspace;
};

export type RunCallbacks = {
  onTaskStart?: (topology: string, taskId: string, worker?: string) => void;
  onTaskEnd?: (topology: string, taskId: string, status: string, summary: string) => void;
  onTopologyHalted?: (report: TopologyReport) => void;
  onBudgetWarning?: (spent: number, ceiling: number) => void;
};

type TopologyEntry = {
  graph: TaskGraph;
  workspace: MemoryWorkspace;
  scheduler?: Scheduler;
};

/**
 * Composes one scheduler per topology over a shared budget governor and a
 * shared set of worker pools. Running topology A, B, or both is only a
 * matter of how many topologies were added.
 */
export class Engine {
  readonly collaborators = new CollaboratorRegistry();
  readonly budget: BudgetGovernor;
  private pipeline: ValidationPipeline;
  private poolSizes?: PoolSizes;
  private store?: RunStore;
  private pools?: WorkerPoolManager;
  private topologies = new Map<string, TopologyEntry>();
  private listeners = new Set<(event: EngineEvent) => void>();
  private runId?: string;
  private startedAt = 0;
  private state: RunState | "idle" = "idle";
  private lastReport?: RunReport;
  private callbacks?: RunCallbacks;

  constructor(opts?: EngineOptions) {
    this.budget = opts?.budget ?? new BudgetGovernor();
    this.pipeline = opts?.pipeline ?? defaultPipeline();
    this.poolSizes = opts?.pools;
    this.store = opts?.store;

    this.budget.subscribe((event) => this.onBudgetEvent(event));
  }

  addCollaborator(collaborator: WorkerCollaborator): void {
    this.collaborators.add(collaborator);
  }

  /** Build and register a topology's graph. Graph definition errors surface here, before anything runs. */
  addTopology(descriptor: TopologyDescriptor, opts?: AddTopologyOptions): TaskGraph {
    if (this.state !== "idle") {
      throw new OrchestratorError("RUN_IN_PROGRESS", "Topologies must be added before the run starts");
    }
    if (this.topologies.has(descriptor.topology)) {
      throw new OrchestratorError("DUPLICATE_TOPOLOGY", `Topology "${descriptor.topology}" already added`);
    }
    const graph = TaskGraph.build(descriptor);
    const workspace = opts?.workspace ?? new MemoryWorkspace({ name: descriptor.topology, initialFiles: opts?.initialFiles });
    this.topologies.set(descriptor.topology, { graph, workspace });
    log.info(`Added topology "${descriptor.topology}"`, { tasks: graph.size });
    return graph;
  }

  graph(topology: string): TaskGraph | undefined {
    return this.topologies.get(topology)?.graph;
  }

  workspace(topology: string): MemoryWorkspace | undefined {
    return this.topologies.get(topology)?.workspace;
  }

  get currentRunId(): string | undefined {
    return this.runId;
  }

  /** Run every topology to completion or to a pause. Resolves with the combined report. */
  async run(callbacks?: RunCallbacks): Promise<RunReport> {
    if (this.state !== "idle") {
      throw new OrchestratorError("RUN_IN_PROGRESS", "Engine has already been started; use resume()");
    }
    if (this.topologies.size === 0) {
      throw new OrchestratorError("INVALID_DESCRIPTOR", "No topology added");
    }
    this.callbacks = callbacks;
    const pools = new WorkerPoolManager(this.collaborators, { pools: this.poolSizes ?? getConfig().workers.pools });
    pools.onDegraded((alert) => {
      this.emit({ type: "role:degraded", runId: this.requireRunId(), alert });
    });
    this.pools = pools;

    for (const entry of this.topologies.values()) {
      entry.scheduler = new Scheduler({
        graph: entry.graph,
        workspace: entry.workspace,
        pools,
        budget: this.budget,
        pipeline: this.pipeline,
        onEvent: (event) => this.onSchedulerEvent(event),
      });
    }

    this.runId = randomUUID();
    this.startedAt = Date.now();
    this.state = "running";
    const names = [...this.topologies.keys()];
    this.store?.insert({
      runId: this.runId,
      topologies: names,
      state: "running",
      totalCost: this.budget.total,
      startedAt: this.startedAt,
    });
    log.info(`Run ${this.runId} started`, { topologies: names });
    this.emit({ type: "run:started", runId: this.runId, topologies: names });

    return this.runSchedulers([...this.topologies.values()]);
  }

  /**
   * Continue after a pause: budget raised, degraded roles restored, or an
   * abort. Topologies that completed or hit workspace corruption are left
   * as they are.
   */
  async resume(): Promise<RunReport> {
    const entries = this.resumableEntries();
    this.state = "running";
    this.store?.update(this.record());
    log.info(`Run ${this.requireRunId()} resumed`, { topologies: entries.map((e) => e.graph.topology) });
    return this.runSchedulers(entries);
  }

  /** Throws, synchronously, the error `resume()` would reject with. */
  assertResumable(): void {
    this.resumableEntries();
  }

  /** Cancel in-flight invocations and stop dispatching in every topology. */
  abort(reason = "aborted by operator"): void {
    if (this.state !== "running") return;
    log.warn(`Aborting run ${this.requireRunId()}: ${reason}`);
    for (const entry of this.topologies.values()) entry.scheduler?.abort(reason);
  }

  setBudgetCeiling(ceiling: number): void {
    this.budget.setCeiling(ceiling);
  }

  restoreRole(role: Role): void {
    this.pools?.restoreRole(role);
  }

  status(): EngineStatus {
    const { events: _events, ...budget } = this.budget.snapshot();
    return {
      runId: this.runId,
      state: this.state,
      topologies: [...this.topologies.values()].map((e) => ({
        ...e.graph.snapshot(),
        trunkRevision: e.workspace.trunk().revision,
        running: e.scheduler?.isRunning ?? false,
        halt: e.scheduler?.report?.halt,
      })),
      workers: this.pools?.occupancy() ?? [],
      budget,
      halt: this.lastReport?.halt,
    };
  }

  get report(): RunReport | undefined {
    return this.lastReport;
  }

  subscribe(listener: (event: EngineEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private resumableEntries(): TopologyEntry[] {
    if (this.state !== "halted") {
      throw new OrchestratorError("RUN_IN_PROGRESS", `Cannot resume a run that is ${this.state}`);
    }
    const entries = [...this.topologies.values()].filter((e) => e.scheduler?.resumable ?? false);
    if (this.budget.exhausted && entries.some((e) => e.scheduler?.report?.halt === "budget-exhausted")) {
      throw new BudgetExceededError(
        `Budget of ${this.budget.limit.toFixed(2)} is spent; raise the ceiling before resuming`,
      );
    }
    return entries;
  }

  private async runSchedulers(entries: TopologyEntry[]): Promise<RunReport> {
    await Promise.all(entries.map((e) => e.scheduler?.run()));

    const finishedAt = Date.now();
    const topologies = [...this.topologies.values()]
      .map((e) => e.scheduler?.report)
      .filter((r): r is TopologyReport => r !== undefined);
    const { total: spent, limit: ceiling } = this.budget;
    const report: RunReport = {
      runId: this.requireRunId(),
      halt: mostSevere(topologies.map((t) => t.halt)),
      topologies,
      spent,
      ceiling,
      startedAt: this.startedAt,
      finishedAt,
      durationMs: finishedAt - this.startedAt,
    };
    this.lastReport = report;
    this.state = "halted";
    this.store?.update(this.record(finishedAt));
    log.info(`Run ${report.runId} halted: ${report.halt}`, { spent, ceiling, durationMs: report.durationMs });
    this.emit({ type: "run:halted", runId: report.runId, report });
    return report;
  }

  private onSchedulerEvent(event: SchedulerEvent): void {
    const runId = this.requireRunId();
    switch (event.type) {
      case "task:dispatched":
        this.callbacks?.onTaskStart?.(event.topology, event.taskId, event.worker);
        break;
      case "task:settled":
        this.callbacks?.onTaskEnd?.(event.topology, event.taskId, event.status, event.summary);
        this.store?.update(this.record());
        break;
      case "topology:halted":
        this.callbacks?.onTopologyHalted?.(event.report);
        break;
      default:
        break;
    }
    this.emit({ runId, ...event });
  }

  private onBudgetEvent(event: BudgetEvent): void {
    const runId = this.runId;
    if (event.type === "ceiling-changed") {
      this.emit({ type: "budget:ceiling", runId, ceiling: event.ceiling, previous: event.previous });
      return;
    }
    if (!runId) return;
    switch (event.type) {
      case "committed":
        this.store?.appendLedgerEvent(runId, event.event);
        this.emit({ type: "budget:committed", runId, taskId: event.event.taskId, delta: event.event.delta, total: event.event.total });
        break;
      case "warn":
        this.callbacks?.onBudgetWarning?.(event.spent, event.ceiling);
        this.emit({ type: "budget:warn", runId, spent: event.spent, warnAt: event.warnAt, ceiling: event.ceiling });
        break;
      case "exceeded":
        this.emit({ type: "budget:exceeded", runId, spent: event.spent, ceiling: event.ceiling });
        break;
    }
  }

  private record(finishedAt?: number): RunRecord {
    return {
      runId: this.requireRunId(),
      topologies: [...this.topologies.keys()],
      state: this.state === "idle" ? "running" : this.state,
      haltReason: this.state === "halted" ? this.lastReport?.halt : undefined,
      report: this.state === "halted" ? this.lastReport : undefined,
      totalCost: this.budget.total,
      startedAt: this.startedAt,
      finishedAt,
    };
  }

  private requireRunId(): string {
    if (!this.runId) throw new OrchestratorError("RUN_IN_PROGRESS", "No run has been started");
    return this.runId;
  }

  private emit(event: EngineEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        log.error("Engine listener threw", { error: errorMessage(err) });
      }
    }
  }
}

function mostSevere(reasons: HaltReason[]): HaltReason {
  let worst = 0;
  for (const r of reasons) worst = Math.max(worst, HALT_REASONS.indexOf(r));
  return HALT_REASONS[worst] ?? "completed";
}

function defaultPipeline(): ValidationPipeline {
  return new ValidationPipeline({
    build: staticRunner("build", true),
    isolatedTest: staticRunner("isolated", true),
    integrationTest: staticRunner("integration", true),
  });
}
