import type { InvocationResult, Worker, WorkerPoolManager } from "../agents/pool.js";
import type { BudgetGovernor } from "../budget/governor.js";
import { getConfig } from "../config.js";
import { ConflictError, OrchestratorError, WorkspaceCorruptionError, errorMessage } from "../errors.js";
import type { TaskGraph } from "../planner/task-graph.js";
import type { Task, TaskResult } from "../planner/types.js";
import { createLogger, type Logger } from "../utils/logger.js";
import type { BackoffOptions } from "../utils/retry.js";
import { Wakeup } from "../utils/wakeup.js";
import type { ValidationPipeline } from "../validation/pipeline.js";
import type { Branch, ChangeSet, WorkspaceStore } from "../workspace/types.js";
import { decideRetry } from "./retry-policy.js";
import type {
  AttemptOutcome,
  CarriedChangeSet,
  HaltReason,
  SchedulerEvent,
  TopologyReport,
} from "./types.js";

export type SchedulerOptions = {
  graph: TaskGraph;
  workspace: WorkspaceStore;
  pools: WorkerPoolManager;
  budget: BudgetGovernor;
  pipeline: ValidationPipeline;
  backoff?: BackoffOptions;
  /** Estimate used by `canSpend` for tasks that declare none. */
  defaultTaskEstimate?: number;
  onEvent?: (event: SchedulerEvent) => void;
};

type Blocker = "budget" | "capacity" | "degraded";

/**
 * The control loop of one topology. Several schedulers may share one
 * budget governor and one pool manager; each owns its graph and workspace.
 *
 * `run()` resolves with a report once the topology is settled or cannot make
 * progress. It never rejects for task-local failures and may be called again
 * after a pause (budget raised, roles restored, abort lifted).
 */
export class Scheduler {
  readonly topology: string;
  private graph: TaskGraph;
  private workspace: WorkspaceStore;
  private pools: WorkerPoolManager;
  private budget: BudgetGovernor;
  private pipeline: ValidationPipeline;
  private backoff: BackoffOptions;
  private defaultTaskEstimate: number;
  private onEvent?: (event: SchedulerEvent) => void;
  private log: Logger;

  private wakeup = new Wakeup();
  private inFlight = new Map<string, Promise<void>>();
  private retryTimers = new Map<string, NodeJS.Timeout>();
  private carried = new Map<string, CarriedChangeSet>();
  private running = false;
  /** Aborted by the operator or by workspace corruption: cancels invocations and validation. */
  private stopCtl = new AbortController();
  /** Aborted when spend passes the ceiling: cancels invocations only. */
  private budgetCtl = new AbortController();
  private fatal?: { reason: "aborted" | "workspace-corruption"; message: string };
  private lastReport?: TopologyReport;

  constructor(opts: SchedulerOptions) {
    this.graph = opts.graph;
    this.topology = opts.graph.topology;
    this.workspace = opts.workspace;
    this.pools = opts.pools;
    this.budget = opts.budget;
    this.pipeline = opts.pipeline;
    this.backoff = opts.backoff ?? getConfig().retry;
    this.defaultTaskEstimate = opts.defaultTaskEstimate ?? getConfig().budget.defaultTaskEstimate;
    this.onEvent = opts.onEvent;
    this.log = createLogger(`scheduler:${this.topology}`);

    for (const task of this.graph.tasks()) {
      if (!this.pools.hasPool(task.role)) {
        throw new OrchestratorError(
          "NO_COLLABORATOR",
          `Task "${task.id}" needs role "${task.role}" but no worker pool serves it`,
        );
      }
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  get report(): TopologyReport | undefined {
    return this.lastReport;
  }

  /** Corruption is not recoverable; every other halt can be resumed with another `run()`. */
  get resumable(): boolean {
    return !this.running && this.lastReport !== undefined && this.lastReport.halt !== "completed" &&
      this.lastReport.halt !== "incomplete" && this.lastReport.halt !== "workspace-corruption";
  }

  async run(): Promise<TopologyReport> {
    if (this.running) {
      throw new OrchestratorError("ILLEGAL_TRANSITION", `Scheduler for "${this.topology}" is already running`);
    }
    if (this.lastReport?.halt === "workspace-corruption") {
      throw new WorkspaceCorruptionError(`Topology "${this.topology}" halted on workspace corruption and cannot resume`);
    }
    this.running = true;
    this.fatal = undefined;
    this.stopCtl = new AbortController();
    this.budgetCtl = new AbortController();
    this.graph.activate();

    const unsubscribe = [
      this.pools.onRelease(() => this.wakeup.notify()),
      this.budget.subscribe((event) => {
        if (event.type === "exceeded") this.budgetCtl.abort(new Error("budget ceiling exceeded"));
        this.wakeup.notify();
      }),
    ];
    this.log.info(`Starting with ${this.graph.size} tasks`, { counts: this.graph.counts() });

    let halt: HaltReason;
    try {
      halt = await this.loop();
      await this.drain();
    } finally {
      for (const off of unsubscribe) off();
      this.flushRetryTimers();
      this.graph.deactivate();
      this.running = false;
    }

    // `loop()` may set `fatal`; read it through an un-narrowed reference.
    const self: Scheduler = this;
    const report = this.buildReport(self.fatal?.reason ?? halt);
    this.lastReport = report;
    this.log.info(`Halted: ${report.halt}`, {
      completed: report.completed,
      failedTerminal: report.failedTerminal,
      blockedByAncestor: report.blockedByAncestor,
      pending: report.pending,
    });
    this.emit({ type: "topology:halted", topology: this.topology, report });
    return report;
  }

  /** Cancel in-flight work and stop dispatching. `run()` resolves once everything in flight has settled. */
  abort(reason = "aborted by operator"): void {
    if (!this.running) return;
    this.stop("aborted", reason);
  }

  private async loop(): Promise<HaltReason> {
    for (;;) {
      if (this.fatal) return this.fatal.reason;
      if (this.graph.isSettled()) return this.settledReason();

      const blockers = this.dispatchReady();
      if (this.inFlight.size > 0 || this.retryTimers.size > 0 || blockers.has("capacity")) {
        await this.wakeup.wait();
        continue;
      }
      if (this.graph.isSettled()) return this.settledReason();
      if (blockers.has("budget")) return "budget-exhausted";
      if (blockers.has("degraded")) return "roles-degraded";
      // No ready task, nothing running: only possible if something outside the loop holds a task.
      return "incomplete";
    }
  }

  private settledReason(): HaltReason {
    return this.graph.tasks().every((t) => t.status === "completed") ? "completed" : "incomplete";
  }

  /** One pass over the ready set. Returns what kept ready tasks from being dispatched. */
  private dispatchReady(): Set<Blocker> {
    const blockers = new Set<Blocker>();
    for (const id of this.graph.readyTasks()) {
      if (this.fatal) break;
      const task = this.graph.get(id);
      if (!task) continue;

      const carried = this.carried.get(id);
      if (carried) {
        this.carried.delete(id);
        this.start(task, undefined, carried);
        continue;
      }

      if (this.budgetCtl.signal.aborted || !this.budget.canSpend(task.estimatedCost ?? this.defaultTaskEstimate)) {
        blockers.add("budget");
        break;
      }
      const worker = this.pools.acquire(task.role, id);
      if (!worker) {
        blockers.add(this.pools.isDegraded(task.role) ? "degraded" : "capacity");
        continue;
      }
      this.start(task, worker, undefined);
    }
    return blockers;
  }

  private start(task: Readonly<Task>, worker: Worker | undefined, carried: CarriedChangeSet | undefined): void {
    this.graph.markDispatched(task.id);
    this.emit({
      type: "task:dispatched",
      topology: this.topology,
      taskId: task.id,
      worker: worker?.id,
      attempt: task.attempts + 1,
    });
    const work = this.attempt(task, worker, carried)
      .catch((err: unknown) => {
        // Only reached on a bug in the settle path itself; keep the loop alive.
        this.log.error(`Unexpected failure settling "${task.id}"`, { error: errorMessage(err) });
      })
      .finally(() => {
        this.inFlight.delete(task.id);
        this.wakeup.notify();
      });
    this.inFlight.set(task.id, work);
  }

  private async attempt(task: Readonly<Task>, worker: Worker | undefined, carried: CarriedChangeSet | undefined): Promise<void> {
    let outcome: AttemptOutcome;
    let branch: Branch | undefined;
    // Cost committed by this attempt, kept when a later step throws.
    const spent = { cost: 0 };
    try {
      branch = this.workspace.openBranch(task.id);
      outcome = await this.execute(task, branch, worker, carried, spent);
    } catch (err) {
      outcome = this.outcomeFromError(task, err, spent.cost);
    } finally {
      if (branch) this.workspace.discard(branch);
    }

    try {
      this.settle(task, outcome, carried);
    } finally {
      if (worker) this.pools.release(worker);
    }
  }

  private async execute(
    task: Readonly<Task>,
    branch: Branch,
    worker: Worker | undefined,
    carried: CarriedChangeSet | undefined,
    spent: { cost: number },
  ): Promise<AttemptOutcome> {
    let changeSet: ChangeSet;
    let cost = 0;

    if (carried) {
      changeSet = carried.changeSet;
      this.log.debug(`Revalidating carried change-set for "${task.id}" on r${branch.base.revision}`);
    } else if (worker) {
      const signal = AbortSignal.any([this.stopCtl.signal, this.budgetCtl.signal]);
      const invocation: InvocationResult = await this.pools.invoke(worker, task, branch.base, signal);
      cost = invocation.cost;
      if (cost > 0) this.budget.commit(task.id, cost);
      spent.cost = cost;
      if (!invocation.ok) {
        if (invocation.error.cancelled) return { kind: "cancelled", detail: invocation.error.message, cost };
        return { kind: "rejected", reason: "collaborator-error", detail: invocation.error.message, cost };
      }
      changeSet = invocation.changeSet;
    } else {
      throw new OrchestratorError("NO_COLLABORATOR", `Task "${task.id}" dispatched without a worker`);
    }

    this.workspace.propose(branch, changeSet);
    this.graph.markValidating(task.id);
    this.emit({ type: "task:validating", topology: this.topology, taskId: task.id });

    const validation = await this.pipeline.validate(changeSet, branch.base, this.workspace.trunk(), this.stopCtl.signal);
    if (!validation.accepted) {
      const reason = validation.composition ? "composition" : "validation";
      const step = validation.failedStage ?? "build";
      return {
        kind: "rejected",
        reason,
        detail: reason === "composition"
          ? `Isolated tests passed but integration on r${validation.trunkRevision} failed`
          : `${step} failed: ${lastLine(validation[step]?.log ?? "")}`,
        validation,
        changeSet,
        cost,
      };
    }

    try {
      const commit = await this.workspace.merge(branch);
      return { kind: "accepted", commit, validation, cost };
    } catch (err) {
      if (err instanceof ConflictError) {
        return { kind: "conflicted", detail: err.message, changeSet, cost };
      }
      throw err;
    }
  }

  private outcomeFromError(task: Readonly<Task>, err: unknown, cost: number): AttemptOutcome {
    if (err instanceof WorkspaceCorruptionError) {
      this.log.error(`Workspace corruption while merging "${task.id}"`, { error: err.message });
      this.stop("workspace-corruption", err.message);
      return { kind: "cancelled", detail: err.message, cost };
    }
    if (this.stopCtl.signal.aborted) {
      return { kind: "cancelled", detail: errorMessage(this.stopCtl.signal.reason), cost };
    }
    this.log.error(`Attempt on "${task.id}" failed unexpectedly`, { error: errorMessage(err) });
    return { kind: "rejected", reason: "collaborator-error", detail: errorMessage(err), cost };
  }

  private settle(task: Readonly<Task>, outcome: AttemptOutcome, carried: CarriedChangeSet | undefined): void {
    const result = toTaskResult(outcome);

    if (outcome.kind === "accepted") {
      this.carried.delete(task.id);
      this.graph.markCompleted(task.id, result);
      this.log.info(`Task "${task.id}" completed as r${outcome.commit.revision}`);
      this.emitSettled(task.id, outcome, result);
      return;
    }

    const decision = decideRetry(task, outcome, { ...this.backoff, rebased: carried?.rebased ?? false });
    if (decision.kind === "retry") {
      this.graph.markFailed(task.id, result, true, { countAttempt: decision.countAttempt });
      const changeSet = outcome.kind === "conflicted" || outcome.kind === "rejected" ? outcome.changeSet : undefined;
      if (decision.carryChangeSet && changeSet) {
        // A composition rebase is granted once per change-set; a conflict keeps whatever was granted.
        const rebased = outcome.kind === "rejected" || (carried?.rebased ?? false);
        this.carried.set(task.id, { changeSet, rebased });
      } else {
        this.carried.delete(task.id);
      }
      this.scheduleRetry(task.id, decision.delayMs);
    } else {
      this.carried.delete(task.id);
      this.graph.markFailed(task.id, result, false);
      this.log.warn(`Task "${task.id}" failed terminally after ${this.graph.get(task.id)?.attempts ?? 0} attempts`, {
        summary: result.summary,
      });
    }
    this.emitSettled(task.id, outcome, result);
  }

  private scheduleRetry(id: string, delayMs: number): void {
    if (delayMs <= 0 || this.fatal) {
      this.graph.markRetryReady(id);
      return;
    }
    this.emit({ type: "task:retry-scheduled", topology: this.topology, taskId: id, delayMs });
    const timer = setTimeout(() => {
      this.retryTimers.delete(id);
      this.graph.markRetryReady(id);
      this.wakeup.notify();
    }, delayMs);
    this.retryTimers.set(id, timer);
  }

  /** On halt, pending backoffs are cut short so a resumed run finds the tasks ready. */
  private flushRetryTimers(): void {
    for (const [id, timer] of this.retryTimers) {
      clearTimeout(timer);
      this.graph.markRetryReady(id);
    }
    this.retryTimers.clear();
  }

  private async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight.values()]);
    }
  }

  private stop(reason: "aborted" | "workspace-corruption", message: string): void {
    if (!this.fatal || reason === "workspace-corruption") this.fatal = { reason, message };
    this.stopCtl.abort(new Error(message));
    this.wakeup.notify();
  }

  private buildReport(halt: HaltReason): TopologyReport {
    const counts = this.graph.counts();
    const completed = counts.completed;
    const failedTerminal = counts["failed-terminal"];
    const blockedByAncestor = counts["blocked-by-ancestor"];
    return {
      topology: this.topology,
      halt,
      counts,
      completed,
      failedTerminal,
      blockedByAncestor,
      pending: this.graph.size - completed - failedTerminal - blockedByAncestor,
      costAccrued: this.graph.tasks().reduce((sum, t) => sum + t.costAccrued, 0),
      trunkRevision: this.workspace.trunk().revision,
      error: halt === "workspace-corruption" || halt === "aborted" ? this.fatal?.message : undefined,
    };
  }

  private emitSettled(taskId: string, outcome: AttemptOutcome, result: TaskResult): void {
    this.emit({
      type: "task:settled",
      topology: this.topology,
      taskId,
      outcome: outcome.kind,
      status: this.graph.get(taskId)?.status ?? "unknown",
      summary: result.summary,
    });
  }

  private emit(event: SchedulerEvent): void {
    if (!this.onEvent) return;
    try {
      this.onEvent(event);
    } catch (err) {
      this.log.error("Event listener threw", { error: errorMessage(err) });
    }
  }
}

function toTaskResult(outcome: AttemptOutcome): TaskResult {
  const at = Date.now();
  switch (outcome.kind) {
    case "accepted":
      return {
        status: "accepted",
        summary: outcome.commit.message,
        validation: outcome.validation,
        mergedRevision: outcome.commit.revision,
        cost: outcome.cost,
        at,
      };
    case "rejected":
      return {
        status: outcome.reason === "collaborator-error" ? "error" : "rejected",
        summary: outcome.detail,
        validation: outcome.validation,
        cost: outcome.cost,
        at,
      };
    case "conflicted":
    case "cancelled":
      return { status: outcome.kind, summary: outcome.detail, cost: outcome.cost, at };
  }
}

function lastLine(text: string): string {
  const lines = text.trim().split("\n");
  return lines[lines.length - 1] ?? "";
}
