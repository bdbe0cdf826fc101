import { getConfig } from "../config.js";
import {
  CyclicGraphError,
  GraphDefinitionError,
  IllegalTransitionError,
  OrchestratorError,
  UnknownDependencyError,
} from "../errors.js";
import type {
  GraphSnapshot,
  StatusCounts,
  Task,
  TaskResult,
  TaskStatus,
  TaskSummary,
  TopologyDescriptor,
} from "./types.js";
import { TERMINAL_STATUSES } from "./types.js";

export type BuildGraphOptions = {
  /** Applied to tasks that declare no `maxAttempts`. Defaults to `retry.maxAttempts`. */
  defaultMaxAttempts?: number;
};

export type MarkFailedOptions = {
  /** Merge conflicts and cancellations are infrastructure events, not worker defects. */
  countAttempt?: boolean;
};

const DISPATCHABLE: ReadonlySet<TaskStatus> = new Set(["pending", "blocked", "ready"]);
const IN_FLIGHT: ReadonlySet<TaskStatus> = new Set(["dispatched", "validating"]);

/**
 * The dependency graph of one topology.
 *
 * Tasks keep their declaration order, which is also the order `readyTasks`
 * reports them in. Every status change goes through one of the `mark*`
 * methods; each checks the transition and throws `IllegalTransitionError`
 * otherwise.
 */
export class TaskGraph {
  readonly topology: string;
  readonly description?: string;
  private nodes = new Map<string, Task>();
  /** task → tasks that depend on it */
  private dependents = new Map<string, string[]>();
  private active = true;

  private constructor(topology: string, description?: string) {
    this.topology = topology;
    this.description = description;
  }

  /** Build a graph from a descriptor. Nothing is returned unless the whole descriptor is valid. */
  static build(descriptor: TopologyDescriptor, opts?: BuildGraphOptions): TaskGraph {
    const defaultMaxAttempts = opts?.defaultMaxAttempts ?? getConfig().retry.maxAttempts;
    const graph = new TaskGraph(descriptor.topology, descriptor.description);

    for (const t of descriptor.tasks) {
      if (graph.nodes.has(t.id)) {
        throw new GraphDefinitionError("DUPLICATE_TASK", `Task "${t.id}" is declared more than once`);
      }
      const dependsOn = [...new Set(t.dependsOn ?? [])];
      if (dependsOn.includes(t.id)) {
        throw new GraphDefinitionError("SELF_DEPENDENCY", `Task "${t.id}" depends on itself`);
      }
      graph.nodes.set(t.id, {
        id: t.id,
        title: t.title ?? t.id,
        description: t.description,
        role: t.role,
        topology: descriptor.topology,
        dependsOn,
        status: dependsOn.length === 0 ? "pending" : "blocked",
        attempts: 0,
        maxAttempts: t.maxAttempts ?? defaultMaxAttempts,
        estimatedCost: t.estimatedCost,
        costAccrued: 0,
        remainingDeps: dependsOn.length,
        input: t.input,
      });
    }

    for (const node of graph.nodes.values()) {
      for (const dep of node.dependsOn) {
        if (!graph.nodes.has(dep)) {
          throw new UnknownDependencyError(node.id, dep);
        }
        const list = graph.dependents.get(dep) ?? [];
        list.push(node.id);
        graph.dependents.set(dep, list);
      }
    }

    graph.topologicalOrder();
    return graph;
  }

  /** Task ids in dependency order (Kahn). Throws `CyclicGraphError` naming the unsorted tasks. */
  topologicalOrder(): string[] {
    const inDegree = new Map<string, number>();
    for (const node of this.nodes.values()) inDegree.set(node.id, node.dependsOn.length);

    const queue = [...this.nodes.values()].filter((n) => n.dependsOn.length === 0).map((n) => n.id);
    const order: string[] = [];

    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined) break;
      order.push(id);
      for (const next of this.dependents.get(id) ?? []) {
        const remaining = (inDegree.get(next) ?? 0) - 1;
        inDegree.set(next, remaining);
        if (remaining === 0) queue.push(next);
      }
    }

    if (order.length !== this.nodes.size) {
      const sorted = new Set(order);
      throw new CyclicGraphError([...this.nodes.keys()].filter((id) => !sorted.has(id)));
    }
    return order;
  }

  /** Dispatchable task ids in declaration order. Empty while the topology is inactive. */
  readyTasks(): string[] {
    if (!this.active) return [];
    const ready: string[] = [];
    for (const node of this.nodes.values()) {
      if (DISPATCHABLE.has(node.status) && node.remainingDeps === 0) ready.push(node.id);
    }
    return ready;
  }

  markDispatched(id: string): void {
    const node = this.require(id);
    if (!DISPATCHABLE.has(node.status) || node.remainingDeps > 0) {
      throw new IllegalTransitionError(id, node.status, "dispatched");
    }
    node.status = "dispatched";
  }

  markValidating(id: string): void {
    const node = this.require(id);
    if (node.status !== "dispatched") {
      throw new IllegalTransitionError(id, node.status, "validating");
    }
    node.status = "validating";
  }

  /** Completes a task and unlocks dependents whose last outstanding dependency it was. */
  markCompleted(id: string, result: TaskResult): void {
    const node = this.require(id);
    if (!IN_FLIGHT.has(node.status)) {
      throw new IllegalTransitionError(id, node.status, "completed");
    }
    node.status = "completed";
    node.lastResult = result;
    node.costAccrued += result.cost;

    for (const depId of this.dependents.get(id) ?? []) {
      const dependent = this.require(depId);
      if (TERMINAL_STATUSES.has(dependent.status)) continue;
      dependent.remainingDeps -= 1;
      if (dependent.remainingDeps === 0 && dependent.status === "blocked") {
        dependent.status = "pending";
      }
    }
  }

  /**
   * Record a failed attempt. A terminal failure blocks every transitive
   * dependent; those tasks never become ready.
   */
  markFailed(id: string, result: TaskResult, retryable: boolean, opts?: MarkFailedOptions): void {
    const node = this.require(id);
    const to: TaskStatus = retryable ? "failed-retryable" : "failed-terminal";
    if (!IN_FLIGHT.has(node.status)) {
      throw new IllegalTransitionError(id, node.status, to);
    }
    if (opts?.countAttempt ?? true) node.attempts += 1;
    node.status = to;
    node.lastResult = result;
    node.costAccrued += result.cost;

    if (!retryable) this.blockDownstream(id);
  }

  /** Return a retryable failure to the ready set once its backoff has elapsed. */
  markRetryReady(id: string): void {
    const node = this.require(id);
    if (node.status !== "failed-retryable") {
      throw new IllegalTransitionError(id, node.status, "ready");
    }
    node.status = "ready";
  }

  private blockDownstream(failedId: string): void {
    const queue = [...(this.dependents.get(failedId) ?? [])];
    const visited = new Set<string>();

    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined || visited.has(id)) continue;
      visited.add(id);
      const node = this.require(id);
      if (!TERMINAL_STATUSES.has(node.status)) {
        node.status = "blocked-by-ancestor";
      }
      queue.push(...(this.dependents.get(id) ?? []));
    }
  }

  deactivate(): void {
    this.active = false;
  }

  activate(): void {
    this.active = true;
  }

  get isActive(): boolean {
    return this.active;
  }

  get(id: string): Readonly<Task> | undefined {
    return this.nodes.get(id);
  }

  tasks(): ReadonlyArray<Readonly<Task>> {
    return [...this.nodes.values()];
  }

  get size(): number {
    return this.nodes.size;
  }

  dependentsOf(id: string): string[] {
    this.require(id);
    return [...(this.dependents.get(id) ?? [])];
  }

  inFlight(): string[] {
    return [...this.nodes.values()].filter((n) => IN_FLIGHT.has(n.status)).map((n) => n.id);
  }

  /** True once every task is completed, failed-terminal or blocked by an ancestor. */
  isSettled(): boolean {
    for (const node of this.nodes.values()) {
      if (!TERMINAL_STATUSES.has(node.status)) return false;
    }
    return true;
  }

  counts(): StatusCounts {
    const counts: StatusCounts = {
      pending: 0,
      blocked: 0,
      ready: 0,
      dispatched: 0,
      validating: 0,
      completed: 0,
      "failed-retryable": 0,
      "failed-terminal": 0,
      "blocked-by-ancestor": 0,
    };
    for (const node of this.nodes.values()) counts[node.status] += 1;
    return counts;
  }

  snapshot(): GraphSnapshot {
    return {
      topology: this.topology,
      active: this.active,
      counts: this.counts(),
      tasks: [...this.nodes.values()].map(summarize),
    };
  }

  private require(id: string): Task {
    const node = this.nodes.get(id);
    if (!node) {
      throw new OrchestratorError("UNKNOWN_TASK", `Unknown task "${id}" in topology "${this.topology}"`);
    }
    return node;
  }
}

function summarize(node: Task): TaskSummary {
  return {
    id: node.id,
    title: node.title,
    role: node.role,
    status: node.status,
    attempts: node.attempts,
    maxAttempts: node.maxAttempts,
    costAccrued: node.costAccrued,
    dependsOn: [...node.dependsOn],
    lastResult: node.lastResult,
  };
}

/** Construct tasks and edges from a static descriptor. */
export function buildGraph(descriptor: TopologyDescriptor, opts?: BuildGraphOptions): TaskGraph {
  return TaskGraph.build(descriptor, opts);
}
