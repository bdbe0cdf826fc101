import { getConfig, type PoolSizes } from "../config.js";
import { CollaboratorError, OrchestratorError, errorMessage } from "../errors.js";
import { ROLES, type Role, type Task } from "../planner/types.js";
import { GenerationSchema, formatIssues, reportedCost } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import { raceAbort } from "../utils/retry.js";
import type { ChangeSet, Snapshot } from "../workspace/types.js";
import type { WorkerCollaborator } from "./adapter.js";
import type { CollaboratorRegistry } from "./registry.js";

export type Worker = {
  /** `<role>-NN` */
  id: string;
  role: Role;
  collaborator: string;
  busy: boolean;
  currentTaskId?: string;
  tasksRun: number;
  costAccrued: number;
};

export type InvocationResult =
  | { ok: true; changeSet: ChangeSet; cost: number; durationMs: number }
  | { ok: false; error: CollaboratorError; cost: number; durationMs: number };

export type RoleOccupancy = {
  role: Role;
  total: number;
  busy: number;
  idle: number;
  degraded: boolean;
  /** worker id → task id, for busy workers */
  assignments: Record<string, string>;
};

export type DegradedAlert = {
  role: Role;
  consecutiveErrors: number;
  lastError: string;
};

export type WorkerPoolOptions = {
  pools?: PoolSizes;
  invokeTimeoutMs?: number;
  /** Consecutive collaborator errors that take a role out of service. */
  degradeAfter?: number;
};

type RolePool = {
  collaborator: WorkerCollaborator;
  workers: Worker[];
  errorStreak: number;
  degraded: boolean;
};

const log = createLogger("pool");

/**
 * Fixed-size worker pools, one per role, each backed by the first
 * collaborator registered for that role. Acquisition never blocks; callers
 * subscribe with `onRelease` to learn when capacity frees up.
 */
export class WorkerPoolManager {
  private pools = new Map<Role, RolePool>();
  private releaseListeners = new Set<(worker: Worker) => void>();
  private degradedListeners = new Set<(alert: DegradedAlert) => void>();
  private invokeTimeoutMs: number;
  private degradeAfter: number;

  constructor(registry: CollaboratorRegistry, opts?: WorkerPoolOptions) {
    const config = getConfig().workers;
    const sizes = opts?.pools ?? config.pools;
    this.invokeTimeoutMs = opts?.invokeTimeoutMs ?? config.invokeTimeoutMs;
    this.degradeAfter = opts?.degradeAfter ?? config.degradeAfter;

    for (const role of ROLES) {
      const size = sizes[role] ?? 0;
      const collaborator = registry.forRole(role);
      if (size <= 0 || !collaborator) continue;
      const workers: Worker[] = [];
      for (let i = 1; i <= size; i++) {
        workers.push({
          id: `${role}-${String(i).padStart(2, "0")}`,
          role,
          collaborator: collaborator.name,
          busy: false,
          tasksRun: 0,
          costAccrued: 0,
        });
      }
      this.pools.set(role, { collaborator, workers, errorStreak: 0, degraded: false });
    }
  }

  hasPool(role: Role): boolean {
    return this.pools.has(role);
  }

  /** An idle worker for `role`, marked busy; undefined if none is available. */
  acquire(role: Role, taskId?: string): Worker | undefined {
    const pool = this.pools.get(role);
    if (!pool || pool.degraded) return undefined;
    const worker = pool.workers.find((w) => !w.busy);
    if (!worker) return undefined;
    worker.busy = true;
    worker.currentTaskId = taskId;
    return worker;
  }

  release(worker: Worker): void {
    const owned = this.pools.get(worker.role)?.workers.includes(worker) ?? false;
    if (!owned) {
      throw new OrchestratorError("UNKNOWN_WORKER", `Worker ${worker.id} does not belong to this pool`);
    }
    if (!worker.busy) {
      throw new OrchestratorError("DOUBLE_RELEASE", `Worker ${worker.id} released twice`);
    }
    worker.busy = false;
    worker.currentTaskId = undefined;
    for (const listener of this.releaseListeners) listener(worker);
  }

  /**
   * Run the worker's collaborator on `task`. Never throws: failures come back
   * as `{ ok: false }` with a typed `CollaboratorError`.
   */
  async invoke(worker: Worker, task: Readonly<Task>, snapshot: Snapshot, signal: AbortSignal): Promise<InvocationResult> {
    const pool = this.pools.get(worker.role);
    const start = Date.now();
    if (!pool) {
      const error = new CollaboratorError("NO_COLLABORATOR", `No collaborator serves role "${worker.role}"`);
      return { ok: false, error, cost: 0, durationMs: 0 };
    }

    const deadline = start + this.invokeTimeoutMs;
    const timeout = AbortSignal.timeout(this.invokeTimeoutMs);
    const combined = AbortSignal.any([signal, timeout]);
    worker.tasksRun += 1;

    try {
      const raw = await raceAbort(pool.collaborator.generate(task, snapshot, { signal: combined, deadline }), combined);
      const parsed = GenerationSchema.safeParse(raw);
      if (!parsed.success) {
        throw new CollaboratorError(
          "MALFORMED_OUTPUT",
          `${pool.collaborator.name}: ${formatIssues(parsed.error)}`,
          reportedCost(raw),
        );
      }
      const generation = parsed.data;
      worker.costAccrued += generation.cost;
      pool.errorStreak = 0;
      return { ok: true, changeSet: generation.changeSet, cost: generation.cost, durationMs: Date.now() - start };
    } catch (err) {
      const cost = err instanceof CollaboratorError ? err.cost : 0;
      const error = this.classify(err, signal, timeout);
      worker.costAccrued += cost;
      if (!error.cancelled) this.recordError(worker.role, pool, error);
      log.warn(`Worker ${worker.id} failed on "${task.id}"`, { code: error.code, error: error.message, cost });
      return { ok: false, error, cost, durationMs: Date.now() - start };
    }
  }

  isDegraded(role: Role): boolean {
    return this.pools.get(role)?.degraded ?? false;
  }

  degradedRoles(): Role[] {
    return [...this.pools.entries()].filter(([, p]) => p.degraded).map(([role]) => role);
  }

  /** Put a degraded role back into service (operator action). */
  restoreRole(role: Role): void {
    const pool = this.pools.get(role);
    if (!pool || !pool.degraded) return;
    pool.degraded = false;
    pool.errorStreak = 0;
    log.info(`Role "${role}" restored`);
    const idle = pool.workers.find((w) => !w.busy);
    if (idle) for (const listener of this.releaseListeners) listener(idle);
  }

  occupancy(): RoleOccupancy[] {
    return [...this.pools.entries()].map(([role, pool]) => {
      const assignments: Record<string, string> = {};
      for (const w of pool.workers) {
        if (w.busy && w.currentTaskId !== undefined) assignments[w.id] = w.currentTaskId;
      }
      const busy = pool.workers.filter((w) => w.busy).length;
      return {
        role,
        total: pool.workers.length,
        busy,
        idle: pool.workers.length - busy,
        degraded: pool.degraded,
        assignments,
      };
    });
  }

  workers(): ReadonlyArray<Readonly<Worker>> {
    return [...this.pools.values()].flatMap((p) => p.workers);
  }

  onRelease(listener: (worker: Worker) => void): () => void {
    this.releaseListeners.add(listener);
    return () => {
      this.releaseListeners.delete(listener);
    };
  }

  onDegraded(listener: (alert: DegradedAlert) => void): () => void {
    this.degradedListeners.add(listener);
    return () => {
      this.degradedListeners.delete(listener);
    };
  }

  private classify(err: unknown, caller: AbortSignal, timeout: AbortSignal): CollaboratorError {
    if (caller.aborted) {
      return new CollaboratorError("COLLABORATOR_CANCELLED", `Invocation cancelled: ${errorMessage(caller.reason)}`);
    }
    if (timeout.aborted) {
      return new CollaboratorError("COLLABORATOR_TIMEOUT", `Invocation exceeded ${this.invokeTimeoutMs}ms`);
    }
    if (err instanceof CollaboratorError) return err;
    return new CollaboratorError("COLLABORATOR_FAILED", errorMessage(err));
  }

  private recordError(role: Role, pool: RolePool, error: CollaboratorError): void {
    pool.errorStreak += 1;
    if (pool.degraded || pool.errorStreak < this.degradeAfter) return;
    pool.degraded = true;
    const alert: DegradedAlert = { role, consecutiveErrors: pool.errorStreak, lastError: error.message };
    log.error(`Role "${role}" degraded after ${pool.errorStreak} consecutive collaborator errors; needs operator attention`, {
      lastError: error.message,
    });
    for (const listener of this.degradedListeners) listener(alert);
  }
}
