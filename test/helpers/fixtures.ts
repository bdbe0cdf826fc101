import { FunctionCollaborator, type WorkerFunction } from "../../src/agents/function-adapter.js";
import type { Role, Task, TaskResult, TopologyDescriptor } from "../../src/planner/types.js";
import type { ChangeSet } from "../../src/workspace/types.js";

type TaskSpec = {
  id: string;
  role?: Role;
  dependsOn?: string[];
  maxAttempts?: number;
  estimatedCost?: number;
};

export function topology(name: string, tasks: TaskSpec[]): TopologyDescriptor {
  return {
    topology: name,
    tasks: tasks.map((t) => ({
      id: t.id,
      role: t.role ?? "developer",
      dependsOn: t.dependsOn ?? [],
      maxAttempts: t.maxAttempts,
      estimatedCost: t.estimatedCost,
    })),
  };
}

/** A dispatched task as a worker sees it. */
export function makeTask(id: string, overrides?: Partial<Task>): Task {
  return {
    id,
    title: id,
    role: "developer",
    topology: "t",
    dependsOn: [],
    status: "dispatched",
    attempts: 0,
    maxAttempts: 3,
    costAccrued: 0,
    remainingDeps: 0,
    ...overrides,
  };
}

export function result(status: TaskResult["status"], cost = 0): TaskResult {
  return { status, summary: status, cost, at: 0 };
}

export function writeChange(path: string, content: string): ChangeSet {
  return { summary: `write ${path}`, changes: [{ op: "write", path, content }] };
}

/** A worker that writes `<task id>.txt` and reports a fixed cost. */
export function fileWorker(name: string, roles: Role[], cost = 1, fn?: WorkerFunction): FunctionCollaborator {
  return new FunctionCollaborator({
    name,
    roles,
    timeout: 5_000,
    fn: fn ?? (async (task) => ({ changeSet: writeChange(`${task.id}.txt`, `output of ${task.id}`), cost })),
  });
}

/** Resolves after pending microtasks and one macrotask turn. */
export function tick(ms = 0): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
