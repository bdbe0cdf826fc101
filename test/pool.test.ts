import { describe, expect, it, vi } from "vitest";
import { WorkerPoolManager, type DegradedAlert, type Worker } from "../src/agents/pool.js";
import { CollaboratorRegistry } from "../src/agents/registry.js";
import { CollaboratorError } from "../src/errors.js";
import type { Snapshot } from "../src/workspace/types.js";
import { fileWorker, makeTask } from "./helpers/fixtures.js";

const snapshot: Snapshot = { revision: 0, files: new Map(), digest: "" };

function manager(...collaborators: ReturnType<typeof fileWorker>[]): WorkerPoolManager {
  const registry = new CollaboratorRegistry();
  for (const c of collaborators) registry.add(c);
  return new WorkerPoolManager(registry, { pools: { developer: 2, tester: 1 }, invokeTimeoutMs: 1_000, degradeAfter: 3 });
}

const failing = () =>
  fileWorker("flaky", ["developer"], 0, async () => {
    throw new Error("model overloaded");
  });

describe("WorkerPoolManager", () => {
  it("creates fixed-size pools only for roles with a collaborator", () => {
    const pools = manager(fileWorker("dev", ["developer"]));
    expect(pools.hasPool("developer")).toBe(true);
    expect(pools.hasPool("tester")).toBe(false);
    expect(pools.workers().map((w) => w.id)).toEqual(["developer-01", "developer-02"]);
  });

  it("backs a role with the first collaborator registered for it", () => {
    const pools = manager(fileWorker("first", ["developer"]), fileWorker("second", ["developer"]));
    expect(pools.workers().map((w) => w.collaborator)).toEqual(["first", "first"]);
  });

  it("never hands out more workers than the pool holds", () => {
    const pools = manager(fileWorker("dev", ["developer"]));
    const a = pools.acquire("developer", "a");
    const b = pools.acquire("developer", "b");
    expect(a?.id).toBe("developer-01");
    expect(b?.id).toBe("developer-02");
    expect(pools.acquire("developer", "c")).toBeUndefined();
    expect(pools.acquire("tester")).toBeUndefined();
    expect(pools.occupancy()).toEqual([
      {
        role: "developer",
        total: 2,
        busy: 2,
        idle: 0,
        degraded: false,
        assignments: { "developer-01": "a", "developer-02": "b" },
      },
    ]);
  });

  it("notifies release listeners and refuses a double release", () => {
    const pools = manager(fileWorker("dev", ["developer"]));
    const released: string[] = [];
    pools.onRelease((w) => released.push(w.id));
    const worker = pools.acquire("developer", "a");
    if (!worker) throw new Error("expected a worker");

    pools.release(worker);
    expect(released).toEqual(["developer-01"]);
    expect(() => pools.release(worker)).toThrow("Worker developer-01 released twice");
  });

  it("refuses a worker it does not own", () => {
    const pools = manager(fileWorker("dev", ["developer"]));
    const stranger: Worker = { id: "developer-09", role: "developer", collaborator: "x", busy: true, tasksRun: 0, costAccrued: 0 };
    expect(() => pools.release(stranger)).toThrow("Worker developer-09 does not belong to this pool");
  });

  it("returns the change-set and cost of a successful invocation", async () => {
    const pools = manager(fileWorker("dev", ["developer"], 2.5));
    const worker = pools.acquire("developer", "a");
    if (!worker) throw new Error("expected a worker");

    const result = await pools.invoke(worker, makeTask("a"), snapshot, new AbortController().signal);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.cost).toBe(2.5);
    expect(result.changeSet.changes).toEqual([{ op: "write", path: "a.txt", content: "output of a" }]);
    expect(worker.tasksRun).toBe(1);
    expect(worker.costAccrued).toBe(2.5);
  });

  it("turns malformed output into a typed error", async () => {
    const pools = manager(
      fileWorker("dev", ["developer"], 0, async () => ({
        changeSet: { changes: [{ op: "write", path: "../etc/passwd", content: "" }] },
        cost: 1,
      })),
    );
    const worker = pools.acquire("developer");
    if (!worker) throw new Error("expected a worker");

    const result = await pools.invoke(worker, makeTask("a"), snapshot, new AbortController().signal);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(CollaboratorError);
    expect(result.error.code).toBe("MALFORMED_OUTPUT");
    expect(result.error.message).toBe("dev: changeSet.changes.0.path: path must not contain '..'");
    expect(result.cost).toBe(1);
    expect(worker.costAccrued).toBe(1);
  });

  it("passes on the cost a failing worker reports", async () => {
    const pools = manager(
      fileWorker("dev", ["developer"], 0, async () => {
        throw new CollaboratorError("COLLABORATOR_FAILED", "billed, then crashed", 0.75);
      }),
    );
    const worker = pools.acquire("developer");
    if (!worker) throw new Error("expected a worker");

    const result = await pools.invoke(worker, makeTask("a"), snapshot, new AbortController().signal);
    expect(result.ok).toBe(false);
    expect(result.cost).toBe(0.75);
  });

  it("degrades a role after consecutive errors and alerts once", async () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const pools = manager(failing());
    const alerts: DegradedAlert[] = [];
    pools.onDegraded((a) => alerts.push(a));
    const worker = pools.acquire("developer");
    if (!worker) throw new Error("expected a worker");

    for (let i = 0; i < 4; i++) {
      const result = await pools.invoke(worker, makeTask("a"), snapshot, new AbortController().signal);
      expect(result.ok).toBe(false);
    }
    expect(pools.isDegraded("developer")).toBe(true);
    expect(pools.degradedRoles()).toEqual(["developer"]);
    expect(alerts).toEqual([{ role: "developer", consecutiveErrors: 3, lastError: "flaky: model overloaded" }]);
    expect(pools.acquire("developer")).toBeUndefined();
    const degradedLines = errors.mock.calls.map((args) => String(args[0])).filter((line) => line.includes("degraded"));
    expect(degradedLines).toHaveLength(1);
    expect(degradedLines[0]).toContain(
      '[ERROR] [pool] Role "developer" degraded after 3 consecutive collaborator errors; needs operator attention',
    );
    errors.mockRestore();
  });

  it("resets the error streak on success", async () => {
    let calls = 0;
    const pools = manager(
      fileWorker("sometimes", ["developer"], 1, async () => {
        calls += 1;
        if (calls % 3 === 0) return { changeSet: { changes: [] }, cost: 0 };
        throw new Error("flake");
      }),
    );
    const worker = pools.acquire("developer");
    if (!worker) throw new Error("expected a worker");
    for (let i = 0; i < 6; i++) await pools.invoke(worker, makeTask("a"), snapshot, new AbortController().signal);
    expect(pools.isDegraded("developer")).toBe(false);
  });

  it("does not count cancellations toward degradation", async () => {
    const pools = manager(
      fileWorker("slow", ["developer"], 0, (_task, _snapshot, opts) =>
        new Promise((_resolve, reject) => {
          opts.signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
        }),
      ),
    );
    const worker = pools.acquire("developer");
    if (!worker) throw new Error("expected a worker");

    for (let i = 0; i < 3; i++) {
      const controller = new AbortController();
      const pending = pools.invoke(worker, makeTask("a"), snapshot, controller.signal);
      controller.abort(new Error("operator abort"));
      const result = await pending;
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("COLLABORATOR_CANCELLED");
    }
    expect(pools.isDegraded("developer")).toBe(false);
  });

  it("puts a restored role back into service and wakes waiters", async () => {
    const pools = manager(failing());
    const worker = pools.acquire("developer");
    if (!worker) throw new Error("expected a worker");
    for (let i = 0; i < 3; i++) await pools.invoke(worker, makeTask("a"), snapshot, new AbortController().signal);
    pools.release(worker);

    const woken: string[] = [];
    pools.onRelease((w) => woken.push(w.id));
    pools.restoreRole("developer");
    expect(pools.isDegraded("developer")).toBe(false);
    expect(woken).toEqual(["developer-01"]);
    expect(pools.acquire("developer")?.id).toBe("developer-01");
  });
});
