import { describe, expect, it } from "vitest";
import { CyclicGraphError, GraphDefinitionError, IllegalTransitionError, UnknownDependencyError } from "../src/errors.js";
import { TaskGraph, buildGraph } from "../src/planner/task-graph.js";
import { result, topology } from "./helpers/fixtures.js";

describe("buildGraph", () => {
  it("starts tasks without dependencies as pending and the rest as blocked", () => {
    const graph = buildGraph(topology("t", [{ id: "a" }, { id: "b", dependsOn: ["a"] }]));

    expect(graph.size).toBe(2);
    expect(graph.get("a")?.status).toBe("pending");
    expect(graph.get("b")?.status).toBe("blocked");
    expect(graph.get("b")?.remainingDeps).toBe(1);
    expect(graph.get("a")?.maxAttempts).toBe(3);
  });

  it("reports exactly the tasks with empty dependsOn as initially ready", () => {
    const graph = buildGraph(
      topology("t", [{ id: "a" }, { id: "b", dependsOn: ["a"] }, { id: "c" }, { id: "d", dependsOn: ["b", "c"] }]),
    );
    expect(graph.readyTasks()).toEqual(["a", "c"]);
  });

  it("throws on an unknown dependency", () => {
    const build = () => buildGraph(topology("t", [{ id: "a", dependsOn: ["nope"] }]));
    expect(build).toThrow(UnknownDependencyError);
    expect(build).toThrow('Task "a" depends on unknown task "nope"');
  });

  it("throws on self-dependency", () => {
    expect(() => buildGraph(topology("t", [{ id: "a", dependsOn: ["a"] }]))).toThrow('Task "a" depends on itself');
  });

  it("throws on duplicate ids", () => {
    const build = () => buildGraph(topology("t", [{ id: "a" }, { id: "a" }]));
    expect(build).toThrow(GraphDefinitionError);
    expect(build).toThrow('Task "a" is declared more than once');
  });

  it("throws CyclicGraphError naming the tasks on the cycle", () => {
    let caught: unknown;
    try {
      buildGraph(topology("t", [{ id: "a", dependsOn: ["b"] }, { id: "b", dependsOn: ["a"] }, { id: "c" }]));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CyclicGraphError);
    expect(caught).toBeInstanceOf(GraphDefinitionError);
    if (caught instanceof CyclicGraphError) {
      expect(caught.taskIds).toEqual(["a", "b"]);
      expect(caught.code).toBe("CYCLIC_GRAPH");
    }
  });

  it("collapses repeated dependencies", () => {
    const graph = buildGraph(topology("t", [{ id: "a" }, { id: "b", dependsOn: ["a", "a"] }]));
    expect(graph.get("b")?.dependsOn).toEqual(["a"]);
    expect(graph.get("b")?.remainingDeps).toBe(1);
  });
});

describe("TaskGraph", () => {
  const diamond = () =>
    TaskGraph.build(topology("t", [{ id: "a" }, { id: "b" }, { id: "c", dependsOn: ["a", "b"] }]));

  it("returns the same ready set on repeated reads", () => {
    const graph = diamond();
    expect(graph.readyTasks()).toEqual(["a", "b"]);
    expect(graph.readyTasks()).toEqual(["a", "b"]);
  });

  it("orders tasks topologically", () => {
    const graph = TaskGraph.build(topology("t", [{ id: "c", dependsOn: ["b"] }, { id: "b", dependsOn: ["a"] }, { id: "a" }]));
    expect(graph.topologicalOrder()).toEqual(["a", "b", "c"]);
  });

  it("unlocks a dependent only after its last dependency completes", () => {
    const graph = diamond();
    graph.markDispatched("a");
    expect(graph.readyTasks()).toEqual(["b"]);

    graph.markCompleted("a", result("accepted"));
    expect(graph.get("c")?.remainingDeps).toBe(1);
    expect(graph.get("c")?.status).toBe("blocked");
    expect(graph.readyTasks()).toEqual(["b"]);

    graph.markDispatched("b");
    graph.markValidating("b");
    graph.markCompleted("b", result("accepted"));
    expect(graph.get("c")?.remainingDeps).toBe(0);
    expect(graph.get("c")?.status).toBe("pending");
    expect(graph.readyTasks()).toEqual(["c"]);
  });

  it("refuses to complete a task twice, so dependents are unlocked once", () => {
    const graph = diamond();
    graph.markDispatched("a");
    graph.markCompleted("a", result("accepted"));
    expect(() => graph.markCompleted("a", result("accepted"))).toThrow(IllegalTransitionError);
    expect(graph.get("c")?.remainingDeps).toBe(1);
  });

  it("refuses to dispatch a task with outstanding dependencies", () => {
    const graph = diamond();
    expect(() => graph.markDispatched("c")).toThrow('Task "c" cannot move from blocked to dispatched');
  });

  it("refuses to validate a task that was never dispatched", () => {
    const graph = diamond();
    expect(() => graph.markValidating("a")).toThrow(IllegalTransitionError);
  });

  it("blocks every transitive dependent of a terminal failure", () => {
    const graph = TaskGraph.build(
      topology("t", [{ id: "a" }, { id: "b", dependsOn: ["a"] }, { id: "c", dependsOn: ["b"] }, { id: "d" }]),
    );
    graph.markDispatched("a");
    graph.markFailed("a", result("rejected"), false);

    expect(graph.get("a")?.status).toBe("failed-terminal");
    expect(graph.get("a")?.attempts).toBe(1);
    expect(graph.get("b")?.status).toBe("blocked-by-ancestor");
    expect(graph.get("c")?.status).toBe("blocked-by-ancestor");
    expect(graph.readyTasks()).toEqual(["d"]);
    expect(graph.isSettled()).toBe(false);

    graph.markDispatched("d");
    graph.markCompleted("d", result("accepted"));
    expect(graph.isSettled()).toBe(true);
    expect(graph.counts()).toMatchObject({ completed: 1, "failed-terminal": 1, "blocked-by-ancestor": 2 });
  });

  it("keeps a retryable failure out of the ready set until it is marked ready", () => {
    const graph = diamond();
    graph.markDispatched("a");
    graph.markFailed("a", result("rejected", 0.5), true);

    expect(graph.get("a")?.status).toBe("failed-retryable");
    expect(graph.get("a")?.attempts).toBe(1);
    expect(graph.get("a")?.costAccrued).toBe(0.5);
    expect(graph.readyTasks()).toEqual(["b"]);

    graph.markRetryReady("a");
    expect(graph.get("a")?.status).toBe("ready");
    expect(graph.readyTasks()).toEqual(["a", "b"]);
  });

  it("does not count an attempt when asked not to", () => {
    const graph = diamond();
    graph.markDispatched("a");
    graph.markFailed("a", result("conflicted"), true, { countAttempt: false });
    expect(graph.get("a")?.attempts).toBe(0);
  });

  it("reports nothing ready while inactive", () => {
    const graph = diamond();
    graph.deactivate();
    expect(graph.readyTasks()).toEqual([]);
    graph.activate();
    expect(graph.readyTasks()).toEqual(["a", "b"]);
  });

  it("lists in-flight tasks and dependents", () => {
    const graph = diamond();
    graph.markDispatched("b");
    expect(graph.inFlight()).toEqual(["b"]);
    expect(graph.dependentsOf("a")).toEqual(["c"]);
    expect(() => graph.dependentsOf("zzz")).toThrow('Unknown task "zzz" in topology "t"');
  });

  it("summarises tasks in a snapshot", () => {
    const snapshot = diamond().snapshot();
    expect(snapshot.topology).toBe("t");
    expect(snapshot.active).toBe(true);
    expect(snapshot.counts.pending).toBe(2);
    expect(snapshot.counts.blocked).toBe(1);
    expect(snapshot.tasks.map((t) => t.id)).toEqual(["a", "b", "c"]);
  });
});
