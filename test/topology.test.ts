import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { GraphDefinitionError } from "../src/errors.js";
import { TaskGraph } from "../src/planner/task-graph.js";
import { isBundledTopology, loadTopologyFile, parseTopology, resolveTopology } from "../src/planner/topology.js";

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "topology-test-"));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("parseTopology", () => {
  it("fills in defaults", () => {
    const descriptor = parseTopology({ topology: "t", tasks: [{ id: "a", role: "developer" }] });
    expect(descriptor.tasks[0]?.dependsOn).toEqual([]);
  });

  it("rejects an unknown role with the offending path", () => {
    const parse = () => parseTopology({ topology: "t", tasks: [{ id: "a", role: "wizard" }] });
    expect(parse).toThrow(GraphDefinitionError);
    expect(parse).toThrow(/^Invalid topology descriptor: tasks\.0\.role: /);
  });

  it("rejects an empty task list", () => {
    expect(() => parseTopology({ topology: "t", tasks: [] })).toThrow(
      "Invalid topology descriptor: tasks: a topology needs at least one task",
    );
  });
});

describe("loadTopologyFile", () => {
  it("reads a descriptor from disk", async () => {
    const path = join(dir, "small.json");
    await writeFile(path, JSON.stringify({ topology: "small", tasks: [{ id: "x", role: "tester" }] }));
    const descriptor = await loadTopologyFile(path);
    expect(descriptor.topology).toBe("small");
    expect(descriptor.tasks[0]?.role).toBe("tester");
  });

  it("reports invalid JSON", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{ not json");
    await expect(loadTopologyFile(path)).rejects.toThrow(`Topology ${path} is not valid JSON`);
  });
});

describe("bundled topologies", () => {
  it("recognises bundled names", () => {
    expect(isBundledTopology("kernel-build")).toBe(true);
    expect(isBundledTopology("./kernel-build.json")).toBe(false);
  });

  it("builds the kernel topology with the architect task first", async () => {
    const graph = TaskGraph.build(await resolveTopology("kernel-build"));
    expect(graph.size).toBe(8);
    expect(graph.readyTasks()).toEqual(["arch-interfaces"]);
    expect(graph.dependentsOf("boot-001")).toEqual(["mm-001", "drivers-001"]);
  });

  it("builds the model topology with two independent roots", async () => {
    const graph = TaskGraph.build(await resolveTopology("model-training"));
    expect(graph.size).toBe(7);
    expect(graph.readyTasks()).toEqual(["slm-data-prep", "slm-arch-design"]);
    expect(graph.get("slm-training")?.estimatedCost).toBe(5);
  });
});
