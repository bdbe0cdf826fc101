import { describe, expect, it } from "vitest";
import { CollaboratorRegistry } from "../../src/agents/registry.js";
import { fileWorker } from "../helpers/fixtures.js";

describe("CollaboratorRegistry", () => {
  it("keeps collaborators in registration order and refuses duplicates", () => {
    const registry = new CollaboratorRegistry();
    registry.add(fileWorker("dev", ["developer"]));
    registry.add(fileWorker("qa", ["tester", "developer"]));

    expect(registry.names()).toEqual(["dev", "qa"]);
    expect(() => registry.add(fileWorker("dev", ["tester"]))).toThrow('Collaborator "dev" already registered');
    expect(registry.withRole("developer").map((c) => c.name)).toEqual(["dev", "qa"]);
    expect(registry.forRole("tester")?.name).toBe("qa");
    expect(registry.forRole("training")).toBeUndefined();
  });

  it("removes a collaborator and its cached health", async () => {
    const registry = new CollaboratorRegistry();
    registry.add(fileWorker("dev", ["developer"]));
    await registry.checkHealth("dev");
    expect(registry.getCachedHealth("dev")?.healthy).toBe(true);

    expect(registry.remove("dev")).toBe(true);
    expect(registry.remove("dev")).toBe(false);
    expect(registry.getCachedHealth("dev")).toBeUndefined();
    expect(registry.get("dev")).toBeUndefined();
  });

  it("records failing and missing health checks", async () => {
    const registry = new CollaboratorRegistry();
    const worker = fileWorker("flaky", ["developer"]);
    registry.add({
      name: worker.name,
      type: worker.type,
      roles: worker.roles,
      generate: (task, snapshot, opts) => worker.generate(task, snapshot, opts),
      healthCheck: async () => {
        throw new Error("connection refused");
      },
    });

    const [health] = await registry.checkAllHealth();
    expect(health).toMatchObject({ name: "flaky", healthy: false, error: "connection refused" });
    expect(await registry.checkHealth("ghost")).toMatchObject({ healthy: false, error: "Collaborator not found" });
    expect(registry.getAllCachedHealth().map((h) => h.name)).toEqual(["flaky"]);
  });
});
