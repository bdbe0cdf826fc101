import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { ConflictError, WorkspaceCorruptionError } from "../src/errors.js";
import { applyChangeSet, diffFiles, digestFiles } from "../src/workspace/changes.js";
import { MemoryWorkspace } from "../src/workspace/memory-workspace.js";
import { writeChange } from "./helpers/fixtures.js";

describe("applyChangeSet", () => {
  it("returns a new map and leaves the input untouched", () => {
    const base = new Map([["a.txt", "1"], ["b.txt", "2"]]);
    const next = applyChangeSet(base, {
      changes: [
        { op: "write", path: "a.txt", content: "changed" },
        { op: "delete", path: "b.txt" },
        { op: "delete", path: "missing.txt" },
      ],
    });
    expect([...next]).toEqual([["a.txt", "changed"]]);
    expect(base.get("a.txt")).toBe("1");
  });

  it("diffs two file maps by path", () => {
    const from = new Map([["a", "1"], ["b", "2"]]);
    const to = new Map([["b", "2"], ["c", "3"]]);
    expect(diffFiles(from, to)).toEqual([
      { op: "delete", path: "a" },
      { op: "write", path: "c", content: "3" },
    ]);
  });

  it("digests independently of insertion order", () => {
    expect(digestFiles(new Map([["a", "1"], ["b", "2"]]))).toBe(digestFiles(new Map([["b", "2"], ["a", "1"]])));
  });
});

describe("MemoryWorkspace", () => {
  it("starts at revision 0 with the initial files", () => {
    const ws = new MemoryWorkspace({ initialFiles: { "README.md": "hello" } });
    expect(ws.trunk().revision).toBe(0);
    expect(ws.trunk().files.get("README.md")).toBe("hello");
  });

  it("isolates a branch from later trunk changes", async () => {
    const ws = new MemoryWorkspace();
    const first = ws.openBranch("a");
    const second = ws.openBranch("b");
    ws.propose(first, writeChange("a.txt", "A"));
    await ws.merge(first);

    expect(ws.trunk().files.get("a.txt")).toBe("A");
    expect(second.base.files.has("a.txt")).toBe(false);
  });

  it("merges the first of two branches from one snapshot and refuses the second", async () => {
    const ws = new MemoryWorkspace();
    const first = ws.openBranch("a");
    const second = ws.openBranch("b");
    ws.propose(first, writeChange("a.txt", "A"));
    ws.propose(second, writeChange("b.txt", "B"));

    const commit = await ws.merge(first);
    expect(commit.revision).toBe(1);
    expect(commit.message).toBe("write a.txt");

    await expect(ws.merge(second)).rejects.toThrow(ConflictError);
    await expect(ws.merge(second)).rejects.toThrow("Branch task/b-2 is based on r0 but trunk is at r1");
    expect(ws.trunk().revision).toBe(1);
    expect(ws.trunk().files.has("b.txt")).toBe(false);
  });

  it("serialises concurrent merges so exactly one lands", async () => {
    const ws = new MemoryWorkspace();
    const branches = ["a", "b", "c"].map((id) => {
      const b = ws.openBranch(id);
      ws.propose(b, writeChange(`${id}.txt`, id));
      return b;
    });
    const results = await Promise.allSettled(branches.map((b) => ws.merge(b)));
    expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected", "rejected"]);
    expect(ws.history()).toHaveLength(1);
  });

  it("allows one open branch per task and reopens after discard", () => {
    const ws = new MemoryWorkspace({ branchPrefix: "wip" });
    const branch = ws.openBranch("a");
    expect(branch.name).toBe("wip/a-1");
    expect(() => ws.openBranch("a")).toThrow('Task "a" already has an open branch');

    ws.discard(branch);
    ws.discard(branch);
    expect(branch.status).toBe("discarded");
    expect(ws.openBranches()).toEqual([]);
    expect(ws.openBranch("a").name).toBe("wip/a-2");
  });

  it("refuses to propose on or merge a discarded branch", async () => {
    const ws = new MemoryWorkspace();
    const branch = ws.openBranch("a");
    ws.discard(branch);
    expect(() => ws.propose(branch, writeChange("x", "y"))).toThrow("Branch task/a-1 is discarded");
    await expect(ws.merge(branch)).rejects.toThrow("Branch task/a-1 is discarded");
  });

  it("halts merging when the trunk no longer matches its digest", async () => {
    const ws = new MemoryWorkspace({ initialFiles: { "a.txt": "1" } });
    const files = ws.trunk().files;
    // Simulate corruption through the underlying Map.
    if (files instanceof Map) files.set("a.txt", "tampered");

    const branch = ws.openBranch("t");
    ws.propose(branch, writeChange("b.txt", "2"));
    await expect(ws.merge(branch)).rejects.toThrow(WorkspaceCorruptionError);
    expect(ws.history()).toEqual([]);
  });

  it("diffs revisions and exports the trunk", async () => {
    const ws = new MemoryWorkspace();
    const branch = ws.openBranch("a");
    ws.propose(branch, { changes: [{ op: "write", path: "src/a.c", content: "int a;" }] });
    await ws.merge(branch);

    expect(ws.diff(0)).toEqual([{ op: "write", path: "src/a.c", content: "int a;" }]);
    expect(() => ws.diff(0, 7)).toThrow("Unknown revision r7");

    const dir = await mkdtemp(join(tmpdir(), "ws-export-"));
    try {
      const head = await ws.exportTrunk(dir);
      expect(head.revision).toBe(1);
      expect(await readFile(join(dir, "src", "a.c"), "utf-8")).toBe("int a;");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
