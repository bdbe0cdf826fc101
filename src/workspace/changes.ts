import { createHash } from "node:crypto";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { ChangeSet, FileChange } from "./types.js";

/** Content digest over the sorted (path, content) pairs. */
export function digestFiles(files: ReadonlyMap<string, string>): string {
  const hash = createHash("sha256");
  for (const path of [...files.keys()].sort()) {
    hash.update(path);
    hash.update("\0");
    hash.update(files.get(path) ?? "");
    hash.update("\0");
  }
  return hash.digest("hex");
}

/** Apply a change-set to a file map, returning a new map. Deleting a missing path is a no-op. */
export function applyChangeSet(files: ReadonlyMap<string, string>, changeSet: ChangeSet): Map<string, string> {
  const next = new Map(files);
  for (const change of changeSet.changes) {
    if (change.op === "write") {
      next.set(change.path, change.content);
    } else {
      next.delete(change.path);
    }
  }
  return next;
}

/** The changes that turn `from` into `to`, sorted by path. */
export function diffFiles(from: ReadonlyMap<string, string>, to: ReadonlyMap<string, string>): FileChange[] {
  const paths = new Set([...from.keys(), ...to.keys()]);
  const changes: FileChange[] = [];
  for (const path of [...paths].sort()) {
    const after = to.get(path);
    if (after === undefined) {
      changes.push({ op: "delete", path });
    } else if (from.get(path) !== after) {
      changes.push({ op: "write", path, content: after });
    }
  }
  return changes;
}

/** Write every file of a snapshot under `dir`. */
export async function materialize(dir: string, files: ReadonlyMap<string, string>): Promise<void> {
  await mkdir(dir, { recursive: true });
  for (const [path, content] of files) {
    const target = join(dir, path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, "utf-8");
  }
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
