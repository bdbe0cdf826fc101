import { getConfig } from "../config.js";
import { ConflictError, OrchestratorError, WorkspaceCorruptionError } from "../errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { Mutex } from "../utils/mutex.js";
import { applyChangeSet, diffFiles, digestFiles, materialize } from "./changes.js";
import type { Branch, ChangeSet, Commit, FileChange, Snapshot, WorkspaceStore } from "./types.js";

export type MemoryWorkspaceOptions = {
  name?: string;
  branchPrefix?: string;
  initialFiles?: Record<string, string>;
};

/**
 * An in-process versioned repository. Trunk is a chain of immutable
 * snapshots; each branch pins the snapshot it was opened from and carries
 * one proposed change-set. Merging is fast-forward only: a branch whose base
 * is no longer the trunk head is stale and is refused with `ConflictError`.
 */
export class MemoryWorkspace implements WorkspaceStore {
  readonly name: string;
  private branchPrefix: string;
  private snapshots: Snapshot[] = [];
  private commits: Commit[] = [];
  private branches = new Map<string, Branch>();
  private trunkLock = new Mutex();
  private branchCounter = 0;
  private log: Logger;

  constructor(opts?: MemoryWorkspaceOptions) {
    this.name = opts?.name ?? "workspace";
    this.branchPrefix = opts?.branchPrefix ?? getConfig().workspace.branchPrefix;
    this.log = createLogger(`workspace:${this.name}`);
    const files = new Map(Object.entries(opts?.initialFiles ?? {}));
    this.snapshots.push({ revision: 0, files, digest: digestFiles(files) });
  }

  trunk(): Snapshot {
    const head = this.snapshots[this.snapshots.length - 1];
    if (!head) {
      throw new WorkspaceCorruptionError(`Workspace "${this.name}" has no trunk snapshot`);
    }
    return head;
  }

  snapshotAt(revision: number): Snapshot | undefined {
    return this.snapshots[revision];
  }

  openBranch(taskId: string): Branch {
    if (this.branches.has(taskId)) {
      throw new OrchestratorError("BRANCH_OPEN", `Task "${taskId}" already has an open branch`);
    }
    const base = this.trunk();
    this.branchCounter += 1;
    const branch: Branch = {
      name: `${this.branchPrefix}/${taskId}-${this.branchCounter}`,
      taskId,
      base,
      status: "open",
      openedAt: Date.now(),
    };
    this.branches.set(taskId, branch);
    this.log.debug(`Opened ${branch.name} at r${base.revision}`);
    return branch;
  }

  propose(branch: Branch, changeSet: ChangeSet): void {
    this.requireOpen(branch);
    branch.changeSet = changeSet;
  }

  /** All-or-nothing: trunk moves to the new snapshot only after every check passed. */
  async merge(branch: Branch, message?: string): Promise<Commit> {
    return this.trunkLock.runExclusive(async () => {
      this.requireOpen(branch);
      const head = this.verifyTrunk();

      if (branch.base.revision !== head.revision) {
        throw new ConflictError(
          `Branch ${branch.name} is based on r${branch.base.revision} but trunk is at r${head.revision}`,
        );
      }

      const files = applyChangeSet(head.files, branch.changeSet ?? { changes: [] });
      const snapshot: Snapshot = { revision: head.revision + 1, files, digest: digestFiles(files) };
      const commit: Commit = {
        revision: snapshot.revision,
        parent: head.revision,
        taskId: branch.taskId,
        branch: branch.name,
        message: message ?? branch.changeSet?.summary ?? `Merge ${branch.name}`,
        changes: branch.changeSet?.changes ?? [],
        digest: snapshot.digest,
        at: Date.now(),
      };

      await this.persist(commit, branch);
      this.snapshots.push(snapshot);
      this.commits.push(commit);
      branch.status = "merged";
      this.branches.delete(branch.taskId);
      this.log.info(`Merged ${branch.name} as r${snapshot.revision}`, { files: commit.changes.length });
      return commit;
    });
  }

  /** Idempotent. */
  discard(branch: Branch): void {
    if (branch.status !== "open") return;
    branch.status = "discarded";
    if (this.branches.get(branch.taskId) === branch) {
      this.branches.delete(branch.taskId);
    }
    this.log.debug(`Discarded ${branch.name}`);
  }

  openBranches(): Branch[] {
    return [...this.branches.values()];
  }

  history(): Commit[] {
    return [...this.commits];
  }

  diff(fromRevision: number, toRevision: number = this.trunk().revision): FileChange[] {
    const from = this.snapshotAt(fromRevision);
    const to = this.snapshotAt(toRevision);
    if (!from || !to) {
      throw new OrchestratorError("UNKNOWN_REVISION", `Unknown revision r${from ? toRevision : fromRevision}`);
    }
    return diffFiles(from.files, to.files);
  }

  /** Write the current trunk to disk, e.g. for a build runner or an operator checkout. */
  async exportTrunk(dir: string): Promise<Snapshot> {
    const head = this.trunk();
    await materialize(dir, head.files);
    return head;
  }

  /**
   * Record `commit` in durable storage. Runs under the trunk lock, before the
   * in-memory trunk advances; throwing leaves trunk where it was.
   */
  protected persist(_commit: Commit, _branch: Branch): Promise<void> {
    return Promise.resolve();
  }

  private verifyTrunk(): Snapshot {
    const head = this.trunk();
    const actual = digestFiles(head.files);
    if (actual !== head.digest) {
      throw new WorkspaceCorruptionError(
        `Trunk r${head.revision} of "${this.name}" no longer matches its digest (${head.digest.slice(0, 12)} != ${actual.slice(0, 12)})`,
      );
    }
    return head;
  }

  private requireOpen(branch: Branch): void {
    if (branch.status !== "open" || this.branches.get(branch.taskId) !== branch) {
      throw new OrchestratorError("BRANCH_CLOSED", `Branch ${branch.name} is ${branch.status}`);
    }
  }
}
