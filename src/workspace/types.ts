export type FileChange =
  | { op: "write"; path: string; content: string }
  | { op: "delete"; path: string };

export type ChangeSet = {
  summary?: string;
  changes: FileChange[];
};

/** An immutable view of the workspace at one trunk revision. */
export type Snapshot = {
  revision: number;
  files: ReadonlyMap<string, string>;
  digest: string;
};

export type BranchStatus = "open" | "merged" | "discarded";

export type Branch = {
  name: string;
  taskId: string;
  base: Snapshot;
  changeSet?: ChangeSet;
  status: BranchStatus;
  openedAt: number;
};

export type Commit = {
  revision: number;
  parent: number;
  taskId: string;
  branch: string;
  message: string;
  changes: FileChange[];
  digest: string;
  at: number;
};

export interface WorkspaceStore {
  readonly name: string;
  trunk(): Snapshot;
  openBranch(taskId: string): Branch;
  propose(branch: Branch, changeSet: ChangeSet): void;
  /** Fast-forwards trunk to the branch. Throws ConflictError when the base is stale. */
  merge(branch: Branch, message?: string): Promise<Commit>;
  discard(branch: Branch): void;
  openBranches(): Branch[];
  history(): Commit[];
}
