import { access, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { getConfig } from "../config.js";
import { ConfigError, WorkspaceCorruptionError } from "../errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { materialize } from "./changes.js";
import { git, type GitResult } from "./git.js";
import { MemoryWorkspace } from "./memory-workspace.js";
import type { Branch, Commit, FileChange } from "./types.js";

export type GitWorkspaceOptions = {
  /** Repository directory; created and initialised when it holds no repository yet. */
  dir: string;
  name?: string;
  /** Branch that plays trunk (default: `workspace.trunkBranch`). */
  trunkBranch?: string;
  branchPrefix?: string;
  /** Committed as the first trunk revision of a new repository; ignored for an existing one. */
  initialFiles?: Record<string, string>;
};

type OpenedRepository = {
  files: Record<string, string>;
  head: string;
};

/**
 * A workspace whose trunk is a git branch on disk. Revision 0 is the trunk
 * head found (or created) when the repository is opened. Each merge commits
 * the change-set on a task branch cut from trunk and fast-forwards trunk to
 * it, all under the trunk lock; trunk moved or a working tree edited outside
 * the engine is reported as `WorkspaceCorruptionError` before the next merge.
 */
export class GitWorkspace extends MemoryWorkspace {
  readonly dir: string;
  readonly trunkBranch: string;
  private head: string;
  private gitLog: Logger;

  private constructor(opts: GitWorkspaceOptions, trunkBranch: string, repo: OpenedRepository) {
    const name = opts.name ?? basename(opts.dir);
    super({ name, branchPrefix: opts.branchPrefix, initialFiles: repo.files });
    this.dir = opts.dir;
    this.trunkBranch = trunkBranch;
    this.head = repo.head;
    this.gitLog = createLogger(`git:${name}`);
  }

  static async open(opts: GitWorkspaceOptions): Promise<GitWorkspace> {
    const trunkBranch = opts.trunkBranch ?? getConfig().workspace.trunkBranch;
    const { dir } = opts;
    await mkdir(dir, { recursive: true });

    const exists = await access(join(dir, ".git")).then(
      () => true,
      () => false,
    );
    if (!exists) {
      await mustRun(dir, ["init", "-q"]);
      await mustRun(dir, ["symbolic-ref", "HEAD", `refs/heads/${trunkBranch}`]);
      await materialize(dir, new Map(Object.entries(opts.initialFiles ?? {})));
      await mustRun(dir, ["add", "-A"]);
      await mustRun(dir, ["commit", "-q", "--no-verify", "--allow-empty", "-m", "Initial trunk"]);
    }

    const checkout = await git(dir, ["checkout", "-q", trunkBranch]);
    if (!checkout.ok) {
      throw new ConfigError(`Repository ${dir} has no branch "${trunkBranch}": ${checkout.output.trim()}`);
    }
    await assertClean(dir);

    const head = (await mustRun(dir, ["rev-parse", "HEAD"])).stdout.trim();
    const listed = await mustRun(dir, ["ls-files", "-z"]);
    const files: Record<string, string> = {};
    for (const path of listed.stdout.split("\0").filter((p) => p.length > 0)) {
      files[path] = await readFile(join(dir, path), "utf-8");
    }
    return new GitWorkspace(opts, trunkBranch, { files, head });
  }

  /** The trunk commit the engine last wrote (or found at open). */
  get headCommit(): string {
    return this.head;
  }

  protected override async persist(commit: Commit, branch: Branch): Promise<void> {
    await this.verifyHead();
    const previous = this.head;
    try {
      await mustRun(this.dir, ["checkout", "-q", "-B", branch.name, previous]);
      await this.writeChanges(commit.changes);
      await mustRun(this.dir, ["add", "-A"]);
      await mustRun(this.dir, [
        "commit",
        "-q",
        "--no-verify",
        "--allow-empty",
        "-m",
        `${commit.message}\n\nTask: ${commit.taskId}`,
      ]);
      await mustRun(this.dir, ["checkout", "-q", this.trunkBranch]);
      await mustRun(this.dir, ["merge", "-q", "--ff-only", branch.name]);
      await mustRun(this.dir, ["branch", "-q", "-D", branch.name]);
      this.head = (await mustRun(this.dir, ["rev-parse", "HEAD"])).stdout.trim();
    } catch (err) {
      await this.rollback(previous, branch.name);
      throw err;
    }
    this.gitLog.debug(`Committed ${branch.name} as ${this.head.slice(0, 12)}`);
  }

  private async verifyHead(): Promise<void> {
    const actual = (await mustRun(this.dir, ["rev-parse", `refs/heads/${this.trunkBranch}`])).stdout.trim();
    if (actual !== this.head) {
      throw new WorkspaceCorruptionError(
        `Trunk ${this.trunkBranch} of "${this.name}" moved outside the engine (${this.head.slice(0, 12)} -> ${actual.slice(0, 12)})`,
      );
    }
    await assertClean(this.dir);
  }

  private async writeChanges(changes: FileChange[]): Promise<void> {
    for (const change of changes) {
      const target = join(this.dir, change.path);
      if (change.op === "write") {
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, change.content, "utf-8");
      } else {
        await rm(target, { force: true });
      }
    }
  }

  /** Put trunk and the working tree back at `head` after a failed merge. */
  private async rollback(head: string, branchName: string): Promise<void> {
    const steps = [
      ["checkout", "-q", "-f", this.trunkBranch],
      ["reset", "-q", "--hard", head],
      ["clean", "-q", "-f", "-d"],
      ["branch", "-q", "-D", branchName],
    ];
    for (const args of steps) {
      const result = await git(this.dir, args);
      if (!result.ok) this.gitLog.debug(`Rollback step "git ${args[0] ?? ""}" failed`, { output: result.output.trim() });
    }
  }
}

async function mustRun(dir: string, args: string[]): Promise<GitResult> {
  const result = await git(dir, args);
  if (!result.ok) {
    throw new WorkspaceCorruptionError(`git ${args[0] ?? ""} failed in ${dir}: ${result.output.trim()}`);
  }
  return result;
}

async function assertClean(dir: string): Promise<void> {
  const status = await mustRun(dir, ["status", "--porcelain"]);
  if (status.stdout.trim() !== "") {
    throw new WorkspaceCorruptionError(`Working tree of ${dir} has changes the engine did not make`);
  }
}
