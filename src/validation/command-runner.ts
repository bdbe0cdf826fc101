import { spawn } from "node:child_process";
import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createLogger } from "../utils/logger.js";
import { applyChangeSet, materialize, removeDir } from "../workspace/changes.js";
import type { ChangeSet, Snapshot } from "../workspace/types.js";
import type { BuildTestRunner, RunnerOutcome } from "./types.js";

export type CommandRunnerOptions = {
  name?: string;
  command: string;
  args?: string[];
  env?: Record<string, string>;
  /** Keep only the tail of the combined output (default: 20000 chars). */
  maxLogChars?: number;
};

const DEFAULT_MAX_LOG_CHARS = 20_000;

const log = createLogger("runner");

/**
 * Runs a build or test command (make, a test script...) in a scratch
 * directory holding the baseline snapshot with the change-set applied.
 * Exit code 0 is a pass; the log is the combined stdout and stderr.
 */
export class CommandRunner implements BuildTestRunner {
  readonly name: string;
  private command: string;
  private args: string[];
  private env?: Record<string, string>;
  private maxLogChars: number;

  constructor(opts: CommandRunnerOptions) {
    this.command = opts.command;
    this.args = opts.args ?? [];
    this.env = opts.env;
    this.name = opts.name ?? [opts.command, ...this.args].join(" ");
    this.maxLogChars = opts.maxLogChars ?? DEFAULT_MAX_LOG_CHARS;
  }

  async run(changeSet: ChangeSet, baseline: Snapshot, opts: { signal: AbortSignal }): Promise<RunnerOutcome> {
    const dir = await mkdtemp(join(tmpdir(), "dagsmith-"));
    try {
      await materialize(dir, applyChangeSet(baseline.files, changeSet));
      return await this.exec(dir, opts.signal);
    } finally {
      await removeDir(dir);
    }
  }

  private exec(cwd: string, signal: AbortSignal): Promise<RunnerOutcome> {
    return new Promise((resolve, reject) => {
      log.debug(`Running ${this.name}`, { cwd });
      const child = spawn(this.command, this.args, {
        cwd,
        env: { ...process.env, ...this.env },
        signal,
        stdio: ["ignore", "pipe", "pipe"],
      });

      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");
      let output = "";
      const append = (chunk: string): void => {
        output += chunk;
        if (output.length > this.maxLogChars * 2) output = output.slice(-this.maxLogChars);
      };
      child.stdout.on("data", append);
      child.stderr.on("data", append);

      child.on("error", reject);
      child.on("close", (code, sig) => {
        const tail = output.slice(-this.maxLogChars);
        if (code === 0) {
          resolve({ pass: true, log: tail });
        } else {
          resolve({ pass: false, log: `${tail}\n[exit ${code ?? sig ?? "unknown"}]`.trimStart() });
        }
      });
    });
  }
}
