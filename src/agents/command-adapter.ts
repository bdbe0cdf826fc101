import { spawn } from "node:child_process";
import { CollaboratorError, errorMessage } from "../errors.js";
import type { Role, Task } from "../planner/types.js";
import { createLogger } from "../utils/logger.js";
import type { Snapshot } from "../workspace/types.js";
import type { GenerateOptions, Generation, WorkerCollaborator } from "./adapter.js";
import { parseGeneration, toWireRequest } from "./wire.js";

export type CommandCollaboratorOptions = {
  name: string;
  command: string;
  args?: string[];
  roles: Role[];
  env?: Record<string, string>;
  description?: string;
  timeout?: number;
};

const log = createLogger("worker");

/**
 * Worker as a local program. The request JSON is written to stdin; the
 * program prints `{ changeSet, cost }` on stdout and exits 0.
 */
export class CommandCollaborator implements WorkerCollaborator {
  readonly name: string;
  readonly type = "command" as const;
  readonly description?: string;
  readonly roles: Role[];

  private command: string;
  private args: string[];
  private env?: Record<string, string>;
  private timeout?: number;

  constructor(opts: CommandCollaboratorOptions) {
    this.name = opts.name;
    this.command = opts.command;
    this.args = opts.args ?? [];
    this.roles = [...opts.roles];
    this.env = opts.env;
    this.description = opts.description;
    this.timeout = opts.timeout;
  }

  async generate(task: Readonly<Task>, snapshot: Snapshot, opts: GenerateOptions): Promise<Generation> {
    log.info(`[${this.name}] Running ${this.command} for task "${task.id}"`);
    const budgetMs = Math.max(0, opts.deadline - Date.now());
    const timeoutMs = this.timeout === undefined ? budgetMs : Math.min(this.timeout, budgetMs);
    const timeout = AbortSignal.timeout(timeoutMs);
    const signal = AbortSignal.any([opts.signal, timeout]);
    const request = JSON.stringify(toWireRequest(task, snapshot, opts.deadline));

    let stdout: string;
    try {
      stdout = await this.exec(request, signal);
    } catch (err) {
      if (err instanceof CollaboratorError) throw err;
      if (opts.signal.aborted) {
        throw new CollaboratorError("COLLABORATOR_CANCELLED", `${this.name}: process cancelled`);
      }
      if (timeout.aborted) {
        throw new CollaboratorError("COLLABORATOR_TIMEOUT", `${this.name} timed out after ${timeoutMs}ms`);
      }
      throw new CollaboratorError("COLLABORATOR_FAILED", `${this.name}: ${errorMessage(err)}`);
    }
    return parseGeneration(stdout, this.name);
  }

  private exec(input: string, signal: AbortSignal): Promise<string> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.command, this.args, {
        env: { ...process.env, ...this.env },
        signal,
        stdio: ["pipe", "pipe", "pipe"],
      });

      // Decoded per stream so a character split across chunks survives.
      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");
      let stdout = "";
      let stderr = "";
      child.stdout.on("data", (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });

      child.on("error", reject);
      child.on("close", (code) => {
        if (code === 0) {
          resolve(stdout);
        } else {
          reject(
            new CollaboratorError(
              "COLLABORATOR_FAILED",
              `${this.name} exited with ${code ?? "signal"}: ${stderr.trim().slice(-500)}`,
            ),
          );
        }
      });

      child.stdin.on("error", (err) => log.debug(`[${this.name}] stdin closed early`, { error: errorMessage(err) }));
      child.stdin.end(input);
    });
  }
}
