import { CollaboratorError, errorMessage } from "../errors.js";
import type { Role, Task } from "../planner/types.js";
import { createLogger } from "../utils/logger.js";
import type { Snapshot } from "../workspace/types.js";
import type { GenerateOptions, Generation, WorkerCollaborator } from "./adapter.js";
import { costFromBody, parseGeneration, toWireRequest } from "./wire.js";

export type HttpCollaboratorOptions = {
  name: string;
  url: string;
  roles: Role[];
  headers?: Record<string, string>;
  description?: string;
  /** Send the full file map of the base snapshot (default: true). */
  includeFiles?: boolean;
  /** Timeout in ms; the invocation deadline applies when omitted. */
  timeout?: number;
};

const log = createLogger("worker");

/**
 * Worker behind an HTTP endpoint. The task and its base snapshot are POSTed
 * as JSON; the response body must be `{ changeSet, cost }`.
 */
export class HttpCollaborator implements WorkerCollaborator {
  readonly name: string;
  readonly type = "http" as const;
  readonly description?: string;
  readonly roles: Role[];

  private url: string;
  private headers: Record<string, string>;
  private includeFiles: boolean;
  private timeout?: number;

  constructor(opts: HttpCollaboratorOptions) {
    this.name = opts.name;
    this.url = opts.url;
    this.roles = [...opts.roles];
    this.headers = opts.headers ?? {};
    this.description = opts.description;
    this.includeFiles = opts.includeFiles ?? true;
    this.timeout = opts.timeout;
  }

  async generate(task: Readonly<Task>, snapshot: Snapshot, opts: GenerateOptions): Promise<Generation> {
    log.info(`[${this.name}] Calling ${this.url} for task "${task.id}"`);

    const budgetMs = Math.max(0, opts.deadline - Date.now());
    const timeoutMs = this.timeout === undefined ? budgetMs : Math.min(this.timeout, budgetMs);
    const timeout = AbortSignal.timeout(timeoutMs);
    const signal = AbortSignal.any([opts.signal, timeout]);

    let res: Response;
    let body: string;
    try {
      res = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...this.headers },
        body: JSON.stringify(toWireRequest(task, snapshot, opts.deadline, this.includeFiles)),
        signal,
      });
      body = await res.text();
    } catch (err) {
      if (opts.signal.aborted) {
        throw new CollaboratorError("COLLABORATOR_CANCELLED", `${this.name}: request cancelled`);
      }
      if (timeout.aborted) {
        throw new CollaboratorError("COLLABORATOR_TIMEOUT", `${this.name} timed out after ${timeoutMs}ms`);
      }
      throw new CollaboratorError("COLLABORATOR_FAILED", `${this.name}: ${errorMessage(err)}`);
    }

    if (!res.ok) {
      throw new CollaboratorError(
        "COLLABORATOR_FAILED",
        `${this.name}: HTTP ${res.status}: ${body.slice(0, 500)}`,
        costFromBody(body),
      );
    }
    return parseGeneration(body, this.name);
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(this.url, {
        method: "HEAD",
        signal: AbortSignal.timeout(5_000),
      });
      return res.ok;
    } catch (err) {
      log.debug(`[${this.name}] Health check failed`, { error: errorMessage(err) });
      return false;
    }
  }
}
