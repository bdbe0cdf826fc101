import { getConfig } from "../config.js";
import { CollaboratorError, errorMessage } from "../errors.js";
import type { Role, Task } from "../planner/types.js";
import { createLogger } from "../utils/logger.js";
import type { Snapshot } from "../workspace/types.js";
import type { GenerateOptions, Generation, WorkerCollaborator } from "./adapter.js";

export type WorkerFunction = (
  task: Readonly<Task>,
  snapshot: Snapshot,
  opts: GenerateOptions,
) => Promise<Generation>;

export type FunctionCollaboratorOptions = {
  name: string;
  roles: Role[];
  fn: WorkerFunction;
  description?: string;
  /** Timeout in ms (default: `workers.invokeTimeoutMs`) */
  timeout?: number;
};

const log = createLogger("worker");

/** In-process worker: wraps an async function. Used for scripted workers and tests. */
export class FunctionCollaborator implements WorkerCollaborator {
  readonly name: string;
  readonly type = "function" as const;
  readonly description?: string;
  readonly roles: Role[];

  private fn: WorkerFunction;
  private timeout: number;

  constructor(opts: FunctionCollaboratorOptions) {
    this.name = opts.name;
    this.roles = [...opts.roles];
    this.fn = opts.fn;
    this.description = opts.description;
    this.timeout = opts.timeout ?? getConfig().workers.invokeTimeoutMs;
  }

  async generate(task: Readonly<Task>, snapshot: Snapshot, opts: GenerateOptions): Promise<Generation> {
    log.debug(`[${this.name}] Running function for task "${task.id}"`);
    let timer: NodeJS.Timeout | undefined;
    try {
      return await Promise.race([
        this.fn(task, snapshot, opts),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new CollaboratorError("COLLABORATOR_TIMEOUT", `${this.name} timed out after ${this.timeout}ms`)),
            this.timeout,
          );
        }),
      ]);
    } catch (err) {
      if (err instanceof CollaboratorError) throw err;
      throw new CollaboratorError("COLLABORATOR_FAILED", `${this.name}: ${errorMessage(err)}`);
    } finally {
      clearTimeout(timer);
    }
  }
}
