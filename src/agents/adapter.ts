import type { Role, Task } from "../planner/types.js";
import type { ChangeSet, Snapshot } from "../workspace/types.js";

/** What a worker hands back for one task: the proposed change and what producing it cost. */
export type Generation = {
  changeSet: ChangeSet;
  cost: number;
};

export type GenerateOptions = {
  /** Aborted on timeout, budget exhaustion or operator abort. */
  signal: AbortSignal;
  /** Epoch ms after which the engine stops waiting. */
  deadline: number;
};

/**
 * The single interface every worker backend implements: a remote model
 * behind HTTP, a deterministic script, or a test double. The engine never
 * looks inside; it only sees a change-set, a cost, or an error.
 */
export interface WorkerCollaborator {
  name: string;
  type: "function" | "http" | "command" | string;
  description?: string;
  /** Roles this collaborator can serve. */
  roles: Role[];

  generate(task: Readonly<Task>, snapshot: Snapshot, opts: GenerateOptions): Promise<Generation>;
  healthCheck?(): Promise<boolean>;
}
