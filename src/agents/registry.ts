import { OrchestratorError, errorMessage } from "../errors.js";
import type { Role } from "../planner/types.js";
import { log } from "../utils/logger.js";
import type { WorkerCollaborator } from "./adapter.js";

export type CollaboratorHealth = {
  name: string;
  healthy: boolean;
  lastCheck: number;
  responseTimeMs?: number;
  error?: string;
};

export class CollaboratorRegistry {
  private collaborators = new Map<string, WorkerCollaborator>();
  private healthCache = new Map<string, CollaboratorHealth>();

  add(collaborator: WorkerCollaborator): void {
    if (this.collaborators.has(collaborator.name)) {
      throw new OrchestratorError("DUPLICATE_REGISTRATION", `Collaborator "${collaborator.name}" already registered`);
    }
    this.collaborators.set(collaborator.name, collaborator);
  }

  remove(name: string): boolean {
    this.healthCache.delete(name);
    return this.collaborators.delete(name);
  }

  get(name: string): WorkerCollaborator | undefined {
    return this.collaborators.get(name);
  }

  list(): WorkerCollaborator[] {
    return [...this.collaborators.values()];
  }

  names(): string[] {
    return [...this.collaborators.keys()];
  }

  /** Collaborators serving `role`, in registration order. */
  withRole(role: Role): WorkerCollaborator[] {
    return this.list().filter((c) => c.roles.includes(role));
  }

  /** The first collaborator registered for `role`. */
  forRole(role: Role): WorkerCollaborator | undefined {
    return this.withRole(role)[0];
  }

  async checkHealth(name: string): Promise<CollaboratorHealth> {
    const collaborator = this.get(name);
    if (!collaborator) {
      return { name, healthy: false, lastCheck: Date.now(), error: "Collaborator not found" };
    }

    const start = Date.now();
    let result: CollaboratorHealth;
    try {
      const healthy = collaborator.healthCheck ? await collaborator.healthCheck() : true;
      result = { name, healthy, lastCheck: Date.now(), responseTimeMs: Date.now() - start };
    } catch (err) {
      result = {
        name,
        healthy: false,
        lastCheck: Date.now(),
        responseTimeMs: Date.now() - start,
        error: errorMessage(err),
      };
      log.warn(`Health check failed for collaborator "${name}"`, { error: errorMessage(err) });
    }
    this.healthCache.set(name, result);
    return result;
  }

  checkAllHealth(): Promise<CollaboratorHealth[]> {
    return Promise.all(this.names().map((name) => this.checkHealth(name)));
  }

  getCachedHealth(name: string): CollaboratorHealth | undefined {
    return this.healthCache.get(name);
  }

  getAllCachedHealth(): CollaboratorHealth[] {
    return [...this.healthCache.values()];
  }
}
