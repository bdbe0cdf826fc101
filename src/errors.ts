export type ErrorCode =
  | "CYCLIC_GRAPH"
  | "UNKNOWN_DEPENDENCY"
  | "DUPLICATE_TASK"
  | "DUPLICATE_TOPOLOGY"
  | "SELF_DEPENDENCY"
  | "INVALID_DESCRIPTOR"
  | "ILLEGAL_TRANSITION"
  | "UNKNOWN_TASK"
  | "COLLABORATOR_FAILED"
  | "COLLABORATOR_TIMEOUT"
  | "COLLABORATOR_CANCELLED"
  | "MALFORMED_OUTPUT"
  | "NO_COLLABORATOR"
  | "DUPLICATE_REGISTRATION"
  | "UNKNOWN_WORKER"
  | "DOUBLE_RELEASE"
  | "MERGE_CONFLICT"
  | "BRANCH_CLOSED"
  | "BRANCH_OPEN"
  | "UNKNOWN_REVISION"
  | "BUDGET_EXCEEDED"
  | "INVALID_COST"
  | "WORKSPACE_CORRUPTION"
  | "CONFIG_INVALID"
  | "RUN_IN_PROGRESS";

export class OrchestratorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "OrchestratorError";
    this.code = code;
  }
}

/** A topology descriptor that can never be scheduled. Fatal at construction. */
export class GraphDefinitionError extends OrchestratorError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = "GraphDefinitionError";
  }
}

export class CyclicGraphError extends GraphDefinitionError {
  readonly taskIds: string[];

  constructor(taskIds: string[]) {
    super("CYCLIC_GRAPH", `Task graph contains a cycle involving: ${taskIds.join(", ")}`);
    this.name = "CyclicGraphError";
    this.taskIds = taskIds;
  }
}

export class UnknownDependencyError extends GraphDefinitionError {
  readonly taskId: string;
  readonly dependency: string;

  constructor(taskId: string, dependency: string) {
    super("UNKNOWN_DEPENDENCY", `Task "${taskId}" depends on unknown task "${dependency}"`);
    this.name = "UnknownDependencyError";
    this.taskId = taskId;
    this.dependency = dependency;
  }
}

export class IllegalTransitionError extends OrchestratorError {
  constructor(taskId: string, from: string, to: string) {
    super("ILLEGAL_TRANSITION", `Task "${taskId}" cannot move from ${from} to ${to}`);
    this.name = "IllegalTransitionError";
  }
}

/** The worker collaborator failed, timed out, was cancelled or returned garbage. */
export class CollaboratorError extends OrchestratorError {
  /** Spend the worker reported before failing; charged like any other. */
  readonly cost: number;

  constructor(code: ErrorCode, message: string, cost = 0) {
    super(code, message);
    this.name = "CollaboratorError";
    this.cost = cost;
  }

  get cancelled(): boolean {
    return this.code === "COLLABORATOR_CANCELLED";
  }
}

export class ConflictError extends OrchestratorError {
  constructor(message: string) {
    super("MERGE_CONFLICT", message);
    this.name = "ConflictError";
  }
}

/** Resuming is pointless until the ceiling is raised. */
export class BudgetExceededError extends OrchestratorError {
  constructor(message: string) {
    super("BUDGET_EXCEEDED", message);
    this.name = "BudgetExceededError";
  }
}

export class WorkspaceCorruptionError extends OrchestratorError {
  constructor(message: string) {
    super("WORKSPACE_CORRUPTION", message);
    this.name = "WorkspaceCorruptionError";
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
