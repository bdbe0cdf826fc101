import type { ValidationResult } from "../validation/types.js";

export const ROLES = [
  "manager",
  "architect",
  "developer",
  "reviewer",
  "tester",
  "integrator",
  "data-scientist",
  "model-architect",
  "training",
] as const;

export type Role = (typeof ROLES)[number];

export type TaskStatus =
  | "pending"
  | "blocked"
  | "ready"
  | "dispatched"
  | "validating"
  | "completed"
  | "failed-retryable"
  | "failed-terminal"
  | "blocked-by-ancestor";

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set([
  "completed",
  "failed-terminal",
  "blocked-by-ancestor",
]);

export type TaskResult = {
  status: "accepted" | "rejected" | "conflicted" | "cancelled" | "error";
  summary: string;
  validation?: ValidationResult;
  /** Populated on acceptance: the trunk revision the change landed as. */
  mergedRevision?: number;
  cost: number;
  at: number;
};

export type Task = {
  id: string;
  title: string;
  description?: string;
  role: Role;
  topology: string;
  dependsOn: string[];
  status: TaskStatus;
  attempts: number;
  maxAttempts: number;
  estimatedCost?: number;
  costAccrued: number;
  remainingDeps: number;
  lastResult?: TaskResult;
  /** Opaque worker input (a design doc reference, a training spec...). */
  input?: Record<string, unknown>;
};

export type TaskDescriptor = {
  id: string;
  role: Role;
  dependsOn?: string[];
  title?: string;
  description?: string;
  maxAttempts?: number;
  estimatedCost?: number;
  input?: Record<string, unknown>;
};

export type TopologyDescriptor = {
  topology: string;
  description?: string;
  tasks: TaskDescriptor[];
};

export type StatusCounts = Record<TaskStatus, number>;

export type TaskSummary = {
  id: string;
  title: string;
  role: Role;
  status: TaskStatus;
  attempts: number;
  maxAttempts: number;
  costAccrued: number;
  dependsOn: string[];
  lastResult?: TaskResult;
};

export type GraphSnapshot = {
  topology: string;
  active: boolean;
  counts: StatusCounts;
  tasks: TaskSummary[];
};
