import type { StatusCounts } from "../planner/types.js";
import type { ValidationResult } from "../validation/types.js";
import type { ChangeSet, Commit } from "../workspace/types.js";

/** Why a rejected attempt was rejected. */
export type RejectReason = "collaborator-error" | "validation" | "composition";

/** What one dispatch of a task came to. Every retry decision is made from this alone. */
export type AttemptOutcome =
  | { kind: "accepted"; commit: Commit; validation: ValidationResult; cost: number }
  | {
      kind: "rejected";
      reason: RejectReason;
      detail: string;
      validation?: ValidationResult;
      /** The rejected change-set, when a worker produced one. */
      changeSet?: ChangeSet;
      cost: number;
    }
  | { kind: "conflicted"; detail: string; changeSet: ChangeSet; cost: number }
  | { kind: "cancelled"; detail: string; cost: number };

export type RetryDecision =
  | { kind: "complete" }
  | {
      kind: "retry";
      countAttempt: boolean;
      delayMs: number;
      /** Revalidate the same change-set on a fresh branch instead of invoking a worker again. */
      carryChangeSet: boolean;
    }
  | { kind: "terminal" };

/** Ordered from least to most severe; a run reports the most severe of its topologies. */
export const HALT_REASONS = [
  "completed",
  "incomplete",
  "roles-degraded",
  "budget-exhausted",
  "aborted",
  "workspace-corruption",
] as const;

export type HaltReason = (typeof HALT_REASONS)[number];

export type TopologyReport = {
  topology: string;
  halt: HaltReason;
  counts: StatusCounts;
  completed: number;
  failedTerminal: number;
  blockedByAncestor: number;
  /** Tasks in any non-terminal state. */
  pending: number;
  costAccrued: number;
  trunkRevision: number;
  error?: string;
};

/** A change-set kept across attempts (merge conflicts, composition rebases). */
export type CarriedChangeSet = {
  changeSet: ChangeSet;
  /** Set once the change-set was revalidated after a composition failure. */
  rebased: boolean;
};

export type SchedulerEvent =
  | { type: "task:dispatched"; topology: string; taskId: string; worker?: string; attempt: number }
  | { type: "task:validating"; topology: string; taskId: string }
  | { type: "task:settled"; topology: string; taskId: string; outcome: AttemptOutcome["kind"]; status: string; summary: string }
  | { type: "task:retry-scheduled"; topology: string; taskId: string; delayMs: number }
  | { type: "topology:halted"; topology: string; report: TopologyReport };
