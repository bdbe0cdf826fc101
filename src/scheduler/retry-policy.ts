import type { Task } from "../planner/types.js";
import { backoffDelay, type BackoffOptions } from "../utils/retry.js";
import type { AttemptOutcome, RetryDecision } from "./types.js";

export type RetryContext = BackoffOptions & {
  /** The attempt revalidated a change-set already rebased after a composition failure. */
  rebased: boolean;
};

/**
 * The one place that turns an attempt outcome into the task's next step.
 *
 * - conflicts and cancellations never consume an attempt
 * - a first composition failure is revalidated on fresh trunk without a new invocation
 * - everything else consumes an attempt and backs off exponentially
 */
export function decideRetry(
  task: Pick<Task, "attempts" | "maxAttempts">,
  outcome: AttemptOutcome,
  ctx: RetryContext,
): RetryDecision {
  switch (outcome.kind) {
    case "accepted":
      return { kind: "complete" };
    case "cancelled":
      return { kind: "retry", countAttempt: false, delayMs: 0, carryChangeSet: false };
    case "conflicted":
      return { kind: "retry", countAttempt: false, delayMs: 0, carryChangeSet: true };
    case "rejected": {
      const attempts = task.attempts + 1;
      if (attempts >= task.maxAttempts) return { kind: "terminal" };
      if (outcome.reason === "composition" && !ctx.rebased) {
        return { kind: "retry", countAttempt: true, delayMs: 0, carryChangeSet: true };
      }
      return { kind: "retry", countAttempt: true, delayMs: backoffDelay(attempts, ctx), carryChangeSet: false };
    }
  }
}
