import type { ChangeSet, Snapshot } from "../workspace/types.js";

export type ValidationStage = "build" | "isolated" | "integration";

export type StepOutcome = {
  pass: boolean;
  log: string;
  durationMs: number;
  timedOut: boolean;
};

export type ValidationResult = {
  build: StepOutcome;
  isolated?: StepOutcome;
  integration?: StepOutcome;
  failedStage?: ValidationStage;
  /** Isolated tests passed but the integrated run failed. */
  composition: boolean;
  accepted: boolean;
  baseRevision: number;
  trunkRevision: number;
};

export type RunnerOutcome = {
  pass: boolean;
  log: string;
};

/** A build or test collaborator: pass/fail plus a log for one change-set. */
export interface BuildTestRunner {
  readonly name: string;
  run(changeSet: ChangeSet, baseline: Snapshot, opts: { signal: AbortSignal }): Promise<RunnerOutcome>;
}
