import type { ChangeSet, Snapshot } from "../workspace/types.js";
import type { BuildTestRunner, RunnerOutcome } from "./types.js";

export type RunnerFunction = (
  changeSet: ChangeSet,
  baseline: Snapshot,
  signal: AbortSignal,
) => Promise<RunnerOutcome | boolean> | RunnerOutcome | boolean;

/** Adapts a plain function (a checker, a test double) to the runner interface. */
export class FunctionRunner implements BuildTestRunner {
  readonly name: string;
  private fn: RunnerFunction;

  constructor(name: string, fn: RunnerFunction) {
    this.name = name;
    this.fn = fn;
  }

  async run(changeSet: ChangeSet, baseline: Snapshot, opts: { signal: AbortSignal }): Promise<RunnerOutcome> {
    const outcome = await this.fn(changeSet, baseline, opts.signal);
    if (typeof outcome === "boolean") {
      return { pass: outcome, log: outcome ? "ok" : "failed" };
    }
    return outcome;
  }
}

/** A runner that always reports the same verdict. */
export function staticRunner(name: string, pass: boolean): FunctionRunner {
  return new FunctionRunner(name, () => pass);
}
