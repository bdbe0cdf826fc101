import { getConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import { raceAbort } from "../utils/retry.js";
import type { ChangeSet, Snapshot } from "../workspace/types.js";
import { detectComposition } from "./composition.js";
import type { BuildTestRunner, StepOutcome, ValidationResult, ValidationStage } from "./types.js";

export type ValidationPipelineOptions = {
  build: BuildTestRunner;
  isolatedTest: BuildTestRunner;
  integrationTest: BuildTestRunner;
  /** Per-step bound; a step that overruns counts as failed. */
  stepTimeoutMs?: number;
};

const log = createLogger("validation");

class StepTimeout extends Error {
  constructor(stage: ValidationStage, timeoutMs: number) {
    super(`${stage} step timed out after ${timeoutMs}ms`);
    this.name = "StepTimeout";
  }
}

export class ValidationPipeline {
  private runners: Record<ValidationStage, BuildTestRunner>;
  private stepTimeoutMs: number;

  constructor(opts: ValidationPipelineOptions) {
    this.runners = {
      build: opts.build,
      isolated: opts.isolatedTest,
      integration: opts.integrationTest,
    };
    this.stepTimeoutMs = opts.stepTimeoutMs ?? getConfig().validation.stepTimeoutMs;
  }

  /**
   * Build, then test the change-set alone on its base, then test it on top of
   * the current trunk. Stops at the first failing step and records it.
   * Rejects only when `signal` aborts; runner errors and timeouts are failed
   * steps.
   */
  async validate(
    changeSet: ChangeSet,
    base: Snapshot,
    trunk: Snapshot,
    signal?: AbortSignal,
  ): Promise<ValidationResult> {
    const result = (
      partial: Omit<ValidationResult, "composition" | "accepted" | "baseRevision" | "trunkRevision">,
    ): ValidationResult => {
      const composition = detectComposition(partial.isolated, partial.integration);
      return {
        ...partial,
        composition,
        accepted: partial.failedStage === undefined,
        baseRevision: base.revision,
        trunkRevision: trunk.revision,
      };
    };

    const build = await this.step("build", changeSet, base, signal);
    if (!build.pass) return result({ build, failedStage: "build" });

    const isolated = await this.step("isolated", changeSet, base, signal);
    if (!isolated.pass) return result({ build, isolated, failedStage: "isolated" });

    const integration = await this.step("integration", changeSet, trunk, signal);
    if (!integration.pass) {
      log.warn("Isolated tests passed but integration failed", {
        base: base.revision,
        trunk: trunk.revision,
      });
      return result({ build, isolated, integration, failedStage: "integration" });
    }

    return result({ build, isolated, integration });
  }

  private async step(
    stage: ValidationStage,
    changeSet: ChangeSet,
    baseline: Snapshot,
    outer?: AbortSignal,
  ): Promise<StepOutcome> {
    outer?.throwIfAborted();
    const runner = this.runners[stage];
    const controller = new AbortController();
    const timeoutMs = this.stepTimeoutMs;
    const timer = setTimeout(() => controller.abort(new StepTimeout(stage, timeoutMs)), timeoutMs);
    const onOuterAbort = (): void => controller.abort(outer?.reason);
    outer?.addEventListener("abort", onOuterAbort, { once: true });

    const start = Date.now();
    try {
      log.debug(`Running ${stage} with ${runner.name}`, { files: changeSet.changes.length });
      const outcome = await raceAbort(runner.run(changeSet, baseline, { signal: controller.signal }), controller.signal);
      return { pass: outcome.pass, log: outcome.log, durationMs: Date.now() - start, timedOut: false };
    } catch (err) {
      if (outer?.aborted) throw outer.reason;
      const timedOut = err instanceof StepTimeout;
      log.warn(`${stage} step failed`, { error: errorMessage(err), timedOut });
      return { pass: false, log: errorMessage(err), durationMs: Date.now() - start, timedOut };
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener("abort", onOuterAbort);
    }
  }
}

