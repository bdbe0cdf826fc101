import type { WorkerCollaborator } from "./agents/adapter.js";
import { CommandCollaborator } from "./agents/command-adapter.js";
import { HttpCollaborator } from "./agents/http-adapter.js";
import { getConfig, type LoadedConfigFile } from "./config.js";
import type { CollaboratorSpec, CommandSpec } from "./schemas.js";
import { log } from "./utils/logger.js";
import { CommandRunner } from "./validation/command-runner.js";
import { staticRunner } from "./validation/function-runner.js";
import { ValidationPipeline } from "./validation/pipeline.js";
import type { BuildTestRunner } from "./validation/types.js";

/** Instantiate a collaborator declared in a config file. */
export function collaboratorFromSpec(spec: CollaboratorSpec): WorkerCollaborator {
  switch (spec.type) {
    case "http":
      return new HttpCollaborator({
        name: spec.name,
        url: spec.url,
        roles: spec.roles,
        headers: spec.headers,
        timeout: spec.timeoutMs,
      });
    case "command":
      return new CommandCollaborator({
        name: spec.name,
        command: spec.command,
        args: spec.args,
        roles: spec.roles,
        timeout: spec.timeoutMs,
      });
  }
}

function runnerFromSpec(stage: string, spec: CommandSpec | undefined): BuildTestRunner {
  if (!spec) {
    log.warn(`No ${stage} runner configured; ${stage} always passes`);
    return staticRunner(`${stage} (not configured)`, true);
  }
  return new CommandRunner({ name: `${stage}: ${[spec.command, ...spec.args].join(" ")}`, command: spec.command, args: spec.args });
}

/** Build the validation pipeline from the config file's `runners` section. */
export function pipelineFromRunners(runners: LoadedConfigFile["runners"]): ValidationPipeline {
  return new ValidationPipeline({
    build: runnerFromSpec("build", runners.build),
    isolatedTest: runnerFromSpec("isolated test", runners.isolatedTest),
    integrationTest: runnerFromSpec("integration test", runners.integrationTest),
    stepTimeoutMs: getConfig().validation.stepTimeoutMs,
  });
}
