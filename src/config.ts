import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { ConfigError, errorMessage } from "./errors.js";
import type { Role } from "./planner/types.js";
import { EngineConfigFileSchema, parseOrThrow } from "./schemas.js";
import type { CollaboratorSpec, CommandSpec } from "./schemas.js";

export type PoolSizes = Partial<Record<Role, number>>;

export type EngineConfig = {
  budget: {
    /** Total spend the run may reach, in the collaborators' cost unit (USD for LLM workers). */
    ceiling: number;
    warnAt: number;
    /** Used for `canSpend` when a task declares no estimate. */
    defaultTaskEstimate: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  workers: {
    invokeTimeoutMs: number;
    degradeAfter: number;
    pools: PoolSizes;
  };
  validation: {
    stepTimeoutMs: number;
  };
  workspace: {
    branchPrefix: string;
    /** Directory holding one git repository per topology; in-memory workspaces when unset. */
    root?: string;
    trunkBranch: string;
  };
  server: {
    port: number;
    host: string;
  };
  persistence: {
    dbPath: string;
  };
};

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export type ConfigOverrides = DeepPartial<EngineConfig>;

const DEFAULTS: EngineConfig = {
  budget: {
    ceiling: 50,
    warnAt: 25,
    defaultTaskEstimate: 1,
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 30_000,
  },
  workers: {
    invokeTimeoutMs: 5 * 60 * 1000,
    degradeAfter: 3,
    pools: {
      manager: 1,
      architect: 1,
      developer: 4,
      reviewer: 1,
      tester: 1,
      integrator: 1,
      "data-scientist": 1,
      "model-architect": 1,
      training: 2,
    },
  },
  validation: {
    stepTimeoutMs: 120_000,
  },
  workspace: {
    branchPrefix: "task",
    trunkBranch: "main",
  },
  server: {
    port: 3000,
    host: "127.0.0.1",
  },
  persistence: {
    dbPath: join(homedir(), ".dagsmith", "runs.db"),
  },
};

let current: EngineConfig = structuredClone(DEFAULTS);

function merge(base: EngineConfig, overrides: ConfigOverrides): EngineConfig {
  return {
    budget: { ...base.budget, ...overrides.budget },
    retry: { ...base.retry, ...overrides.retry },
    workers: {
      ...base.workers,
      ...overrides.workers,
      pools: { ...base.workers.pools, ...overrides.workers?.pools },
    },
    validation: { ...base.validation, ...overrides.validation },
    workspace: { ...base.workspace, ...overrides.workspace },
    server: { ...base.server, ...overrides.server },
    persistence: { ...base.persistence, ...overrides.persistence },
  };
}

/** Override config values. Merges section by section with defaults. */
export function configure(overrides: ConfigOverrides): void {
  current = merge(structuredClone(DEFAULTS), overrides);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<EngineConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<EngineConfig> = Object.freeze(structuredClone(DEFAULTS));

export type LoadedConfigFile = {
  overrides: ConfigOverrides;
  collaborators: CollaboratorSpec[];
  runners: {
    build?: CommandSpec;
    isolatedTest?: CommandSpec;
    integrationTest?: CommandSpec;
  };
};

/** Parse an already-decoded config document. */
export function parseConfigFile(raw: unknown): LoadedConfigFile {
  const parsed = parseOrThrow(EngineConfigFileSchema, raw, (msg) => new ConfigError(`Invalid config: ${msg}`));
  const { collaborators, runners, ...overrides } = parsed;
  return {
    overrides,
    collaborators: collaborators ?? [],
    runners: runners ?? {},
  };
}

/** Read and validate a JSON config file. */
export async function loadConfigFile(path: string): Promise<LoadedConfigFile> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(err)}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${errorMessage(err)}`);
  }
  return parseConfigFile(raw);
}
