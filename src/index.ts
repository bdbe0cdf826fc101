// Config
export { getConfig, configure, resetConfig, defaults, loadConfigFile, parseConfigFile } from "./config.js";
export type { EngineConfig, ConfigOverrides, PoolSizes, LoadedConfigFile } from "./config.js";

// Errors
export {
  OrchestratorError,
  GraphDefinitionError,
  CyclicGraphError,
  UnknownDependencyError,
  IllegalTransitionError,
  CollaboratorError,
  ConflictError,
  BudgetExceededError,
  WorkspaceCorruptionError,
  ConfigError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  TopologyDescriptorSchema,
  ChangeSetSchema,
  GenerationSchema,
  EngineConfigFileSchema,
} from "./schemas.js";

// Engine
export { Engine } from "./engine.js";
export type { EngineOptions, AddTopologyOptions, RunCallbacks } from "./engine.js";
export type { EngineEvent, EngineStatus, RunReport, RunRecord } from "./types.js";
export { collaboratorFromSpec, pipelineFromRunners } from "./bootstrap.js";

// Planner
export { TaskGraph, buildGraph } from "./planner/task-graph.js";
export { parseTopology, loadTopologyFile, resolveTopology, BUNDLED_TOPOLOGIES } from "./planner/topology.js";
export { ROLES } from "./planner/types.js";
export type { Role, Task, TaskStatus, TaskResult, TaskDescriptor, TopologyDescriptor, GraphSnapshot } from "./planner/types.js";

// Scheduler
export { Scheduler } from "./scheduler/scheduler.js";
export type { SchedulerOptions } from "./scheduler/scheduler.js";
export { decideRetry } from "./scheduler/retry-policy.js";
export type { AttemptOutcome, RetryDecision, HaltReason, TopologyReport } from "./scheduler/types.js";

// Workers
export type { WorkerCollaborator, Generation, GenerateOptions } from "./agents/adapter.js";
export { CollaboratorRegistry } from "./agents/registry.js";
export type { CollaboratorHealth } from "./agents/registry.js";
export { WorkerPoolManager } from "./agents/pool.js";
export type { Worker, InvocationResult, RoleOccupancy, DegradedAlert } from "./agents/pool.js";
export { FunctionCollaborator } from "./agents/function-adapter.js";
export type { FunctionCollaboratorOptions, WorkerFunction } from "./agents/function-adapter.js";
export { HttpCollaborator } from "./agents/http-adapter.js";
export type { HttpCollaboratorOptions } from "./agents/http-adapter.js";
export { CommandCollaborator } from "./agents/command-adapter.js";
export type { CommandCollaboratorOptions } from "./agents/command-adapter.js";

// Validation
export { ValidationPipeline } from "./validation/pipeline.js";
export { detectComposition } from "./validation/composition.js";
export { CommandRunner } from "./validation/command-runner.js";
export { FunctionRunner, staticRunner } from "./validation/function-runner.js";
export type { BuildTestRunner, ValidationResult, StepOutcome } from "./validation/types.js";

// Workspace
export { MemoryWorkspace } from "./workspace/memory-workspace.js";
export { GitWorkspace } from "./workspace/git-workspace.js";
export type { GitWorkspaceOptions } from "./workspace/git-workspace.js";
export { applyChangeSet, diffFiles, digestFiles } from "./workspace/changes.js";
export type { WorkspaceStore, Branch, ChangeSet, FileChange, Snapshot, Commit } from "./workspace/types.js";

// Budget
export { BudgetGovernor } from "./budget/governor.js";
export type { LedgerEvent, LedgerSnapshot, BudgetEvent } from "./budget/governor.js";

// Persistence
export { RunStore } from "./persistence/store.js";

// UI
export { StatusServer } from "./ui/server.js";
export type { StatusServerOptions } from "./ui/server.js";

// Utils
export { log, createLogger, setLogLevel } from "./utils/logger.js";
export { backoffDelay } from "./utils/retry.js";
export { Mutex } from "./utils/mutex.js";
