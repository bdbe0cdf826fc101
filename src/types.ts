import type { DegradedAlert, RoleOccupancy } from "./agents/pool.js";
import type { LedgerSnapshot } from "./budget/governor.js";
import type { GraphSnapshot } from "./planner/types.js";
import type { HaltReason, SchedulerEvent, TopologyReport } from "./scheduler/types.js";

export type RunState = "running" | "halted";

export type RunReport = {
  runId: string;
  /** The most severe halt among the topologies. */
  halt: HaltReason;
  topologies: TopologyReport[];
  spent: number;
  ceiling: number;
  startedAt: number;
  finishedAt: number;
  durationMs: number;
};

/** What the run store keeps per run. */
export type RunRecord = {
  runId: string;
  topologies: string[];
  state: RunState;
  haltReason?: HaltReason;
  report?: RunReport;
  totalCost: number;
  startedAt: number;
  finishedAt?: number;
};

export type TopologyStatus = GraphSnapshot & {
  trunkRevision: number;
  running: boolean;
  halt?: HaltReason;
};

/** Read-only operator view: tasks, pools and ledger. */
export type EngineStatus = {
  runId?: string;
  state: RunState | "idle";
  topologies: TopologyStatus[];
  workers: RoleOccupancy[];
  budget: Omit<LedgerSnapshot, "events">;
  halt?: HaltReason;
};

export type EngineEvent =
  | { type: "run:started"; runId: string; topologies: string[] }
  | ({ runId: string } & SchedulerEvent)
  | { type: "budget:committed"; runId: string; taskId: string; delta: number; total: number }
  | { type: "budget:warn"; runId: string; spent: number; warnAt: number; ceiling: number }
  | { type: "budget:exceeded"; runId: string; spent: number; ceiling: number }
  | { type: "budget:ceiling"; runId?: string; ceiling: number; previous: number }
  | { type: "role:degraded"; runId: string; alert: DegradedAlert }
  | { type: "run:halted"; runId: string; report: RunReport }
  | { type: "run:deleted"; runId: string };
