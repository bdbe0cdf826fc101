import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { LedgerEvent } from "../budget/governor.js";
import { getConfig } from "../config.js";
import { HALT_REASONS } from "../scheduler/types.js";
import { RunReportSchema, TopologyNamesSchema } from "../schemas.js";
import type { RunRecord, RunState } from "../types.js";

export class RunStore {
  private db: Database.Database;

  /** `:memory:` keeps everything in process (tests). */
  constructor(dbPath?: string) {
    const path = dbPath ?? getConfig().persistence.dbPath;
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id      TEXT PRIMARY KEY,
        topologies  TEXT NOT NULL DEFAULT '[]',
        state       TEXT NOT NULL DEFAULT 'running',
        halt_reason TEXT,
        report      TEXT,
        total_cost  REAL NOT NULL DEFAULT 0,
        started_at  INTEGER NOT NULL,
        finished_at INTEGER
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);

      CREATE TABLE IF NOT EXISTS ledger_events (
        run_id  TEXT NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
        seq     INTEGER NOT NULL,
        task_id TEXT NOT NULL,
        delta   REAL NOT NULL,
        total   REAL NOT NULL,
        at      INTEGER NOT NULL,
        PRIMARY KEY (run_id, seq)
      );
    `);
    this.db.pragma("foreign_keys = ON");
  }

  insert(run: RunRecord): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO runs (run_id, topologies, state, halt_reason, report, total_cost, started_at, finished_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      run.runId,
      JSON.stringify(run.topologies),
      run.state,
      run.haltReason ?? null,
      run.report ? JSON.stringify(run.report) : null,
      run.totalCost,
      run.startedAt,
      run.finishedAt ?? null,
    );
  }

  /** Upsert; ledger rows are kept. */
  update(run: RunRecord): void {
    this.db.prepare(`
      UPDATE runs SET topologies = ?, state = ?, halt_reason = ?, report = ?, total_cost = ?, finished_at = ?
      WHERE run_id = ?
    `).run(
      JSON.stringify(run.topologies),
      run.state,
      run.haltReason ?? null,
      run.report ? JSON.stringify(run.report) : null,
      run.totalCost,
      run.finishedAt ?? null,
      run.runId,
    );
  }

  get(runId: string): RunRecord | undefined {
    const row = this.db.prepare<[string], RunRow>("SELECT * FROM runs WHERE run_id = ?").get(runId);
    return row ? rowToRunRecord(row) : undefined;
  }

  list(limit = 50): RunRecord[] {
    const rows = this.db.prepare<[number], RunRow>("SELECT * FROM runs ORDER BY started_at DESC LIMIT ?").all(limit);
    return rows.map(rowToRunRecord);
  }

  appendLedgerEvent(runId: string, event: LedgerEvent): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO ledger_events (run_id, seq, task_id, delta, total, at)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(runId, event.seq, event.taskId, event.delta, event.total, event.at);
  }

  ledger(runId: string): LedgerEvent[] {
    const rows = this.db
      .prepare<[string], LedgerRow>("SELECT * FROM ledger_events WHERE run_id = ? ORDER BY seq")
      .all(runId);
    return rows.map((r) => ({ seq: r.seq, taskId: r.task_id, delta: r.delta, total: r.total, at: r.at }));
  }

  /** Delete a specific run and its ledger. Returns true if deleted. */
  delete(runId: string): boolean {
    const result = this.db.prepare("DELETE FROM runs WHERE run_id = ?").run(runId);
    return result.changes > 0;
  }

  /** Delete all runs. Returns count of deleted runs. */
  deleteAll(): number {
    const result = this.db.prepare("DELETE FROM runs").run();
    return result.changes;
  }

  close(): void {
    this.db.close();
  }
}

type RunRow = {
  run_id: string;
  topologies: string;
  state: string;
  halt_reason: string | null;
  report: string | null;
  total_cost: number;
  started_at: number;
  finished_at: number | null;
};

type LedgerRow = {
  run_id: string;
  seq: number;
  task_id: string;
  delta: number;
  total: number;
  at: number;
};

const RUN_STATES: readonly RunState[] = ["running", "halted"];

function rowToRunRecord(row: RunRow): RunRecord {
  return {
    runId: row.run_id,
    topologies: TopologyNamesSchema.parse(JSON.parse(row.topologies)),
    state: RUN_STATES.find((s) => s === row.state) ?? "halted",
    haltReason: HALT_REASONS.find((h) => h === row.halt_reason),
    report: row.report ? RunReportSchema.parse(JSON.parse(row.report)) : undefined,
    totalCost: row.total_cost,
    startedAt: row.started_at,
    finishedAt: row.finished_at ?? undefined,
  };
}
