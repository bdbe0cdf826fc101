import { getConfig } from "../config.js";
import { OrchestratorError } from "../errors.js";
import { createLogger } from "../utils/logger.js";

export type LedgerEvent = {
  seq: number;
  taskId: string;
  delta: number;
  /** Ledger total after this event. */
  total: number;
  at: number;
};

export type LedgerSnapshot = {
  spent: number;
  ceiling: number;
  warnAt: number;
  remaining: number;
  exceeded: boolean;
  exhausted: boolean;
  warned: boolean;
  events: LedgerEvent[];
};

export type BudgetEvent =
  | { type: "committed"; event: LedgerEvent }
  | { type: "warn"; spent: number; warnAt: number; ceiling: number }
  | { type: "exceeded"; spent: number; ceiling: number }
  | { type: "ceiling-changed"; ceiling: number; previous: number };

export type BudgetListener = (event: BudgetEvent) => void;

export type BudgetGovernorOptions = {
  ceiling?: number;
  warnAt?: number;
};

const log = createLogger("budget");

/**
 * Cumulative spend against a ceiling, shared by every topology of a run.
 *
 * `commit` is synchronous, so concurrent schedulers on the event loop can
 * never interleave inside it. Committed cost is never rolled back.
 */
export class BudgetGovernor {
  private spent = 0;
  private ceiling: number;
  private warnAt: number;
  private warned = false;
  private exceededReported = false;
  private events: LedgerEvent[] = [];
  private listeners = new Set<BudgetListener>();

  constructor(opts?: BudgetGovernorOptions) {
    const { ceiling, warnAt } = getConfig().budget;
    this.ceiling = opts?.ceiling ?? ceiling;
    this.warnAt = opts?.warnAt ?? (opts?.ceiling !== undefined ? opts.ceiling / 2 : warnAt);
    assertAmount(this.ceiling, "ceiling");
    assertAmount(this.warnAt, "warnAt");
  }

  /** Whether `estimate` more fits under the ceiling. */
  canSpend(estimate: number): boolean {
    assertAmount(estimate, "estimate");
    return this.spent + estimate <= this.ceiling;
  }

  commit(taskId: string, cost: number): LedgerEvent {
    assertAmount(cost, "cost");
    this.spent += cost;
    const event: LedgerEvent = {
      seq: this.events.length + 1,
      taskId,
      delta: cost,
      total: this.spent,
      at: Date.now(),
    };
    this.events.push(event);
    this.emit({ type: "committed", event });

    if (!this.warned && this.spent >= this.warnAt) {
      this.warned = true;
      log.warn(`Cost warning: ${this.spent.toFixed(2)} of ${this.ceiling.toFixed(2)} budget used`);
      this.emit({ type: "warn", spent: this.spent, warnAt: this.warnAt, ceiling: this.ceiling });
    }
    if (!this.exceededReported && this.spent > this.ceiling) {
      this.exceededReported = true;
      log.warn(`Budget ceiling exceeded: ${this.spent.toFixed(2)} > ${this.ceiling.toFixed(2)}`);
      this.emit({ type: "exceeded", spent: this.spent, ceiling: this.ceiling });
    }
    return event;
  }

  /** Raise (or lower) the ceiling. A raised ceiling makes a paused run resumable. */
  setCeiling(ceiling: number): void {
    assertAmount(ceiling, "ceiling");
    const previous = this.ceiling;
    this.ceiling = ceiling;
    if (this.spent <= ceiling) this.exceededReported = false;
    log.info(`Budget ceiling changed from ${previous} to ${ceiling}`);
    this.emit({ type: "ceiling-changed", ceiling, previous });
  }

  get total(): number {
    return this.spent;
  }

  get limit(): number {
    return this.ceiling;
  }

  /** Spend went past the ceiling (an invocation cost more than its estimate allowed). */
  get exceeded(): boolean {
    return this.spent > this.ceiling;
  }

  /** Nothing more with a positive estimate can be approved. */
  get exhausted(): boolean {
    return this.spent >= this.ceiling;
  }

  spentBy(taskId: string): number {
    return this.events.filter((e) => e.taskId === taskId).reduce((sum, e) => sum + e.delta, 0);
  }

  snapshot(): LedgerSnapshot {
    return {
      spent: this.spent,
      ceiling: this.ceiling,
      warnAt: this.warnAt,
      remaining: Math.max(0, this.ceiling - this.spent),
      exceeded: this.exceeded,
      exhausted: this.exhausted,
      warned: this.warned,
      events: [...this.events],
    };
  }

  subscribe(listener: BudgetListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(event: BudgetEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        log.error("Budget listener threw", { error: String(err) });
      }
    }
  }
}

function assertAmount(value: number, what: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new OrchestratorError("INVALID_COST", `Budget ${what} must be a finite, non-negative number (got ${value})`);
  }
}
