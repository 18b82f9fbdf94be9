import { Budget } from "../types/policy";
import { Verdict } from "../types/decision";
import { Clock, SystemClock } from "../utils/clock";
import { ConfigError } from "../utils/errors";

export interface WindowStore {
  /**
   * Count one call for `identity` at time `at` (seconds) against `budget`.
   * Read, purge, decide and mutate happen in one synchronous step.
   */
  record(identity: string, budget: Budget, at: number): Verdict;
  /** Drop records idle past the retention horizon; returns how many went. */
  sweep(at: number): number;
  size(): number;
  has(identity: string): boolean;
  clear(): void;
  /** Begin periodic sweeps. */
  start(): void;
  stop(): void;
}

export interface WindowStoreOptions {
  retentionSeconds: number;
  sweepIntervalSeconds?: number;
  /** Time source for periodic sweeps. */
  clock?: Clock;
  onEvict?: (evicted: number) => void;
}

export const DEFAULT_SWEEP_INTERVAL_SECONDS = 60;

/**
 * Seconds from `at` until `expiresAt`, rounded up so that
 * `at + result >= expiresAt` holds in floating point.
 */
export function secondsUntil(expiresAt: number, at: number): number {
  let wait = Math.max(0, expiresAt - at);
  const step = Math.max(Math.abs(at), Math.abs(expiresAt), wait) * Number.EPSILON;
  while (at + wait < expiresAt) {
    wait += step;
  }
  return wait;
}

export interface WindowRecord {
  lastActivity: number;
  windowSeconds: number;
}

export abstract class InMemoryWindowStore<R extends WindowRecord>
  implements WindowStore
{
  private readonly records = new Map<string, R>();
  private readonly retentionSeconds: number;
  private readonly sweepIntervalSeconds: number;
  private readonly clock: Clock;
  private readonly onEvict?: (evicted: number) => void;
  private lastSweepAt: number | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: WindowStoreOptions) {
    const sweepIntervalSeconds =
      options.sweepIntervalSeconds ?? DEFAULT_SWEEP_INTERVAL_SECONDS;
    const issues: string[] = [];
    if (!Number.isFinite(options.retentionSeconds) || options.retentionSeconds <= 0) {
      issues.push("retentionSeconds must be a positive number");
    }
    if (!Number.isFinite(sweepIntervalSeconds) || sweepIntervalSeconds <= 0) {
      issues.push("sweepIntervalSeconds must be a positive number");
    }
    if (issues.length > 0) {
      throw new ConfigError("Invalid window store options", issues);
    }

    this.retentionSeconds = options.retentionSeconds;
    this.sweepIntervalSeconds = sweepIntervalSeconds;
    this.clock = options.clock ?? new SystemClock();
    this.onEvict = options.onEvict;
  }

  protected abstract createRecord(at: number): R;

  /** Decide and mutate `record` in place; `at` is already monotonic for it. */
  protected abstract apply(record: R, budget: Budget, at: number): Verdict;

  record(identity: string, budget: Budget, at: number): Verdict {
    this.maybeSweep(at);

    let record = this.records.get(identity);
    // per-record time never goes backwards, even if callers' clocks do
    const now = record ? Math.max(at, record.lastActivity) : at;
    if (!record) {
      record = this.createRecord(now);
      this.records.set(identity, record);
    }

    const verdict = this.apply(record, budget, now);
    record.lastActivity = now;
    record.windowSeconds = budget.windowSeconds;
    return verdict;
  }

  sweep(at: number): number {
    this.lastSweepAt = Math.max(this.lastSweepAt ?? at, at);

    let evicted = 0;
    for (const [identity, record] of this.records) {
      // a record idle for longer than its own window holds nothing that
      // could change a verdict
      const horizon = Math.max(this.retentionSeconds, record.windowSeconds);
      if (at - record.lastActivity > horizon) {
        this.records.delete(identity);
        evicted++;
      }
    }

    if (evicted > 0 && this.onEvict) {
      this.onEvict(evicted);
    }
    return evicted;
  }

  size(): number {
    return this.records.size;
  }

  has(identity: string): boolean {
    return this.records.has(identity);
  }

  clear(): void {
    this.records.clear();
    this.lastSweepAt = null;
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      this.sweep(this.clock.now());
    }, this.sweepIntervalSeconds * 1000);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;

    clearInterval(this.timer);
    this.timer = null;
  }

  private maybeSweep(at: number): void {
    if (this.lastSweepAt === null) {
      this.lastSweepAt = at;
      return;
    }
    if (at - this.lastSweepAt >= this.sweepIntervalSeconds) {
      this.sweep(at);
    }
  }
}
