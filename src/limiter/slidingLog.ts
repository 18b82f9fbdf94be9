import { InMemoryWindowStore, WindowRecord, secondsUntil } from "./windowStore";
import { Budget } from "../types/policy";
import { Verdict } from "../types/decision";

interface SlidingLogRecord extends WindowRecord {
  timestamps: number[]; // ascending
}

/**
 * Exact timestamps of admitted calls over the trailing window. A call
 * leaves the window exactly `windowSeconds` after it was admitted.
 */
export class SlidingLogStore extends InMemoryWindowStore<SlidingLogRecord> {
  protected createRecord(at: number): SlidingLogRecord {
    return { timestamps: [], lastActivity: at, windowSeconds: 0 };
  }

  protected apply(
    record: SlidingLogRecord,
    budget: Budget,
    at: number
  ): Verdict {
    const { timestamps } = record;

    let expired = 0;
    while (
      expired < timestamps.length &&
      timestamps[expired] + budget.windowSeconds <= at
    ) {
      expired++;
    }
    if (expired > 0) {
      timestamps.splice(0, expired);
    }

    if (timestamps.length < budget.maxCalls) {
      timestamps.push(at);
      return { allowed: true, remaining: budget.maxCalls - timestamps.length };
    }

    const expiresAt = timestamps[0] + budget.windowSeconds;
    return {
      allowed: false,
      remaining: 0,
      retryAfterSeconds: secondsUntil(expiresAt, at),
    };
  }
}
