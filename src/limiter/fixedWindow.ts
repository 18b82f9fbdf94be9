import { InMemoryWindowStore, WindowRecord, secondsUntil } from "./windowStore";
import { Budget } from "../types/policy";
import { Verdict } from "../types/decision";

interface FixedWindowRecord extends WindowRecord {
  bucketStart: number;
  count: number;
}

/**
 * One counter per identity. The bucket opens on the first call and resets
 * on the first call at or after `bucketStart + windowSeconds`.
 */
export class FixedWindowStore extends InMemoryWindowStore<FixedWindowRecord> {
  protected createRecord(at: number): FixedWindowRecord {
    return { bucketStart: at, count: 0, lastActivity: at, windowSeconds: 0 };
  }

  protected apply(
    record: FixedWindowRecord,
    budget: Budget,
    at: number
  ): Verdict {
    const expiresAt = record.bucketStart + budget.windowSeconds;
    if (at >= expiresAt) {
      record.bucketStart = at;
      record.count = 0;
    }

    if (record.count < budget.maxCalls) {
      record.count += 1;
      return { allowed: true, remaining: budget.maxCalls - record.count };
    }

    return {
      allowed: false,
      remaining: 0,
      retryAfterSeconds: secondsUntil(expiresAt, at),
    };
  }
}
