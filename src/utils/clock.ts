export interface Clock {
  /** Seconds (fractional), never less than a previous reading. */
  now(): number;
}

export class SystemClock implements Clock {
  private last = 0;

  now(): number {
    // wall clock can step backwards (NTP); hold the last reading instead
    this.last = Math.max(this.last, Date.now() / 1000);
    return this.last;
  }
}

export class ManualClock implements Clock {
  constructor(private current: number = 0) {}

  now(): number {
    return this.current;
  }

  set(seconds: number): void {
    if (seconds < this.current) {
      throw new RangeError(
        `ManualClock cannot move backwards (${this.current} -> ${seconds})`
      );
    }
    this.current = seconds;
  }

  advance(seconds: number): void {
    if (seconds < 0) {
      throw new RangeError(`ManualClock cannot advance by ${seconds}`);
    }
    this.current += seconds;
  }
}
