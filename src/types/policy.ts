export type RateLimitAlgorithm = "sliding_log" | "fixed_window";

export interface Budget {
  readonly maxCalls: number;      // calls admitted per window
  readonly windowSeconds: number; // window length, fractional seconds allowed
}

export type BudgetTable = Readonly<Record<string, Budget>>;
