import { z } from "zod";
import { RateLimitAlgorithm, Budget } from "../types/policy";
import { DEFAULT_CREDENTIAL_HEADER } from "../utils/identifier";
import { ConfigError } from "../utils/errors";
import { LogLevel } from "../utils/logger";

const budgetSchema = z.object({
  maxCalls: z.number().int().positive(),
  windowSeconds: z.number().positive().finite(),
});

const apiKeysSchema = z
  .string()
  .transform((raw, ctx) => {
    try {
      const value: unknown = JSON.parse(raw);
      return value;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be valid JSON" });
      return z.NEVER;
    }
  })
  .pipe(z.record(budgetSchema))
  .transform((table) =>
    Object.fromEntries(
      Object.entries(table).map(
        ([key, budget]): [string, Budget] => [key.trim(), budget]
      )
    )
  );

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  TRUST_PROXY: booleanFlag.default("false"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  RATE_LIMIT_ALGORITHM: z
    .enum(["sliding_log", "fixed_window"])
    .default("sliding_log"),
  RATE_LIMIT_MAX_CALLS: z.coerce.number().int().positive().default(5),
  RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().positive().finite().default(60),
  RATE_LIMIT_API_KEY_HEADER: z.string().min(1).default(DEFAULT_CREDENTIAL_HEADER),
  RATE_LIMIT_API_KEYS: apiKeysSchema.default("{}"),
  RATE_LIMIT_RETENTION_SECONDS: z.coerce.number().positive().finite().optional(),
  RATE_LIMIT_SWEEP_INTERVAL_SECONDS: z.coerce
    .number()
    .positive()
    .finite()
    .default(60),
});

export interface RateLimitConfig {
  port: number;
  trustProxy: boolean;
  logLevel: LogLevel;
  algorithm: RateLimitAlgorithm;
  defaultBudget: Budget;
  credentialHeader: string;
  /** Known API keys and their budgets. */
  apiKeys: Record<string, Budget>;
  retentionSeconds: number;
  sweepIntervalSeconds: number;
}

/** Retention horizon as a multiple of the largest configured window. */
export const RETENTION_WINDOW_MULTIPLIER = 3;

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): RateLimitConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid rate limit configuration",
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      )
    );
  }

  const values = parsed.data;
  const defaultBudget: Budget = {
    maxCalls: values.RATE_LIMIT_MAX_CALLS,
    windowSeconds: values.RATE_LIMIT_WINDOW_SECONDS,
  };
  const largestWindow = Math.max(
    defaultBudget.windowSeconds,
    ...Object.values(values.RATE_LIMIT_API_KEYS).map((b) => b.windowSeconds)
  );

  return {
    port: values.PORT,
    trustProxy: values.TRUST_PROXY,
    logLevel: values.LOG_LEVEL,
    algorithm: values.RATE_LIMIT_ALGORITHM,
    defaultBudget,
    credentialHeader: values.RATE_LIMIT_API_KEY_HEADER.toLowerCase(),
    apiKeys: values.RATE_LIMIT_API_KEYS,
    retentionSeconds:
      values.RATE_LIMIT_RETENTION_SECONDS ??
      largestWindow * RETENTION_WINDOW_MULTIPLIER,
    sweepIntervalSeconds: values.RATE_LIMIT_SWEEP_INTERVAL_SECONDS,
  };
}
