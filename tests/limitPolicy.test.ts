import { describe, it, expect } from "vitest";
import { LimitPolicy } from "../src/policy/limitPolicy";
import { ConfigError } from "../src/utils/errors";
import { Budget } from "../src/types/policy";

describe("LimitPolicy", () => {
  const defaultBudget: Budget = { maxCalls: 5, windowSeconds: 60 };

  it("falls back to the default budget", () => {
    const policy = new LimitPolicy({ defaultBudget });

    expect(policy.budgetFor("anyone")).toEqual(defaultBudget);
    expect(policy.budgetFor("anyone", "unknown_key")).toEqual(defaultBudget);
  });

  it("looks up credential budgets by policy key", () => {
    const policy = new LimitPolicy({
      defaultBudget,
      credentialBudgets: {
        api_key_1: { maxCalls: 5, windowSeconds: 60 },
        api_key_2: { maxCalls: 10, windowSeconds: 60 },
      },
    });

    expect(policy.budgetFor("api_key_2\n10.0.0.1", "api_key_2")).toEqual({
      maxCalls: 10,
      windowSeconds: 60,
    });
  });

  it("prefers an identity override over the credential budget", () => {
    const policy = new LimitPolicy({
      defaultBudget,
      credentialBudgets: { api_key_1: { maxCalls: 5, windowSeconds: 60 } },
      identityBudgets: { "api_key_1\n10.0.0.9": { maxCalls: 50, windowSeconds: 30 } },
    });

    expect(policy.budgetFor("api_key_1\n10.0.0.9", "api_key_1")).toEqual({
      maxCalls: 50,
      windowSeconds: 30,
    });
    expect(policy.budgetFor("api_key_1\n10.0.0.1", "api_key_1")).toEqual({
      maxCalls: 5,
      windowSeconds: 60,
    });
  });

  it("copies and freezes its budgets", () => {
    const table: Record<string, Budget> = {
      api_key_1: { maxCalls: 5, windowSeconds: 60 },
    };
    const policy = new LimitPolicy({ defaultBudget, credentialBudgets: table });
    table.api_key_1 = { maxCalls: 1, windowSeconds: 1 };

    const budget = policy.budgetFor("x", "api_key_1");
    expect(budget).toEqual({ maxCalls: 5, windowSeconds: 60 });
    expect(Object.isFrozen(budget)).toBe(true);
    expect(Object.isFrozen(policy.budgetFor("x"))).toBe(true);
  });

  it("rejects invalid budgets", () => {
    expect(
      () => new LimitPolicy({ defaultBudget: { maxCalls: 0, windowSeconds: 60 } })
    ).toThrow(ConfigError);

    try {
      new LimitPolicy({
        defaultBudget,
        credentialBudgets: { api_key_1: { maxCalls: 2.5, windowSeconds: -1 } },
      });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (!(err instanceof ConfigError)) return;
      expect(err.issues).toEqual([
        "credentialBudgets[api_key_1].maxCalls must be a positive integer",
        "credentialBudgets[api_key_1].windowSeconds must be a positive number",
      ]);
    }
  });
});
