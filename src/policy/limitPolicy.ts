import { Budget, BudgetTable } from "../types/policy";
import { ConfigError } from "../utils/errors";

export interface LimitPolicyOptions {
  defaultBudget: Budget;
  /** Keyed by credential (the resolver's policyKey). */
  credentialBudgets?: BudgetTable;
  /** Keyed by resolved identity; wins over credential budgets. */
  identityBudgets?: BudgetTable;
}

export function budgetIssues(label: string, budget: Budget): string[] {
  const issues: string[] = [];
  if (!Number.isInteger(budget.maxCalls) || budget.maxCalls <= 0) {
    issues.push(`${label}.maxCalls must be a positive integer`);
  }
  if (!Number.isFinite(budget.windowSeconds) || budget.windowSeconds <= 0) {
    issues.push(`${label}.windowSeconds must be a positive number`);
  }
  return issues;
}

function freezeTable(
  name: string,
  table: BudgetTable | undefined,
  issues: string[]
): ReadonlyMap<string, Budget> {
  const frozen = new Map<string, Budget>();
  for (const [key, budget] of Object.entries(table ?? {})) {
    issues.push(...budgetIssues(`${name}[${key}]`, budget));
    frozen.set(key, Object.freeze({ ...budget }));
  }
  return frozen;
}

export class LimitPolicy {
  private readonly defaultBudget: Budget;
  private readonly byCredential: ReadonlyMap<string, Budget>;
  private readonly byIdentity: ReadonlyMap<string, Budget>;

  constructor(options: LimitPolicyOptions) {
    const issues = budgetIssues("defaultBudget", options.defaultBudget);
    this.byCredential = freezeTable(
      "credentialBudgets",
      options.credentialBudgets,
      issues
    );
    this.byIdentity = freezeTable(
      "identityBudgets",
      options.identityBudgets,
      issues
    );
    if (issues.length > 0) {
      throw new ConfigError("Invalid rate limit policy", issues);
    }
    this.defaultBudget = Object.freeze({ ...options.defaultBudget });
  }

  budgetFor(identity: string, policyKey?: string): Budget {
    return (
      this.byIdentity.get(identity) ??
      (policyKey !== undefined ? this.byCredential.get(policyKey) : undefined) ??
      this.defaultBudget
    );
  }
}
