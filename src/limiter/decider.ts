import { IdentityResolver } from "../identity/identityResolver";
import { LimitPolicy } from "../policy/limitPolicy";
import { WindowStore } from "./windowStore";
import { Clock, SystemClock } from "../utils/clock";
import { Decision } from "../types/decision";
import { RequestAttributes } from "../types/request";

export interface DeciderOptions {
  resolver: IdentityResolver;
  policy: LimitPolicy;
  store: WindowStore;
  clock?: Clock;
}

export class Decider {
  private readonly resolver: IdentityResolver;
  private readonly policy: LimitPolicy;
  private readonly store: WindowStore;
  private readonly clock: Clock;

  constructor(options: DeciderOptions) {
    this.resolver = options.resolver;
    this.policy = options.policy;
    this.store = options.store;
    this.clock = options.clock ?? new SystemClock();
  }

  decide(attributes: RequestAttributes, at: number = this.clock.now()): Decision {
    const resolution = this.resolver.resolve(attributes);
    if (!resolution.ok) {
      return { ok: false, error: resolution.error };
    }

    const budget = this.policy.budgetFor(resolution.identity, resolution.policyKey);
    const verdict = this.store.record(resolution.identity, budget, at);
    return { ok: true, identity: resolution.identity, budget, verdict };
  }
}
