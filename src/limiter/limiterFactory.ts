import { WindowStore, WindowStoreOptions } from "./windowStore";
import { FixedWindowStore } from "./fixedWindow";
import { SlidingLogStore } from "./slidingLog";
import { RateLimitAlgorithm } from "../types/policy";

type StoreConstructor = new (options: WindowStoreOptions) => WindowStore;

const stores: Record<RateLimitAlgorithm, StoreConstructor> = {
  sliding_log: SlidingLogStore,
  fixed_window: FixedWindowStore,
};

/**
 * Each call builds a fresh store; callers own it for the life of the
 * process and pass it to their Decider.
 */
export function createWindowStore(
  algorithm: RateLimitAlgorithm,
  options: WindowStoreOptions
): WindowStore {
  const Store: StoreConstructor | undefined = stores[algorithm];
  if (!Store) {
    throw new Error(`Unsupported rate limit algorithm: ${algorithm}`);
  }
  return new Store(options);
}
