export { createApp } from "./app";
export type { AppOptions, RateLimitedApp } from "./app";
export { Decider } from "./limiter/decider";
export type { DeciderOptions } from "./limiter/decider";
export { createWindowStore } from "./limiter/limiterFactory";
export { InMemoryWindowStore, DEFAULT_SWEEP_INTERVAL_SECONDS } from "./limiter/windowStore";
export type { WindowStore, WindowStoreOptions, WindowRecord } from "./limiter/windowStore";
export { SlidingLogStore } from "./limiter/slidingLog";
export { FixedWindowStore } from "./limiter/fixedWindow";
export { AddressIdentityResolver, hashAddress } from "./identity/addressIdentity";
export { CredentialIdentityResolver } from "./identity/credentialIdentity";
export type { IdentityResolver, IdentityResolution } from "./identity/identityResolver";
export { LimitPolicy } from "./policy/limitPolicy";
export type { LimitPolicyOptions } from "./policy/limitPolicy";
export { rateLimit } from "./middleware/rateLimit.middleware";
export type { RateLimitMiddlewareOptions } from "./middleware/rateLimit.middleware";
export { loadConfig } from "./config/rateLimit";
export type { RateLimitConfig } from "./config/rateLimit";
export { SystemClock, ManualClock } from "./utils/clock";
export type { Clock } from "./utils/clock";
export { ConfigError } from "./utils/errors";
export type { Budget, BudgetTable, RateLimitAlgorithm } from "./types/policy";
export type { Verdict, Decision, ResolutionError, ResolutionErrorCode } from "./types/decision";
export type { RequestAttributes } from "./types/request";
