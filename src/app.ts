import express, { Express, Request, Response, NextFunction } from "express";
import { rateLimit } from "./middleware/rateLimit.middleware";
import { RateLimitConfig } from "./config/rateLimit";
import { Decider } from "./limiter/decider";
import { createWindowStore } from "./limiter/limiterFactory";
import { WindowStore } from "./limiter/windowStore";
import { AddressIdentityResolver } from "./identity/addressIdentity";
import { CredentialIdentityResolver } from "./identity/credentialIdentity";
import { LimitPolicy } from "./policy/limitPolicy";
import { RateLimitAlgorithm } from "./types/policy";
import { Clock, SystemClock } from "./utils/clock";
import { logEvent } from "./utils/logger";
import {
  RateLimitMetrics,
  createMetrics,
  recordEvicted,
  snapshotMetrics,
} from "./utils/metrics";

export interface AppOptions {
  clock?: Clock;
}

export interface RateLimitedApp {
  app: Express;
  /** Owned by the app; start() them to enable periodic sweeps. */
  stores: WindowStore[];
  metrics: RateLimitMetrics;
}

export function createApp(
  config: RateLimitConfig,
  options: AppOptions = {}
): RateLimitedApp {
  const clock = options.clock ?? new SystemClock();
  const metrics = createMetrics();

  const newStore = (name: string, algorithm: RateLimitAlgorithm) =>
    createWindowStore(algorithm, {
      retentionSeconds: config.retentionSeconds,
      sweepIntervalSeconds: config.sweepIntervalSeconds,
      clock,
      onEvict: (evicted) => {
        recordEvicted(metrics, evicted);
        logEvent({
          level: "debug",
          event: "rate_limit.evicted",
          message: `Evicted ${evicted} idle identities`,
          meta: { store: name },
        });
      },
    });

  const addressStore = newStore("address", config.algorithm);
  const addressLimiter = new Decider({
    resolver: new AddressIdentityResolver(),
    policy: new LimitPolicy({ defaultBudget: config.defaultBudget }),
    store: addressStore,
    clock,
  });

  const credentialStore = newStore("credential", "fixed_window");
  const credentialLimiter = new Decider({
    resolver: new CredentialIdentityResolver(Object.keys(config.apiKeys)),
    policy: new LimitPolicy({
      defaultBudget: config.defaultBudget,
      credentialBudgets: config.apiKeys,
    }),
    store: credentialStore,
    clock,
  });

  const app = express();
  app.set("trust proxy", config.trustProxy);

  app.get("/metrics", (_req, res) => {
    res.json(snapshotMetrics(metrics));
  });

  app.get(
    "/",
    rateLimit(addressLimiter, { metrics }),
    (_req, res) => {
      res.json({ message: "Hello, World!" });
    }
  );

  app.get(
    "/api/protected",
    rateLimit(credentialLimiter, {
      metrics,
      credentialHeader: config.credentialHeader,
    }),
    (_req, res) => {
      res.json({ message: "Request successful" });
    }
  );

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    logEvent({
      level: "error",
      event: "http.unhandled_error",
      message: err instanceof Error ? err.message : String(err),
      ip: req.ip,
      meta: { path: req.path },
    });
    res.status(500).json({ detail: "Internal server error" });
  });

  return { app, stores: [addressStore, credentialStore], metrics };
}
