import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import express from "express";
import request from "supertest";
import { createApp } from "../src/app";
import { loadConfig } from "../src/config/rateLimit";
import { rateLimit } from "../src/middleware/rateLimit.middleware";
import { Decider } from "../src/limiter/decider";
import { WindowStore } from "../src/limiter/windowStore";
import { AddressIdentityResolver } from "../src/identity/addressIdentity";
import { LimitPolicy } from "../src/policy/limitPolicy";
import { ManualClock } from "../src/utils/clock";

const apiKeys = JSON.stringify({
  api_key_1: { maxCalls: 5, windowSeconds: 60 },
  api_key_2: { maxCalls: 10, windowSeconds: 60 },
});

function buildApp(env: Record<string, string> = {}) {
  const clock = new ManualClock(1000);
  const config = loadConfig({
    RATE_LIMIT_API_KEYS: apiKeys,
    TRUST_PROXY: "true",
    ...env,
  });
  return { ...createApp(config, { clock }), clock };
}

function loggedEvents(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map((call) => {
    const line = call[0];
    const parsed: unknown = typeof line === "string" ? JSON.parse(line) : null;
    if (parsed && typeof parsed === "object" && "event" in parsed) {
      return String(parsed.event);
    }
    return "";
  });
}

describe("rateLimit middleware", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("admits calls within budget and answers 429 past it", async () => {
    const { app, clock } = buildApp();

    for (let i = 0; i < 5; i++) {
      const res = await request(app).get("/").set("X-Forwarded-For", "203.0.113.7");
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: "Hello, World!" });
      expect(res.headers["x-ratelimit-limit"]).toBe("5");
      expect(res.headers["x-ratelimit-remaining"]).toBe(String(4 - i));
      clock.advance(1);
    }

    const res = await request(app).get("/").set("X-Forwarded-For", "203.0.113.7");
    expect(res.status).toBe(429);
    expect(res.body).toEqual({
      detail: "Rate limit exceeded. Retry after 55.00 seconds",
      retryAfter: 55,
    });
    expect(res.headers["retry-after"]).toBe("55");
    expect(res.headers["x-ratelimit-remaining"]).toBe("0");
    expect(loggedEvents(vi.mocked(console.warn))).toContain("rate_limit.denied");
  });

  it("limits each client address separately", async () => {
    const { app } = buildApp({ RATE_LIMIT_MAX_CALLS: "1" });

    const first = await request(app).get("/").set("X-Forwarded-For", "203.0.113.7");
    const second = await request(app).get("/").set("X-Forwarded-For", "203.0.113.8");
    const repeat = await request(app).get("/").set("X-Forwarded-For", "203.0.113.7");

    expect([first.status, second.status, repeat.status]).toEqual([200, 200, 429]);
  });

  it("ignores X-Forwarded-For unless trust proxy is enabled", async () => {
    const { app } = createApp(loadConfig({ RATE_LIMIT_MAX_CALLS: "1" }), {
      clock: new ManualClock(1000),
    });

    const statuses: number[] = [];
    for (let i = 0; i < 5; i++) {
      const res = await request(app).get("/").set("X-Forwarded-For", `1.2.3.${i}`);
      statuses.push(res.status);
    }

    expect(statuses).toEqual([200, 429, 429, 429, 429]);
  });

  it("maps credential failures to 400 and 403", async () => {
    const { app } = buildApp();

    const missing = await request(app).get("/api/protected");
    expect(missing.status).toBe(400);
    expect(missing.body).toEqual({ detail: "API key is missing" });

    const invalid = await request(app).get("/api/protected").set("X-API-Key", "bogus_key");
    expect(invalid.status).toBe(403);
    expect(invalid.body).toEqual({ detail: "Invalid API key" });

    expect(loggedEvents(vi.mocked(console.warn))).toEqual([
      "rate_limit.rejected",
      "rate_limit.rejected",
    ]);
  });

  it("applies the budget of the presented API key", async () => {
    const { app } = buildApp();

    const res = await request(app)
      .get("/api/protected")
      .set("X-API-Key", "api_key_2")
      .set("X-Forwarded-For", "10.0.0.1");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: "Request successful" });
    expect(res.headers["x-ratelimit-limit"]).toBe("10");
    expect(res.headers["x-ratelimit-remaining"]).toBe("9");
  });

  it("admits exactly maxCalls of concurrent requests at one instant", async () => {
    const { app } = buildApp({ RATE_LIMIT_MAX_CALLS: "10" });

    const responses = await Promise.all(
      Array.from({ length: 30 }, () =>
        request(app).get("/").set("X-Forwarded-For", "198.51.100.4")
      )
    );
    const statuses = responses.map((res) => res.status);

    expect(statuses.filter((s) => s === 200)).toHaveLength(10);
    expect(statuses.filter((s) => s === 429)).toHaveLength(20);
  });

  it("counts every outcome in /metrics", async () => {
    const { app } = buildApp({ RATE_LIMIT_MAX_CALLS: "1" });

    await request(app).get("/").set("X-Forwarded-For", "203.0.113.7");
    await request(app).get("/").set("X-Forwarded-For", "203.0.113.7");
    await request(app).get("/api/protected");

    const res = await request(app).get("/metrics");
    expect(res.body).toEqual({ allowed: 1, denied: 1, rejected: 1, evicted: 0 });
  });

  it("counts evictions from the app's stores", async () => {
    const { app, stores, metrics } = buildApp();

    await request(app).get("/").set("X-Forwarded-For", "203.0.113.7");
    stores.forEach((store) => store.sweep(1000 + 181));

    expect(metrics.evicted).toBe(1);
  });

  it("reports health", async () => {
    const { app } = buildApp();
    const res = await request(app).get("/health");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "ok" });
  });

  it("passes store failures to the error handler", async () => {
    const failing: WindowStore = {
      record: () => {
        throw new Error("store unavailable");
      },
      sweep: () => 0,
      size: () => 0,
      has: () => false,
      clear: () => {},
      start: () => {},
      stop: () => {},
    };
    const decider = new Decider({
      resolver: new AddressIdentityResolver(),
      policy: new LimitPolicy({ defaultBudget: { maxCalls: 1, windowSeconds: 60 } }),
      store: failing,
    });

    const app = express();
    app.get("/", rateLimit(decider), (_req, res) => {
      res.json({ message: "unreachable" });
    });

    const res = await request(app).get("/");
    expect(res.status).toBe(500);
    expect(loggedEvents(vi.mocked(console.error))).toContain("rate_limit.failure");
  });
});
