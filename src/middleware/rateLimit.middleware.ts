import { Request, Response, NextFunction, RequestHandler } from "express";
import { Decider } from "../limiter/decider";
import { Budget } from "../types/policy";
import { Decision, ResolutionErrorCode, Verdict } from "../types/decision";
import { getRequestAttributes, DEFAULT_CREDENTIAL_HEADER } from "../utils/identifier";
import { logEvent } from "../utils/logger";
import {
  RateLimitMetrics,
  recordAllowed,
  recordDenied,
  recordRejected,
} from "../utils/metrics";

export interface RateLimitMiddlewareOptions {
  credentialHeader?: string;
  metrics?: RateLimitMetrics;
}

const RESOLUTION_STATUS: Record<ResolutionErrorCode, number> = {
  MissingAddress: 400,
  CredentialMissing: 400,
  CredentialInvalid: 403,
};

export function rateLimit(
  decider: Decider,
  options: RateLimitMiddlewareOptions = {}
): RequestHandler {
  const credentialHeader = options.credentialHeader ?? DEFAULT_CREDENTIAL_HEADER;
  const metrics = options.metrics;

  return (req: Request, res: Response, next: NextFunction) => {
    let decision: Decision;
    try {
      decision = decider.decide(getRequestAttributes(req, credentialHeader));
    } catch (err) {
      logEvent({
        level: "error",
        event: "rate_limit.failure",
        message: err instanceof Error ? err.message : String(err),
        ip: req.ip,
      });
      return next(err);
    }

    if (!decision.ok) {
      if (metrics) recordRejected(metrics);
      logEvent({
        level: "warn",
        event: "rate_limit.rejected",
        message: decision.error.message,
        ip: req.ip,
        meta: { code: decision.error.code, path: req.path },
      });
      return res
        .status(RESOLUTION_STATUS[decision.error.code])
        .json({ detail: decision.error.message });
    }

    const { verdict, budget } = decision;
    setHeaders(res, budget, verdict);

    if (!verdict.allowed) {
      if (metrics) recordDenied(metrics);
      logEvent({
        level: "warn",
        event: "rate_limit.denied",
        message: "Rate limit exceeded",
        ip: req.ip,
        meta: { path: req.path, retryAfter: verdict.retryAfterSeconds },
      });
      res.setHeader("Retry-After", Math.ceil(verdict.retryAfterSeconds));
      return res.status(429).json({
        detail: `Rate limit exceeded. Retry after ${verdict.retryAfterSeconds.toFixed(2)} seconds`,
        retryAfter: verdict.retryAfterSeconds,
      });
    }

    if (metrics) recordAllowed(metrics);
    next();
  };
}

function setHeaders(res: Response, budget: Budget, verdict: Verdict) {
  res.setHeader("X-RateLimit-Limit", budget.maxCalls);
  res.setHeader("X-RateLimit-Remaining", verdict.remaining);
}
