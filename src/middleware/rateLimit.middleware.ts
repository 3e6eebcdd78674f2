import type { NextFunction, Request, Response } from "express";
import type { RateLimitPolicy } from "../types/policy";
import type { RateLimitResult } from "../types/decision";
import type { RateLimiter } from "../limiter/rateLimiter";
import { SlidingLogLimiter } from "../limiter/slidingLog";
import { extractClientIp } from "../utils/identifier";
import { logger } from "../utils/logger";
import { recordAllowed, recordBlocked, recordLimiterError } from "../utils/metrics";
import { type GuardResponse, getGuardContext } from "./guard.context";

export interface RateLimitOptions {
  limiter: RateLimiter;
  policy: RateLimitPolicy;
  /** Used by the "local-fallback" strategy when `limiter` fails. */
  fallbackLimiter?: RateLimiter;
  now?: () => number;
}

/**
 * Admission check keyed on the client IP. Stores the identity on the guard
 * context for the audit record. Denied requests end here with 429.
 */
export function rateLimit(options: RateLimitOptions) {
  const { limiter, policy } = options;
  const strategy = policy.failureStrategy ?? "fail-open";
  const fallbackLimiter = options.fallbackLimiter ?? new SlidingLogLimiter();
  const clock = options.now ?? Date.now;

  const admit = async (req: Request, res: GuardResponse, next: NextFunction) => {
    const guard = getGuardContext(res);
    guard.clientIp = extractClientIp(req.socket.remoteAddress);
    const now = clock();
    guard.receivedAt = now;

    let result: RateLimitResult;
    try {
      result = await limiter.consume(guard.clientIp, policy, now);
    } catch (err) {
      recordLimiterError();
      logger.error({ err, clientIp: guard.clientIp, strategy }, "rate limiter failure");

      if (strategy === "fail-closed") {
        res.status(503).json({ message: "Rate limiting unavailable" });
        return;
      }
      if (strategy === "fail-open") {
        next();
        return;
      }
      result = await fallbackLimiter.consume(guard.clientIp, policy, now);
    }

    setHeaders(res, policy, result);

    if (!result.allowed) {
      recordBlocked();
      logger.info({ clientIp: guard.clientIp }, "rate limit exceeded");
      res.status(429).json({ message: "Rate limit exceeded" });
      return;
    }

    recordAllowed();
    next();
  };

  return (req: Request, res: GuardResponse, next: NextFunction) => {
    admit(req, res, next).catch(next);
  };
}

function setHeaders(res: Response, policy: RateLimitPolicy, result: RateLimitResult) {
  res.setHeader("X-RateLimit-Limit", policy.limit);
  res.setHeader("X-RateLimit-Remaining", result.remaining);
  res.setHeader("X-RateLimit-Reset", result.resetAt);
}
