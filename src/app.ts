import express from "express";
import { originPolicy, type OriginPolicyConfig } from "./middleware/cors.middleware";
import { sanitizeBody } from "./middleware/sanitize.middleware";
import { rateLimit } from "./middleware/rateLimit.middleware";
import { auditDispatch } from "./middleware/audit.middleware";
import { forwardRequest } from "./middleware/forward.middleware";
import { errorHandler, notFound } from "./middleware/error.middleware";
import { createSanitizer } from "./sanitizer/sanitize";
import type { RateLimiter } from "./limiter/rateLimiter";
import type { RateLimitPolicy } from "./types/policy";
import type { AuditSink } from "./audit/auditSink";
import type { UpstreamForwarder } from "./forwarder/upstream";
import { getMetrics } from "./utils/metrics";

export interface AppDependencies {
  guardPath: string;
  denylist: string;
  maxBodyBytes: number;
  cors: OriginPolicyConfig;
  rateLimit: RateLimitPolicy;
  limiter: RateLimiter;
  fallbackLimiter?: RateLimiter;
  auditSink: AuditSink;
  forwarder: UpstreamForwarder;
  /** Clock for admission checks and audit timestamps, in epoch ms. */
  now?: () => number;
}

export function createApp(deps: AppDependencies) {
  const app = express();
  app.disable("x-powered-by");
  // the guarded path must match exactly: no trailing slash, no case folding
  app.set("strict routing", true);
  app.set("case sensitive routing", true);

  app.get("/metrics", (_req, res) => {
    res.json(getMetrics());
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use(originPolicy(deps.cors));

  app.post(
    deps.guardPath,
    express.raw({ type: () => true, limit: deps.maxBodyBytes }),
    sanitizeBody(createSanitizer(deps.denylist)),
    rateLimit({
      limiter: deps.limiter,
      policy: deps.rateLimit,
      fallbackLimiter: deps.fallbackLimiter,
      now: deps.now,
    }),
    auditDispatch(deps.auditSink),
    forwardRequest(deps.forwarder)
  );

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
