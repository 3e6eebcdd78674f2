import type { NextFunction, Request, Response } from "express";

export interface OriginPolicyConfig {
  allowedOrigin: string;
  allowedMethods: string;
  allowedHeaders: string;
}

/** Cross-origin response headers owned by the gateway; upstream copies are dropped. */
export const CORS_RESPONSE_HEADERS: ReadonlySet<string> = new Set([
  "access-control-allow-origin",
  "access-control-allow-methods",
  "access-control-allow-headers",
  "access-control-allow-credentials",
]);

/**
 * Sets the static CORS headers on every response and answers preflights with
 * an empty 200 before any route is matched.
 */
export function originPolicy(config: OriginPolicyConfig) {
  return (req: Request, res: Response, next: NextFunction) => {
    res.setHeader("Access-Control-Allow-Origin", config.allowedOrigin);
    res.setHeader("Access-Control-Allow-Methods", config.allowedMethods);
    res.setHeader("Access-Control-Allow-Headers", config.allowedHeaders);

    if (req.method === "OPTIONS") {
      res.status(200).end();
      return;
    }

    next();
  };
}
