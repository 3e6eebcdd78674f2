import type { NextFunction, Request } from "express";
import { parse, stringify } from "lossless-json";
import type { GraphQLPayload } from "../types/payload";
import type { Sanitizer } from "../sanitizer/sanitize";
import type { GuardResponse } from "./guard.context";

function isPayload(value: unknown): value is GraphQLPayload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// lossless-json rejects duplicate keys with differing values; JSON.parse keeps
// the last one, which is what the upstream will read, so that one gets sanitized
function parseJson(text: string): unknown {
  try {
    return parse(text);
  } catch {
    return JSON.parse(text);
  }
}

/**
 * Anything that is not a JSON object decodes to null and is handled as an
 * empty payload.
 */
export function decodePayload(body: Buffer): GraphQLPayload | null {
  if (body.length === 0) return null;
  try {
    const value = parseJson(body.toString("utf8"));
    return isPayload(value) ? value : null;
  } catch {
    return null;
  }
}

/**
 * Decodes the captured body, strips the denylist from `query` and re-encodes
 * the payload. Bodies that do not decode are forwarded as received.
 */
export function sanitizeBody(sanitize: Sanitizer) {
  return (req: Request, res: GuardResponse, next: NextFunction) => {
    const raw: unknown = req.body;
    const received = Buffer.isBuffer(raw) ? raw : Buffer.alloc(0);
    const decoded = decodePayload(received);

    let originalQuery = "";
    let sanitizedQuery = "";
    let body = received;

    if (decoded) {
      const query = decoded.query;
      if (typeof query === "string") {
        originalQuery = query;
        sanitizedQuery = sanitize(query);
        decoded.query = sanitizedQuery;
      }
      const encoded = stringify(decoded);
      if (encoded !== undefined) {
        body = Buffer.from(encoded, "utf8");
      }
    }

    res.locals.guard = {
      body,
      originalQuery,
      sanitizedQuery,
      clientIp: "",
      receivedAt: 0,
    };
    next();
  };
}
