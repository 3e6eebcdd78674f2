import { pipeline } from "node:stream/promises";
import type { Request, Response } from "express";
import { Agent, type Dispatcher, request } from "undici";
import { CORS_RESPONSE_HEADERS } from "../middleware/cors.middleware";
import { logger } from "../utils/logger";
import { recordUpstreamError } from "../utils/metrics";

type HeaderMap = Record<string, string | string[] | undefined>;

const HOP_BY_HOP_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "proxy-connection",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
]);

// Node has already answered Expect and express.raw has already inflated the body
const REQUEST_ONLY_HEADERS: ReadonlySet<string> = new Set([
  "host",
  "content-length",
  "expect",
  "content-encoding",
]);

const HTTP_METHODS: readonly Dispatcher.HttpMethod[] = [
  "GET",
  "HEAD",
  "POST",
  "PUT",
  "DELETE",
  "OPTIONS",
  "PATCH",
];

function isHttpMethod(method: string): method is Dispatcher.HttpMethod {
  return HTTP_METHODS.some((known) => known === method);
}

export interface UpstreamForwarderOptions {
  target: URL;
  headersTimeoutMs?: number;
  bodyTimeoutMs?: number;
  /** Overrides the pooled Agent built from the timeouts. */
  dispatcher?: Dispatcher;
}

function joinPaths(base: string, path: string): string {
  const baseSlash = base.endsWith("/");
  const pathSlash = path.startsWith("/");
  if (baseSlash && pathSlash) return base + path.slice(1);
  if (!baseSlash && !pathSlash) return `${base}/${path}`;
  return base + path;
}

/**
 * Maps an inbound path and query onto the upstream base URL: paths are joined
 * with one slash and the target's own query string comes first.
 */
export function buildUpstreamUrl(target: URL, originalUrl: string): URL {
  const queryStart = originalUrl.indexOf("?");
  const path = queryStart === -1 ? originalUrl : originalUrl.slice(0, queryStart);
  const query = queryStart === -1 ? "" : originalUrl.slice(queryStart + 1);

  const url = new URL(target.toString());
  url.pathname = joinPaths(target.pathname, path);
  const search = [target.search.slice(1), query].filter(Boolean).join("&");
  url.search = search ? `?${search}` : "";
  url.hash = "";
  return url;
}

function connectionTokens(headers: HeaderMap): Set<string> {
  const value = headers.connection;
  const raw = Array.isArray(value) ? value.join(",") : value ?? "";
  return new Set(
    raw
      .split(",")
      .map((token) => token.trim().toLowerCase())
      .filter(Boolean)
  );
}

/**
 * Copies headers that are safe to relay: no hop-by-hop headers, nothing the
 * Connection header names, and none of the CORS headers the gateway owns.
 */
export function filterHeaders(
  headers: HeaderMap,
  skip: ReadonlySet<string> = new Set()
): Record<string, string | string[]> {
  const named = connectionTokens(headers);
  const out: Record<string, string | string[]> = {};
  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    if (value === undefined) continue;
    if (HOP_BY_HOP_HEADERS.has(lower) || named.has(lower)) continue;
    if (CORS_RESPONSE_HEADERS.has(lower) || skip.has(lower)) continue;
    out[lower] = value;
  }
  return out;
}

function forwardedFor(headers: HeaderMap, clientIp: string): string {
  const prior = headers["x-forwarded-for"];
  const chain = Array.isArray(prior) ? prior.join(", ") : prior;
  if (!clientIp) return chain ?? "";
  return chain ? `${chain}, ${clientIp}` : clientIp;
}

/**
 * Relays a request to the single upstream and streams the answer back.
 * Failures are never retried: GraphQL mutations carry no idempotency guarantee.
 */
export class UpstreamForwarder {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(private readonly options: UpstreamForwarderOptions) {
    this.ownsDispatcher = !options.dispatcher;
    this.dispatcher =
      options.dispatcher ??
      new Agent({
        headersTimeout: options.headersTimeoutMs,
        bodyTimeout: options.bodyTimeoutMs,
      });
  }

  get target(): URL {
    return this.options.target;
  }

  async forward(req: Request, res: Response, body: Buffer, clientIp: string): Promise<void> {
    const url = buildUpstreamUrl(this.options.target, req.originalUrl);
    const method = req.method.toUpperCase();
    if (!isHttpMethod(method)) {
      throw new Error(`Cannot forward HTTP method ${req.method}`);
    }

    const headers = filterHeaders(req.headers, REQUEST_ONLY_HEADERS);
    headers["content-length"] = String(body.length);
    headers["x-forwarded-for"] = forwardedFor(req.headers, clientIp);
    headers["x-forwarded-proto"] = req.protocol;
    if (req.headers.host) {
      headers["x-forwarded-host"] = req.headers.host;
    }

    // caller went away: stop talking to the upstream on its behalf
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    };
    res.once("close", onClose);

    const relayed: string[] = [];
    try {
      const upstream = await request(url, {
        method,
        headers,
        body: method === "GET" || method === "HEAD" ? undefined : body,
        dispatcher: this.dispatcher,
        signal: controller.signal,
      });

      res.status(upstream.statusCode);
      for (const [name, value] of Object.entries(filterHeaders(upstream.headers))) {
        res.setHeader(name, value);
        relayed.push(name);
      }

      await pipeline(upstream.body, res);
    } catch (err) {
      if (controller.signal.aborted) {
        logger.debug({ url: url.toString() }, "client disconnected, upstream request aborted");
        return;
      }

      recordUpstreamError();
      logger.warn({ err, url: url.toString() }, "upstream request failed");

      if (res.headersSent) {
        res.destroy(err instanceof Error ? err : undefined);
        return;
      }
      for (const name of relayed) {
        res.removeHeader(name);
      }
      res.status(502).json({ message: "Bad Gateway" });
    } finally {
      res.off("close", onClose);
    }
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}
