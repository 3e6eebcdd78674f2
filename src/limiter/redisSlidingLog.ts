import fs from "node:fs";
import { randomUUID } from "node:crypto";
import { fileURLToPath } from "node:url";
import type Redis from "ioredis";
import type { RateLimiter } from "./rateLimiter";
import type { RateLimitPolicy } from "../types/policy";
import type { RateLimitResult } from "../types/decision";

/**
 * The two Redis commands the limiter needs. `fromIoredis` adapts a client.
 */
export interface ScriptClient {
  loadScript(script: string): Promise<string>;
  evalsha(sha: string, key: string, args: (string | number)[]): Promise<unknown>;
}

export function fromIoredis(redis: Redis): ScriptClient {
  return {
    async loadScript(script) {
      return String(await redis.script("LOAD", script));
    },
    evalsha(sha, key, args) {
      return redis.evalsha(sha, 1, key, ...args);
    },
  };
}

let luaScript: string | null = null;

function readLuaScript(): string {
  if (!luaScript) {
    luaScript = fs.readFileSync(
      fileURLToPath(new URL("./slidingLog.lua", import.meta.url)),
      "utf8"
    );
  }
  return luaScript;
}

function parseReply(reply: unknown): [number, number, number] {
  if (Array.isArray(reply) && reply.length === 3) {
    const [allowed, count, oldest]: unknown[] = reply;
    if (
      typeof allowed === "number" &&
      typeof count === "number" &&
      typeof oldest === "number"
    ) {
      return [allowed, count, oldest];
    }
  }
  throw new Error(`Unexpected sliding log reply: ${JSON.stringify(reply)}`);
}

/**
 * Sliding-log limiter backed by a Redis sorted set per client. The prune,
 * count and insert run inside one Lua script, so every gateway instance
 * sharing the Redis sees the same atomic decision.
 */
export class RedisSlidingLogLimiter implements RateLimiter {
  private sha: string | null = null;

  constructor(
    private readonly client: ScriptClient,
    private readonly keyPrefix = "rl:ip:"
  ) {}

  async consume(
    key: string,
    policy: RateLimitPolicy,
    now: number = Date.now()
  ): Promise<RateLimitResult> {
    const windowMs = Math.ceil(policy.windowSeconds * 1000);
    const args = [now, windowMs, policy.limit, `${now}-${randomUUID()}`];
    const redisKey = `${this.keyPrefix}${key}`;

    let reply: unknown;
    try {
      reply = await this.client.evalsha(await this.loadScript(), redisKey, args);
    } catch (err) {
      if (!(err instanceof Error) || !err.message.startsWith("NOSCRIPT")) {
        throw err;
      }
      // script cache was flushed (restart or failover); load it again
      this.sha = null;
      reply = await this.client.evalsha(await this.loadScript(), redisKey, args);
    }

    const [allowedFlag, count, oldest] = parseReply(reply);

    return {
      allowed: allowedFlag === 1,
      remaining: Math.max(0, policy.limit - count),
      resetAt: Math.ceil((oldest + windowMs) / 1000),
    };
  }

  private async loadScript(): Promise<string> {
    if (!this.sha) {
      this.sha = await this.client.loadScript(readLuaScript());
    }
    return this.sha;
  }
}
