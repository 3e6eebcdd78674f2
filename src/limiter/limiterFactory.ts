import type Redis from "ioredis";
import type { RateLimiter } from "./rateLimiter";
import { SlidingLogLimiter } from "./slidingLog";
import { RedisSlidingLogLimiter, fromIoredis } from "./redisSlidingLog";

export type RateLimitStore = "memory" | "redis";

export function createLimiter(
  store: RateLimitStore,
  redis?: Redis | null
): RateLimiter {
  switch (store) {
    case "memory":
      return new SlidingLogLimiter();
    case "redis":
      if (!redis) {
        throw new Error("Redis-backed rate limiting needs a Redis client");
      }
      return new RedisSlidingLogLimiter(fromIoredis(redis));
  }
}
