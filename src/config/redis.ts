import Redis from "ioredis";
import { logger } from "../utils/logger";

function maskRedisUrl(redisUrl: string) {
  try {
    const parsed = new URL(redisUrl);
    if (parsed.password) {
      parsed.password = "****";
    }
    return parsed.toString();
  } catch {
    return redisUrl.replace(/:[^:@/]+@/, ":****@");
  }
}

/**
 * Rate-limit store client. The offline queue is off so a dead Redis fails the
 * admission check straight away and the configured failure strategy decides.
 */
export function createRedisClient(redisUrl: string): Redis {
  const redis = new Redis(redisUrl, {
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    retryStrategy(times: number) {
      const delay = Math.min(times * 200, 2000);
      logger.warn({ attempt: times, delay }, "redis reconnecting");
      return delay;
    },
  });

  redis.on("connect", () => {
    logger.info({ url: maskRedisUrl(redisUrl) }, "redis connected");
  });
  redis.on("error", (err) => {
    logger.error({ err }, "redis error");
  });

  return redis;
}
