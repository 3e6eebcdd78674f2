import type { Server } from "node:http";
import type Redis from "ioredis";
import { createApp } from "./app";
import { ConfigError, loadConfigFromEnvironment } from "./config/env";
import { connectMongo } from "./config/mongo";
import { createRedisClient } from "./config/redis";
import { createLimiter } from "./limiter/limiterFactory";
import { SlidingLogLimiter } from "./limiter/slidingLog";
import { AuditQueue } from "./audit/auditQueue";
import { MongoAuditWriter } from "./audit/mongoAuditWriter";
import { UpstreamForwarder } from "./forwarder/upstream";
import { logger } from "./utils/logger";

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

async function main() {
  const config = loadConfigFromEnvironment();

  const mongo = await connectMongo({
    ...config.mongo,
    socketTimeoutMs: config.audit.writeTimeoutMs,
  });
  const redis: Redis | null =
    config.rateLimitStore === "redis" && config.redisUrl
      ? createRedisClient(config.redisUrl)
      : null;

  const limiter = createLimiter(config.rateLimitStore, redis);
  const fallbackLimiter = new SlidingLogLimiter();
  const sweepers = [limiter, fallbackLimiter].filter(
    (l): l is SlidingLogLimiter => l instanceof SlidingLogLimiter
  );
  sweepers.forEach((l) => l.start());

  const auditQueue = new AuditQueue(new MongoAuditWriter(mongo.collection), {
    capacity: config.audit.queueSize,
    writeTimeoutMs: config.audit.writeTimeoutMs,
  });
  const forwarder = new UpstreamForwarder({
    target: config.upstreamUrl,
    headersTimeoutMs: config.upstream.headersTimeoutMs,
    bodyTimeoutMs: config.upstream.bodyTimeoutMs,
  });

  const app = createApp({
    guardPath: config.guardPath,
    denylist: config.denylist,
    maxBodyBytes: config.maxBodyBytes,
    cors: config.cors,
    rateLimit: config.rateLimit,
    limiter,
    fallbackLimiter,
    auditSink: auditQueue,
    forwarder,
  });

  const server = app.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        path: config.guardPath,
        upstream: config.upstreamUrl.origin,
        store: config.rateLimitStore,
      },
      "graphql guard listening"
    );
  });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "shutting down");

    sweepers.forEach((l) => l.stop());
    await closeServer(server);
    await auditQueue.close();
    await forwarder.close();
    await mongo.client.close();
    if (redis) {
      await redis.quit();
    }
    logger.info("shutdown complete");
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        logger.error({ err }, "shutdown failed");
        process.exitCode = 1;
      });
    });
  }
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    logger.fatal({ issues: err.issues }, "invalid configuration");
  } else {
    logger.fatal({ err }, "startup failed");
  }
  process.exit(1);
});
