import type { RateLimiter } from "./rateLimiter";
import type { RateLimitPolicy } from "../types/policy";
import type { RateLimitResult } from "../types/decision";
import { logger } from "../utils/logger";

const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

/**
 * In-memory sliding-log limiter: one ascending list of admission timestamps
 * per client.
 *
 * Each decision runs as a single synchronous step between the read of a
 * client's log and the write back, so two concurrent requests from the same
 * client are serialized by the event loop and cannot both take the last slot.
 */
export class SlidingLogLimiter implements RateLimiter {
  private readonly logs = new Map<string, number[]>();
  private sweepTimer: NodeJS.Timeout | null = null;
  private lastWindowMs = 0;

  async consume(
    key: string,
    policy: RateLimitPolicy,
    now: number = Date.now()
  ): Promise<RateLimitResult> {
    return this.decide(key, policy, now);
  }

  async allow(
    clientId: string,
    policy: RateLimitPolicy,
    now: number = Date.now()
  ): Promise<boolean> {
    return this.decide(clientId, policy, now).allowed;
  }

  /** Number of clients currently tracked. */
  get size(): number {
    return this.logs.size;
  }

  /**
   * Drops every client whose newest admission has left the window.
   * Returns how many were evicted.
   */
  sweep(now: number = Date.now(), windowMs: number = this.lastWindowMs): number {
    let evicted = 0;
    for (const [key, log] of this.logs) {
      const newest = log[log.length - 1];
      if (newest === undefined || now - newest > windowMs) {
        this.logs.delete(key);
        evicted++;
      }
    }
    return evicted;
  }

  start(intervalMs: number = DEFAULT_SWEEP_INTERVAL_MS): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      const evicted = this.sweep();
      if (evicted > 0) {
        logger.debug({ evicted, tracked: this.logs.size }, "evicted idle rate-limit entries");
      }
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private decide(key: string, policy: RateLimitPolicy, now: number): RateLimitResult {
    const windowMs = policy.windowSeconds * 1000;
    this.lastWindowMs = Math.max(this.lastWindowMs, windowMs);

    const log = this.logs.get(key) ?? [];

    let firstRecent = 0;
    while (firstRecent < log.length && now - log[firstRecent] > windowMs) {
      firstRecent++;
    }
    const recent = firstRecent > 0 ? log.slice(firstRecent) : log;

    if (recent.length >= policy.limit) {
      this.logs.set(key, recent);
      return {
        allowed: false,
        remaining: 0,
        resetAt: toUnixSeconds(recent[0] + windowMs),
      };
    }

    recent.push(now);
    this.logs.set(key, recent);

    return {
      allowed: true,
      remaining: policy.limit - recent.length,
      resetAt: toUnixSeconds(recent[0] + windowMs),
    };
  }
}

function toUnixSeconds(ms: number): number {
  return Math.ceil(ms / 1000);
}
