import { afterEach, describe, expect, it, vi } from "vitest";
import { SlidingLogLimiter } from "./slidingLog";
import type { RateLimitPolicy } from "../types/policy";

const policy: RateLimitPolicy = { limit: 50, windowSeconds: 60 };
const T0 = 1_700_000_000_000;

describe("SlidingLogLimiter", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("allows the first request of an unseen client", async () => {
    const limiter = new SlidingLogLimiter();
    const result = await limiter.consume("10.0.0.1", policy, T0);

    expect(result).toEqual({ allowed: true, remaining: 49, resetAt: (T0 + 60_000) / 1000 });
  });

  it("admits exactly the limit within one window and denies the next call", async () => {
    const limiter = new SlidingLogLimiter();
    for (let i = 0; i < 50; i++) {
      expect(await limiter.allow("10.0.0.1", policy, T0 + i * 100)).toBe(true);
    }

    const denied = await limiter.consume("10.0.0.1", policy, T0 + 5_000);
    expect(denied.allowed).toBe(false);
    expect(denied.remaining).toBe(0);
    expect(denied.resetAt).toBe((T0 + 60_000) / 1000);
  });

  it("admits the client again once the window has fully elapsed", async () => {
    const limiter = new SlidingLogLimiter();
    for (let i = 0; i < 50; i++) {
      await limiter.consume("10.0.0.1", policy, T0);
    }

    expect(await limiter.allow("10.0.0.1", policy, T0 + 60_000)).toBe(false);
    expect(await limiter.allow("10.0.0.1", policy, T0 + 60_001)).toBe(true);
  });

  it("does not record denied attempts", async () => {
    const limiter = new SlidingLogLimiter();
    const small: RateLimitPolicy = { limit: 2, windowSeconds: 10 };

    expect(await limiter.allow("c", small, 0)).toBe(true);
    expect(await limiter.allow("c", small, 1_000)).toBe(true);
    expect(await limiter.allow("c", small, 2_000)).toBe(false);
    expect(await limiter.allow("c", small, 3_000)).toBe(false);

    // only the admission at 0 has left the window; the denials left no trace
    expect(await limiter.allow("c", small, 10_001)).toBe(true);
    expect(await limiter.allow("c", small, 10_002)).toBe(false);
  });

  it("keeps separate buckets per client", async () => {
    const limiter = new SlidingLogLimiter();
    const one: RateLimitPolicy = { limit: 1, windowSeconds: 60 };

    expect(await limiter.allow("a", one, T0)).toBe(true);
    expect(await limiter.allow("a", one, T0)).toBe(false);
    expect(await limiter.allow("b", one, T0)).toBe(true);
  });

  it("lets exactly the limit through when calls race for the same client", async () => {
    const limiter = new SlidingLogLimiter();
    const results = await Promise.all(
      Array.from({ length: 120 }, () => limiter.allow("10.0.0.9", policy, T0)),
    );

    expect(results.filter(Boolean)).toHaveLength(50);
    expect(results.filter((allowed) => !allowed)).toHaveLength(70);
  });

  it("sweeps clients whose newest admission left the window", async () => {
    const limiter = new SlidingLogLimiter();
    await limiter.consume("idle", policy, T0);
    await limiter.consume("busy", policy, T0);
    await limiter.consume("busy", policy, T0 + 50_000);

    expect(limiter.sweep(T0 + 60_001)).toBe(1);
    expect(limiter.size).toBe(1);
    expect(limiter.sweep(T0 + 110_001)).toBe(1);
    expect(limiter.size).toBe(0);
  });

  it("sweeps on its interval once started", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    const limiter = new SlidingLogLimiter();
    await limiter.consume("idle", policy);

    limiter.start(30_000);
    vi.advanceTimersByTime(30_000);
    expect(limiter.size).toBe(1);

    vi.advanceTimersByTime(60_000);
    expect(limiter.size).toBe(0);
    limiter.stop();
  });
});
