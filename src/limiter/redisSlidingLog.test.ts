import { describe, expect, it, vi } from "vitest";
import { RedisSlidingLogLimiter, type ScriptClient } from "./redisSlidingLog";
import type { RateLimitPolicy } from "../types/policy";

const policy: RateLimitPolicy = { limit: 50, windowSeconds: 60 };
const T0 = 1_700_000_000_000;

function fakeClient(replies: unknown[]) {
  const loadScript = vi.fn(async (_script: string) => "sha-1");
  const evalsha = vi.fn(async (_sha: string, _key: string, _args: (string | number)[]) => {
    const next = replies.shift();
    if (next instanceof Error) throw next;
    return next;
  });
  const client: ScriptClient = { loadScript, evalsha };
  return { client, loadScript, evalsha };
}

describe("RedisSlidingLogLimiter", () => {
  it("runs the sliding log script against the prefixed client key", async () => {
    const { client, loadScript, evalsha } = fakeClient([[1, 1, T0]]);
    const limiter = new RedisSlidingLogLimiter(client);

    const result = await limiter.consume("10.0.0.1", policy, T0);

    expect(result).toEqual({ allowed: true, remaining: 49, resetAt: (T0 + 60_000) / 1000 });
    expect(loadScript).toHaveBeenCalledTimes(1);
    expect(loadScript.mock.calls[0][0]).toContain("ZREMRANGEBYSCORE");

    const [sha, key, args] = evalsha.mock.calls[0];
    expect(sha).toBe("sha-1");
    expect(key).toBe("rl:ip:10.0.0.1");
    expect(args.slice(0, 3)).toEqual([T0, 60_000, 50]);
    expect(String(args[3]).startsWith(`${T0}-`)).toBe(true);
  });

  it("loads the script once across calls", async () => {
    const { client, loadScript } = fakeClient([[1, 1, T0], [1, 2, T0]]);
    const limiter = new RedisSlidingLogLimiter(client);

    await limiter.consume("a", policy, T0);
    await limiter.consume("a", policy, T0 + 1);

    expect(loadScript).toHaveBeenCalledTimes(1);
  });

  it("reports a denial with no remaining capacity", async () => {
    const { client } = fakeClient([[0, 50, T0 + 1_500]]);
    const limiter = new RedisSlidingLogLimiter(client);

    const result = await limiter.consume("a", policy, T0 + 30_000);

    expect(result).toEqual({ allowed: false, remaining: 0, resetAt: Math.ceil((T0 + 61_500) / 1000) });
  });

  it("reloads the script after NOSCRIPT", async () => {
    const { client, loadScript, evalsha } = fakeClient([
      new Error("NOSCRIPT No matching script. Please use EVAL."),
      [1, 1, T0],
    ]);
    const limiter = new RedisSlidingLogLimiter(client);

    const result = await limiter.consume("a", policy, T0);

    expect(result.allowed).toBe(true);
    expect(loadScript).toHaveBeenCalledTimes(2);
    expect(evalsha).toHaveBeenCalledTimes(2);
  });

  it("propagates other Redis errors", async () => {
    const { client } = fakeClient([new Error("Connection is closed.")]);
    const limiter = new RedisSlidingLogLimiter(client);

    await expect(limiter.consume("a", policy, T0)).rejects.toThrow("Connection is closed.");
  });

  it("rejects a malformed reply", async () => {
    const { client } = fakeClient([["1", 1]]);
    const limiter = new RedisSlidingLogLimiter(client);

    await expect(limiter.consume("a", policy, T0)).rejects.toThrow("Unexpected sliding log reply");
  });
});
