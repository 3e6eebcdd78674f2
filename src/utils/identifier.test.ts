import { describe, expect, it } from "vitest";
import { extractClientIp } from "./identifier";
import { SlidingLogLimiter } from "../limiter/slidingLog";

describe("extractClientIp", () => {
  it("returns a bare IPv4 address unchanged", () => {
    expect(extractClientIp("203.0.113.7")).toBe("203.0.113.7");
  });

  it("drops the port from host:port", () => {
    expect(extractClientIp("203.0.113.7:51234")).toBe("203.0.113.7");
  });

  it("drops the port from a bracketed IPv6 address", () => {
    expect(extractClientIp("[2001:db8::1]:443")).toBe("2001:db8::1");
  });

  it("maps the IPv6 loopback onto the IPv4 loopback", () => {
    expect(extractClientIp("::1")).toBe("127.0.0.1");
    expect(extractClientIp("[::1]:8080")).toBe("127.0.0.1");
  });

  it("unwraps IPv4-mapped IPv6 addresses", () => {
    expect(extractClientIp("::ffff:127.0.0.1")).toBe("127.0.0.1");
    expect(extractClientIp("[::FFFF:10.0.0.2]:9000")).toBe("10.0.0.2");
  });

  it("keeps other IPv6 addresses", () => {
    expect(extractClientIp("2001:db8::42")).toBe("2001:db8::42");
  });

  it("falls back to the raw string when the address is malformed", () => {
    expect(extractClientIp("not an address")).toBe("not an address");
    expect(extractClientIp("host:port:extra")).toBe("host:port:extra");
  });

  it("returns an empty identity when the socket has no address", () => {
    expect(extractClientIp(undefined)).toBe("");
  });

  it("rate-limits the IPv6 and IPv4 loopback under one identity", async () => {
    const limiter = new SlidingLogLimiter();
    const policy = { limit: 1, windowSeconds: 60 };

    expect(await limiter.allow(extractClientIp("127.0.0.1"), policy, 0)).toBe(true);
    expect(await limiter.allow(extractClientIp("::1"), policy, 1)).toBe(false);
  });
});
