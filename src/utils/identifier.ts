import { isIP } from "node:net";
import { logger } from "./logger";

const IPV4_LOOPBACK = "127.0.0.1";
const IPV6_LOOPBACK = "::1";
const IPV4_MAPPED_PREFIX = "::ffff:";

function normalizeHost(host: string): string {
  if (host === IPV6_LOOPBACK) {
    return IPV4_LOOPBACK;
  }
  if (host.toLowerCase().startsWith(IPV4_MAPPED_PREFIX)) {
    const v4 = host.slice(IPV4_MAPPED_PREFIX.length);
    if (isIP(v4) === 4) {
      return v4;
    }
  }
  return host;
}

function splitHostPort(address: string): string | null {
  const bracketed = /^\[([^\]]+)\]:(\d+)$/.exec(address);
  if (bracketed) {
    return bracketed[1];
  }
  const hostPort = /^([^:]+):(\d+)$/.exec(address);
  if (hostPort) {
    return hostPort[1];
  }
  return null;
}

/**
 * Rate-limit and audit identity for a connection.
 *
 * Accepts a bare IP (what Node reports for a socket) or a `host:port` /
 * `[host]:port` pair. The IPv6 loopback and IPv4-mapped addresses collapse onto
 * their IPv4 form so one client never lands in two buckets. Anything that
 * cannot be parsed is returned verbatim.
 */
export function extractClientIp(remoteAddress: string | undefined): string {
  if (!remoteAddress) {
    return "";
  }

  if (isIP(remoteAddress) !== 0) {
    return normalizeHost(remoteAddress);
  }

  const host = splitHostPort(remoteAddress);
  if (host === null) {
    logger.debug({ remoteAddress }, "could not split remote address, using it verbatim");
    return remoteAddress;
  }
  return normalizeHost(host);
}
