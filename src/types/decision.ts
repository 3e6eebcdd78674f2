/**
 * Outcome of one admission check. `resetAt` is when the oldest admission still
 * in the window expires, in unix seconds.
 */
export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetAt: number;
}
