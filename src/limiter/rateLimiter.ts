import type { RateLimitPolicy } from "../types/policy";
import type { RateLimitResult } from "../types/decision";

export interface RateLimiter {
  /**
   * Consume one admission for `key`. A denied call consumes nothing.
   * `now` is epoch milliseconds and defaults to the wall clock.
   */
  consume(
    key: string,
    policy: RateLimitPolicy,
    now?: number
  ): Promise<RateLimitResult>;
}
