export type FailureStrategy = "fail-open" | "fail-closed" | "local-fallback";

export interface RateLimitPolicy {
  limit: number;          // max admissions per window
  windowSeconds: number;  // trailing window length
  failureStrategy?: FailureStrategy;
}
