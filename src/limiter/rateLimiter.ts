import type { RateLimitResult } from "../types/decision";

export interface RateLimiter {
  consume(key: string, cost?: number): RateLimitResult;
}

// Consumes `cost` units of capacity for `key`, or none at all when denied.
