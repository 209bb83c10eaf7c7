export interface RateLimitResult {
  allowed: boolean;
  limit: number;
  remaining: number;
  retryAfterMs: number;  // 0 when allowed
  resetAfterMs: number;  // until the full burst is available again
}
