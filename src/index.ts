export * from "./gcra";
export { GcraLimiter } from "./limiter/gcraLimiter";
export type { RateLimiter } from "./limiter/rateLimiter";
export { rateLimit } from "./middleware/rateLimit.middleware";
export type { RateLimitMiddleware, RateLimitOptions } from "./middleware/rateLimit.middleware";
export type { RateLimitPolicy, RequestCost } from "./types/policy";
export type { RateLimitResult } from "./types/decision";
export { getRateLimitKey } from "./utils/identifier";
