import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { RateLimitPolicy, RequestCost } from "../types/policy";
import type { RateLimitResult } from "../types/decision";
import { Quota } from "../gcra/quota";
import { assertAdmissibleCost } from "../gcra/state";
import type { Clock } from "../gcra/time";
import { GcraLimiter } from "../limiter/gcraLimiter";
import { getRateLimitKey } from "../utils/identifier";
import { recordAllowed, recordBlocked, recordRejected } from "../utils/metrics";

export interface RateLimitOptions {
  clock?: Clock;
  keyGenerator?: (req: Request) => string;
  /** Drop keys whose bucket has refilled once every this many requests. */
  pruneEvery?: number;
}

const DEFAULT_PRUNE_EVERY = 1000;

export type RateLimitMiddleware = RequestHandler & { readonly limiter: GcraLimiter };

export function rateLimit(
  policy: RateLimitPolicy,
  options: RateLimitOptions = {}
): RateLimitMiddleware {
  // Bad policies fail here, at startup, rather than on the first request
  const quota = Quota.perPeriod(policy.limit, policy.windowSeconds * 1000);
  if (typeof policy.cost === "number") {
    assertAdmissibleCost(quota, policy.cost);
  }

  const limiter = new GcraLimiter(quota, options.clock);
  const keyOf = options.keyGenerator ?? getRateLimitKey;
  const pruneEvery = options.pruneEvery ?? DEFAULT_PRUNE_EVERY;
  if (!Number.isSafeInteger(pruneEvery) || pruneEvery < 1) {
    throw new Error(`pruneEvery must be a positive integer. Given: ${pruneEvery}.`);
  }
  let calls = 0;

  const handler = (req: Request, res: Response, next: NextFunction) => {
    // Every client key leaves a state behind, refilled ones are dropped here
    if (++calls % pruneEvery === 0) {
      limiter.pruneExpired();
    }

    const key = keyOf(req);

    let result: RateLimitResult;
    try {
      result = limiter.consume(key, resolveCost(policy.cost, req));
    } catch (err) {
      console.error("Rate limiter failure:", err);
      recordRejected();
      next(err);
      return;
    }

    setHeaders(res, result);

    if (!result.allowed) {
      recordBlocked();
      res.setHeader("Retry-After", Math.ceil(result.retryAfterMs / 1000));
      res.status(429).json({
        message: "Too many requests",
        retryAfterMs: result.retryAfterMs,
      });
      return;
    }

    recordAllowed();

    next();
  };

  return Object.assign(handler, { limiter });
}

function resolveCost(cost: RequestCost | undefined, req: Request): number {
  if (cost === undefined) return 1;
  return typeof cost === "function" ? cost(req) : cost;
}

function setHeaders(res: Response, result: RateLimitResult) {
  res.setHeader("X-RateLimit-Limit", result.limit);
  res.setHeader("X-RateLimit-Remaining", result.remaining);
  res.setHeader("X-RateLimit-Reset", Math.ceil(result.resetAfterMs / 1000));
}
