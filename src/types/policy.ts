import type { Request } from "express";

export type RequestCost = number | ((req: Request) => number);

export interface RateLimitPolicy {
  limit: number;          // max burst, in cost units
  windowSeconds: number;  // time for a full burst to replenish
  cost?: RequestCost;     // units per request, defaults to 1
}
