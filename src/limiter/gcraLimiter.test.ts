import { describe, expect, it } from "vitest";
import { CostExceedsCapacityError } from "../gcra/errors";
import { Quota } from "../gcra/quota";
import { ManualClock, milliseconds } from "../gcra/time";
import { GcraLimiter } from "./gcraLimiter";

describe("GcraLimiter", () => {
  const quota = Quota.perPeriod(2, 1000);

  it("tracks each key separately", () => {
    const clock = new ManualClock();
    const limiter = new GcraLimiter(quota, clock);

    expect(limiter.consume("a")).toEqual({
      allowed: true,
      limit: 2,
      remaining: 1,
      retryAfterMs: 0,
      resetAfterMs: 500,
    });
    expect(limiter.consume("a")).toEqual({
      allowed: true,
      limit: 2,
      remaining: 0,
      retryAfterMs: 0,
      resetAfterMs: 1000,
    });
    expect(limiter.consume("a")).toEqual({
      allowed: false,
      limit: 2,
      remaining: 0,
      retryAfterMs: 500,
      resetAfterMs: 1000,
    });

    expect(limiter.consume("b").allowed).toBe(true);
    expect(limiter.size).toBe(2);
  });

  it("admits again once the clock advances", () => {
    const clock = new ManualClock();
    const limiter = new GcraLimiter(quota, clock);
    limiter.consume("a", 2);
    expect(limiter.consume("a").allowed).toBe(false);

    clock.advance(milliseconds(500));
    expect(limiter.consume("a").allowed).toBe(true);
  });

  it("prunes keys whose bucket is full again", () => {
    const clock = new ManualClock();
    const limiter = new GcraLimiter(quota, clock);
    limiter.consume("a", 2);
    limiter.consume("b");

    clock.advance(milliseconds(500));
    expect(limiter.pruneExpired()).toBe(1);
    expect(limiter.size).toBe(1);

    clock.advance(milliseconds(500));
    expect(limiter.pruneExpired()).toBe(1);
    expect(limiter.size).toBe(0);
  });

  it("reverts a consumed unit", () => {
    const clock = new ManualClock();
    const limiter = new GcraLimiter(quota, clock);
    limiter.consume("a", 2);

    limiter.revert("a");
    expect(limiter.consume("a").allowed).toBe(true);
  });

  it("forgets a key whose revert drained it", () => {
    const clock = new ManualClock();
    const limiter = new GcraLimiter(quota, clock);
    limiter.consume("a");

    clock.advance(milliseconds(2000));
    limiter.revert("a");
    expect(limiter.size).toBe(0);
  });

  it("throws for a cost above the burst without storing the key", () => {
    const limiter = new GcraLimiter(quota, new ManualClock());
    expect(() => limiter.consume("a", 3)).toThrow(CostExceedsCapacityError);
    expect(limiter.size).toBe(0);
  });

  it("drops a single key on delete", () => {
    const limiter = new GcraLimiter(quota, new ManualClock());
    limiter.consume("a");
    expect(limiter.delete("a")).toBe(true);
    expect(limiter.delete("a")).toBe(false);
  });
});
