import { GcraState } from "../gcra/state";
import type { Quota } from "../gcra/quota";
import type { Clock } from "../gcra/time";
import { monotonicClock, toMilliseconds } from "../gcra/time";
import type { RateLimitResult } from "../types/decision";
import type { RateLimiter } from "./rateLimiter";

/**
 * In-memory GCRA limiter holding one state per key.
 *
 * Calls are synchronous, so on a single event loop each consume is atomic
 * with respect to every other call on the same limiter.
 */
export class GcraLimiter implements RateLimiter {
  private readonly states = new Map<string, GcraState>();

  constructor(
    readonly quota: Quota,
    private readonly clock: Clock = monotonicClock
  ) {}

  get size(): number {
    return this.states.size;
  }

  consume(key: string, cost = 1): RateLimitResult {
    const now = this.clock.now();

    const state = this.states.get(key) ?? new GcraState();
    const decision = state.checkAndModify(this.quota, cost, now);
    if (decision.allowed) {
      this.states.set(key, state);
    }
    const tat = state.tat;

    return {
      allowed: decision.allowed,
      limit: this.quota.maxBurst,
      remaining: state.remainingResources(this.quota, now),
      retryAfterMs: decision.allowed ? 0 : toMilliseconds(decision.retryAfter),
      resetAfterMs: tat !== undefined && tat > now ? toMilliseconds(tat - now) : 0,
    };
  }

  revert(key: string, cost = 1): void {
    const state = this.states.get(key);
    if (!state) return;

    state.revert(this.quota, cost, this.clock.now());
    if (state.tat === undefined) {
      this.states.delete(key);
    }
  }

  /** Removes keys whose bucket has fully replenished. Returns how many were dropped. */
  pruneExpired(): number {
    const now = this.clock.now();
    let pruned = 0;
    for (const [key, state] of this.states) {
      const tat = state.tat;
      if (tat === undefined || tat <= now) {
        this.states.delete(key);
        pruned++;
      }
    }
    return pruned;
  }

  delete(key: string): boolean {
    return this.states.delete(key);
  }
}
