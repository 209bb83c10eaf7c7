import { CostExceedsCapacityError, InvalidCostError } from "./errors";
import type { Quota } from "./quota";
import type { Duration, Instant } from "./time";
import { maxInstant } from "./time";

export type Decision =
  | { allowed: true }
  | {
      allowed: false;
      /** How long to wait before this exact cost would be admitted. Always positive. */
      retryAfter: Duration;
      /** Earliest instant at which this exact cost would be admitted. */
      allowAt: Instant;
    };

/**
 * Generic Cell Rate Algorithm state for a single resource.
 *
 * GCRA is a leaky-bucket scheduler that stores one value, the Theoretical
 * Arrival Time (TAT): the instant at which the bucket would be fully drained
 * if no further request arrived. A request of cost `c` pushes the TAT forward
 * by `c * emissionInterval`, and is admitted only if the pushed TAT stays
 * within one `period` of the arrival time.
 *
 * The state does not hold its quota. The same state may be checked against
 * different quotas, which is how callers change a rate on the fly; the switch
 * can make admissions jump, since the TAT was accumulated under the old rate.
 *
 * Not safe for concurrent mutation. Each call is a single read-modify-write
 * with no suspension point, so single-threaded ownership (one event loop)
 * needs nothing more; anything else needs a lock per state.
 */
export class GcraState {
  private theoreticalArrivalTime: Instant | undefined;

  /** Pass a previously persisted TAT to restore a state. */
  constructor(tat?: Instant) {
    this.theoreticalArrivalTime = tat;
  }

  /** `undefined` until the first admission, and after `reset()`. */
  get tat(): Instant | undefined {
    return this.theoreticalArrivalTime;
  }

  /**
   * Admit `cost` units at `now` if the quota allows it, advancing the TAT.
   * A rejection leaves the state untouched.
   *
   * Throws `InvalidCostError` for a cost that is not a positive integer and
   * `CostExceedsCapacityError` when `cost > quota.maxBurst`.
   */
  checkAndModify(quota: Quota, cost: number, now: Instant): Decision {
    assertAdmissibleCost(quota, cost);

    const increment = quota.incrementInterval(cost);
    // An empty history behaves as a bucket that drained exactly now
    const tat = this.theoreticalArrivalTime ?? now;
    const newTat = maxInstant(tat, now) + increment;
    const allowAt = newTat - quota.period;

    if (allowAt > now) {
      return { allowed: false, retryAfter: allowAt - now, allowAt };
    }

    this.theoreticalArrivalTime = newTat;
    return { allowed: true };
  }

  /**
   * Give back `cost` units after an admission that was not used.
   *
   * A TAT already in the past means the bucket has refilled, so the state is
   * simply reset.
   */
  revert(quota: Quota, cost: number, now: Instant): void {
    assertAdmissibleCost(quota, cost);

    const tat = this.theoreticalArrivalTime;
    if (tat === undefined) return;

    if (tat < now) {
      this.theoreticalArrivalTime = undefined;
    } else {
      this.theoreticalArrivalTime = tat - quota.incrementInterval(cost);
    }
  }

  /**
   * Units that could be spent right now. Partially replenished units do not
   * count, so the consumed share is rounded up.
   */
  remainingResources(quota: Quota, now: Instant): number {
    const tat = this.theoreticalArrivalTime;
    if (tat === undefined || tat <= now) {
      return quota.maxBurst;
    }

    const burst = BigInt(quota.maxBurst);
    const scaled = (tat - now) * burst;
    const consumed = (scaled + quota.period - 1n) / quota.period;
    return consumed >= burst ? 0 : Number(burst - consumed);
  }

  reset(): void {
    this.theoreticalArrivalTime = undefined;
  }
}

/** Throws unless `cost` is a positive integer no larger than `quota.maxBurst`. */
export function assertAdmissibleCost(quota: Quota, cost: number): void {
  if (!Number.isSafeInteger(cost) || cost < 1) {
    throw new InvalidCostError(cost);
  }
  if (cost > quota.maxBurst) {
    throw new CostExceedsCapacityError(cost, quota.maxBurst);
  }
}
