import { InvalidQuotaError } from "./errors";
import type { Duration } from "./time";
import { milliseconds } from "./time";

/**
 * Rate limit configuration: `maxBurst` units may be spent at once, and they
 * replenish evenly over `period`.
 *
 * The emission interval is `period / maxBurst`, truncated to whole
 * nanoseconds, so `maxBurst * emissionInterval` never exceeds `period`.
 */
export class Quota {
  readonly maxBurst: number;
  readonly period: Duration;
  /** Time it takes to replenish a single unit. */
  readonly emissionInterval: Duration;

  constructor(maxBurst: number, period: Duration) {
    if (!Number.isSafeInteger(maxBurst) || maxBurst < 1) {
      throw new InvalidQuotaError(`Max burst should be a positive integer. Given: ${maxBurst}.`);
    }
    if (period <= 0n) {
      throw new InvalidQuotaError(`Period must be positive. Given: ${period}ns.`);
    }

    this.maxBurst = maxBurst;
    this.period = period;
    this.emissionInterval = period / BigInt(maxBurst);
    Object.freeze(this);
  }

  static perPeriod(maxBurst: number, periodMs: number): Quota {
    if (!Number.isFinite(periodMs)) {
      throw new InvalidQuotaError(`Period must be a finite number of milliseconds. Given: ${periodMs}.`);
    }
    return new Quota(maxBurst, milliseconds(periodMs));
  }

  incrementInterval(cost: number): Duration {
    return this.emissionInterval * BigInt(cost);
  }
}
