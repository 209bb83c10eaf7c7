/** Point on a monotonic timeline, in nanoseconds from the clock's own origin. */
export type Instant = bigint;
/** Non-negative span of time in nanoseconds. */
export type Duration = bigint;

const NS_PER_MS = 1_000_000n;

export function milliseconds(ms: number): Duration {
  if (!Number.isFinite(ms)) {
    throw new RangeError(`Duration should be a finite number of milliseconds. Given: ${ms}.`);
  }
  return BigInt(Math.round(ms * 1_000_000));
}

export function seconds(s: number): Duration {
  return milliseconds(s * 1000);
}

export function toMilliseconds(d: Duration): number {
  return Number(d) / Number(NS_PER_MS);
}

export function maxInstant(a: Instant, b: Instant): Instant {
  return a > b ? a : b;
}

export interface Clock {
  now(): Instant;
}

export const monotonicClock: Clock = {
  now: () => process.hrtime.bigint(),
};

/**
 * Clock that only moves when told to. Used to replay a known sequence of
 * arrivals.
 */
export class ManualClock implements Clock {
  private current: Instant;

  constructor(start: Instant = 0n) {
    this.current = start;
  }

  now(): Instant {
    return this.current;
  }

  advance(d: Duration): Instant {
    if (d < 0n) {
      throw new Error(`Clock cannot move backward. Given: ${d}ns.`);
    }
    this.current += d;
    return this.current;
  }

  set(t: Instant): void {
    if (t < this.current) {
      throw new Error(`Clock cannot move backward from ${this.current} to ${t}.`);
    }
    this.current = t;
  }
}
