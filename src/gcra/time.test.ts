import { describe, expect, it } from "vitest";
import { ManualClock, maxInstant, milliseconds, monotonicClock, seconds, toMilliseconds } from "./time";

describe("durations", () => {
  it("converts between numbers and nanoseconds", () => {
    expect(milliseconds(1.5)).toBe(1_500_000n);
    expect(seconds(2)).toBe(2_000_000_000n);
    expect(toMilliseconds(2_500_000n)).toBe(2.5);
    expect(maxInstant(3n, 5n)).toBe(5n);
  });

  it("rejects non-finite input", () => {
    expect(() => milliseconds(Number.NaN)).toThrow(RangeError);
  });
});

describe("ManualClock", () => {
  it("moves only when told to", () => {
    const clock = new ManualClock(10n);
    expect(clock.now()).toBe(10n);
    expect(clock.advance(5n)).toBe(15n);
    clock.set(20n);
    expect(clock.now()).toBe(20n);
  });

  it("refuses to go backward", () => {
    const clock = new ManualClock(10n);
    expect(() => clock.advance(-1n)).toThrow("Clock cannot move backward. Given: -1ns.");
    expect(() => clock.set(9n)).toThrow("Clock cannot move backward from 10 to 9.");
  });
});

describe("monotonicClock", () => {
  it("never decreases", () => {
    const a = monotonicClock.now();
    const b = monotonicClock.now();
    expect(b >= a).toBe(true);
  });
});
