import { describe, it, expect } from "vitest";
import { ClockGuard } from "./clock";

function sequence(values: number[]): () => number {
  let i = 0;
  return () => values[Math.min(i++, values.length - 1)];
}

describe("ClockGuard", () => {
  it("returns the source time in whole milliseconds", () => {
    const clock = new ClockGuard(() => 1700000000123.9);
    expect(clock.nowMs()).toBe(1700000000123);
  });

  it("never goes backwards when the source steps back", () => {
    const clock = new ClockGuard(sequence([1000, 999, 1005.7, 1002, 1010]));
    const readings = [clock.nowMs(), clock.nowMs(), clock.nowMs(), clock.nowMs(), clock.nowMs()];

    expect(readings).toEqual([1000, 1000, 1005, 1005, 1010]);
  });

  it("defaults to the wall clock", () => {
    const before = Date.now();
    const now = new ClockGuard().nowMs();
    expect(now).toBeGreaterThanOrEqual(before);
    expect(Number.isInteger(now)).toBe(true);
  });
});
