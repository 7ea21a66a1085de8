import { describe, it, expect } from "vitest";
import { backoffDelay, jitteredDelay, toQueryParams } from "./utils";

describe("backoffDelay", () => {
  it("doubles from the base delay", () => {
    expect([1, 2, 3, 4].map((n) => backoffDelay(n, 1000, 30000))).toEqual([
      1000, 2000, 4000, 8000,
    ]);
  });

  it("caps at the maximum delay", () => {
    expect(backoffDelay(6, 1000, 30000)).toBe(30000);
    expect(backoffDelay(500, 1000, 30000)).toBe(30000);
  });

  it("treats attempts below 1 as the first", () => {
    expect(backoffDelay(0, 250, 1000)).toBe(250);
  });
});

describe("jitteredDelay", () => {
  it("stays within 75-100% of the capped delay", () => {
    expect(jitteredDelay(1, 1000, 30000, () => 0)).toBe(750);
    expect(jitteredDelay(1, 1000, 30000, () => 1)).toBe(1000);
    expect(jitteredDelay(3, 1000, 3000, () => 0.5)).toBe(2625);
  });
});

describe("toQueryParams", () => {
  it("drops absent values and stringifies the rest", () => {
    expect(
      toQueryParams({ limit: 5, cursor: undefined, status: null, ticker: "X", post_only: false })
    ).toEqual({ limit: "5", ticker: "X", post_only: "false" });
  });
});
