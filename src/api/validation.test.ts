import { describe, it, expect } from "vitest";
import { ApiError } from "./error";
import { validateId, validateLimit, validatePath, validateTicker } from "./validation";

describe("validatePath", () => {
  it("accepts absolute paths with a query", () => {
    expect(() => validatePath("/trade-api/v2/markets?limit=5")).not.toThrow();
  });

  it("rejects relative paths", () => {
    expect(() => validatePath("trade-api/v2/markets")).toThrow(
      'Invalid parameter: path must start with "/", got "trade-api/v2/markets"'
    );
  });

  it("rejects whitespace", () => {
    expect(() => validatePath("/trade-api/v2/ markets")).toThrow(ApiError);
  });
});

describe("validateTicker", () => {
  it("accepts exchange tickers", () => {
    expect(() => validateTicker("KXHIGHNY-24DEC31-T45", "ticker")).not.toThrow();
  });

  it("rejects empty tickers", () => {
    expect(() => validateTicker("  ", "ticker")).toThrow("Invalid parameter: ticker cannot be empty");
  });

  it("rejects path separators", () => {
    expect(() => validateTicker("A/B", "ticker")).toThrow(
      "Invalid parameter: ticker contains invalid characters"
    );
    expect(() => validateTicker("A?B", "ticker")).toThrow(ApiError);
  });
});

describe("validateId", () => {
  it("rejects empty ids", () => {
    expect(() => validateId("", "orderId")).toThrow("Invalid parameter: orderId cannot be empty");
  });
});

describe("validateLimit", () => {
  it("accepts undefined and the bounds", () => {
    expect(() => validateLimit(undefined)).not.toThrow();
    expect(() => validateLimit(1)).not.toThrow();
    expect(() => validateLimit(1000)).not.toThrow();
  });

  it("rejects out-of-range and fractional limits", () => {
    expect(() => validateLimit(0)).toThrow("Invalid parameter: Limit must be 1-1000");
    expect(() => validateLimit(1001)).toThrow(ApiError);
    expect(() => validateLimit(2.5)).toThrow(ApiError);
  });
});
