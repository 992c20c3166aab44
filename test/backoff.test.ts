import { describe, expect, it } from "vitest";
import { computeBackoffMs } from "../src/backoff.js";

describe("computeBackoffMs", () => {
  it("doubles from the factor", () => {
    expect([1, 2, 3, 4].map((n) => computeBackoffMs(n, 0.5, 60))).toEqual([500, 1000, 2000, 4000]);
  });

  it("is capped at maxBackoff", () => {
    expect([1, 2, 3, 4, 5].map((n) => computeBackoffMs(n, 1, 10))).toEqual([1000, 2000, 4000, 8000, 10000]);
  });

  it("treats attempts below 1 as the first attempt", () => {
    expect(computeBackoffMs(0, 2, 10)).toBe(2000);
    expect(computeBackoffMs(-3, 2, 10)).toBe(2000);
  });

  it("allows a zero factor", () => {
    expect(computeBackoffMs(3, 0, 10)).toBe(0);
    expect(computeBackoffMs(2000, 0, 10)).toBe(0);
  });

  it("stays at the cap when 2^attempt overflows", () => {
    expect(computeBackoffMs(2000, 1, 10)).toBe(10000);
  });
});
