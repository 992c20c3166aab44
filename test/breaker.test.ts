// test/breaker.test.ts
import { describe, expect, it } from "vitest";
import { CircuitBreaker } from "../src/breaker.js";
import { ConfigurationError } from "../src/errors.js";

function breaker(failureThreshold = 3, resetTimeoutMs = 100) {
  return new CircuitBreaker(() => ({ failureThreshold, resetTimeoutMs }));
}

describe("CircuitBreaker", () => {
  it("opens after threshold consecutive failures", () => {
    const br = breaker(3);
    const key = "svc";

    br.allow(key, 1000);
    br.onFailure(key, 1000);
    br.allow(key, 1000);
    br.onFailure(key, 1000);
    expect(br.state(key)).toBe("closed");
    expect(br.failures(key)).toBe(2);

    br.allow(key, 1000);
    const change = br.onFailure(key, 1000);
    expect(change).toEqual({ changed: true, from: "closed", to: "open" });
    expect(br.state(key)).toBe("open");
  });

  it("a success in between resets the count", () => {
    const br = breaker(2);
    const key = "svc";

    br.onFailure(key, 1000);
    br.onSuccess(key);
    br.onFailure(key, 1000);

    expect(br.failures(key)).toBe(1);
    expect(br.state(key)).toBe("closed");
  });

  it("fails fast while open until the reset timeout, then half-open", () => {
    const br = breaker(1, 100);
    const key = "svc";
    const t0 = 1000;

    br.allow(key, t0);
    br.onFailure(key, t0);
    expect(br.state(key)).toBe("open");

    const d1 = br.allow(key, t0 + 50);
    expect(d1).toEqual({ allowed: false, mode: "open", trial: false, retryAfterMs: 50 });

    const d2 = br.allow(key, t0 + 100);
    expect(d2).toEqual({ allowed: true, mode: "half-open", trial: true });
    expect(br.state(key)).toBe("half-open");
  });

  it("half-open allows exactly one trial at a time", () => {
    const br = breaker(1, 50);
    const key = "svc";

    br.onFailure(key, 1000);

    expect(br.allow(key, 1060).allowed).toBe(true);
    const blocked = br.allow(key, 1061);
    expect(blocked).toEqual({ allowed: false, mode: "half-open", trial: false, retryAfterMs: 0 });
  });

  it("trial success closes and clears the counter", () => {
    const br = breaker(2, 50);
    const key = "svc";

    br.onFailure(key, 1000);
    br.onFailure(key, 1000);
    br.allow(key, 1060);

    const change = br.onSuccess(key);
    expect(change).toEqual({ changed: true, from: "half-open", to: "closed" });
    expect(br.failures(key)).toBe(0);
    expect(br.allow(key, 1061).mode).toBe("closed");
  });

  it("trial failure reopens with a new deadline", () => {
    const br = breaker(1, 50);
    const key = "svc";

    br.onFailure(key, 1000);
    br.allow(key, 1060);

    const change = br.onFailure(key, 1060);
    expect(change).toEqual({ changed: true, from: "half-open", to: "open" });
    expect(br.allow(key, 1100)).toEqual({ allowed: false, mode: "open", trial: false, retryAfterMs: 10 });
    expect(br.allow(key, 1110).trial).toBe(true);
  });

  it("a neutral outcome frees the trial slot without changing state", () => {
    const br = breaker(1, 50);
    const key = "svc";

    br.onFailure(key, 1000);
    br.allow(key, 1060);
    br.onNeutral(key);

    expect(br.state(key)).toBe("half-open");
    expect(br.failures(key)).toBe(1);
    expect(br.allow(key, 1061).trial).toBe(true);
  });

  it("a late result during half-open is counted but leaves the trial to decide", () => {
    const br = breaker(1, 100);
    const key = "svc";

    br.onFailure(key, 1000);
    expect(br.allow(key, 1100).trial).toBe(true);

    br.onLateResult(key, true, 1105);
    expect(br.state(key)).toBe("half-open");
    expect(br.failures(key)).toBe(2);
    expect(br.allow(key, 1106).allowed).toBe(false);

    br.onLateResult(key, false, 1107);
    expect(br.failures(key)).toBe(2);

    expect(br.onSuccess(key)).toEqual({ changed: true, from: "half-open", to: "closed" });
    expect(br.failures(key)).toBe(0);
  });

  it("keeps one state record per key", () => {
    const br = breaker(1);
    br.onFailure("a", 1000);
    br.allow("b", 1000);

    expect(br.state("a")).toBe("open");
    expect(br.state("b")).toBe("closed");
    expect(br.snapshot()).toEqual([
      { key: "a", mode: "open", consecutiveFailures: 1, lastFailureAtMs: 1000, reopenAtMs: 1100 },
      { key: "b", mode: "closed", consecutiveFailures: 0, lastFailureAtMs: undefined, reopenAtMs: undefined },
    ]);
  });

  it("rejects a non-positive threshold", () => {
    const br = breaker(0);
    expect(() => br.allow("svc")).toThrow(ConfigurationError);
  });
});
