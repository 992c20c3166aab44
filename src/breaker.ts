// src/breaker.ts
import { ConfigurationError } from "./errors.js";
import type { BreakerSnapshot } from "./snapshot.js";
import type { BreakerOptions, CircuitMode } from "./types.js";

interface CircuitState {
  mode: CircuitMode;
  consecutiveFailures: number;
  lastFailureAtMs?: number;
  reopenAtMs?: number;

  // HALF_OPEN bookkeeping: exactly one trial at a time
  trialInFlight: boolean;

  readonly opts: BreakerOptions;
}

export interface BreakerDecision {
  allowed: boolean;
  mode: CircuitMode;
  trial: boolean;        // true when this call is the half-open trial
  retryAfterMs?: number; // only when blocked
}

export interface BreakerChange {
  changed: boolean;
  from?: CircuitMode;
  to?: CircuitMode;
}

function validate(key: string, opts: BreakerOptions): void {
  if (!Number.isInteger(opts.failureThreshold) || opts.failureThreshold <= 0) {
    throw new ConfigurationError(`failureThreshold must be a positive integer (got ${opts.failureThreshold})`, key);
  }
  if (!Number.isFinite(opts.resetTimeoutMs) || opts.resetTimeoutMs < 0) {
    throw new ConfigurationError(`resetTimeoutMs must be >= 0 (got ${opts.resetTimeoutMs})`, key);
  }
}

/**
 * Process-local circuit breaker, one state record per dependency.
 * - closed: allow, count consecutive failed calls; open at the threshold.
 * - open: block until the reset timeout passes, then half-open.
 * - half-open: allow a single trial; close on success, reopen on failure.
 *
 * Every method runs to completion without awaiting, so concurrent callers on
 * the event loop see each other's updates.
 */
export class CircuitBreaker {
  private readonly states = new Map<string, CircuitState>();

  constructor(private readonly optionsFor: (key: string) => BreakerOptions) {}

  private bucket(key: string): CircuitState {
    let s = this.states.get(key);
    if (!s) {
      const opts = this.optionsFor(key);
      validate(key, opts);
      s = { mode: "closed", consecutiveFailures: 0, trialInFlight: false, opts };
      this.states.set(key, s);
    }
    return s;
  }

  /**
   * Decide whether a call may go out. If allowed, the caller MUST later report
   * it through `onSuccess`, `onFailure`, `onNeutral` or `onLateResult`.
   */
  allow(key: string, nowMs: number = Date.now()): BreakerDecision {
    const s = this.bucket(key);

    if (s.mode === "open") {
      const remaining = (s.reopenAtMs ?? nowMs) - nowMs;
      if (remaining > 0) {
        return { allowed: false, mode: "open", trial: false, retryAfterMs: remaining };
      }
      s.mode = "half-open";
      s.trialInFlight = false;
    }

    if (s.mode === "half-open") {
      if (s.trialInFlight) {
        return { allowed: false, mode: "half-open", trial: false, retryAfterMs: 0 };
      }
      s.trialInFlight = true;
      return { allowed: true, mode: "half-open", trial: true };
    }

    return { allowed: true, mode: "closed", trial: false };
  }

  onSuccess(key: string): BreakerChange {
    const s = this.bucket(key);
    const from = s.mode;

    s.consecutiveFailures = 0;
    s.trialInFlight = false;
    s.reopenAtMs = undefined;
    s.mode = "closed";

    return from === "closed" ? { changed: false } : { changed: true, from, to: "closed" };
  }

  onFailure(key: string, nowMs: number = Date.now()): BreakerChange {
    const s = this.bucket(key);
    const from = s.mode;

    s.consecutiveFailures += 1;
    s.lastFailureAtMs = nowMs;

    if (s.mode === "half-open") {
      this.toOpen(s, nowMs);
      return { changed: true, from, to: "open" };
    }

    if (s.mode === "closed" && s.consecutiveFailures >= s.opts.failureThreshold) {
      this.toOpen(s, nowMs);
      return { changed: true, from, to: "open" };
    }

    return { changed: false };
  }

  /**
   * Result of a call admitted before the circuit went half-open. Failures are
   * counted, but only the trial decides the next state.
   */
  onLateResult(key: string, failed: boolean, nowMs: number = Date.now()): void {
    const s = this.bucket(key);
    if (!failed) return;
    s.consecutiveFailures += 1;
    s.lastFailureAtMs = nowMs;
  }

  /** A call that says nothing about the dependency's health (e.g. a 4xx). */
  onNeutral(key: string): void {
    this.bucket(key).trialInFlight = false;
  }

  state(key: string): CircuitMode {
    return this.bucket(key).mode;
  }

  failures(key: string): number {
    return this.bucket(key).consecutiveFailures;
  }

  snapshot(): BreakerSnapshot[] {
    const out: BreakerSnapshot[] = [];
    for (const [key, s] of this.states.entries()) {
      out.push({
        key,
        mode: s.mode,
        consecutiveFailures: s.consecutiveFailures,
        lastFailureAtMs: s.lastFailureAtMs,
        reopenAtMs: s.reopenAtMs,
      });
    }
    return out;
  }

  private toOpen(s: CircuitState, nowMs: number): void {
    s.mode = "open";
    s.reopenAtMs = nowMs + s.opts.resetTimeoutMs;
    s.trialInFlight = false;
  }
}
