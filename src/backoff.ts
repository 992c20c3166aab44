// src/backoff.ts

/**
 * Delay before retrying after attempt `attempt` (1-based):
 * min(factor * 2^(attempt-1), maxBackoff), with both inputs in seconds.
 */
export function computeBackoffMs(attempt: number, backoffFactor: number, maxBackoff: number): number {
  // 0 * 2^n is NaN once 2^n overflows
  if (backoffFactor <= 0) return 0;
  const n = Number.isFinite(attempt) && attempt >= 1 ? Math.floor(attempt) : 1;
  const seconds = Math.min(backoffFactor * Math.pow(2, n - 1), maxBackoff);
  return Math.max(0, Math.round(seconds * 1000));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}
