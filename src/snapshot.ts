import type { CircuitMode } from "./types.js";

export interface BreakerSnapshot {
  key: string;
  mode: CircuitMode;
  consecutiveFailures: number;
  lastFailureAtMs?: number;
  reopenAtMs?: number;
}

export interface ClientSnapshot {
  dependencies: string[];
  breakers: BreakerSnapshot[];
}
