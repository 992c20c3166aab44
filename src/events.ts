import type { CircuitMode, FailureReason, RequestSpec } from "./types.js";

export interface BreakerStateEvent {
  dependency: string;
  from: CircuitMode;
  to: CircuitMode;
}

export interface CallEventBase {
  dependency: string;
  request: RequestSpec;
  callId: string; // generated id, unique per invoke
}

export interface AttemptFailureEvent extends CallEventBase {
  attempt: number;
  reason: FailureReason;
  status?: number;
  retryInMs?: number;  // unset when no retry follows
}

export interface CallResultEvent extends CallEventBase {
  attempts: number;
  durationMs: number;
  status?: number;
  reason?: FailureReason;  // set on failure
}

export interface RemoteClientEvents {
  "breaker:state": [BreakerStateEvent];
  "attempt:failure": [AttemptFailureEvent];
  "call:success": [CallResultEvent];
  "call:failure": [CallResultEvent];
  "call:rejected": [CallResultEvent];
}

export type RemoteClientEventName = keyof RemoteClientEvents;
