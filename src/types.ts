import type { RemoteCallError } from "./errors.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD" | "OPTIONS";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * What a caller wants sent to a dependency. `path` is joined onto the
 * dependency's base URL unless it is already absolute.
 */
export interface RequestSpec {
  method: HttpMethod;
  path: string;
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  /** Raw bytes/strings are sent as-is; anything else is JSON-encoded. */
  body?: string | Uint8Array | JsonValue;
}

/** The fully resolved request handed to a transport. */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string | Uint8Array;
}

export interface RemoteResponse {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array; // keep raw; helpers can parse JSON
}

/**
 * Issues one physical request. Must reject with a TimeoutFailure when
 * `timeoutMs` elapses and a ConnectionFailure when no response is received.
 */
export type Transport = (req: TransportRequest, timeoutMs: number) => Promise<RemoteResponse>;

export type CircuitMode = "closed" | "open" | "half-open";

export interface DependencyConfig {
  name: string;
  url: string;
  timeoutMs: number;
  secret?: string;
  maxAttempts: number;
  backoffFactor: number;  // seconds
  maxBackoff: number;     // seconds
  failureThreshold: number;
  resetTimeoutMs: number;
}

export interface BreakerOptions {
  failureThreshold: number;  // consecutive failed calls before opening
  resetTimeoutMs: number;    // time spent OPEN before a trial is allowed
}

export type FailureReason = "timeout" | "connection-error" | "server-error" | "client-error" | "circuit-open";

export interface SuccessOutcome {
  ok: true;
  dependency: string;
  response: RemoteResponse;
  attempts: number;
}

export interface FailureOutcome {
  ok: false;
  dependency: string;
  reason: FailureReason;
  error: RemoteCallError;
  attempts: number;  // 0 when the circuit rejected the call
  response?: RemoteResponse;  // set for server-error and client-error
}

export type CallOutcome = SuccessOutcome | FailureOutcome;
