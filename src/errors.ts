// src/errors.ts
import type { FailureReason } from "./types.js";

/**
 * Unknown dependency or invalid configuration. Thrown, never wrapped in a
 * CallOutcome, and never retried.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly dependency?: string,
    public readonly option?: string
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Base class of every failure carried inside a CallOutcome. */
export abstract class RemoteCallError extends Error {
  abstract readonly reason: FailureReason;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TimeoutFailure extends RemoteCallError {
  readonly reason = "timeout";
  readonly retryable = true;

  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
  }
}

export class ConnectionFailure extends RemoteCallError {
  readonly reason = "connection-error";
  readonly retryable = true;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class ServerFailure extends RemoteCallError {
  readonly reason = "server-error";
  readonly retryable = true;

  constructor(public readonly status: number, url: string) {
    super(`HTTP ${status} from ${url}`);
  }
}

export class ClientFailure extends RemoteCallError {
  readonly reason = "client-error";
  readonly retryable = false;

  constructor(public readonly status: number, url: string) {
    super(`HTTP ${status} from ${url}`);
  }
}

export class CircuitOpenFailure extends RemoteCallError {
  readonly reason = "circuit-open";
  readonly retryable = false;

  constructor(public readonly dependency: string, public readonly retryAfterMs: number) {
    super(`Circuit open for ${dependency}; retry after ${retryAfterMs}ms`);
  }
}
