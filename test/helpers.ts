// test/helpers.ts
import type { DependencyConfig, RemoteResponse, TransportRequest } from "../src/types.js";

export function depConfig(overrides: Partial<DependencyConfig> = {}): DependencyConfig {
  return {
    name: "user-service",
    url: "http://users.test/api",
    timeoutMs: 1000,
    maxAttempts: 3,
    backoffFactor: 1,
    maxBackoff: 10,
    failureThreshold: 3,
    resetTimeoutMs: 30_000,
    ...overrides,
  };
}

export function response(status: number, body: string = ""): RemoteResponse {
  return { status, headers: {}, body: new TextEncoder().encode(body) };
}

type Handler = (req: TransportRequest, n: number) => RemoteResponse | Promise<RemoteResponse>;

/** In-process transport: records every request and answers through `handler`. */
export function fakeTransport(handler: Handler) {
  const calls: Array<{ req: TransportRequest; timeoutMs: number }> = [];
  const transport = async (req: TransportRequest, timeoutMs: number): Promise<RemoteResponse> => {
    calls.push({ req, timeoutMs });
    return handler(req, calls.length);
  };
  return { transport, calls };
}

export class ManualClock {
  constructor(public t = 1_000) {}

  now = (): number => this.t;

  advance(ms: number): void {
    this.t += ms;
  }
}

/** Records requested delays and resolves at once. */
export function recordingSleep() {
  const delays: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    delays.push(ms);
  };
  return { sleep, delays };
}

export function deferred<T>() {
  let resolve: (v: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
