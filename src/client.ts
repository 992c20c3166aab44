// src/client.ts
import { EventEmitter } from "node:events";
import { computeBackoffMs, sleep } from "./backoff.js";
import { CircuitBreaker, type BreakerChange } from "./breaker.js";
import { loadDependencyConfigs, type Env } from "./config.js";
import {
  CircuitOpenFailure,
  ClientFailure,
  ConfigurationError,
  ConnectionFailure,
  RemoteCallError,
  ServerFailure,
} from "./errors.js";
import type { RemoteClientEventName, RemoteClientEvents } from "./events.js";
import { createHttpTransport } from "./http.js";
import { createLogger, type Logger } from "./logger.js";
import type { ClientSnapshot } from "./snapshot.js";
import type {
  CallOutcome,
  DependencyConfig,
  FailureOutcome,
  RemoteResponse,
  RequestSpec,
  Transport,
  TransportRequest,
} from "./types.js";

export interface RemoteClientOptions {
  dependencies: Iterable<DependencyConfig>;
  /** Defaults to an undici transport on the global dispatcher. */
  transport?: Transport;
  logger?: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

interface CallContext {
  dependency: string;
  spec: RequestSpec;
  callId: string;
  start: number;
  log: Logger;
}

type AttemptResult =
  | { ok: true; response: RemoteResponse }
  | { ok: false; error: RemoteCallError; response?: RemoteResponse };

function genCallId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 10)}`;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function validateConfig(cfg: DependencyConfig): void {
  const fail = (option: string, detail: string): never => {
    throw new ConfigurationError(`Invalid configuration for ${cfg.name}: ${option} ${detail}`, cfg.name, option);
  };
  if (!/^https?:\/\//i.test(cfg.url)) fail("url", `must be an http(s) URL (got "${cfg.url}")`);
  if (!Number.isFinite(cfg.timeoutMs) || cfg.timeoutMs <= 0) fail("timeoutMs", "must be > 0");
  if (!Number.isInteger(cfg.maxAttempts) || cfg.maxAttempts < 1) fail("maxAttempts", "must be an integer >= 1");
  if (!Number.isFinite(cfg.backoffFactor) || cfg.backoffFactor < 0) fail("backoffFactor", "must be >= 0");
  if (!Number.isFinite(cfg.maxBackoff) || cfg.maxBackoff < 0) fail("maxBackoff", "must be >= 0");
  if (!Number.isInteger(cfg.failureThreshold) || cfg.failureThreshold < 1) {
    fail("failureThreshold", "must be an integer >= 1");
  }
  if (!Number.isFinite(cfg.resetTimeoutMs) || cfg.resetTimeoutMs < 0) fail("resetTimeoutMs", "must be >= 0");
}

export function buildUrl(baseUrl: string, path: string, query?: RequestSpec["query"]): string {
  let url = /^https?:\/\//i.test(path) ? path : `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;

  if (query && Object.keys(query).length > 0) {
    const params = new URLSearchParams();
    for (const [k, v] of Object.entries(query)) params.append(k, String(v));
    url += (url.includes("?") ? "&" : "?") + params.toString();
  }
  return url;
}

/**
 * Resolve a RequestSpec against a dependency. Header names are lower-cased;
 * headers given by the caller override the defaults.
 */
export function buildTransportRequest(cfg: DependencyConfig, spec: RequestSpec): TransportRequest {
  const headers: Record<string, string> = {};
  let body: string | Uint8Array | undefined;

  if (spec.body !== undefined) {
    if (typeof spec.body === "string" || spec.body instanceof Uint8Array) {
      body = spec.body;
    } else {
      body = JSON.stringify(spec.body);
      headers["content-type"] = "application/json";
    }
  }
  if (cfg.secret) headers["authorization"] = `Bearer ${cfg.secret}`;
  for (const [k, v] of Object.entries(spec.headers ?? {})) headers[k.toLowerCase()] = v;

  return { method: spec.method, url: buildUrl(cfg.url, spec.path, spec.query), headers, body };
}

/**
 * Calls named dependencies with a per-attempt timeout, exponential backoff
 * between retries and a circuit breaker per dependency.
 *
 * `invoke` resolves with a CallOutcome for every runtime failure; it only
 * rejects with ConfigurationError.
 */
export class RemoteClient extends EventEmitter {
  private readonly configs = new Map<string, Readonly<DependencyConfig>>();
  private readonly breaker: CircuitBreaker;
  private readonly transport: Transport;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(opts: RemoteClientOptions) {
    super();

    for (const cfg of opts.dependencies) {
      validateConfig(cfg);
      if (this.configs.has(cfg.name)) throw new ConfigurationError(`Dependency ${cfg.name} configured twice`, cfg.name);
      this.configs.set(cfg.name, Object.freeze({ ...cfg }));
    }

    this.breaker = new CircuitBreaker((key) => {
      const cfg = this.config(key);
      return { failureThreshold: cfg.failureThreshold, resetTimeoutMs: cfg.resetTimeoutMs };
    });
    this.transport = opts.transport ?? createHttpTransport();
    this.log = opts.logger ?? createLogger();
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? sleep;
  }

  /** Build a client for every dependency listed in REMOTE_DEPENDENCIES. */
  static fromEnv(env: Env = process.env, opts: Omit<RemoteClientOptions, "dependencies"> = {}): RemoteClient {
    return new RemoteClient({ ...opts, dependencies: loadDependencyConfigs(env).values() });
  }

  config(name: string): Readonly<DependencyConfig> {
    const cfg = this.configs.get(name);
    if (!cfg) throw new ConfigurationError(`Unknown dependency: ${name}`, name);
    return cfg;
  }

  async invoke(dependency: string, spec: RequestSpec): Promise<CallOutcome> {
    const cfg = this.config(dependency);
    const req = buildTransportRequest(cfg, spec);
    const callId = genCallId();
    const log = this.log.child({ dependency, callId });
    const start = this.now();
    const ctx: CallContext = { dependency, spec, callId, start, log };

    // Circuit decision before any I/O
    const decision = this.breaker.allow(dependency, start);
    if (!decision.allowed) {
      const error = new CircuitOpenFailure(dependency, decision.retryAfterMs ?? 0);
      log.debug({ mode: decision.mode, retryAfterMs: error.retryAfterMs }, "call rejected by open circuit");
      this.publish("call:rejected", {
        dependency,
        request: spec,
        callId,
        attempts: 0,
        durationMs: 0,
        reason: error.reason,
      });
      return { ok: false, dependency, reason: error.reason, error, attempts: 0 };
    }

    // A half-open trial gets exactly one attempt.
    const maxAttempts = decision.trial ? 1 : cfg.maxAttempts;
    let attempt = 0;

    for (;;) {
      attempt += 1;
      const result = await this.attempt(cfg, req);

      if (result.ok) {
        if (this.isLate(dependency, decision.trial)) this.breaker.onLateResult(dependency, false);
        else this.report(dependency, this.breaker.onSuccess(dependency), log);
        log.debug({ attempt, status: result.response.status }, "call succeeded");
        this.publish("call:success", {
          dependency,
          request: spec,
          callId,
          attempts: attempt,
          durationMs: this.now() - start,
          status: result.response.status,
        });
        return { ok: true, dependency, response: result.response, attempts: attempt };
      }

      const { error } = result;
      const status = result.response?.status;

      if (!error.retryable) {
        // 4xx: the caller's fault, not the dependency's
        if (decision.trial) this.breaker.onNeutral(dependency);
        return this.fail(ctx, attempt, error, result.response);
      }

      if (attempt >= maxAttempts) {
        this.publish("attempt:failure", { dependency, request: spec, callId, attempt, reason: error.reason, status });
        log.debug({ attempt, reason: error.reason, status, err: error }, "attempt failed; giving up");
        return this.settleFailure(ctx, decision.trial, attempt, error, result.response);
      }

      const retryInMs = computeBackoffMs(attempt, cfg.backoffFactor, cfg.maxBackoff);
      this.publish("attempt:failure", {
        dependency,
        request: spec,
        callId,
        attempt,
        reason: error.reason,
        status,
        retryInMs,
      });
      log.debug({ attempt, reason: error.reason, status, retryInMs }, "attempt failed; retrying");
      await this.sleep(retryInMs);

      // Another call may have opened the circuit while this one slept.
      const mode = this.breaker.state(dependency);
      if (mode !== "closed") {
        log.debug({ attempt, mode }, "circuit no longer closed; not retrying");
        return this.settleFailure(ctx, decision.trial, attempt, error, result.response);
      }
    }
  }

  snapshot(): ClientSnapshot {
    return { dependencies: [...this.configs.keys()], breakers: this.breaker.snapshot() };
  }

  private async attempt(cfg: DependencyConfig, req: TransportRequest): Promise<AttemptResult> {
    let res: RemoteResponse;
    try {
      res = await this.transport(req, cfg.timeoutMs);
    } catch (err: unknown) {
      if (err instanceof RemoteCallError) return { ok: false, error: err };
      return { ok: false, error: new ConnectionFailure(`Request to ${req.url} failed: ${describe(err)}`, err) };
    }

    // classify on status code
    if (res.status >= 500) return { ok: false, error: new ServerFailure(res.status, req.url), response: res };
    if (res.status >= 400) return { ok: false, error: new ClientFailure(res.status, req.url), response: res };
    return { ok: true, response: res };
  }

  /** A non-trial call finishing while the circuit is half-open. */
  private isLate(dependency: string, trial: boolean): boolean {
    return !trial && this.breaker.state(dependency) === "half-open";
  }

  private settleFailure(
    ctx: CallContext,
    trial: boolean,
    attempts: number,
    error: RemoteCallError,
    response: RemoteResponse | undefined
  ): FailureOutcome {
    if (this.isLate(ctx.dependency, trial)) this.breaker.onLateResult(ctx.dependency, true, this.now());
    else this.report(ctx.dependency, this.breaker.onFailure(ctx.dependency, this.now()), ctx.log);
    return this.fail(ctx, attempts, error, response);
  }

  private fail(
    { dependency, spec, callId, start, log }: CallContext,
    attempts: number,
    error: RemoteCallError,
    response: RemoteResponse | undefined
  ): FailureOutcome {
    log.debug({ attempts, reason: error.reason, status: response?.status }, "call failed");
    this.publish("call:failure", {
      dependency,
      request: spec,
      callId,
      attempts,
      durationMs: this.now() - start,
      status: response?.status,
      reason: error.reason,
    });
    return { ok: false, dependency, reason: error.reason, error, attempts, response };
  }

  private report(dependency: string, change: BreakerChange, log: Logger): void {
    if (!change.changed || !change.from || !change.to) return;
    log.warn({ from: change.from, to: change.to, failures: this.breaker.failures(dependency) }, "circuit state changed");
    this.publish("breaker:state", { dependency, from: change.from, to: change.to });
  }

  private publish<K extends RemoteClientEventName>(name: K, ...args: RemoteClientEvents[K]): void {
    this.emit(name, ...args);
  }
}
