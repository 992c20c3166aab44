// src/services/base.ts
import type { RemoteClient } from "../client.js";
import type { FailureOutcome, JsonValue, RequestSpec } from "../types.js";

export type JsonObject = { [key: string]: JsonValue };

/** The dependency answered 2xx but the body was not a JSON object. */
export class InvalidResponseError extends Error {
  readonly reason = "invalid-response";

  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = "InvalidResponseError";
  }
}

export type ServiceResult<T> =
  | { ok: true; dependency: string; status: number; data: T; attempts: number }
  | FailureOutcome
  | { ok: false; dependency: string; reason: "invalid-response"; error: InvalidResponseError; attempts: number };

function isJsonObject(v: unknown): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function decodeJsonObject(body: Uint8Array): JsonObject {
  if (body.byteLength === 0) return {};
  const parsed: unknown = JSON.parse(new TextDecoder().decode(body));
  if (!isJsonObject(parsed)) throw new SyntaxError("expected a JSON object");
  return parsed;
}

/** `{ "data": {...} }` envelopes are unwrapped; anything else is returned whole. */
export function unwrapData(payload: JsonObject): JsonObject {
  const data = payload["data"];
  return isJsonObject(data) ? data : payload;
}

/**
 * Base of the typed clients for individual dependencies. Each one is bound to
 * a dependency name that the shared RemoteClient must know about.
 */
export abstract class ServiceClient {
  protected constructor(
    protected readonly remote: RemoteClient,
    readonly dependency: string
  ) {
    // fail at construction rather than on first call
    remote.config(dependency);
  }

  protected async request(spec: RequestSpec): Promise<ServiceResult<JsonObject>> {
    const outcome = await this.remote.invoke(this.dependency, spec);
    if (!outcome.ok) return outcome;

    const { status, body } = outcome.response;
    try {
      return { ok: true, dependency: this.dependency, status, data: decodeJsonObject(body), attempts: outcome.attempts };
    } catch (err: unknown) {
      const detail = err instanceof Error ? err.message : String(err);
      return {
        ok: false,
        dependency: this.dependency,
        reason: "invalid-response",
        error: new InvalidResponseError(status, `Invalid JSON payload from ${this.dependency}: ${detail}`),
        attempts: outcome.attempts,
      };
    }
  }

  protected async requestData(spec: RequestSpec): Promise<ServiceResult<JsonObject>> {
    const result = await this.request(spec);
    return result.ok ? { ...result, data: unwrapData(result.data) } : result;
  }
}
