// src/http.ts
import { request as undiciRequest, type Dispatcher } from "undici";
import { ConnectionFailure, TimeoutFailure } from "./errors.js";
import type { RemoteResponse, Transport, TransportRequest } from "./types.js";

export interface HttpTransportOptions {
  /** undici dispatcher to send through (a pool, a proxy agent, a MockAgent). */
  dispatcher?: Dispatcher;
}

function normalizeHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const out: Record<string, string> = {};

  for (const [k, v] of Object.entries(headers)) {
    if (Array.isArray(v)) out[k.toLowerCase()] = v.join(", ");
    else if (typeof v === "string") out[k.toLowerCase()] = v;
  }
  return out;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Send one request through undici, aborted after `requestTimeoutMs`.
 * An abort becomes TimeoutFailure and any other rejection ConnectionFailure;
 * status codes come back unclassified.
 */
export async function doHttpRequest(
  req: TransportRequest,
  requestTimeoutMs: number,
  opts: HttpTransportOptions = {}
): Promise<RemoteResponse> {
  const ac = new AbortController();
  const timer = setTimeout(() => ac.abort(), requestTimeoutMs);

  try {
    const res = await undiciRequest(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal: ac.signal,
      dispatcher: opts.dispatcher,
    });

    const body = await res.body.arrayBuffer();
    return {
      status: res.statusCode,
      headers: normalizeHeaders(res.headers),
      body: new Uint8Array(body),
    };
  } catch (err: unknown) {
    // undici rejects with an AbortError once the signal fires
    if (ac.signal.aborted) {
      throw new TimeoutFailure(requestTimeoutMs);
    }
    throw new ConnectionFailure(`Request to ${req.url} failed: ${describe(err)}`, err);
  } finally {
    clearTimeout(timer);
  }
}

export function createHttpTransport(opts: HttpTransportOptions = {}): Transport {
  return (req, timeoutMs) => doHttpRequest(req, timeoutMs, opts);
}
