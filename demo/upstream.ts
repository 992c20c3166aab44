// demo/upstream.ts
import http from "node:http";
import { createLogger } from "../src/logger.js";

const PORT = Number(process.env.UPSTREAM_PORT ?? 3001);

// Behavior knobs
const FAIL_RATE = Number(process.env.FAIL_RATE ?? 0.35);      // 35% 503s
const SLOW_RATE = Number(process.env.SLOW_RATE ?? 0.2);       // 20% slow responses
const NOT_FOUND_RATE = Number(process.env.NOT_FOUND_RATE ?? 0.05);
const SLOW_MS = Number(process.env.SLOW_MS ?? 300);

const log = createLogger(process.env.LOG_LEVEL ?? "info");

function send(res: http.ServerResponse, status: number, payload: Record<string, unknown>): void {
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(payload));
}

const server = http.createServer((req, res) => {
  if (!req.url) return send(res, 400, { error: "bad request" });
  if (req.url.startsWith("/health")) return send(res, 200, { ok: true });

  const r = Math.random();

  if (r < FAIL_RATE) return send(res, 503, { ok: false, kind: "fail" });
  if (r < FAIL_RATE + NOT_FOUND_RATE) return send(res, 404, { ok: false, kind: "missing" });

  if (r < FAIL_RATE + NOT_FOUND_RATE + SLOW_RATE) {
    setTimeout(() => send(res, 200, { data: { kind: "slow", ts: Date.now() } }), SLOW_MS);
    return;
  }

  send(res, 200, { data: { kind: "fast", ts: Date.now() } });
});

server.listen(PORT, "127.0.0.1", () => {
  log.info({ port: PORT, FAIL_RATE, SLOW_RATE, NOT_FOUND_RATE, SLOW_MS }, "upstream listening");
});
