// demo/loadgen.ts
import { RemoteClient } from "../src/client.js";
import { loadDependencyConfig } from "../src/config.js";
import type { BreakerStateEvent } from "../src/events.js";
import { createLogger } from "../src/logger.js";
import type { FailureReason } from "../src/types.js";

const TOTAL = Number(process.env.TOTAL ?? 500);
const CONCURRENCY = Number(process.env.CONCURRENCY ?? 50);

const log = createLogger(process.env.LOG_LEVEL ?? "info");

// Every option can be overridden with DEMO_UPSTREAM_<OPTION>.
const upstream = loadDependencyConfig("demo-upstream", {
  DEMO_UPSTREAM_URL: "http://127.0.0.1:3001",
  DEMO_UPSTREAM_TIMEOUT: "0.12",
  DEMO_UPSTREAM_BACKOFF_FACTOR: "0.02",
  DEMO_UPSTREAM_MAX_BACKOFF: "0.1",
  DEMO_UPSTREAM_CB_FAILURE_THRESHOLD: "5",
  DEMO_UPSTREAM_CB_RESET_TIMEOUT: "0.8",
  ...process.env,
});

const client = new RemoteClient({ dependencies: [upstream], logger: log });

const counters: Record<"ok" | FailureReason, number> = {
  ok: 0,
  timeout: 0,
  "connection-error": 0,
  "server-error": 0,
  "client-error": 0,
  "circuit-open": 0,
};

client.on("breaker:state", (e: BreakerStateEvent) => {
  log.info({ dependency: e.dependency }, `breaker ${e.from} -> ${e.to}`);
});

let done = 0;

async function worker(jobs: number[]): Promise<void> {
  for (const _ of jobs) {
    const outcome = await client.invoke("demo-upstream", { method: "GET", path: "flaky" });
    counters[outcome.ok ? "ok" : outcome.reason] += 1;

    done += 1;
    if (done % 50 === 0) log.info({ done, ...counters }, "progress");
  }
}

function chunkIndices(total: number, workers: number): number[][] {
  const chunks: number[][] = Array.from({ length: workers }, () => []);
  for (let i = 0; i < total; i++) chunks[i % workers]?.push(i);
  return chunks;
}

async function main(): Promise<void> {
  log.info({ url: upstream.url, total: TOTAL, concurrency: CONCURRENCY }, "loadgen starting");

  await Promise.all(chunkIndices(TOTAL, CONCURRENCY).map((jobs) => worker(jobs)));

  log.info(counters, "done");
  log.info(client.snapshot(), "final snapshot");
}

main().catch((err: unknown) => {
  log.error({ err }, "loadgen failed");
  process.exit(1);
});
