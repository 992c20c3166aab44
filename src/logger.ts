// src/logger.ts
import pino, { type Logger } from "pino";

export type { Logger };

/**
 * Logger used when the host application supplies none. Silent unless
 * REMOTE_CLIENT_LOG_LEVEL is set: rendering failures is the caller's job.
 */
export function createLogger(level: string = process.env.REMOTE_CLIENT_LOG_LEVEL ?? "silent"): Logger {
  return pino({
    name: "remote-client",
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: { err: pino.stdSerializers.err },
  });
}
