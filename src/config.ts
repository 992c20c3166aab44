// src/config.ts
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { DependencyConfig } from "./types.js";

export type Env = Record<string, string | undefined>;

export const DEFAULTS = {
  timeout: 5,
  maxAttempts: 3,
  backoffFactor: 0.5,
  maxBackoff: 5,
  failureThreshold: 5,
  resetTimeout: 30,
} as const;

/** Environment list of dependency names, e.g. "user-service,payment-service". */
export const DEPENDENCIES_VAR = "REMOTE_DEPENDENCIES";

const seconds = z.coerce.number().finite().nonnegative();

/**
 * Options recognised per dependency. Durations are seconds, as they appear
 * in the environment.
 */
export const dependencyEnvSchema = z.object({
  url: z
    .string({ required_error: "is required" })
    .url()
    .refine((v) => /^https?:\/\//i.test(v), "must be an http(s) URL"),
  timeout: z.coerce.number().finite().positive().default(DEFAULTS.timeout),
  secret: z.string().min(1).optional(),
  max_attempts: z.coerce.number().int().min(1).default(DEFAULTS.maxAttempts),
  backoff_factor: seconds.default(DEFAULTS.backoffFactor),
  max_backoff: seconds.default(DEFAULTS.maxBackoff),
  circuit_breaker_failure_threshold: z.coerce.number().int().min(1).default(DEFAULTS.failureThreshold),
  circuit_breaker_reset_timeout: seconds.default(DEFAULTS.resetTimeout),
});

export type DependencyEnv = z.infer<typeof dependencyEnvSchema>;

// Short spellings accepted for the breaker options.
const ALIASES: Record<string, string> = {
  circuit_breaker_failure_threshold: "cb_failure_threshold",
  circuit_breaker_reset_timeout: "cb_reset_timeout",
};

export function envPrefix(name: string): string {
  return name.trim().toUpperCase().replace(/[^A-Z0-9]+/g, "_");
}

function read(env: Env, prefix: string, option: string): string | undefined {
  const v = env[`${prefix}_${option.toUpperCase()}`];
  if (v === undefined) return undefined;
  const trimmed = v.trim();
  return trimmed === "" ? undefined : trimmed;
}

/**
 * Build the immutable configuration of one dependency from `<PREFIX>_<OPTION>`
 * variables. Missing optional values take DEFAULTS; a missing url or a value
 * that fails validation throws ConfigurationError.
 */
export function loadDependencyConfig(name: string, env: Env = process.env): Readonly<DependencyConfig> {
  if (name.trim() === "") throw new ConfigurationError("dependency name must not be empty");

  const prefix = envPrefix(name);
  const raw: Record<string, string | undefined> = {};
  for (const option of Object.keys(dependencyEnvSchema.shape)) {
    const alias = ALIASES[option];
    raw[option] = read(env, prefix, option) ?? (alias ? read(env, prefix, alias) : undefined);
  }

  const parsed = dependencyEnvSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const option = issue ? String(issue.path[0] ?? "") : "";
    const variable = option ? `${prefix}_${option.toUpperCase()}` : prefix;
    throw new ConfigurationError(
      `Invalid configuration for ${name}: ${variable} ${issue?.message ?? "is invalid"}`,
      name,
      option || undefined
    );
  }

  return fromEnv(name, parsed.data);
}

export function fromEnv(name: string, v: DependencyEnv): Readonly<DependencyConfig> {
  return Object.freeze({
    name,
    url: v.url,
    timeoutMs: Math.round(v.timeout * 1000),
    secret: v.secret,
    maxAttempts: v.max_attempts,
    backoffFactor: v.backoff_factor,
    maxBackoff: v.max_backoff,
    failureThreshold: v.circuit_breaker_failure_threshold,
    resetTimeoutMs: Math.round(v.circuit_breaker_reset_timeout * 1000),
  });
}

export function dependencyNamesFromEnv(env: Env = process.env): string[] {
  const list = env[DEPENDENCIES_VAR] ?? "";
  return list
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/** Load every named dependency once; the result is never mutated. */
export function loadDependencyConfigs(
  env: Env = process.env,
  names: readonly string[] = dependencyNamesFromEnv(env)
): ReadonlyMap<string, Readonly<DependencyConfig>> {
  const out = new Map<string, Readonly<DependencyConfig>>();
  for (const name of names) {
    if (out.has(name)) throw new ConfigurationError(`Dependency ${name} configured twice`, name);
    out.set(name, loadDependencyConfig(name, env));
  }
  return out;
}
