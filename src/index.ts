export { RemoteClient, buildUrl, buildTransportRequest, type RemoteClientOptions } from "./client.js";
export { CircuitBreaker, type BreakerDecision, type BreakerChange } from "./breaker.js";
export { computeBackoffMs } from "./backoff.js";
export {
  DEFAULTS,
  DEPENDENCIES_VAR,
  dependencyEnvSchema,
  dependencyNamesFromEnv,
  envPrefix,
  loadDependencyConfig,
  loadDependencyConfigs,
  type Env,
} from "./config.js";
export {
  CircuitOpenFailure,
  ClientFailure,
  ConfigurationError,
  ConnectionFailure,
  RemoteCallError,
  ServerFailure,
  TimeoutFailure,
} from "./errors.js";
export { createHttpTransport, doHttpRequest, type HttpTransportOptions } from "./http.js";
export { createLogger } from "./logger.js";
export type * from "./events.js";
export type * from "./snapshot.js";
export type * from "./types.js";
export * from "./services/index.js";
