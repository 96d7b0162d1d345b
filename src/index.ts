export { InferenceRouter, createRouter } from './load-balancer/inference-router';
export type { RouterDependencies } from './load-balancer/inference-router';
export { selectHost } from './load-balancer/host-selector';
export type { Selection } from './load-balancer/host-selector';
export { HostStore } from './hosts/host-store';
export { HealthProber } from './health/health-prober';
export type { HealthProberConfig } from './health/health-prober';
export type { BackendClient } from './clients/backend-client';
export { OllamaBackendClient } from './clients/ollama-client';
export { ConnectionPool } from './clients/connection-pool';
export { createApp } from './api/app';
export type { AppOptions } from './api/app';
export { loadConfig, DEFAULT_CONFIG_PATH } from './utils/config-loader';
export { withTtlCache, withFallback } from './utils/cached';
export {
  RouterError,
  NoHealthyHostError,
  BackendCallError,
  ExhaustedRetriesError,
  InvalidHostError,
  ConfigError
} from './utils/errors';
export { register as metricsRegistry } from './utils/prometheus';
export * from './types';
