export { Service, toExpressPath } from './server/Service';
export type { ServiceOptions, ServiceState, ServiceAddresses, HttpMethod } from './server/Service';

export {
  MetricsRegistry,
  sanitizeMetricPrefix,
  DEFAULT_BUCKETS,
  DEFAULT_OBJECTIVES,
} from './server/services/MetricsRegistry';
export type {
  MetricDescriptor,
  MetricKind,
  MetricsRegistryOptions,
  MetricsSnapshot,
  RegisteredMetric,
} from './server/services/MetricsRegistry';

export { HealthRegistry } from './server/services/HealthRegistry';
export type {
  EvaluateOptions,
  HealthProbe,
  HealthRegistryEvents,
  HealthRegistryOptions,
  HealthSnapshot,
  HealthStatus,
  ProbeCheck,
  ProbeResult,
} from './server/services/HealthRegistry';

export { ShutdownSequencer } from './server/services/ShutdownSequencer';
export type { HookFailure, ShutdownHook, ShutdownReport } from './server/services/ShutdownSequencer';

export { Listener } from './server/lifecycle/Listener';
export type { BoundAddress, ListenerOptions, ListenerState } from './server/lifecycle/Listener';

export * from './server/middleware';
export { createOperationalApp } from './server/routes/operational';
export type { OperationalAppOptions } from './server/routes/operational';

export * from './server/context';
export * from './server/config';
export * from './server/errors';
export {
  createLogger,
  logger,
  getRequestContext,
  runWithContext,
  maskSensitiveData,
  loggerOptionsFromEnv,
} from './server/utils/logger';
export type { Logger, LoggerOptions, LogMeta, RequestContext } from './server/utils/logger';
