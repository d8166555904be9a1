/**
 * Stable error codes raised by the service harness.
 *
 * Codes are grouped by the component that raises them. Callers should branch
 * on `code` rather than on message text.
 */
export const ErrorCodes = {
  // Configuration
  CONFIG_INVALID: 'CONFIG_INVALID',

  // Metrics registry
  METRIC_ALREADY_EXISTS: 'METRIC_ALREADY_EXISTS',
  METRIC_NOT_FOUND: 'METRIC_NOT_FOUND',
  METRIC_INVALID_DESCRIPTOR: 'METRIC_INVALID_DESCRIPTOR',
  METRIC_RESERVED_NAME: 'METRIC_RESERVED_NAME',
  METRIC_LABEL_MISMATCH: 'METRIC_LABEL_MISMATCH',
  METRIC_INVALID_VALUE: 'METRIC_INVALID_VALUE',
  METRICS_UNAVAILABLE: 'METRICS_UNAVAILABLE',

  // Health registry
  PROBE_ALREADY_EXISTS: 'PROBE_ALREADY_EXISTS',
  PROBE_INVALID: 'PROBE_INVALID',

  // Middleware chain
  MIDDLEWARE_SEALED: 'MIDDLEWARE_SEALED',
  ROUTE_INVALID: 'ROUTE_INVALID',

  // Lifecycle
  LIFECYCLE_INVALID_STATE: 'LIFECYCLE_INVALID_STATE',
  STARTUP_FAILED: 'STARTUP_FAILED',
  LISTENER_FAILED: 'LISTENER_FAILED',
  LISTENER_CLOSE_FAILED: 'LISTENER_CLOSE_FAILED',
  SHUTDOWN_TIMEOUT: 'SHUTDOWN_TIMEOUT',
  SHUTDOWN_SEALED: 'SHUTDOWN_SEALED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Default human-readable message for each code, used when the raiser does not
 * supply a more specific one.
 */
export const ErrorCodeMessages: Record<ErrorCode, string> = {
  CONFIG_INVALID: 'Invalid service configuration',
  METRIC_ALREADY_EXISTS: 'Metric already registered',
  METRIC_NOT_FOUND: 'Metric not found',
  METRIC_INVALID_DESCRIPTOR: 'Invalid metric descriptor',
  METRIC_RESERVED_NAME: 'Metric name uses a reserved prefix',
  METRIC_LABEL_MISMATCH: 'Label values do not match registered label names',
  METRIC_INVALID_VALUE: 'Invalid metric value',
  METRICS_UNAVAILABLE: 'Metrics not available in request context',
  PROBE_ALREADY_EXISTS: 'Health probe already registered',
  PROBE_INVALID: 'Invalid health probe',
  MIDDLEWARE_SEALED: 'Middleware cannot be added after the service has started',
  ROUTE_INVALID: 'Invalid route',
  LIFECYCLE_INVALID_STATE: 'Operation not allowed in the current lifecycle state',
  STARTUP_FAILED: 'Service failed to start',
  LISTENER_FAILED: 'Listener failed',
  LISTENER_CLOSE_FAILED: 'Listener failed to close',
  SHUTDOWN_TIMEOUT: 'Shutdown deadline exceeded',
  SHUTDOWN_SEALED: 'Shutdown hooks cannot be added once shutdown has begun',
};
