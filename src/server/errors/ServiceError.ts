import { ErrorCode, ErrorCodeMessages, ErrorCodes } from './errorCodes';

export interface ServiceErrorOptions {
  code: ErrorCode;
  message?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Error type for every failure the harness reports to callers.
 *
 * @example
 * ```ts
 * try {
 *   service.registerCounter({ name: 'jobs_total', help: 'Jobs processed' });
 * } catch (err) {
 *   if (isServiceError(err, ErrorCodes.METRIC_ALREADY_EXISTS)) {
 *     // already registered by another module
 *   }
 * }
 * ```
 */
export class ServiceError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown> | undefined;

  constructor(options: ServiceErrorOptions) {
    super(options.message ?? ErrorCodeMessages[options.code], { cause: options.cause });
    this.name = 'ServiceError';
    this.code = options.code;
    this.details = options.details;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

export function isServiceError(error: unknown, code?: ErrorCode): error is ServiceError {
  return error instanceof ServiceError && (code === undefined || error.code === code);
}

/**
 * Normalise an unknown thrown value into a message suitable for logs and
 * health payloads.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : String(error);
}

/**
 * Factories for the errors raised across the harness.
 */
export const ServiceErrors = {
  configInvalid: (issues: Array<{ path: string; message: string }>) =>
    new ServiceError({
      code: ErrorCodes.CONFIG_INVALID,
      message: `Invalid service configuration: ${issues
        .map((issue) => `${issue.path || 'root'}: ${issue.message}`)
        .join('; ')}`,
      details: { issues },
    }),

  metricAlreadyExists: (name: string, kind: string) =>
    new ServiceError({
      code: ErrorCodes.METRIC_ALREADY_EXISTS,
      message: `${kind} ${name} already exists`,
      details: { name, kind },
    }),

  metricNotFound: (name: string, kind: string) =>
    new ServiceError({
      code: ErrorCodes.METRIC_NOT_FOUND,
      message: `${kind} ${name} not found`,
      details: { name, kind },
    }),

  metricInvalidDescriptor: (name: string, reason: string) =>
    new ServiceError({
      code: ErrorCodes.METRIC_INVALID_DESCRIPTOR,
      message: `Invalid metric descriptor ${name || '<unnamed>'}: ${reason}`,
      details: { name, reason },
    }),

  metricReservedName: (name: string, reservedPrefix: string) =>
    new ServiceError({
      code: ErrorCodes.METRIC_RESERVED_NAME,
      message: `Metric ${name} collides with the reserved prefix ${reservedPrefix}`,
      details: { name, reservedPrefix },
    }),

  metricLabelMismatch: (name: string, expected: readonly string[], received: number) =>
    new ServiceError({
      code: ErrorCodes.METRIC_LABEL_MISMATCH,
      message: `Metric ${name} expects ${expected.length} label values (${expected.join(', ')}), got ${received}`,
      details: { name, expected: [...expected], received },
    }),

  metricInvalidValue: (name: string, value: number) =>
    new ServiceError({
      code: ErrorCodes.METRIC_INVALID_VALUE,
      message: `Invalid value ${value} for metric ${name}`,
      details: { name, value },
    }),

  metricsUnavailable: () => new ServiceError({ code: ErrorCodes.METRICS_UNAVAILABLE }),

  probeAlreadyExists: (name: string) =>
    new ServiceError({
      code: ErrorCodes.PROBE_ALREADY_EXISTS,
      message: `Health probe ${name} already exists`,
      details: { name },
    }),

  probeInvalid: (name: string, reason: string) =>
    new ServiceError({
      code: ErrorCodes.PROBE_INVALID,
      message: `Invalid health probe ${name || '<unnamed>'}: ${reason}`,
      details: { name, reason },
    }),

  middlewareSealed: () => new ServiceError({ code: ErrorCodes.MIDDLEWARE_SEALED }),

  routeInvalid: (method: string, pattern: string, reason: string) =>
    new ServiceError({
      code: ErrorCodes.ROUTE_INVALID,
      message: `Invalid route ${method} ${pattern}: ${reason}`,
      details: { method, pattern, reason },
    }),

  invalidState: (operation: string, state: string) =>
    new ServiceError({
      code: ErrorCodes.LIFECYCLE_INVALID_STATE,
      message: `Cannot ${operation} while service is ${state}`,
      details: { operation, state },
    }),

  startupFailed: (listener: string, cause: unknown) =>
    new ServiceError({
      code: ErrorCodes.STARTUP_FAILED,
      message: `${listener} listener failed to start: ${errorMessage(cause)}`,
      details: { listener },
      cause,
    }),

  listenerFailed: (listener: string, cause: unknown) =>
    new ServiceError({
      code: ErrorCodes.LISTENER_FAILED,
      message: `${listener} listener failed: ${errorMessage(cause)}`,
      details: { listener },
      cause,
    }),

  listenerCloseFailed: (listener: string, cause: unknown) =>
    new ServiceError({
      code: ErrorCodes.LISTENER_CLOSE_FAILED,
      message: `${listener} listener failed to close: ${errorMessage(cause)}`,
      details: { listener },
      cause,
    }),

  shutdownTimeout: (listener: string, timeoutMs?: number) =>
    new ServiceError({
      code: ErrorCodes.SHUTDOWN_TIMEOUT,
      message:
        timeoutMs === undefined
          ? `${listener} listener did not drain before the shutdown deadline`
          : `${listener} listener did not drain within ${timeoutMs}ms`,
      details: { listener, ...(timeoutMs !== undefined && { timeoutMs }) },
    }),

  shutdownSealed: () => new ServiceError({ code: ErrorCodes.SHUTDOWN_SEALED }),
};
