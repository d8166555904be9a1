import type { HealthRegistry } from '../services/HealthRegistry';
import type { MetricsRegistry } from '../services/MetricsRegistry';
import type { Logger } from '../utils/logger';
import { metricsMiddleware } from './metricsMiddleware';
import type { Middleware } from './MiddlewareChain';
import { recovery } from './recovery';
import { healthContext, loggerContext } from './requestContext';
import { requestLogger } from './requestLogger';

export interface DefaultMiddlewareOptions {
  metrics: MetricsRegistry;
  health: HealthRegistry;
  logger: Logger;
}

/**
 * The built-in links, outermost first: metrics capture, logger context,
 * recovery, request logging, health context.
 *
 * Metrics wraps recovery so that a recovered failure is still counted, with
 * its 500 status, and the in-flight gauge is released.
 */
export function defaultMiddleware(options: DefaultMiddlewareOptions): Middleware[] {
  return [
    metricsMiddleware(options.metrics),
    loggerContext(options.logger),
    recovery(),
    requestLogger(),
    healthContext(options.health),
  ];
}

export { MiddlewareChain } from './MiddlewareChain';
export type { Handler, Middleware } from './MiddlewareChain';
export { metricsMiddleware, normalizePath, routeLabel } from './metricsMiddleware';
export { recovery, RECOVERY_BODY } from './recovery';
export { loggerContext, healthContext } from './requestContext';
export { requestLogger } from './requestLogger';
export { errorHandler, notFoundHandler, asyncHandler, createError } from './errorHandler';
export type { AppError } from './errorHandler';
