import type { Request } from 'express';
import { performance } from 'perf_hooks';
import type { MetricsRegistry } from '../services/MetricsRegistry';
import { runWithContext } from '../utils/logger';
import type { Middleware } from './MiddlewareChain';

/**
 * Normalize URL paths to prevent high cardinality when no route pattern is
 * available. Replaces dynamic segments with placeholders.
 */
export function normalizePath(path: string): string {
  const pathWithoutQuery = path.split('?')[0];

  return (
    pathWithoutQuery
      // UUID patterns (with or without hyphens)
      .replace(/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, ':id')
      .replace(/[0-9a-f]{32}/gi, ':id')
      // Numeric IDs
      .replace(/\/[0-9]+(?=\/|$)/g, '/:id')
  );
}

/**
 * Route label for a request: the matched route pattern when Express has one,
 * otherwise the normalized path.
 */
export function routeLabel(req: Request): string {
  const route: unknown = req.route;
  if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') {
    return route.path;
  }
  return normalizePath(req.path);
}

/**
 * Metrics capture link.
 *
 * Holds the in-flight gauge until the response has finished (or the
 * connection closed) and records the request count and duration once, with
 * the status actually sent. Handlers that answer from a callback after
 * returning are therefore measured to their real completion. Sitting outside
 * recovery, it sees the 500 that recovery wrote. It also exposes the
 * registry to handlers through the request context.
 */
export function metricsMiddleware(metrics: MetricsRegistry): Middleware {
  return (next) => async (req, res) => {
    const release = metrics.trackInFlight();
    const startTime = performance.now();
    let recorded = false;

    const record = (statusCode: number) => {
      if (recorded) {
        return;
      }
      recorded = true;
      res.off('finish', onDone);
      res.off('close', onDone);
      release();
      metrics.recordHttpRequest(
        req.method,
        routeLabel(req),
        statusCode,
        (performance.now() - startTime) / 1000
      );
    };
    const onDone = () => record(res.statusCode);

    res.once('finish', onDone);
    res.once('close', onDone);

    try {
      await runWithContext({ metrics }, () => next(req, res));
    } catch (error) {
      // Nothing was sent; whatever answers next will not be a success
      if (!res.headersSent) {
        record(500);
      }
      throw error;
    }
  };
}
