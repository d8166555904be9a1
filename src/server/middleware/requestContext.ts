import { randomUUID } from 'crypto';
import type { HealthRegistry } from '../services/HealthRegistry';
import { runWithContext, type Logger } from '../utils/logger';
import type { Middleware } from './MiddlewareChain';

/**
 * Express.Request augmentation so that req.requestId is available
 * throughout the codebase without additional casting.
 */
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

/**
 * Logger context link:
 * 1. Takes the request ID from X-Request-Id, or generates a UUID
 * 2. Attaches it to req.requestId and echoes it on the response
 * 3. Runs the rest of the chain with a child logger bound to that ID
 *
 * Every log written through `getLogger()` inside the request then carries
 * the request ID, including from nested async calls.
 */
export function loggerContext(baseLogger: Logger): Middleware {
  return (next) => (req, res) => {
    const headerId = (req.header('x-request-id') ?? '').trim();
    const requestId = headerId.length > 0 ? headerId : randomUUID();

    req.requestId = requestId;
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);

    return runWithContext(
      {
        requestId,
        method: req.method,
        path: req.path,
        startTime: Date.now(),
        logger: baseLogger.child({ requestId }),
      },
      () => next(req, res)
    );
  };
}

/**
 * Health context link: exposes the service's health registry to handlers
 * through `getHealth()`.
 */
export function healthContext(health: HealthRegistry): Middleware {
  return (next) => (req, res) => runWithContext({ health }, () => next(req, res));
}
