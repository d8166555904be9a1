import { performance } from 'perf_hooks';
import { getLogger } from '../context';
import type { Middleware } from './MiddlewareChain';

/**
 * Request logging link: "Incoming request" at info on entry, "Request
 * completed" at debug once the response has been written.
 */
export function requestLogger(): Middleware {
  return (next) => (req, res) => {
    const log = getLogger();
    const startTime = performance.now();

    log.info('Incoming request', {
      remoteAddr: req.socket.remoteAddress,
      userAgent: req.get('User-Agent'),
    });

    res.once('finish', () => {
      log.debug('Request completed', {
        statusCode: res.statusCode,
        durationMs: Math.round(performance.now() - startTime),
      });
    });

    return next(req, res);
  };
}
