import { getLogger } from '../context';
import { errorMessage } from '../errors';
import type { Middleware } from './MiddlewareChain';

export const RECOVERY_BODY = 'Internal Server Error';

/**
 * Recovery link. Any error thrown or rejected by the inner links or the
 * handler is logged with the request method and path and turned into a
 * plain-text 500. Nothing propagates past this link.
 *
 * When the handler had already started the response, the status can no
 * longer change; the response is ended as-is.
 */
export function recovery(): Middleware {
  return (next) => async (req, res) => {
    try {
      await next(req, res);
    } catch (error) {
      getLogger().error('Recovered from handler error', {
        method: req.method,
        path: req.path,
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });

      if (!res.headersSent) {
        res.status(500).type('text/plain').send(RECOVERY_BODY);
      } else if (!res.writableEnded) {
        res.end();
      }
    }
  };
}
