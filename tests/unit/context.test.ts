/**
 * Request-scoped accessor tests.
 */

import {
  getLogger,
  getMetrics,
  getRequestId,
  incCounter,
  observeHistogram,
  setGauge,
} from '../../src/server/context';
import { ErrorCodes } from '../../src/server/errors';
import { MetricsRegistry } from '../../src/server/services/MetricsRegistry';
import { logger, runWithContext } from '../../src/server/utils/logger';
import { thrownBy } from '../helpers/errors';
import { metricValue } from '../helpers/metrics';

describe('request context accessors', () => {
  describe('outside a request', () => {
    it('should fall back to the process logger', () => {
      expect(getLogger()).toBe(logger);
      expect(getRequestId()).toBeUndefined();
      expect(getMetrics()).toBeUndefined();
    });

    it('should throw METRICS_UNAVAILABLE from the metric helpers', () => {
      expect(thrownBy(() => incCounter('jobs_total'))).toMatchObject({
        code: ErrorCodes.METRICS_UNAVAILABLE,
      });
      expect(thrownBy(() => observeHistogram('job_seconds', 0.2))).toMatchObject({
        code: ErrorCodes.METRICS_UNAVAILABLE,
      });
    });
  });

  describe('inside a request', () => {
    it('should route metric helpers to the registry in scope', async () => {
      const metrics = new MetricsRegistry({ service: 'ctx' });
      metrics.registerCounter({ name: 'jobs_total', help: 'Jobs', labelNames: ['queue'] });
      metrics.registerGauge({ name: 'queue_depth', help: 'Queue depth' });

      runWithContext({ metrics, requestId: 'req-5' }, () => {
        incCounter('jobs_total', 'emails');
        incCounter('jobs_total', 'emails');
        setGauge('queue_depth', 7);
        expect(getRequestId()).toBe('req-5');
      });

      expect(await metricValue(metrics, 'ctx_jobs_total', { queue: 'emails' })).toBe(2);
      expect(await metricValue(metrics, 'ctx_queue_depth')).toBe(7);
    });

    it('should return the request logger when one is in scope', () => {
      const child = logger.child({ requestId: 'req-6' });

      runWithContext({ logger: child }, () => {
        expect(getLogger()).toBe(child);
      });
    });
  });
});
