/**
 * Unit tests for MetricsRegistry.
 *
 * Covers:
 * - Name prefixing and the reserved built-in prefix
 * - Registration conflicts and descriptor validation
 * - Observation by name with positional label values
 * - Built-in HTTP series and the in-flight gauge
 * - Export and registry isolation
 */

import {
  DEFAULT_BUCKETS,
  MetricsRegistry,
  sanitizeMetricPrefix,
} from '../../src/server/services/MetricsRegistry';
import { ErrorCodes } from '../../src/server/errors';
import { thrownBy } from '../helpers/errors';
import { metricValue } from '../helpers/metrics';

describe('MetricsRegistry', () => {
  let metrics: MetricsRegistry;

  beforeEach(() => {
    metrics = new MetricsRegistry({ service: 'test-svc' });
  });

  describe('prefixing', () => {
    it('should sanitize the service name into a metric prefix', () => {
      expect(metrics.prefix).toBe('test_svc');
      expect(metrics.reservedPrefix).toBe('test_svc_http_');
      expect(sanitizeMetricPrefix('9lives')).toBe('_9lives');
      expect(sanitizeMetricPrefix('  ')).toBe('service');
      expect(sanitizeMetricPrefix('api:v2')).toBe('api:v2');
    });

    it('should prefix bare names and leave prefixed names unchanged', () => {
      expect(metrics.prefixedName('jobs_total')).toBe('test_svc_jobs_total');
      expect(metrics.prefixedName('test_svc_jobs_total')).toBe('test_svc_jobs_total');
    });

    it('should accept bare and prefixed names interchangeably for observations', async () => {
      metrics.registerCounter({ name: 'jobs_total', help: 'Jobs processed' });

      metrics.incCounter('jobs_total');
      metrics.incCounter('test_svc_jobs_total');

      expect(await metricValue(metrics, 'test_svc_jobs_total')).toBe(2);
    });
  });

  describe('built-in series', () => {
    it('should create the HTTP series at construction', () => {
      expect(metrics.descriptors().map((d) => [d.name, d.kind])).toEqual([
        ['test_svc_http_requests_total', 'counter'],
        ['test_svc_http_request_duration_seconds', 'histogram'],
        ['test_svc_http_requests_in_flight', 'gauge'],
      ]);
    });

    it('should record requests by method, route and status class', async () => {
      metrics.recordHttpRequest('GET', '/hello/:name', 200, 0.01);
      metrics.recordHttpRequest('GET', '/hello/:name', 204, 0.02);
      metrics.recordHttpRequest('POST', '/orders', 503, 0.5);

      expect(
        await metricValue(metrics, 'test_svc_http_requests_total', {
          method: 'GET',
          route: '/hello/:name',
          status_class: '2xx',
        })
      ).toBe(2);
      expect(
        await metricValue(metrics, 'test_svc_http_requests_total', {
          method: 'POST',
          route: '/orders',
          status_class: '5xx',
        })
      ).toBe(1);
      expect(
        await metricValue(
          metrics,
          'test_svc_http_request_duration_seconds',
          { method: 'GET', route: '/hello/:name', status_class: '2xx' },
          'test_svc_http_request_duration_seconds_count'
        )
      ).toBe(2);
    });

    it('should release the in-flight gauge exactly once per acquisition', async () => {
      const release = metrics.trackInFlight();
      expect(await metricValue(metrics, 'test_svc_http_requests_in_flight')).toBe(1);

      release();
      release();

      expect(await metricValue(metrics, 'test_svc_http_requests_in_flight')).toBe(0);
    });

    it('should reject user metrics under the reserved prefix', () => {
      expect(
        thrownBy(() => metrics.registerCounter({ name: 'http_requests_total', help: 'Shadow' }))
      ).toMatchObject({ code: ErrorCodes.METRIC_RESERVED_NAME });
      expect(
        thrownBy(() => metrics.registerGauge({ name: 'test_svc_http_custom', help: 'Custom' }))
      ).toMatchObject({ code: ErrorCodes.METRIC_RESERVED_NAME });
    });
  });

  describe('registration', () => {
    it('should reject a second registration of the same name', async () => {
      metrics.registerCounter({ name: 'jobs_total', help: 'Jobs processed' });

      const error = thrownBy(() =>
        metrics.registerCounter({ name: 'test_svc_jobs_total', help: 'Again' })
      );

      expect(error).toMatchObject({
        code: ErrorCodes.METRIC_ALREADY_EXISTS,
        message: 'counter test_svc_jobs_total already exists',
      });

      metrics.incCounter('jobs_total');
      expect(await metricValue(metrics, 'test_svc_jobs_total')).toBe(1);
    });

    it('should keep names unique across kinds', () => {
      metrics.registerCounter({ name: 'queue_depth', help: 'Depth' });

      expect(
        thrownBy(() => metrics.registerGauge({ name: 'queue_depth', help: 'Depth' }))
      ).toMatchObject({ code: ErrorCodes.METRIC_ALREADY_EXISTS });
    });

    it.each([
      ['an invalid name', { name: 'bad-name', help: 'Bad' }],
      ['empty help text', { name: 'no_help', help: '  ' }],
      ['an invalid label name', { name: 'labelled', help: 'Labels', labelNames: ['bad-label'] }],
      ['duplicate label names', { name: 'dupes', help: 'Labels', labelNames: ['a', 'a'] }],
      ['a reserved label name', { name: 'internal', help: 'Labels', labelNames: ['__name'] }],
    ])('should reject a descriptor with %s', (_case, descriptor) => {
      expect(thrownBy(() => metrics.registerCounter(descriptor))).toMatchObject({
        code: ErrorCodes.METRIC_INVALID_DESCRIPTOR,
      });
    });

    it('should reject non-increasing histogram buckets and the "le" label', () => {
      expect(
        thrownBy(() =>
          metrics.registerHistogram({ name: 'latency', help: 'Latency', buckets: [1, 0.5] })
        )
      ).toMatchObject({ code: ErrorCodes.METRIC_INVALID_DESCRIPTOR });
      expect(
        thrownBy(() =>
          metrics.registerHistogram({ name: 'latency', help: 'Latency', labelNames: ['le'] })
        )
      ).toMatchObject({ code: ErrorCodes.METRIC_INVALID_DESCRIPTOR });
    });

    it('should reject out-of-range summary objectives', () => {
      expect(
        thrownBy(() =>
          metrics.registerSummary({ name: 'sizes', help: 'Sizes', objectives: { 1.5: 0.01 } })
        )
      ).toMatchObject({ code: ErrorCodes.METRIC_INVALID_DESCRIPTOR });
    });

    it('should apply default buckets and objectives', () => {
      const histogram = metrics.registerHistogram({ name: 'latency', help: 'Latency' });
      const summary = metrics.registerSummary({ name: 'sizes', help: 'Sizes' });

      expect(histogram.buckets).toEqual(DEFAULT_BUCKETS);
      expect(summary.objectives).toEqual({ 0.5: 0.05, 0.9: 0.01, 0.99: 0.001 });
    });

    it('should return frozen descriptors', () => {
      const descriptor = metrics.registerCounter({
        name: 'jobs_total',
        help: 'Jobs processed',
        labelNames: ['queue'],
      });

      expect(descriptor).toEqual({
        name: 'test_svc_jobs_total',
        kind: 'counter',
        help: 'Jobs processed',
        labelNames: ['queue'],
      });
      expect(Object.isFrozen(descriptor)).toBe(true);
      expect(Object.isFrozen(descriptor.labelNames)).toBe(true);
    });

    it('should keep separate registries isolated', async () => {
      const other = new MetricsRegistry({ service: 'test-svc' });

      metrics.registerCounter({ name: 'jobs_total', help: 'Jobs processed' });
      other.registerCounter({ name: 'jobs_total', help: 'Jobs processed' });
      metrics.incCounter('jobs_total');

      expect(await metricValue(metrics, 'test_svc_jobs_total')).toBe(1);
      expect(await metricValue(other, 'test_svc_jobs_total')).toBe(0);
    });
  });

  describe('observations', () => {
    beforeEach(() => {
      metrics.registerCounter({ name: 'jobs_total', help: 'Jobs', labelNames: ['queue'] });
      metrics.registerGauge({ name: 'workers', help: 'Workers', labelNames: ['pool'] });
      metrics.registerHistogram({ name: 'latency_seconds', help: 'Latency' });
      metrics.registerSummary({ name: 'payload_bytes', help: 'Payload size' });
    });

    it('should add to counters per label combination', async () => {
      metrics.incCounter('jobs_total', 'email');
      metrics.addCounter('jobs_total', 4, 'email');
      metrics.incCounter('jobs_total', 'sms');

      expect(await metricValue(metrics, 'test_svc_jobs_total', { queue: 'email' })).toBe(5);
      expect(await metricValue(metrics, 'test_svc_jobs_total', { queue: 'sms' })).toBe(1);
    });

    it('should reject negative counter increments', () => {
      expect(thrownBy(() => metrics.addCounter('jobs_total', -1, 'email'))).toMatchObject({
        code: ErrorCodes.METRIC_INVALID_VALUE,
      });
    });

    it('should set, increment, decrement and add to gauges', async () => {
      metrics.setGauge('workers', 5, 'default');
      metrics.incGauge('workers', 'default');
      metrics.decGauge('workers', 'default');
      metrics.addGauge('workers', 2.5, 'default');

      expect(await metricValue(metrics, 'test_svc_workers', { pool: 'default' })).toBe(7.5);
    });

    it('should observe histograms and summaries', async () => {
      metrics.observeHistogram('latency_seconds', 0.2);
      metrics.observeHistogram('latency_seconds', 3);
      metrics.observeSummary('payload_bytes', 512);

      expect(
        await metricValue(metrics, 'test_svc_latency_seconds', {}, 'test_svc_latency_seconds_count')
      ).toBe(2);
      expect(
        await metricValue(metrics, 'test_svc_latency_seconds', {}, 'test_svc_latency_seconds_sum')
      ).toBeCloseTo(3.2);
      expect(
        await metricValue(metrics, 'test_svc_payload_bytes', {}, 'test_svc_payload_bytes_count')
      ).toBe(1);
    });

    it('should reject a label-value count that differs from the label names', () => {
      expect(thrownBy(() => metrics.incCounter('jobs_total'))).toMatchObject({
        code: ErrorCodes.METRIC_LABEL_MISMATCH,
      });
      expect(thrownBy(() => metrics.incCounter('jobs_total', 'email', 'extra'))).toMatchObject({
        code: ErrorCodes.METRIC_LABEL_MISMATCH,
      });
    });

    it('should report unknown names and kind mismatches as not found', () => {
      expect(thrownBy(() => metrics.incCounter('missing_total'))).toMatchObject({
        code: ErrorCodes.METRIC_NOT_FOUND,
        message: 'counter test_svc_missing_total not found',
      });
      expect(thrownBy(() => metrics.setGauge('jobs_total', 1, 'email'))).toMatchObject({
        code: ErrorCodes.METRIC_NOT_FOUND,
      });
    });

    it('should not lose concurrent increments', async () => {
      const tasks = Array.from({ length: 200 }, async () => {
        await Promise.resolve();
        metrics.incCounter('jobs_total', 'email');
      });

      await Promise.all(tasks);

      expect(await metricValue(metrics, 'test_svc_jobs_total', { queue: 'email' })).toBe(200);
    });
  });

  describe('export', () => {
    it('should render the Prometheus text format', async () => {
      metrics.registerCounter({ name: 'jobs_total', help: 'Jobs processed', labelNames: ['queue'] });
      metrics.incCounter('jobs_total', 'email');

      const output = await metrics.export();

      expect(output).toContain('# HELP test_svc_jobs_total Jobs processed');
      expect(output).toContain('# TYPE test_svc_jobs_total counter');
      expect(output).toContain('test_svc_jobs_total{queue="email"} 1');
      expect(output).toContain('test_svc_http_requests_in_flight 0');
      expect(metrics.contentType).toContain('text/plain');
    });

    it('should include process metrics under the prefix when enabled', async () => {
      const withDefaults = new MetricsRegistry({ service: 'test-svc', collectDefaultMetrics: true });

      const output = await withDefaults.export();

      expect(output).toContain('test_svc_process_cpu_user_seconds_total');
      expect(output).not.toMatch(/^process_cpu_user_seconds_total/m);
    });
  });
});
