/**
 * Service routing, metrics and health endpoints, exercised in-process with
 * supertest against the primary and operational Express apps.
 */

import request from 'supertest';
import type { ServiceConfig } from '../../src/server/config';
import { ErrorCodes } from '../../src/server/errors';
import { GREETINGS_COUNTER, createGreeterService } from '../../src/server/example/greeter';
import { getLogger } from '../../src/server/context';
import type { Middleware } from '../../src/server/middleware';
import { Service, toExpressPath } from '../../src/server/Service';
import { captureLogger, flushLogs } from '../helpers/captureLogger';
import { thrownBy } from '../helpers/errors';
import { metricValue } from '../helpers/metrics';

function createService(name = 'orders', config: Partial<ServiceConfig> = {}) {
  const { logger, entries } = captureLogger();
  const service = new Service({ name, logger, config, collectDefaultMetrics: false });
  return { service, entries };
}

describe('toExpressPath', () => {
  it('should convert brace parameters', () => {
    expect(toExpressPath('/users/{id}/orders/{orderId}')).toBe('/users/:id/orders/:orderId');
    expect(toExpressPath('/static')).toBe('/static');
  });
});

describe('Service routes', () => {
  it('should serve a registered route through the middleware chain', async () => {
    const { service } = createService();
    service.route('GET', '/', (_req, res) => {
      res.type('text/plain').send('Hello, world!');
    });

    const res = await request(service.app).get('/');

    expect(res.status).toBe(200);
    expect(res.text).toBe('Hello, world!');
    expect(res.headers['x-request-id']).toBeDefined();
    expect(
      await metricValue(service.metrics, 'orders_http_requests_total', {
        method: 'GET',
        route: '/',
        status_class: '2xx',
      })
    ).toBe(1);
  });

  it('should register handle() for every method', async () => {
    const { service } = createService();
    service.handle('/echo', (req, res) => {
      res.json({ method: req.method });
    });

    expect((await request(service.app).get('/echo')).body).toEqual({ method: 'GET' });
    expect((await request(service.app).post('/echo')).body).toEqual({ method: 'POST' });
    expect((await request(service.app).delete('/echo')).body).toEqual({ method: 'DELETE' });
  });

  it('should only answer the registered method on route()', async () => {
    const { service } = createService();
    service.route('POST', '/jobs', (_req, res) => {
      res.status(202).end();
    });

    expect((await request(service.app).post('/jobs')).status).toBe(202);
    expect((await request(service.app).get('/jobs')).status).toBe(404);
  });

  it('should reject patterns without a leading slash', () => {
    const { service } = createService();

    expect(thrownBy(() => service.route('GET', 'jobs', () => undefined))).toMatchObject({
      code: ErrorCodes.ROUTE_INVALID,
      message: 'Invalid route GET jobs: pattern must start with "/"',
    });
  });

  it('should answer unmatched routes with a JSON 404', async () => {
    const { service } = createService();

    const res = await request(service.app).get('/missing');

    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Route /missing not found' },
    });
  });

  it('should log unmatched routes to the service logger', async () => {
    const { service, entries } = createService();

    await request(service.app).get('/missing');
    await flushLogs();

    expect(entries).toContainEqual(
      expect.objectContaining({
        level: 'warn',
        message: 'Client Error:',
        statusCode: 404,
        url: '/missing',
        method: 'GET',
      })
    );
  });

  it('should run user middleware inside the built-in links', async () => {
    const { service, entries } = createService();
    const order: string[] = [];
    const tag =
      (name: string): Middleware =>
      (next) =>
      async (req, res) => {
        order.push(`${name}:in`);
        getLogger().info('User link', { link: name });
        await next(req, res);
        order.push(`${name}:out`);
      };

    service.use(tag('first'), tag('second'));
    service.route('GET', '/ordered', (_req, res) => {
      order.push('handler');
      res.end();
    });

    await request(service.app).get('/ordered').set('X-Request-Id', 'req-ordered');
    await flushLogs();

    expect(order).toEqual(['first:in', 'second:in', 'handler', 'second:out', 'first:out']);
    expect(entries).toContainEqual(
      expect.objectContaining({ message: 'User link', link: 'first', requestId: 'req-ordered' })
    );
  });

  it('should recover concurrent failures and settle the in-flight gauge', async () => {
    const { service } = createService();
    service.route('GET', '/fail/{id}', async () => {
      await new Promise((resolve) => setTimeout(resolve, 2));
      throw new Error('handler failed');
    });

    const responses = await Promise.all(
      Array.from({ length: 20 }, (_, i) => request(service.app).get(`/fail/${i}`))
    );

    expect(new Set(responses.map((res) => res.status))).toEqual(new Set([500]));
    expect(responses[0].text).toBe('Internal Server Error');
    expect(
      await metricValue(service.metrics, 'orders_http_requests_total', {
        method: 'GET',
        route: '/fail/:id',
        status_class: '5xx',
      })
    ).toBe(20);
    expect(await metricValue(service.metrics, 'orders_http_requests_in_flight')).toBe(0);
  });
});

describe('Service operational endpoints', () => {
  it('should report OK with no probes registered', async () => {
    const { service } = createService();

    const res = await request(service.operationalApp).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      status: 'OK',
      healthy: true,
      checks: [],
      failures: {},
      component: { name: 'orders', version: '0.0.0' },
    });
  });

  it('should export metrics in the Prometheus text format', async () => {
    const { service } = createService();
    service.registerCounter({ name: 'jobs_total', help: 'Jobs processed' });
    service.metrics.incCounter('jobs_total');

    const res = await request(service.operationalApp).get('/metrics');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/^text\/plain/);
    expect(res.headers['content-type']).toContain('version=0.0.4');
    expect(res.text).toContain('# HELP orders_jobs_total Jobs processed\n');
    expect(res.text).toContain('\norders_jobs_total 1\n');
  });

  it('should stay ready while only an advisory probe fails', async () => {
    const { service } = createService();
    service.registerHealthCheck({ name: 'db', check: () => undefined });
    service.registerHealthCheck({
      name: 'cache',
      critical: false,
      check: () => {
        throw new Error('cache offline');
      },
    });

    const health = await request(service.operationalApp).get('/health');
    const ready = await request(service.operationalApp).get('/ready');

    expect(health.status).toBe(200);
    expect(health.body).toMatchObject({
      status: 'Partially Available',
      failures: { cache: 'cache offline' },
    });
    expect(ready.status).toBe(200);
    expect(ready.text).toBe('Ready');
  });

  it('should report unavailable and not ready when a critical probe fails', async () => {
    const { service } = createService();
    service.registerHealthCheck({
      name: 'db',
      check: async () => {
        throw new Error('connection refused');
      },
    });

    const health = await request(service.operationalApp).get('/health');
    const ready = await request(service.operationalApp).get('/ready');
    const live = await request(service.operationalApp).get('/live');

    expect(health.status).toBe(503);
    expect(health.body).toMatchObject({ status: 'Unavailable', healthy: false });
    expect(ready.status).toBe(503);
    expect(ready.text).toBe('Not Ready');
    expect(live.status).toBe(200);
    expect(live.text).toBe('Alive');
  });

  it('should consult the liveness callback', async () => {
    const { logger } = captureLogger();
    const service = new Service({
      name: 'orders',
      logger,
      collectDefaultMetrics: false,
      liveness: () => false,
    });

    const res = await request(service.operationalApp).get('/live');

    expect(res.status).toBe(503);
    expect(res.text).toBe('Not Alive');
  });

  it('should serve custom operational paths', async () => {
    const { service } = createService('orders', {
      metricsPath: '/internal/metrics',
      healthPath: '/healthz',
      readinessPath: '/readyz',
      livenessPath: '/livez',
    });

    expect((await request(service.operationalApp).get('/healthz')).status).toBe(200);
    expect((await request(service.operationalApp).get('/readyz')).text).toBe('Ready');
    expect((await request(service.operationalApp).get('/livez')).text).toBe('Alive');
    expect((await request(service.operationalApp).get('/internal/metrics')).status).toBe(200);
    expect((await request(service.operationalApp).get('/health')).status).toBe(404);
  });
});

describe('greeter example', () => {
  it('should greet by name and count greetings per language', async () => {
    const { logger } = captureLogger();
    const service = createGreeterService({ logger, collectDefaultMetrics: false });

    const english = await request(service.app).get('/hello/world');
    await request(service.app).get('/hello/mundo?lang=es');
    await request(service.app).get('/hello/amigo?lang=es');

    expect(english.status).toBe(200);
    expect(english.text).toBe('Hello, world!');
    expect(await metricValue(service.metrics, `greeter_${GREETINGS_COUNTER}`, { lang: 'en' })).toBe(1);
    expect(await metricValue(service.metrics, `greeter_${GREETINGS_COUNTER}`, { lang: 'es' })).toBe(2);

    const exported = await request(service.operationalApp).get('/metrics');
    expect(exported.text).toContain('greeter_greetings_total{lang="es"} 2');
  });

  it('should report status through the request-scoped health registry', async () => {
    const { logger } = captureLogger();
    const service = createGreeterService({ logger, collectDefaultMetrics: false });

    const res = await request(service.app).get('/status');

    expect(res.body).toEqual({ service: 'greeter', status: 'OK' });
  });
});
