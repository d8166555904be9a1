import express, { type Express } from 'express';
import type { ServiceConfig } from '../config';
import { errorMessage } from '../errors';
import type { HealthRegistry } from '../services/HealthRegistry';
import type { MetricsRegistry } from '../services/MetricsRegistry';
import type { Logger } from '../utils/logger';

export interface OperationalAppOptions {
  metrics: MetricsRegistry;
  health: HealthRegistry;
  logger: Logger;
  config: Pick<
    ServiceConfig,
    'metricsPath' | 'healthPath' | 'readinessPath' | 'livenessPath' | 'healthTimeoutMs'
  >;
}

/**
 * Express app served on the operational listener: metrics export plus the
 * aggregate health, readiness and liveness endpoints. Every endpoint answers
 * even when no probes are registered.
 */
export function createOperationalApp(options: OperationalAppOptions): Express {
  const { metrics, health, logger, config } = options;
  const app = express();
  app.disable('x-powered-by');

  // Prometheus metrics endpoint
  app.get(config.metricsPath, async (_req, res) => {
    try {
      const payload = await metrics.export();
      res.set('Content-Type', metrics.contentType);
      res.send(payload);
    } catch (err) {
      logger.error('Failed to generate metrics payload', { error: errorMessage(err) });
      res.status(500).type('text/plain').send('metrics_unavailable');
    }
  });

  /**
   * Aggregate health - JSON snapshot of every probe.
   * 503 only when a critical probe failed; advisory failures report
   * "Partially Available" with 200.
   */
  app.get(config.healthPath, async (_req, res) => {
    try {
      const snapshot = await health.evaluate({ timeoutMs: config.healthTimeoutMs });
      res.status(snapshot.healthy ? 200 : 503).json(snapshot);
    } catch (err) {
      logger.error('Health evaluation failed', { error: errorMessage(err) });
      res.status(503).json({ status: 'Unavailable', healthy: false });
    }
  });

  /**
   * Readiness probe - used by orchestrators to route traffic.
   */
  app.get(config.readinessPath, async (_req, res) => {
    let ready = false;
    try {
      ready = await health.isReady({ timeoutMs: config.healthTimeoutMs });
    } catch (err) {
      logger.error('Readiness evaluation failed', { error: errorMessage(err) });
    }
    res.status(ready ? 200 : 503).type('text/plain').send(ready ? 'Ready' : 'Not Ready');
  });

  /**
   * Liveness probe - never consults health probes.
   */
  app.get(config.livenessPath, (_req, res) => {
    const alive = health.isLive();
    res.status(alive ? 200 : 503).type('text/plain').send(alive ? 'Alive' : 'Not Alive');
  });

  app.use((_req, res) => {
    res.status(404).type('text/plain').send('Not Found');
  });

  return app;
}
