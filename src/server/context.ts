/**
 * Request-scoped accessors.
 *
 * The default middleware chain stores the request logger, the metrics
 * registry and the health registry in AsyncLocalStorage. Handler code reads
 * them through these helpers instead of threading them through every call.
 *
 * `getLogger()` always returns a usable logger; outside a request it falls
 * back to the process-wide default. The metric helpers throw
 * METRICS_UNAVAILABLE when no registry is in scope.
 */

import { ServiceErrors } from './errors';
import { getRequestContext, logger, type Logger } from './utils/logger';
import type { MetricsRegistry } from './services/MetricsRegistry';
import type { HealthRegistry } from './services/HealthRegistry';

export function getLogger(): Logger {
  return getRequestContext()?.logger ?? logger;
}

export function getRequestId(): string | undefined {
  return getRequestContext()?.requestId;
}

export function getMetrics(): MetricsRegistry | undefined {
  return getRequestContext()?.metrics;
}

export function getHealth(): HealthRegistry | undefined {
  return getRequestContext()?.health;
}

function requireMetrics(): MetricsRegistry {
  const metrics = getMetrics();
  if (!metrics) {
    throw ServiceErrors.metricsUnavailable();
  }
  return metrics;
}

export function incCounter(name: string, ...labelValues: string[]): void {
  requireMetrics().incCounter(name, ...labelValues);
}

export function addCounter(name: string, value: number, ...labelValues: string[]): void {
  requireMetrics().addCounter(name, value, ...labelValues);
}

export function setGauge(name: string, value: number, ...labelValues: string[]): void {
  requireMetrics().setGauge(name, value, ...labelValues);
}

export function incGauge(name: string, ...labelValues: string[]): void {
  requireMetrics().incGauge(name, ...labelValues);
}

export function decGauge(name: string, ...labelValues: string[]): void {
  requireMetrics().decGauge(name, ...labelValues);
}

export function addGauge(name: string, value: number, ...labelValues: string[]): void {
  requireMetrics().addGauge(name, value, ...labelValues);
}

export function observeHistogram(name: string, value: number, ...labelValues: string[]): void {
  requireMetrics().observeHistogram(name, value, ...labelValues);
}

export function observeSummary(name: string, value: number, ...labelValues: string[]): void {
  requireMetrics().observeSummary(name, value, ...labelValues);
}
