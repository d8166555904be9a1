/**
 * Health Registry - Named health probes evaluated on demand.
 *
 * This module provides:
 * - Registration of probes with a per-probe timeout and criticality
 * - Concurrent evaluation bounded by each probe's timeout and an optional
 *   evaluation deadline
 * - Aggregation into overall health, readiness and liveness
 * - A `statusChange` event when the aggregate status moves
 *
 * Status Levels:
 * - OK: every probe passed
 * - Partially Available: only advisory probes failed
 * - Unavailable: at least one critical probe failed
 *
 * Probes are never polled; each evaluation invokes them afresh.
 */

import { EventEmitter } from 'events';
import { performance } from 'perf_hooks';
import { MAX_TIMEOUT_MS } from '../config/env';
import { ServiceErrors, errorMessage } from '../errors';
import { logger } from '../utils/logger';

export type HealthStatus = 'OK' | 'Partially Available' | 'Unavailable';

/**
 * Probe callback. Resolving means healthy; throwing or rejecting means
 * unhealthy, with the error message reported as the failure detail. The
 * signal aborts when the probe times out or the evaluation is cancelled.
 */
export type ProbeCheck = (signal: AbortSignal) => Promise<void> | void;

export interface HealthProbe {
  name: string;
  /** Upper bound for one invocation. Default: 5000 */
  timeoutMs?: number;
  /** Critical probes flip overall health and readiness. Default: true */
  critical?: boolean;
  check: ProbeCheck;
}

export interface ProbeResult {
  name: string;
  critical: boolean;
  healthy: boolean;
  timedOut: boolean;
  durationMs: number;
  error?: string;
}

export interface HealthSnapshot {
  status: HealthStatus;
  /** True iff every critical probe passed */
  healthy: boolean;
  timestamp: string;
  /** Failed probe name → failure detail */
  failures: Record<string, string>;
  checks: ProbeResult[];
  component: { name: string; version: string };
  system: {
    nodeVersion: string;
    uptimeSeconds: number;
    memory: { rssBytes: number; heapUsedBytes: number; heapTotalBytes: number };
  };
}

export interface EvaluateOptions {
  /** Cancels the whole evaluation; pending probes are reported as failed */
  signal?: AbortSignal;
  /** Evaluation deadline applied on top of each probe's own timeout */
  timeoutMs?: number;
}

export interface HealthRegistryOptions {
  component: { name: string; version: string };
  /** Liveness callback; defaults to "the process is running" */
  liveness?: () => boolean;
  defaultTimeoutMs?: number;
}

/**
 * Event types emitted by the HealthRegistry.
 */
export interface HealthRegistryEvents {
  /** Emitted when an evaluation's aggregate status differs from the previous one */
  statusChange: (previous: HealthStatus, next: HealthStatus) => void;
}

interface ResolvedProbe {
  name: string;
  timeoutMs: number;
  critical: boolean;
  check: ProbeCheck;
}

const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

export class HealthRegistry extends EventEmitter {
  private readonly probes = new Map<string, ResolvedProbe>();
  private readonly component: { name: string; version: string };
  private readonly liveness: () => boolean;
  private readonly defaultTimeoutMs: number;
  private lastStatus: HealthStatus | undefined;

  constructor(options: HealthRegistryOptions) {
    super();
    this.component = { ...options.component };
    this.liveness = options.liveness ?? (() => true);
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  }

  /**
   * Register a probe. Names are unique within the registry.
   */
  register(probe: HealthProbe): void {
    const name = probe.name.trim();
    if (name.length === 0) {
      throw ServiceErrors.probeInvalid(probe.name, 'name is required');
    }
    const timeoutMs = probe.timeoutMs ?? this.defaultTimeoutMs;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
      throw ServiceErrors.probeInvalid(
        name,
        `timeoutMs must be a positive number of at most ${MAX_TIMEOUT_MS}`
      );
    }
    if (this.probes.has(name)) {
      throw ServiceErrors.probeAlreadyExists(name);
    }

    this.probes.set(name, {
      name,
      timeoutMs,
      critical: probe.critical ?? true,
      check: probe.check,
    });
    logger.debug('Health probe registered', { probe: name, critical: probe.critical ?? true });
  }

  /**
   * Names of the registered probes, in registration order.
   */
  probeNames(): string[] {
    return Array.from(this.probes.keys());
  }

  /**
   * Run every probe concurrently and aggregate the results.
   */
  async evaluate(options: EvaluateOptions = {}): Promise<HealthSnapshot> {
    const { timeoutMs } = options;
    if (
      timeoutMs !== undefined &&
      (!Number.isFinite(timeoutMs) || timeoutMs < 0 || timeoutMs > MAX_TIMEOUT_MS)
    ) {
      throw ServiceErrors.configInvalid([
        { path: 'timeoutMs', message: `must be between 0 and ${MAX_TIMEOUT_MS}ms` },
      ]);
    }

    const evaluation = new AbortController();
    const onCancel = () => evaluation.abort();
    let deadline: NodeJS.Timeout | undefined;

    if (options.signal) {
      if (options.signal.aborted) {
        evaluation.abort();
      } else {
        options.signal.addEventListener('abort', onCancel, { once: true });
      }
    }
    if (timeoutMs !== undefined) {
      deadline = setTimeout(onCancel, timeoutMs);
    }

    try {
      const checks = await Promise.all(
        Array.from(this.probes.values(), (probe) => this.runProbe(probe, evaluation.signal))
      );
      return this.aggregate(checks);
    } finally {
      clearTimeout(deadline);
      options.signal?.removeEventListener('abort', onCancel);
    }
  }

  async isHealthy(options?: EvaluateOptions): Promise<boolean> {
    return (await this.evaluate(options)).healthy;
  }

  /**
   * Readiness uses the same critical-probe evaluation as aggregate health.
   */
  async isReady(options?: EvaluateOptions): Promise<boolean> {
    return (await this.evaluate(options)).healthy;
  }

  /**
   * Liveness never invokes probes, so degraded dependencies do not make the
   * process look dead.
   */
  isLive(): boolean {
    try {
      return this.liveness();
    } catch (error) {
      logger.warn('Liveness callback threw', { error: errorMessage(error) });
      return false;
    }
  }

  private runProbe(probe: ResolvedProbe, evaluation: AbortSignal): Promise<ProbeResult> {
    const started = performance.now();
    const controller = new AbortController();

    return new Promise<ProbeResult>((resolve) => {
      let settled = false;

      const finish = (error?: string, timedOut = false) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        evaluation.removeEventListener('abort', onEvaluationAbort);
        if (timedOut) {
          controller.abort();
        }
        resolve({
          name: probe.name,
          critical: probe.critical,
          healthy: error === undefined,
          timedOut,
          durationMs: Math.round(performance.now() - started),
          ...(error !== undefined && { error }),
        });
      };

      const timer = setTimeout(
        () => finish(`timed out after ${probe.timeoutMs}ms`, true),
        probe.timeoutMs
      );
      const onEvaluationAbort = () => finish('evaluation deadline exceeded', true);

      if (evaluation.aborted) {
        onEvaluationAbort();
        return;
      }
      evaluation.addEventListener('abort', onEvaluationAbort, { once: true });

      // Promise.resolve().then() also turns a synchronous throw into a rejection
      Promise.resolve()
        .then(() => probe.check(controller.signal))
        .then(
          () => finish(),
          (error: unknown) => finish(errorMessage(error))
        );
    });
  }

  private aggregate(checks: ProbeResult[]): HealthSnapshot {
    // Null prototype, so a check named "__proto__" is kept as an ordinary key
    const failures: Record<string, string> = Object.create(null);
    let criticalFailed = false;
    let advisoryFailed = false;

    for (const check of checks) {
      if (!check.healthy) {
        failures[check.name] = check.error ?? 'failed';
        if (check.critical) {
          criticalFailed = true;
        } else {
          advisoryFailed = true;
        }
      }
    }

    const status: HealthStatus = criticalFailed
      ? 'Unavailable'
      : advisoryFailed
        ? 'Partially Available'
        : 'OK';

    this.trackStatus(status, failures);

    const memory = process.memoryUsage();
    return {
      status,
      healthy: !criticalFailed,
      timestamp: new Date().toISOString(),
      failures,
      checks,
      component: { ...this.component },
      system: {
        nodeVersion: process.version,
        uptimeSeconds: Math.round(process.uptime()),
        memory: {
          rssBytes: memory.rss,
          heapUsedBytes: memory.heapUsed,
          heapTotalBytes: memory.heapTotal,
        },
      },
    };
  }

  private trackStatus(status: HealthStatus, failures: Record<string, string>): void {
    const previous = this.lastStatus;
    this.lastStatus = status;
    if (previous === undefined || previous === status) {
      return;
    }

    this.emit('statusChange', previous, status);
    if (status === 'OK') {
      logger.info('Health recovered', { previousStatus: previous });
    } else {
      logger.warn('Health status changed', { previousStatus: previous, status, failures });
    }
  }
}
