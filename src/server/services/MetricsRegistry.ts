/**
 * MetricsRegistry - Explicitly owned Prometheus metrics store.
 *
 * Each instance wraps its own prom-client `Registry`; nothing is registered
 * against the process-wide default registry, so two services (or two tests)
 * in one process never see each other's series.
 *
 * This registry provides:
 * - Built-in HTTP series (request count, duration, in-flight gauge)
 * - Dynamic registration of counters, gauges, histograms and summaries
 * - Observation by name with positional label values
 * - Prometheus text export and a structured JSON snapshot
 *
 * prom-client updates a series synchronously inside one event-loop turn, so
 * each increment is atomic and `export()` never holds writers out.
 */

import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  Summary,
  collectDefaultMetrics,
  type LabelValues,
} from 'prom-client';
import { z } from 'zod';
import { ServiceErrors } from '../errors';
import { logger } from '../utils/logger';

export type MetricKind = 'counter' | 'gauge' | 'histogram' | 'summary';

/**
 * Caller-supplied description of a metric.
 */
export interface MetricDescriptor {
  /** Bare or already-prefixed metric name */
  name: string;
  help: string;
  /** Ordered label names; observations supply values in the same order */
  labelNames?: readonly string[];
  /** Histogram bucket upper bounds, strictly increasing */
  buckets?: readonly number[];
  /** Summary quantile → allowed error pairs */
  objectives?: Readonly<Record<number, number>>;
}

/**
 * Descriptor as stored by the registry, after prefixing and defaults.
 */
export interface RegisteredMetric {
  readonly name: string;
  readonly kind: MetricKind;
  readonly help: string;
  readonly labelNames: readonly string[];
  readonly buckets?: readonly number[];
  readonly objectives?: Readonly<Record<number, number>>;
}

export interface MetricsRegistryOptions {
  /** Service name; sanitised into the metric prefix */
  service: string;
  /** Also collect Node.js process metrics into this registry. Default: false */
  collectDefaultMetrics?: boolean;
}

export type MetricsSnapshot = Awaited<ReturnType<Registry['getMetricsAsJSON']>>;

/** Same boundaries as prom-client's defaults */
export const DEFAULT_BUCKETS: readonly number[] = [
  0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10,
];

export const DEFAULT_OBJECTIVES: Readonly<Record<number, number>> = {
  0.5: 0.05,
  0.9: 0.01,
  0.99: 0.001,
};

const HTTP_LABELS = ['method', 'route', 'status_class'] as const;

type Entry =
  | { descriptor: RegisteredMetric; kind: 'counter'; metric: Counter<string> }
  | { descriptor: RegisteredMetric; kind: 'gauge'; metric: Gauge<string> }
  | { descriptor: RegisteredMetric; kind: 'histogram'; metric: Histogram<string> }
  | { descriptor: RegisteredMetric; kind: 'summary'; metric: Summary<string> };

type EntryOf<K extends MetricKind> = Extract<Entry, { kind: K }>;

// ===================
// Descriptor validation
// ===================

const METRIC_NAME = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const LABEL_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

const DescriptorSchema = z.object({
  name: z.string().regex(METRIC_NAME, 'name must match [a-zA-Z_:][a-zA-Z0-9_:]*'),
  help: z.string().trim().min(1, 'help text is required'),
  labelNames: z
    .array(
      z
        .string()
        .regex(LABEL_NAME, 'label names must match [a-zA-Z_][a-zA-Z0-9_]*')
        .refine((label) => !label.startsWith('__'), 'label names starting with "__" are reserved')
    )
    .refine((labels) => new Set(labels).size === labels.length, 'label names must be unique'),
  buckets: z
    .array(z.number().finite())
    .nonempty('buckets must not be empty')
    .refine(
      (buckets) => buckets.every((bound, i) => i === 0 || bound > buckets[i - 1]),
      'buckets must be strictly increasing'
    )
    .optional(),
  objectives: z
    .array(
      z.tuple([
        z.number().gt(0, 'quantiles must be in (0, 1)').lt(1, 'quantiles must be in (0, 1)'),
        z.number().min(0, 'errors must be in [0, 1)').lt(1, 'errors must be in [0, 1)'),
      ])
    )
    .nonempty('objectives must not be empty')
    .optional(),
});

/**
 * Turn a service name into a valid metric-name prefix.
 */
export function sanitizeMetricPrefix(service: string): string {
  const cleaned = service.trim().replace(/[^a-zA-Z0-9_:]/g, '_');
  if (cleaned.length === 0) {
    return 'service';
  }
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
}

function statusClass(statusCode: number): string {
  return `${Math.floor(statusCode / 100)}xx`;
}

/**
 * Explicitly constructed metrics registry owned by one service.
 *
 * Usage:
 * ```typescript
 * const metrics = new MetricsRegistry({ service: 'orders' });
 * metrics.registerCounter({ name: 'jobs_total', help: 'Jobs processed', labelNames: ['queue'] });
 * metrics.incCounter('jobs_total', 'email'); // series orders_jobs_total{queue="email"}
 * ```
 */
export class MetricsRegistry {
  public readonly prefix: string;
  /** Names starting with this are reserved for the built-in series */
  public readonly reservedPrefix: string;

  private readonly promRegistry: Registry;
  private readonly entries = new Map<string, Entry>();

  private readonly httpRequestsTotal: Counter<string>;
  private readonly httpRequestDuration: Histogram<string>;
  private readonly httpRequestsInFlight: Gauge<string>;

  constructor(options: MetricsRegistryOptions) {
    this.prefix = sanitizeMetricPrefix(options.service);
    this.reservedPrefix = `${this.prefix}_http_`;
    this.promRegistry = new Registry();

    // ===================
    // Built-in HTTP series
    // ===================

    this.httpRequestsTotal = this.createCounter({
      name: `${this.reservedPrefix}requests_total`,
      help: 'Total number of HTTP requests',
      labelNames: HTTP_LABELS,
    }).metric;

    this.httpRequestDuration = this.createHistogram({
      name: `${this.reservedPrefix}request_duration_seconds`,
      help: 'Duration of HTTP requests in seconds',
      labelNames: HTTP_LABELS,
    }).metric;

    this.httpRequestsInFlight = this.createGauge({
      name: `${this.reservedPrefix}requests_in_flight`,
      help: 'Number of HTTP requests currently being served',
    }).metric;

    if (options.collectDefaultMetrics) {
      collectDefaultMetrics({ register: this.promRegistry, prefix: `${this.prefix}_` });
    }
  }

  /**
   * The underlying prom-client registry, for collaborators that need it
   * directly (e.g. to merge registries).
   */
  public get registry(): Registry {
    return this.promRegistry;
  }

  public get contentType(): string {
    return this.promRegistry.contentType;
  }

  /**
   * Apply the service prefix unless the name already carries it.
   */
  public prefixedName(name: string): string {
    return name.startsWith(`${this.prefix}_`) ? name : `${this.prefix}_${name}`;
  }

  // ===================
  // Registration
  // ===================

  public registerCounter(descriptor: MetricDescriptor): RegisteredMetric {
    return this.createCounter(this.checkUserDescriptor(descriptor)).descriptor;
  }

  public registerGauge(descriptor: MetricDescriptor): RegisteredMetric {
    return this.createGauge(this.checkUserDescriptor(descriptor)).descriptor;
  }

  public registerHistogram(descriptor: MetricDescriptor): RegisteredMetric {
    return this.createHistogram(this.checkUserDescriptor(descriptor)).descriptor;
  }

  public registerSummary(descriptor: MetricDescriptor): RegisteredMetric {
    return this.createSummary(this.checkUserDescriptor(descriptor)).descriptor;
  }

  /**
   * Registered descriptors, built-ins included, in registration order.
   */
  public descriptors(): RegisteredMetric[] {
    return Array.from(this.entries.values(), (entry) => entry.descriptor);
  }

  // ===================
  // Observation
  // ===================

  public incCounter(name: string, ...labelValues: string[]): void {
    this.addCounter(name, 1, ...labelValues);
  }

  public addCounter(name: string, value: number, ...labelValues: string[]): void {
    const entry = this.lookup(name, 'counter');
    if (!Number.isFinite(value) || value < 0) {
      throw ServiceErrors.metricInvalidValue(entry.descriptor.name, value);
    }
    entry.metric.inc(this.toLabels(entry.descriptor, labelValues), value);
  }

  public setGauge(name: string, value: number, ...labelValues: string[]): void {
    const entry = this.lookup(name, 'gauge');
    this.checkValue(entry.descriptor, value);
    entry.metric.set(this.toLabels(entry.descriptor, labelValues), value);
  }

  public incGauge(name: string, ...labelValues: string[]): void {
    this.addGauge(name, 1, ...labelValues);
  }

  public decGauge(name: string, ...labelValues: string[]): void {
    this.addGauge(name, -1, ...labelValues);
  }

  public addGauge(name: string, value: number, ...labelValues: string[]): void {
    const entry = this.lookup(name, 'gauge');
    this.checkValue(entry.descriptor, value);
    entry.metric.inc(this.toLabels(entry.descriptor, labelValues), value);
  }

  public observeHistogram(name: string, value: number, ...labelValues: string[]): void {
    const entry = this.lookup(name, 'histogram');
    this.checkValue(entry.descriptor, value);
    entry.metric.observe(this.toLabels(entry.descriptor, labelValues), value);
  }

  public observeSummary(name: string, value: number, ...labelValues: string[]): void {
    const entry = this.lookup(name, 'summary');
    this.checkValue(entry.descriptor, value);
    entry.metric.observe(this.toLabels(entry.descriptor, labelValues), value);
  }

  // ===================
  // HTTP Request Helpers
  // ===================

  /**
   * Increment the in-flight gauge. The returned release function decrements
   * it; calling release more than once has no further effect.
   */
  public trackInFlight(): () => void {
    this.httpRequestsInFlight.inc();
    let released = false;
    return () => {
      if (!released) {
        released = true;
        this.httpRequestsInFlight.dec();
      }
    };
  }

  /**
   * Record one completed HTTP request in the built-in count and duration series.
   */
  public recordHttpRequest(
    method: string,
    route: string,
    statusCode: number,
    durationSeconds: number
  ): void {
    const labels = { method, route, status_class: statusClass(statusCode) };
    this.httpRequestsTotal.inc(labels);
    this.httpRequestDuration.observe(labels, durationSeconds);
  }

  // ===================
  // Export
  // ===================

  /**
   * Get metrics in Prometheus text format.
   */
  public async export(): Promise<string> {
    return this.promRegistry.metrics();
  }

  /**
   * Get every series as structured JSON.
   */
  public async snapshot(): Promise<MetricsSnapshot> {
    return this.promRegistry.getMetricsAsJSON();
  }

  // ===================
  // Internals
  // ===================

  private checkUserDescriptor(descriptor: MetricDescriptor): MetricDescriptor {
    const name = this.prefixedName(descriptor.name);
    if (name.startsWith(this.reservedPrefix)) {
      throw ServiceErrors.metricReservedName(name, this.reservedPrefix);
    }
    return { ...descriptor, name };
  }

  private validate(descriptor: MetricDescriptor, kind: MetricKind): RegisteredMetric {
    const parsed = DescriptorSchema.safeParse({
      name: descriptor.name,
      help: descriptor.help,
      labelNames: [...(descriptor.labelNames ?? [])],
      buckets: descriptor.buckets ? [...descriptor.buckets] : undefined,
      objectives: descriptor.objectives
        ? Object.entries(descriptor.objectives).map(([quantile, error]) => [Number(quantile), error])
        : undefined,
    });
    if (!parsed.success) {
      throw ServiceErrors.metricInvalidDescriptor(descriptor.name, parsed.error.issues[0].message);
    }

    const { name, help, labelNames } = parsed.data;
    if (kind === 'histogram' && labelNames.includes('le')) {
      throw ServiceErrors.metricInvalidDescriptor(name, 'histograms cannot use the "le" label');
    }
    if (kind === 'summary' && labelNames.includes('quantile')) {
      throw ServiceErrors.metricInvalidDescriptor(name, 'summaries cannot use the "quantile" label');
    }

    const existing = this.entries.get(name);
    if (existing) {
      throw ServiceErrors.metricAlreadyExists(name, existing.kind);
    }
    if (this.promRegistry.getSingleMetric(name)) {
      throw ServiceErrors.metricAlreadyExists(name, 'metric');
    }

    return Object.freeze({
      name,
      kind,
      help,
      labelNames: Object.freeze([...labelNames]),
      ...(kind === 'histogram' && {
        buckets: Object.freeze([...(parsed.data.buckets ?? DEFAULT_BUCKETS)]),
      }),
      ...(kind === 'summary' && {
        objectives: Object.freeze(
          parsed.data.objectives
            ? Object.fromEntries(parsed.data.objectives)
            : { ...DEFAULT_OBJECTIVES }
        ),
      }),
    });
  }

  private store<E extends Entry>(entry: E): E {
    this.entries.set(entry.descriptor.name, entry);
    logger.debug('Metric registered', { name: entry.descriptor.name, kind: entry.kind });
    return entry;
  }

  private createCounter(descriptor: MetricDescriptor): EntryOf<'counter'> {
    const registered = this.validate(descriptor, 'counter');
    const metric = new Counter<string>({
      name: registered.name,
      help: registered.help,
      labelNames: [...registered.labelNames],
      registers: [this.promRegistry],
    });
    return this.store({ descriptor: registered, kind: 'counter', metric });
  }

  private createGauge(descriptor: MetricDescriptor): EntryOf<'gauge'> {
    const registered = this.validate(descriptor, 'gauge');
    const metric = new Gauge<string>({
      name: registered.name,
      help: registered.help,
      labelNames: [...registered.labelNames],
      registers: [this.promRegistry],
    });
    return this.store({ descriptor: registered, kind: 'gauge', metric });
  }

  private createHistogram(descriptor: MetricDescriptor): EntryOf<'histogram'> {
    const registered = this.validate(descriptor, 'histogram');
    const metric = new Histogram<string>({
      name: registered.name,
      help: registered.help,
      labelNames: [...registered.labelNames],
      buckets: [...(registered.buckets ?? DEFAULT_BUCKETS)],
      registers: [this.promRegistry],
    });
    return this.store({ descriptor: registered, kind: 'histogram', metric });
  }

  private createSummary(descriptor: MetricDescriptor): EntryOf<'summary'> {
    const registered = this.validate(descriptor, 'summary');
    // prom-client summaries take quantiles only; error tolerances are kept on
    // the descriptor for reference.
    const percentiles = Object.keys(registered.objectives ?? DEFAULT_OBJECTIVES)
      .map(Number)
      .sort((a, b) => a - b);
    const metric = new Summary<string>({
      name: registered.name,
      help: registered.help,
      labelNames: [...registered.labelNames],
      percentiles,
      registers: [this.promRegistry],
    });
    return this.store({ descriptor: registered, kind: 'summary', metric });
  }

  private lookup<K extends MetricKind>(name: string, kind: K): EntryOf<K> {
    const prefixed = this.prefixedName(name);
    const entry = this.entries.get(prefixed);
    if (!entry || !isKind(entry, kind)) {
      throw ServiceErrors.metricNotFound(prefixed, kind);
    }
    return entry;
  }

  private toLabels(descriptor: RegisteredMetric, values: readonly string[]): LabelValues<string> {
    if (values.length !== descriptor.labelNames.length) {
      throw ServiceErrors.metricLabelMismatch(descriptor.name, descriptor.labelNames, values.length);
    }
    const labels: LabelValues<string> = {};
    descriptor.labelNames.forEach((label, i) => {
      labels[label] = values[i];
    });
    return labels;
  }

  private checkValue(descriptor: RegisteredMetric, value: number): void {
    if (Number.isNaN(value)) {
      throw ServiceErrors.metricInvalidValue(descriptor.name, value);
    }
  }
}

function isKind<K extends MetricKind>(entry: Entry, kind: K): entry is EntryOf<K> {
  return entry.kind === kind;
}
