/**
 * Service - owns the primary and operational listeners and drives their
 * coordinated startup and graceful shutdown.
 *
 * Lifecycle: idle → starting → running → shutting_down → stopped. There is
 * no restart after stopped.
 *
 * Usage:
 * ```typescript
 * const service = new Service({ name: 'greeter', config: loadConfigFromEnv() });
 * service.route('GET', '/hello/{name}', (req, res) => {
 *   res.send(`Hello, ${req.params.name}!`);
 * });
 * await service.start(); // resolves once shutdown has completed
 * ```
 */

import express, { type Express, type Router } from 'express';
import {
  MAX_TIMEOUT_MS,
  parseListenAddress,
  resolveConfig,
  type ListenAddress,
  type ServiceConfig,
} from './config';
import { ServiceErrors, errorMessage } from './errors';
import { Listener, type BoundAddress } from './lifecycle/Listener';
import { defaultMiddleware } from './middleware';
import { asyncHandler, errorHandler, notFoundHandler } from './middleware/errorHandler';
import { MiddlewareChain, type Handler, type Middleware } from './middleware/MiddlewareChain';
import { createOperationalApp } from './routes/operational';
import { HealthRegistry, type HealthProbe } from './services/HealthRegistry';
import {
  MetricsRegistry,
  type MetricDescriptor,
  type RegisteredMetric,
} from './services/MetricsRegistry';
import { ShutdownSequencer, type ShutdownHook } from './services/ShutdownSequencer';
import { createLogger, runWithContext, type Logger } from './utils/logger';

export type ServiceState = 'idle' | 'starting' | 'running' | 'shutting_down' | 'stopped';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

export interface ServiceOptions {
  /** Metric prefix source, health component name and log `service` field */
  name: string;
  /** Overrides on top of the defaults; use loadConfigFromEnv() for env-driven config */
  config?: Partial<ServiceConfig>;
  logger?: Logger;
  /** Signals that trigger shutdown. Default: SIGINT, SIGTERM */
  signals?: NodeJS.Signals[];
  /** Collect Node.js process metrics. Default: true */
  collectDefaultMetrics?: boolean;
  /** Liveness callback for the operational listener */
  liveness?: () => boolean;
}

export interface ServiceAddresses {
  primary: BoundAddress;
  operational: BoundAddress;
}

type ShutdownTrigger =
  | { reason: 'signal'; signal: NodeJS.Signals }
  | { reason: 'stop' }
  | { reason: 'failure'; error: Error };

const DEFAULT_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Translate `{param}` placeholders into Express `:param` segments.
 */
export function toExpressPath(pattern: string): string {
  return pattern.replace(/\{([A-Za-z_][A-Za-z0-9_]*)\}/g, ':$1');
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class Service {
  public readonly name: string;
  public readonly config: ServiceConfig;
  public readonly logger: Logger;
  public readonly metrics: MetricsRegistry;
  public readonly health: HealthRegistry;
  public readonly middleware: MiddlewareChain;
  /** Primary Express app; usable in-process (e.g. with supertest) without binding */
  public readonly app: Express;
  /** Operational Express app (metrics and health endpoints) */
  public readonly operationalApp: Express;

  private readonly router: Router;
  private readonly shutdownHooks: ShutdownSequencer;
  private readonly signals: NodeJS.Signals[];
  private readonly signalHandlers = new Map<NodeJS.Signals, () => void>();

  private state: ServiceState = 'idle';
  private primary: Listener | null = null;
  private operational: Listener | null = null;
  private bound: ServiceAddresses | null = null;
  private trigger: ((trigger: ShutdownTrigger) => void) | null = null;
  private completion: Promise<Error | null> | null = null;

  constructor(options: ServiceOptions) {
    this.name = options.name;
    this.config = resolveConfig(options.config);
    this.signals = options.signals ?? DEFAULT_SIGNALS;
    this.logger =
      options.logger ??
      createLogger({
        service: this.name,
        version: this.config.version,
        level: this.config.logLevel,
        format: this.config.logFormat,
      });

    this.metrics = new MetricsRegistry({
      service: this.name,
      collectDefaultMetrics: options.collectDefaultMetrics ?? true,
    });
    this.health = new HealthRegistry({
      component: { name: this.name, version: this.config.version },
      liveness: options.liveness,
    });
    this.shutdownHooks = new ShutdownSequencer(this.logger);
    this.middleware = new MiddlewareChain(
      defaultMiddleware({ metrics: this.metrics, health: this.health, logger: this.logger })
    );

    this.app = express();
    this.app.disable('x-powered-by');
    // Service logger for everything on this app, including the 404 and error handlers
    this.app.use((_req, _res, next) => runWithContext({ logger: this.logger }, () => next()));
    this.router = express.Router();
    this.app.use(this.router);
    this.app.use(notFoundHandler);
    this.app.use(errorHandler);

    this.operationalApp = createOperationalApp({
      metrics: this.metrics,
      health: this.health,
      logger: this.logger,
      config: this.config,
    });
  }

  get currentState(): ServiceState {
    return this.state;
  }

  // ===================
  // Routes and middleware
  // ===================

  /**
   * Append middleware links. Only routes registered afterwards are wrapped.
   *
   * @throws ServiceError MIDDLEWARE_SEALED once the service has started
   */
  use(...links: Middleware[]): this {
    this.middleware.use(...links);
    return this;
  }

  /**
   * Register a handler for every method on `pattern`.
   */
  handle(pattern: string, handler: Handler): this {
    return this.mount('ALL', pattern, handler);
  }

  route(method: HttpMethod, pattern: string, handler: Handler): this {
    return this.mount(method, pattern, handler);
  }

  private mount(method: HttpMethod | 'ALL', pattern: string, handler: Handler): this {
    if (!pattern.startsWith('/')) {
      throw ServiceErrors.routeInvalid(method, pattern, 'pattern must start with "/"');
    }

    const wrapped = asyncHandler(this.middleware.apply(handler));
    const route = this.router.route(toExpressPath(pattern));
    switch (method) {
      case 'ALL':
        route.all(wrapped);
        break;
      case 'GET':
        route.get(wrapped);
        break;
      case 'POST':
        route.post(wrapped);
        break;
      case 'PUT':
        route.put(wrapped);
        break;
      case 'PATCH':
        route.patch(wrapped);
        break;
      case 'DELETE':
        route.delete(wrapped);
        break;
      case 'HEAD':
        route.head(wrapped);
        break;
      case 'OPTIONS':
        route.options(wrapped);
        break;
      default:
        throw ServiceErrors.routeInvalid(String(method), pattern, 'unsupported method');
    }

    this.logger.debug('Route registered', { method, pattern });
    return this;
  }

  // ===================
  // Registries
  // ===================

  registerCounter(descriptor: MetricDescriptor): RegisteredMetric {
    return this.metrics.registerCounter(descriptor);
  }

  registerGauge(descriptor: MetricDescriptor): RegisteredMetric {
    return this.metrics.registerGauge(descriptor);
  }

  registerHistogram(descriptor: MetricDescriptor): RegisteredMetric {
    return this.metrics.registerHistogram(descriptor);
  }

  registerSummary(descriptor: MetricDescriptor): RegisteredMetric {
    return this.metrics.registerSummary(descriptor);
  }

  registerHealthCheck(probe: HealthProbe): void {
    this.health.register(probe);
  }

  /**
   * Hooks run in registration order when shutdown begins.
   *
   * @throws ServiceError SHUTDOWN_SEALED once shutdown has started
   */
  addShutdownHook(hook: ShutdownHook, name?: string): void {
    this.shutdownHooks.addHook(hook, name);
  }

  // ===================
  // Lifecycle
  // ===================

  /**
   * Start both listeners and block until shutdown has completed.
   */
  async start(): Promise<void> {
    await this.startBackground();
    await this.wait();
  }

  /**
   * Bind both listeners concurrently and return once both accept
   * connections. Shutdown then runs on a signal, a listener failure or
   * `stop()`; observe it with `wait()`.
   *
   * @throws ServiceError CONFIG_INVALID for a malformed listen address
   * @throws ServiceError STARTUP_FAILED when either listener cannot bind
   */
  async startBackground(): Promise<ServiceAddresses> {
    if (this.state !== 'idle') {
      throw ServiceErrors.invalidState('start', this.state);
    }
    const primaryAddress = this.listenAddress('addr', this.config.addr);
    const operationalAddress = this.listenAddress('metricsAddr', this.config.metricsAddr);

    this.state = 'starting';
    this.middleware.seal();

    const triggered = new Promise<ShutdownTrigger>((resolve) => {
      this.trigger = resolve;
    });
    const onFailure = (error: Error) => this.requestShutdown({ reason: 'failure', error });
    // Installed before binding so a signal during startup still runs the shutdown sequence
    this.installSignalHandlers();

    const primary = new Listener({
      name: 'primary',
      address: primaryAddress,
      handler: this.app,
      logger: this.logger,
      readTimeoutMs: this.config.readTimeoutMs,
      writeTimeoutMs: this.config.writeTimeoutMs,
      idleTimeoutMs: this.config.idleTimeoutMs,
      onFailure,
    });
    const operational = new Listener({
      name: 'operational',
      address: operationalAddress,
      handler: this.operationalApp,
      logger: this.logger,
      readTimeoutMs: this.config.readTimeoutMs,
      writeTimeoutMs: this.config.writeTimeoutMs,
      idleTimeoutMs: this.config.idleTimeoutMs,
      onFailure,
    });
    this.primary = primary;
    this.operational = operational;

    const [primaryResult, operationalResult] = await Promise.allSettled([
      primary.listen(),
      operational.listen(),
    ]);

    if (primaryResult.status === 'rejected' || operationalResult.status === 'rejected') {
      const failure: unknown =
        primaryResult.status === 'rejected'
          ? primaryResult.reason
          : operationalResult.status === 'rejected'
            ? operationalResult.reason
            : undefined;
      // Release whichever listener did bind
      const deadline = this.shutdownDeadline();
      await Promise.allSettled([primary.close(deadline), operational.close(deadline)]);
      this.removeSignalHandlers();
      this.state = 'stopped';
      this.trigger = null;
      this.logger.error('Service failed to start', { error: errorMessage(failure) });
      throw failure;
    }

    this.bound = { primary: primaryResult.value, operational: operationalResult.value };
    this.state = 'running';
    this.completion = triggered
      .then((trigger) => this.shutdown(trigger))
      .catch((error: unknown) => toError(error));

    this.logger.info('Service started', {
      name: this.name,
      version: this.config.version,
      addr: `${this.bound.primary.address}:${this.bound.primary.port}`,
      metricsAddr: `${this.bound.operational.address}:${this.bound.operational.port}`,
    });
    return this.bound;
  }

  /**
   * Resolve once the service has stopped.
   *
   * @throws the first shutdown error, or the listener error that triggered shutdown
   */
  async wait(): Promise<void> {
    if (!this.completion) {
      if (this.state === 'stopped') {
        return;
      }
      throw ServiceErrors.invalidState('wait', this.state);
    }
    const error = await this.completion;
    if (error) {
      throw error;
    }
  }

  /**
   * Request shutdown, as a signal would, and wait for it to finish. Before
   * start this only runs the shutdown hooks.
   */
  async stop(): Promise<void> {
    switch (this.state) {
      case 'idle': {
        this.state = 'stopped';
        await this.shutdownHooks.run(this.shutdownDeadline());
        return;
      }
      case 'starting':
        throw ServiceErrors.invalidState('stop', this.state);
      default:
        this.requestShutdown({ reason: 'stop' });
        await this.wait();
    }
  }

  /**
   * Bound addresses of both listeners.
   */
  addresses(): ServiceAddresses {
    if (!this.bound) {
      throw ServiceErrors.invalidState('read addresses', this.state);
    }
    return this.bound;
  }

  private requestShutdown(trigger: ShutdownTrigger): void {
    this.trigger?.(trigger);
  }

  private async shutdown(trigger: ShutdownTrigger): Promise<Error | null> {
    this.state = 'shutting_down';
    switch (trigger.reason) {
      case 'signal':
        this.logger.info('Received shutdown signal', { signal: trigger.signal });
        break;
      case 'failure':
        this.logger.error('Listener failed, shutting down', { error: trigger.error.message });
        break;
      default:
        this.logger.info('Shutdown requested');
    }

    let firstError: Error | null = null;

    try {
      const deadline = this.shutdownDeadline();
      await this.shutdownHooks.run(deadline);

      // Both listeners are always attempted, primary first
      for (const listener of [this.primary, this.operational]) {
        if (!listener) {
          continue;
        }
        try {
          await listener.close(deadline);
        } catch (error) {
          this.logger.error('Listener shutdown error', {
            listener: listener.name,
            error: errorMessage(error),
          });
          firstError ??= toError(error);
        }
      }
    } finally {
      this.removeSignalHandlers();
      this.state = 'stopped';
    }

    if (trigger.reason === 'failure') {
      return trigger.error;
    }
    if (firstError) {
      this.logger.error('Shutdown completed with errors', { error: firstError.message });
    } else {
      this.logger.info('Graceful shutdown completed');
    }
    return firstError;
  }

  /**
   * Deadline signal for one shutdown. The timeout is validated with the
   * config, but `config` is mutable, so it is clamped to what timers accept.
   */
  private shutdownDeadline(): AbortSignal {
    return AbortSignal.timeout(Math.max(0, Math.min(this.config.shutdownTimeoutMs, MAX_TIMEOUT_MS)));
  }

  private listenAddress(field: string, raw: string): ListenAddress {
    const address = parseListenAddress(raw);
    if (!address) {
      throw ServiceErrors.configInvalid([
        { path: field, message: `Invalid listen address "${raw}"` },
      ]);
    }
    return address;
  }

  private installSignalHandlers(): void {
    for (const signal of this.signals) {
      const handler = () => this.requestShutdown({ reason: 'signal', signal });
      this.signalHandlers.set(signal, handler);
      process.on(signal, handler);
    }
  }

  private removeSignalHandlers(): void {
    for (const [signal, handler] of this.signalHandlers) {
      process.off(signal, handler);
    }
    this.signalHandlers.clear();
  }
}
