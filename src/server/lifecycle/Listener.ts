import http from 'http';
import type { ListenAddress } from '../config';
import { ServiceErrors } from '../errors';
import type { Logger } from '../utils/logger';

export type ListenerState = 'none' | 'active' | 'closed';

export interface BoundAddress {
  address: string;
  port: number;
  family: string;
}

export interface ListenerOptions {
  /** Used in logs and errors, e.g. "primary" */
  name: string;
  address: ListenAddress;
  handler: http.RequestListener;
  logger: Logger;
  /** Whole-request read limit (requestTimeout, headersTimeout). 0 disables */
  readTimeoutMs?: number;
  /** Socket inactivity limit while the response is written. 0 disables */
  writeTimeoutMs?: number;
  /** Keep-alive idle timeout */
  idleTimeoutMs?: number;
  /** Called for server errors raised after the listener is bound */
  onFailure?: (error: Error) => void;
}

/**
 * One HTTP listener with a single none → active → closed lifetime.
 */
export class Listener {
  public readonly name: string;
  private readonly server: http.Server;
  private readonly options: ListenerOptions;
  private state: ListenerState = 'none';
  private closing: Promise<void> | null = null;

  constructor(options: ListenerOptions) {
    this.name = options.name;
    this.options = options;

    const readTimeoutMs = options.readTimeoutMs ?? 0;
    this.server = http.createServer(
      { requestTimeout: readTimeoutMs, headersTimeout: readTimeoutMs },
      options.handler
    );
    this.server.timeout = options.writeTimeoutMs ?? 0;
    if (options.idleTimeoutMs !== undefined) {
      this.server.keepAliveTimeout = options.idleTimeoutMs;
    }
  }

  get currentState(): ListenerState {
    return this.state;
  }

  /**
   * Bind and start accepting connections.
   *
   * @throws ServiceError STARTUP_FAILED when the address cannot be bound
   */
  listen(): Promise<BoundAddress> {
    if (this.state !== 'none') {
      return Promise.reject(ServiceErrors.invalidState(`start ${this.name} listener`, this.state));
    }

    return new Promise<BoundAddress>((resolve, reject) => {
      const onError = (error: Error) => {
        this.server.off('listening', onListening);
        this.state = 'closed';
        reject(ServiceErrors.startupFailed(this.name, error));
      };

      const onListening = () => {
        this.server.off('error', onError);
        this.state = 'active';
        this.server.on('error', (error: Error) => this.handleFailure(error));

        const bound = this.address();
        this.options.logger.info('Listener started', {
          listener: this.name,
          address: bound.address,
          port: bound.port,
        });
        resolve(bound);
      };

      this.server.once('error', onError);
      this.server.once('listening', onListening);
      this.server.listen({ port: this.options.address.port, host: this.options.address.host });
    });
  }

  address(): BoundAddress {
    const info = this.server.address();
    if (info === null || typeof info === 'string') {
      throw ServiceErrors.invalidState(`read ${this.name} address`, this.state);
    }
    return { address: info.address, port: info.port, family: info.family };
  }

  /**
   * Stop accepting connections and drain the open ones. When `deadline`
   * aborts first, remaining connections are destroyed and the close rejects
   * with SHUTDOWN_TIMEOUT.
   */
  close(deadline: AbortSignal): Promise<void> {
    if (this.closing) {
      return this.closing;
    }
    if (this.state !== 'active') {
      this.state = 'closed';
      return Promise.resolve();
    }

    this.state = 'closed';
    this.closing = new Promise<void>((resolve, reject) => {
      let settled = false;

      const onDeadline = () => {
        if (settled) {
          return;
        }
        settled = true;
        this.server.closeAllConnections();
        reject(ServiceErrors.shutdownTimeout(this.name));
      };

      this.server.close((error) => {
        deadline.removeEventListener('abort', onDeadline);
        if (settled) {
          return;
        }
        settled = true;
        if (error && !('code' in error && error.code === 'ERR_SERVER_NOT_RUNNING')) {
          reject(ServiceErrors.listenerCloseFailed(this.name, error));
          return;
        }
        this.options.logger.info('Listener closed', { listener: this.name });
        resolve();
      });
      this.server.closeIdleConnections();

      if (deadline.aborted) {
        onDeadline();
      } else {
        deadline.addEventListener('abort', onDeadline, { once: true });
      }
    });
    return this.closing;
  }

  private handleFailure(error: Error): void {
    this.options.logger.error('Listener failed', { listener: this.name, error: error.message });
    this.options.onFailure?.(ServiceErrors.listenerFailed(this.name, error));
  }
}
