/**
 * ShutdownSequencer - Runs cleanup hooks once, in registration order.
 *
 * A failing hook is logged and recorded; the remaining hooks still run.
 * Hooks receive the shutdown deadline signal, but nothing caps an individual
 * hook's duration: a hook that ignores the signal can use up the whole
 * shutdown budget before the listeners are closed.
 */

import { ServiceErrors, errorMessage } from '../errors';
import { logger as defaultLogger, type Logger } from '../utils/logger';

export type ShutdownHook = (signal: AbortSignal) => Promise<void> | void;

export interface HookFailure {
  name: string;
  error: unknown;
}

export interface ShutdownReport {
  /** Names of every hook that was invoked, in order */
  executed: string[];
  failures: HookFailure[];
}

interface NamedHook {
  name: string;
  hook: ShutdownHook;
}

export class ShutdownSequencer {
  private readonly hooks: NamedHook[] = [];
  private running: Promise<ShutdownReport> | null = null;

  constructor(private readonly logger: Logger = defaultLogger) {}

  /**
   * Append a hook. Unnamed hooks are labelled by position ("hook-1", ...).
   */
  addHook(hook: ShutdownHook, name?: string): void {
    if (this.running) {
      throw ServiceErrors.shutdownSealed();
    }
    this.hooks.push({ name: name ?? `hook-${this.hooks.length + 1}`, hook });
  }

  get size(): number {
    return this.hooks.length;
  }

  get started(): boolean {
    return this.running !== null;
  }

  /**
   * Run every hook once. Later calls return the first run's report.
   */
  run(deadline: AbortSignal): Promise<ShutdownReport> {
    if (!this.running) {
      this.running = this.runHooks(deadline);
    }
    return this.running;
  }

  private async runHooks(deadline: AbortSignal): Promise<ShutdownReport> {
    const report: ShutdownReport = { executed: [], failures: [] };

    for (const { name, hook } of this.hooks) {
      report.executed.push(name);
      try {
        await hook(deadline);
      } catch (error) {
        report.failures.push({ name, error });
        this.logger.error('Shutdown hook failed', { hook: name, error: errorMessage(error) });
      }
    }

    if (report.executed.length > 0) {
      this.logger.info('Shutdown hooks completed', {
        executed: report.executed.length,
        failed: report.failures.length,
      });
    }
    return report;
  }
}
