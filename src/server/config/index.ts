/**
 * Configuration Module - Canonical Entry Point
 *
 * Usage:
 *   import { loadConfigFromEnv } from './config';
 *   const config = loadConfigFromEnv();
 *
 * Architecture:
 * - `env.ts` - Raw environment variable schema and parsing helpers
 * - `index.ts` (this file) - Typed service configuration assembled from env
 */

import { z } from 'zod';
import { ServiceErrors } from '../errors';
import { TimeoutMsSchema, parseEnv, type LogFormat, type LogLevel, type RawEnv } from './env';

/**
 * Typed configuration consumed by the service lifecycle.
 */
export interface ServiceConfig {
  /** Primary listener address, e.g. ":8080" or "127.0.0.1:0" */
  addr: string;
  readTimeoutMs: number;
  writeTimeoutMs: number;
  idleTimeoutMs: number;

  /** Operational listener address */
  metricsAddr: string;
  metricsPath: string;
  healthPath: string;
  readinessPath: string;
  livenessPath: string;
  healthTimeoutMs: number;

  shutdownTimeoutMs: number;
  version: string;

  logLevel: LogLevel;
  logFormat: LogFormat;
}

/**
 * Defaults applied when neither the environment nor the caller overrides a field.
 */
export function defaultConfig(): ServiceConfig {
  return {
    addr: ':8080',
    readTimeoutMs: 10_000,
    writeTimeoutMs: 10_000,
    idleTimeoutMs: 120_000,
    metricsAddr: ':9090',
    metricsPath: '/metrics',
    healthPath: '/health',
    readinessPath: '/ready',
    livenessPath: '/live',
    healthTimeoutMs: 5_000,
    shutdownTimeoutMs: 30_000,
    version: '0.0.0',
    logLevel: 'info',
    logFormat: 'pretty',
  };
}

/**
 * Timeouts in caller overrides are held to the same bounds as their
 * environment counterparts.
 */
const ConfigOverridesSchema = z.object({
  readTimeoutMs: TimeoutMsSchema.optional(),
  writeTimeoutMs: TimeoutMsSchema.optional(),
  idleTimeoutMs: TimeoutMsSchema.optional(),
  healthTimeoutMs: TimeoutMsSchema.optional(),
  shutdownTimeoutMs: TimeoutMsSchema.optional(),
});

/**
 * Merge caller overrides onto the defaults. Undefined overrides are ignored.
 *
 * @throws ServiceError with code CONFIG_INVALID for an out-of-range timeout
 */
export function resolveConfig(overrides: Partial<ServiceConfig> = {}): ServiceConfig {
  const checked = ConfigOverridesSchema.safeParse(overrides);
  if (!checked.success) {
    throw ServiceErrors.configInvalid(
      checked.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }

  const config = defaultConfig();
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(config, { [key]: value });
    }
  }
  return config;
}

function fromEnv(env: RawEnv): ServiceConfig {
  return {
    addr: env.ADDR,
    readTimeoutMs: env.READ_TIMEOUT,
    writeTimeoutMs: env.WRITE_TIMEOUT,
    idleTimeoutMs: env.IDLE_TIMEOUT,
    metricsAddr: env.METRICS_ADDR,
    metricsPath: env.METRICS_PATH,
    healthPath: env.HEALTH_PATH,
    readinessPath: env.READINESS_PATH,
    livenessPath: env.LIVENESS_PATH,
    healthTimeoutMs: env.HEALTH_TIMEOUT,
    shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT,
    version: env.VERSION?.trim() || env.npm_package_version?.trim() || '0.0.0',
    logLevel: env.LOG_LEVEL,
    logFormat: env.LOG_FORMAT,
  };
}

/**
 * Build the service configuration from environment variables.
 *
 * @throws ServiceError with code CONFIG_INVALID listing every invalid variable
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const result = parseEnv(env);
  if (!result.success || !result.data) {
    throw ServiceErrors.configInvalid(result.errors ?? []);
  }
  return fromEnv(result.data);
}

export {
  EnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  parseEnv,
  parseDurationMs,
  parseListenAddress,
  isJestRuntime,
  MAX_TIMEOUT_MS,
  TimeoutMsSchema,
} from './env';

export type { RawEnv, EnvValidationResult, ListenAddress, LogLevel, LogFormat } from './env';
