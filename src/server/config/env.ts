/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for every environment variable the
 * harness reads, validates them at startup, and converts the raw strings
 * into typed values (durations in milliseconds, validated listen addresses).
 */

import { z } from 'zod';

// ============================================================================
// Durations
// ============================================================================

const DURATION_UNITS_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  µs: 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const DURATION_PART = /(\d+(?:\.\d+)?)(ns|us|µs|ms|s|m|h)/g;

/**
 * Parse a duration string ("500ms", "10s", "1m30s", "2h") into
 * milliseconds. A bare "0" is accepted; any other unitless value is rejected.
 *
 * @returns the duration in milliseconds, or `null` when the string is malformed
 */
export function parseDurationMs(raw: string): number | null {
  const value = raw.trim();
  if (value === '0') {
    return 0;
  }
  if (value.length === 0) {
    return null;
  }

  let total = 0;
  let consumed = 0;
  for (const match of value.matchAll(DURATION_PART)) {
    if (match.index !== consumed) {
      return null;
    }
    const [whole, amount, unit] = match;
    total += Number(amount) * DURATION_UNITS_MS[unit];
    consumed += whole.length;
  }

  return consumed === value.length && consumed > 0 ? Math.round(total) : null;
}

/**
 * Largest delay Node timers and `AbortSignal.timeout` accept (2^31 - 1 ms,
 * about 24.8 days). Larger values overflow to 1ms or throw.
 */
export const MAX_TIMEOUT_MS = 2_147_483_647;

const DurationSchema = z.string().transform((raw, ctx) => {
  const ms = parseDurationMs(raw);
  if (ms === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid duration "${raw}" (expected e.g. 500ms, 10s, 1m30s)`,
    });
    return z.NEVER;
  }
  if (ms > MAX_TIMEOUT_MS) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Duration "${raw}" exceeds the maximum of ${MAX_TIMEOUT_MS}ms`,
    });
    return z.NEVER;
  }
  return ms;
});

/**
 * Millisecond timeout as accepted by typed config overrides and registries.
 */
export const TimeoutMsSchema = z
  .number()
  .int('must be an integer number of milliseconds')
  .min(0, 'must not be negative')
  .max(MAX_TIMEOUT_MS, `must not exceed ${MAX_TIMEOUT_MS}ms`);

// ============================================================================
// Listen addresses
// ============================================================================

export interface ListenAddress {
  /** Interface to bind; undefined binds every interface. */
  host: string | undefined;
  port: number;
}

/**
 * Parse "host:port", ":port" or "[ipv6]:port" into a listen address.
 *
 * @returns the parsed address, or `null` when the string is malformed
 */
export function parseListenAddress(raw: string): ListenAddress | null {
  const value = raw.trim();
  const separator = value.lastIndexOf(':');
  if (separator < 0) {
    return null;
  }

  let host = value.slice(0, separator);
  const portText = value.slice(separator + 1);
  if (!/^\d+$/.test(portText)) {
    return null;
  }
  const port = Number(portText);
  if (port > 65535) {
    return null;
  }

  if (host.startsWith('[')) {
    if (!host.endsWith(']')) {
      return null;
    }
    host = host.slice(1, -1);
  } else if (host.includes(':')) {
    return null;
  }

  return { host: host.length > 0 ? host : undefined, port };
}

const AddressSchema = z.string().refine((raw) => parseListenAddress(raw) !== null, {
  message: 'Invalid listen address (expected host:port, :port or [ipv6]:port)',
});

const PathSchema = z
  .string()
  .refine((raw) => raw.startsWith('/'), { message: 'Path must start with "/"' });

// ============================================================================
// Schema
// ============================================================================

/**
 * Log level schema (winston npm levels).
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // PRIMARY LISTENER
  // ===================================================================

  /** Address of the application traffic listener */
  ADDR: AddressSchema.default(':8080'),

  /** Maximum time to receive a full request */
  READ_TIMEOUT: DurationSchema.default('10s'),

  /** Socket inactivity timeout while a response is being written */
  WRITE_TIMEOUT: DurationSchema.default('10s'),

  /** Keep-alive idle timeout */
  IDLE_TIMEOUT: DurationSchema.default('120s'),

  // ===================================================================
  // OPERATIONAL LISTENER
  // ===================================================================

  /** Address of the metrics/health listener */
  METRICS_ADDR: AddressSchema.default(':9090'),

  METRICS_PATH: PathSchema.default('/metrics'),
  HEALTH_PATH: PathSchema.default('/health'),
  READINESS_PATH: PathSchema.default('/ready'),
  LIVENESS_PATH: PathSchema.default('/live'),

  /** Upper bound for one health evaluation served over HTTP */
  HEALTH_TIMEOUT: DurationSchema.default('5s'),

  // ===================================================================
  // LIFECYCLE
  // ===================================================================

  /** Shared deadline for shutdown hooks and listener draining */
  SHUTDOWN_TIMEOUT: DurationSchema.default('30s'),

  /** Service version reported by the health endpoint */
  VERSION: z.string().min(1).optional(),

  /** Application version (injected by npm) */
  npm_package_version: z.string().optional(),

  // ===================================================================
  // LOGGING
  // ===================================================================

  LOG_LEVEL: LogLevelSchema.default('info'),
  LOG_FORMAT: LogFormatSchema.default('pretty'),
});

/**
 * Inferred type for parsed environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(env: NodeJS.ProcessEnv = process.env): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Detect whether we are running under Jest.
 */
export function isJestRuntime(env: NodeJS.ProcessEnv = process.env): boolean {
  return typeof env.JEST_WORKER_ID === 'string';
}
