import winston from 'winston';
import { AsyncLocalStorage } from 'async_hooks';
import {
  LogFormatSchema,
  LogLevelSchema,
  isJestRuntime,
  type LogFormat,
  type LogLevel,
} from '../config/env';
import type { MetricsRegistry } from '../services/MetricsRegistry';
import type { HealthRegistry } from '../services/HealthRegistry';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;
export type Logger = winston.Logger;

/**
 * Request context stored in AsyncLocalStorage for automatic propagation
 * throughout the request lifecycle. Each middleware link contributes the
 * fields it owns; nested links see the merged context.
 */
export interface RequestContext {
  requestId?: string;
  method?: string;
  path?: string;
  startTime?: number;
  logger?: Logger;
  metrics?: MetricsRegistry;
  health?: HealthRegistry;
}

// ============================================================================
// Request Context (AsyncLocalStorage)
// ============================================================================

export const requestContextStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context from AsyncLocalStorage.
 * Returns undefined if called outside of a request context.
 */
export const getRequestContext = (): RequestContext | undefined => {
  return requestContextStorage.getStore();
};

/**
 * Run a function within a request context. The new fields are merged over
 * whatever context is already active, so outer links keep their values.
 */
export const runWithContext = <T>(context: RequestContext, fn: () => T): T => {
  const parent = requestContextStorage.getStore();
  return requestContextStorage.run(parent ? { ...parent, ...context } : context, fn);
};

// ============================================================================
// Sensitive Data Masking
// ============================================================================

const SENSITIVE_KEY_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /api[_-]?key/i,
  /authorization/i,
  /credential/i,
  /private[_-]?key/i,
  /cookie/i,
];

const isSensitiveKey = (key: string): boolean =>
  SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));

/**
 * Recursively mask sensitive values in an object.
 * Returns a new object with sensitive values redacted.
 */
export const maskSensitiveData = (obj: unknown, maxDepth: number = 5): unknown => {
  if (maxDepth <= 0) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => maskSensitiveData(item, maxDepth - 1));
  }

  if (obj instanceof Error) {
    return { name: obj.name, message: obj.message, stack: obj.stack };
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveKey(key) && value !== null && value !== undefined) {
      result[key] = typeof value === 'object' ? maskSensitiveData(value, maxDepth - 1) : '[REDACTED]';
    } else {
      result[key] = maskSensitiveData(value, maxDepth - 1);
    }
  }
  return result;
};

// ============================================================================
// Winston Formats
// ============================================================================

/**
 * Add request context from AsyncLocalStorage to log entries.
 */
const addRequestContext = winston.format((info) => {
  const context = getRequestContext();
  if (context?.requestId) {
    info.requestId = context.requestId;
    if (context.method) {
      info.method = context.method;
    }
    if (context.path) {
      info.path = context.path;
    }
  }
  return info;
});

/**
 * Mask sensitive values in log metadata. Mutates the entry in place so that
 * winston's symbol-keyed fields survive for later formats.
 */
const structuredFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key !== 'level' && key !== 'message' && key !== 'timestamp') {
      info[key] = isSensitiveKey(key) && typeof info[key] !== 'object'
        ? '[REDACTED]'
        : maskSensitiveData(info[key]);
    }
  }
  return info;
});

const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  addRequestContext(),
  structuredFormat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  addRequestContext(),
  structuredFormat(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, requestId, ...meta }) => {
    const reqIdStr = typeof requestId === 'string' ? ` [${requestId}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${reqIdStr}: ${String(message)}${metaStr}`;
  })
);

// ============================================================================
// Logger Factory
// ============================================================================

export interface LoggerOptions {
  /** Service name attached to every entry */
  service?: string;
  version?: string;
  level?: LogLevel;
  format?: LogFormat;
  /** Defaults to true under Jest */
  silent?: boolean;
  /** Replaces the console transport, e.g. to capture output in tests */
  transports?: winston.LoggerOptions['transports'];
}

/**
 * Create a winston logger with the harness's structured format.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return winston.createLogger({
    level: options.level ?? 'info',
    silent: options.silent ?? isJestRuntime(),
    format: options.format === 'json' ? jsonFormat : consoleFormat,
    defaultMeta: {
      service: options.service ?? 'service',
      ...(options.version ? { version: options.version } : {}),
    },
    transports: options.transports ?? [new winston.transports.Console()],
  });
}

/**
 * Process-wide fallback logger, used when no request-scoped or service logger
 * is available.
 */
/**
 * Level and format for the fallback logger, read with the same schemas as the
 * service configuration. Unset or unknown values give info and pretty.
 */
export function loggerOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): {
  level: LogLevel;
  format: LogFormat;
} {
  const level = LogLevelSchema.safeParse(env.LOG_LEVEL);
  const format = LogFormatSchema.safeParse(env.LOG_FORMAT);
  return {
    level: level.success ? level.data : 'info',
    format: format.success ? format.data : 'pretty',
  };
}

const logger = createLogger(loggerOptionsFromEnv());

export { logger };
