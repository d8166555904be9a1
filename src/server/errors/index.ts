/**
 * Centralized error module for the service harness.
 *
 * @module errors
 *
 * @example
 * ```ts
 * import { ServiceErrors, isServiceError, ErrorCodes } from '../errors';
 *
 * throw ServiceErrors.metricNotFound('jobs_total', 'counter');
 * ```
 */

export { ServiceError, ServiceErrors, isServiceError, errorMessage } from './ServiceError';
export type { ServiceErrorOptions } from './ServiceError';

export { ErrorCodes, ErrorCodeMessages } from './errorCodes';
export type { ErrorCode } from './errorCodes';
