import type { Request, Response, NextFunction } from 'express';
import { getLogger } from '../context';
import type { Handler } from './MiddlewareChain';

export interface AppError extends Error {
  statusCode?: number;
  /** Set by body parsers and other http-errors based middleware */
  status?: number;
  code?: string;
  isOperational?: boolean;
}

function httpStatus(error: AppError): number {
  const status = error.statusCode ?? error.status;
  return status !== undefined && status >= 400 && status <= 599 ? status : 500;
}

/**
 * JSON error handler for errors that reach Express itself: unmatched routes,
 * malformed requests, and anything a route's chain passed to `next`.
 */
export const errorHandler = (error: AppError, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    // Let Express close the connection
    next(error);
    return;
  }

  const statusCode = httpStatus(error);
  const code = error.code ?? (statusCode >= 500 ? 'INTERNAL_ERROR' : 'INVALID_REQUEST');
  const message = statusCode >= 500 ? 'Internal Server Error' : error.message;
  const logger = getLogger();

  if (statusCode >= 500) {
    logger.error('Server Error:', {
      error: error.message,
      stack: error.stack,
      url: req.url,
      method: req.method,
    });
  } else {
    logger.warn('Client Error:', {
      error: error.message,
      url: req.url,
      method: req.method,
      statusCode,
    });
  }

  res.status(statusCode).json({
    success: false,
    error: {
      message,
      code,
      timestamp: new Date().toISOString(),
    },
  });
};

/**
 * Adapt a chain handler to Express, forwarding a rejection to `next`.
 */
export const asyncHandler = (fn: Handler) => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => fn(req, res))
      .catch(next);
  };
};

// Create custom error
export const createError = (message: string, statusCode: number = 500, code?: string): AppError => {
  const error: AppError = new Error(message);
  error.statusCode = statusCode;
  if (code) {
    error.code = code;
  }
  error.isOperational = true;
  return error;
};

// Not found handler
export const notFoundHandler = (req: Request, _res: Response, next: NextFunction) => {
  next(createError(`Route ${req.originalUrl} not found`, 404, 'NOT_FOUND'));
};
