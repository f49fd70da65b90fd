/**
 * Error Handling Middleware
 *
 * Centralized error handling with a consistent error response format.
 * 5xx messages are replaced with a generic one in production.
 */

import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { logger, getCorrelationId } from '../observability';
import { ErrorCode, ErrorResponse, errorCodeToStatus } from '../types/errors';

/**
 * Extended Error interface with additional properties
 */
export interface AppError extends Error {
  statusCode?: number;
  errorCode?: ErrorCode;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
}

/**
 * Driver and connection failures surface as 503 rather than 500
 */
const isDatabaseError = (err: Error): boolean =>
  err.name.startsWith('Mongo') || err.name.startsWith('Mongoose');

const resolveErrorCode = (err: AppError): ErrorCode => {
  if (err.errorCode) return err.errorCode;
  if (isDatabaseError(err)) return ErrorCode.DATABASE_ERROR;
  // body-parser rejects malformed JSON with a 400
  if (err.statusCode === 400) return ErrorCode.VALIDATION_ERROR;
  return ErrorCode.INTERNAL_ERROR;
};

/**
 * Main error handler middleware
 *
 * Catches all errors and returns a consistent JSON response format.
 * Logs errors with correlation ID for traceability.
 */
export const errorHandler = (
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const errorCode = resolveErrorCode(err);
  const statusCode = err.statusCode || errorCodeToStatus[errorCode] || 500;

  const logFn = statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
  logFn(
    {
      correlationId,
      errorCode,
      statusCode,
      error: err.message,
      stack: config.isDevelopment ? err.stack : undefined,
      path: req.path,
      method: req.method,
      isOperational: err.isOperational,
    },
    `Error: ${err.message}`
  );

  const message =
    config.isProduction && statusCode >= 500
      ? 'Internal server error'
      : err.message || 'An error occurred';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      message,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  if (err.validationErrors) {
    response.error.details = err.validationErrors;
  }

  res.status(statusCode).json(response);
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (req: Request, res: Response, _next: NextFunction): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: ErrorCode.RESOURCE_NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  res.status(404).json(response);
};

/**
 * API Error class for throwing operational errors
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  validationErrors?: Record<string, string[]>;

  constructor(
    errorCode: ErrorCode,
    message: string,
    options?: {
      statusCode?: number;
      isOperational?: boolean;
      validationErrors?: Record<string, string[]>;
    }
  ) {
    super(message);
    this.name = 'ApiError';
    this.errorCode = errorCode;
    this.statusCode = options?.statusCode || errorCodeToStatus[errorCode] || 500;
    this.isOperational = options?.isOperational ?? true;
    this.validationErrors = options?.validationErrors;
    Error.captureStackTrace(this, this.constructor);
  }

  static unauthorized(message = 'Unauthorized'): ApiError {
    return new ApiError(ErrorCode.UNAUTHORIZED, message);
  }

  static invalidToken(message = 'Invalid token'): ApiError {
    return new ApiError(ErrorCode.INVALID_TOKEN, message);
  }

  static tokenExpired(message = 'Token expired'): ApiError {
    return new ApiError(ErrorCode.TOKEN_EXPIRED, message);
  }

  static forbidden(message = 'Forbidden'): ApiError {
    return new ApiError(ErrorCode.FORBIDDEN, message);
  }

  static validationError(message: string, validationErrors?: Record<string, string[]>): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, { validationErrors });
  }

  static invalidDuration(message: string): ApiError {
    return new ApiError(ErrorCode.INVALID_DURATION, message);
  }

  static invalidChannels(message: string): ApiError {
    return new ApiError(ErrorCode.INVALID_CHANNELS, message);
  }

  static notFound(resource: string): ApiError {
    const codeMap: Record<string, ErrorCode> = {
      order: ErrorCode.ORDER_NOT_FOUND,
      campaign: ErrorCode.CAMPAIGN_NOT_FOUND,
      transaction: ErrorCode.TRANSACTION_NOT_FOUND,
      post: ErrorCode.POST_NOT_FOUND,
    };
    const code = codeMap[resource.toLowerCase()] || ErrorCode.RESOURCE_NOT_FOUND;
    return new ApiError(code, `${resource} not found`);
  }

  static invalidTransition(message: string): ApiError {
    return new ApiError(ErrorCode.INVALID_STATE_TRANSITION, message);
  }

  static orderNotCancellable(status: string): ApiError {
    return new ApiError(ErrorCode.ORDER_NOT_CANCELLABLE, `Order is ${status} and cannot be cancelled`);
  }

  static alreadyResolved(message = 'Transaction already resolved'): ApiError {
    return new ApiError(ErrorCode.TRANSACTION_ALREADY_RESOLVED, message);
  }

  static referenceCodeExhausted(): ApiError {
    return new ApiError(
      ErrorCode.REFERENCE_CODE_EXHAUSTED,
      'Could not allocate a unique payment reference, please retry'
    );
  }

  static internal(message = 'Internal server error'): ApiError {
    return new ApiError(ErrorCode.INTERNAL_ERROR, message, { isOperational: false });
  }
}

/**
 * Async handler wrapper to catch errors in async route handlers
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
