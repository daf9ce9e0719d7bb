/**
 * Error Handling Middleware
 *
 * Provides centralized error handling with consistent error response format,
 * error logging, and appropriate error sanitization for production.
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
  meta?: Record<string, unknown>;
}

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

  // Malformed JSON bodies surface from express.json() as SyntaxError with status 400
  const isBodyParseError = err instanceof SyntaxError && err.statusCode === 400;

  const errorCode = isBodyParseError
    ? ErrorCode.INVALID_INPUT
    : err.errorCode || ErrorCode.INTERNAL_ERROR;
  const statusCode = err.statusCode || errorCodeToStatus[errorCode] || 500;

  const logPayload = {
    correlationId,
    errorCode,
    statusCode,
    error: err.message,
    stack: config.isDevelopment ? err.stack : undefined,
    path: req.path,
    method: req.method,
    isOperational: err.isOperational,
  };

  if (statusCode >= 500) {
    logger.error(logPayload, `Error: ${err.message}`);
  } else {
    logger.warn(logPayload, `Request rejected: ${err.message}`);
  }

  // Sanitize error message for production 5xx errors
  const message =
    config.isProduction && statusCode >= 500 && !err.isOperational
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

  if (err.meta) {
    response.error.meta = err.meta;
  }

  res.status(statusCode).json(response);
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
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

interface ApiErrorOptions {
  statusCode?: number;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
  meta?: Record<string, unknown>;
}

/**
 * API Error class for throwing operational errors
 *
 * `meta` carries machine-readable context the bot renders itself
 * (a shortfall, a request id to quote to support).
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  validationErrors?: Record<string, string[]>;
  meta?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, options?: ApiErrorOptions) {
    super(message);
    this.name = 'ApiError';
    this.errorCode = code;
    this.statusCode = options?.statusCode || errorCodeToStatus[code] || 500;
    this.isOperational = options?.isOperational ?? true;
    this.validationErrors = options?.validationErrors;
    this.meta = options?.meta;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Factory methods for common errors
   */
  static unauthorized(message = 'Unauthorized'): ApiError {
    return new ApiError(ErrorCode.UNAUTHORIZED, message);
  }

  static invalidToken(message = 'Invalid token'): ApiError {
    return new ApiError(ErrorCode.INVALID_TOKEN, message);
  }

  static tokenExpired(message = 'Token expired'): ApiError {
    return new ApiError(ErrorCode.TOKEN_EXPIRED, message);
  }

  static forbidden(message = 'Admin privileges required'): ApiError {
    return new ApiError(ErrorCode.FORBIDDEN, message);
  }

  static banned(message = 'User is banned'): ApiError {
    return new ApiError(ErrorCode.USER_BANNED, message);
  }

  static validationError(
    message: string,
    validationErrors?: Record<string, string[]>
  ): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, {
      validationErrors,
    });
  }

  static invalidAmount(message = 'Invalid amount'): ApiError {
    return new ApiError(ErrorCode.INVALID_AMOUNT, message);
  }

  static insufficientBalance(
    message = 'Insufficient balance',
    meta?: Record<string, unknown>
  ): ApiError {
    return new ApiError(ErrorCode.INSUFFICIENT_BALANCE, message, { meta });
  }

  static userNotFound(userId?: string): ApiError {
    return new ApiError(
      ErrorCode.USER_NOT_FOUND,
      userId ? `User ${userId} not found` : 'User not found'
    );
  }

  static notFound(resource: string): ApiError {
    const codeMap: Record<string, ErrorCode> = {
      user: ErrorCode.USER_NOT_FOUND,
      transaction: ErrorCode.TRANSACTION_NOT_FOUND,
      voucher: ErrorCode.VOUCHER_NOT_FOUND,
      package: ErrorCode.UNKNOWN_PACKAGE,
      reservation: ErrorCode.NO_ACTIVE_RESERVATION,
      'cid request': ErrorCode.CID_REQUEST_NOT_FOUND,
    };
    const code = codeMap[resource.toLowerCase()] || ErrorCode.RESOURCE_NOT_FOUND;
    return new ApiError(code, `${resource} not found`);
  }

  static duplicateTransaction(message = 'Duplicate transaction'): ApiError {
    return new ApiError(ErrorCode.DUPLICATE_TRANSACTION, message);
  }

  static invalidTransition(from: string, to: string): ApiError {
    return new ApiError(
      ErrorCode.INVALID_STATE_TRANSITION,
      `Invalid state transition from ${from} to ${to}`
    );
  }

  static external(
    message = 'External service unavailable',
    meta?: Record<string, unknown>
  ): ApiError {
    return new ApiError(ErrorCode.EXTERNAL_SERVICE_ERROR, message, { meta });
  }

  static internal(message = 'Internal server error'): ApiError {
    return new ApiError(ErrorCode.INTERNAL_ERROR, message, {
      isOperational: false,
    });
  }

  static database(message = 'Database error'): ApiError {
    return new ApiError(ErrorCode.DATABASE_ERROR, message);
  }

  static rateLimitExceeded(
    message = 'Rate limit exceeded',
    code: ErrorCode = ErrorCode.RATE_LIMIT_EXCEEDED
  ): ApiError {
    return new ApiError(code, message);
  }
}

/**
 * Narrow an unknown rejection to an ApiError with a given code
 */
export const isApiError = (error: unknown, code?: ErrorCode): error is ApiError =>
  error instanceof ApiError && (code === undefined || error.errorCode === code);
