/**
 * Error Codes for the ledger API
 *
 * Categorized by error type:
 * - 1xxx: Authentication errors
 * - 2xxx: Validation errors
 * - 3xxx: Business logic errors
 * - 4xxx: Rate limiting errors
 * - 5xxx: System and collaborator errors
 */

export enum ErrorCode {
  // Authentication errors (1xxx)
  UNAUTHORIZED = 1001,
  INVALID_TOKEN = 1002,
  TOKEN_EXPIRED = 1003,
  FORBIDDEN = 1004,
  USER_BANNED = 1005,

  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,
  INVALID_INPUT = 2003,
  INVALID_VOUCHER_CODE = 2004,
  INVALID_INSTALLATION_ID = 2005,

  // Business errors (3xxx)
  INSUFFICIENT_BALANCE = 3001,
  USER_NOT_FOUND = 3002,
  TRANSACTION_NOT_FOUND = 3003,
  DUPLICATE_TRANSACTION = 3004,
  UNKNOWN_PACKAGE = 3005,
  VOUCHER_NOT_FOUND = 3006,
  VOUCHER_ALREADY_USED = 3007,
  VOUCHER_EXPIRED = 3008,
  VOUCHER_ALREADY_REDEEMED_BY_USER = 3009,
  DUPLICATE_VOUCHER_CODE = 3010,
  DEPOSIT_NOT_FOUND = 3011,
  DEPOSIT_UNCONFIRMED = 3012,
  DEPOSIT_WRONG_ASSET = 3013,
  DEPOSIT_WRONG_RECIPIENT = 3014,
  DEPOSIT_BELOW_MINIMUM = 3015,
  DEPOSIT_ALREADY_USED = 3016,
  NO_ACTIVE_RESERVATION = 3017,
  AMOUNT_MISMATCH = 3018,
  CID_REQUEST_NOT_FOUND = 3019,
  INVALID_STATE_TRANSITION = 3020,
  RESOURCE_NOT_FOUND = 3021,

  // Rate limiting errors (4xxx)
  RATE_LIMIT_EXCEEDED = 4001,
  TOO_MANY_DEPOSIT_CHECKS = 4002,
  TOO_MANY_CID_REQUESTS = 4003,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  DATABASE_ERROR = 5002,
  REDIS_ERROR = 5003,
  EVENT_BUS_ERROR = 5004,
  EXTERNAL_SERVICE_ERROR = 5005,
  RECONCILIATION_REQUIRED = 5006,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  // Auth errors -> 401/403
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.INVALID_TOKEN]: 401,
  [ErrorCode.TOKEN_EXPIRED]: 401,
  [ErrorCode.FORBIDDEN]: 403,
  [ErrorCode.USER_BANNED]: 403,

  // Validation errors -> 400
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,
  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.INVALID_VOUCHER_CODE]: 400,
  [ErrorCode.INVALID_INSTALLATION_ID]: 400,

  // Business errors -> 400/404/409/410
  [ErrorCode.INSUFFICIENT_BALANCE]: 400,
  [ErrorCode.USER_NOT_FOUND]: 404,
  [ErrorCode.TRANSACTION_NOT_FOUND]: 404,
  [ErrorCode.DUPLICATE_TRANSACTION]: 409,
  [ErrorCode.UNKNOWN_PACKAGE]: 404,
  [ErrorCode.VOUCHER_NOT_FOUND]: 404,
  [ErrorCode.VOUCHER_ALREADY_USED]: 409,
  [ErrorCode.VOUCHER_EXPIRED]: 410,
  [ErrorCode.VOUCHER_ALREADY_REDEEMED_BY_USER]: 409,
  [ErrorCode.DUPLICATE_VOUCHER_CODE]: 409,
  [ErrorCode.DEPOSIT_NOT_FOUND]: 404,
  [ErrorCode.DEPOSIT_UNCONFIRMED]: 409,
  [ErrorCode.DEPOSIT_WRONG_ASSET]: 400,
  [ErrorCode.DEPOSIT_WRONG_RECIPIENT]: 400,
  [ErrorCode.DEPOSIT_BELOW_MINIMUM]: 400,
  [ErrorCode.DEPOSIT_ALREADY_USED]: 409,
  [ErrorCode.NO_ACTIVE_RESERVATION]: 404,
  [ErrorCode.AMOUNT_MISMATCH]: 400,
  [ErrorCode.CID_REQUEST_NOT_FOUND]: 404,
  [ErrorCode.INVALID_STATE_TRANSITION]: 409,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,

  // Rate limiting errors -> 429
  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,
  [ErrorCode.TOO_MANY_DEPOSIT_CHECKS]: 429,
  [ErrorCode.TOO_MANY_CID_REQUESTS]: 429,

  // System errors -> 500/502/503
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.DATABASE_ERROR]: 503,
  [ErrorCode.REDIS_ERROR]: 503,
  [ErrorCode.EVENT_BUS_ERROR]: 503,
  [ErrorCode.EXTERNAL_SERVICE_ERROR]: 502,
  [ErrorCode.RECONCILIATION_REQUIRED]: 500,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, string[]>;
    meta?: Record<string, unknown>;
    timestamp: string;
    correlationId?: string;
  };
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T = unknown> {
  success: true;
  data: T;
}

/**
 * API Response type
 */
export type ApiResponse<T = unknown> = SuccessResponse<T> | ErrorResponse;
