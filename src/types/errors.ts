/**
 * Error Codes for the ChannelCast API
 *
 * Categorized by error type:
 * - 1xxx: Authentication errors
 * - 2xxx: Validation errors
 * - 3xxx: Business logic errors
 * - 4xxx: Rate limiting errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Authentication errors (1xxx)
  UNAUTHORIZED = 1001,
  INVALID_TOKEN = 1002,
  TOKEN_EXPIRED = 1003,
  FORBIDDEN = 1004,

  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_DURATION = 2002,
  INVALID_CHANNELS = 2003,

  // Business errors (3xxx)
  ORDER_NOT_FOUND = 3001,
  CAMPAIGN_NOT_FOUND = 3002,
  TRANSACTION_NOT_FOUND = 3003,
  POST_NOT_FOUND = 3004,
  INVALID_STATE_TRANSITION = 3005,
  ORDER_NOT_CANCELLABLE = 3006,
  TRANSACTION_ALREADY_RESOLVED = 3007,
  RESOURCE_NOT_FOUND = 3008,

  // Rate limiting errors (4xxx)
  RATE_LIMIT_EXCEEDED = 4001,
  TOO_MANY_ORDERS = 4002,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  DATABASE_ERROR = 5002,
  REFERENCE_CODE_EXHAUSTED = 5003,
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

  // Validation errors -> 400
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_DURATION]: 400,
  [ErrorCode.INVALID_CHANNELS]: 400,

  // Business errors -> 404/409
  [ErrorCode.ORDER_NOT_FOUND]: 404,
  [ErrorCode.CAMPAIGN_NOT_FOUND]: 404,
  [ErrorCode.TRANSACTION_NOT_FOUND]: 404,
  [ErrorCode.POST_NOT_FOUND]: 404,
  [ErrorCode.INVALID_STATE_TRANSITION]: 409,
  [ErrorCode.ORDER_NOT_CANCELLABLE]: 409,
  [ErrorCode.TRANSACTION_ALREADY_RESOLVED]: 409,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,

  // Rate limiting errors -> 429
  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,
  [ErrorCode.TOO_MANY_ORDERS]: 429,

  // System errors -> 500/503
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.DATABASE_ERROR]: 503,
  [ErrorCode.REFERENCE_CODE_EXHAUSTED]: 503,
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
    timestamp: string;
    correlationId?: string;
  };
}
