/**
 * Structured error codes, API error bodies and the error classes thrown by the scanner
 *
 * Error code format: CATEGORY_SPECIFIC_ERROR
 * Categories:
 * - AUTH: Authentication errors
 * - VALIDATION: Input and configuration validation errors
 * - STORE: History persistence errors
 * - INTERNAL: Internal server errors
 */

export const ErrorCode = {
  // Authentication (401)
  AUTH_INVALID_KEY: 'AUTH_INVALID_KEY',

  // Validation (400)
  VALIDATION_EMPTY_TARGETS: 'VALIDATION_EMPTY_TARGETS',
  VALIDATION_INVALID_DOMAIN: 'VALIDATION_INVALID_DOMAIN',
  VALIDATION_INVALID_OPTION: 'VALIDATION_INVALID_OPTION',

  // Store (500)
  STORE_WRITE_FAILED: 'STORE_WRITE_FAILED',
  STORE_CLEAR_FAILED: 'STORE_CLEAR_FAILED',

  // Rate limiting (429)
  RESOURCE_RATE_LIMITED: 'RESOURCE_RATE_LIMITED',

  // Internal (500)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeType = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Structured API error response
 */
export interface ApiError {
  error: string;
  code: ErrorCodeType;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Create a structured error response
 */
export function createError(
  code: ErrorCodeType,
  error: string,
  options?: {
    message?: string;
    details?: Record<string, unknown>;
  }
): ApiError {
  return {
    error,
    code,
    ...(options?.message ? { message: options.message } : {}),
    ...(options?.details ? { details: options.details } : {}),
  };
}

/**
 * Common error responses
 */
export const Errors = {
  unauthorized: (message?: string) =>
    createError(ErrorCode.AUTH_INVALID_KEY, 'Unauthorized - Invalid or missing API key', { message }),

  rateLimited: () =>
    createError(ErrorCode.RESOURCE_RATE_LIMITED, 'Too many scan requests, please try again later'),

  internal: (message?: string) =>
    createError(ErrorCode.INTERNAL_ERROR, 'Internal server error', { message }),
} as const;

/**
 * Base class for errors the scanner raises on purpose. Anything else reaching the
 * API layer is treated as an internal error.
 */
export class ScannerError extends Error {
  readonly code: ErrorCodeType;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCodeType,
    message: string,
    options?: { details?: Record<string, unknown>; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ScannerError';
    this.code = code;
    this.details = options?.details;
  }

  toApiError(): ApiError {
    return createError(this.code, this.message, { details: this.details });
  }
}

/** Rejected input: target lists, request bodies, configuration overrides. */
export class ValidationError extends ScannerError {
  constructor(code: ErrorCodeType, message: string, details?: Record<string, unknown>) {
    super(code, message, { details });
    this.name = 'ValidationError';
  }
}

/** A history write or clear that did not complete. Previously persisted rows are untouched. */
export class StoreError extends ScannerError {
  constructor(code: ErrorCodeType, message: string, cause?: unknown) {
    super(code, message, { cause });
    this.name = 'StoreError';
  }
}
