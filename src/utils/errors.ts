/**
 * Centralized error classification and handling for the reqclarity MCP server.
 *
 * Provides:
 * - Custom error classes with error codes
 * - Error classification for HTTP-like responses
 * - Structured error responses for MCP tools
 */

import { ZodError } from 'zod';

/**
 * Error codes for programmatic error handling.
 */
export const ErrorCode = {
  // Client errors (4xx equivalent)
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_ARGUMENTS: 'INVALID_ARGUMENTS',
  NOT_FOUND: 'NOT_FOUND',

  // Server errors (5xx equivalent)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  INITIALIZATION_ERROR: 'INITIALIZATION_ERROR',
  STORAGE_ERROR: 'STORAGE_ERROR',

  // Tool-specific errors
  UNKNOWN_TOOL: 'UNKNOWN_TOOL',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * HTTP-like status codes for error responses
 */
export const HttpStatus = {
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;

/**
 * Base error class with error code support
 */
export class ReqClarityError extends Error {
  public readonly code: ErrorCodeType;
  public readonly httpStatus: number;
  public readonly details: Record<string, unknown> | undefined;
  public readonly isRetryable: boolean;

  constructor(
    message: string,
    code: ErrorCodeType,
    options?: {
      httpStatus?: number;
      details?: Record<string, unknown> | undefined;
      isRetryable?: boolean;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'ReqClarityError';
    this.code = code;
    this.httpStatus = options?.httpStatus ?? this.defaultHttpStatus(code);
    this.details = options?.details;
    this.isRetryable = options?.isRetryable ?? false;
  }

  private defaultHttpStatus(code: ErrorCodeType): number {
    switch (code) {
      case ErrorCode.VALIDATION_ERROR:
      case ErrorCode.INVALID_ARGUMENTS:
        return HttpStatus.UNPROCESSABLE_ENTITY;
      case ErrorCode.UNKNOWN_TOOL:
        return HttpStatus.BAD_REQUEST;
      case ErrorCode.NOT_FOUND:
        return HttpStatus.NOT_FOUND;
      case ErrorCode.INITIALIZATION_ERROR:
        return HttpStatus.SERVICE_UNAVAILABLE;
      default:
        return HttpStatus.INTERNAL_SERVER_ERROR;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      error: true,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      isRetryable: this.isRetryable,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Error thrown when a requested resource is not found
 */
export class NotFoundError extends ReqClarityError {
  constructor(
    resourceType: string,
    resourceId: string,
    details?: Record<string, unknown>
  ) {
    super(`${resourceType} not found: ${resourceId}`, ErrorCode.NOT_FOUND, {
      details: {
        resourceType,
        resourceId,
        ...details,
      },
    });
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when validation fails
 */
export class ValidationError extends ReqClarityError {
  constructor(
    message: string,
    validationErrors?: Array<{ path: string; message: string }>
  ) {
    const details = validationErrors ? { errors: validationErrors } : undefined;
    super(message, ErrorCode.VALIDATION_ERROR, { details });
    this.name = 'ValidationError';
  }

  static fromZodError(error: ZodError): ValidationError {
    const validationErrors = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return new ValidationError(
      `Validation failed: ${validationErrors.map((e) => e.message).join(', ')}`,
      validationErrors
    );
  }
}

/**
 * Error thrown when the analyzer cannot be set up: the tokenizer could not be
 * prepared, the training corpus is degenerate, or lexicon data is invalid.
 * Fatal to the analyzer handle being built.
 */
export class InitializationError extends ReqClarityError {
  constructor(
    component: string,
    message: string,
    options?: { details?: Record<string, unknown>; cause?: unknown }
  ) {
    super(`Initialization failed (${component}): ${message}`, ErrorCode.INITIALIZATION_ERROR, {
      details: { component, ...options?.details },
      cause: options?.cause,
    });
    this.name = 'InitializationError';
  }
}

/**
 * Classify an error and return an appropriate ReqClarityError.
 */
export function classifyError(error: unknown): ReqClarityError {
  if (error instanceof ReqClarityError) {
    return error;
  }

  if (error instanceof ZodError) {
    return ValidationError.fromZodError(error);
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (message.includes('not found')) {
      return new ReqClarityError(error.message, ErrorCode.NOT_FOUND, {
        cause: error,
      });
    }

    if (
      message.includes('invalid') ||
      message.includes('required') ||
      message.includes('must be')
    ) {
      return new ReqClarityError(error.message, ErrorCode.VALIDATION_ERROR, {
        cause: error,
      });
    }

    if (message.includes('sqlite') || message.includes('database')) {
      // A locked or busy database clears once the other writer finishes
      return new ReqClarityError(error.message, ErrorCode.STORAGE_ERROR, {
        cause: error,
        isRetryable: message.includes('busy') || message.includes('locked'),
      });
    }

    return new ReqClarityError(error.message, ErrorCode.INTERNAL_ERROR, {
      cause: error,
    });
  }

  return new ReqClarityError('An unexpected error occurred', ErrorCode.INTERNAL_ERROR, {
    details: { originalError: String(error) },
  });
}

/**
 * Create a structured error response for MCP tools.
 */
export function createErrorResponse(
  error: unknown,
  requestId?: string
): Record<string, unknown> {
  const classified = classifyError(error);
  return {
    ...classified.toJSON(),
    ...(requestId && { requestId }),
  };
}
