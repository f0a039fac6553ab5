/**
 * Centralized error type definitions for the contract evidence engine
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  INPUT_DEFECT = 'INPUT_DEFECT',
  PATTERN_PARSE_ERROR = 'PATTERN_PARSE_ERROR',
  REQUEST_TIMEOUT = 'REQUEST_TIMEOUT',
  EXTERNAL_SERVICE_ERROR = 'EXTERNAL_SERVICE_ERROR',
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Malformed or empty block list. Chunking for the document is aborted and no
 * partial chunk set is emitted.
 */
export class InputDefectError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.INPUT_DEFECT, 422, true, context);
  }
}

/**
 * A single chunk could not be parsed by an extraction pass.
 * Never fatal: the chunk is skipped and the candidate set continues.
 */
export class PatternParseError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.PATTERN_PARSE_ERROR, 500, true, context);
  }
}

export class ExternalServiceError extends AppError {
  constructor(service: string, message: string, context?: Record<string, unknown>) {
    super(
      `External service error (${service}): ${message}`,
      ErrorCode.EXTERNAL_SERVICE_ERROR,
      502,
      true,
      { service, ...context }
    );
  }
}

export class RequestTimeoutError extends AppError {
  constructor(message: string = 'Request timeout', context?: Record<string, unknown>) {
    super(message, ErrorCode.REQUEST_TIMEOUT, 408, true, context);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
