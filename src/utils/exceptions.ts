/**
 * Error codes so callers (and the CLI exit path) can distinguish error types.
 */
export const ErrorCode = {
  // Generic errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // Table engine
  SCHEMA_MISMATCH: 'SCHEMA_MISMATCH',

  // Scoring
  UNSUPPORTED_POSITION: 'UNSUPPORTED_POSITION',

  // Identity resolution
  NO_MATCH: 'NO_MATCH',

  // Stats provider
  EXTERNAL_API_ERROR: 'EXTERNAL_API_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for application exceptions
 */
export class AppException extends Error {
  constructor(
    message: string,
    public readonly exitCode: number,
    public readonly errorCode: ErrorCodeType = ErrorCode.UNKNOWN_ERROR
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when user input or configuration fails validation
 * (e.g., a malformed week range)
 */
export class ValidationException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.VALIDATION_ERROR) {
    super(message, 2, errorCode);
  }
}

/**
 * Thrown when a table operation meets incompatible column types or layouts.
 * Reconciliation runs before every union, so one escaping to the caller is a bug.
 */
export class SchemaError extends AppException {
  constructor(
    message: string,
    public readonly column?: string
  ) {
    super(message, 1, ErrorCode.SCHEMA_MISMATCH);
  }

  static typeMismatch(column: string, expected: string, actual: string): SchemaError {
    return new SchemaError(
      `Column "${column}" has type ${actual}, expected ${expected}`,
      column
    );
  }
}

/**
 * Thrown when a row's position has no scoring formula.
 * Aborts production of that row's table.
 */
export class UnsupportedPositionError extends AppException {
  constructor(public readonly position: string) {
    super(`No scoring formula for position "${position}"`, 1, ErrorCode.UNSUPPORTED_POSITION);
  }
}

/**
 * Soft error: a name query resolved to nothing. Logged and skipped, never thrown
 * out of a run on its own.
 */
export class NoMatchError extends AppException {
  constructor(
    public readonly query: string,
    public readonly kind: 'player' | 'team'
  ) {
    super(`No ${kind} found matching '${query}'`, 1, ErrorCode.NO_MATCH);
  }
}

/**
 * Thrown when a download from the stats provider fails.
 * Wraps the original error and provides context about the provider and operation.
 */
export class ExternalApiException extends AppException {
  public readonly originalError?: Error;
  public readonly apiName: string;
  public readonly operation: string;
  public readonly httpStatus?: number;

  constructor(
    apiName: string,
    operation: string,
    message: string,
    httpStatus?: number,
    originalError?: Error
  ) {
    super(`[${apiName}] ${operation}: ${message}`, 3, ErrorCode.EXTERNAL_API_ERROR);
    this.apiName = apiName;
    this.operation = operation;
    this.originalError = originalError;
    this.httpStatus = httpStatus;
  }

  /**
   * Creates an ExternalApiException from a caught error.
   */
  static fromError(
    apiName: string,
    operation: string,
    error: unknown,
    httpStatus?: number
  ): ExternalApiException {
    const originalError = error instanceof Error ? error : new Error(String(error));
    const message = originalError.message || 'Unknown error';
    return new ExternalApiException(apiName, operation, message, httpStatus, originalError);
  }

  /**
   * Creates an ExternalApiException for timeout errors.
   */
  static timeout(apiName: string, operation: string): ExternalApiException {
    return new ExternalApiException(apiName, operation, 'Request timed out', undefined, new Error('Timeout'));
  }
}
