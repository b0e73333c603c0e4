/**
 * Error classes
 *
 * Every failure a tool call can end in has its own type so callers can
 * branch on `code` instead of matching message text.
 */

export type ErrorCode =
  | 'UNKNOWN_CONNECTION'
  | 'CONNECTION_FAILURE'
  | 'READ_ONLY_VIOLATION'
  | 'DANGEROUS_OPERATION'
  | 'SENSITIVE_ACCESS'
  | 'QUERY_TYPE_MISMATCH'
  | 'EXECUTION_FAILURE'
  | 'QUERY_CANCELLED'
  | 'RESULT_DECODE_FAILURE'
  | 'CONFIG_ERROR'
  | 'INVALID_ARGUMENTS';

/**
 * Base application error
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class UnknownConnectionError extends AppError {
  constructor(public readonly connection: string) {
    super(`unknown connection: ${connection}`, 'UNKNOWN_CONNECTION');
  }
}

/**
 * Opening or probing a pooled handle failed
 */
export class ConnectionFailureError extends AppError {
  constructor(
    public readonly connection: string,
    cause: unknown
  ) {
    super(`failed to connect to '${connection}': ${describeError(cause)}`, 'CONNECTION_FAILURE', {
      cause,
    });
  }
}

export class ReadOnlyViolationError extends AppError {
  constructor(message: string) {
    super(message, 'READ_ONLY_VIOLATION');
  }
}

export class DangerousOperationError extends AppError {
  constructor(message: string) {
    super(message, 'DANGEROUS_OPERATION');
  }
}

export class SensitiveAccessError extends AppError {
  constructor() {
    super('access to sensitive MySQL metadata is not allowed', 'SENSITIVE_ACCESS');
  }
}

export class QueryTypeMismatchError extends AppError {
  constructor(
    public readonly expected: string,
    public readonly detected: string
  ) {
    super(
      `query type mismatch: expected ${expected}, got ${detected}. Use the appropriate tool for this query type`,
      'QUERY_TYPE_MISMATCH'
    );
  }
}

/**
 * Driver-level failure while running a statement
 */
export class ExecutionFailureError extends AppError {
  constructor(message: string, cause?: unknown, code: ErrorCode = 'EXECUTION_FAILURE') {
    super(message, code, cause === undefined ? undefined : { cause });
  }

  static wrap(error: unknown): ExecutionFailureError {
    if (error instanceof ExecutionFailureError) return error;
    return new ExecutionFailureError(`query execution failed: ${describeError(error)}`, error);
  }
}

export class QueryCancelledError extends ExecutionFailureError {
  constructor() {
    super('query cancelled by caller', undefined, 'QUERY_CANCELLED');
  }
}

export class ResultDecodeError extends AppError {
  constructor(message: string) {
    super(`failed to decode result: ${message}`, 'RESULT_DECODE_FAILURE');
  }
}

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', cause === undefined ? undefined : { cause });
  }
}

export class InvalidArgumentsError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENTS');
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
