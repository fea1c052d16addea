export class DatabaseError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'DatabaseError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class DBVersionError extends DatabaseError {
  constructor(message: string, public override code?: string, public override cause?: Error) {
    super(message, code, cause);
    this.name = 'DBVersionError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConnectionError extends DBVersionError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONNECTION_ERROR', cause);
    this.name = 'ConnectionError';
  }
}

export class QueryError extends DBVersionError {
  constructor(
    message: string,
    public sql?: string,
    public params?: unknown[],
    cause?: Error,
  ) {
    super(message, 'QUERY_ERROR', cause);
    this.name = 'QueryError';
  }
}

export class TransactionError extends DBVersionError {
  constructor(message: string, public transactionId?: string, cause?: Error) {
    super(message, 'TRANSACTION_ERROR', cause);
    this.name = 'TransactionError';
  }
}

export class ValidationError extends DBVersionError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

export class UnknownDialectError extends DBVersionError {
  constructor(public dialect: string) {
    super(`"${dialect}": unknown dialect`, 'UNKNOWN_DIALECT');
    this.name = 'UnknownDialectError';
  }
}

/**
 * Raised when one step of a backend's post-creation bootstrap fails.
 * The remaining steps are not attempted.
 */
export class AuxiliarySetupError extends DBVersionError {
  constructor(public dialect: string, public step: string, cause?: Error) {
    super(
      `${dialect} auxiliary setup failed at step "${step}"${cause ? `: ${cause.message}` : ''}`,
      'AUX_SETUP_ERROR',
      cause,
    );
    this.name = 'AuxiliarySetupError';
  }
}

/**
 * Normalize anything thrown into an Error so it can travel as a `cause`.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
