export class SQLWeaveError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'SQLWeaveError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends SQLWeaveError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

export type QueryBuildErrorCode = 'MISSING_TABLE' | 'UNRESOLVED_PLACEHOLDER';

export class QueryBuildError extends SQLWeaveError {
  constructor(
    message: string,
    public override code: QueryBuildErrorCode,
    public sql?: string,
    cause?: Error,
  ) {
    super(message, code, cause);
    this.name = 'QueryBuildError';
  }
}

export class UnsupportedDialectError extends SQLWeaveError {
  constructor(public dialect: string, cause?: Error) {
    super(`Unsupported dialect: ${dialect}`, 'UNSUPPORTED_DIALECT', cause);
    this.name = 'UnsupportedDialectError';
  }
}
