// ============================================
// querymemo Error Types
// ============================================

import { ErrorCode } from "@querymemo/shared";

export { ErrorCode };

/**
 * Options for creating a QueryMemoError.
 */
export interface QueryMemoErrorOptions {
  /** The underlying cause of this error */
  cause?: Error;
  /** Additional context about the error */
  context?: Record<string, unknown>;
  /** Override the retryability inferred from the code */
  isRetryable?: boolean;
}

/**
 * Codes whose failures may succeed when simply tried again.
 */
const RETRYABLE_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.REMOTE_UNREACHABLE,
  ErrorCode.REMOTE_TIMEOUT,
]);

/**
 * Base error class for all querymemo errors.
 */
export class QueryMemoError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  private readonly _isRetryable?: boolean;

  constructor(message: string, code: ErrorCode, options?: QueryMemoErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "QueryMemoError";
    this.code = code;
    this.context = options?.context;
    this._isRetryable = options?.isRetryable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get isRetryable(): boolean {
    return this._isRetryable ?? RETRYABLE_CODES.has(this.code);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isRetryable: this.isRetryable,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Rejected configuration. Nothing was changed when this is thrown.
 */
export class ConfigurationError extends QueryMemoError {
  readonly issues: string[];

  constructor(issues: string[], options?: { cause?: Error }) {
    super(`Invalid cache configuration: ${issues.join("; ")}`, ErrorCode.CONFIG_INVALID, {
      cause: options?.cause,
      context: { issues },
    });
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export type RemoteErrorCode =
  | ErrorCode.REMOTE_UNREACHABLE
  | ErrorCode.REMOTE_TIMEOUT
  | ErrorCode.REMOTE_BAD_REQUEST
  | ErrorCode.REMOTE_QUERY_FAILED
  | ErrorCode.REMOTE_INVALID_RESPONSE;

/**
 * The remote executor could not produce a result. Never cached.
 */
export class RemoteExecutionError extends QueryMemoError {
  declare readonly code: RemoteErrorCode;
  readonly endpointId: string;
  /** HTTP status, when the remote answered */
  readonly status?: number;

  constructor(
    code: RemoteErrorCode,
    message: string,
    options: { endpointId: string; status?: number; cause?: Error }
  ) {
    super(message, code, {
      cause: options.cause,
      context: { endpointId: options.endpointId, status: options.status },
    });
    this.name = "RemoteExecutionError";
    this.endpointId = options.endpointId;
    this.status = options.status;
  }
}

export type InvalidRequestCode = ErrorCode.QUERY_EMPTY | ErrorCode.FORMAT_NOT_FOUND;

/**
 * The request was refused before reaching the remote.
 */
export class InvalidRequestError extends QueryMemoError {
  declare readonly code: InvalidRequestCode;

  constructor(code: InvalidRequestCode, message: string, context?: Record<string, unknown>) {
    super(message, code, { context });
    this.name = "InvalidRequestError";
  }
}

/**
 * Every failure `CachingExecutor.execute` can report.
 */
export type ExecutionError = RemoteExecutionError | InvalidRequestError;

export function isRetryableError(error: unknown): boolean {
  return error instanceof QueryMemoError && error.isRetryable;
}
