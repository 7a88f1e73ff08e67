import { ErrorCode } from "./codes.js";
import { type ErrorSeverity, inferSeverity } from "./severity.js";

/**
 * Options for creating a CacheError.
 */
export interface CacheErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional context about the error */
  context?: Record<string, unknown>;
}

/**
 * Base error for everything the cache reports through `Err`.
 *
 * Severity is inferred from the code; retryability follows severity.
 */
export class CacheError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, options: CacheErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "CacheError";
    this.code = code;
    this.context = options.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CacheError);
    }
  }

  get severity(): ErrorSeverity {
    return inferSeverity(this.code);
  }

  get isRetryable(): boolean {
    return this.severity === "recoverable";
  }

  /**
   * Returns a JSON-serializable representation of this error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      codeName: ErrorCode[this.code],
      severity: this.severity,
      isRetryable: this.isRetryable,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

export function isCacheError(error: unknown): error is CacheError {
  return error instanceof CacheError;
}
