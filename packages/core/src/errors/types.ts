// ============================================
// Cachet Error Types
// ============================================

import { ErrorCode, type ErrorSeverity, inferSeverity } from "@cachet/shared";

export { ErrorCode, type ErrorSeverity };

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
 * Base error class for all caching-layer errors.
 *
 * Provides:
 * - Categorized error codes
 * - Automatic severity inference
 * - Error cause chaining
 * - Additional context
 */
export class CacheError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, options?: CacheErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "CacheError";
    this.code = code;
    this.context = options?.context;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * The severity level of this error, inferred from the error code.
   */
  get severity(): ErrorSeverity {
    return inferSeverity(this.code);
  }

  /**
   * Returns a JSON-serializable representation of this error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Error thrown when a caller stops waiting because its AbortSignal fired.
 */
export class AbortError extends CacheError {
  constructor(message = "Operation aborted", options?: CacheErrorOptions) {
    super(message, ErrorCode.ABORTED, options);
    this.name = "AbortError";
  }
}

/**
 * Type guard for CacheError instances.
 */
export function isCacheError(error: unknown): error is CacheError {
  return error instanceof CacheError;
}

/**
 * Build the error to reject with when `signal` is aborted.
 * Keeps the signal's own reason when it is already an Error.
 */
export function abortErrorFrom(signal: AbortSignal): AbortError {
  const reason: unknown = signal.reason;
  if (reason instanceof AbortError) {
    return reason;
  }
  return new AbortError("Operation aborted", { cause: reason });
}

/**
 * Normalize an unknown thrown value to an Error instance.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(describeThrown(value));
}

function describeThrown(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    try {
      return JSON.stringify(value);
    } catch {
      // Circular or BigInt-bearing objects
      return String(value);
    }
  }
  return String(value);
}
