import { CacheError, ErrorCode } from "./types.js";

// =============================================================================
// Key Derivation
// =============================================================================

/**
 * The request could not be fingerprinted. The middleware serves such a request
 * without touching the cache.
 */
export class DerivationError extends CacheError {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super(message, ErrorCode.KEY_DERIVATION_FAILED, options);
    this.name = "DerivationError";
  }
}

// =============================================================================
// Connection Pool
// =============================================================================

export class PoolExhaustedError extends CacheError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, poolSize: number) {
    super(
      `No store connection became available within ${timeoutMs}ms (pool size ${poolSize})`,
      ErrorCode.POOL_EXHAUSTED,
      { context: { timeoutMs, poolSize } }
    );
    this.name = "PoolExhaustedError";
    this.timeoutMs = timeoutMs;
  }
}

export class PoolClosedError extends CacheError {
  constructor() {
    super("Connection pool is closed", ErrorCode.POOL_CLOSED);
    this.name = "PoolClosedError";
  }
}

// =============================================================================
// Store Transport
// =============================================================================

/**
 * Reason codes for store transport failures.
 */
export type StoreErrorReason = "timeout" | "connection" | "protocol" | "closed";

const REASON_CODES: Record<StoreErrorReason, ErrorCode> = {
  timeout: ErrorCode.STORE_TIMEOUT,
  connection: ErrorCode.STORE_CONNECTION,
  protocol: ErrorCode.STORE_PROTOCOL,
  closed: ErrorCode.STORE_CLOSED,
};

/**
 * Any transport-level failure talking to the backing store.
 * Callers only see the reason code; the transport error is kept as `cause`.
 */
export class StoreError extends CacheError {
  readonly reason: StoreErrorReason;
  readonly operation?: string;

  constructor(
    reason: StoreErrorReason,
    message: string,
    options?: { cause?: unknown; operation?: string }
  ) {
    super(message, REASON_CODES[reason], {
      cause: options?.cause,
      context: options?.operation ? { operation: options.operation } : undefined,
    });
    this.name = "StoreError";
    this.reason = reason;
    this.operation = options?.operation;
  }
}

// =============================================================================
// Entry Codec
// =============================================================================

export class DecodeError extends CacheError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.ENTRY_DECODE_FAILED, { context });
    this.name = "DecodeError";
  }
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Configuration could not be found, parsed, or validated.
 */
export class ConfigError extends CacheError {
  constructor(
    message: string,
    code: ErrorCode.CONFIG_INVALID | ErrorCode.CONFIG_NOT_FOUND | ErrorCode.CONFIG_PARSE_ERROR,
    options?: { cause?: unknown; path?: string }
  ) {
    super(message, code, {
      cause: options?.cause,
      context: options?.path ? { path: options.path } : undefined,
    });
    this.name = "ConfigError";
  }
}
