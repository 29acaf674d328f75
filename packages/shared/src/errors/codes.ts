// ============================================
// Cachet Error Codes
// ============================================

/**
 * Centralized error codes for the caching layer.
 * Error code ranges:
 * - 1xxx: Configuration errors
 * - 2xxx: Store and connection pool errors
 * - 3xxx: Cache pipeline errors (key derivation, entry codec)
 * - 5xxx: System errors
 */
export enum ErrorCode {
  // Configuration Errors (1xxx)
  CONFIG_INVALID = 1001,
  CONFIG_NOT_FOUND = 1002,
  CONFIG_PARSE_ERROR = 1003,

  // Store / Pool Errors (2xxx)
  STORE_TIMEOUT = 2001,
  STORE_CONNECTION = 2002,
  STORE_PROTOCOL = 2003,
  STORE_CLOSED = 2004,
  POOL_EXHAUSTED = 2101,
  POOL_CLOSED = 2102,

  // Cache Pipeline Errors (3xxx)
  KEY_DERIVATION_FAILED = 3001,
  ENTRY_DECODE_FAILED = 3002,

  // System Errors (5xxx)
  ABORTED = 5001,
}
