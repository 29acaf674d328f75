/**
 * Error Severity Types
 *
 * Shared severity definitions for the error system.
 *
 * @module @cachet/shared/errors/severity
 */

import { ErrorCode } from "./codes.js";

// =============================================================================
// Severity Types
// =============================================================================

/**
 * Error severity levels as string literals.
 */
export type ErrorSeverity = "low" | "medium" | "high";

/**
 * Infers the appropriate severity level from an error code.
 *
 * Severity mapping:
 * - low: Transient store faults; the request is served without cache
 * - medium: Per-request pipeline failures (bad input, corrupt entry)
 * - high: Configuration problems that need an operator
 *
 * @param code - The error code to infer severity from
 * @returns The inferred severity level
 */
export function inferSeverity(code: ErrorCode): ErrorSeverity {
  switch (code) {
    // ═══════════════════════════════════════════
    // Low severity - Transient, degrades to bypass
    // ═══════════════════════════════════════════
    case ErrorCode.STORE_TIMEOUT:
    case ErrorCode.STORE_CONNECTION:
    case ErrorCode.POOL_EXHAUSTED:
    case ErrorCode.ABORTED:
      return "low";

    // ═══════════════════════════════════════════
    // Medium severity - Per-request, recoverable
    // ═══════════════════════════════════════════
    case ErrorCode.STORE_PROTOCOL:
    case ErrorCode.STORE_CLOSED:
    case ErrorCode.POOL_CLOSED:
    case ErrorCode.KEY_DERIVATION_FAILED:
    case ErrorCode.ENTRY_DECODE_FAILED:
      return "medium";

    // ═══════════════════════════════════════════
    // High severity - Requires attention
    // ═══════════════════════════════════════════
    case ErrorCode.CONFIG_INVALID:
    case ErrorCode.CONFIG_NOT_FOUND:
    case ErrorCode.CONFIG_PARSE_ERROR:
      return "high";

    // Default to high for unknown codes
    default:
      return "high";
  }
}
