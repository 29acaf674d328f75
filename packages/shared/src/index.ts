// ============================================
// Cachet Shared Types
// ============================================

// Error codes
export { ErrorCode, type ErrorSeverity, inferSeverity } from "./errors/index.js";
export type { ErrResult, OkResult, Result } from "./types/result.js";
// Result type (shared so every package reports failures the same way)
export { Err, Ok } from "./types/result.js";
