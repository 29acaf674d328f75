export {
  ConfigError,
  DecodeError,
  DerivationError,
  PoolClosedError,
  PoolExhaustedError,
  StoreError,
  type StoreErrorReason,
} from "./cache-errors.js";
export {
  AbortError,
  abortErrorFrom,
  CacheError,
  type CacheErrorOptions,
  ErrorCode,
  type ErrorSeverity,
  isCacheError,
  toError,
} from "./types.js";
