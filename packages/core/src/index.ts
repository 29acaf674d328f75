// ============================================
// Cachet Core
// ============================================

/**
 * @module @cachet/core
 *
 * Read-through HTTP response caching over a shared key-value store:
 * request fingerprinting, a bounded store connection pool, a versioned
 * entry codec, and per-key coalescing of concurrent misses.
 */

// ============================================
// Codec
// ============================================
export {
  type CacheEntry,
  decodeEntry,
  ENTRY_FORMAT_VERSION,
  encodeEntry,
  isFresh,
  remainingTtlMs,
} from "./codec/index.js";

// ============================================
// Config
// ============================================
export {
  type Config,
  type ConfigErrorCode,
  type ConfigLoadError,
  ConfigSchema,
  deepMerge,
  findProjectConfig,
  type LoadConfigOptions,
  loadConfig,
  type PartialConfig,
  parseConfig,
  parseEnvConfig,
} from "./config/index.js";

// ============================================
// Factory
// ============================================
export {
  type CreateResponseCacheOptions,
  createResponseCache,
  type ResponseCacheRuntime,
} from "./create-response-cache.js";

// ============================================
// Errors
// ============================================
export {
  AbortError,
  CacheError,
  type CacheErrorOptions,
  ConfigError,
  DecodeError,
  DerivationError,
  ErrorCode,
  type ErrorSeverity,
  isCacheError,
  PoolClosedError,
  PoolExhaustedError,
  StoreError,
  type StoreErrorReason,
} from "./errors/index.js";

// ============================================
// Keys
// ============================================
export {
  type CacheKey,
  canonicalJson,
  DEFAULT_KEY_OPTIONS,
  deriveCacheKey,
  type KeyDerivationOptions,
  KeyDeriver,
} from "./key/index.js";

// ============================================
// Logger
// ============================================
export {
  ConsoleTransport,
  createLogger,
  type CreateLoggerOptions,
  createSilentLogger,
  JsonTransport,
  type LogEntry,
  Logger,
  type LogLevel,
  type LogTransport,
} from "./logger/index.js";

// ============================================
// Middleware
// ============================================
export {
  type CachedResponse,
  CachePolicy,
  type CachePolicyOptions,
  type CacheRequest,
  type CacheStats,
  type CacheStatus,
  type HandleOptions,
  type HandlerResponse,
  type HeaderEntries,
  InFlightRegistry,
  type RequestHandler,
  ResponseCache,
  type ResponseCacheOptions,
  type ServedResponse,
} from "./middleware/index.js";

// ============================================
// Pool
// ============================================
export {
  type ConnectionFactory,
  ConnectionPool,
  type ConnectionPoolOptions,
  Lease,
  type PoolStats,
} from "./pool/index.js";

// ============================================
// Store
// ============================================
export {
  createMemoryConnectionFactory,
  createRedisConnectionFactory,
  MemoryStore,
  MemoryStoreConnection,
  RedisConnection,
  StoreClient,
  type StoreClientOptions,
  type StoreConnection,
} from "./store/index.js";
