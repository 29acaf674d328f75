import { type Config, type ConfigErrorCode, type LoadConfigOptions, loadConfig } from "./config/index.js";
import { ConfigError, ErrorCode } from "./errors/index.js";
import { createLogger, type Logger } from "./logger/index.js";
import { ResponseCache, type RequestHandler } from "./middleware/index.js";
import { type ConnectionFactory, ConnectionPool } from "./pool/index.js";
import { createRedisConnectionFactory, StoreClient, type StoreConnection } from "./store/index.js";

export interface CreateResponseCacheOptions extends LoadConfigOptions {
  handler: RequestHandler;
  /** Where pooled connections come from (default: Redis at `store.url`) */
  connections?: ConnectionFactory<StoreConnection>;
  /** Defaults to a console logger at the configured level */
  logger?: Logger;
  now?: () => number;
}

/**
 * A configured cache and the resources behind it.
 */
export interface ResponseCacheRuntime {
  readonly cache: ResponseCache;
  readonly config: Config;
  readonly pool: ConnectionPool<StoreConnection>;
  readonly store: StoreClient;
  readonly logger: Logger;
  /** Close the pool; in-flight operations finish and their connections are destroyed */
  close(): Promise<void>;
}

const CONFIG_ERROR_CODES: Record<ConfigErrorCode, ConstructorParameters<typeof ConfigError>[1]> = {
  FILE_NOT_FOUND: ErrorCode.CONFIG_NOT_FOUND,
  READ_ERROR: ErrorCode.CONFIG_NOT_FOUND,
  PARSE_ERROR: ErrorCode.CONFIG_PARSE_ERROR,
  VALIDATION_ERROR: ErrorCode.CONFIG_INVALID,
};

/**
 * Load configuration and wire logger, pool, store client and middleware.
 *
 * @throws ConfigError when configuration cannot be loaded or is invalid
 *
 * @example
 * ```typescript
 * const runtime = createResponseCache({ handler: render });
 * const response = await runtime.cache.handle({ method: "GET", url: "/items/42" });
 * await runtime.close();
 * ```
 */
export function createResponseCache(options: CreateResponseCacheOptions): ResponseCacheRuntime {
  const loaded = loadConfig(options);
  if (!loaded.ok) {
    throw new ConfigError(loaded.error.message, CONFIG_ERROR_CODES[loaded.error.code], {
      cause: loaded.error.cause,
      path: loaded.error.path,
    });
  }
  const config = loaded.value;

  const logger = options.logger ?? createLogger({ level: config.logLevel });
  const connections =
    options.connections ??
    createRedisConnectionFactory(
      { url: config.store.url, connectTimeoutMs: config.store.connectTimeoutMs },
      logger.child({ component: "redis" })
    );

  const pool = new ConnectionPool(connections, {
    size: config.pool.size,
    acquireTimeoutMs: config.pool.acquireTimeoutMs,
    logger: logger.child({ component: "pool" }),
  });
  const store = new StoreClient(pool, {
    operationTimeoutMs: config.operationTimeoutMs,
    logger: logger.child({ component: "store" }),
  });
  const cache = new ResponseCache({
    store,
    handler: options.handler,
    keys: { ...config.keys, keyPrefix: config.store.keyPrefix },
    policy: config.policy,
    defaultTtlMs: config.defaultTtlMs,
    cacheStatusHeader: config.cacheStatusHeader,
    logger,
    now: options.now,
  });

  logger.debug("Response cache ready", {
    poolSize: config.pool.size,
    keyPrefix: config.store.keyPrefix,
  });

  return {
    cache,
    config,
    pool,
    store,
    logger,
    close: () => pool.close(),
  };
}
