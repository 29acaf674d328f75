export {
  createMemoryConnectionFactory,
  MemoryStore,
  MemoryStoreConnection,
  type MemoryStoreOptions,
} from "./memory-store.js";
export {
  createRedisConnectionFactory,
  RedisConnection,
  type RedisConnectionOptions,
  toStoreError,
} from "./redis-connection.js";
export { StoreClient, type StoreClientOptions } from "./store-client.js";
export type { StoreConnection, StoreOperation } from "./types.js";
