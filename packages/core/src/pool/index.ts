export {
  type ConnectionFactory,
  ConnectionPool,
  type ConnectionPoolOptions,
  Lease,
  type PoolStats,
} from "./connection-pool.js";
