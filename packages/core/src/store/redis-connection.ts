import { commandOptions, createClient, ErrorReply } from "redis";
import { StoreError } from "../errors/index.js";
import type { Logger } from "../logger/index.js";
import type { ConnectionFactory } from "../pool/index.js";
import type { StoreConnection, StoreOperation } from "./types.js";

export interface RedisConnectionOptions {
  url: string;
  connectTimeoutMs: number;
}

function openClient(options: RedisConnectionOptions) {
  return createClient({
    url: options.url,
    socket: { connectTimeout: options.connectTimeoutMs, reconnectStrategy: false },
  });
}

type RedisClient = ReturnType<typeof openClient>;

/**
 * Map a node-redis failure to a StoreError reason.
 */
export function toStoreError(error: unknown, operation: StoreOperation | "connect"): StoreError {
  if (error instanceof StoreError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  // Error replies ("ERR …", "WRONGTYPE …") mean the server answered; anything else is transport.
  const reason = error instanceof ErrorReply ? "protocol" : "connection";
  return new StoreError(reason, `Redis ${operation} failed: ${message}`, {
    cause: error,
    operation,
  });
}

/**
 * StoreConnection over a dedicated node-redis client.
 *
 * The client never reconnects on its own: a dropped socket leaves it closed,
 * the pool's validate() discards it, and a fresh one is opened on demand.
 */
export class RedisConnection implements StoreConnection {
  constructor(private readonly client: RedisClient) {}

  get isOpen(): boolean {
    return this.client.isReady;
  }

  async get(key: string): Promise<Uint8Array | null> {
    try {
      return await this.client.get(commandOptions({ returnBuffers: true }), key);
    } catch (error) {
      throw toStoreError(error, "get");
    }
  }

  async set(key: string, value: Uint8Array, ttlMs: number): Promise<void> {
    try {
      await this.client.set(key, Buffer.from(value.buffer, value.byteOffset, value.byteLength), {
        PX: ttlMs,
      });
    } catch (error) {
      throw toStoreError(error, "set");
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      return (await this.client.del(key)) > 0;
    } catch (error) {
      throw toStoreError(error, "delete");
    }
  }

  async ping(): Promise<void> {
    try {
      await this.client.ping();
    } catch (error) {
      throw toStoreError(error, "ping");
    }
  }

  /**
   * QUIT waits behind commands already sent, so a connection that may have one
   * hanging is dropped with disconnect() instead.
   */
  async close(force = false): Promise<void> {
    if (!this.client.isOpen) return;
    if (force) {
      await this.client.disconnect();
    } else {
      await this.client.quit();
    }
  }
}

/**
 * Pool factory opening one Redis client per pooled connection.
 */
export function createRedisConnectionFactory(
  options: RedisConnectionOptions,
  logger: Logger
): ConnectionFactory<StoreConnection> {
  return {
    async create() {
      const client = openClient(options);
      client.on("error", (error: unknown) => {
        logger.warn("Redis client error", error);
      });
      try {
        await client.connect();
      } catch (error) {
        throw toStoreError(error, "connect");
      }
      logger.debug("Opened store connection", { url: options.url });
      return new RedisConnection(client);
    },
    destroy: (connection, broken) => connection.close(broken),
    validate: (connection) => connection.isOpen,
  };
}
