import { LRUCache } from "lru-cache";
import { StoreError } from "../errors/index.js";
import type { ConnectionFactory } from "../pool/index.js";
import type { StoreConnection } from "./types.js";

export interface MemoryStoreOptions {
  /** Entry capacity before least-recently-used eviction (default: 10_000) */
  maxEntries?: number;
}

/**
 * In-process key-value store with per-entry TTL.
 *
 * Stands in for Redis in tests and local development. Values are copied on
 * the way in and out, as they would be over a socket.
 */
export class MemoryStore {
  private readonly entries: LRUCache<string, Uint8Array>;

  constructor(options: MemoryStoreOptions = {}) {
    this.entries = new LRUCache<string, Uint8Array>({ max: options.maxEntries ?? 10_000 });
  }

  read(key: string): Uint8Array | null {
    const value = this.entries.get(key);
    return value ? new Uint8Array(value) : null;
  }

  write(key: string, value: Uint8Array, ttlMs: number): void {
    this.entries.set(key, new Uint8Array(value), { ttl: ttlMs });
  }

  remove(key: string): boolean {
    return this.entries.delete(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  connect(): MemoryStoreConnection {
    return new MemoryStoreConnection(this);
  }
}

/**
 * A "connection" to a MemoryStore. Subclass it to inject latency or faults.
 */
export class MemoryStoreConnection implements StoreConnection {
  private open = true;

  constructor(protected readonly store: MemoryStore) {}

  get isOpen(): boolean {
    return this.open;
  }

  async get(key: string): Promise<Uint8Array | null> {
    this.assertOpen();
    return this.store.read(key);
  }

  async set(key: string, value: Uint8Array, ttlMs: number): Promise<void> {
    this.assertOpen();
    this.store.write(key, value, ttlMs);
  }

  async delete(key: string): Promise<boolean> {
    this.assertOpen();
    return this.store.remove(key);
  }

  async ping(): Promise<void> {
    this.assertOpen();
  }

  async close(): Promise<void> {
    this.open = false;
  }

  protected assertOpen(): void {
    if (!this.open) {
      throw new StoreError("closed", "Connection is closed");
    }
  }
}

/**
 * Pool factory handing out connections to one shared MemoryStore.
 */
export function createMemoryConnectionFactory(
  store: MemoryStore,
  connect: (store: MemoryStore) => StoreConnection = (s) => s.connect()
): ConnectionFactory<StoreConnection> {
  return {
    create: async () => connect(store),
    destroy: (connection, broken) => connection.close(broken),
    validate: (connection) => connection.isOpen,
  };
}
