import { createSilentLogger } from "../../logger/index.js";
import { ConnectionPool } from "../../pool/index.js";
import { createMemoryConnectionFactory, MemoryStore, MemoryStoreConnection } from "../memory-store.js";
import { StoreClient } from "../store-client.js";
import type { StoreConnection, StoreOperation } from "../types.js";

/**
 * Shared, mutable behavior for every FakeConnection of one test.
 */
export interface StoreBehavior {
  /** When set, operations wait for it before touching the store */
  gate?: Promise<void>;
  /** When set, operations reject with it */
  fail?: Error;
  calls: Array<{ operation: StoreOperation; key?: string }>;
  active: number;
  maxActive: number;
}

export function createStoreBehavior(): StoreBehavior {
  return { calls: [], active: 0, maxActive: 0 };
}

/**
 * Close the returned gate over `behavior`; call the function to open it.
 */
export function closeGate(behavior: StoreBehavior): () => void {
  let open: () => void = () => undefined;
  behavior.gate = new Promise<void>((resolve) => {
    open = resolve;
  });
  return () => {
    behavior.gate = undefined;
    open();
  };
}

/**
 * MemoryStoreConnection with injectable latency and faults.
 */
export class FakeConnection extends MemoryStoreConnection {
  constructor(
    store: MemoryStore,
    private readonly behavior: StoreBehavior
  ) {
    super(store);
  }

  override get(key: string): Promise<Uint8Array | null> {
    return this.track("get", key, () => super.get(key));
  }

  override set(key: string, value: Uint8Array, ttlMs: number): Promise<void> {
    return this.track("set", key, () => super.set(key, value, ttlMs));
  }

  override delete(key: string): Promise<boolean> {
    return this.track("delete", key, () => super.delete(key));
  }

  override ping(): Promise<void> {
    return this.track("ping", undefined, () => super.ping());
  }

  private async track<R>(
    operation: StoreOperation,
    key: string | undefined,
    run: () => Promise<R>
  ): Promise<R> {
    this.behavior.calls.push({ operation, key });
    this.behavior.active++;
    this.behavior.maxActive = Math.max(this.behavior.maxActive, this.behavior.active);
    try {
      if (this.behavior.gate) {
        await this.behavior.gate;
      }
      if (this.behavior.fail) {
        throw this.behavior.fail;
      }
      return await run();
    } finally {
      this.behavior.active--;
    }
  }
}

export interface TestStackOptions {
  poolSize?: number;
  acquireTimeoutMs?: number;
  operationTimeoutMs?: number;
}

/**
 * MemoryStore behind a real pool and StoreClient, with fault injection.
 */
export function createTestStack(options: TestStackOptions = {}): {
  memory: MemoryStore;
  behavior: StoreBehavior;
  pool: ConnectionPool<StoreConnection>;
  client: StoreClient;
} {
  const memory = new MemoryStore();
  const behavior = createStoreBehavior();
  const pool = new ConnectionPool(
    createMemoryConnectionFactory(memory, (store) => new FakeConnection(store, behavior)),
    {
      size: options.poolSize ?? 4,
      acquireTimeoutMs: options.acquireTimeoutMs ?? 1000,
      logger: createSilentLogger(),
    }
  );
  const client = new StoreClient(pool, { operationTimeoutMs: options.operationTimeoutMs ?? 1000 });
  return { memory, behavior, pool, client };
}
