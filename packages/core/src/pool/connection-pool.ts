// =============================================================================
// Connection Pool
// =============================================================================

import {
  abortErrorFrom,
  PoolClosedError,
  PoolExhaustedError,
  StoreError,
} from "../errors/index.js";
import { createSilentLogger, type Logger } from "../logger/index.js";

/**
 * Creates, checks and disposes of the connections a pool hands out.
 */
export interface ConnectionFactory<T> {
  create(): Promise<T>;
  /**
   * Dispose of a connection. `broken` is set when it may still have a command
   * in flight, so it must be torn down rather than shut down gracefully.
   */
  destroy(connection: T, broken: boolean): Promise<void>;
  /** Checked before an idle connection is reused; failing ones are destroyed */
  validate?(connection: T): boolean;
}

export interface ConnectionPoolOptions {
  /** Maximum number of live connections */
  size: number;
  /** How long acquire() may wait before failing with PoolExhaustedError */
  acquireTimeoutMs: number;
  logger?: Logger;
}

export interface PoolStats {
  size: number;
  live: number;
  idle: number;
  leased: number;
  waiting: number;
}

interface Waiter<T> {
  resolve(lease: Lease<T>): void;
  reject(error: Error): void;
  settled: boolean;
  cleanup(): void;
}

/**
 * Exclusive handle on one pooled connection.
 *
 * Release is idempotent. A lease marked broken destroys its connection on
 * release instead of returning it to the idle set.
 */
export class Lease<T> {
  private released = false;
  private broken = false;

  constructor(
    readonly connection: T,
    private readonly pool: ConnectionPool<T>
  ) {}

  get isReleased(): boolean {
    return this.released;
  }

  get isBroken(): boolean {
    return this.broken;
  }

  markBroken(): void {
    this.broken = true;
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.pool.reclaim(this.connection, this.broken);
  }
}

/**
 * Bounded pool of store connections.
 *
 * Connections are created lazily up to `size`. When all are leased, callers
 * queue in FIFO order until a lease is released or `acquireTimeoutMs`
 * elapses. Pool capacity is the ceiling on concurrent store operations.
 *
 * @example
 * ```typescript
 * const pool = new ConnectionPool(factory, { size: 4, acquireTimeoutMs: 500 });
 * const value = await pool.use((conn) => conn.get("cachet:abc"));
 * ```
 */
export class ConnectionPool<T> {
  private readonly idle: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private readonly leased = new Set<T>();
  private live = 0;
  private closed = false;
  private readonly logger: Logger;

  constructor(
    private readonly factory: ConnectionFactory<T>,
    private readonly options: ConnectionPoolOptions
  ) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new RangeError(`Pool size must be a positive integer, got ${options.size}`);
    }
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Lease a connection, waiting for one if the pool is at capacity.
   *
   * @throws PoolExhaustedError when none frees up within acquireTimeoutMs
   * @throws PoolClosedError after close()
   * @throws AbortError when `signal` fires while waiting
   * @throws StoreError when a new connection cannot be established
   */
  async acquire(signal?: AbortSignal): Promise<Lease<T>> {
    if (signal?.aborted) {
      throw abortErrorFrom(signal);
    }

    while (!this.closed) {
      const connection = this.idle.pop();
      if (connection === undefined) break;
      if (this.factory.validate && !this.factory.validate(connection)) {
        this.discard(connection, true);
        continue;
      }
      return this.lease(connection);
    }

    if (this.closed) {
      throw new PoolClosedError();
    }

    if (this.live < this.options.size) {
      return this.lease(await this.establish());
    }

    return this.enqueue(signal);
  }

  /**
   * Run `fn` with a leased connection. The lease is released on every exit
   * path and marked broken when `fn` throws.
   */
  async use<R>(fn: (connection: T) => Promise<R>, signal?: AbortSignal): Promise<R> {
    const lease = await this.acquire(signal);
    try {
      return await fn(lease.connection);
    } catch (error) {
      lease.markBroken();
      throw error;
    } finally {
      lease.release();
    }
  }

  /**
   * Return a connection. Prefer `lease.release()`, which guards against
   * double release.
   */
  release(lease: Lease<T>): void {
    lease.release();
  }

  /**
   * Reject all waiters, destroy idle connections, and destroy leased ones as
   * they come back.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      this.settleWaiter(waiter, () => waiter.reject(new PoolClosedError()));
    }

    const idle = this.idle.splice(0);
    this.live -= idle.length;
    await Promise.all(idle.map((connection) => this.destroyQuietly(connection, false)));
  }

  stats(): PoolStats {
    return {
      size: this.options.size,
      live: this.live,
      idle: this.idle.length,
      leased: this.leased.size,
      waiting: this.waiters.length,
    };
  }

  /** @internal Called by Lease.release(). */
  reclaim(connection: T, broken: boolean): void {
    if (!this.leased.delete(connection)) return;

    if (broken || this.closed) {
      this.discard(connection, broken);
      this.replenish();
      return;
    }

    const waiter = this.nextWaiter();
    if (waiter) {
      this.settleWaiter(waiter, () => waiter.resolve(this.lease(connection)));
      return;
    }

    this.idle.push(connection);
  }

  private lease(connection: T): Lease<T> {
    this.leased.add(connection);
    return new Lease(connection, this);
  }

  private async establish(): Promise<T> {
    this.live++;
    try {
      return await this.factory.create();
    } catch (error) {
      this.live--;
      // Capacity freed up; give a queued caller its own attempt.
      this.replenish();
      if (error instanceof StoreError) throw error;
      throw new StoreError("connection", "Failed to establish store connection", {
        cause: error,
        operation: "connect",
      });
    }
  }

  private enqueue(signal?: AbortSignal): Promise<Lease<T>> {
    return new Promise<Lease<T>>((resolve, reject) => {
      const onAbort = (): void => {
        this.removeWaiter(waiter);
        this.settleWaiter(waiter, () => reject(abortErrorFrom(signal ?? AbortSignal.abort())));
      };

      const timer = setTimeout(() => {
        this.removeWaiter(waiter);
        this.settleWaiter(waiter, () =>
          reject(new PoolExhaustedError(this.options.acquireTimeoutMs, this.options.size))
        );
      }, this.options.acquireTimeoutMs);

      const waiter: Waiter<T> = {
        resolve,
        reject,
        settled: false,
        cleanup: () => {
          clearTimeout(timer);
          signal?.removeEventListener("abort", onAbort);
        },
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private nextWaiter(): Waiter<T> | undefined {
    return this.waiters.shift();
  }

  private removeWaiter(waiter: Waiter<T>): void {
    const index = this.waiters.indexOf(waiter);
    if (index !== -1) {
      this.waiters.splice(index, 1);
    }
  }

  private settleWaiter(waiter: Waiter<T>, settle: () => void): void {
    if (waiter.settled) return;
    waiter.settled = true;
    waiter.cleanup();
    settle();
  }

  /**
   * After a connection was discarded, open a replacement for the oldest
   * waiter, if any.
   */
  private replenish(): void {
    if (this.closed || this.live >= this.options.size) return;
    const waiter = this.nextWaiter();
    if (!waiter) return;

    // The waiter keeps its timeout and abort listener until the connection exists.
    void this.establish().then(
      (connection) => {
        if (waiter.settled || this.closed) {
          this.leased.add(connection);
          this.reclaim(connection, false);
          return;
        }
        this.settleWaiter(waiter, () => waiter.resolve(this.lease(connection)));
      },
      (error: unknown) => {
        this.settleWaiter(waiter, () =>
          waiter.reject(error instanceof Error ? error : new Error(String(error)))
        );
      }
    );
  }

  private discard(connection: T, broken: boolean): void {
    this.live--;
    void this.destroyQuietly(connection, broken);
  }

  private async destroyQuietly(connection: T, broken: boolean): Promise<void> {
    try {
      await this.factory.destroy(connection, broken);
    } catch (error) {
      this.logger.warn("Failed to destroy store connection", error);
    }
  }
}
