// =============================================================================
// Store Protocol Client
// =============================================================================

import {
  AbortError,
  PoolClosedError,
  PoolExhaustedError,
  StoreError,
  toError,
} from "../errors/index.js";
import { createSilentLogger, type Logger } from "../logger/index.js";
import type { ConnectionPool } from "../pool/index.js";
import { raceAbort, withTimeout } from "../utils/async.js";
import type { StoreConnection, StoreOperation } from "./types.js";

export interface StoreClientOptions {
  /** Upper bound on each get/set/delete/ping, measured after the lease is held */
  operationTimeoutMs: number;
  logger?: Logger;
}

/**
 * GET / SET-with-TTL / DELETE / PING against the backing store.
 *
 * Each operation leases one pooled connection for its own duration only. The
 * lease goes back when the operation settles or its timeout fires, whichever
 * comes first, even if the caller has stopped waiting. A failed or timed-out
 * operation discards its connection, so a half-read socket is never reused.
 *
 * @example
 * ```typescript
 * const client = new StoreClient(pool, { operationTimeoutMs: 250 });
 * await client.set("cachet:abc", bytes, 60_000);
 * const value = await client.get("cachet:abc");
 * ```
 */
export class StoreClient {
  private readonly logger: Logger;

  constructor(
    private readonly pool: ConnectionPool<StoreConnection>,
    private readonly options: StoreClientOptions
  ) {
    this.logger = options.logger ?? createSilentLogger();
  }

  get(key: string, signal?: AbortSignal): Promise<Uint8Array | null> {
    return this.run("get", (connection) => connection.get(key), signal);
  }

  set(key: string, value: Uint8Array, ttlMs: number, signal?: AbortSignal): Promise<void> {
    if (!Number.isInteger(ttlMs) || ttlMs <= 0) {
      return Promise.reject(new RangeError(`TTL must be a positive integer, got ${ttlMs}`));
    }
    return this.run("set", (connection) => connection.set(key, value, ttlMs), signal);
  }

  delete(key: string, signal?: AbortSignal): Promise<boolean> {
    return this.run("delete", (connection) => connection.delete(key), signal);
  }

  ping(signal?: AbortSignal): Promise<void> {
    return this.run("ping", (connection) => connection.ping(), signal);
  }

  private async run<R>(
    operation: StoreOperation,
    fn: (connection: StoreConnection) => Promise<R>,
    signal?: AbortSignal
  ): Promise<R> {
    const lease = await this.pool.acquire(signal).catch((error: unknown) => {
      throw translate(error, operation);
    });

    let pending: Promise<R>;
    try {
      pending = fn(lease.connection);
    } catch (error) {
      lease.markBroken();
      lease.release();
      throw translate(error, operation);
    }

    // The lease follows the operation or its timeout, never the caller's wait.
    const outcome = withTimeout(
      pending,
      this.options.operationTimeoutMs,
      () =>
        new StoreError(
          "timeout",
          `Store ${operation} timed out after ${this.options.operationTimeoutMs}ms`,
          { operation }
        )
    );
    void outcome.then(
      () => lease.release(),
      () => {
        lease.markBroken();
        lease.release();
      }
    );

    try {
      return await raceAbort(outcome, signal);
    } catch (error) {
      const translated = translate(error, operation);
      this.logger.debug(`Store ${operation} failed`, translated);
      throw translated;
    }
  }
}

function translate(error: unknown, operation: StoreOperation): Error {
  if (
    error instanceof StoreError ||
    error instanceof PoolExhaustedError ||
    error instanceof PoolClosedError ||
    error instanceof AbortError
  ) {
    return error;
  }
  return new StoreError("connection", `Store ${operation} failed: ${toError(error).message}`, {
    cause: error,
    operation,
  });
}
