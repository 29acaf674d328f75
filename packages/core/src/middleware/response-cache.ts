// =============================================================================
// Response Cache Middleware
// =============================================================================

import {
  type CacheEntry,
  decodeEntry,
  encodeEntry,
  isFresh,
  MAX_ENTRY_TTL_MS,
  remainingTtlMs,
} from "../codec/index.js";
import { abortErrorFrom, AbortError, DerivationError, toError } from "../errors/index.js";
import { type CacheKey, type KeyDerivationOptions, KeyDeriver } from "../key/index.js";
import { createSilentLogger, type Logger } from "../logger/index.js";
import type { StoreClient } from "../store/index.js";
import { raceAbort } from "../utils/async.js";
import { InFlightRegistry } from "./inflight.js";
import { CachePolicy, type CachePolicyOptions } from "./policy.js";
import {
  type CachedResponse,
  type CacheRequest,
  type CacheStatus,
  findHeader,
  type HandleOptions,
  type HeaderEntries,
  type RequestHandler,
  type ServedResponse,
  toCachedResponse,
} from "./types.js";

/**
 * Counters since construction.
 */
export interface CacheStats {
  /** Served from the store */
  hits: number;
  /** Ran the handler as a flight leader */
  misses: number;
  /** Served without consulting the cache */
  bypasses: number;
  /** Waited on another caller's flight */
  coalesced: number;
  /** Entries written back */
  writes: number;
  /** Write-backs that failed */
  writeFailures: number;
  /** Lookups that failed in the store or pool */
  storeErrors: number;
  /** Stored entries that did not decode */
  decodeErrors: number;
  /** Undecodable entries deleted */
  evictions: number;
}

export interface ResponseCacheOptions {
  store: StoreClient;
  handler: RequestHandler;
  /** Key derivation settings, or a prepared deriver */
  keys?: Partial<KeyDerivationOptions> | KeyDeriver;
  /** Cacheability rules, or a prepared policy */
  policy?: CachePolicyOptions | CachePolicy;
  /** TTL of written entries (default: 60_000) */
  defaultTtlMs?: number;
  /** Header reporting HIT / MISS / BYPASS; false disables it (default: "x-cache") */
  cacheStatusHeader?: string | false;
  logger?: Logger;
  /** Clock for entry timestamps and freshness (default: Date.now) */
  now?: () => number;
}

type LookupResult = { kind: "hit"; entry: CacheEntry } | { kind: "miss"; corrupt: boolean };

const STATUS_LABELS: Record<CacheStatus, string> = {
  hit: "HIT",
  miss: "MISS",
  coalesced: "MISS",
  bypass: "BYPASS",
};

/**
 * Read-through response cache in front of a request handler.
 *
 * Lookups and write-backs go to the backing store; concurrent misses for one
 * key share a single handler call. Every failure on the caching path
 * (underivable key, store outage, pool exhaustion, corrupt entry) degrades to
 * serving the handler's response. Only handler errors reach the caller.
 *
 * @example
 * ```typescript
 * const cache = new ResponseCache({ store, handler: fetchItem });
 * const response = await cache.handle({ method: "GET", url: "/items/42" });
 * response.cache; // "miss", then "hit" on the next call
 * ```
 */
export class ResponseCache {
  private readonly store: StoreClient;
  private readonly handler: RequestHandler;
  private readonly keys: KeyDeriver;
  private readonly policy: CachePolicy;
  private readonly defaultTtlMs: number;
  private readonly cacheStatusHeader: string | false;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly inflight: InFlightRegistry<CachedResponse>;
  private readonly stats: CacheStats = {
    hits: 0,
    misses: 0,
    bypasses: 0,
    coalesced: 0,
    writes: 0,
    writeFailures: 0,
    storeErrors: 0,
    decodeErrors: 0,
    evictions: 0,
  };

  constructor(options: ResponseCacheOptions) {
    this.store = options.store;
    this.handler = options.handler;
    this.keys = options.keys instanceof KeyDeriver ? options.keys : new KeyDeriver(options.keys);
    this.policy =
      options.policy instanceof CachePolicy ? options.policy : new CachePolicy(options.policy);
    this.defaultTtlMs = options.defaultTtlMs ?? 60_000;
    this.cacheStatusHeader = options.cacheStatusHeader ?? "x-cache";
    this.logger = (options.logger ?? createSilentLogger()).child({ component: "response-cache" });
    this.now = options.now ?? Date.now;
    this.inflight = new InFlightRegistry((error, key) => {
      this.logger.error("Write-back failed unexpectedly", { key, error: toError(error) });
    });

    if (
      !Number.isInteger(this.defaultTtlMs) ||
      this.defaultTtlMs <= 0 ||
      this.defaultTtlMs > MAX_ENTRY_TTL_MS
    ) {
      throw new RangeError(
        `defaultTtlMs must be a positive integer up to ${MAX_ENTRY_TTL_MS}, got ${this.defaultTtlMs}`
      );
    }
  }

  /**
   * Serve a request from the cache or the handler.
   *
   * @throws whatever the handler throws
   * @throws AbortError when `options.signal` fires while this caller waits
   */
  async handle(request: CacheRequest, options: HandleOptions = {}): Promise<ServedResponse> {
    const { signal } = options;
    if (signal?.aborted) {
      throw abortErrorFrom(signal);
    }

    if (!this.policy.isCacheableRequest(request)) {
      return this.bypass(request, signal);
    }

    let key: CacheKey;
    try {
      key = this.keys.derive(request);
    } catch (error) {
      if (!(error instanceof DerivationError)) throw error;
      this.logger.warn("Cache key derivation failed; bypassing cache", {
        method: request.method,
        url: request.url,
        error,
      });
      return this.bypass(request, signal);
    }

    const lookup = await this.lookup(key, signal);
    if (lookup.kind === "hit") {
      this.stats.hits++;
      this.logger.debug("Cache hit", { key: key.storeKey });
      return this.serve(lookup.entry, "hit", this.hitHeaders(lookup.entry));
    }

    return this.fill(request, key, lookup.corrupt, signal);
  }

  /**
   * Delete the cached entry for a request. Resolves false when nothing was
   * deleted or the store could not be reached.
   */
  async invalidate(request: CacheRequest): Promise<boolean> {
    let key: CacheKey;
    try {
      key = this.keys.derive(request);
    } catch (error) {
      this.logger.warn("Cannot invalidate: key derivation failed", { url: request.url, error });
      return false;
    }
    return this.invalidateKey(key.storeKey);
  }

  /**
   * Delete a cached entry by its store key.
   */
  async invalidateKey(storeKey: string): Promise<boolean> {
    try {
      return await this.store.delete(storeKey);
    } catch (error) {
      this.logger.warn("Invalidation failed", { key: storeKey, error });
      return false;
    }
  }

  /**
   * Whether the backing store answers a PING.
   */
  async ping(): Promise<boolean> {
    try {
      await this.store.ping();
      return true;
    } catch (error) {
      this.logger.warn("Store health check failed", error);
      return false;
    }
  }

  getStats(): CacheStats {
    return { ...this.stats };
  }

  get inFlightCount(): number {
    return this.inflight.size;
  }

  private async bypass(request: CacheRequest, signal?: AbortSignal): Promise<ServedResponse> {
    this.stats.bypasses++;
    const response = await raceAbort(this.handler(request), signal);
    return this.serve(toCachedResponse(response), "bypass");
  }

  private async lookup(key: CacheKey, signal?: AbortSignal): Promise<LookupResult> {
    let bytes: Uint8Array | null;
    try {
      bytes = await this.store.get(key.storeKey, signal);
    } catch (error) {
      if (error instanceof AbortError) throw error;
      this.stats.storeErrors++;
      this.logger.warn("Cache lookup failed; treating as miss", { key: key.storeKey, error });
      return { kind: "miss", corrupt: false };
    }

    if (bytes === null) {
      return { kind: "miss", corrupt: false };
    }

    let entry: CacheEntry;
    try {
      entry = decodeEntry(bytes);
    } catch (error) {
      this.stats.decodeErrors++;
      this.logger.warn("Cached entry is unreadable; treating as miss", {
        key: key.storeKey,
        error: toError(error),
      });
      return { kind: "miss", corrupt: true };
    }

    if (!isFresh(entry, this.now())) {
      return { kind: "miss", corrupt: false };
    }
    return { kind: "hit", entry };
  }

  private async fill(
    request: CacheRequest,
    key: CacheKey,
    corrupt: boolean,
    signal?: AbortSignal
  ): Promise<ServedResponse> {
    const existing = this.inflight.join(key.storeKey);
    if (existing) {
      this.stats.coalesced++;
      const response = await raceAbort(existing, signal);
      return this.serve(response, "coalesced", this.missHeaders(response));
    }

    this.stats.misses++;
    this.logger.debug("Cache miss", { key: key.storeKey, corrupt });
    const flight = this.inflight.start(
      key.storeKey,
      async () => {
        const timer = this.logger.time("handler");
        const response = toCachedResponse(await this.handler(request));
        timer.end(`Handler answered ${response.status}`);
        return response;
      },
      (response) => this.publish(key, response, corrupt)
    );
    const response = await raceAbort(flight, signal);
    return this.serve(response, "miss", this.missHeaders(response));
  }

  /**
   * Freshness headers for a served hit: the remaining lifetime, and the time
   * the entry was stored unless the handler set its own Last-Modified.
   */
  private hitHeaders(entry: CacheEntry): HeaderEntries {
    const maxAge = Math.max(0, Math.floor(remainingTtlMs(entry, this.now()) / 1000));
    const headers: Array<readonly [string, string]> = [["cache-control", `max-age=${maxAge}`]];
    if (findHeader(entry.headers, "last-modified") === undefined) {
      headers.push(["last-modified", new Date(entry.storedAt).toUTCString()]);
    }
    return headers;
  }

  /**
   * A response that is being written back advertises the full TTL.
   */
  private missHeaders(response: CachedResponse): HeaderEntries {
    if (!this.policy.isCacheableResponse(response)) {
      return [];
    }
    return [["cache-control", `max-age=${Math.floor(this.defaultTtlMs / 1000)}`]];
  }

  /**
   * Write a fresh response back, or clear out a corrupt entry that nothing
   * replaced. Never rejects.
   */
  private async publish(key: CacheKey, response: CachedResponse, corrupt: boolean): Promise<void> {
    if (this.policy.isCacheableResponse(response)) {
      try {
        const entry: CacheEntry = { ...response, storedAt: this.now(), ttlMs: this.defaultTtlMs };
        await this.store.set(key.storeKey, encodeEntry(entry), this.defaultTtlMs);
        this.stats.writes++;
        return;
      } catch (error) {
        this.stats.writeFailures++;
        this.logger.warn("Cache write-back failed", { key: key.storeKey, error: toError(error) });
      }
    }

    if (corrupt) {
      try {
        if (await this.store.delete(key.storeKey)) {
          this.stats.evictions++;
        }
      } catch (error) {
        this.logger.debug("Could not evict unreadable entry", { key: key.storeKey, error });
      }
    }
  }

  private serve(
    response: CachedResponse,
    cache: CacheStatus,
    extra: HeaderEntries = []
  ): ServedResponse {
    const replaced = new Set(extra.map(([name]) => name.toLowerCase()));
    if (this.cacheStatusHeader) {
      replaced.add(this.cacheStatusHeader.toLowerCase());
    }

    const headers: Array<readonly [string, string]> = response.headers.filter(
      ([name]) => !replaced.has(name.toLowerCase())
    );
    headers.push(...extra);
    if (this.cacheStatusHeader) {
      headers.push([this.cacheStatusHeader, STATUS_LABELS[cache]]);
    }

    // Flight results are shared between callers; each gets its own body.
    const shared = cache === "miss" || cache === "coalesced";
    return {
      status: response.status,
      headers,
      body: shared ? response.body.slice() : response.body,
      cache,
    };
  }
}
