// ============================================
// Request / Response Descriptors
// ============================================

/**
 * Header value as frameworks hand them over: single, repeated, or absent.
 */
export type HeaderValue = string | readonly string[] | undefined;

/**
 * Ordered header list. Names keep their original case; order is preserved
 * through the cache.
 */
export type HeaderEntries = ReadonlyArray<readonly [name: string, value: string]>;

/**
 * The inbound request as the middleware sees it.
 */
export interface CacheRequest {
  /** HTTP method, any case */
  method: string;
  /** Path with optional query string, e.g. `/items/42?b=2&a=1` */
  url: string;
  /** Request headers; lookups are case-insensitive */
  headers?: Readonly<Record<string, HeaderValue>>;
  /** Raw request body */
  body?: Uint8Array | string;
}

/**
 * What a downstream handler returns.
 */
export interface HandlerResponse {
  status: number;
  headers?: HeaderEntries | Readonly<Record<string, string>>;
  body?: Uint8Array | string;
}

/**
 * The downstream handler collaborator.
 */
export type RequestHandler = (request: CacheRequest) => Promise<HandlerResponse>;

/**
 * A fully materialized response: the unit that is cached and served.
 */
export interface CachedResponse {
  status: number;
  headers: HeaderEntries;
  body: Uint8Array;
}

/**
 * How a served response was obtained.
 * - `hit`: decoded from the store
 * - `miss`: this caller ran the handler
 * - `coalesced`: this caller awaited another caller's handler run
 * - `bypass`: served without consulting the cache
 */
export type CacheStatus = "hit" | "miss" | "coalesced" | "bypass";

export interface ServedResponse extends CachedResponse {
  cache: CacheStatus;
}

/**
 * Per-call options for ResponseCache.handle().
 */
export interface HandleOptions {
  /** Stops this caller waiting; in-flight store work still completes */
  signal?: AbortSignal;
}

/**
 * Look up a header case-insensitively, joining repeated values.
 */
export function readHeader(
  headers: Readonly<Record<string, HeaderValue>> | undefined,
  name: string
): string | undefined {
  if (!headers) return undefined;
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted || value === undefined) continue;
    return typeof value === "string" ? value : value.join(", ");
  }
  return undefined;
}

/**
 * Find a header in an ordered header list, case-insensitively.
 */
export function findHeader(headers: HeaderEntries, name: string): string | undefined {
  const wanted = name.toLowerCase();
  return headers.find(([key]) => key.toLowerCase() === wanted)?.[1];
}

function isHeaderEntries(headers: HandlerResponse["headers"]): headers is HeaderEntries {
  return Array.isArray(headers);
}

/**
 * Normalize a handler's response to bytes and ordered headers.
 */
export function toCachedResponse(response: HandlerResponse): CachedResponse {
  const headers: HeaderEntries = isHeaderEntries(response.headers)
    ? [...response.headers]
    : Object.entries(response.headers ?? {});
  const body =
    typeof response.body === "string"
      ? new Uint8Array(Buffer.from(response.body, "utf8"))
      : (response.body ?? new Uint8Array(0));
  return { status: response.status, headers, body };
}
