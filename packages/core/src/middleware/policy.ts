import { type CacheRequest, type CachedResponse, findHeader, readHeader } from "./types.js";

export interface CachePolicyOptions {
  /** Request methods eligible for caching (default: GET) */
  methods?: readonly string[];
  /** Response statuses eligible for caching (default: any 2xx) */
  statuses?: readonly number[];
}

/**
 * Whether a Cache-Control value carries any of `directives`.
 * Directive names are compared case-insensitively; arguments are ignored.
 */
export function hasCacheDirective(
  cacheControl: string | undefined,
  ...directives: string[]
): boolean {
  if (!cacheControl) return false;
  const present = cacheControl
    .split(",")
    .map((part) => part.split("=")[0]?.trim().toLowerCase() ?? "");
  return directives.some((directive) => present.includes(directive));
}

/**
 * Decides which requests go through the cache and which responses may be stored.
 */
export class CachePolicy {
  private readonly methods: ReadonlySet<string>;
  private readonly statuses: ReadonlySet<number> | undefined;

  constructor(options: CachePolicyOptions = {}) {
    this.methods = new Set((options.methods ?? ["GET"]).map((method) => method.toUpperCase()));
    this.statuses = options.statuses ? new Set(options.statuses) : undefined;
  }

  /**
   * Cacheable method, and the client did not send `Cache-Control: no-store`.
   */
  isCacheableRequest(request: CacheRequest): boolean {
    if (!this.methods.has(request.method.toUpperCase())) {
      return false;
    }
    return !hasCacheDirective(readHeader(request.headers, "cache-control"), "no-store");
  }

  /**
   * Allowed status, and the response does not forbid shared storage.
   */
  isCacheableResponse(response: CachedResponse): boolean {
    const statusAllowed = this.statuses
      ? this.statuses.has(response.status)
      : response.status >= 200 && response.status < 300;
    if (!statusAllowed) {
      return false;
    }
    return !hasCacheDirective(findHeader(response.headers, "cache-control"), "no-store", "private");
  }
}
