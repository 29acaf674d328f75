export { InFlightRegistry } from "./inflight.js";
export { CachePolicy, type CachePolicyOptions, hasCacheDirective } from "./policy.js";
export { type CacheStats, ResponseCache, type ResponseCacheOptions } from "./response-cache.js";
export {
  type CachedResponse,
  type CacheRequest,
  type CacheStatus,
  findHeader,
  type HandleOptions,
  type HandlerResponse,
  type HeaderEntries,
  type HeaderValue,
  readHeader,
  type RequestHandler,
  type ServedResponse,
  toCachedResponse,
} from "./types.js";
