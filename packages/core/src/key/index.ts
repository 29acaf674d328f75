export {
  type CacheKey,
  canonicalJson,
  DEFAULT_KEY_OPTIONS,
  deriveCacheKey,
  type KeyDerivationOptions,
  KeyDeriver,
  normalizePath,
  sortedQuery,
} from "./derive.js";
