export {
  type CacheEntry,
  decodeEntry,
  ENTRY_FORMAT_VERSION,
  encodeEntry,
  isFresh,
  MAX_ENTRY_TTL_MS,
  remainingTtlMs,
} from "./entry-codec.js";
