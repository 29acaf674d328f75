import { z } from "zod";
import { MAX_ENTRY_TTL_MS } from "../codec/index.js";

// ============================================
// Store & Pool Schemas
// ============================================

export const StoreConfigSchema = z.object({
  /** Redis connection URL */
  url: z.string().url().optional().default("redis://127.0.0.1:6379"),
  /** Namespace prepended to every cache key */
  keyPrefix: z.string().min(1).optional().default("cachet"),
  /** Socket connect timeout for new connections */
  connectTimeoutMs: z.number().int().positive().optional().default(2000),
});

export type StoreConfig = z.infer<typeof StoreConfigSchema>;

export const PoolConfigSchema = z.object({
  /** Maximum live connections, and so maximum concurrent store operations */
  size: z.number().int().positive().optional().default(10),
  /** How long acquire() waits for a free connection */
  acquireTimeoutMs: z.number().int().positive().optional().default(1000),
});

export type PoolConfig = z.infer<typeof PoolConfigSchema>;

// ============================================
// Key Derivation Schema
// ============================================

const HttpMethodSchema = z
  .string()
  .min(1)
  .transform((method) => method.toUpperCase());

export const KeyConfigSchema = z.object({
  /** Folded into every digest; bump to orphan all existing entries */
  version: z.number().int().nonnegative().optional().default(1),
  /** Request headers that participate in the key (case-insensitive) */
  varyHeaders: z
    .array(z.string().min(1).transform((name) => name.toLowerCase()))
    .optional()
    .default([]),
  /** Methods whose request body is digested into the key */
  bodyMethods: z.array(HttpMethodSchema).optional().default(["POST", "PUT", "PATCH", "QUERY"]),
  /** Canonicalize JSON bodies (sorted keys) before hashing */
  canonicalJsonBodies: z.boolean().optional().default(false),
});

export type KeyConfig = z.infer<typeof KeyConfigSchema>;

// ============================================
// Cacheability Policy Schema
// ============================================

export const PolicyConfigSchema = z.object({
  /** Request methods eligible for caching */
  methods: z.array(HttpMethodSchema).optional().default(["GET"]),
  /** Response statuses eligible for caching; any 2xx when omitted */
  statuses: z.array(z.number().int().min(100).max(599)).optional(),
});

export type PolicyConfig = z.infer<typeof PolicyConfigSchema>;

// ============================================
// Log Level Schema
// ============================================

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

// ============================================
// Complete Configuration Schema
// ============================================

export const ConfigSchema = z.object({
  store: StoreConfigSchema.optional().default({}),
  pool: PoolConfigSchema.optional().default({}),
  /** Timeout for each individual store operation */
  operationTimeoutMs: z.number().int().positive().optional().default(250),
  /** TTL applied to entries written back after a miss; bounded by the entry format */
  defaultTtlMs: z.number().int().positive().max(MAX_ENTRY_TTL_MS).optional().default(60_000),
  keys: KeyConfigSchema.optional().default({}),
  policy: PolicyConfigSchema.optional().default({}),
  /** Response header reporting HIT / MISS / BYPASS; false disables it */
  cacheStatusHeader: z
    .union([z.string().min(1), z.literal(false)])
    .optional()
    .default("x-cache"),
  logLevel: LogLevelSchema.optional().default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config type for user input (before defaults are applied)
 */
export type PartialConfig = z.input<typeof ConfigSchema>;
