import * as fs from "node:fs";
import * as path from "node:path";
import * as TOML from "@iarna/toml";
import { Err, Ok, type Result } from "@cachet/shared";
import { type Config, ConfigSchema, type PartialConfig } from "./schema.js";

// ============================================
// Configuration Loader Module
// ============================================

/**
 * Error types for configuration loading operations
 */
export type ConfigErrorCode = "FILE_NOT_FOUND" | "PARSE_ERROR" | "VALIDATION_ERROR" | "READ_ERROR";

/**
 * Configuration error with code and context
 */
export interface ConfigLoadError {
  code: ConfigErrorCode;
  message: string;
  path?: string;
  cause?: unknown;
}

/**
 * Options for loadConfig function
 */
export interface LoadConfigOptions {
  /** Working directory to search for config files (default: process.cwd()) */
  cwd?: string;
  /** Config overrides (highest priority) */
  overrides?: PartialConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectFile?: boolean;
  /** Environment to read CACHET_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

// ============================================
// findProjectConfig
// ============================================

/** Config file names to search for in order */
const CONFIG_FILE_NAMES = ["cachet.toml", ".cachet.toml", ".config/cachet.toml"];

/**
 * Find project configuration file by searching up from startDir to root.
 *
 * @param startDir - Directory to start search from (default: process.cwd())
 * @returns Path to found config file, or undefined if not found
 */
export function findProjectConfig(startDir?: string): string | undefined {
  let currentDir = path.resolve(startDir ?? process.cwd());

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      if (fs.existsSync(configPath) && fs.statSync(configPath).isFile()) {
        return configPath;
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

// ============================================
// parseEnvConfig
// ============================================

type EnvKind = "string" | "number" | "list";

/**
 * Environment variable to config path mappings
 */
const ENV_MAPPINGS: Record<string, { path: string[]; kind: EnvKind }> = {
  CACHET_STORE_URL: { path: ["store", "url"], kind: "string" },
  CACHET_KEY_PREFIX: { path: ["store", "keyPrefix"], kind: "string" },
  CACHET_POOL_SIZE: { path: ["pool", "size"], kind: "number" },
  CACHET_POOL_ACQUIRE_TIMEOUT_MS: { path: ["pool", "acquireTimeoutMs"], kind: "number" },
  CACHET_OPERATION_TIMEOUT_MS: { path: ["operationTimeoutMs"], kind: "number" },
  CACHET_DEFAULT_TTL_MS: { path: ["defaultTtlMs"], kind: "number" },
  CACHET_VARY_HEADERS: { path: ["keys", "varyHeaders"], kind: "list" },
  CACHET_LOG_LEVEL: { path: ["logLevel"], kind: "string" },
};

/**
 * Coerce string value to the type the schema expects.
 * Non-numeric strings for number fields are left as-is so validation reports them.
 */
function coerceValue(value: string, kind: EnvKind): unknown {
  switch (kind) {
    case "number": {
      const parsed = Number(value);
      return Number.isFinite(parsed) ? parsed : value;
    }
    case "list":
      return value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
    default:
      return value;
  }
}

/**
 * Set a nested value in an object using a path array
 */
function setNestedValue(obj: Record<string, unknown>, keys: string[], value: unknown): void {
  let current = obj;
  for (const key of keys.slice(0, -1)) {
    const next = current[key];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }
  const lastKey = keys[keys.length - 1];
  if (lastKey !== undefined) {
    current[lastKey] = value;
  }
}

/**
 * Parse CACHET_* environment variables into a partial config object.
 *
 * @example
 * ```typescript
 * // With CACHET_POOL_SIZE=4 set:
 * parseEnvConfig();
 * // { pool: { size: 4 } }
 * ```
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [envVar, mapping] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envVar];
    if (value !== undefined && value !== "") {
      setNestedValue(result, mapping.path, coerceValue(value, mapping.kind));
    }
  }

  return result;
}

// ============================================
// deepMerge
// ============================================

/**
 * Check if value is a plain object (not array, null, or other type)
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.prototype.toString.call(value) === "[object Object]"
  );
}

/**
 * Deep merge multiple objects. Later sources override earlier ones.
 * Arrays are replaced (not concatenated).
 * undefined values don't overwrite existing values.
 *
 * @example
 * ```typescript
 * deepMerge({ pool: { size: 4 } }, { pool: { acquireTimeoutMs: 50 } });
 * // { pool: { size: 4, acquireTimeoutMs: 50 } }
 * ```
 */
export function deepMerge(...sources: unknown[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const source of sources) {
    if (!isPlainObject(source)) continue;

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;

      const targetValue = result[key];
      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        result[key] = deepMerge(targetValue, sourceValue);
      } else {
        result[key] = sourceValue;
      }
    }
  }

  return result;
}

// ============================================
// loadConfig
// ============================================

/**
 * Read and parse a TOML config file
 */
function readTomlFile(filePath: string): Result<Record<string, unknown>, ConfigLoadError> {
  try {
    if (!fs.existsSync(filePath)) {
      return Err({
        code: "FILE_NOT_FOUND",
        message: `Config file not found: ${filePath}`,
        path: filePath,
      });
    }

    const content = fs.readFileSync(filePath, "utf-8");
    return Ok(TOML.parse(content));
  } catch (error) {
    if (error instanceof Error && error.name === "TomlError") {
      return Err({
        code: "PARSE_ERROR",
        message: `Failed to parse TOML: ${error.message}`,
        path: filePath,
        cause: error,
      });
    }
    return Err({
      code: "READ_ERROR",
      message: `Failed to read config file: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }
}

/**
 * Validate a merged config object and apply schema defaults.
 */
export function parseConfig(input: unknown): Result<Config, ConfigLoadError> {
  const parseResult = ConfigSchema.safeParse(input);

  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    return Err({
      code: "VALIDATION_ERROR",
      message: `Invalid configuration: ${issues}`,
      cause: parseResult.error,
    });
  }

  return Ok(parseResult.data);
}

/**
 * Load configuration from multiple sources with cascading priority.
 *
 * Load order (later overrides earlier):
 * 1. Schema defaults
 * 2. Project config: findProjectConfig()
 * 3. Environment variables (unless skipEnv)
 * 4. Programmatic overrides (options.overrides)
 *
 * @example
 * ```typescript
 * const result = loadConfig({ overrides: { pool: { size: 4 } } });
 * if (result.ok) {
 *   console.log(result.value.store.url);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<Config, ConfigLoadError> {
  const { cwd, overrides, skipEnv = false, skipProjectFile = false } = options;
  const layers: unknown[] = [];

  if (!skipProjectFile) {
    const projectPath = findProjectConfig(cwd);
    if (projectPath) {
      const projectResult = readTomlFile(projectPath);
      if (!projectResult.ok) {
        return projectResult;
      }
      layers.push(projectResult.value);
    }
  }

  if (!skipEnv) {
    layers.push(parseEnvConfig(options.env));
  }

  if (overrides) {
    layers.push(overrides);
  }

  return parseConfig(deepMerge(...layers));
}
