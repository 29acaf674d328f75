export {
  type ConfigErrorCode,
  type ConfigLoadError,
  deepMerge,
  findProjectConfig,
  type LoadConfigOptions,
  loadConfig,
  parseConfig,
  parseEnvConfig,
} from "./loader.js";
export {
  type Config,
  ConfigSchema,
  type KeyConfig,
  KeyConfigSchema,
  LogLevelSchema,
  type PartialConfig,
  type PolicyConfig,
  PolicyConfigSchema,
  type PoolConfig,
  PoolConfigSchema,
  type StoreConfig,
  StoreConfigSchema,
} from "./schema.js";
