// src/core/config/index.ts
// Configuration system exports

export {
  type EnvsConfig,
  type LogConfig,
  type RuntimeConfig,
  type NodalConfig,
  type PartialConfig,
  type ConfigValidation,
  DEFAULT_ENVS_CONFIG,
  DEFAULT_LOG_CONFIG,
  DEFAULT_RUNTIME_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  ConfigSchema,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
