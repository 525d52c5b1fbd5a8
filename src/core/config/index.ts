// src/core/config/index.ts
// Configuration system exports

export {
  type MatchConfig,
  type EngineConfig,
  type ConfigLayer,
  type ConfigValidation,
  DEFAULT_MATCH_CONFIG,
  DEFAULT_LINT_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  layerFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
