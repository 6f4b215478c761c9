/**
 * Configuration module exports
 */

// Defaults
export {
  APP_NAME,
  CONF_FILE_KEYS,
  CONFIG_FILE_NAMES,
  CONFIG_KEYS,
  HOME_ENV_VAR,
  SYNC_COMMAND,
} from "./defaults";
// Loader
export {
  ConfigError,
  detectFormat,
  findAndLoadConfig,
  findConfigFile,
  type LoadedConfig,
  loadConfig,
  parseConfContent,
} from "./loader";
// Resolver
export { expandValue, resolvePaths } from "./resolver";
// Validator
export { type RawConfig, validateConfig } from "./validator";
