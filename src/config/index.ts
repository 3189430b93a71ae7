/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, deepMerge, isPlainObject } from "./defaults";
// Loader
export {
  CONFIG_FILE_NAMES,
  ConfigError,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
  parseConfigContent,
} from "./loader";
// Resolver
export { getServiceDefinitions, resolvePaths } from "./resolver";
// Validator
export { validateConfig } from "./validator";
