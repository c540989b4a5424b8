/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, DEFAULT_SAFETY_FACTOR, deepMerge } from "./defaults";
// Inline options
export {
  buildInlineConfig,
  canRunWithoutConfigFile,
  createConfigFromInlineOptions,
  extractInlineOptions,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  type InlineValidationResult,
  mergeInlineConfig,
  validateInlineOptionsForConfigFreeMode,
} from "./inline";
// Loader
export {
  CONFIG_FILE_NAMES,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
  parseConfigContent,
} from "./loader";
// Resolver
export { resolvePaths, resolvePathsFrom } from "./resolver";
// Settings
export {
  clampLevel,
  createSettings,
  DEFAULT_ARCHIVE_PREFIX,
  findOverlappingSources,
  type SettingsOptions,
  threadHint,
} from "./settings";
// Validator
export { ConfigError, validateConfig } from "./validator";
