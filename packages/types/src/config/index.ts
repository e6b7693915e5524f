export {
  ConfigLoader,
  CONFIG_FILE_NAMES,
  CONFIG_ENV_VAR,
  type ResolveConfigOptions,
  type ResolvedConfig,
} from './loader.js';
export {
  validateConfig,
  safeValidateConfig,
  configSchema,
  type PartialConfig,
  type ConfigValidationResult,
} from './validator.js';
