export type { FtlUtilsUserConfig, FtlUtilsConfig, KeyMatch } from './schema.js';
export { defineConfig, KEY_MATCH_MODES } from './schema.js';
export { applyDefaults } from './defaults.js';
export {
  loadConfig,
  loadConfigOrDefaults,
  loadConfigFromPath,
  findConfigFile,
  getConfigSearchPaths,
  validateConfig,
  ConfigNotFoundError,
  ConfigValidationError,
} from './loader.js';
