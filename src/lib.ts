export { addOrEditKeyValPair, addKey, removeKey, InvalidEntryError } from './keyval/index.js';
export type { EditResult, KeyMatchOptions } from './keyval/index.js';
export { getFTLPIDFile, getFTLPID, isProcessRunning, getDaemonStatus, NO_PID } from './daemon/index.js';
export type { DaemonStatus, PidFileOptions } from './daemon/index.js';
export {
  spawnAsync,
  createCliBackend,
  getFTLConfigValue,
  setFTLConfigValue,
  FtlClientError,
} from './ftl/index.js';
export type {
  CliBackendOptions,
  CommandResult,
  CommandRunner,
  ConfigBackend,
  SetConfigResult,
} from './ftl/index.js';
export {
  defineConfig,
  applyDefaults,
  loadConfig,
  loadConfigOrDefaults,
  validateConfig,
  ConfigNotFoundError,
  ConfigValidationError,
} from './config/index.js';
export type { FtlUtilsUserConfig, FtlUtilsConfig, KeyMatch } from './config/index.js';
