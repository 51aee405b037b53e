import { DEFAULT_FTL_BINARY, DEFAULT_FTL_CONF_FILE, DEFAULT_PID_FILE } from '../utils/paths.js';
import type { FtlUtilsConfig, FtlUtilsUserConfig } from './schema.js';

/**
 * Apply default values to user config
 */
export function applyDefaults(userConfig: FtlUtilsUserConfig): FtlUtilsConfig {
  return {
    ftlConfFile: userConfig.ftlConfFile ?? DEFAULT_FTL_CONF_FILE,
    defaultPidFile: userConfig.defaultPidFile ?? DEFAULT_PID_FILE,
    ftlBinary: userConfig.ftlBinary ?? DEFAULT_FTL_BINARY,
    keyMatch: userConfig.keyMatch ?? 'prefix',
    logFile: userConfig.logFile ?? null,
  };
}
