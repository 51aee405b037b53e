import { homedir } from 'node:os';
import { join } from 'node:path';

/** FTL's own config file, read for a `PIDFILE=` override */
export const DEFAULT_FTL_CONF_FILE = '/etc/pihole/pihole-FTL.conf';

/** Where FTL writes its PID when the config file does not say otherwise */
export const DEFAULT_PID_FILE = '/run/pihole-FTL.pid';

/** FTL binary, resolved through PATH */
export const DEFAULT_FTL_BINARY = 'pihole-FTL';

/**
 * Get the global config directory (~/.config/ftl-utils/)
 */
export function getGlobalConfigDir(): string {
  return join(homedir(), '.config', 'ftl-utils');
}

/**
 * Get the global config file path (~/.config/ftl-utils/config.js)
 */
export function getGlobalConfigPath(): string {
  return join(getGlobalConfigDir(), 'config.js');
}

/**
 * Get the local config file path (./ftl-utils.config.js)
 */
export function getLocalConfigPath(): string {
  return join(process.cwd(), 'ftl-utils.config.js');
}
