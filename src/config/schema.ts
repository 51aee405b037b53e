/**
 * How `addKey` and `removeKey` decide that a line belongs to a key
 * - `prefix`: the line starts with the key (`log` also matches `log-queries`)
 * - `exact`: the line is the key itself or starts with `key=`
 */
export type KeyMatch = 'prefix' | 'exact';

export const KEY_MATCH_MODES: readonly KeyMatch[] = ['prefix', 'exact'];

/**
 * User-facing config (before defaults are applied)
 */
export interface FtlUtilsUserConfig {
  /** FTL config file searched for `PIDFILE=` */
  ftlConfFile?: string;
  /** PID file used when FTL's config does not name one */
  defaultPidFile?: string;
  /** FTL binary invoked for `--config` reads and writes */
  ftlBinary?: string;
  keyMatch?: KeyMatch;
  /** Also append log lines to this file */
  logFile?: string;
}

/**
 * Full config (after defaults applied)
 */
export interface FtlUtilsConfig {
  ftlConfFile: string;
  defaultPidFile: string;
  ftlBinary: string;
  keyMatch: KeyMatch;
  logFile: string | null;
}

/**
 * Helper to define config with type checking
 */
export function defineConfig(config: FtlUtilsUserConfig): FtlUtilsUserConfig {
  return config;
}
