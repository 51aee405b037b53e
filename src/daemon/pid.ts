import { readFileSync, statSync } from 'node:fs';
import { logger } from '../logging/logger.js';
import { DEFAULT_FTL_CONF_FILE, DEFAULT_PID_FILE } from '../utils/paths.js';

/** Returned by `getFTLPID` when no trustworthy PID is available */
export const NO_PID = -1;

const PIDFILE_KEY = 'PIDFILE=';
const DIGITS_ONLY = /^[0-9]+$/;

export interface PidFileOptions {
  /** FTL config file searched for `PIDFILE=` */
  ftlConfFile?: string;
  /** Used when the FTL config is missing, empty or names no PID file */
  defaultPidFile?: string;
}

/**
 * Result of reading daemon status
 */
export interface DaemonStatus {
  pidFile: string;
  /** `NO_PID` when the PID file is missing or untrustworthy */
  pid: number;
  running: boolean;
}

/**
 * True for an existing regular file with at least one byte
 */
function isNonEmptyFile(path: string): boolean {
  const stats = statSync(path, { throwIfNoEntry: false });
  return stats !== undefined && stats.isFile() && stats.size > 0;
}

function describeFsError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Resolve the path of FTL's PID file.
 *
 * Uses the first `PIDFILE=` line of FTL's config file, falling back to the
 * default path when the config file is missing, empty or unreadable, or sets
 * no value.
 */
export function getFTLPIDFile(options: PidFileOptions = {}): string {
  const ftlConfFile = options.ftlConfFile ?? DEFAULT_FTL_CONF_FILE;
  const defaultPidFile = options.defaultPidFile ?? DEFAULT_PID_FILE;

  let content: string;
  try {
    if (!isNonEmptyFile(ftlConfFile)) {
      return defaultPidFile;
    }
    content = readFileSync(ftlConfFile, 'utf8');
  } catch (err) {
    logger.debug(`Cannot read ${ftlConfFile} (${describeFsError(err)}), using ${defaultPidFile}`);
    return defaultPidFile;
  }

  const line = content.split('\n').find(l => l.startsWith(PIDFILE_KEY));

  const pidFile = line?.slice(PIDFILE_KEY.length).replace(/\r$/, '') ?? '';
  if (pidFile === '') {
    logger.debug(`No PIDFILE set in ${ftlConfFile}, using ${defaultPidFile}`);
    return defaultPidFile;
  }

  return pidFile;
}

/**
 * Read FTL's PID from its PID file.
 *
 * Content that is anything other than digits is discarded so it can never
 * reach `kill`. Returns `NO_PID` when the file is missing, empty, unreadable
 * or rejected; it never throws.
 */
export function getFTLPID(pidFile: string): number {
  let content: string;
  try {
    if (!isNonEmptyFile(pidFile)) {
      return NO_PID;
    }
    content = readFileSync(pidFile, 'utf8');
  } catch (err) {
    logger.warn(`Cannot read PID file ${pidFile}: ${describeFsError(err)}`);
    return NO_PID;
  }

  const candidate = content.replace(/\n+$/, '');
  if (!DIGITS_ONLY.test(candidate)) {
    logger.warn(`Ignoring non-numeric content in PID file ${pidFile}`);
    return NO_PID;
  }

  const pid = Number(candidate);
  if (!Number.isSafeInteger(pid)) {
    logger.warn(`Ignoring out-of-range PID in ${pidFile}`);
    return NO_PID;
  }

  return pid;
}

/**
 * Check if a process is running by PID
 */
export function isProcessRunning(pid: number): boolean {
  if (!Number.isSafeInteger(pid) || pid <= 0) {
    return false;
  }
  try {
    // Sending signal 0 checks if process exists without actually sending a signal
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // Exists, but owned by another user
    return err instanceof Error && 'code' in err && err.code === 'EPERM';
  }
}

/**
 * Read daemon status from its PID file
 */
export function getDaemonStatus(options: PidFileOptions = {}): DaemonStatus {
  const pidFile = getFTLPIDFile(options);
  const pid = getFTLPID(pidFile);
  return { pidFile, pid, running: isProcessRunning(pid) };
}
