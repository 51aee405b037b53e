import { spawn } from 'node:child_process';
import { logger } from '../logging/logger.js';
import { DEFAULT_FTL_BINARY } from '../utils/paths.js';
import { FtlClientError } from './types.js';
import type { CommandResult, CommandRunner, ConfigBackend, SetConfigResult } from './types.js';

/**
 * Spawn a command and return stdout, stderr, and exit code
 */
export function spawnAsync(command: string, args: string[]): Promise<CommandResult> {
  return new Promise((resolve) => {
    const proc = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('error', (err) => {
      stderr += err.message;
      resolve({ stdout, stderr, exitCode: 1 });
    });

    proc.on('close', (code) => {
      resolve({ stdout, stderr, exitCode: code ?? 1 });
    });
  });
}

export interface CliBackendOptions {
  /** FTL binary name or path (default: pihole-FTL) */
  binary?: string;
  runner?: CommandRunner;
}

/**
 * Config backend driving `<binary> --config`
 */
export function createCliBackend(options: CliBackendOptions = {}): ConfigBackend {
  const binary = options.binary ?? DEFAULT_FTL_BINARY;
  const run = options.runner ?? spawnAsync;

  return {
    async get(key: string): Promise<string> {
      logger.debug(`${binary} --config -q ${key}`);
      const { stdout, stderr, exitCode } = await run(binary, ['--config', '-q', key]);

      if (exitCode !== 0) {
        throw new FtlClientError(`${binary} --config -q ${key} failed: ${stderr.trim()}`, stderr, exitCode);
      }

      return stdout.replace(/\r?\n$/, '');
    },

    async set(key: string, value: string): Promise<SetConfigResult> {
      logger.debug(`${binary} --config ${key} ${value}`);
      // stdout only echoes the new value
      const { stderr, exitCode } = await run(binary, ['--config', key, value]);

      if (exitCode !== 0) {
        return { ok: false, error: stderr.trim() || `${binary} exited with code ${exitCode}`, exitCode };
      }

      return { ok: true };
    },
  };
}

/**
 * Read a setting through FTL's config interface
 *
 * @example
 * await getFTLConfigValue('dns.piholePTR');
 */
export function getFTLConfigValue(key: string, backend: ConfigBackend = createCliBackend()): Promise<string> {
  return backend.get(key);
}

/**
 * Write a setting through FTL's config interface. Complex values such as
 * `dns.upstreams` are passed as a single argument: `'[ "8.8.8.8", "8.8.4.4" ]'`.
 *
 * @example
 * await setFTLConfigValue('dns.piholePTR', 'PI.HOLE');
 */
export function setFTLConfigValue(
  key: string,
  value: string,
  backend: ConfigBackend = createCliBackend()
): Promise<SetConfigResult> {
  return backend.set(key, value);
}
