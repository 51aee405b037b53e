import { existsSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { getGlobalConfigPath, getLocalConfigPath } from '../utils/paths.js';
import { applyDefaults } from './defaults.js';
import { KEY_MATCH_MODES } from './schema.js';
import type { FtlUtilsConfig, FtlUtilsUserConfig, KeyMatch } from './schema.js';

/**
 * Error thrown when no config file is found
 */
export class ConfigNotFoundError extends Error {
  constructor(searchedPaths: string[]) {
    super(`No config file found. Searched:\n${searchedPaths.map(p => `  - ${p}`).join('\n')}`);
    this.name = 'ConfigNotFoundError';
  }
}

/**
 * Error thrown when config validation fails
 */
export class ConfigValidationError extends Error {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Config validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}`);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

const PATH_FIELDS = ['ftlConfFile', 'defaultPidFile', 'ftlBinary', 'logFile'] as const;
const KNOWN_FIELDS = new Set<string>([...PATH_FIELDS, 'keyMatch']);

function isKeyMatch(value: unknown): value is KeyMatch {
  return KEY_MATCH_MODES.some(mode => mode === value);
}

/**
 * Get config file search paths in priority order
 */
export function getConfigSearchPaths(): string[] {
  return [getLocalConfigPath(), getGlobalConfigPath()];
}

/**
 * Find the first existing config file
 */
export function findConfigFile(): string | null {
  const paths = getConfigSearchPaths();
  for (const configPath of paths) {
    if (existsSync(configPath)) {
      return configPath;
    }
  }
  return null;
}

/**
 * Check a raw config value and pick out the fields that passed
 */
function parseConfig(config: unknown): { config: FtlUtilsUserConfig; errors: string[] } {
  const parsed: FtlUtilsUserConfig = {};
  const errors: string[] = [];

  if (config === null || typeof config !== 'object' || Array.isArray(config)) {
    errors.push('Config must be an object');
    return { config: parsed, errors };
  }

  const fields = new Map<string, unknown>(Object.entries(config));

  for (const name of fields.keys()) {
    if (!KNOWN_FIELDS.has(name)) {
      errors.push(`Unknown option \`${name}\``);
    }
  }

  // Paths and binary name
  for (const name of PATH_FIELDS) {
    const value = fields.get(name);
    if (value === undefined) {
      continue;
    }
    if (typeof value !== 'string') {
      errors.push(`\`${name}\` must be a string`);
    } else if (value.trim() === '') {
      errors.push(`\`${name}\` must not be empty`);
    } else {
      parsed[name] = value;
    }
  }

  const keyMatch = fields.get('keyMatch');
  if (keyMatch !== undefined) {
    if (isKeyMatch(keyMatch)) {
      parsed.keyMatch = keyMatch;
    } else {
      errors.push(`\`keyMatch\` must be one of: ${KEY_MATCH_MODES.join(', ')}`);
    }
  }

  return { config: parsed, errors };
}

/**
 * Validate user config object
 */
export function validateConfig(config: unknown): string[] {
  return parseConfig(config).errors;
}

/**
 * Load and validate config from a file path
 */
export async function loadConfigFromPath(configPath: string): Promise<FtlUtilsConfig> {
  // Use file:// URL for cross-platform compatibility with ESM imports
  const fileUrl = pathToFileURL(configPath).href;

  // Add cache-busting query to ensure fresh import
  const urlWithCacheBust = `${fileUrl}?t=${Date.now()}`;

  const module: unknown = await import(urlWithCacheBust);
  const exported = module !== null && typeof module === 'object' && 'default' in module ? module.default : undefined;

  const { config, errors } = parseConfig(exported ?? {});
  if (errors.length > 0) {
    throw new ConfigValidationError(errors);
  }

  return applyDefaults(config);
}

/**
 * Load config from the first available config file
 */
export async function loadConfig(): Promise<{ config: FtlUtilsConfig; path: string }> {
  const configPath = findConfigFile();

  if (!configPath) {
    throw new ConfigNotFoundError(getConfigSearchPaths());
  }

  const config = await loadConfigFromPath(configPath);
  return { config, path: configPath };
}

/**
 * Load config, falling back to built-in defaults when no config file exists
 */
export async function loadConfigOrDefaults(): Promise<{ config: FtlUtilsConfig; path: string | null }> {
  try {
    return await loadConfig();
  } catch (err) {
    if (err instanceof ConfigNotFoundError) {
      return { config: applyDefaults({}), path: null };
    }
    throw err;
  }
}
