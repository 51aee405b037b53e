import chalk from 'chalk';
import { loadConfigOrDefaults, ConfigValidationError } from '../config/index.js';
import type { FtlUtilsConfig } from '../config/index.js';
import { logger } from '../logging/logger.js';

export interface CommonOptions {
  verbose?: boolean;
}

/**
 * Print an error and exit with status 1
 */
export function fail(message: string, detail?: string): never {
  console.error(chalk.red(`✖ ${message}`));
  if (detail) {
    console.error(chalk.gray(`  ${detail}`));
  }
  process.exit(1);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Load config (defaults when no config file exists) and configure the logger
 */
export async function prepareCommand(options: CommonOptions): Promise<FtlUtilsConfig> {
  logger.configure({ verbose: options.verbose });

  let result;
  try {
    result = await loadConfigOrDefaults();
  } catch (err) {
    if (err instanceof ConfigValidationError) {
      console.error(chalk.red('✖ Config validation failed:'));
      for (const error of err.errors) {
        console.error(chalk.gray(`  - ${error}`));
      }
      process.exit(1);
    }
    throw err;
  }

  logger.configure({ logFile: result.config.logFile });
  logger.debug(result.path ? `Using config ${result.path}` : 'No config file found, using defaults');
  return result.config;
}
