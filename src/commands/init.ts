import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import chalk from 'chalk';
import { getGlobalConfigPath, getLocalConfigPath } from '../utils/paths.js';

/**
 * Get the path to the example config file bundled with the package
 */
function getExampleConfigPath(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  // From dist/commands/init.js -> project root
  return join(__dirname, '..', '..', 'config.example.js');
}

interface InitOptions {
  force?: boolean;
  local?: boolean;
}

export async function initCommand(options: InitOptions): Promise<void> {
  const targetPath = options.local ? getLocalConfigPath() : getGlobalConfigPath();

  if (existsSync(targetPath) && !options.force) {
    console.error(chalk.red('✖ Config file already exists:'), targetPath);
    console.error(chalk.gray('  Use --force to overwrite'));
    process.exit(1);
  }

  const dir = dirname(targetPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  writeFileSync(targetPath, readFileSync(getExampleConfigPath(), 'utf8'), 'utf8');

  console.log(chalk.green('✔ Config file created:'), targetPath);
  console.log();
  console.log('Next steps:');
  console.log(chalk.gray('  1. Point ftlConfFile, defaultPidFile and ftlBinary at your installation'));
  console.log(chalk.gray('  2. Run'), chalk.cyan('ftl-utils status'), chalk.gray('to verify setup'));
}
