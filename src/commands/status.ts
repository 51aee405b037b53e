import chalk from 'chalk';
import { findConfigFile } from '../config/index.js';
import { getDaemonStatus, NO_PID } from '../daemon/index.js';
import { prepareCommand } from './context.js';
import type { CommonOptions } from './context.js';

export async function statusCommand(options: CommonOptions): Promise<void> {
  const config = await prepareCommand(options);

  // Daemon status
  const status = getDaemonStatus(config);
  console.log(chalk.bold('FTL:'));
  if (status.running) {
    console.log(`  Status: ${chalk.green('Running')} (PID: ${status.pid})`);
  } else if (status.pid !== NO_PID) {
    console.log(`  Status: ${chalk.yellow('Stopped')} (stale PID: ${status.pid})`);
  } else {
    console.log(`  Status: ${chalk.yellow('Stopped')}`);
  }
  console.log(`  PID file: ${status.pidFile}`);
  console.log(`  Binary: ${config.ftlBinary}`);

  // Config status
  const configPath = findConfigFile();
  console.log('\n' + chalk.bold('Config:'));
  if (configPath) {
    console.log(`  File: ${configPath}`);
  } else {
    console.log(`  File: ${chalk.yellow('Not found')} (using defaults)`);
  }
  console.log(`  FTL config: ${config.ftlConfFile}`);
  console.log(`  Key matching: ${config.keyMatch}`);
  if (config.logFile) {
    console.log(`  Log file: ${config.logFile}`);
  }
}
