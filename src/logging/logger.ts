import { appendFileSync } from 'node:fs';
import chalk from 'chalk';

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

/**
 * Logs to stderr so stdout only ever carries command results
 */
class Logger {
  private verbose = false;
  private logFile: string | null = null;

  configure(options: { verbose?: boolean; logFile?: string | null }): void {
    if (options.verbose !== undefined) {
      this.verbose = options.verbose;
    }
    if (options.logFile !== undefined) {
      this.logFile = options.logFile;
    }
  }

  info(message: string): void {
    this.log('info', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  debug(message: string): void {
    if (this.verbose) {
      this.log('debug', message);
    }
  }

  private log(level: LogLevel, message: string): void {
    const timestamp = this.formatTimestamp();

    if (this.logFile) {
      this.appendToFile(this.logFile, `[${timestamp}] ${level.toUpperCase()} ${message}\n`);
    }

    const coloredTimestamp = chalk.gray(`[${timestamp}]`);
    const coloredLevel = this.colorLevel(level);
    console.error(`${coloredTimestamp} ${coloredLevel} ${message}`);
  }

  /**
   * Drops a log file that cannot be written after one warning
   */
  private appendToFile(logFile: string, line: string): void {
    try {
      appendFileSync(logFile, line);
    } catch (err) {
      this.logFile = null;
      const reason = err instanceof Error ? err.message : String(err);
      console.error(chalk.yellow(`Cannot write log file ${logFile}, logging to stderr only: ${reason}`));
    }
  }

  private formatTimestamp(): string {
    const now = new Date();
    const hours = now.getHours().toString().padStart(2, '0');
    const minutes = now.getMinutes().toString().padStart(2, '0');
    const seconds = now.getSeconds().toString().padStart(2, '0');
    return `${hours}:${minutes}:${seconds}`;
  }

  private colorLevel(level: LogLevel): string {
    switch (level) {
      case 'info':
        return chalk.blue('INFO');
      case 'warn':
        return chalk.yellow('WARN');
      case 'error':
        return chalk.red('ERROR');
      case 'debug':
        return chalk.magenta('DEBUG');
    }
  }
}

export const logger = new Logger();
