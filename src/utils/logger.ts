/**
 * Console logging for the installer CLI.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Leveled logger. Status lines are indented two spaces and carry a marker:
 * ✓ success, → info, ! warning, ✗ failure.
 */
class Logger {
  private level: LogLevel = 'info';
  private prefix: string = '';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    console.log(chalk.gray(`  [debug] ${this.formatMessage(message)}`));
    if (data) {
      console.log(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(`  ${chalk.blue('→')} ${this.formatMessage(message)}`);
  }

  warn(message: string): void {
    if (!this.shouldLog('warn')) return;
    console.warn(`  ${chalk.yellow('!')} ${this.formatMessage(message)}`);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    console.error(`  ${chalk.red('✗')} ${this.formatMessage(message)}`);
    if (error && this.shouldLog('debug')) {
      if (error instanceof Error) {
        console.error(chalk.red(error.stack || error.message));
      } else {
        console.error(chalk.red(JSON.stringify(error, null, 2)));
      }
    }
  }

  /**
   * Log a success message.
   */
  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(`  ${chalk.green('✓')} ${this.formatMessage(message)}`);
  }

  /**
   * Log a per-item failure that does not abort the run.
   */
  fail(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(`  ${chalk.red('✗')} ${this.formatMessage(message)}`);
  }

  /**
   * Create a child logger with a prefix.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.level = this.level;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
