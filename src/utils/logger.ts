/**
 * Leveled diagnostic logging.
 *
 * All diagnostics go to stderr so that stdout stays reserved for results
 * a caller may pipe (the variant solution path, JSON summaries).
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

class Logger {
  private level: LogLevel = 'info';
  private prefix: string = '';
  private parent: Logger | null = null;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    console.error(chalk.gray(`[DEBUG] ${this.formatMessage(message)}`));
    if (data) {
      console.error(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    console.error(chalk.blue(this.formatMessage(message)));
    if (data) {
      console.error(chalk.blue(JSON.stringify(data, null, 2)));
    }
  }

  warn(message: string): void {
    if (!this.shouldLog('warn')) return;
    console.error(chalk.yellow(`warning: ${this.formatMessage(message)}`));
  }

  error(message: string, error?: Error): void {
    if (!this.shouldLog('error')) return;
    console.error(chalk.red(`error: ${this.formatMessage(message)}`));
    // Stack traces only when debugging.
    if (error?.stack && this.shouldLog('debug')) {
      console.error(chalk.gray(error.stack));
    }
  }

  /**
   * Child logger sharing this logger's level, with a component prefix.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.parent = this;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

export const logger = new Logger();

export { Logger };
