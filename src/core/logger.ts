/**
 * Levelled console logging (debug < info < warn < error < silent).
 *
 * Warn and error go to stderr so that JSON and SARIF output on stdout stays clean.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_ORDER;
}

export class Logger {
  private level: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /** `--verbose` wins over `--quiet`. */
  configure(options: { verbose?: boolean; quiet?: boolean }): void {
    if (options.verbose) this.setLevel('debug');
    else if (options.quiet) this.setLevel('error');
    else this.setLevel('info');
  }

  isEnabled(target: LogLevel): boolean {
    return LOG_LEVEL_ORDER[target] >= LOG_LEVEL_ORDER[this.level];
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.isEnabled('debug')) return;
    console.error(chalk.gray(`[debug] ${message}`), ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.isEnabled('info')) return;
    console.error(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (!this.isEnabled('warn')) return;
    console.error(chalk.yellow(`⚠ ${message}`), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (!this.isEnabled('error')) return;
    console.error(chalk.red(`✖ ${message}`), ...args);
  }
}

export const logger = new Logger();
