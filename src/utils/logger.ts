/**
 * Leveled logging for the CLI.
 *
 * Diagnostics go through here; command results (listings, documents, JSON)
 * are written to stdout directly. With `--json`, debug/info/success lines move
 * to stderr so stdout stays a single parseable document.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Where debug, info and success lines are written. Warnings and errors always use stderr. */
export type LogOutput = 'stdout' | 'stderr';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

class Logger {
  private level: LogLevel = 'info';
  private output: LogOutput = 'stdout';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setOutput(output: LogOutput): void {
    this.output = output;
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private print(line: string): void {
    if (this.output === 'stderr') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.enabled('debug')) return;
    this.print(chalk.gray(`[DEBUG] ${message}`));
    if (data) {
      this.print(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string): void {
    if (!this.enabled('info')) return;
    this.print(chalk.blue(`[INFO] ${message}`));
  }

  warn(message: string): void {
    if (!this.enabled('warn')) return;
    console.warn(chalk.yellow(`[WARN] ${message}`));
  }

  error(message: string): void {
    if (!this.enabled('error')) return;
    console.error(chalk.red(`[ERROR] ${message}`));
  }

  /**
   * Confirmation of a completed change, shown at info level.
   */
  success(message: string): void {
    if (!this.enabled('info')) return;
    this.print(chalk.green(`✓ ${message}`));
  }
}

export const logger = new Logger();

export { Logger };
