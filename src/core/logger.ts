/**
 * Logger utilities using chalk for colored output
 */

import chalk from 'chalk';

/**
 * The subset of the logger the docstring engine depends on.
 */
export interface EngineLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: Error): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  /** Route every line to stderr, keeping stdout free for JSON output. */
  stderrOnly?: boolean;
}

export class Logger implements EngineLogger {
  private readonly verbose: boolean;
  private readonly stderrOnly: boolean;

  constructor(options: LoggerOptions | boolean = {}) {
    const resolved = typeof options === 'boolean' ? { verbose: options } : options;
    this.verbose = resolved.verbose ?? false;
    this.stderrOnly = resolved.stderrOnly ?? false;
  }

  error(message: string, error?: Error): void {
    console.error(chalk.red(`✗ ${message}`));
    if (this.verbose && error) {
      console.error(chalk.gray(error.stack || error.message));
    }
  }

  success(message: string): void {
    this.out(chalk.green(`✓ ${message}`));
  }

  info(message: string): void {
    this.out(chalk.blue(`ℹ ${message}`));
  }

  warn(message: string): void {
    this.out(chalk.yellow(`⚠ ${message}`));
  }

  debug(message: string): void {
    if (this.verbose) {
      this.out(chalk.gray(`[DEBUG] ${message}`));
    }
  }

  log(message: string): void {
    this.out(message);
  }

  private out(line: string): void {
    if (this.stderrOnly) {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

// Default logger instance
export const logger = new Logger();

export function createLogger(options: LoggerOptions | boolean = false): Logger {
  return new Logger(options);
}
