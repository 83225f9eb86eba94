/**
 * Logger for dish-dev
 *
 * Leveled diagnostics on stderr, with color support and configurable verbosity.
 * Command echoes and status lines do not go through here; see TerminalRenderer.
 */

import chalk from 'chalk';
import type { LogLevel, Logger, OutputStream } from '../types/output.js';

export interface LoggerOptions {
  level?: LogLevel;
  verbose?: boolean;
  quiet?: boolean;
  colors?: boolean;
  stderr?: OutputStream;
}

export class DevStackLogger implements Logger {
  private level: LogLevel = 'warn';
  private readonly palette: chalk.Chalk;
  private readonly stderr: OutputStream;

  private readonly levelPriority: Record<LogLevel, number> = {
    debug: 0,
    warn: 1,
    error: 2,
  };

  constructor(options: LoggerOptions = {}) {
    this.palette = new chalk.Instance({ level: options.colors === false ? 0 : chalk.level });
    this.stderr = options.stderr ?? process.stderr;

    if (options.level) {
      this.level = options.level;
    }

    // Quiet wins over verbose
    if (options.verbose) {
      this.level = 'debug';
    }
    if (options.quiet) {
      this.level = 'error';
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levelPriority[level] >= this.levelPriority[this.level];
  }

  private formatMessage(message: string, args: unknown[]): string {
    if (args.length === 0) {
      return message;
    }

    const argsStr = args
      .map((arg) => {
        if (arg instanceof Error) return arg.message;
        return typeof arg === 'object' ? JSON.stringify(arg) : String(arg);
      })
      .join(' ');

    return `${message} ${argsStr}`;
  }

  private badge(level: LogLevel): string {
    const label = `[${level.toUpperCase()}]`;
    switch (level) {
      case 'debug':
        return this.palette.gray.bold(label);
      case 'warn':
        return this.palette.yellow.bold(label);
      case 'error':
        return this.palette.red.bold(label);
    }
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.shouldLog(level)) return;

    const output = `${this.badge(level)} ${this.formatMessage(message, args)}\n`;

    // Diagnostics stay off stdout so they never mix with docker's own output
    this.stderr.write(output);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new DevStackLogger(options);
}
