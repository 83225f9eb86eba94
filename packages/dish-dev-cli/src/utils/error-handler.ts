/**
 * Error Handler for dish-dev
 *
 * Errors raised by the CLI itself. Failures of docker are never wrapped:
 * their exit codes pass through untouched.
 */

import chalk from 'chalk';
import { getErrorMessage, isError } from '../types/errors.js';

const EXIT_CODE_MAP = {
  CONFIG_ERROR: 1,
  UNKNOWN_COMMAND: 1,
  UNKNOWN_ERROR: 1,
} as const;

export const SIGNAL_EXIT_CODES = {
  SIGINT: 130,
  SIGTERM: 143,
} as const;

/**
 * Base error class for all CLI errors
 */
export class DevStackError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number = 1,
    public readonly context?: Record<string, unknown>,
    public readonly suggestions: string[] = []
  ) {
    super(message);
    this.name = 'DevStackError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends DevStackError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', EXIT_CODE_MAP.CONFIG_ERROR, context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when the requested command is not in the registry
 */
export class UnknownCommandError extends DevStackError {
  constructor(commandName: string, programName: string = 'dish-dev') {
    super(`Unknown command: ${commandName}`, 'UNKNOWN_COMMAND', EXIT_CODE_MAP.UNKNOWN_COMMAND, undefined, [
      `Run "${programName} help" for available commands`,
    ]);
    this.name = 'UnknownCommandError';
  }
}

/**
 * Get exit code for an error
 */
export function getExitCode(error: unknown): number {
  if (error instanceof DevStackError) {
    return error.exitCode;
  }

  return EXIT_CODE_MAP.UNKNOWN_ERROR;
}

/**
 * Format error for display
 */
export function formatError(error: unknown, verbose: boolean = false, palette: chalk.Chalk = chalk): string {
  const lines: string[] = [];

  if (error instanceof DevStackError) {
    lines.push(palette.red.bold(`${error.name}: ${error.message}`));

    if (error.context && Object.keys(error.context).length > 0) {
      lines.push('');
      lines.push(palette.yellow('Context:'));
      for (const [key, value] of Object.entries(error.context)) {
        lines.push(`  ${palette.gray(key)}: ${JSON.stringify(value)}`);
      }
    }

    if (error.suggestions.length > 0) {
      lines.push('');
      lines.push(palette.yellow('Suggestions:'));
      for (const suggestion of error.suggestions) {
        lines.push(`  • ${suggestion}`);
      }
    }
  } else {
    lines.push(palette.red.bold(`Error: ${getErrorMessage(error)}`));
  }

  if (verbose && isError(error) && error.stack) {
    lines.push('');
    lines.push(palette.gray('Stack Trace:'));
    lines.push(palette.gray(error.stack));
  }

  return lines.join('\n');
}

export interface GlobalErrorHandlerOptions {
  verbose?: boolean;
  colors?: boolean;
}

/**
 * Handle error and exit
 */
export function handleError(error: unknown, verbose: boolean = false, palette: chalk.Chalk = chalk): never {
  console.error(formatError(error, verbose, palette));
  process.exit(getExitCode(error));
}

/**
 * Global error handler for uncaught exceptions
 */
export function setupGlobalErrorHandlers(options: GlobalErrorHandlerOptions = {}): void {
  const verbose = options.verbose ?? false;
  const palette = new chalk.Instance({ level: options.colors === false ? 0 : chalk.level });

  process.on('uncaughtException', (error: Error) => {
    handleError(error, verbose, palette);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    handleError(reason, verbose, palette);
  });

  // docker shares the terminal and receives the same signal; only our exit code is decided here
  process.on('SIGINT', () => {
    process.exit(SIGNAL_EXIT_CODES.SIGINT);
  });

  process.on('SIGTERM', () => {
    process.exit(SIGNAL_EXIT_CODES.SIGTERM);
  });
}
