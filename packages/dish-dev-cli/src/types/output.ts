/**
 * Output Type Definitions
 *
 * Types for terminal rendering and logging
 */

/**
 * Anything text can be written to (process.stdout, process.stderr, test buffers)
 */
export interface OutputStream {
  write(chunk: string): unknown;
}

export type LogLevel = 'debug' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface RenderOptions {
  stream?: 'stdout' | 'stderr';
  color?: 'green' | 'red' | 'yellow' | 'cyan' | 'gray';
  bold?: boolean;
  dim?: boolean;
}

export interface OutputRenderer {
  render(content: string, options?: RenderOptions): void;
  commandLine(line: string, options?: { force?: boolean }): void;
  status(lines: string[]): void;
  error(message: string): void;
}
