/**
 * Command Type Definitions
 *
 * Types for command registration, dispatch, and execution
 */

import type { DevStackConfig } from './config.js';
import type { Logger, OutputRenderer } from './output.js';

/**
 * An external program and its argument vector
 */
export interface Invocation {
  file: string;
  args: string[];
}

export type CommandCategory = 'database' | 'full-stack' | 'tools';

interface CommandBase {
  name: string;
  description: string;
  category: CommandCategory;
  aliases?: string[];
}

/**
 * A command that delegates to one or more external processes
 */
export interface ProcessCommand extends CommandBase {
  kind: 'process';
  invocations(config: DevStackConfig): Invocation[];
  status?(config: DevStackConfig): string[];
}

/**
 * A command handled inside the CLI without spawning anything
 */
export interface BuiltinCommand extends CommandBase {
  kind: 'builtin';
  handler: CommandHandler;
}

export type StackCommand = ProcessCommand | BuiltinCommand;

export type CommandHandler = (context: CommandContext) => Promise<CommandResult>;

export interface CommandContext {
  config: DevStackConfig;
  registry: CommandRegistry;
  renderer: OutputRenderer;
  logger: Logger;
  dryRun: boolean;
}

export interface CommandResult {
  success: boolean;
  exitCode: number;
  invocations: Invocation[];
  failedStep?: Invocation;
}

export interface CommandRegistry {
  register(command: StackCommand): void;
  get(name: string): StackCommand | undefined;
  has(name: string): boolean;
  list(category?: CommandCategory): StackCommand[];
  resolve(nameOrAlias: string): StackCommand | undefined;
}
