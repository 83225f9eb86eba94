/**
 * Command Table
 *
 * Every command the CLI knows, in the order help lists them
 */

import type { StackCommand } from '../types/command.js';
import { dbDownCommand, dbLogsCommand, dbRestartCommand, dbShellCommand, dbUpCommand } from './db/index.js';
import { fullDownCommand, fullLogsCommand, fullRestartCommand, fullUpCommand } from './full/index.js';
import { backendShellCommand } from './backend/shell.js';
import { cleanCommand } from './clean.js';
import { helpCommand } from './help.js';

export const stackCommands: readonly StackCommand[] = [
  dbUpCommand,
  dbDownCommand,
  dbRestartCommand,
  dbLogsCommand,
  fullUpCommand,
  fullDownCommand,
  fullRestartCommand,
  fullLogsCommand,
  backendShellCommand,
  dbShellCommand,
  cleanCommand,
  helpCommand,
];

export { formatHelp } from './help.js';
