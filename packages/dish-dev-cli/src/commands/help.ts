/**
 * Help Command
 *
 * Lists every registered command once, grouped by category, then the global options.
 */

import type { BuiltinCommand, CommandCategory, StackCommand } from '../types/command.js';
import { GLOBAL_OPTIONS, PROGRAM_NAME, VERSION_FLAGS } from '../core/global-options.js';

const CATEGORY_ORDER: readonly CommandCategory[] = ['database', 'full-stack', 'tools'];

/**
 * Build the help text, one entry per line
 */
export function formatHelp(commands: readonly StackCommand[], programName: string = PROGRAM_NAME): string[] {
  const nameWidth = Math.max(...commands.map((cmd) => cmd.name.length)) + 2;
  const lines: string[] = [`Usage: ${programName} <command> [options]`, '', 'Available commands:'];

  const groups = CATEGORY_ORDER.map((category) => commands.filter((cmd) => cmd.category === category)).filter(
    (group) => group.length > 0
  );

  groups.forEach((group, index) => {
    if (index > 0) lines.push('');
    for (const cmd of group) {
      lines.push(`  ${programName} ${cmd.name.padEnd(nameWidth)}- ${cmd.description}`);
    }
  });

  const options = [...GLOBAL_OPTIONS, { flags: VERSION_FLAGS, description: 'Print the version' }];
  const flagsWidth = Math.max(...options.map((option) => option.flags.length)) + 2;

  lines.push('', 'Options:');
  for (const option of options) {
    lines.push(`  ${option.flags.padEnd(flagsWidth)}${option.description}`);
  }

  return lines;
}

export const helpCommand: BuiltinCommand = {
  kind: 'builtin',
  name: 'help',
  description: 'Show this list of commands',
  category: 'tools',
  handler: async ({ registry, renderer }) => {
    for (const line of formatHelp(registry.list())) {
      renderer.render(line);
    }

    return { success: true, exitCode: 0, invocations: [] };
  },
};
