/**
 * Command Registry
 *
 * Central registry for all CLI commands
 */

import type {
  CommandCategory,
  CommandRegistry as ICommandRegistry,
  StackCommand,
} from '../../types/command.js';

export class CommandRegistry implements ICommandRegistry {
  private commands: Map<string, StackCommand> = new Map();

  /**
   * Register a command
   */
  register(command: StackCommand): void {
    if (this.commands.has(command.name)) {
      throw new Error(`Command ${command.name} is already registered`);
    }

    this.commands.set(command.name, command);
  }

  /**
   * Register multiple commands
   */
  registerMany(commands: readonly StackCommand[]): void {
    for (const command of commands) {
      this.register(command);
    }
  }

  get(name: string): StackCommand | undefined {
    return this.commands.get(name);
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  /**
   * List commands in registration order, optionally filtered by category
   */
  list(category?: CommandCategory): StackCommand[] {
    const commands = Array.from(this.commands.values());

    if (category) {
      return commands.filter((cmd) => cmd.category === category);
    }

    return commands;
  }

  /**
   * List categories in the order their first command was registered
   */
  listCategories(): CommandCategory[] {
    const categories = new Set<CommandCategory>();

    for (const command of this.commands.values()) {
      categories.add(command.category);
    }

    return Array.from(categories);
  }

  /**
   * Get command by name or alias
   */
  resolve(nameOrAlias: string): StackCommand | undefined {
    const command = this.get(nameOrAlias);
    if (command) return command;

    for (const cmd of this.commands.values()) {
      if (cmd.aliases?.includes(nameOrAlias)) {
        return cmd;
      }
    }

    return undefined;
  }
}

export function createCommandRegistry(commands: readonly StackCommand[] = []): CommandRegistry {
  const registry = new CommandRegistry();
  registry.registerMany(commands);
  return registry;
}
