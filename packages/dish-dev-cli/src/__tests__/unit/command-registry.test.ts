/**
 * Command Registry Tests
 */

import { CommandRegistry, createCommandRegistry } from '../../core/router/command-registry.js';
import { stackCommands } from '../../commands/index.js';
import { dbUpCommand } from '../../commands/db/index.js';

describe('CommandRegistry', () => {
  it('keeps registration order', () => {
    const registry = createCommandRegistry(stackCommands);

    expect(registry.list().map((cmd) => cmd.name)).toEqual([
      'db-up',
      'db-down',
      'db-restart',
      'db-logs',
      'full-up',
      'full-down',
      'full-restart',
      'full-logs',
      'backend-shell',
      'db-shell',
      'clean',
      'help',
    ]);
  });

  it('filters by category', () => {
    const registry = createCommandRegistry(stackCommands);

    expect(registry.list('full-stack').map((cmd) => cmd.name)).toEqual([
      'full-up',
      'full-down',
      'full-restart',
      'full-logs',
    ]);
    expect(registry.listCategories()).toEqual(['database', 'full-stack', 'tools']);
  });

  it('refuses a second command with the same name', () => {
    const registry = new CommandRegistry();
    registry.register(dbUpCommand);

    expect(() => registry.register(dbUpCommand)).toThrow('Command db-up is already registered');
  });

  it('resolves names before aliases', () => {
    const registry = createCommandRegistry(stackCommands);

    expect(registry.resolve('db-shell')?.name).toBe('db-shell');
    expect(registry.resolve('psql')?.name).toBe('db-shell');
    expect(registry.resolve('shell')).toBeUndefined();
    expect(registry.has('psql')).toBe(false);
  });
});
