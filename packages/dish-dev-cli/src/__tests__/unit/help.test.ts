/**
 * Help Command Tests
 */

import { formatHelp, stackCommands } from '../../commands/index.js';
import { CommandRouter } from '../../core/router/command-router.js';
import { RecordingRunner, createTestContext } from '../utils/fakes.js';

function occurrences(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

describe('help', () => {
  it('lists every command name exactly once', async () => {
    const { context, stdout } = createTestContext();

    await new CommandRouter(context.registry, new RecordingRunner()).route('help', context);

    for (const command of stackCommands) {
      expect({ name: command.name, count: occurrences(stdout.text, command.name) }).toEqual({
        name: command.name,
        count: 1,
      });
    }
  });

  it('runs no external process', async () => {
    const { context } = createTestContext();
    const runner = new RecordingRunner();

    const result = await new CommandRouter(context.registry, runner).route('help', context);

    expect(runner.calls).toHaveLength(0);
    expect(result).toEqual({ success: true, exitCode: 0, invocations: [] });
  });

  it('still prints in quiet mode', async () => {
    const { context, stdout } = createTestContext({ quiet: true });

    await new CommandRouter(context.registry, new RecordingRunner()).route('help', context);

    expect(stdout.text.startsWith('Usage: dish-dev <command> [options]\n')).toBe(true);
  });

  it('groups commands the way the stack is organised', () => {
    const lines = formatHelp(stackCommands);

    expect(lines.slice(0, 17)).toEqual([
      'Usage: dish-dev <command> [options]',
      '',
      'Available commands:',
      '  dish-dev db-up          - Start only database (PostgreSQL + pgAdmin)',
      '  dish-dev db-down        - Stop database',
      '  dish-dev db-restart     - Restart database',
      '  dish-dev db-logs        - View database logs',
      '',
      '  dish-dev full-up        - Start full stack (DB + Backend + Frontend)',
      '  dish-dev full-down      - Stop full stack',
      '  dish-dev full-restart   - Restart full stack',
      '  dish-dev full-logs      - View all logs',
      '',
      '  dish-dev backend-shell  - Enter backend container shell',
      '  dish-dev db-shell       - Enter PostgreSQL shell',
      '  dish-dev clean          - Remove all containers and volumes',
      '  dish-dev help           - Show this list of commands',
    ]);
  });

  it('lists the global options', () => {
    const lines = formatHelp(stackCommands);
    const optionsStart = lines.indexOf('Options:');

    expect(lines.slice(optionsStart + 1)).toEqual([
      '  -C, --project-dir <path>  Run docker from this directory (default: current directory)',
      '  --config <path>           Read settings from this file instead of .dish-dev.yaml',
      '  -n, --dry-run             Print the docker invocations without running them',
      '  -v, --verbose             Show debug output',
      '  -q, --quiet               Only print errors',
      '  --no-color                Disable colors',
      '  -V, --version             Print the version',
    ]);
  });
});
