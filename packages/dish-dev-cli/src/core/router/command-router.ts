/**
 * Command Router
 *
 * Resolves a command name and runs it: builtins in-process, everything else
 * as a sequence of external processes.
 */

import type {
  CommandContext,
  CommandRegistry,
  CommandResult,
  Invocation,
  ProcessCommand,
} from '../../types/command.js';
import { UnknownCommandError } from '../../utils/error-handler.js';
import { formatCommandLine } from '../docker/invocations.js';
import type { ProcessRunner } from '../docker/process-runner.js';

export class CommandRouter {
  constructor(
    private registry: CommandRegistry,
    private runner: ProcessRunner
  ) {}

  /**
   * Route and execute a command
   */
  async route(commandName: string, context: CommandContext): Promise<CommandResult> {
    const command = this.registry.resolve(commandName);

    if (!command) {
      throw new UnknownCommandError(commandName);
    }

    context.logger.debug(`Running ${command.name}`);

    if (command.kind === 'builtin') {
      return command.handler(context);
    }

    return this.runProcesses(command, context);
  }

  /**
   * Run each invocation in order, stopping at the first non-zero exit.
   * Status lines are printed only once every invocation succeeded.
   */
  private async runProcesses(command: ProcessCommand, context: CommandContext): Promise<CommandResult> {
    const { config, renderer, dryRun } = context;
    const invocations: Invocation[] = [];

    for (const invocation of command.invocations(config)) {
      renderer.commandLine(formatCommandLine(invocation), { force: dryRun });
      invocations.push(invocation);

      const exitCode = await this.runner.run(invocation, { cwd: config.projectDir });

      if (exitCode !== 0) {
        context.logger.debug(`${command.name} stopped: ${invocation.file} exited with code ${exitCode}`);
        return { success: false, exitCode, invocations, failedStep: invocation };
      }
    }

    if (!dryRun) {
      renderer.status(command.status?.(config) ?? []);
    }

    return { success: true, exitCode: 0, invocations };
  }
}

export function createCommandRouter(registry: CommandRegistry, runner: ProcessRunner): CommandRouter {
  return new CommandRouter(registry, runner);
}
