/**
 * CLI Setup and Command Registration for dish-dev
 *
 * Sets up Commander.js with the command table, global options,
 * and help system integration.
 */

import { Command, CommanderError } from 'commander';
import * as fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import { stackCommands } from './commands/index.js';
import { ConfigManager, defaultConfig } from './core/config/config-manager.js';
import { DryRunProcessRunner, ExecaProcessRunner, type ProcessRunner } from './core/docker/process-runner.js';
import {
  GLOBAL_OPTIONS,
  HELP_FLAGS,
  PROGRAM_NAME,
  VERSION_FLAGS,
  type GlobalOptions,
} from './core/global-options.js';
import { createCommandRegistry, createCommandRouter, type CommandRegistry } from './core/router/index.js';
import { TerminalRenderer } from './output/renderers/terminal-renderer.js';
import type { OutputStream } from './types/index.js';
import { formatError, getExitCode } from './utils/error-handler.js';
import { createLogger } from './utils/logger.js';

export interface CliDependencies {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdout?: OutputStream;
  stderr?: OutputStream;
  // Replaces the execa runner (dry runs still use their own)
  runner?: ProcessRunner;
}

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * Version from this package's package.json (src/ and dist/ sit beside it)
 */
export function readVersion(): string {
  const packageJsonPath = path.join(__dirname, '..', 'package.json');
  return PackageJsonSchema.parse(fs.readJsonSync(packageJsonPath)).version;
}

/**
 * Create and configure the CLI program. `execute` receives the command name
 * whenever commander matches a command, or the raw name when it does not.
 */
export function createCLI(
  registry: CommandRegistry,
  execute: (commandName: string) => Promise<void>,
  output: { stdout: OutputStream; stderr: OutputStream }
): Command {
  const program = new Command();

  // Settings below are inherited by every subcommand, so they come first
  program
    .name(PROGRAM_NAME)
    .description('Start, stop and inspect the dish development stack')
    .helpOption(false)
    .addHelpCommand(false)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => output.stdout.write(str),
      writeErr: (str) => output.stderr.write(str),
    })
    .version(readVersion(), VERSION_FLAGS, 'Print the version');

  for (const option of GLOBAL_OPTIONS) {
    program.option(option.flags, option.description);
  }
  program.option(HELP_FLAGS, 'Show the list of commands');

  for (const command of registry.list()) {
    program
      .command(command.name)
      .description(command.description)
      .aliases(command.aliases ?? [])
      .action(() => execute(command.name));
  }

  // No command, or one commander does not know
  program.argument('[command]').action((commandName?: string) => execute(commandName ?? 'help'));

  return program;
}

/**
 * Parse CLI arguments and execute. Resolves to the process exit code.
 */
export async function runCLI(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const cwd = deps.cwd ?? process.cwd();
  const env = deps.env ?? process.env;
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;

  const registry = createCommandRegistry(stackCommands);
  let exitCode = 0;
  let verbose = false;
  let colors = true;

  const execute = async (requested: string): Promise<void> => {
    const opts = program.opts<GlobalOptions>();
    verbose = opts.verbose ?? false;
    colors = opts.color && !env.NO_COLOR;

    const quiet = opts.quiet ?? false;
    const dryRun = opts.dryRun ?? false;
    const logger = createLogger({ verbose, quiet, colors, stderr });
    const renderer = new TerminalRenderer({ stdout, stderr, colors, quiet });

    const commandName = opts.help ? 'help' : requested;
    const projectDir = path.resolve(cwd, opts.projectDir ?? '.');

    // Only commands that spawn docker read the project config
    const config =
      registry.resolve(commandName)?.kind === 'process'
        ? (
            await new ConfigManager(logger).load({
              projectDir,
              configPath: opts.config ? path.resolve(cwd, opts.config) : undefined,
            })
          ).config
        : defaultConfig(projectDir);

    const runner = dryRun ? new DryRunProcessRunner() : (deps.runner ?? new ExecaProcessRunner(logger, stderr));
    const router = createCommandRouter(registry, runner);

    const result = await router.route(commandName, { config, registry, renderer, logger, dryRun });
    exitCode = result.exitCode;
  };

  const program = createCLI(registry, execute, { stdout, stderr });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    // Commander already printed its own message (unknown option, --version)
    if (error instanceof CommanderError) {
      return error.exitCode;
    }

    const renderer = new TerminalRenderer({ stdout, stderr, colors });
    renderer.error(formatError(error, verbose, renderer.colors));
    return getExitCode(error);
  }

  return exitCode;
}
