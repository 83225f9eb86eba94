/**
 * Process Runner
 *
 * Spawns docker with the terminal attached and reports its exit code.
 * No retries and no interpretation: whatever docker exits with is returned.
 */

import execa from 'execa';
import * as os from 'os';
import type { Invocation } from '../../types/command.js';
import type { Logger, OutputStream } from '../../types/output.js';
import { isSpawnError } from '../../types/errors.js';
import { formatCommandLine } from './invocations.js';

export const COMMAND_NOT_FOUND_EXIT_CODE = 127;

export interface RunOptions {
  cwd: string;
}

export interface ProcessRunner {
  run(invocation: Invocation, options: RunOptions): Promise<number>;
}

/**
 * What the runner reads back from a finished child process
 */
export interface SpawnOutcome {
  exitCode?: number;
  signal?: string;
}

export type SpawnFunction = (file: string, args: string[], options: execa.Options) => Promise<SpawnOutcome>;

/**
 * Exit code a shell reports for a child killed by a signal
 */
export function signalExitCode(signal: string): number {
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
  return entry ? 128 + entry[1] : 1;
}

export class ExecaProcessRunner implements ProcessRunner {
  constructor(
    private readonly logger: Logger,
    private readonly stderr: OutputStream = process.stderr,
    private readonly spawn: SpawnFunction = execa
  ) {}

  async run(invocation: Invocation, options: RunOptions): Promise<number> {
    this.logger.debug(`Spawning in ${options.cwd}: ${formatCommandLine(invocation)}`);

    const outcome = await this.spawn(invocation.file, invocation.args, {
      cwd: options.cwd,
      // Shells and followed logs hold the terminal until the user leaves
      stdio: 'inherit',
      reject: false,
    });

    if (isSpawnError(outcome)) {
      if (outcome.code === 'ENOENT') {
        this.stderr.write(`${invocation.file}: command not found\n`);
        return COMMAND_NOT_FOUND_EXIT_CODE;
      }
      this.stderr.write(`${invocation.file}: ${outcome.message}\n`);
      return 1;
    }

    if (outcome.signal) {
      this.logger.debug(`${invocation.file} terminated by ${outcome.signal}`);
      return signalExitCode(outcome.signal);
    }

    const exitCode = typeof outcome.exitCode === 'number' ? outcome.exitCode : 1;
    this.logger.debug(`${invocation.file} exited with code ${exitCode}`);
    return exitCode;
  }
}

/**
 * Records what would run and runs nothing
 */
export class DryRunProcessRunner implements ProcessRunner {
  readonly invocations: Invocation[] = [];

  async run(invocation: Invocation): Promise<number> {
    this.invocations.push(invocation);
    return 0;
  }
}
