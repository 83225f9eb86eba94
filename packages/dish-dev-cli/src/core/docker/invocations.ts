/**
 * Docker Invocation Builders
 *
 * Builds the argument vectors handed to docker. Nothing here runs a process.
 */

import type { DevStackConfig } from '../../types/config.js';
import type { Invocation } from '../../types/command.js';

export const DOCKER_BINARY = 'docker';
export const DOCKER_COMPOSE_STANDALONE_BINARY = 'docker-compose';

/**
 * default: database only, compose finds docker-compose.yml itself
 * full: database + backend + frontend
 */
export type ComposeStack = 'default' | 'full';

function composeFileArgs(stack: ComposeStack, config: DevStackConfig): string[] {
  return stack === 'full' ? ['-f', config.compose.fullFile] : [];
}

/**
 * `docker compose [-f file] <args>`
 */
export function composeInvocation(stack: ComposeStack, config: DevStackConfig, args: string[]): Invocation {
  return {
    file: DOCKER_BINARY,
    args: ['compose', ...composeFileArgs(stack, config), ...args],
  };
}

/**
 * `docker-compose [-f file] <args>`, the standalone v1 binary
 */
export function standaloneComposeInvocation(
  stack: ComposeStack,
  config: DevStackConfig,
  args: string[]
): Invocation {
  return {
    file: DOCKER_COMPOSE_STANDALONE_BINARY,
    args: [...composeFileArgs(stack, config), ...args],
  };
}

/**
 * `docker exec -it <container> <command...>`
 */
export function execInvocation(container: string, command: string[]): Invocation {
  return {
    file: DOCKER_BINARY,
    args: ['exec', '-it', container, ...command],
  };
}

const SAFE_ARGUMENT = /^[\w@%+=:,./-]+$/;

function quoteArgument(arg: string): string {
  if (SAFE_ARGUMENT.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render an invocation as a shell command line
 */
export function formatCommandLine(invocation: Invocation): string {
  return [invocation.file, ...invocation.args].map(quoteArgument).join(' ');
}
