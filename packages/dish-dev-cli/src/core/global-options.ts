/**
 * Global Options
 *
 * Options accepted before or after any command. Registered with commander
 * and listed by the help command from this one table.
 */

export const PROGRAM_NAME = 'dish-dev';

// A type alias so commander's opts<T extends OptionValues>() accepts it
export type GlobalOptions = {
  projectDir?: string;
  config?: string;
  dryRun?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  color: boolean;
  help?: boolean;
};

export interface GlobalOptionDefinition {
  flags: string;
  description: string;
}

export const GLOBAL_OPTIONS: readonly GlobalOptionDefinition[] = [
  { flags: '-C, --project-dir <path>', description: 'Run docker from this directory (default: current directory)' },
  { flags: '--config <path>', description: 'Read settings from this file instead of .dish-dev.yaml' },
  { flags: '-n, --dry-run', description: 'Print the docker invocations without running them' },
  { flags: '-v, --verbose', description: 'Show debug output' },
  { flags: '-q, --quiet', description: 'Only print errors' },
  { flags: '--no-color', description: 'Disable colors' },
];

export const VERSION_FLAGS = '-V, --version';
export const HELP_FLAGS = '-h, --help';
