/**
 * Database Shell Command
 *
 * Opens psql inside the running PostgreSQL container.
 */

import type { ProcessCommand } from '../../types/command.js';
import { execInvocation } from '../../core/docker/invocations.js';

export const dbShellCommand: ProcessCommand = {
  kind: 'process',
  name: 'db-shell',
  description: 'Enter PostgreSQL shell',
  category: 'tools',
  aliases: ['psql'],
  invocations: ({ containers, database }) => [
    execInvocation(containers.postgres, ['psql', '-U', database.user, '-d', database.name]),
  ],
};
