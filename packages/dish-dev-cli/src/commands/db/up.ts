/**
 * Database Up Command
 */

import type { ProcessCommand } from '../../types/command.js';
import { composeInvocation } from '../../core/docker/invocations.js';

export const dbUpCommand: ProcessCommand = {
  kind: 'process',
  name: 'db-up',
  description: 'Start only database (PostgreSQL + pgAdmin)',
  category: 'database',
  invocations: (config) => [composeInvocation('default', config, ['up', '-d'])],
  status: ({ endpoints }) => [
    '✅ Database started!',
    `📊 PostgreSQL: ${endpoints.postgres}`,
    `🔧 pgAdmin: ${endpoints.pgAdmin} (${endpoints.pgAdminLogin})`,
  ],
};
