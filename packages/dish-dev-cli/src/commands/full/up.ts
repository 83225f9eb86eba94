/**
 * Full Stack Up Command
 *
 * Rebuilds images before starting so backend and frontend pick up code changes.
 */

import type { ProcessCommand } from '../../types/command.js';
import { composeInvocation } from '../../core/docker/invocations.js';

export const fullUpCommand: ProcessCommand = {
  kind: 'process',
  name: 'full-up',
  description: 'Start full stack (DB + Backend + Frontend)',
  category: 'full-stack',
  invocations: (config) => [composeInvocation('full', config, ['up', '-d', '--build'])],
  status: ({ endpoints }) => [
    '✅ Full stack started!',
    `🔙 Backend: ${endpoints.backend}`,
    `🎨 Frontend: ${endpoints.frontend}`,
    `📊 PostgreSQL: ${endpoints.postgres}`,
    `🔧 pgAdmin: ${endpoints.pgAdmin}`,
  ],
};
