/**
 * Database Restart Command
 */

import type { ProcessCommand } from '../../types/command.js';
import { composeInvocation } from '../../core/docker/invocations.js';

export const dbRestartCommand: ProcessCommand = {
  kind: 'process',
  name: 'db-restart',
  description: 'Restart database',
  category: 'database',
  invocations: (config) => [composeInvocation('default', config, ['restart'])],
  status: () => ['✅ Database restarted!'],
};
