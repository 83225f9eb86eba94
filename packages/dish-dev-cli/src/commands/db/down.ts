/**
 * Database Down Command
 */

import type { ProcessCommand } from '../../types/command.js';
import { composeInvocation } from '../../core/docker/invocations.js';

export const dbDownCommand: ProcessCommand = {
  kind: 'process',
  name: 'db-down',
  description: 'Stop database',
  category: 'database',
  invocations: (config) => [composeInvocation('default', config, ['down'])],
  status: () => ['✅ Database stopped!'],
};
