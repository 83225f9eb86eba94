/**
 * Database Logs Command
 *
 * Follows the logs until the user interrupts; prints nothing of its own.
 */

import type { ProcessCommand } from '../../types/command.js';
import { composeInvocation } from '../../core/docker/invocations.js';

export const dbLogsCommand: ProcessCommand = {
  kind: 'process',
  name: 'db-logs',
  description: 'View database logs',
  category: 'database',
  invocations: (config) => [composeInvocation('default', config, ['logs', '-f'])],
};
