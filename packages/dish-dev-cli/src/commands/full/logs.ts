/**
 * Full Stack Logs Command
 */

import type { ProcessCommand } from '../../types/command.js';
import { standaloneComposeInvocation } from '../../core/docker/invocations.js';

export const fullLogsCommand: ProcessCommand = {
  kind: 'process',
  name: 'full-logs',
  description: 'View all logs',
  category: 'full-stack',
  // Goes through the standalone docker-compose binary, unlike the other compose commands
  invocations: (config) => [standaloneComposeInvocation('full', config, ['logs', '-f'])],
};
