/**
 * Full Stack Restart Command
 */

import type { ProcessCommand } from '../../types/command.js';
import { composeInvocation } from '../../core/docker/invocations.js';

export const fullRestartCommand: ProcessCommand = {
  kind: 'process',
  name: 'full-restart',
  description: 'Restart full stack',
  category: 'full-stack',
  invocations: (config) => [composeInvocation('full', config, ['restart'])],
  status: () => ['✅ Full stack restarted!'],
};
