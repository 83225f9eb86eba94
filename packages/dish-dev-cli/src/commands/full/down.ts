/**
 * Full Stack Down Command
 */

import type { ProcessCommand } from '../../types/command.js';
import { composeInvocation } from '../../core/docker/invocations.js';

export const fullDownCommand: ProcessCommand = {
  kind: 'process',
  name: 'full-down',
  description: 'Stop full stack',
  category: 'full-stack',
  invocations: (config) => [composeInvocation('full', config, ['down'])],
  status: () => ['✅ Full stack stopped!'],
};
