/**
 * Clean Command
 *
 * Tears down both stacks and their volumes, whichever of them is running.
 */

import type { ProcessCommand } from '../types/command.js';
import { composeInvocation } from '../core/docker/invocations.js';

export const cleanCommand: ProcessCommand = {
  kind: 'process',
  name: 'clean',
  description: 'Remove all containers and volumes',
  category: 'tools',
  invocations: (config) => [
    composeInvocation('full', config, ['down', '-v']),
    composeInvocation('default', config, ['down', '-v']),
  ],
  status: () => ['✅ All containers and volumes removed!'],
};
