/**
 * Backend Shell Command
 */

import type { ProcessCommand } from '../../types/command.js';
import { execInvocation } from '../../core/docker/invocations.js';

export const backendShellCommand: ProcessCommand = {
  kind: 'process',
  name: 'backend-shell',
  description: 'Enter backend container shell',
  category: 'tools',
  invocations: ({ containers }) => [execInvocation(containers.backend, [containers.backendShell])],
};
