/**
 * Full Stack Commands
 *
 * Manage database, backend and frontend together
 */

export { fullUpCommand } from './up.js';
export { fullDownCommand } from './down.js';
export { fullRestartCommand } from './restart.js';
export { fullLogsCommand } from './logs.js';
