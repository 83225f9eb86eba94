/**
 * Database Commands
 *
 * Manage the database-only stack (the project's default compose file)
 */

export { dbUpCommand } from './up.js';
export { dbDownCommand } from './down.js';
export { dbRestartCommand } from './restart.js';
export { dbLogsCommand } from './logs.js';
export { dbShellCommand } from './shell.js';
