/**
 * Router Layer Index
 */

export { CommandRegistry, createCommandRegistry } from './command-registry.js';
export { CommandRouter, createCommandRouter } from './command-router.js';
