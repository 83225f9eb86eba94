/**
 * Core Type Definitions for dish-dev
 */

export type * from './command.js';
export type * from './config.js';
export type * from './output.js';
export * from './errors.js';
