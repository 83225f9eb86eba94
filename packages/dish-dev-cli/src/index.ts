#!/usr/bin/env node

/**
 * dish-dev - Main Entry Point
 */

import { runCLI } from './cli.js';
import { setupGlobalErrorHandlers } from './utils/error-handler.js';
import { createLogger } from './utils/logger.js';

const args = process.argv.slice(2);
const verbose = args.includes('--verbose') || args.includes('-v');
const colors = !args.includes('--no-color') && !process.env.NO_COLOR;

async function main(): Promise<void> {
  setupGlobalErrorHandlers({ verbose, colors });

  process.exitCode = await runCLI(args);
}

main().catch((error: unknown) => {
  createLogger({ colors }).error('Fatal error:', error);
  process.exit(1);
});
