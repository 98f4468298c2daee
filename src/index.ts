#!/usr/bin/env node

import { createProgram } from './cli/program.js';
import { logger } from './utils/logger.js';

/**
 * shpp CLI - Main entry point
 */

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', reason);
  process.exit(1);
});

await createProgram().parseAsync(process.argv);
