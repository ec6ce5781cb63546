#!/usr/bin/env node
/**
 * Runner Dispatcher Entry Point
 *
 * Serves runner selections for CI jobs, learns from job outcomes and
 * starts or stops on-demand capacity.
 */

import { startService } from './service.js';

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  console.error('Uncaught exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

// Start the service
startService().catch((error) => {
  console.error('Failed to start runner dispatcher:', error);
  process.exit(1);
});
