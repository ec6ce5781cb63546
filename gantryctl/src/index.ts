#!/usr/bin/env node

/**
 * gantryctl entry point
 */

import { createCLI } from './cli.js';
import { errorMessage } from './utils/output.js';

async function main() {
  const cli = createCLI();
  await cli.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', errorMessage(error));
  process.exit(1);
});
