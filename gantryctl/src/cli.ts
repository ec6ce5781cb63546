/**
 * CLI command setup using Commander.js
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { z } from 'zod';
import type { CLIConfiguration } from '@gantry/shared';

import { configCommand } from './commands/config.js';
import { selectCommand } from './commands/select.js';
import { reportCommand } from './commands/report.js';
import { statsCommand, resetCommand } from './commands/stats.js';
import { fleetCommand } from './commands/fleet.js';
import { availabilityCommand } from './commands/availability.js';
import { capacityCommand } from './commands/capacity.js';
import type { OutputOptions } from './utils/output.js';

// Get package.json version
const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');

function readVersion(): string {
  if (!existsSync(packageJsonPath)) {
    return '0.0.0';
  }
  const parsed = z
    .object({ version: z.string() })
    .safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
  return parsed.success ? parsed.data.version : '0.0.0';
}

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  quiet?: boolean;
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name('gantryctl')
    .description('Ask the runner dispatcher where CI jobs should run, and teach it how they went')
    .version(readVersion());

  // Global options
  program
    .option('--json', 'Output as JSON instead of formatted tables')
    .option('--config <path>', 'Path to config file (default: ~/.gantry/config.json)')
    .option('-q, --quiet', 'Suppress non-essential output');

  // Register commands
  program.addCommand(configCommand());
  program.addCommand(selectCommand());
  program.addCommand(reportCommand());
  program.addCommand(statsCommand());
  program.addCommand(resetCommand());
  program.addCommand(fleetCommand());
  program.addCommand(availabilityCommand());
  program.addCommand(capacityCommand());

  return program;
}

/**
 * Get global options from the root command
 * Traverses up the command chain to find the root program
 */
export function getGlobalOptions(command: Command): GlobalOptions {
  let root = command;
  while (root.parent) {
    root = root.parent;
  }

  const opts = root.opts<GlobalOptions>();
  return {
    json: opts.json,
    config: opts.config,
    quiet: opts.quiet,
  };
}

/**
 * Output options with the configured format applied when --json is absent
 */
export function resolveOutput(globalOpts: GlobalOptions, config: CLIConfiguration): OutputOptions {
  return {
    json: globalOpts.json ?? config.outputFormat === 'json',
    quiet: globalOpts.quiet,
  };
}
