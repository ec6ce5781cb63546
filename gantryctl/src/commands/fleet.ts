/**
 * Fleet command - Inspect and register runners
 */

import { Command } from 'commander';
import ora from 'ora';
import type { ExecutorClass, RunnerProfile, RunnerRegistration } from '@gantry/shared';
import { loadConfig } from '../utils/config-file.js';
import { createAPIClient, unwrap } from '../api/client.js';
import {
  output,
  success,
  error,
  createTable,
  truncate,
  formatKeyValue,
  formatTimestamp,
  errorMessage,
} from '../utils/output.js';
import { getGlobalOptions, resolveOutput } from '../cli.js';

const EXECUTOR_CLASSES: readonly ExecutorClass[] = ['container', 'vm', 'orchestrator', 'shell'];

export interface RegisterOptions {
  capabilities: string;
  tags?: string;
  displayName?: string;
  cost?: string;
  executor?: string;
  externalId?: string;
  ciTag?: string;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function isExecutorClass(value: string): value is ExecutorClass {
  return EXECUTOR_CLASSES.some((c) => c === value);
}

/**
 * Registration body from command line options
 *
 * @throws Error for an unknown executor class or invalid numbers
 */
export function buildRegistration(options: RegisterOptions): Omit<RunnerRegistration, 'runnerKey'> {
  const registration: Omit<RunnerRegistration, 'runnerKey'> = {
    capabilities: splitList(options.capabilities),
  };

  if (options.tags) registration.tags = splitList(options.tags);
  if (options.displayName) registration.displayName = options.displayName;
  if (options.ciTag) registration.ciTag = options.ciTag;

  if (options.cost !== undefined) {
    const cost = Number(options.cost);
    if (!Number.isFinite(cost) || cost < 0) {
      throw new Error(`--cost must be a non-negative number, got "${options.cost}"`);
    }
    registration.costPerMinute = cost;
  }

  if (options.executor !== undefined) {
    if (!isExecutorClass(options.executor)) {
      throw new Error(`--executor must be one of: ${EXECUTOR_CLASSES.join(', ')}`);
    }
    registration.executorClass = options.executor;
  }

  if (options.externalId !== undefined) {
    const id = Number(options.externalId);
    if (!Number.isInteger(id) || id <= 0) {
      throw new Error(`--external-id must be a positive integer, got "${options.externalId}"`);
    }
    registration.externalId = id;
  }

  return registration;
}

/**
 * Detail view of one runner
 */
export function renderProfile(profile: RunnerProfile): string {
  return formatKeyValue({
    'Runner': profile.runnerKey,
    'Name': profile.displayName,
    'Executor': profile.executorClass,
    'Cost/min': profile.costPerMinute,
    'Tags': profile.declaredTags.join(', ') || '(none)',
    'Declared': profile.declaredCapabilities.join(', ') || '(none)',
    'Capabilities': profile.capabilities.join(', ') || '(none)',
    'CI tag': profile.ciTag ?? '(none)',
    'External id': profile.externalId ?? '(none)',
    'Updated': formatTimestamp(profile.updatedAt),
  });
}

export function fleetCommand(): Command {
  const cmd = new Command('fleet');

  cmd
    .description('Inspect and register runners')
    .addCommand(fleetListCommand())
    .addCommand(fleetShowCommand())
    .addCommand(fleetRegisterCommand());

  return cmd;
}

function fleetListCommand(): Command {
  const cmd = new Command('list');

  cmd
    .description('List registered runners')
    .alias('ls')
    .option('--capability <cap>', 'Only runners with this capability')
    .action(async (options: { capability?: string }, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const spinner = ora();

      try {
        const config = loadConfig(globalOpts.config);
        const outputOpts = resolveOutput(globalOpts, config);

        if (!outputOpts.quiet && !outputOpts.json) {
          spinner.start('Fetching fleet...');
        }

        const fleet = unwrap(await createAPIClient(config).listFleet({ capability: options.capability }));

        if (spinner.isSpinning) {
          spinner.succeed(`Found ${fleet.count} runners`);
        }

        if (outputOpts.json) {
          output(fleet, outputOpts);
          return;
        }

        if (fleet.count === 0) {
          output('No runners found.', outputOpts);
          return;
        }

        const table = createTable(
          ['Runner', 'Executor', 'Cost/min', 'CI tag', 'Capabilities'],
          fleet.runners.map((r) => [
            r.runnerKey,
            r.executorClass,
            String(r.costPerMinute),
            r.ciTag ?? '-',
            truncate(r.capabilities.join(', '), 40),
          ])
        );
        console.log(table.toString());
      } catch (err) {
        if (spinner.isSpinning) {
          spinner.fail('Failed to fetch fleet');
        }
        error(`Error: ${errorMessage(err)}`, globalOpts);
        process.exit(1);
      }
    });

  return cmd;
}

function fleetShowCommand(): Command {
  const cmd = new Command('show');

  cmd
    .description('Show one runner')
    .argument('<runnerKey>', 'Runner key')
    .action(async (runnerKey: string, _options: unknown, command: Command) => {
      const globalOpts = getGlobalOptions(command);

      try {
        const config = loadConfig(globalOpts.config);
        const outputOpts = resolveOutput(globalOpts, config);
        const profile = unwrap(await createAPIClient(config).getRunner(runnerKey));

        if (outputOpts.json) {
          output(profile, outputOpts);
        } else {
          output(renderProfile(profile), outputOpts);
        }
      } catch (err) {
        error(`Error: ${errorMessage(err)}`, globalOpts);
        process.exit(1);
      }
    });

  return cmd;
}

function fleetRegisterCommand(): Command {
  const cmd = new Command('register');

  cmd
    .description('Register a runner or replace its capabilities (not written to the fleet file)')
    .argument('<runnerKey>', 'Runner key')
    .requiredOption('-c, --capabilities <caps>', 'Comma-separated capabilities')
    .option('-t, --tags <tags>', 'Comma-separated CI tags')
    .option('--display-name <name>', 'Human-readable name')
    .option('--cost <perMinute>', 'Cost per minute')
    .option('--executor <class>', `Executor class (${EXECUTOR_CLASSES.join('|')})`)
    .option('--external-id <id>', 'Runner id in GitLab')
    .option('--ci-tag <tag>', 'Tag that pins a job to this runner')
    .action(async (runnerKey: string, options: RegisterOptions, command: Command) => {
      const globalOpts = getGlobalOptions(command);

      try {
        const config = loadConfig(globalOpts.config);
        const outputOpts = resolveOutput(globalOpts, config);
        const registration = buildRegistration(options);
        const profile = unwrap(await createAPIClient(config).registerRunner(runnerKey, registration));

        if (outputOpts.json) {
          output(profile, outputOpts);
        } else {
          success(`Registered ${profile.runnerKey}`, outputOpts);
          output(renderProfile(profile), outputOpts);
        }
      } catch (err) {
        error(`Error: ${errorMessage(err)}`, globalOpts);
        process.exit(1);
      }
    });

  return cmd;
}
