/**
 * Capacity command - On-demand compute status and manual control
 */

import { Command } from 'commander';
import ora from 'ora';
import type { CapacityActionResult } from '@gantry/shared';
import { loadConfig } from '../utils/config-file.js';
import { createAPIClient, unwrap, type APIResponse, type GantryAPIClient } from '../api/client.js';
import {
  output,
  success,
  warning,
  error,
  colorStatus,
  formatKeyValue,
  formatTimestamp,
  errorMessage,
} from '../utils/output.js';
import { confirm } from '../utils/prompts.js';
import { getGlobalOptions, resolveOutput } from '../cli.js';

export function capacityCommand(): Command {
  const cmd = new Command('capacity');

  cmd
    .description('Show or control on-demand capacity')
    .addCommand(capacityStatusCommand())
    .addCommand(capacityActionCommand('start', 'Start capacity (never stopped on idle)', (c) => c.startCapacity()))
    .addCommand(capacityActionCommand('stop', 'Stop capacity now', (c) => c.stopCapacity(), true));

  return cmd;
}

function capacityStatusCommand(): Command {
  const cmd = new Command('status');

  cmd
    .description('Show capacity state and idle shutdown deadline')
    .action(async (_options: unknown, command: Command) => {
      const globalOpts = getGlobalOptions(command);

      try {
        const config = loadConfig(globalOpts.config);
        const outputOpts = resolveOutput(globalOpts, config);
        const status = unwrap(await createAPIClient(config).getLifecycle());

        if (outputOpts.json) {
          output(status, outputOpts);
          return;
        }

        output(
          formatKeyValue({
            'Configured': status.configured ? 'yes' : 'no',
            'Phase': colorStatus(status.state.phase),
            'Started': formatTimestamp(status.state.startedAt),
            'Auto-started': status.state.autoStarted ? 'yes' : 'no',
            'Shutdown': status.state.shutdownDeadline ? formatTimestamp(status.state.shutdownDeadline) : 'not scheduled',
            'Idle timeout': `${Math.round(status.idleShutdownMs / 1000)}s`,
          }),
          outputOpts
        );
      } catch (err) {
        error(`Error: ${errorMessage(err)}`, globalOpts);
        process.exit(1);
      }
    });

  return cmd;
}

function capacityActionCommand(
  name: 'start' | 'stop',
  description: string,
  call: (client: GantryAPIClient) => Promise<APIResponse<CapacityActionResult>>,
  askFirst = false
): Command {
  const cmd = new Command(name);

  cmd
    .description(description)
    .option('-y, --yes', 'Skip confirmation')
    .action(async (options: { yes?: boolean }, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const spinner = ora();

      try {
        const config = loadConfig(globalOpts.config);
        const outputOpts = resolveOutput(globalOpts, config);

        if (askFirst && !options.yes && !(await confirm(`${name} capacity now?`))) {
          output('Cancelled.', outputOpts);
          return;
        }

        if (!outputOpts.quiet && !outputOpts.json) {
          spinner.start(`Requesting ${name}...`);
        }

        const result = unwrap(await call(createAPIClient(config)));

        if (spinner.isSpinning) {
          spinner.stop();
        }

        if (outputOpts.json) {
          output(result, outputOpts);
        } else if (result.action === 'started' || result.action === 'stopped') {
          success(result.message, outputOpts);
        } else {
          warning(`${colorStatus(result.action)}: ${result.message}`, outputOpts);
        }
      } catch (err) {
        if (spinner.isSpinning) {
          spinner.fail(`Capacity ${name} failed`);
        }
        error(`Error: ${errorMessage(err)}`, globalOpts);
        process.exit(1);
      }
    });

  return cmd;
}
