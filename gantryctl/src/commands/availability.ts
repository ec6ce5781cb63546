/**
 * Availability command - Which runners are online right now
 */

import { Command } from 'commander';
import ora from 'ora';
import type { ProbeResult } from '@gantry/shared';
import { loadConfig } from '../utils/config-file.js';
import { createAPIClient, unwrap } from '../api/client.js';
import { output, error, colorStatus, formatList, formatTimestamp, errorMessage } from '../utils/output.js';
import { getGlobalOptions, resolveOutput } from '../cli.js';

export function renderProbe(result: ProbeResult): string {
  if (result.kind === 'unknown') {
    return `Availability ${colorStatus('unknown')}: ${result.reason}`;
  }
  if (result.online.length === 0) {
    return `No runner is ${colorStatus('online')} (checked ${formatTimestamp(result.checkedAt)})`;
  }
  return `${result.online.length} runner(s) ${colorStatus('online')}:\n${formatList(result.online)}`;
}

export function availabilityCommand(): Command {
  const cmd = new Command('availability');

  cmd
    .description('Probe which registered runners are online')
    .action(async (_options: unknown, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const spinner = ora();

      try {
        const config = loadConfig(globalOpts.config);
        const outputOpts = resolveOutput(globalOpts, config);

        if (!outputOpts.quiet && !outputOpts.json) {
          spinner.start('Probing runners...');
        }

        const result = unwrap(await createAPIClient(config).getAvailability());

        if (spinner.isSpinning) {
          spinner.stop();
        }

        if (outputOpts.json) {
          output(result, outputOpts);
        } else {
          output(renderProbe(result), outputOpts);
        }
      } catch (err) {
        if (spinner.isSpinning) {
          spinner.fail('Probe failed');
        }
        error(`Error: ${errorMessage(err)}`, globalOpts);
        process.exit(1);
      }
    });

  return cmd;
}
