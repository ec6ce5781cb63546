/**
 * Stats commands - Show and reset learned runner statistics
 */

import { Command } from 'commander';
import ora from 'ora';
import type { StatsReport } from '@gantry/shared';
import { loadConfig } from '../utils/config-file.js';
import { createAPIClient, unwrap } from '../api/client.js';
import {
  output,
  success,
  error,
  createTable,
  formatPercent,
  formatSeconds,
  errorMessage,
} from '../utils/output.js';
import { confirm } from '../utils/prompts.js';
import { getGlobalOptions, resolveOutput } from '../cli.js';

/**
 * Table rows in ranking order, best runner first
 */
export function statsRows(stats: StatsReport): string[][] {
  const rows: string[][] = [];
  stats.ranking.forEach((runnerKey, index) => {
    const arm = stats.runners[runnerKey];
    if (!arm) return;
    rows.push([
      String(index + 1),
      runnerKey,
      String(arm.pulls),
      arm.meanReward.toFixed(4),
      arm.pulls > 0 ? formatPercent(arm.successRate) : '-',
      arm.pulls > 0 ? formatSeconds(arm.avgDuration) : '-',
    ]);
  });
  return rows;
}

export function statsCommand(): Command {
  const cmd = new Command('stats');

  cmd
    .description('Show learned statistics per runner')
    .action(async (_options: unknown, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const spinner = ora();

      try {
        const config = loadConfig(globalOpts.config);
        const outputOpts = resolveOutput(globalOpts, config);

        if (!outputOpts.quiet && !outputOpts.json) {
          spinner.start('Fetching statistics...');
        }

        const stats = unwrap(await createAPIClient(config).getStats());

        if (spinner.isSpinning) {
          spinner.succeed('Statistics retrieved');
        }

        if (outputOpts.json) {
          output(stats, outputOpts);
          return;
        }

        console.log(`\nAlgorithm: ${stats.algorithm}    Observations: ${stats.totalObservations}\n`);

        const rows = statsRows(stats);
        if (rows.length === 0) {
          output('No runners registered.', outputOpts);
          return;
        }

        const table = createTable(['#', 'Runner', 'Jobs', 'Mean reward', 'Success', 'Avg duration'], rows);
        console.log(table.toString());
      } catch (err) {
        if (spinner.isSpinning) {
          spinner.fail('Failed to fetch statistics');
        }
        error(`Error: ${errorMessage(err)}`, globalOpts);
        process.exit(1);
      }
    });

  return cmd;
}

export function resetCommand(): Command {
  const cmd = new Command('reset');

  cmd
    .description('Forget all learned statistics')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (options: { yes?: boolean }, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const spinner = ora();

      try {
        const config = loadConfig(globalOpts.config);
        const outputOpts = resolveOutput(globalOpts, config);

        if (!options.yes) {
          const confirmed = await confirm('Reset all runner statistics? The dispatcher will start learning from scratch.');
          if (!confirmed) {
            output('Cancelled.', outputOpts);
            return;
          }
        }

        if (!outputOpts.quiet && !outputOpts.json) {
          spinner.start('Resetting statistics...');
        }

        unwrap(await createAPIClient(config).resetStats());

        if (spinner.isSpinning) {
          spinner.stop();
        }
        success('Statistics reset', outputOpts);
      } catch (err) {
        if (spinner.isSpinning) {
          spinner.fail('Failed to reset statistics');
        }
        error(`Error: ${errorMessage(err)}`, globalOpts);
        process.exit(1);
      }
    });

  return cmd;
}
