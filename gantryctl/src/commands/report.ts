/**
 * Report command - Tell the dispatcher how a job went
 */

import { Command } from 'commander';
import ora from 'ora';
import { loadConfig } from '../utils/config-file.js';
import { createAPIClient, unwrap, type OutcomeRequest } from '../api/client.js';
import { output, success, warning, error, formatKeyValue, errorMessage } from '../utils/output.js';
import { promptOutcome } from '../utils/prompts.js';
import { getGlobalOptions, resolveOutput } from '../cli.js';

export interface ReportOptions {
  success?: boolean;
  failure?: boolean;
  duration?: string;
  cost?: string;
  decision?: string;
}

export interface ParsedReport {
  runnerKey: string;
  success?: boolean;
  durationSeconds?: number;
  costPerMinute?: number;
  decisionId?: string;
}

function parseNonNegative(flag: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${flag} must be a non-negative number, got "${value}"`);
  }
  return parsed;
}

/**
 * Outcome fields given on the command line
 *
 * @throws Error when both --success and --failure are given, or a number is invalid
 */
export function parseReportOptions(runnerKey: string, options: ReportOptions): ParsedReport {
  if (options.success && options.failure) {
    throw new Error('Use either --success or --failure, not both');
  }

  const report: ParsedReport = { runnerKey };

  if (options.success) report.success = true;
  if (options.failure) report.success = false;
  if (options.duration !== undefined) report.durationSeconds = parseNonNegative('--duration', options.duration);
  if (options.cost !== undefined) report.costPerMinute = parseNonNegative('--cost', options.cost);
  if (options.decision) report.decisionId = options.decision;

  return report;
}

export function reportCommand(): Command {
  const cmd = new Command('report');

  cmd
    .description('Report the outcome of a job on a runner')
    .argument('<runnerKey>', 'Runner the job ran on')
    .option('--success', 'The job succeeded')
    .option('--failure', 'The job failed')
    .option('-d, --duration <seconds>', 'Job duration in seconds')
    .option('--cost <perMinute>', 'Cost per minute (default: the runner\'s registered cost)')
    .option('--decision <id>', 'Decision id returned by select')
    .action(async (runnerKey: string, options: ReportOptions, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const spinner = ora();

      try {
        const config = loadConfig(globalOpts.config);
        const outputOpts = resolveOutput(globalOpts, config);
        const parsed = parseReportOptions(runnerKey, options);

        let outcome = { success: parsed.success, durationSeconds: parsed.durationSeconds };
        if (outcome.success === undefined || outcome.durationSeconds === undefined) {
          if (!process.stdin.isTTY) {
            error('--success or --failure, and --duration, are required when not running interactively', globalOpts);
            process.exit(1);
          }
          outcome = await promptOutcome(outcome);
        }

        if (outcome.success === undefined || outcome.durationSeconds === undefined) {
          error('Outcome is incomplete', globalOpts);
          process.exit(1);
        }

        const request: OutcomeRequest = {
          runnerKey: parsed.runnerKey,
          success: outcome.success,
          durationSeconds: outcome.durationSeconds,
          costPerMinute: parsed.costPerMinute,
          decisionId: parsed.decisionId,
        };

        if (!outputOpts.quiet && !outputOpts.json) {
          spinner.start('Reporting outcome...');
        }

        const result = unwrap(await createAPIClient(config).reportOutcome(request));

        if (spinner.isSpinning) {
          spinner.stop();
        }

        if (outputOpts.json) {
          output(result, outputOpts);
          return;
        }

        success(`Recorded ${request.success ? 'success' : 'failure'} on ${result.runnerKey}`, outputOpts);
        if (!outputOpts.quiet) {
          console.log(formatKeyValue({ 'Reward': result.reward.toFixed(4), 'Persisted': result.persisted ? 'yes' : 'no' }));
        }
        result.degraded.forEach((note) => warning(note, outputOpts));
      } catch (err) {
        if (spinner.isSpinning) {
          spinner.fail('Failed to report outcome');
        }
        error(`Error: ${errorMessage(err)}`, globalOpts);
        process.exit(1);
      }
    });

  return cmd;
}

