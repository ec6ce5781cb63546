/**
 * Select command - Ask the dispatcher where a job should run
 */

import { Command } from 'commander';
import { readFile } from 'fs/promises';
import ora from 'ora';
import chalk from 'chalk';
import type { JobDeclaration, SelectionResponse } from '@gantry/shared';
import { loadConfig } from '../utils/config-file.js';
import { createAPIClient, unwrap } from '../api/client.js';
import {
  output,
  error,
  createTable,
  colorConfidence,
  formatKeyValue,
  formatList,
  errorMessage,
  type OutputOptions,
} from '../utils/output.js';
import { getGlobalOptions, resolveOutput } from '../cli.js';

export interface SelectOptions {
  name?: string;
  tags?: string;
  image?: string;
  service?: string[];
  timeout?: string;
  var?: string[];
  file?: string;
  job?: string;
}

/**
 * Build a job declaration from command line options
 *
 * @throws Error for variables not written as KEY=VALUE
 */
export function buildJobDeclaration(options: SelectOptions): JobDeclaration {
  const job: JobDeclaration = {};

  if (options.name) {
    job.name = options.name;
  }

  if (options.tags) {
    job.tags = options.tags
      .split(',')
      .map((t) => t.trim())
      .filter((t) => t.length > 0);
  }

  if (options.image) {
    job.image = options.image;
  }

  if (options.service && options.service.length > 0) {
    job.services = options.service;
  }

  if (options.timeout) {
    job.timeout = /^\d+$/.test(options.timeout) ? Number(options.timeout) : options.timeout;
  }

  if (options.var && options.var.length > 0) {
    const variables: Record<string, string> = {};
    for (const entry of options.var) {
      const separator = entry.indexOf('=');
      if (separator <= 0) {
        throw new Error(`Invalid variable "${entry}", expected KEY=VALUE`);
      }
      variables[entry.slice(0, separator)] = entry.slice(separator + 1);
    }
    job.variables = variables;
  }

  return job;
}

/**
 * Numbers behind the bandit's pick, or why there are none
 */
export function formatBandit(explanation: SelectionResponse['explanation']): string {
  if (explanation.algorithm === null) {
    return 'not consulted';
  }
  const mean = (explanation.meanReward ?? 0).toFixed(4);
  const value = explanation.value === null ? '' : `, value ${explanation.value.toFixed(4)}`;
  return `${explanation.algorithm}, mean ${mean} over ${explanation.pulls ?? 0} pulls${value}`;
}

/**
 * Human-readable explanation of one decision
 */
export function renderSelection(response: SelectionResponse): string {
  const { explanation } = response;
  const lines: string[] = [];

  const runner = response.runnerKey
    ? chalk.bold(response.runnerKey) + (explanation.recommendedTag ? ` (tag: ${explanation.recommendedTag})` : '')
    : chalk.red('none');

  lines.push(
    formatKeyValue({
      'Job': explanation.jobName || '(unnamed)',
      'Runner': runner,
      'Confidence': colorConfidence(explanation.confidence),
      'Feasible': explanation.feasibleRunners.join(', ') || '(none)',
      'Online': explanation.onlineRunners === null ? 'unknown' : explanation.onlineRunners.join(', ') || '(none)',
      'Capacity': explanation.capacityRequested ? 'requested' : 'not requested',
      'Bandit': formatBandit(explanation),
      'Took': `${explanation.solveTimeMs.toFixed(1)}ms`,
      'Decision': explanation.decisionId,
    })
  );

  lines.push('', chalk.bold('Requirements:'), indent(explanation.symbolicReasoning));
  lines.push('', chalk.bold('Learning:'), indent(explanation.statisticalReasoning));

  if (explanation.degraded.length > 0) {
    lines.push('', chalk.yellow('Degraded:'), formatList(explanation.degraded));
  }

  return lines.join('\n');
}

/**
 * One table row per job of a pipeline
 */
export function pipelineRows(decisions: SelectionResponse[]): string[][] {
  return decisions.map((d) => [
    d.explanation.jobName,
    d.runnerKey ?? chalk.red('none'),
    d.explanation.recommendedTag ?? '-',
    colorConfidence(d.explanation.confidence),
    d.explanation.degraded.length > 0 ? chalk.yellow(String(d.explanation.degraded.length)) : '-',
  ]);
}

function printSelection(response: SelectionResponse, outputOpts: OutputOptions): void {
  if (outputOpts.json) {
    output(response, outputOpts);
  } else if (!outputOpts.quiet) {
    console.log(renderSelection(response));
  } else if (response.runnerKey) {
    // Quiet mode prints just the key for scripting
    console.log(response.runnerKey);
  }

  if (!response.runnerKey) {
    process.exitCode = 2;
  }
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `  ${line}`)
    .join('\n');
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function selectCommand(): Command {
  const cmd = new Command('select');

  cmd
    .description('Select a runner for a job, or for every job of a CI file')
    .option('-n, --name <name>', 'Job name')
    .option('-t, --tags <tags>', 'Comma-separated job tags')
    .option('-i, --image <image>', 'Container image')
    .option('-s, --service <service>', 'Service image (repeatable)', collect)
    .option('--timeout <timeout>', 'Job timeout (seconds or e.g. "1h 30m")')
    .option('--var <KEY=VALUE>', 'CI variable (repeatable)', collect)
    .option('-f, --file <path>', 'CI file (YAML); selects for every job in it')
    .option('-j, --job <name>', 'With --file, show only this job')
    .action(async (options: SelectOptions, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const spinner = ora();

      try {
        const config = loadConfig(globalOpts.config);
        const outputOpts = resolveOutput(globalOpts, config);
        const client = createAPIClient(config);

        if (options.file) {
          const content = await readFile(options.file, 'utf-8');

          if (!outputOpts.quiet && !outputOpts.json) {
            spinner.start(`Selecting runners for ${options.file}...`);
          }

          const result = unwrap(await client.selectPipeline(content));

          if (options.job) {
            const decision = result.decisions.find((d) => d.explanation.jobName === options.job);
            if (!decision) {
              if (spinner.isSpinning) {
                spinner.fail(`Job ${options.job} not found`);
              }
              error(`No job named ${options.job} in ${options.file}`, globalOpts);
              process.exit(1);
            }
            if (spinner.isSpinning) {
              spinner.stop();
            }
            printSelection(decision, outputOpts);
            return;
          }

          if (spinner.isSpinning) {
            spinner.succeed(`${result.count} job(s) placed`);
          }

          if (outputOpts.json) {
            output(result, outputOpts);
          } else if (result.count === 0) {
            output('No jobs found.', outputOpts);
          } else {
            const table = createTable(['Job', 'Runner', 'Tag', 'Confidence', 'Degraded'], pipelineRows(result.decisions));
            console.log(table.toString());
          }
          return;
        }

        const job = buildJobDeclaration(options);

        if (!outputOpts.quiet && !outputOpts.json) {
          spinner.start('Selecting runner...');
        }

        const response = unwrap(await client.selectRunner(job));

        if (spinner.isSpinning) {
          if (response.runnerKey) {
            spinner.succeed(`Selected ${response.runnerKey}`);
          } else {
            spinner.warn('No registered runner can run this job');
          }
        }

        printSelection(response, outputOpts);
      } catch (err) {
        if (spinner.isSpinning) {
          spinner.fail('Selection failed');
        }
        error(`Error: ${errorMessage(err)}`, globalOpts);
        process.exit(1);
      }
    });

  return cmd;
}
