import type { CommandComputeConfig, ComputeCommandResult } from '@gantry/shared';
import type { ComputeAction } from '../compute.js';
import { runProcess } from './process.js';

/**
 * Start or stop capacity by running a local command (a cloud SDK call,
 * a script)
 */
export async function commandCompute(
  config: CommandComputeConfig,
  action: ComputeAction
): Promise<ComputeCommandResult> {
  const invocation = action === 'start' ? config.start : config.stop;

  const output = await runProcess(invocation.command, invocation.args ?? [], {
    env: invocation.env,
    workingDirectory: invocation.workingDirectory,
    timeoutMs: config.timeoutMs ?? 60000,
  });

  const firstLine = output.stdout.trim().split('\n')[0] ?? '';

  return {
    mechanism: 'command',
    message: firstLine ? `${action} command succeeded: ${firstLine}` : `${action} command succeeded`,
    timestamp: new Date().toISOString(),
  };
}
