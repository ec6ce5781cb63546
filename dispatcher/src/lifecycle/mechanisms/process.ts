import { spawn } from 'node:child_process';
import { LifecycleControlError } from '../../errors.js';

export interface ProcessOptions {
  env?: Record<string, string>;
  workingDirectory?: string;
  timeoutMs: number;
}

export interface ProcessOutput {
  stdout: string;
  stderr: string;
}

/**
 * Run a command to completion
 *
 * Rejects with LifecycleControlError on spawn failure, non-zero exit or
 * timeout (the child is killed).
 */
export function runProcess(command: string, args: string[], options: ProcessOptions): Promise<ProcessOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.workingDirectory ?? process.cwd(),
      env: {
        ...process.env,
        ...(options.env ?? {}),
      },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    const timeout = setTimeout(() => {
      settled = true;
      child.kill();
      reject(new LifecycleControlError(`${command} timed out after ${options.timeoutMs}ms`));
    }, options.timeoutMs);

    child.on('error', (error) => {
      clearTimeout(timeout);
      if (settled) return;
      settled = true;
      reject(new LifecycleControlError(`Failed to spawn ${command}: ${error.message}`, { cause: error }));
    });

    child.on('close', (code, signal) => {
      clearTimeout(timeout);
      if (settled) return;
      settled = true;

      if (code === 0) {
        resolve({ stdout, stderr });
      } else {
        const detail = stderr.trim() || stdout.trim() || `exited with ${code !== null ? `code ${code}` : `signal ${signal}`}`;
        reject(new LifecycleControlError(`${command} failed: ${detail}`));
      }
    });
  });
}
