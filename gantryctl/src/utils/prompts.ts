/**
 * Interactive prompts using inquirer
 */

import inquirer from 'inquirer';

/**
 * Confirm action
 */
export async function confirm(message: string, defaultValue = false): Promise<boolean> {
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message,
      default: defaultValue,
    },
  ]);
  return confirmed;
}

/**
 * Ask for the outcome of a job when it was not given on the command line
 */
export async function promptOutcome(
  defaults: { success?: boolean; durationSeconds?: number } = {}
): Promise<{ success: boolean; durationSeconds: number }> {
  const answers = await inquirer.prompt<{ success: boolean; durationSeconds: number }>([
    {
      type: 'confirm',
      name: 'success',
      message: 'Did the job succeed?',
      default: true,
      when: defaults.success === undefined,
    },
    {
      type: 'number',
      name: 'durationSeconds',
      message: 'Job duration (seconds):',
      when: defaults.durationSeconds === undefined,
      validate: (input: number | undefined) => {
        if (input === undefined || Number.isNaN(input) || input < 0) {
          return 'Duration must be a non-negative number';
        }
        return true;
      },
    },
  ]);

  return {
    success: defaults.success ?? answers.success,
    durationSeconds: defaults.durationSeconds ?? answers.durationSeconds,
  };
}
