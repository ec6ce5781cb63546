import type { ComputeCommandResult, ComputeConfig } from '@gantry/shared';
import { commandCompute } from './mechanisms/command.js';
import { webhookCompute } from './mechanisms/webhook.js';
import { kubernetesCompute } from './mechanisms/kubernetes.js';

export type ComputeAction = 'start' | 'stop';

/**
 * Issues one start or stop command. Rejects with LifecycleControlError.
 */
export type ComputeRunner = (action: ComputeAction) => Promise<ComputeCommandResult>;

/**
 * Bind the configured mechanism
 *
 * @returns null when no mechanism is configured
 */
export function createComputeRunner(compute: ComputeConfig): ComputeRunner | null {
  switch (compute.mechanism) {
    case 'none':
      return null;

    case 'command': {
      const config = compute.command;
      return (action) => commandCompute(config, action);
    }

    case 'webhook': {
      const config = compute.webhook;
      return (action) => webhookCompute(config, action);
    }

    case 'kubernetes': {
      const config = compute.kubernetes;
      return (action) => kubernetesCompute(config, action);
    }
  }
}
