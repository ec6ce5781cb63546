import type { ComputeCommandResult, KubernetesComputeConfig } from '@gantry/shared';
import type { ComputeAction } from '../compute.js';
import { runProcess } from './process.js';

/**
 * Start or stop capacity by scaling a runner deployment
 */
export async function kubernetesCompute(
  config: KubernetesComputeConfig,
  action: ComputeAction
): Promise<ComputeCommandResult> {
  await runProcess('kubectl', kubectlScaleArgs(config, action), {
    timeoutMs: config.timeoutMs ?? 30000,
  });

  return {
    mechanism: 'kubernetes',
    message: `deployment/${config.deployment} scaled to ${targetReplicas(config, action)} in ${config.namespace}`,
    timestamp: new Date().toISOString(),
  };
}

export function kubectlScaleArgs(config: KubernetesComputeConfig, action: ComputeAction): string[] {
  const args: string[] = [];
  if (config.context) {
    args.push('--context', config.context);
  }
  args.push(
    'scale',
    `deployment/${config.deployment}`,
    `--replicas=${targetReplicas(config, action)}`,
    '-n', config.namespace,
  );
  return args;
}

function targetReplicas(config: KubernetesComputeConfig, action: ComputeAction): number {
  return action === 'start' ? config.replicas ?? 1 : 0;
}
