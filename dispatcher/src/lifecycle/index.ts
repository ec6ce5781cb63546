export {
  LifecycleController,
  type LifecycleControllerConfig,
} from './controller.js';

export {
  createComputeRunner,
  type ComputeAction,
  type ComputeRunner,
} from './compute.js';

export { commandCompute } from './mechanisms/command.js';
export { webhookCompute, substituteTemplate } from './mechanisms/webhook.js';
export { kubernetesCompute, kubectlScaleArgs } from './mechanisms/kubernetes.js';
export { runProcess, type ProcessOptions, type ProcessOutput } from './mechanisms/process.js';
