/**
 * Mechanisms for powering on-demand capacity up and down
 */
export type ComputeMechanism = 'none' | 'command' | 'webhook' | 'kubernetes';

/**
 * A spawned command (e.g. a cloud SDK call)
 */
export interface CommandInvocation {
  command: string;
  args?: string[];
  env?: Record<string, string>;
  workingDirectory?: string;
}

/**
 * Start/stop through local commands
 */
export interface CommandComputeConfig {
  start: CommandInvocation;
  stop: CommandInvocation;
  /** Per-command timeout in ms (default: 60000) */
  timeoutMs?: number;
}

/**
 * An HTTP call to a control plane
 */
export interface WebhookCall {
  url: string;
  method?: 'POST' | 'PUT';
  headers?: Record<string, string>;
  /** JSON body template with {{action}}, {{instance}} and {{timestamp}} placeholders */
  bodyTemplate?: string;
}

/**
 * Start/stop through HTTP calls
 */
export interface WebhookComputeConfig {
  /** Instance name substituted into body templates */
  instance?: string;
  start: WebhookCall;
  stop: WebhookCall;
  /** Expected success status codes (default: [200, 201, 202, 204]) */
  successCodes?: number[];
  /** Request timeout in ms (default: 30000) */
  timeoutMs?: number;
}

/**
 * Start/stop by scaling a Kubernetes deployment
 */
export interface KubernetesComputeConfig {
  namespace: string;
  deployment: string;
  /** Replicas when started (default: 1) */
  replicas?: number;
  /** kubectl context (default: current context) */
  context?: string;
  /** kubectl timeout in ms (default: 30000) */
  timeoutMs?: number;
}

/**
 * Compute-control configuration (discriminated by mechanism)
 */
export type ComputeConfig =
  | { mechanism: 'none' }
  | { mechanism: 'command'; command: CommandComputeConfig }
  | { mechanism: 'webhook'; webhook: WebhookComputeConfig }
  | { mechanism: 'kubernetes'; kubernetes: KubernetesComputeConfig };

/**
 * Result of a single start or stop command
 */
export interface ComputeCommandResult {
  mechanism: ComputeMechanism;
  message: string;
  timestamp: string;
}

/**
 * Lifecycle controller phase
 */
export type LifecyclePhase = 'idle' | 'starting' | 'running' | 'stopping';

/**
 * Controller state
 *
 * `autoStarted === false` means the controller never issues a stop on
 * idle timeout.
 */
export interface LifecycleState {
  autoStarted: boolean;
  startedAt: string | null;
  shutdownDeadline: string | null;
  phase: LifecyclePhase;
}

/**
 * What a capacity operation did
 */
export type CapacityAction =
  | 'started'
  | 'already-started'
  | 'stopped'
  | 'not-configured'
  | 'skipped'
  | 'failed';

export interface CapacityActionResult {
  action: CapacityAction;
  message: string;
  state: LifecycleState;
}
