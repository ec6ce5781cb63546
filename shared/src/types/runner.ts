/**
 * Capability categories. Anything not in the standard taxonomy is `custom`.
 */
export type CapabilityKind =
  | 'executor'
  | 'platform'
  | 'cloud'
  | 'hardware'
  | 'network'
  | 'custom';

/**
 * How a runner executes jobs
 */
export type ExecutorClass = 'container' | 'vm' | 'orchestrator' | 'shell';

/**
 * A registered execution agent
 *
 * `capabilities` is always the closed set: declared capabilities plus
 * everything reachable through the implication rules.
 */
export interface RunnerProfile {
  /** Stable key, used to index bandit statistics */
  runnerKey: string;

  /** Human-readable name */
  displayName: string;

  /** Tags as declared to the orchestrating CI system */
  declaredTags: string[];

  /** Capabilities as declared at registration (before closure) */
  declaredCapabilities: string[];

  /** Closed capability set, sorted */
  capabilities: string[];

  /** Cost of one minute of runtime (non-negative) */
  costPerMinute: number;

  executorClass: ExecutorClass;

  /** Runner id in the orchestrating system (used by the availability probe) */
  externalId?: number;

  /** Tag a pipeline should use to pin a job to this runner */
  ciTag?: string;

  registeredAt: string;
  updatedAt: string;
}

/**
 * Runner registration payload (fleet file entry or API body)
 */
export interface RunnerRegistration {
  runnerKey: string;
  displayName?: string;
  tags?: string[];
  capabilities: string[];
  costPerMinute?: number;
  executorClass?: ExecutorClass;
  externalId?: number;
  ciTag?: string;
}
