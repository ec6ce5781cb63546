// Runner types
export type {
  CapabilityKind,
  ExecutorClass,
  RunnerProfile,
  RunnerRegistration,
} from './runner.js';

// Job and solver types
export type {
  ImageReference,
  JobDeclaration,
  JobRequirement,
  RankedRunner,
  FeasibilityResult,
} from './job.js';

// Bandit types
export type {
  BanditAlgorithm,
  ArmStatistics,
  BanditState,
  Observation,
  RunnerStatsSnapshot,
  StatsReport,
} from './bandit.js';

// Lifecycle types
export type {
  ComputeMechanism,
  CommandInvocation,
  CommandComputeConfig,
  WebhookCall,
  WebhookComputeConfig,
  KubernetesComputeConfig,
  ComputeConfig,
  ComputeCommandResult,
  LifecyclePhase,
  LifecycleState,
  CapacityAction,
  CapacityActionResult,
} from './lifecycle.js';

// Selection types
export type {
  ProbeResult,
  SelectionExplanation,
  SelectionResponse,
  OutcomeReport,
} from './selection.js';

// Configuration types
export type {
  NATSConfiguration,
  APIConfiguration,
  BanditConfiguration,
  StateBackendKind,
  StateConfiguration,
  AvailabilityProviderKind,
  AvailabilityConfiguration,
  LifecycleConfiguration,
  DispatcherConfiguration,
  CLIConfiguration,
} from './config.js';

export {
  DEFAULT_DISPATCHER_CONFIG,
  DEFAULT_CLI_CONFIG,
} from './config.js';
