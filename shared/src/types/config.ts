import type { BanditAlgorithm } from './bandit.js';
import type { ComputeConfig } from './lifecycle.js';

/**
 * NATS connection configuration
 */
export interface NATSConfiguration {
  /** Whether to connect at all (state backend and completion events) */
  enabled: boolean;

  /** NATS server URL */
  url: string;

  /** Path to credentials file */
  credentials?: string;

  /** Connection name */
  name?: string;

  /** Reconnect options */
  reconnect?: {
    maxAttempts: number;
    delayMs: number;
  };
}

/**
 * REST API configuration
 */
export interface APIConfiguration {
  /** Whether API is enabled */
  enabled: boolean;

  /** Port to listen on */
  port: number;

  /** Host to bind to */
  host: string;

  /** Bearer tokens for authentication (empty = no auth) */
  authTokens?: string[];

  /** CORS origins */
  corsOrigins?: string[];
}

/**
 * Bandit configuration
 */
export interface BanditConfiguration {
  algorithm: BanditAlgorithm;

  /** UCB1 exploration coefficient */
  explorationConstant: number;

  /** Exploration probability for epsilon-greedy */
  epsilon: number;

  /** Beta prior for Thompson sampling */
  priorAlpha: number;
  priorBeta: number;
}

export type StateBackendKind = 'memory' | 'file' | 'nats-kv';

/**
 * Where bandit statistics are persisted
 */
export interface StateConfiguration {
  backend: StateBackendKind;

  /** JSON document path (file backend) */
  filePath: string;

  /** KV bucket (nats-kv backend, default: gantry-state-<projectId>) */
  bucket?: string;

  /** Key inside the bucket */
  key: string;
}

export type AvailabilityProviderKind = 'gitlab' | 'none';

/**
 * Availability probe configuration
 */
export interface AvailabilityConfiguration {
  provider: AvailabilityProviderKind;

  /** GitLab base URL */
  gitlabUrl: string;

  /** API token. Without it every probe is "unknown". */
  token?: string;

  /** Per-request timeout in ms */
  timeoutMs: number;
}

/**
 * Lifecycle (auto-start / idle shutdown) configuration
 */
export interface LifecycleConfiguration {
  enabled: boolean;

  /** Idle period after the last selection or outcome before shutdown (ms) */
  idleShutdownMs: number;

  /** How often the deadline is checked (ms) */
  checkIntervalMs: number;

  compute: ComputeConfig;
}

/**
 * Full dispatcher configuration
 */
export interface DispatcherConfiguration {
  /** NATS connection settings */
  nats: NATSConfiguration;

  /** Project ID for namespace isolation */
  projectId: string;

  /** Path of the fleet definition file */
  fleetFile: string;

  bandit: BanditConfiguration;

  state: StateConfiguration;

  availability: AvailabilityConfiguration;

  lifecycle: LifecycleConfiguration;

  /** REST API configuration */
  api: APIConfiguration;

  /** Shared secret expected in X-Gitlab-Token on build webhooks */
  webhookSecret?: string;

  /** Logging level */
  logLevel?: 'debug' | 'info' | 'warn' | 'error';
}

/**
 * Default dispatcher configuration
 */
export const DEFAULT_DISPATCHER_CONFIG: DispatcherConfiguration = {
  nats: {
    enabled: false,
    url: 'nats://localhost:4222',
    name: 'gantry-dispatcher',
    reconnect: {
      maxAttempts: 10,
      delayMs: 1000,
    },
  },
  projectId: 'default',
  fleetFile: 'config/fleet.json',
  bandit: {
    algorithm: 'ucb1',
    explorationConstant: 2.0,
    epsilon: 0.1,
    priorAlpha: 1,
    priorBeta: 1,
  },
  state: {
    backend: 'file',
    filePath: '.gantry/bandit-state.json',
    key: 'arms',
  },
  availability: {
    provider: 'gitlab',
    gitlabUrl: 'https://gitlab.com',
    timeoutMs: 5000,
  },
  lifecycle: {
    enabled: true,
    idleShutdownMs: 300000, // 5 minutes
    checkIntervalMs: 15000,
    compute: { mechanism: 'none' },
  },
  api: {
    enabled: true,
    port: 3000,
    host: '0.0.0.0',
  },
  logLevel: 'info',
};

/**
 * CLI configuration (persisted to file)
 */
export interface CLIConfiguration {
  /** Dispatcher API URL */
  apiUrl: string;

  /** API auth token */
  apiToken?: string;

  /** Output format preference */
  outputFormat?: 'table' | 'json';
}

/**
 * Default CLI configuration
 */
export const DEFAULT_CLI_CONFIG: Partial<CLIConfiguration> = {
  apiUrl: 'http://localhost:3000',
  outputFormat: 'table',
};
