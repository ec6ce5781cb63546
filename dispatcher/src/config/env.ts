import type { BanditAlgorithm, DispatcherConfiguration, StateBackendKind, AvailabilityProviderKind } from '@gantry/shared';
import { DEFAULT_DISPATCHER_CONFIG, isLogLevel } from '@gantry/shared';
import { ConfigurationError } from '../errors.js';

const BANDIT_ALGORITHMS: readonly BanditAlgorithm[] = ['ucb1', 'thompson', 'epsilon-greedy'];
const STATE_BACKENDS: readonly StateBackendKind[] = ['memory', 'file', 'nats-kv'];
const AVAILABILITY_PROVIDERS: readonly AvailabilityProviderKind[] = ['gitlab', 'none'];

/**
 * Load configuration from defaults and environment variables
 *
 * @throws ConfigurationError for values that cannot be used
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DispatcherConfiguration {
  const config = structuredClone(DEFAULT_DISPATCHER_CONFIG);

  // NATS
  if (env.NATS_URL) {
    config.nats.url = env.NATS_URL;
  }
  if (env.NATS_ENABLED) {
    config.nats.enabled = parseBoolean('NATS_ENABLED', env.NATS_ENABLED);
  }
  if (env.NATS_CREDS_FILE) {
    config.nats.credentials = env.NATS_CREDS_FILE;
  }

  if (env.GANTRY_PROJECT_ID) {
    config.projectId = env.GANTRY_PROJECT_ID;
  }
  if (env.GANTRY_FLEET_FILE) {
    config.fleetFile = env.GANTRY_FLEET_FILE;
  }

  // REST API
  if (env.API_PORT) {
    config.api.port = parseInteger('API_PORT', env.API_PORT);
  }
  if (env.API_HOST) {
    config.api.host = env.API_HOST;
  }
  if (env.API_TOKENS) {
    config.api.authTokens = env.API_TOKENS.split(',').map(t => t.trim()).filter(t => t.length > 0);
  }

  // Bandit
  if (env.BANDIT_ALGORITHM) {
    config.bandit.algorithm = parseChoice('BANDIT_ALGORITHM', env.BANDIT_ALGORITHM, BANDIT_ALGORITHMS);
  }
  if (env.BANDIT_UCB_C) {
    config.bandit.explorationConstant = parseNumber('BANDIT_UCB_C', env.BANDIT_UCB_C);
  }
  if (env.BANDIT_EPSILON) {
    const epsilon = parseNumber('BANDIT_EPSILON', env.BANDIT_EPSILON);
    if (epsilon > 1) {
      throw new ConfigurationError(`BANDIT_EPSILON must be between 0 and 1, got ${env.BANDIT_EPSILON}`);
    }
    config.bandit.epsilon = epsilon;
  }

  // State
  if (env.STATE_BACKEND) {
    config.state.backend = parseChoice('STATE_BACKEND', env.STATE_BACKEND, STATE_BACKENDS);
  }
  if (env.STATE_FILE) {
    config.state.filePath = env.STATE_FILE;
  }
  if (env.STATE_BUCKET) {
    config.state.bucket = env.STATE_BUCKET;
  }
  if (env.STATE_KEY) {
    config.state.key = env.STATE_KEY;
  }

  // Availability
  if (env.AVAILABILITY_PROVIDER) {
    config.availability.provider = parseChoice('AVAILABILITY_PROVIDER', env.AVAILABILITY_PROVIDER, AVAILABILITY_PROVIDERS);
  }
  if (env.GITLAB_URL) {
    config.availability.gitlabUrl = env.GITLAB_URL;
  }
  if (env.GITLAB_API_TOKEN) {
    config.availability.token = env.GITLAB_API_TOKEN;
  }

  // Lifecycle
  if (env.LIFECYCLE_ENABLED) {
    config.lifecycle.enabled = parseBoolean('LIFECYCLE_ENABLED', env.LIFECYCLE_ENABLED);
  }
  if (env.IDLE_SHUTDOWN_MS) {
    config.lifecycle.idleShutdownMs = parseInteger('IDLE_SHUTDOWN_MS', env.IDLE_SHUTDOWN_MS);
  }

  if (env.GITLAB_WEBHOOK_SECRET) {
    config.webhookSecret = env.GITLAB_WEBHOOK_SECRET;
  }

  if (env.LOG_LEVEL) {
    const level = env.LOG_LEVEL.toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigurationError(`LOG_LEVEL must be one of debug, info, warn, error, got ${env.LOG_LEVEL}`);
    }
    config.logLevel = level;
  }

  return config;
}

function parseBoolean(name: string, value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigurationError(`${name} must be true or false, got ${value}`);
  }
}

function parseInteger(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got ${value}`);
  }
  return parsed;
}

function parseNumber(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigurationError(`${name} must be a non-negative number, got ${value}`);
  }
  return parsed;
}

function parseChoice<T extends string>(name: string, value: string, choices: readonly T[]): T {
  const match = choices.find(choice => choice === value.trim().toLowerCase());
  if (match === undefined) {
    throw new ConfigurationError(`${name} must be one of ${choices.join(', ')}, got ${value}`);
  }
  return match;
}
