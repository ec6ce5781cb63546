/**
 * Bandit engine
 *
 * Holds no statistics between calls: every public operation loads the
 * state document, computes, and saves it back. Persistence failures are
 * returned as notes instead of thrown: a failed load selects from empty
 * statistics and a failed save loses the observation.
 */

import type {
  ArmStatistics,
  BanditAlgorithm,
  BanditState,
  Observation,
  RunnerStatsSnapshot,
  StatsReport,
} from '@gantry/shared';
import { silentLogger, type Logger } from '@gantry/shared';
import { InvalidObservationError, UnknownRunnerError, errorMessage } from '../errors.js';
import type { RunnerDirectory } from '../ontology/index.js';
import { emptyArm, type StateBackend } from '../state/backend.js';
import { compareKeys } from '../solver/solver.js';
import { computeReward } from './reward.js';
import {
  createStrategy,
  meanReward,
  type SelectionStrategy,
  type StrategyChoice,
  type StrategyOptions,
} from './strategies.js';

export interface BanditEngineConfig extends StrategyOptions {
  algorithm?: BanditAlgorithm;

  /** Uniform source in [0, 1) (default: Math.random) */
  random?: () => number;

  logger?: Logger;
}

export interface BanditSelection extends StrategyChoice {
  algorithm: BanditAlgorithm;
  pulls: number;
  meanReward: number;
  degraded: string[];
}

export interface OutcomeInput {
  runnerKey: string;
  success: boolean;
  durationSeconds: number;
  costPerMinute: number;
  timestamp?: string;
}

export interface UpdateResult {
  observation: Observation;
  reward: number;
  arm: ArmStatistics;
  persisted: boolean;
  degraded: string[];
}

interface LoadedState {
  state: BanditState;
  degraded: string[];
}

export class BanditEngine {
  private strategy: SelectionStrategy;
  private random: () => number;
  private logger: Logger;

  constructor(
    private directory: RunnerDirectory,
    private backend: StateBackend,
    config: BanditEngineConfig = {},
  ) {
    this.strategy = createStrategy(config.algorithm ?? 'ucb1', config);
    this.random = config.random ?? Math.random;
    this.logger = config.logger ?? silentLogger;
  }

  get algorithm(): BanditAlgorithm {
    return this.strategy.algorithm;
  }

  /**
   * Choose one of the feasible runners
   *
   * Only the listed arms are considered. An empty list returns null
   * without touching the state backend.
   */
  async select(feasible: readonly string[]): Promise<BanditSelection | null> {
    if (feasible.length === 0) {
      return null;
    }

    const { state, degraded } = await this.loadState();
    const choice = this.strategy.choose(feasible, state, {
      totalPulls: this.totalRegisteredPulls(state),
      random: this.random,
    });
    const arm = state[choice.runnerKey] ?? emptyArm();

    return {
      ...choice,
      algorithm: this.strategy.algorithm,
      pulls: arm.pulls,
      meanReward: meanReward(arm),
      degraded,
    };
  }

  /**
   * Fold one outcome into the runner's statistics
   *
   * @throws UnknownRunnerError when the runner is not registered
   * @throws InvalidObservationError for negative or non-finite values
   */
  async update(input: OutcomeInput): Promise<UpdateResult> {
    if (!this.directory.has(input.runnerKey)) {
      throw new UnknownRunnerError(input.runnerKey);
    }
    if (!Number.isFinite(input.durationSeconds) || input.durationSeconds < 0) {
      throw new InvalidObservationError(`durationSeconds must be a non-negative number, got ${input.durationSeconds}`);
    }
    if (!Number.isFinite(input.costPerMinute) || input.costPerMinute < 0) {
      throw new InvalidObservationError(`costPerMinute must be a non-negative number, got ${input.costPerMinute}`);
    }

    const observation: Observation = {
      runnerKey: input.runnerKey,
      success: input.success,
      durationSeconds: input.durationSeconds,
      costPerMinute: input.costPerMinute,
      timestamp: input.timestamp ?? new Date().toISOString(),
    };
    const reward = computeReward(observation.success, observation.durationSeconds, observation.costPerMinute);

    const { state, degraded } = await this.loadState();
    const previous = state[observation.runnerKey] ?? emptyArm();
    const arm: ArmStatistics = {
      pulls: previous.pulls + 1,
      totalReward: previous.totalReward + reward,
      successes: previous.successes + (observation.success ? 1 : 0),
      failures: previous.failures + (observation.success ? 0 : 1),
      totalDuration: previous.totalDuration + observation.durationSeconds,
    };
    state[observation.runnerKey] = arm;

    // Never overwrite a document that failed to load
    let persisted = false;
    if (degraded.length > 0) {
      degraded.push(`Observation for ${observation.runnerKey} not saved: prior state could not be loaded`);
    } else {
      try {
        await this.backend.save(state);
        persisted = true;
      } catch (error) {
        const note = `State not saved to ${this.backend.description}, observation lost: ${errorMessage(error)}`;
        this.logger.warn(note);
        degraded.push(note);
      }
    }

    this.logger.debug(`Recorded ${observation.success ? 'success' : 'failure'} for ${observation.runnerKey} (reward ${reward.toFixed(4)})`);

    return { observation, reward, arm, persisted, degraded };
  }

  /**
   * Read-only snapshot of every registered or persisted arm
   */
  async getStats(): Promise<StatsReport> {
    const { state } = await this.loadState();
    const keys = Array.from(new Set([...this.directory.keys(), ...Object.keys(state)])).sort(compareKeys);

    const runners: Record<string, RunnerStatsSnapshot> = {};
    let totalObservations = 0;
    for (const key of keys) {
      const arm = state[key] ?? emptyArm();
      totalObservations += arm.pulls;
      const outcomes = arm.successes + arm.failures;
      runners[key] = {
        pulls: arm.pulls,
        meanReward: meanReward(arm),
        successRate: outcomes > 0 ? arm.successes / outcomes : 0.5,
        avgDuration: arm.pulls > 0 ? arm.totalDuration / arm.pulls : 0,
      };
    }

    const ranking = [...keys].sort((a, b) => {
      const diff = (runners[b]?.meanReward ?? 0) - (runners[a]?.meanReward ?? 0);
      return diff !== 0 ? diff : compareKeys(a, b);
    });

    return {
      algorithm: this.strategy.algorithm,
      totalObservations,
      runners,
      ranking,
    };
  }

  /**
   * Clear every arm at once
   *
   * @returns false when the empty state could not be saved
   */
  async reset(): Promise<boolean> {
    try {
      await this.backend.save({});
      this.logger.info(`Bandit statistics reset (${this.backend.description})`);
      return true;
    } catch (error) {
      this.logger.warn(`Bandit reset failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private async loadState(): Promise<LoadedState> {
    try {
      return { state: await this.backend.load(), degraded: [] };
    } catch (error) {
      const note = `State unavailable from ${this.backend.description}, using empty statistics: ${errorMessage(error)}`;
      this.logger.warn(note);
      return { state: {}, degraded: [note] };
    }
  }

  private totalRegisteredPulls(state: BanditState): number {
    let total = 0;
    for (const [key, arm] of Object.entries(state)) {
      if (this.directory.has(key)) {
        total += arm.pulls;
      }
    }
    return total;
  }
}
