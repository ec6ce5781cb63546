/**
 * Arm selection strategies
 *
 * Every strategy sees the feasible keys and the loaded statistics and
 * returns one choice. Feasible keys are visited in runner-key order so
 * ties always resolve the same way.
 */

import type { ArmStatistics, BanditAlgorithm, BanditState } from '@gantry/shared';
import { emptyArm } from '../state/backend.js';
import { compareKeys } from '../solver/solver.js';

export interface StrategyContext {
  /** Pulls summed over every registered arm, feasible or not */
  totalPulls: number;

  /** Uniform source in [0, 1) */
  random: () => number;
}

export interface StrategyChoice {
  runnerKey: string;

  /** UCB index, posterior sample or mean reward; null for an unexplored arm */
  value: number | null;

  /** In [0, 1] */
  confidence: number;

  /** Chosen to explore rather than exploit */
  explored: boolean;

  reasoning: string;
}

export interface SelectionStrategy {
  readonly algorithm: BanditAlgorithm;
  choose(feasible: readonly string[], state: BanditState, context: StrategyContext): StrategyChoice;
}

export function meanReward(arm: ArmStatistics): number {
  return arm.pulls > 0 ? arm.totalReward / arm.pulls : 0;
}

/**
 * Relative lead of the best value over the runner-up
 */
export function marginConfidence(values: readonly number[]): number {
  if (values.length <= 1) {
    return 1;
  }
  const sorted = [...values].sort((a, b) => b - a);
  const best = sorted[0] ?? 0;
  const second = sorted[1] ?? 0;
  if (best <= 0) {
    return 0;
  }
  return Math.min(1, Math.max(0, (best - second) / best));
}

function armOf(state: BanditState, runnerKey: string): ArmStatistics {
  return state[runnerKey] ?? emptyArm();
}

function sortedKeys(feasible: readonly string[]): string[] {
  return Array.from(new Set(feasible)).sort(compareKeys);
}

/**
 * Index of the largest value; the first one wins ties
 */
function argMax(values: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    const value = values[i] ?? -Infinity;
    if (value > (values[best] ?? -Infinity)) {
      best = i;
    }
  }
  return best;
}

function fmt(value: number): string {
  return value.toFixed(3);
}

export class Ucb1Strategy implements SelectionStrategy {
  readonly algorithm = 'ucb1';

  constructor(private explorationConstant = 2.0) {}

  choose(feasible: readonly string[], state: BanditState, context: StrategyContext): StrategyChoice {
    const keys = sortedKeys(feasible);

    const unexplored = keys.find(key => armOf(state, key).pulls === 0);
    if (unexplored !== undefined) {
      return {
        runnerKey: unexplored,
        value: null,
        confidence: 0.5,
        explored: true,
        reasoning: `UCB1 selected ${unexplored}: no observations yet, exploring`,
      };
    }

    const t = Math.max(1, context.totalPulls);
    const values = keys.map(key => {
      const arm = armOf(state, key);
      return meanReward(arm) + this.explorationConstant * Math.sqrt(Math.log(t) / arm.pulls);
    });

    const index = argMax(values);
    const runnerKey = keys[index] ?? '';
    const value = values[index] ?? 0;
    const arm = armOf(state, runnerKey);

    return {
      runnerKey,
      value,
      confidence: marginConfidence(values),
      explored: false,
      reasoning: `UCB1 selected ${runnerKey}: mean reward ${fmt(meanReward(arm))} over ${arm.pulls} pulls, ` +
        `UCB ${fmt(value)} (t=${t}, c=${this.explorationConstant})`,
    };
  }
}

export class ThompsonStrategy implements SelectionStrategy {
  readonly algorithm = 'thompson';

  constructor(
    private priorAlpha = 1,
    private priorBeta = 1,
  ) {}

  choose(feasible: readonly string[], state: BanditState, context: StrategyContext): StrategyChoice {
    const keys = sortedKeys(feasible);
    const params = keys.map(key => {
      const arm = armOf(state, key);
      return { alpha: this.priorAlpha + arm.successes, beta: this.priorBeta + arm.failures };
    });
    const samples = params.map(p => sampleBeta(p.alpha, p.beta, context.random));

    const index = argMax(samples);
    const runnerKey = keys[index] ?? '';
    const sample = samples[index] ?? 0;
    const chosen = params[index] ?? { alpha: this.priorAlpha, beta: this.priorBeta };

    return {
      runnerKey,
      value: sample,
      confidence: marginConfidence(samples),
      explored: armOf(state, runnerKey).pulls === 0,
      reasoning: `Thompson sampling selected ${runnerKey}: sample ${fmt(sample)} ` +
        `from Beta(${chosen.alpha}, ${chosen.beta})`,
    };
  }
}

export class EpsilonGreedyStrategy implements SelectionStrategy {
  readonly algorithm = 'epsilon-greedy';

  constructor(private epsilon = 0.1) {}

  choose(feasible: readonly string[], state: BanditState, context: StrategyContext): StrategyChoice {
    const keys = sortedKeys(feasible);

    if (context.random() < this.epsilon) {
      const index = Math.min(keys.length - 1, Math.floor(context.random() * keys.length));
      const runnerKey = keys[index] ?? '';
      return {
        runnerKey,
        value: meanReward(armOf(state, runnerKey)),
        confidence: 0,
        explored: true,
        reasoning: `Epsilon-greedy (epsilon=${this.epsilon}) explored ${runnerKey} at random`,
      };
    }

    const means = keys.map(key => meanReward(armOf(state, key)));
    const index = argMax(means);
    const runnerKey = keys[index] ?? '';
    const arm = armOf(state, runnerKey);

    return {
      runnerKey,
      value: means[index] ?? 0,
      confidence: marginConfidence(means),
      explored: false,
      reasoning: `Epsilon-greedy (epsilon=${this.epsilon}) exploited ${runnerKey}: ` +
        `mean reward ${fmt(meanReward(arm))} over ${arm.pulls} pulls`,
    };
  }
}

export interface StrategyOptions {
  explorationConstant?: number;
  epsilon?: number;
  priorAlpha?: number;
  priorBeta?: number;
}

export function createStrategy(algorithm: BanditAlgorithm, options: StrategyOptions = {}): SelectionStrategy {
  switch (algorithm) {
    case 'ucb1':
      return new Ucb1Strategy(options.explorationConstant);
    case 'thompson':
      return new ThompsonStrategy(options.priorAlpha, options.priorBeta);
    case 'epsilon-greedy':
      return new EpsilonGreedyStrategy(options.epsilon);
  }
}

/**
 * Beta(alpha, beta) sample from two Gamma draws
 */
export function sampleBeta(alpha: number, beta: number, random: () => number): number {
  const x = sampleGamma(alpha, random);
  const y = sampleGamma(beta, random);
  return x + y > 0 ? x / (x + y) : 0.5;
}

/**
 * Gamma(shape, 1) sample (Marsaglia and Tsang)
 */
export function sampleGamma(shape: number, random: () => number): number {
  if (shape < 1) {
    const u = 1 - random();
    return sampleGamma(shape + 1, random) * Math.pow(u, 1 / shape);
  }

  const d = shape - 1 / 3;
  const c = 1 / Math.sqrt(9 * d);

  for (;;) {
    let x: number;
    let v: number;
    do {
      x = sampleNormal(random);
      v = 1 + c * x;
    } while (v <= 0);

    v = v * v * v;
    const u = 1 - random();
    if (u < 1 - 0.0331 * x * x * x * x) {
      return d * v;
    }
    if (Math.log(u) < 0.5 * x * x + d * (1 - v + Math.log(v))) {
      return d * v;
    }
  }
}

function sampleNormal(random: () => number): number {
  const u1 = 1 - random();
  const u2 = random();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}
