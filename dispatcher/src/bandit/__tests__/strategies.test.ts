/**
 * Selection Strategy Tests
 */

import { describe, it, expect } from 'vitest';
import type { BanditState } from '@gantry/shared';
import {
  Ucb1Strategy,
  ThompsonStrategy,
  EpsilonGreedyStrategy,
  createStrategy,
  marginConfidence,
  sampleBeta,
} from '../strategies.js';
import { seededRandom, sequence } from '../../__tests__/helpers.js';

function arm(pulls: number, totalReward: number, successes = 0, failures = 0) {
  return { pulls, totalReward, successes, failures, totalDuration: 0 };
}

describe('Ucb1Strategy', () => {
  const strategy = new Ucb1Strategy(2.0);

  it('should play unpulled arms first, in runner-key order', () => {
    const state: BanditState = { a: arm(4, 2) };

    const choice = strategy.choose(['c', 'b', 'a'], state, { totalPulls: 4, random: Math.random });

    expect(choice.runnerKey).toBe('b');
    expect(choice.value).toBeNull();
    expect(choice.confidence).toBe(0.5);
    expect(choice.explored).toBe(true);
  });

  it('should pick the highest upper confidence bound', () => {
    const state: BanditState = { R1: arm(3, 5), R2: arm(1, 0) };

    const choice = strategy.choose(['R1', 'R2'], state, { totalPulls: 4, random: Math.random });

    expect(choice.runnerKey).toBe('R1');
    expect(choice.value).toBeCloseTo(5 / 3 + 2 * Math.sqrt(Math.log(4) / 3), 10);
    expect(choice.explored).toBe(false);
  });

  it('should favour rarely pulled arms as t grows', () => {
    const state: BanditState = { a: arm(100, 60), b: arm(2, 1) };

    expect(strategy.choose(['a', 'b'], state, { totalPulls: 102, random: Math.random }).runnerKey).toBe('b');
  });

  it('should break ties by runner key', () => {
    const state: BanditState = { x: arm(2, 1), y: arm(2, 1) };

    expect(strategy.choose(['y', 'x'], state, { totalPulls: 4, random: Math.random }).runnerKey).toBe('x');
  });

  it('should be fully confident with a single arm', () => {
    const choice = strategy.choose(['solo'], { solo: arm(3, 1) }, { totalPulls: 3, random: Math.random });

    expect(choice.confidence).toBe(1);
  });
});

describe('ThompsonStrategy', () => {
  it('should favour the arm with the better success record', () => {
    const strategy = new ThompsonStrategy();
    const state: BanditState = { good: arm(50, 40, 50, 0), bad: arm(50, 0, 0, 50) };

    for (let seed = 1; seed <= 20; seed++) {
      const choice = strategy.choose(['bad', 'good'], state, { totalPulls: 100, random: seededRandom(seed) });
      expect(choice.runnerKey).toBe('good');
    }
  });

  it('should be reproducible for a given random source', () => {
    const strategy = new ThompsonStrategy();
    const state: BanditState = { a: arm(3, 2, 2, 1), b: arm(3, 1, 1, 2) };

    const first = strategy.choose(['a', 'b'], state, { totalPulls: 6, random: seededRandom(7) });
    const second = strategy.choose(['a', 'b'], state, { totalPulls: 6, random: seededRandom(7) });

    expect(second).toEqual(first);
  });

  it('should describe the posterior it sampled', () => {
    const strategy = new ThompsonStrategy();
    const choice = strategy.choose(['only'], { only: arm(4, 2, 3, 1) }, { totalPulls: 4, random: seededRandom(3) });

    expect(choice.reasoning).toContain('Beta(4, 2)');
  });
});

describe('EpsilonGreedyStrategy', () => {
  const state: BanditState = { a: arm(2, 2), b: arm(2, 0.5) };

  it('should explore uniformly with probability epsilon', () => {
    const strategy = new EpsilonGreedyStrategy(0.1);

    const choice = strategy.choose(['a', 'b'], state, { totalPulls: 4, random: sequence(0.05, 0.6) });

    expect(choice.runnerKey).toBe('b');
    expect(choice.explored).toBe(true);
    expect(choice.confidence).toBe(0);
  });

  it('should otherwise exploit the best mean reward', () => {
    const strategy = new EpsilonGreedyStrategy(0.1);

    const choice = strategy.choose(['a', 'b'], state, { totalPulls: 4, random: sequence(0.5) });

    expect(choice.runnerKey).toBe('a');
    expect(choice.value).toBe(1);
    expect(choice.confidence).toBeCloseTo(0.75, 10);
  });

  it('should treat unpulled arms as mean zero', () => {
    const strategy = new EpsilonGreedyStrategy(0);

    expect(strategy.choose(['a', 'new'], state, { totalPulls: 4, random: sequence(0.5) }).runnerKey).toBe('a');
  });
});

describe('createStrategy', () => {
  it('should build the configured algorithm', () => {
    expect(createStrategy('ucb1').algorithm).toBe('ucb1');
    expect(createStrategy('thompson').algorithm).toBe('thompson');
    expect(createStrategy('epsilon-greedy', { epsilon: 0.2 }).algorithm).toBe('epsilon-greedy');
  });
});

describe('marginConfidence', () => {
  it('should measure the lead over the runner-up', () => {
    expect(marginConfidence([2, 1])).toBe(0.5);
    expect(marginConfidence([3, 3])).toBe(0);
    expect(marginConfidence([0, 0])).toBe(0);
    expect(marginConfidence([5])).toBe(1);
  });
});

describe('sampleBeta', () => {
  it('should stay in [0, 1] and centre on the distribution mean', () => {
    const random = seededRandom(42);
    let sum = 0;
    const n = 2000;

    for (let i = 0; i < n; i++) {
      const sample = sampleBeta(2, 5, random);
      expect(sample).toBeGreaterThanOrEqual(0);
      expect(sample).toBeLessThanOrEqual(1);
      sum += sample;
    }

    expect(Math.abs(sum / n - 2 / 7)).toBeLessThan(0.03);
  });

  it('should handle shapes below one', () => {
    const sample = sampleBeta(0.5, 0.5, seededRandom(9));

    expect(sample).toBeGreaterThanOrEqual(0);
    expect(sample).toBeLessThanOrEqual(1);
  });
});
