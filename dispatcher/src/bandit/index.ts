export {
  BanditEngine,
  type BanditEngineConfig,
  type BanditSelection,
  type OutcomeInput,
  type UpdateResult,
} from './engine.js';

export { computeReward, REWARD_EPSILON } from './reward.js';

export {
  Ucb1Strategy,
  ThompsonStrategy,
  EpsilonGreedyStrategy,
  createStrategy,
  meanReward,
  marginConfidence,
  sampleBeta,
  sampleGamma,
  type SelectionStrategy,
  type StrategyChoice,
  type StrategyContext,
  type StrategyOptions,
} from './strategies.js';
