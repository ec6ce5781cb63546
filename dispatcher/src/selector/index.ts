export {
  RunnerSelector,
  type RunnerSelectorDeps,
  type OutcomeSubmission,
} from './selector.js';
