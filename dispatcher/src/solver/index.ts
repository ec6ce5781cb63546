export {
  ConstraintSolver,
  preferenceScore,
  compareRanked,
  compareKeys,
  type ConstraintSolverConfig,
} from './solver.js';
