/**
 * Selection algorithms
 */
export type BanditAlgorithm = 'ucb1' | 'thompson' | 'epsilon-greedy';

/**
 * Per-runner statistics as persisted by the state backend
 *
 * `pulls` and `totalReward` only ever grow. The remaining fields were
 * added later and are default-filled with 0 when missing.
 */
export interface ArmStatistics {
  pulls: number;
  totalReward: number;
  successes: number;
  failures: number;
  /** Sum of observed durations in seconds */
  totalDuration: number;
}

/**
 * The persisted document: one entry per runner key
 */
export type BanditState = Record<string, ArmStatistics>;

/**
 * One job outcome, the unit of feedback
 */
export interface Observation {
  runnerKey: string;
  success: boolean;
  durationSeconds: number;
  costPerMinute: number;
  timestamp: string;
}

/**
 * Read-only diagnostic view of one arm
 */
export interface RunnerStatsSnapshot {
  pulls: number;
  meanReward: number;
  successRate: number;
  avgDuration: number;
}

/**
 * Diagnostic snapshot of all arms
 */
export interface StatsReport {
  algorithm: BanditAlgorithm;
  totalObservations: number;
  runners: Record<string, RunnerStatsSnapshot>;
  /** Runner keys ordered by mean reward, best first */
  ranking: string[];
}
