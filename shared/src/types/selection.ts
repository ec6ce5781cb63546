import type { BanditAlgorithm } from './bandit.js';

/**
 * Result of querying the orchestrating system for runner liveness
 *
 * `unknown` means the query could not be answered (no credentials,
 * request failure). It is distinct from an empty `known` set, which
 * means every runner is genuinely offline.
 */
export type ProbeResult =
  | { kind: 'known'; online: string[]; checkedAt: string }
  | { kind: 'unknown'; reason: string; checkedAt: string };

/**
 * Explanation record attached to every selection
 *
 * Field names are stable: dashboards and pipeline logs read them.
 */
export interface SelectionExplanation {
  decisionId: string;
  jobName: string;

  /** Feasible runner keys, before the availability filter */
  feasibleRunners: string[];

  /** Feasible runners that are online (null when availability is unknown) */
  onlineRunners: string[] | null;

  selectedRunner: string | null;

  /** Tag the pipeline should use to pin the job to the selected runner */
  recommendedTag: string | null;

  /** In [0, 1] */
  confidence: number;

  symbolicReasoning: string;
  statisticalReasoning: string;

  /** Algorithm that chose the runner (null when the bandit was not consulted) */
  algorithm: BanditAlgorithm | null;

  /** Mean reward of the selected arm before this decision (null without a bandit choice) */
  meanReward: number | null;

  /**
   * UCB index, Thompson sample or ε-greedy mean of the selected arm.
   * Null for an unexplored UCB1 arm or without a bandit choice.
   */
  value: number | null;

  /** Observations of the selected arm so far (null without a bandit choice) */
  pulls: number | null;

  /** Non-fatal problems encountered while deciding (probe failures etc.) */
  degraded: string[];

  /** Whether on-demand capacity was requested as part of this decision */
  capacityRequested: boolean;

  /** Wall-clock time of the whole decision: parse, solve, probe and bandit */
  solveTimeMs: number;
  decidedAt: string;
}

/**
 * Response body of a selection request
 */
export interface SelectionResponse {
  runnerKey: string | null;
  explanation: SelectionExplanation;
}

/**
 * Outcome report body
 */
export interface OutcomeReport {
  runnerKey: string;
  success: boolean;
  durationSeconds: number;
  /** Defaults to the runner's registered cost */
  costPerMinute?: number;
}
