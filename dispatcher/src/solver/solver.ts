/**
 * Constraint solver
 *
 * Filters runners to those whose closed capability set contains every
 * required capability, then ranks them by preference score.
 */

import type { FeasibilityResult, JobRequirement, RankedRunner, RunnerProfile } from '@gantry/shared';

export interface ConstraintSolverConfig {
  /** Ranked runners listed in the summary (default: 3) */
  summaryLimit?: number;
}

export class ConstraintSolver {
  private config: Required<ConstraintSolverConfig>;

  constructor(config?: ConstraintSolverConfig) {
    this.config = {
      summaryLimit: config?.summaryLimit ?? 3,
    };
  }

  /**
   * Solve one requirement against the given runners
   *
   * An empty result means no runner can run the job; it is not an error.
   * Ordering is fully determined by the inputs: score descending, then
   * cost ascending, then runner key.
   */
  solve(requirement: JobRequirement, profiles: readonly RunnerProfile[]): FeasibilityResult {
    const startedAt = performance.now();

    const ranked: RankedRunner[] = [];
    const pruned: Record<string, string> = {};

    for (const profile of profiles) {
      const capabilities = new Set(profile.capabilities);
      const missing = requirement.required.filter(c => !capabilities.has(c));

      if (missing.length > 0) {
        pruned[profile.runnerKey] = `missing: ${missing.join(', ')}`;
        continue;
      }

      ranked.push({
        runnerKey: profile.runnerKey,
        score: preferenceScore(requirement.preferred, capabilities),
        costPerMinute: profile.costPerMinute,
      });
    }

    ranked.sort(compareRanked);

    return {
      requirement,
      ranked,
      pruned,
      summary: ranked.length > 0
        ? this.feasibleSummary(requirement, ranked, pruned)
        : infeasibleSummary(requirement, pruned),
      solveTimeMs: performance.now() - startedAt,
    };
  }

  solveBatch(requirements: readonly JobRequirement[], profiles: readonly RunnerProfile[]): FeasibilityResult[] {
    return requirements.map(requirement => this.solve(requirement, profiles));
  }

  private feasibleSummary(
    requirement: JobRequirement,
    ranked: RankedRunner[],
    pruned: Record<string, string>,
  ): string {
    const best = ranked[0]?.score ?? 0;
    const lines = [`Job requires: ${listOrNone(requirement.required)}`];

    if (requirement.preferred.length > 0) {
      lines.push(`Prefers: ${requirement.preferred.join(', ')}`);
    }

    lines.push(`Feasible runners: ${ranked.length} (best score ${best.toFixed(2)})`);
    for (const runner of ranked.slice(0, this.config.summaryLimit)) {
      lines.push(`  - ${runner.runnerKey} (score ${runner.score.toFixed(2)}, cost ${runner.costPerMinute.toFixed(3)}/min)`);
    }

    const prunedCount = Object.keys(pruned).length;
    if (prunedCount > 0) {
      lines.push(`Pruned: ${prunedCount}`);
    }

    return lines.join('\n');
  }
}

/**
 * Share of preferred capabilities the runner has
 *
 * With no preferences every feasible runner scores 1.
 */
export function preferenceScore(preferred: readonly string[], capabilities: ReadonlySet<string>): number {
  if (preferred.length === 0) {
    return 1;
  }
  const matched = preferred.filter(c => capabilities.has(c)).length;
  return matched / Math.max(1, preferred.length);
}

export function compareRanked(a: RankedRunner, b: RankedRunner): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.costPerMinute !== b.costPerMinute) return a.costPerMinute - b.costPerMinute;
  return compareKeys(a.runnerKey, b.runnerKey);
}

/**
 * Code-unit order, independent of locale
 */
export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function infeasibleSummary(requirement: JobRequirement, pruned: Record<string, string>): string {
  const lines = [
    'No feasible runner found',
    `Job requires: ${listOrNone(requirement.required)}`,
  ];

  const reasons = Object.entries(pruned);
  if (reasons.length === 0) {
    lines.push('No runners are registered');
  } else {
    lines.push('Reasons:');
    for (const [runnerKey, reason] of reasons) {
      lines.push(`  - ${runnerKey}: ${reason}`);
    }
  }

  return lines.join('\n');
}

function listOrNone(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : 'none';
}
