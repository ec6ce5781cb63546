/**
 * Image or service reference as it appears in a CI job definition
 */
export type ImageReference = string | { name: string };

/**
 * A job as declared to the orchestrating CI system
 *
 * Mirrors the subset of a GitLab CI job definition that carries
 * placement information. Everything is optional and free-form.
 */
export interface JobDeclaration {
  /** Job name (informational) */
  name?: string;

  tags?: string[] | string;

  image?: ImageReference;

  services?: ImageReference[];

  /** Seconds, or a duration string such as "1h 30m" */
  timeout?: number | string;

  /** CI variables; CI_RUNNER_MEMORY and CI_RUNNER_CPU become resource hints */
  variables?: Record<string, unknown>;
}

/**
 * Requirements derived from a job declaration
 */
export interface JobRequirement {
  jobName: string;

  /** Hard constraints: every member must be present on the runner */
  required: string[];

  /** Soft constraints: only used for ranking */
  preferred: string[];

  /** Tags that matched no mapping */
  ignoredTags: string[];

  resourceHints: {
    memory?: string;
    cpu?: string;
  };

  timeoutSeconds?: number;
}

/**
 * A feasible runner with its preference score
 */
export interface RankedRunner {
  runnerKey: string;
  score: number;
  costPerMinute: number;
}

/**
 * Outcome of constraint solving
 *
 * An empty `ranked` list is a valid result: no runner can run the job.
 */
export interface FeasibilityResult {
  requirement: JobRequirement;

  /** Feasible runners, best first */
  ranked: RankedRunner[];

  /** Runners that were pruned, with the reason */
  pruned: Record<string, string>;

  /** Short natural-language summary */
  summary: string;

  solveTimeMs: number;
}
