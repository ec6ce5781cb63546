/**
 * NATS subject patterns for the dispatcher
 *
 * All subjects are prefixed with the project namespace for isolation.
 */

/**
 * Build a namespaced subject
 */
export function buildSubject(projectId: string, ...parts: string[]): string {
  return `gantry.${projectId}.${parts.join('.')}`;
}

/**
 * Subject patterns for CI job events
 */
export const JobSubjects = {
  /**
   * Job completion notifications (bandit feedback)
   * Pattern: gantry.{projectId}.jobs.completed
   */
  completed: (projectId: string) =>
    buildSubject(projectId, 'jobs', 'completed'),
};

/**
 * Subject patterns for dispatcher broadcasts
 */
export const DispatcherSubjects = {
  /**
   * Selection decisions
   * Pattern: gantry.{projectId}.dispatcher.decisions
   */
  decisions: (projectId: string) =>
    buildSubject(projectId, 'dispatcher', 'decisions'),

  /**
   * Capacity lifecycle events
   * Pattern: gantry.{projectId}.dispatcher.lifecycle
   */
  lifecycle: (projectId: string) =>
    buildSubject(projectId, 'dispatcher', 'lifecycle'),
};

/**
 * KV bucket names
 */
export const KVBuckets = {
  /**
   * Bandit statistics
   */
  banditState: (projectId: string) => `gantry-state-${projectId}`,
};
