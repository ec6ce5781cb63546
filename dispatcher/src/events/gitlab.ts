import type { RunnerProfile } from '@gantry/shared';
import type { OutcomeSubmission } from '../selector/index.js';
import { gitlabBuildEventSchema } from './schemas.js';

export type BuildEventMapping =
  | { kind: 'outcome'; outcome: OutcomeSubmission }
  | { kind: 'ignored'; reason: string };

export interface RunnerLookup {
  profiles(): RunnerProfile[];
}

const FINISHED_STATUSES = new Set(['success', 'failed']);

/**
 * Turn a GitLab job webhook payload into an outcome
 *
 * Runners are matched by GitLab runner id (`externalId`), then by
 * description against runner key or display name. Events for jobs that
 * have not finished, or ran on an unknown runner, are ignored.
 */
export function outcomeFromBuildEvent(payload: unknown, fleet: RunnerLookup): BuildEventMapping {
  const parsed = gitlabBuildEventSchema.safeParse(payload);
  if (!parsed.success) {
    return { kind: 'ignored', reason: 'Not a GitLab job event' };
  }

  const event = parsed.data;
  if (event.object_kind !== 'build') {
    return { kind: 'ignored', reason: `Unsupported event kind: ${event.object_kind}` };
  }
  if (!FINISHED_STATUSES.has(event.build_status)) {
    return { kind: 'ignored', reason: `Job status ${event.build_status} is not final` };
  }

  const runner = event.runner;
  if (!runner) {
    return { kind: 'ignored', reason: 'Event has no runner' };
  }

  const profiles = fleet.profiles();
  const profile =
    profiles.find(p => runner.id !== undefined && p.externalId === runner.id) ??
    profiles.find(p => runner.description !== undefined && p.runnerKey === runner.description) ??
    profiles.find(p => runner.description !== undefined && p.displayName === runner.description);

  if (!profile) {
    const label = runner.description ?? (runner.id !== undefined ? `#${runner.id}` : 'unknown');
    return { kind: 'ignored', reason: `Runner ${label} is not registered` };
  }

  return {
    kind: 'outcome',
    outcome: {
      runnerKey: profile.runnerKey,
      success: event.build_status === 'success',
      durationSeconds: event.build_duration ?? 0,
    },
  };
}
