import type { AvailabilityProviderKind, ProbeResult, RunnerProfile } from '@gantry/shared';

/**
 * Source of liveness information for the fleet
 *
 * Implementations never throw: a query that cannot be answered is an
 * `unknown` result, which callers treat as "assume available".
 */
export interface AvailabilityProber {
  readonly provider: AvailabilityProviderKind;

  onlineRunnerKeys(): Promise<ProbeResult>;
}

/**
 * The registered runners a prober checks
 */
export interface ProfileSource {
  profiles(): RunnerProfile[];
}

/**
 * Prober used when no fleet-status source is configured
 */
export class NullAvailabilityProber implements AvailabilityProber {
  readonly provider = 'none';

  async onlineRunnerKeys(): Promise<ProbeResult> {
    return {
      kind: 'unknown',
      reason: 'No availability provider configured',
      checkedAt: new Date().toISOString(),
    };
  }
}
