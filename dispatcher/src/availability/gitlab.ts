import { z } from 'zod';
import type { ProbeResult } from '@gantry/shared';
import { silentLogger, type Logger } from '@gantry/shared';
import { AvailabilityProbeError, errorMessage } from '../errors.js';
import type { AvailabilityProber, ProfileSource } from './prober.js';

export interface GitLabProberConfig {
  /** Base URL, e.g. https://gitlab.com */
  gitlabUrl: string;

  /** Token sent as PRIVATE-TOKEN. Without one every probe is unknown. */
  token?: string;

  /** Per-request timeout in ms (default: 5000) */
  timeoutMs?: number;

  logger?: Logger;
}

const runnerStatusSchema = z.object({
  status: z.string(),
});

/**
 * Asks the GitLab runners API which registered runners are online
 *
 * Runners are queried one at a time by their `externalId`. A runner
 * without one is not managed by GitLab and counts as online. Any failed
 * request makes the whole result unknown, since a partial answer could
 * look like "everything offline".
 */
export class GitLabAvailabilityProber implements AvailabilityProber {
  readonly provider = 'gitlab';
  private baseUrl: string;
  private timeoutMs: number;
  private logger: Logger;

  constructor(
    private fleet: ProfileSource,
    private config: GitLabProberConfig,
  ) {
    this.baseUrl = config.gitlabUrl.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? 5000;
    this.logger = config.logger ?? silentLogger;
  }

  async onlineRunnerKeys(): Promise<ProbeResult> {
    const checkedAt = new Date().toISOString();

    const token = this.config.token;
    if (!token) {
      return { kind: 'unknown', reason: 'No GitLab API token configured', checkedAt };
    }

    const online: string[] = [];
    for (const profile of this.fleet.profiles()) {
      if (profile.externalId === undefined) {
        online.push(profile.runnerKey);
        continue;
      }

      try {
        if (await this.isOnline(profile.externalId, token)) {
          online.push(profile.runnerKey);
        }
      } catch (error) {
        const reason = `Probe for ${profile.runnerKey} failed: ${errorMessage(error)}`;
        this.logger.warn(reason);
        return { kind: 'unknown', reason, checkedAt };
      }
    }

    this.logger.debug(`Runner availability: ${online.length} online`);
    return { kind: 'known', online, checkedAt };
  }

  private async isOnline(externalId: number, token: string): Promise<boolean> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(`${this.baseUrl}/api/v4/runners/${externalId}`, {
        headers: { 'PRIVATE-TOKEN': token, Accept: 'application/json' },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new AvailabilityProbeError(`GitLab returned status ${response.status}`);
      }

      const parsed = runnerStatusSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new AvailabilityProbeError('GitLab response has no runner status');
      }

      return parsed.data.status === 'online';
    } catch (error) {
      if (error instanceof AvailabilityProbeError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new AvailabilityProbeError(`Timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      throw new AvailabilityProbeError(errorMessage(error), { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}
